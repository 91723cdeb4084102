import { copyLocation, RecordReader } from "../helpers"
import type { NormalizeOptions, RawRecord } from "../model"
import {
  CLUSTER_TEMPLATE_FLAGS,
  CLUSTER_TEMPLATE_OPTIONAL_FIELDS,
  ClusterTemplateCreateOptions,
  LegacyFlag,
  NormalizedClusterTemplate,
} from "./model"

export const normalizeClusterTemplate = (
  clusterTemplate: RawRecord,
  { strictMode, location }: NormalizeOptions
): NormalizedClusterTemplate => {
  const reader = new RecordReader("cluster template", clusterTemplate)

  const id = reader.required("uuid")
  const flags = {
    public: reader.required("public"),
    registry_enabled: reader.required("registry_enabled"),
    tls_disabled: reader.required("tls_disabled"),
  } satisfies Record<LegacyFlag, unknown>
  // Always consumed, only ever exposed under its legacy name
  const fipEnabled = reader.take("floating_ip_enabled")

  const ret: NormalizedClusterTemplate = {
    id,
    location: copyLocation(location),
    [CLUSTER_TEMPLATE_FLAGS.public]: flags.public,
    [CLUSTER_TEMPLATE_FLAGS.registry_enabled]: flags.registry_enabled,
    [CLUSTER_TEMPLATE_FLAGS.tls_disabled]: flags.tls_disabled,
    apiserver_port: reader.required("apiserver_port"),
    cluster_distro: reader.required("cluster_distro"),
    coe: reader.required("coe"),
    created_at: reader.required("created_at"),
    dns_nameserver: reader.required("dns_nameserver"),
    docker_volume_size: reader.required("docker_volume_size"),
    external_network_id: reader.required("external_network_id"),
    flavor_id: reader.required("flavor_id"),
    image_id: reader.required("image_id"),
    insecure_registry: reader.required("insecure_registry"),
    keypair_id: reader.required("keypair_id"),
    name: reader.required("name"),
    network_driver: reader.required("network_driver"),
    server_type: reader.required("server_type"),
    updated_at: reader.required("updated_at"),
    volume_driver: reader.required("volume_driver"),
    properties: {},
  }

  if (!strictMode) {
    ret.uuid = id
    if (fipEnabled !== undefined && fipEnabled !== null) {
      ret.floating_ip_enabled = fipEnabled
    }
    Object.assign(ret, flags)
  }

  for (const key of CLUSTER_TEMPLATE_OPTIONAL_FIELDS) {
    if (reader.has(key)) {
      ret[key] = reader.take(key)
    }
  }

  ret.properties = reader.rest()
  return ret
}

export const normalizeClusterTemplates = (
  clusterTemplates: RawRecord[],
  options: NormalizeOptions
): NormalizedClusterTemplate[] =>
  clusterTemplates.map((clusterTemplate) =>
    normalizeClusterTemplate(clusterTemplate, options)
  )

// Maps the camel-cased creation arguments onto the API's attribute names
export const createClusterTemplateBody = (
  name: string,
  { imageId, keypairId, coe, ...rest }: ClusterTemplateCreateOptions
): RawRecord => ({
  ...rest,
  name,
  ...(imageId === undefined ? {} : { image_id: imageId }),
  ...(keypairId === undefined ? {} : { keypair_id: keypairId }),
  ...(coe === undefined ? {} : { coe }),
})
