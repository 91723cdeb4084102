import type { Link, NormalizedRecord, RawRecord } from "../model"

export interface ClusterTemplate extends RawRecord {
  uuid: string
  name: string
  coe: string
  image_id: string
  keypair_id: string | null
  flavor_id: string | null
  master_flavor_id?: string | null
  external_network_id: string | null
  fixed_network?: string | null
  fixed_subnet?: string | null
  dns_nameserver: string | null
  docker_volume_size: number | null
  network_driver: string | null
  volume_driver: string | null
  server_type: string
  cluster_distro: string | null
  apiserver_port: number | null
  insecure_registry: string | null
  http_proxy?: string | null
  https_proxy?: string | null
  no_proxy?: string | null
  labels?: Record<string, string>
  public: boolean
  registry_enabled: boolean
  tls_disabled: boolean
  floating_ip_enabled?: boolean | null
  created_at: string
  updated_at: string | null
  links?: Link[]
}

export interface GetClusterTemplatesList {
  clustertemplates: ClusterTemplate[]
  next?: string
}

export interface ClusterTemplateCreateOptions extends RawRecord {
  imageId?: string
  keypairId?: string
  coe?: string
}

// Upstream boolean flags and the names they are exposed under
export const CLUSTER_TEMPLATE_FLAGS = {
  public: "is_public",
  registry_enabled: "is_registry_enabled",
  tls_disabled: "is_tls_disabled",
} as const

export const CLUSTER_TEMPLATE_OPTIONAL_FIELDS = [
  "fixed_network",
  "fixed_subnet",
  "http_proxy",
  "https_proxy",
  "labels",
  "master_flavor_id",
  "no_proxy",
] as const

export type LegacyFlag = keyof typeof CLUSTER_TEMPLATE_FLAGS

export interface NormalizedClusterTemplate extends NormalizedRecord {
  id: unknown
  is_public: unknown
  is_registry_enabled: unknown
  is_tls_disabled: unknown
  apiserver_port: unknown
  cluster_distro: unknown
  coe: unknown
  created_at: unknown
  dns_nameserver: unknown
  docker_volume_size: unknown
  external_network_id: unknown
  flavor_id: unknown
  image_id: unknown
  insecure_registry: unknown
  keypair_id: unknown
  name: unknown
  network_driver: unknown
  server_type: unknown
  updated_at: unknown
  volume_driver: unknown
  // Legacy names, only emitted outside strict mode
  uuid?: unknown
  floating_ip_enabled?: unknown
  public?: unknown
  registry_enabled?: unknown
  tls_disabled?: unknown
  fixed_network?: unknown
  fixed_subnet?: unknown
  http_proxy?: unknown
  https_proxy?: unknown
  labels?: unknown
  master_flavor_id?: unknown
  no_proxy?: unknown
}
