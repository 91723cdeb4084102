import {
  ClusterTemplate,
  GetClusterTemplatesList,
} from "src/data/cluster-templates/model"
import {
  ClusterCertificate,
  ClusterCreateAttrs,
  CoeCluster,
  GetCoeClustersList,
} from "src/data/coe-clusters/model"
import { GetMagnumServicesList } from "src/data/magnum-services/model"
import { JsonPatchOperation, RawRecord, UpdateFields } from "src/data/model"
import { CloudOperationError } from "../errors"
import ApiService from "./ApiService"

// Anything carrying the identifier the API addresses resources by
export interface ResourceRef {
  uuid?: unknown
  id?: unknown
}

export const resourceId = ({ uuid, id }: ResourceRef): string => {
  const value = uuid ?? id
  if (typeof value !== "string" || !value) {
    throw new CloudOperationError("Resource has no uuid to address it by")
  }
  return value
}

// A null value removes the attribute, anything else replaces it
export const toJsonPatch = (fields: UpdateFields): JsonPatchOperation[] =>
  Object.entries(fields).map(([key, value]): JsonPatchOperation =>
    value === null
      ? { op: "remove", path: `/${key}` }
      : { op: "replace", path: `/${key}`, value }
  )

class ContainerInfra extends ApiService {
  public getClassName(): string {
    return "ContainerInfra"
  }

  protected async getEndpoint() {
    return this.client.config.containerInfraEndpoint
  }

  getHeaders() {
    return {
      "OpenStack-API-Version": `container-infra ${this.client.config.apiVersion}`,
    }
  }

  // Follows `next` links until the collection is exhausted
  private listAll = async <R extends { next?: string | null }, T>(
    endpoint: string,
    mthdName: string,
    itemsOf: (response: R) => T[] | undefined
  ) => {
    const items: T[] = []
    let baseUrl: string | undefined = undefined
    let path = endpoint
    for (;;) {
      const response: R | undefined = await this.client.get<R>({
        endpoint: path,
        baseUrl,
        options: this.requestOptions(mthdName),
      })
      if (!response) {
        return items
      }
      items.push(...(itemsOf(response) ?? []))
      const next: string | null | undefined = response.next
      if (!next) {
        return items
      }
      baseUrl = next
      path = ""
    }
  }

  clusters = async () =>
    this.listAll<GetCoeClustersList, CoeCluster>(
      "/clusters",
      "clusters",
      (response) => response.clusters
    )

  createCluster = async (attrs: ClusterCreateAttrs): Promise<CoeCluster> => {
    const response = await this.client.post<Pick<CoeCluster, "uuid">>({
      endpoint: "/clusters",
      body: attrs,
      options: this.requestOptions("createCluster"),
    })
    return { ...attrs, ...response }
  }

  updateCluster = async (
    cluster: CoeCluster,
    fields: UpdateFields
  ): Promise<CoeCluster> => {
    const response = await this.client.patch<Partial<CoeCluster>>({
      endpoint: `/clusters/${resourceId(cluster)}`,
      body: toJsonPatch(fields),
      options: this.requestOptions("updateCluster"),
    })
    return { ...cluster, ...fields, ...response }
  }

  deleteCluster = async (cluster: ResourceRef) => {
    await this.client.delete({
      endpoint: `/clusters/${resourceId(cluster)}`,
      options: this.requestOptions("deleteCluster"),
    })
  }

  clusterTemplates = async () =>
    this.listAll<GetClusterTemplatesList, ClusterTemplate>(
      "/clustertemplates",
      "clusterTemplates",
      (response) => response.clustertemplates
    )

  createClusterTemplate = async (attrs: RawRecord) => {
    const response = await this.client.post<ClusterTemplate>({
      endpoint: "/clustertemplates",
      body: attrs,
      options: this.requestOptions("createClusterTemplate"),
    })
    return response
  }

  updateClusterTemplate = async (
    clusterTemplate: ClusterTemplate,
    fields: UpdateFields
  ): Promise<ClusterTemplate> => {
    const response = await this.client.patch<Partial<ClusterTemplate>>({
      endpoint: `/clustertemplates/${resourceId(clusterTemplate)}`,
      body: toJsonPatch(fields),
      options: this.requestOptions("updateClusterTemplate"),
    })
    return { ...clusterTemplate, ...fields, ...response }
  }

  deleteClusterTemplate = async (clusterTemplate: ResourceRef) => {
    await this.client.delete({
      endpoint: `/clustertemplates/${resourceId(clusterTemplate)}`,
      options: this.requestOptions("deleteClusterTemplate"),
    })
  }

  getCertificate = async (clusterId: string) => {
    const response = await this.client.get<ClusterCertificate>({
      endpoint: `/certificates/${clusterId}`,
      options: this.requestOptions("getCertificate"),
    })
    return response
  }

  signCertificate = async (clusterId: string, csr: string) => {
    const response = await this.client.post<ClusterCertificate>({
      endpoint: "/certificates",
      body: { cluster_uuid: clusterId, csr },
      options: this.requestOptions("signCertificate"),
    })
    return response
  }

  magnumServices = async () => {
    const response = await this.client.get<GetMagnumServicesList>({
      endpoint: "/mservices",
      options: this.requestOptions("magnumServices"),
    })
    return response
  }
}

export default ContainerInfra
