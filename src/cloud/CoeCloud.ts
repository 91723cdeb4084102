import loadConfig, { CloudConfig, Location } from "app-config"
import ApiClient from "src/api/ApiClient"
import { ResourceNotFoundError, withCloudErrors } from "src/api/errors"
import type ContainerInfraService from "src/api/services/ContainerInfra"
import {
  createClusterTemplateBody,
  normalizeClusterTemplates,
} from "src/data/cluster-templates/helpers"
import {
  ClusterTemplate,
  ClusterTemplateCreateOptions,
  NormalizedClusterTemplate,
} from "src/data/cluster-templates/model"
import { copyLocation } from "src/data/helpers"
import { normalizeCoeClusters } from "src/data/coe-clusters/helpers"
import {
  ClusterCertificate,
  ClusterCreateOptions,
  CoeCluster,
  NormalizedCoeCluster,
} from "src/data/coe-clusters/model"
import { normalizeMagnumServices } from "src/data/magnum-services/helpers"
import { NormalizedMagnumService } from "src/data/magnum-services/model"
import type { RawRecord, UpdateFields } from "src/data/model"
import { getLogger } from "src/utils/logger"
import { InvalidatableCache, MemoizedLoader } from "./cache"
import { EntityFilters, EntityResolver } from "./entityResolver"

const log = getLogger("CoeCloud")

// The resource operations the façade is built on
export type ContainerInfraApi = Pick<
  ContainerInfraService,
  | "clusters"
  | "createCluster"
  | "updateCluster"
  | "deleteCluster"
  | "clusterTemplates"
  | "createClusterTemplate"
  | "updateClusterTemplate"
  | "deleteClusterTemplate"
  | "getCertificate"
  | "signCertificate"
  | "magnumServices"
>

export interface CoeCloudOptions {
  strictMode: boolean
  location: Location
  // Seconds before a cached list is fetched again, 0 never expires it
  cacheExpiration?: number
}

/**
 * Cluster, cluster template and service operations of the container-infra
 * API. Cluster and template lists are cached per instance and invalidated by
 * the operations that change them.
 */
export class CoeCloud {
  private readonly clusterList: InvalidatableCache<CoeCluster[]>
  private readonly clusterTemplateList: InvalidatableCache<ClusterTemplate[]>
  private readonly clusters = new EntityResolver<CoeCluster>(
    "COE cluster",
    (cluster) => cluster.uuid
  )
  private readonly clusterTemplates = new EntityResolver<ClusterTemplate>(
    "cluster template",
    (clusterTemplate) => clusterTemplate.uuid
  )

  static fromClient(client: ApiClient) {
    const { strictMode, location, cacheExpiration } = client.config
    return new CoeCloud(client.containerInfra, {
      strictMode,
      location,
      cacheExpiration,
    })
  }

  static fromConfig(config: CloudConfig = loadConfig()) {
    return CoeCloud.fromClient(new ApiClient(config))
  }

  constructor(
    private readonly containerInfra: ContainerInfraApi,
    private readonly options: CoeCloudOptions
  ) {
    // Zero or unset keeps lists until they are invalidated
    const expirationMs = options.cacheExpiration
      ? options.cacheExpiration * 1000
      : undefined
    this.clusterList = new MemoizedLoader(
      () => this.containerInfra.clusters(),
      expirationMs
    )
    this.clusterTemplateList = new MemoizedLoader(
      () => this.containerInfra.clusterTemplates(),
      expirationMs
    )
  }

  get strictMode() {
    return this.options.strictMode
  }

  getCurrentLocation(): Location {
    return copyLocation(this.options.location)
  }

  /**
   * Lists COE (Container Orchestration Engine) clusters as returned by the
   * API. The list is cached until a cluster operation invalidates it.
   */
  async listCoeClusters(): Promise<CoeCluster[]> {
    return [...(await this.clusterList.get())]
  }

  async searchCoeClusters(
    nameOrId?: string,
    filters?: EntityFilters
  ): Promise<CoeCluster[]> {
    return this.clusters.filter(
      await this.listCoeClusters(),
      nameOrId,
      filters
    )
  }

  /**
   * @returns the cluster, or null if none matches
   * @throws MultipleMatchesError if more than one cluster matches
   */
  async getCoeCluster(
    nameOrId: string | CoeCluster,
    filters?: EntityFilters
  ): Promise<CoeCluster | null> {
    return this.clusters.get(() => this.listCoeClusters(), nameOrId, filters)
  }

  async createCoeCluster(
    name: string,
    clusterTemplateId: string,
    extra: ClusterCreateOptions = {}
  ): Promise<CoeCluster> {
    const cluster = await this.containerInfra.createCluster({
      ...extra,
      name,
      cluster_template_id: clusterTemplateId,
    })
    this.clusterList.invalidate()
    return cluster
  }

  /**
   * @returns true if the cluster was deleted, false if it does not exist
   */
  async deleteCoeCluster(nameOrId: string): Promise<boolean> {
    const cluster = await this.getCoeCluster(nameOrId)
    if (!cluster) {
      log.debug(`COE Cluster ${nameOrId} does not exist`)
      return false
    }

    await this.containerInfra.deleteCluster(cluster)
    this.clusterList.invalidate()
    return true
  }

  async updateCoeCluster(
    nameOrId: string,
    fields: UpdateFields
  ): Promise<CoeCluster> {
    this.clusterList.invalidate()
    const cluster = await this.getCoeCluster(nameOrId)
    if (!cluster) {
      throw new ResourceNotFoundError(`COE cluster ${nameOrId} not found.`)
    }

    return this.containerInfra.updateCluster(cluster, fields)
  }

  async getCoeClusterCertificate(
    clusterId: string
  ): Promise<ClusterCertificate> {
    return withCloudErrors(
      `Error fetching CA cert for the cluster ${clusterId}`,
      () => this.containerInfra.getCertificate(clusterId)
    )
  }

  /**
   * Signs a client key for a cluster. Magnum generates from `csr` the
   * certificate the client uses to talk to the cluster.
   */
  async signCoeClusterCertificate(
    clusterId: string,
    csr: string
  ): Promise<ClusterCertificate> {
    return withCloudErrors(`Error signing certs for cluster ${clusterId}`, () =>
      this.containerInfra.signCertificate(clusterId, csr)
    )
  }

  async listClusterTemplates(): Promise<ClusterTemplate[]> {
    return [...(await this.clusterTemplateList.get())]
  }

  async searchClusterTemplates(
    nameOrId?: string,
    filters?: EntityFilters
  ): Promise<ClusterTemplate[]> {
    return this.clusterTemplates.filter(
      await this.listClusterTemplates(),
      nameOrId,
      filters
    )
  }

  async getClusterTemplate(
    nameOrId: string | ClusterTemplate,
    filters?: EntityFilters
  ): Promise<ClusterTemplate | null> {
    return this.clusterTemplates.get(
      () => this.listClusterTemplates(),
      nameOrId,
      filters
    )
  }

  async createClusterTemplate(
    name: string,
    options: ClusterTemplateCreateOptions = {}
  ): Promise<ClusterTemplate> {
    const clusterTemplate = await this.containerInfra.createClusterTemplate(
      createClusterTemplateBody(name, options)
    )
    this.clusterTemplateList.invalidate()
    return clusterTemplate
  }

  async deleteClusterTemplate(nameOrId: string): Promise<boolean> {
    const clusterTemplate = await this.getClusterTemplate(nameOrId)
    if (!clusterTemplate) {
      log.debug(`Cluster template ${nameOrId} does not exist`)
      return false
    }

    await this.containerInfra.deleteClusterTemplate(clusterTemplate)
    this.clusterTemplateList.invalidate()
    return true
  }

  async updateClusterTemplate(
    nameOrId: string,
    fields: UpdateFields
  ): Promise<ClusterTemplate> {
    this.clusterTemplateList.invalidate()
    const clusterTemplate = await this.getClusterTemplate(nameOrId)
    if (!clusterTemplate) {
      throw new ResourceNotFoundError(
        `Cluster template ${nameOrId} not found.`
      )
    }

    return this.containerInfra.updateClusterTemplate(clusterTemplate, fields)
  }

  async listMagnumServices(): Promise<NormalizedMagnumService[]> {
    return withCloudErrors("Error fetching Magnum services list", async () => {
      const response = await this.containerInfra.magnumServices()
      return normalizeMagnumServices(response?.mservices ?? [], {
        location: this.options.location,
      })
    })
  }

  normalizeCoeClusters(clusters: RawRecord[]): NormalizedCoeCluster[] {
    return normalizeCoeClusters(clusters, this.options)
  }

  normalizeClusterTemplates(
    clusterTemplates: RawRecord[]
  ): NormalizedClusterTemplate[] {
    return normalizeClusterTemplates(clusterTemplates, this.options)
  }
}

export default CoeCloud
