export {
  configFromRCFile,
  loadConfig,
  type CloudConfig,
  type Location,
} from "app-config"
export { default as ApiClient } from "./api/ApiClient"
export {
  CloudError,
  CloudHttpError,
  CloudOperationError,
  ConfigurationError,
  MalformedResponseError,
  MultipleMatchesError,
  ResourceNotFoundError,
} from "./api/errors"
export { default as ContainerInfraService } from "./api/services/ContainerInfra"
export {
  CoeCloud,
  type CoeCloudOptions,
  type ContainerInfraApi,
} from "./cloud/CoeCloud"
export { MemoizedLoader, type InvalidatableCache } from "./cloud/cache"
export { EntityResolver, type EntityFilters } from "./cloud/entityResolver"
export {
  normalizeClusterTemplate,
  normalizeClusterTemplates,
} from "./data/cluster-templates/helpers"
export type {
  ClusterTemplate,
  ClusterTemplateCreateOptions,
  NormalizedClusterTemplate,
} from "./data/cluster-templates/model"
export {
  normalizeCoeCluster,
  normalizeCoeClusters,
} from "./data/coe-clusters/helpers"
export type {
  ClusterCertificate,
  ClusterCreateOptions,
  CoeCluster,
  NormalizedCoeCluster,
} from "./data/coe-clusters/model"
export {
  normalizeMagnumService,
  normalizeMagnumServices,
} from "./data/magnum-services/helpers"
export type {
  MagnumService,
  NormalizedMagnumService,
} from "./data/magnum-services/model"
export type { NormalizeOptions, RawRecord, UpdateFields } from "./data/model"
export { setLogLevel, type LogLevel } from "./utils/logger"
