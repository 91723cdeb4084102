import type { Link, NormalizedRecord, RawRecord } from "../model"

export interface CoeCluster extends RawRecord {
  uuid: string
  name: string | null
  status?: string
  status_reason?: string | null
  cluster_template_id: string
  stack_id?: string | null
  keypair?: string | null
  master_count?: number
  node_count?: number
  create_timeout?: number | null
  discovery_url?: string | null
  api_address?: string | null
  coe_version?: string | null
  labels?: Record<string, string>
  links?: Link[]
}

export interface GetCoeClustersList {
  clusters: CoeCluster[]
  next?: string
}

export interface ClusterCreateOptions extends RawRecord {
  keypair?: string
  master_count?: number
  node_count?: number
  create_timeout?: number
  discovery_url?: string
  flavor_id?: string
  master_flavor_id?: string
  docker_volume_size?: number
  labels?: Record<string, string>
  fixed_network?: string
  fixed_subnet?: string
  floating_ip_enabled?: boolean
  master_lb_enabled?: boolean
}

export interface ClusterCreateAttrs extends ClusterCreateOptions {
  name: string
  cluster_template_id: string
}

export interface ClusterCertificate extends RawRecord {
  cluster_uuid: string
  pem: string
  csr?: string
  links?: Link[]
}

export const COE_CLUSTER_FIELDS = [
  "status",
  "cluster_template_id",
  "stack_id",
  "keypair",
  "master_count",
  "create_timeout",
  "node_count",
  "name",
] as const

export type CoeClusterField = (typeof COE_CLUSTER_FIELDS)[number]

/**
 * Client-facing shape of a cluster. Field values are passed through from the
 * API untouched, so they are left as `unknown`.
 */
export type NormalizedCoeCluster = NormalizedRecord & {
  id: unknown
  // Only outside strict mode
  uuid?: unknown
} & Partial<Record<CoeClusterField, unknown>>
