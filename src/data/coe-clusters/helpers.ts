import { copyLocation, RecordReader } from "../helpers"
import type { NormalizeOptions, RawRecord } from "../model"
import { COE_CLUSTER_FIELDS, NormalizedCoeCluster } from "./model"

export const normalizeCoeCluster = (
  cluster: RawRecord,
  { strictMode, location }: NormalizeOptions
): NormalizedCoeCluster => {
  const reader = new RecordReader("COE cluster", cluster)
  const id = reader.required("uuid")

  const ret: NormalizedCoeCluster = {
    id,
    location: copyLocation(location),
    properties: {},
  }
  if (!strictMode) {
    ret.uuid = id
  }

  for (const key of COE_CLUSTER_FIELDS) {
    if (reader.has(key)) {
      ret[key] = reader.take(key)
    }
  }

  ret.properties = reader.rest()
  return ret
}

export const normalizeCoeClusters = (
  clusters: RawRecord[],
  options: NormalizeOptions
): NormalizedCoeCluster[] =>
  clusters.map((cluster) => normalizeCoeCluster(cluster, options))
