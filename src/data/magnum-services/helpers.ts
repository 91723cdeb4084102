import { copyLocation, RecordReader } from "../helpers"
import type { NormalizeOptions, RawRecord } from "../model"
import type { NormalizedMagnumService } from "./model"

export const normalizeMagnumService = (
  magnumService: RawRecord,
  { location }: Pick<NormalizeOptions, "location">
): NormalizedMagnumService => {
  const reader = new RecordReader("Magnum service", magnumService)

  return {
    location: copyLocation(location),
    binary: reader.required("binary"),
    created_at: reader.required("created_at"),
    disabled_reason: reader.required("disabled_reason"),
    host: reader.required("host"),
    id: reader.required("id"),
    report_count: reader.required("report_count"),
    state: reader.required("state"),
    updated_at: reader.required("updated_at"),
    properties: reader.rest(),
  }
}

export const normalizeMagnumServices = (
  magnumServices: RawRecord[],
  options: Pick<NormalizeOptions, "location">
): NormalizedMagnumService[] =>
  magnumServices.map((magnumService) =>
    normalizeMagnumService(magnumService, options)
  )
