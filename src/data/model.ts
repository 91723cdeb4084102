import type { Location } from "app-config"

// An upstream API record as decoded from JSON
export type RawRecord = Record<string, unknown>

export interface Link {
  href: string
  rel: string
}

export interface NormalizeOptions {
  // Suppresses the legacy field names kept for backwards compatibility
  strictMode: boolean
  location: Location
}

export interface NormalizedRecord {
  location: Location
  properties: RawRecord
}

// Parameters for a JSON patch update, a null value removes the attribute
export type UpdateFields = Record<string, unknown>

export interface JsonPatchOperation {
  op: "replace" | "remove"
  path: string
  value?: unknown
}
