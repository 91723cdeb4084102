import type { NormalizedRecord, RawRecord } from "../model"

export interface MagnumService extends RawRecord {
  id: number
  binary: string
  host: string
  state: "up" | "down"
  disabled: boolean
  disabled_reason: string | null
  report_count: number
  created_at: string
  updated_at: string | null
}

export interface GetMagnumServicesList {
  mservices: MagnumService[]
}

export interface NormalizedMagnumService extends NormalizedRecord {
  binary: unknown
  created_at: unknown
  disabled_reason: unknown
  host: unknown
  id: unknown
  report_count: unknown
  state: unknown
  updated_at: unknown
}
