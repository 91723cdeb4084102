import { clone, has, omit } from "ramda"
import { MalformedResponseError } from "src/api/errors"
import type { Location } from "app-config"
import type { RawRecord } from "./model"

// Fields dropped from every upstream record before normalization
export const NOISE_FIELDS = ["links", "human_id", "model_name"] as const

/**
 * Consumes fields from a working copy of an upstream record. Whatever is left
 * once the schema has taken its fields ends up in `properties`.
 */
export class RecordReader {
  private readonly remaining: RawRecord

  constructor(
    private readonly resource: string,
    record: RawRecord
  ) {
    this.remaining = omit(NOISE_FIELDS, record)
  }

  has(key: string): boolean {
    return has(key, this.remaining)
  }

  required(key: string): unknown {
    if (!this.has(key)) {
      throw new MalformedResponseError(this.resource, key)
    }
    return this.take(key)
  }

  // Removes `key` and returns its value, undefined when absent
  take(key: string): unknown {
    const value = this.remaining[key]
    delete this.remaining[key]
    return value
  }

  rest(): RawRecord {
    return { ...this.remaining }
  }
}

export const copyLocation = (location: Location): Location => clone(location)
