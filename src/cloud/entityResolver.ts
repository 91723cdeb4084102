import jmespath from "jmespath"
import { equals } from "ramda"
import { CloudOperationError, MultipleMatchesError } from "src/api/errors"
import type { RawRecord } from "src/data/model"
import { isRecord } from "src/utils"

/**
 * Either a dictionary of attributes an entity must carry, where nested
 * dictionaries match nested attributes, or a JMESPath expression run over the
 * whole list.
 */
export type EntityFilters = RawRecord | string

const escapeRegExp = (value: string) =>
  value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&")

/**
 * Translates a shell-style wildcard (`*`, `?`, `[seq]`, `[!seq]`) into an
 * anchored regular expression. Returns null when the pattern cannot compile.
 */
export const wildcardToRegExp = (pattern: string): RegExp | null => {
  let source = ""
  let i = 0
  while (i < pattern.length) {
    const char = pattern[i]
    i += 1
    if (char === "*") {
      source += ".*"
    } else if (char === "?") {
      source += "."
    } else if (char === "[") {
      let j = i
      if (pattern[j] === "!") j += 1
      if (pattern[j] === "]") j += 1
      const close = pattern.indexOf("]", j)
      if (close === -1) {
        source += "\\["
        continue
      }
      let body = pattern.slice(i, close).replace(/\\/g, "\\\\")
      if (body.startsWith("!")) {
        body = `^${body.slice(1)}`
      } else if (body.startsWith("^") || body.startsWith("[")) {
        body = `\\${body}`
      }
      // A leading "]" is a member of the set
      body = body.replace(/]/g, "\\]")
      source += `[${body}]`
      i = close + 1
    } else {
      source += escapeRegExp(char)
    }
  }
  try {
    return new RegExp(`^${source}$`, "s")
  } catch {
    return null
  }
}

const matchesDict = (filters: RawRecord, entity: unknown): boolean => {
  if (!isRecord(entity) || !Object.keys(entity).length) {
    return false
  }
  return Object.entries(filters).every(([key, expected]) => {
    if (isRecord(expected)) {
      return matchesDict(expected, entity[key])
    }
    // A missing attribute compares equal to null
    return equals(entity[key] ?? null, expected ?? null)
  })
}

/**
 * Finds entities of one kind by name, ID or filters. `idOf` tells where the
 * kind keeps its identifier.
 */
export class EntityResolver<T extends RawRecord> {
  constructor(
    private readonly resource: string,
    private readonly idOf: (entity: T) => unknown = (entity) => entity.id
  ) {}

  filter(entities: T[], nameOrId?: string, filters?: EntityFilters): T[] {
    let data = entities
    if (nameOrId) {
      data = this.matchIdentifier(entities, nameOrId)
      if (!data.length) {
        return []
      }
    }

    if (!filters || (isRecord(filters) && !Object.keys(filters).length)) {
      return data
    }
    if (typeof filters === "string") {
      return this.search(data, filters)
    }
    return data.filter((entity) => matchesDict(filters, entity))
  }

  /**
   * Resolves exactly one entity, or null when nothing matches. An entity
   * passed in instead of a name is returned as is.
   */
  async get(
    list: () => Promise<T[]>,
    nameOrId: string | T,
    filters?: EntityFilters
  ): Promise<T | null> {
    if (typeof nameOrId !== "string") {
      return nameOrId
    }
    const entities = this.filter(await list(), nameOrId, filters)
    if (entities.length > 1) {
      throw new MultipleMatchesError(
        `Multiple matches found for ${this.resource} ${nameOrId}`
      )
    }
    return entities[0] ?? null
  }

  private matchIdentifier(entities: T[], nameOrId: string): T[] {
    const pattern = wildcardToRegExp(nameOrId)
    return entities.filter((entity) => {
      const candidates = [this.idOf(entity), entity.name].filter(
        (value): value is string => typeof value === "string" && !!value
      )
      if (candidates.includes(nameOrId)) {
        return true
      }
      return pattern !== null && candidates.some((value) => pattern.test(value))
    })
  }

  // JMESPath results are mapped back onto the entities they selected
  private search(entities: T[], expression: string): T[] {
    const result = this.evaluate(entities, expression)
    if (!Array.isArray(result)) {
      return []
    }
    const selected = new Set<unknown>(result)
    return entities.filter((entity) => selected.has(entity))
  }

  private evaluate(entities: T[], expression: string): unknown {
    try {
      return jmespath.search(entities, expression)
    } catch (error) {
      throw new CloudOperationError(
        `Invalid filter expression for ${this.resource}: ${expression}`,
        { cause: error }
      )
    }
  }
}
