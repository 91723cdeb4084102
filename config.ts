import { z } from "zod"
import { ConfigurationError } from "src/api/errors"
import { parseRCFile } from "src/utils/openstackRCFileParser"

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => ["true", "1", "yes"].includes(value))

// A blank value counts as unset
const blankAsUnset = (value: unknown) =>
  typeof value === "string" && !value.trim() ? undefined : value

const optionalString = z
  .string()
  .trim()
  .transform((value) => value || undefined)
  .optional()

export const EnvSchema = z.object({
  OS_CONTAINER_INFRA_ENDPOINT: z.string().trim().url(),
  OS_AUTH_TOKEN: z.string().trim().min(1),
  OS_CLOUD: z.string().trim().min(1).default("defaults"),
  OS_REGION_NAME: optionalString,
  OS_ZONE: optionalString,
  OS_PROJECT_ID: optionalString,
  OS_PROJECT_NAME: optionalString,
  OS_TENANT_NAME: optionalString,
  OS_PROJECT_DOMAIN_ID: optionalString,
  OS_PROJECT_DOMAIN_NAME: optionalString,
  OS_DOMAIN_NAME: optionalString,
  OS_STRICT_MODE: booleanFlag.default("false"),
  OS_API_TIMEOUT: z.coerce.number().int().min(1000).max(600000).default(120000),
  OS_CONTAINER_INFRA_API_VERSION: z.string().trim().min(1).default("latest"),
  OS_CACHE_EXPIRATION: z.preprocess(
    blankAsUnset,
    z.coerce.number().positive().optional()
  ),
})

export interface Location {
  cloud: string
  region_name: string | null
  zone: string | null
  project: {
    id: string | null
    name: string | null
    domain_id: string | null
    domain_name: string | null
  }
}

export interface CloudConfig {
  containerInfraEndpoint: string
  authToken: string
  apiVersion: string
  timeout: number
  strictMode: boolean
  // Seconds a cached list stays valid; undefined keeps it until invalidated
  cacheExpiration?: number
  location: Location
}

export const loadConfig = (
  env: Record<string, string | undefined> = process.env
): CloudConfig => {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."))
    throw new ConfigurationError(
      `Invalid cloud configuration: ${[...new Set(keys)].join(", ")}`,
      { extraData: parsed.error.issues }
    )
  }
  const vars = parsed.data

  return {
    containerInfraEndpoint: vars.OS_CONTAINER_INFRA_ENDPOINT,
    authToken: vars.OS_AUTH_TOKEN,
    apiVersion: vars.OS_CONTAINER_INFRA_API_VERSION,
    timeout: vars.OS_API_TIMEOUT,
    strictMode: vars.OS_STRICT_MODE,
    cacheExpiration: vars.OS_CACHE_EXPIRATION,
    location: {
      cloud: vars.OS_CLOUD,
      region_name: vars.OS_REGION_NAME ?? null,
      zone: vars.OS_ZONE ?? null,
      project: {
        id: vars.OS_PROJECT_ID ?? null,
        name: vars.OS_PROJECT_NAME ?? vars.OS_TENANT_NAME ?? null,
        domain_id: vars.OS_PROJECT_DOMAIN_ID ?? null,
        domain_name: vars.OS_PROJECT_DOMAIN_NAME ?? vars.OS_DOMAIN_NAME ?? null,
      },
    },
  }
}

// Builds the configuration from the content of an OpenStack RC file
export const configFromRCFile = (content: string): CloudConfig => {
  const result = parseRCFile(content)
  if (!result.success || !result.fields) {
    throw new ConfigurationError(result.error ?? "Unable to parse RC file")
  }
  return loadConfig(result.fields)
}

export default loadConfig
