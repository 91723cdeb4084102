/**
 * Utility functions for parsing and validating OpenStack RC files
 */

// Fields without which no container-infra request can be made
export const REQUIRED_OPENSTACK_FIELDS = [
  "OS_AUTH_TOKEN",
  "OS_CONTAINER_INFRA_ENDPOINT",
] as const

export interface ParseRCFileResult {
  success: boolean
  fields?: Record<string, string>
  error?: string
}

/**
 * Parses the content of an OpenStack RC file and extracts environment variables
 */
export function parseRCFileContent(content: string): Record<string, string> {
  // Remove 'export' keywords from each line
  const cleanedContent = content.replace(/^\s*export\s+/gm, "")
  const parsedFields: Record<string, string> = {}
  const lines = cleanedContent.split(/\r?\n/)

  for (const line of lines) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith("#")) continue
    const eqIdx = trimmed.indexOf("=")
    if (eqIdx === -1) continue

    const key = trimmed.slice(0, eqIdx).trim()
    let value = trimmed.slice(eqIdx + 1).trim()

    // Remove surrounding quotes from values, if present
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1)
    }
    parsedFields[key] = value
  }

  // Handle aliases: OS_PROJECT_DOMAIN_NAME -> OS_DOMAIN_NAME
  if (parsedFields.OS_PROJECT_DOMAIN_NAME && !parsedFields.OS_DOMAIN_NAME) {
    parsedFields.OS_DOMAIN_NAME = parsedFields.OS_PROJECT_DOMAIN_NAME
  }
  // Handle aliases: OS_TENANT_NAME -> OS_PROJECT_NAME
  if (parsedFields.OS_TENANT_NAME && !parsedFields.OS_PROJECT_NAME) {
    parsedFields.OS_PROJECT_NAME = parsedFields.OS_TENANT_NAME
  }
  // Handle aliases: OS_TENANT_ID -> OS_PROJECT_ID
  if (parsedFields.OS_TENANT_ID && !parsedFields.OS_PROJECT_ID) {
    parsedFields.OS_PROJECT_ID = parsedFields.OS_TENANT_ID
  }

  return parsedFields
}

export function validateRCFileFields(fields: Record<string, string>): {
  valid: boolean
  missingFields: string[]
} {
  const missingFields = REQUIRED_OPENSTACK_FIELDS.filter(
    (field) => !fields[field] || fields[field].trim() === ""
  )

  return {
    valid: missingFields.length === 0,
    missingFields,
  }
}

export function parseRCFile(content: string): ParseRCFileResult {
  const parsedFields = parseRCFileContent(content)
  const validation = validateRCFileFields(parsedFields)

  if (!validation.valid) {
    return {
      success: false,
      error: `Missing required fields: ${validation.missingFields.join(", ")}`,
    }
  }
  return { success: true, fields: parsedFields }
}
