import { isAxiosError } from "axios"
import { isRecord } from "src/utils"

interface CloudErrorOptions {
  cause?: unknown
  extraData?: unknown
}

export class CloudError extends Error {
  readonly extraData?: unknown

  constructor(message: string, { cause, extraData }: CloudErrorOptions = {}) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = new.target.name
    this.extraData = extraData
  }
}

// Raised for configuration that fails validation
export class ConfigurationError extends CloudError {}

// The generic failure of a cloud operation
export class CloudOperationError extends CloudError {}

interface CloudHttpErrorOptions extends CloudErrorOptions {
  statusCode?: number
  requestId?: string
  details?: string
  url?: string
}

export class CloudHttpError extends CloudOperationError {
  readonly statusCode?: number
  readonly requestId?: string
  readonly details?: string
  readonly url?: string

  constructor(
    message: string,
    { statusCode, requestId, details, url, ...rest }: CloudHttpErrorOptions = {}
  ) {
    super(message, rest)
    this.statusCode = statusCode
    this.requestId = requestId
    this.details = details
    this.url = url
  }
}

export class ResourceNotFoundError extends CloudOperationError {}

export class MultipleMatchesError extends CloudOperationError {}

// A required field is missing from an upstream payload
export class MalformedResponseError extends CloudError {
  constructor(readonly resource: string, readonly field: string) {
    super(`Malformed ${resource} record: missing required field '${field}'`)
  }
}

/**
 * Pulls a human readable message out of an error body. Magnum answers with
 * `{ errors: [{ detail }] }`, older services with `{ faultstring }`.
 */
export const extractErrorDetails = (body: unknown): string | undefined => {
  if (typeof body === "string") {
    return body.trim() || undefined
  }
  if (!isRecord(body)) {
    return undefined
  }
  const { errors, faultstring, message } = body
  if (Array.isArray(errors) && isRecord(errors[0])) {
    const { detail, title } = errors[0]
    if (typeof detail === "string") return detail
    if (typeof title === "string") return title
  }
  if (typeof faultstring === "string") return faultstring
  if (typeof message === "string") return message
  return undefined
}

export const toCloudHttpError = (error: unknown): CloudError => {
  if (error instanceof CloudError) {
    return error
  }
  if (!isAxiosError(error)) {
    const reason = error instanceof Error ? error.message : String(error)
    return new CloudOperationError(reason, { cause: error })
  }

  const method = error.config?.method?.toUpperCase() ?? "REQUEST"
  const url = error.config?.url
  const response = error.response
  if (!response) {
    return new CloudHttpError(
      `${error.message} for ${method} ${url ?? "unknown url"}`,
      { cause: error, url }
    )
  }

  const details = extractErrorDetails(response.data)
  const requestId = response.headers["x-openstack-request-id"]
  const reason = response.statusText ? ` ${response.statusText}` : ""
  return new CloudHttpError(
    `${response.status}${reason}: ${details ?? "no details"} for ${method} ${
      url ?? "unknown url"
    }`,
    {
      cause: error,
      statusCode: response.status,
      requestId: typeof requestId === "string" ? requestId : undefined,
      details,
      url,
    }
  )
}

/**
 * Runs `fn` and rethrows anything it raises as a `CloudOperationError`
 * carrying `message`. HTTP failures keep their status code and request id.
 */
export const withCloudErrors = async <T>(
  message: string,
  fn: () => Promise<T>
): Promise<T> => {
  try {
    return await fn()
  } catch (error) {
    const cloudError = toCloudHttpError(error)
    if (cloudError instanceof CloudHttpError) {
      throw new CloudHttpError(message, {
        cause: cloudError,
        statusCode: cloudError.statusCode,
        requestId: cloudError.requestId,
        details: cloudError.details,
        url: cloudError.url,
      })
    }
    if (cloudError instanceof CloudOperationError) {
      throw new CloudOperationError(message, { cause: cloudError })
    }
    throw cloudError
  }
}
