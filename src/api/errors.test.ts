import { describe, expect, it } from "vitest"
import {
  CloudHttpError,
  CloudOperationError,
  extractErrorDetails,
  MalformedResponseError,
  toCloudHttpError,
  withCloudErrors,
} from "./errors"

describe("extractErrorDetails", () => {
  it("reads Magnum error documents", () => {
    expect(
      extractErrorDetails({ errors: [{ title: "Conflict", detail: "In use." }] })
    ).toBe("In use.")
    expect(extractErrorDetails({ errors: [{ title: "Conflict" }] })).toBe(
      "Conflict"
    )
  })

  it("reads faultstring and message bodies", () => {
    expect(extractErrorDetails({ faultstring: "Invalid input." })).toBe(
      "Invalid input."
    )
    expect(extractErrorDetails({ message: "Denied." })).toBe("Denied.")
  })

  it("keeps plain text and ignores anything else", () => {
    expect(extractErrorDetails(" Service Unavailable ")).toBe(
      "Service Unavailable"
    )
    expect(extractErrorDetails("")).toBeUndefined()
    expect(extractErrorDetails(null)).toBeUndefined()
    expect(extractErrorDetails({ errors: [] })).toBeUndefined()
  })
})

describe("toCloudHttpError", () => {
  it("wraps unknown failures", () => {
    const error = toCloudHttpError(new TypeError("bad"))

    expect(error).toBeInstanceOf(CloudOperationError)
    expect(error.message).toBe("bad")
    expect(error.cause).toBeInstanceOf(TypeError)
  })

  it("passes cloud errors through", () => {
    const original = new MalformedResponseError("COE cluster", "uuid")

    expect(toCloudHttpError(original)).toBe(original)
  })
})

describe("withCloudErrors", () => {
  it("returns the result of a successful call", async () => {
    await expect(withCloudErrors("unused", async () => 5)).resolves.toBe(5)
  })

  it("keeps the HTTP details under the new message", async () => {
    const failure = withCloudErrors("Error doing things", async () => {
      throw new CloudHttpError("409 Conflict: busy", {
        statusCode: 409,
        requestId: "req-1",
        details: "busy",
      })
    })

    await expect(failure).rejects.toMatchObject({
      name: "CloudHttpError",
      message: "Error doing things",
      statusCode: 409,
      requestId: "req-1",
      details: "busy",
    })
  })

  it("does not hide malformed responses", async () => {
    await expect(
      withCloudErrors("Error doing things", async () => {
        throw new MalformedResponseError("Magnum service", "host")
      })
    ).rejects.toThrow("Malformed Magnum service record: missing required field 'host'")
  })
})
