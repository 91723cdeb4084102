import { AxiosError } from "axios"
import { afterEach, describe, expect, it } from "vitest"
import { createMockAdapter } from "src/test/mockAdapter"
import { testConfig } from "src/test/fixtures"
import ApiClient from "./ApiClient"
import { CloudHttpError, CloudOperationError } from "./errors"

describe("ApiClient", () => {
  afterEach(() => {
    ApiClient.reset()
  })

  it("sends the auth token and the service headers", async () => {
    const { adapter, requests } = createMockAdapter(() => ({
      status: 200,
      data: { mservices: [] },
    }))
    const client = new ApiClient(testConfig, { adapter })

    await client.containerInfra.magnumServices()

    const [request] = requests
    expect(request.method).toBe("GET")
    expect(request.url).toBe("https://magnum.test:9511/v1/mservices")
    expect(request.headers.get("X-Auth-Token")).toBe("test-token")
    expect(request.headers.get("OpenStack-API-Version")).toBe(
      "container-infra latest"
    )
  })

  it("uses a replaced token on later requests", async () => {
    const { adapter, requests } = createMockAdapter(() => ({
      status: 200,
      data: { mservices: [] },
    }))
    const client = new ApiClient(testConfig, { adapter })

    client.setToken("rotated-token")
    await client.containerInfra.magnumServices()

    expect(client.getToken()).toBe("rotated-token")
    expect(requests[0].headers.get("X-Auth-Token")).toBe("rotated-token")
  })

  it("turns error responses into CloudHttpError", async () => {
    const { adapter } = createMockAdapter(() => ({
      status: 404,
      data: {
        errors: [
          {
            status: 404,
            title: "Not Found",
            detail: "Cluster c-1 could not be found.",
          },
        ],
      },
      headers: { "x-openstack-request-id": "req-123" },
    }))
    const client = new ApiClient(testConfig, { adapter })

    const failure = client.containerInfra.getCertificate("c-1")

    await expect(failure).rejects.toBeInstanceOf(CloudHttpError)
    await expect(failure).rejects.toMatchObject({
      message:
        "404 Not Found: Cluster c-1 could not be found. for GET https://magnum.test:9511/v1/certificates/c-1",
      statusCode: 404,
      requestId: "req-123",
      details: "Cluster c-1 could not be found.",
    })
  })

  it("turns network failures into CloudHttpError", async () => {
    const client = new ApiClient(testConfig, {
      adapter: async (config) => {
        throw new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config)
      },
    })

    await expect(client.containerInfra.magnumServices()).rejects.toThrow(
      new CloudHttpError(
        "connect ECONNREFUSED for GET https://magnum.test:9511/v1/mservices"
      )
    )
  })

  it("refuses requests for a service it does not know", async () => {
    const client = new ApiClient(testConfig)

    await expect(client.getBaseUrl("Compute")).rejects.toThrow(
      new CloudOperationError("No API service registered under Compute")
    )
  })

  describe("singleton", () => {
    it("requires init before getInstance", () => {
      expect(() => ApiClient.getInstance()).toThrow(
        "ApiClient instance has not been initialized"
      )
    })

    it("returns the instance created by init", () => {
      const client = ApiClient.init(testConfig)

      expect(ApiClient.getInstance()).toBe(client)
      expect(ApiClient.init(testConfig)).toBe(client)
    })
  })
})
