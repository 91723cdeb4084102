import axios, {
  AxiosInstance,
  AxiosRequestConfig,
  CreateAxiosDefaults,
} from "axios"
import type { CloudConfig } from "app-config"
import { pathJoin } from "src/utils"
import { getLogger } from "src/utils/logger"
import { CloudOperationError, toCloudHttpError } from "./errors"
import {
  IBasicRequestDeleteParams,
  IBasicRequestGetParams,
  IBasicRequestPostParams,
  IRequestOptions,
} from "./model"
import ApiService from "./services/ApiService"
import ContainerInfraService from "./services/ContainerInfra"

const log = getLogger("ApiClient")

// Instance defaults a caller may override, such as the adapter
type AxiosDefaults = Omit<CreateAxiosDefaults, "headers">

const addApiRequestMetadata = (apiClass: string, requestMethod: string) => {
  return { apiClassMetadata: { apiClass, requestMethod } }
}

class ApiClient {
  private readonly axiosInstance: AxiosInstance
  private static instance: ApiClient | undefined
  private apiServices: { [key: string]: ApiService } = {}
  private token = ""

  // Define API Services here
  public containerInfra: ContainerInfraService

  static init(config: CloudConfig, axiosConfig?: AxiosDefaults) {
    if (!ApiClient.instance) {
      ApiClient.instance = new ApiClient(config, axiosConfig)
    }
    return ApiClient.instance
  }

  static getInstance() {
    if (!ApiClient.instance) {
      throw new Error(
        "ApiClient instance has not been initialized, please call ApiClient.init to instantiate it"
      )
    }
    return ApiClient.instance
  }

  static reset() {
    ApiClient.instance = undefined
  }

  constructor(
    readonly config: CloudConfig,
    axiosConfig: AxiosDefaults = {}
  ) {
    this.axiosInstance = axios.create({
      timeout: config.timeout,
      ...axiosConfig,
      headers: {
        "Content-Type": "application/json;charset=UTF-8",
        Accept: "application/json",
      },
    })
    this.axiosInstance.interceptors.response.use(undefined, (error: unknown) => {
      const cloudError = toCloudHttpError(error)
      const metadata = axios.isAxiosError(error)
        ? error.config?.apiClassMetadata
        : undefined
      if (metadata) {
        log.debug(
          `${metadata.apiClass}.${metadata.requestMethod} failed: ${cloudError.message}`
        )
      }
      return Promise.reject(cloudError)
    })

    this.token = config.authToken

    // Add API Services here
    this.containerInfra = this.addApiService(new ContainerInfraService(this))
  }

  addApiService = <T extends ApiService>(apiClientInstance: T) => {
    this.apiServices[apiClientInstance.getClassName()] = apiClientInstance
    return apiClientInstance
  }

  setToken = (token: string) => {
    this.token = token
  }

  getToken = () => {
    return this.token
  }

  getAuthHeaders = (): Record<string, string> => {
    if (!this.token) {
      return {}
    }
    return { "X-Auth-Token": this.token }
  }

  private getService(clsName: string) {
    const service = this.apiServices[clsName]
    if (!service) {
      throw new CloudOperationError(
        `No API service registered under ${clsName}`
      )
    }
    return service
  }

  async getBaseUrl(clsName: string) {
    return this.getService(clsName).getApiEndpoint()
  }

  private buildRequestConfig({
    clsName,
    mthdName,
    config = {},
  }: IRequestOptions): AxiosRequestConfig {
    return {
      ...config,
      headers: {
        ...this.getService(clsName).getHeaders(),
        ...this.getAuthHeaders(),
        ...(config.headers ?? {}),
      },
      ...addApiRequestMetadata(clsName, mthdName),
    }
  }

  get = async <T>({
    endpoint,
    baseUrl = undefined,
    params = undefined,
    options,
  }: IBasicRequestGetParams) => {
    if (!baseUrl) {
      baseUrl = await this.getBaseUrl(options.clsName)
    }
    const response = await this.axiosInstance.get<T>(
      pathJoin(baseUrl, endpoint),
      {
        params,
        ...this.buildRequestConfig(options),
      }
    )
    return response?.data
  }

  post = async <T>({
    endpoint,
    baseUrl = undefined,
    body = undefined,
    options,
  }: IBasicRequestPostParams) => {
    if (!baseUrl) {
      baseUrl = await this.getBaseUrl(options.clsName)
    }
    const response = await this.axiosInstance.post<T>(
      pathJoin(baseUrl, endpoint),
      body,
      this.buildRequestConfig(options)
    )
    return response?.data
  }

  patch = async <T>({
    endpoint,
    baseUrl = undefined,
    body = undefined,
    options,
  }: IBasicRequestPostParams) => {
    if (!baseUrl) {
      baseUrl = await this.getBaseUrl(options.clsName)
    }
    const response = await this.axiosInstance.patch<T>(
      pathJoin(baseUrl, endpoint),
      body,
      this.buildRequestConfig(options)
    )
    return response?.data
  }

  delete = async <T>({
    endpoint,
    baseUrl = undefined,
    params = undefined,
    options,
    data = undefined,
  }: IBasicRequestDeleteParams) => {
    if (!baseUrl) {
      baseUrl = await this.getBaseUrl(options.clsName)
    }
    const response = await this.axiosInstance.delete<T>(
      pathJoin(baseUrl, endpoint),
      {
        params,
        data,
        ...this.buildRequestConfig(options),
      }
    )
    return response?.data
  }
}

export default ApiClient
