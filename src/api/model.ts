import { AxiosRequestConfig } from "axios"

export interface IRequestOptions {
  clsName: string
  mthdName: string
  config?: Pick<AxiosRequestConfig, "timeout" | "responseType"> & {
    headers?: Record<string, string>
  }
}

export interface IBasicRequestGetParams {
  endpoint: string
  params?: AxiosRequestConfig["params"]
  baseUrl?: string
  options: IRequestOptions
}

export interface IBasicRequestPostParams {
  endpoint: string
  body?: unknown
  baseUrl?: string
  options: IRequestOptions
}

export interface IBasicRequestDeleteParams {
  endpoint: string
  params?: AxiosRequestConfig["params"]
  data?: AxiosRequestConfig["data"]
  baseUrl?: string
  options: IRequestOptions
}

export interface ApiClassMetadata {
  apiClass: string
  requestMethod: string
}

declare module "axios" {
  interface AxiosRequestConfig {
    apiClassMetadata?: ApiClassMetadata
  }
}
