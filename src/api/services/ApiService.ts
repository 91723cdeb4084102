import type ApiClient from "../ApiClient"
import type { IRequestOptions } from "../model"

/**
 * Base for the clients of one cloud service. The endpoint is resolved once
 * and reused by every request the service makes through the shared client.
 */
abstract class ApiService {
  protected apiEndpoint: string = ""
  public abstract getClassName(): string
  protected abstract getEndpoint(): Promise<string>

  constructor(protected client: ApiClient) {}

  // Headers sent with every request made on behalf of this service
  getHeaders(): Record<string, string> {
    return {}
  }

  protected requestOptions(mthdName: string): IRequestOptions {
    return { clsName: this.getClassName(), mthdName }
  }

  async initialize(): Promise<string> {
    this.apiEndpoint = await this.getEndpoint()
    return this.apiEndpoint
  }

  async getApiEndpoint(): Promise<string> {
    return this.apiEndpoint || this.initialize()
  }
}

export default ApiService
