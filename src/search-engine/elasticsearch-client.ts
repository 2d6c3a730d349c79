import axios, { AxiosInstance } from 'axios';
import { ApiError } from './errors/api.error';
import {
  HttpMethod,
  SearchTransport,
  TransportRequestOptions,
} from './interfaces/transport.interface';

/**
 * HTTP client configuration options
 */
export interface ElasticsearchClientOptions {
  baseURL: string;
  timeout?: number;
  username?: string;
  password?: string;
}

/**
 * HTTP transport for an Elasticsearch-compatible cluster
 */
export class ElasticsearchClient implements SearchTransport {
  private readonly client: AxiosInstance;

  constructor(options: ElasticsearchClientOptions) {
    const { baseURL, timeout = 30000, username, password } = options;

    this.client = axios.create({
      baseURL,
      timeout,
      headers: {
        'Content-Type': 'application/json',
      },
      ...(username !== undefined && { auth: { username, password: password ?? '' } }),
    });

    this.client.interceptors.response.use(
      response => response,
      error => this.handleRequestError(error),
    );
  }

  /**
   * Maps axios failures to ApiError; retrying is left to the caller
   */
  private handleRequestError(error: unknown): never {
    if (!axios.isAxiosError(error)) {
      throw error;
    }

    if (error.response) {
      const { status, statusText, data } = error.response;
      const method = (error.config?.method ?? 'request').toUpperCase();
      const url = error.config?.url ?? '';
      throw new ApiError(`${method} ${url} failed: ${statusText || 'Error'} (${status})`, status, data);
    }

    if (error.request) {
      throw new ApiError('No response received from search engine', 0);
    }

    throw new ApiError(error.message, 0);
  }

  async request(
    method: HttpMethod,
    path: string,
    options: TransportRequestOptions = {},
  ): Promise<unknown> {
    const response = await this.client.request<unknown>({
      method,
      url: path,
      data: options.body,
      params: options.params,
      ...(options.contentType !== undefined && {
        headers: { 'Content-Type': options.contentType },
      }),
    });

    return response.data;
  }
}
