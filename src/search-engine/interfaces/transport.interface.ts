export const SEARCH_TRANSPORT = 'SEARCH_TRANSPORT';

export type HttpMethod = 'GET' | 'HEAD' | 'PUT' | 'POST' | 'DELETE';

export interface TransportRequestOptions {
  /**
   * JSON-serializable body, or an already serialized string (e.g. NDJSON)
   */
  body?: unknown;
  params?: Record<string, string>;
  contentType?: string;
}

/**
 * Raw request channel to the search engine. Implementations throw an ApiError for any
 * response with a status code of 400 or above.
 */
export interface SearchTransport {
  request(method: HttpMethod, path: string, options?: TransportRequestOptions): Promise<unknown>;
}
