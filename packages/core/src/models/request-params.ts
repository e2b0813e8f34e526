import type { Body } from "./body";

/**
 * Supported HTTP methods for requests
 */
export type HttpMethod =
  | "GET"
  | "POST"
  | "PATCH"
  | "PUT"
  | "DELETE"
  | "HEAD"
  | "OPTIONS"
  | "CONNECT"
  | "TRACE";

/**
 * Header map. Names are lower case.
 */
export type HeaderMap = Record<string, string>;

/**
 * A request as it travels through a client pipeline. Pipes may change it
 * until the transport engine sends it.
 */
export interface ClientRequest {
  method: HttpMethod;
  url: string;
  headers: HeaderMap;
  body: Body;
}

/**
 * Input for opening a call. Only the URL is required; the method
 * defaults to `GET` and the body to empty. Header names may use any case.
 */
export interface ClientRequestInit {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: Body;
}

export interface ClientResponse {
  status: number;
  statusText: string;
  headers: HeaderMap;
  body: Body;
}

/**
 * Configuration for retry behavior when a request fails.
 *
 * @example
 * ```typescript
 * // Retry on network errors and 5xx status codes
 * retry: {
 *   maxRetries: 3,
 *   retryDelay: 1000,
 *   exponentialBackoff: true,
 *   maxDelay: 10000,
 *   retryCondition: (error) => {
 *     const status = getErrorStatus(error);
 *     return isNetworkError(error) || (status !== undefined && status >= 500);
 *   }
 * }
 * ```
 */
export interface RetryConfig {
  /**
   * Maximum number of retry attempts. Defaults to 3.
   */
  maxRetries?: number;
  /**
   * Delay between retries in milliseconds, or a function of the retry
   * number and the error. Defaults to 1000ms.
   */
  retryDelay?: number | ((attempt: number, error: Error) => number);
  /**
   * When true, delays grow as `retryDelay * 2^(attempt - 1)`, capped at
   * `maxDelay` if provided. Defaults to false.
   */
  exponentialBackoff?: boolean;
  /**
   * Maximum delay in milliseconds when using exponential backoff.
   */
  maxDelay?: number;
  /**
   * Decides whether to retry. Defaults to retrying network errors only.
   *
   * @param error - The error that occurred
   * @param attempt - Number of retries already made, starting at 0
   */
  retryCondition?: (error: Error, attempt: number) => boolean;
}
