/**
 * Utility functions for retry logic and error handling.
 */

const NETWORK_ERROR_NAMES = [
  "TypeError",
  "NetworkError",
  "TimeoutError",
  "AbortError",
  "FetchError",
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
];

const NETWORK_KEYWORDS = [
  "network",
  "connection",
  "timeout",
  "timed out",
  "failed to fetch",
  "socket hang up",
  "econnrefused",
  "econnreset",
  "enotfound",
  "etimedout",
];

function isValidStatus(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

/**
 * Attempts to extract an HTTP status code from an error.
 * Looks at `response.status` (axios, {@link HttpStatusError}), then
 * `status` (superagent), then `statusCode`.
 *
 * @param error - The error object
 * @returns The HTTP status code if available, undefined otherwise
 */
export function getErrorStatus(error: Error): number | undefined {
  const candidates = [
    readProperty(readProperty(error, "response"), "status"),
    readProperty(error, "status"),
    readProperty(error, "statusCode"),
  ];
  return candidates.find(isValidStatus);
}

/**
 * Checks if an error is a network error (connection failure, timeout, etc.).
 *
 * @param error - The error object
 * @returns True if the error appears to be a network error
 */
export function isNetworkError(error: Error): boolean {
  if (NETWORK_ERROR_NAMES.includes(error.name)) {
    return true;
  }
  const code = readProperty(error, "code");
  if (typeof code === "string" && NETWORK_ERROR_NAMES.includes(code)) {
    return true;
  }
  const message = error.message.toLowerCase();
  return NETWORK_KEYWORDS.some((keyword) => message.includes(keyword));
}

/**
 * Default retry condition: retries network errors only.
 */
export function defaultRetryCondition(error: Error): boolean {
  return isNetworkError(error);
}

/**
 * Creates a retry condition that retries on specific HTTP status codes.
 *
 * @param statusCodes - HTTP status codes to retry on
 * @returns A retry condition function
 *
 * @example
 * ```typescript
 * new Client({
 *   engine,
 *   middlewares: [statusMiddleware()],
 *   retry: { retryCondition: retryOnStatusCodes(502, 503, 504, 429) },
 * });
 * ```
 */
export function retryOnStatusCodes(
  ...statusCodes: number[]
): (error: Error) => boolean {
  return (error) => {
    const status = getErrorStatus(error);
    return status !== undefined && statusCodes.includes(status);
  };
}

/**
 * Creates a retry condition that retries network errors OR specific status codes.
 *
 * @param statusCodes - HTTP status codes to retry on
 * @returns A retry condition function
 */
export function retryOnNetworkOrStatusCodes(
  ...statusCodes: number[]
): (error: Error) => boolean {
  const onStatus = retryOnStatusCodes(...statusCodes);
  return (error) => isNetworkError(error) || onStatus(error);
}
