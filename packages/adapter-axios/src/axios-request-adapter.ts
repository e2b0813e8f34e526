import {
  EMPTY_BODY,
  RequestAdapter,
  normalizeHeaders,
  textBody,
} from "@relayline/core";
import type {
  ClientRequest,
  ClientResponse,
  UrlValidationOptions,
} from "@relayline/core";
import axios, { AxiosHeaders, type AxiosInstance, type AxiosResponse } from "axios";

export interface AxiosRequestAdapterOptions {
  /** Axios instance to send requests with. Defaults to the global `axios`. */
  instance?: AxiosInstance;
  /** URL validation options to prevent SSRF attacks. */
  urlValidation?: UrlValidationOptions;
}

/**
 * Transport engine using Axios as the underlying HTTP client.
 *
 * Axios keeps its interceptors and defaults, but the engine asks for the
 * raw text of the response and accepts every status: decoding and
 * status checks belong to the pipeline's middlewares.
 *
 * @example
 * ```typescript
 * const client = new Client({
 *   engine: new AxiosRequestAdapter({ instance: axios.create({ timeout: 5000 }) }),
 *   middlewares: [jsonMiddleware(), statusMiddleware()],
 * });
 * ```
 */
export default class AxiosRequestAdapter extends RequestAdapter<
  AxiosResponse<unknown>
> {
  public readonly name = "axios";

  private readonly instance: AxiosInstance;

  /**
   * @param options - Axios instance and URL validation options
   */
  constructor(options: AxiosRequestAdapterOptions = {}) {
    super(options.urlValidation);
    this.instance = options.instance ?? axios;
  }

  public createRequest(request: ClientRequest): Promise<AxiosResponse<unknown>> {
    return this.instance.request<unknown>({
      url: request.url,
      method: request.method,
      headers: AxiosHeaders.from(this.requestHeaders(request)),
      data: this.requestBody(request),
      responseType: "text",
      transformResponse: (data: unknown) => data,
      validateStatus: () => true,
    });
  }

  public async getResult(response: AxiosResponse<unknown>): Promise<ClientResponse> {
    const text = responseText(response.data);
    return {
      status: response.status,
      statusText: response.statusText,
      headers: responseHeaders(response),
      body: text === "" ? EMPTY_BODY : textBody(text),
    };
  }
}

function responseText(data: unknown): string {
  if (data === undefined || data === null) {
    return "";
  }
  return typeof data === "string" ? data : String(data);
}

function responseHeaders(response: AxiosResponse<unknown>): Record<string, string> {
  const entries: [string, unknown][] = Object.entries(response.headers);
  const headers: Record<string, string | string[]> = {};
  for (const [name, value] of entries) {
    if (typeof value === "string" || typeof value === "number") {
      headers[name] = String(value);
    } else if (Array.isArray(value)) {
      headers[name] = value.map(String);
    }
  }
  return normalizeHeaders(headers);
}
