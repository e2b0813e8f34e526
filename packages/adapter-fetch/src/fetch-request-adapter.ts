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

/**
 * Signature of the Fetch API function the adapter calls.
 */
export type FetchFunction = (
  input: string,
  init?: RequestInit
) => Promise<Response>;

export interface FetchRequestAdapterOptions {
  /** Fetch implementation to use. Defaults to the global `fetch`. */
  fetch?: FetchFunction;
  /** URL validation options to prevent SSRF attacks. */
  urlValidation?: UrlValidationOptions;
}

/**
 * Transport engine using the Fetch API.
 * Provides a lightweight, dependency-free HTTP engine.
 *
 * @example
 * ```typescript
 * const client = new Client({ engine: new FetchRequestAdapter() });
 * const call = await client.fetch({ url: "https://api.example.com/users" });
 * ```
 */
export default class FetchRequestAdapter extends RequestAdapter<Response> {
  public readonly name = "fetch";

  private readonly fetchFunction: FetchFunction;

  /**
   * @param options - Fetch implementation and URL validation options
   */
  constructor(options: FetchRequestAdapterOptions = {}) {
    super(options.urlValidation);
    this.fetchFunction = options.fetch ?? ((input, init) => fetch(input, init));
  }

  public createRequest(request: ClientRequest): Promise<Response> {
    return this.fetchFunction(request.url, {
      method: request.method,
      headers: this.requestHeaders(request),
      body: this.requestBody(request),
    });
  }

  public async getResult(response: Response): Promise<ClientResponse> {
    const text = await response.text();
    return {
      status: response.status,
      statusText: response.statusText,
      headers: normalizeHeaders(response.headers),
      body: text === "" ? EMPTY_BODY : textBody(text),
    };
  }
}
