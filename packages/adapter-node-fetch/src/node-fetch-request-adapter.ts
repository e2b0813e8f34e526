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
import fetch from "node-fetch";
import type { RequestInit, Response } from "node-fetch";

/**
 * Signature of the node-fetch function the adapter calls.
 */
export type NodeFetchFunction = (
  url: string,
  init?: RequestInit
) => Promise<Response>;

export interface NodeFetchRequestAdapterOptions {
  /** node-fetch compatible function to use. Defaults to `node-fetch` itself. */
  fetch?: NodeFetchFunction;
  /** URL validation options to prevent SSRF attacks. */
  urlValidation?: UrlValidationOptions;
}

/**
 * Transport engine using node-fetch.
 * Works in Node.js versions and environments without a global `fetch`.
 *
 * @example
 * ```typescript
 * const client = new Client({ engine: new NodeFetchRequestAdapter() });
 * const call = await client.fetch({ url: "https://api.example.com/users" });
 * ```
 */
export default class NodeFetchRequestAdapter extends RequestAdapter<Response> {
  public readonly name = "node-fetch";

  private readonly fetchFunction: NodeFetchFunction;

  /**
   * @param options - Fetch implementation and URL validation options
   */
  constructor(options: NodeFetchRequestAdapterOptions = {}) {
    super(options.urlValidation);
    this.fetchFunction = options.fetch ?? fetch;
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
