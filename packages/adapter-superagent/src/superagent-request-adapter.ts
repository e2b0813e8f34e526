import { STATUS_CODES } from "node:http";
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
import superagent from "superagent";

/**
 * The part of a superagent response the engine reads.
 */
export interface SuperagentResponseLike {
  status: number;
  text?: string;
  header: Record<string, string | string[] | undefined>;
}

/**
 * The part of a superagent request the engine drives.
 */
export interface SuperagentRequestLike extends PromiseLike<SuperagentResponseLike> {
  set(headers: Record<string, string>): this;
  send(body: string): this;
  ok(callback: (response: SuperagentResponseLike) => boolean): this;
}

export type SuperagentRequestFactory = (
  method: string,
  url: string
) => SuperagentRequestLike;

export interface SuperagentRequestAdapterOptions {
  /** Creates requests. Defaults to `superagent(method, url)`. */
  request?: SuperagentRequestFactory;
  /** URL validation options to prevent SSRF attacks. */
  urlValidation?: UrlValidationOptions;
}

const defaultRequest: SuperagentRequestFactory = (method, url) =>
  superagent(method, url);

/**
 * Transport engine using Superagent as the underlying HTTP client.
 * Every status resolves; rejecting error statuses is left to
 * `statusMiddleware`.
 *
 * @example
 * ```typescript
 * const client = new Client({ engine: new SuperagentRequestAdapter() });
 * const call = await client.fetch({ url: "https://api.example.com/users" });
 * ```
 */
export default class SuperagentRequestAdapter extends RequestAdapter<SuperagentResponseLike> {
  public readonly name = "superagent";

  private readonly requestFactory: SuperagentRequestFactory;

  /**
   * @param options - Request factory and URL validation options
   */
  constructor(options: SuperagentRequestAdapterOptions = {}) {
    super(options.urlValidation);
    this.requestFactory = options.request ?? defaultRequest;
  }

  public createRequest(request: ClientRequest): Promise<SuperagentResponseLike> {
    const pending = this.requestFactory(request.method, request.url)
      .set(this.requestHeaders(request))
      .ok(() => true);
    const body = this.requestBody(request);
    return Promise.resolve(body === undefined ? pending : pending.send(body));
  }

  public async getResult(response: SuperagentResponseLike): Promise<ClientResponse> {
    const text = response.text ?? "";
    return {
      status: response.status,
      statusText: STATUS_CODES[response.status] ?? "",
      headers: normalizeHeaders(response.header),
      body: text === "" ? EMPTY_BODY : textBody(text),
    };
  }
}
