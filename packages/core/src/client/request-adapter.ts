import type { Next } from "../models/handlers";
import type { ClientRequest, ClientResponse } from "../models/request-params";
import { bodyText } from "../models/body";
import { asyncPipe } from "../pipeline/combinators";
import { validateUrl, type UrlValidationOptions } from "../utils/url-validator";
import type ClientCall from "./client-call";

/**
 * The seam where a transport plugs into a client pipeline.
 * `connect` sends `call.request`, assigns `call.response` and continues,
 * or aborts the chain with the transport error.
 */
export interface ClientEngine {
  readonly name: string;
  connect(call: ClientCall, next: Next): void;
}

/**
 * Base class for engines backed by an HTTP library.
 *
 * Subclasses implement {@link RequestAdapter.createRequest} (the library
 * call) and {@link RequestAdapter.getResult} (library result to
 * {@link ClientResponse}). URLs are validated against SSRF before any
 * request is created.
 *
 * @template ExecutionResult - The type of result returned by the library
 */
export default abstract class RequestAdapter<ExecutionResult>
  implements ClientEngine
{
  public abstract readonly name: string;

  protected urlValidationOptions: UrlValidationOptions;

  constructor(urlValidationOptions: UrlValidationOptions = {}) {
    this.urlValidationOptions = urlValidationOptions;
  }

  /**
   * Sends the request with the underlying library.
   */
  public abstract createRequest(request: ClientRequest): Promise<ExecutionResult>;

  /**
   * Converts the library result into a response. Header names must be
   * lower case and an empty payload must become an empty body.
   */
  public abstract getResult(result: ExecutionResult): Promise<ClientResponse>;

  /**
   * Validates the URL, then sends the request.
   *
   * @throws {SSRFError} If the URL is rejected
   */
  public executeRequest(request: ClientRequest): Promise<ExecutionResult> {
    validateUrl(request.url, this.urlValidationOptions);
    return this.createRequest(request);
  }

  /**
   * Sends the call's request and assigns the response. A call aborted
   * while the request was in flight is left untouched and not continued.
   */
  public connect(call: ClientCall, next: Next): void {
    if (call.signal.aborted) {
      return;
    }
    this.connectPipe(call, (error) => {
      if (!call.signal.aborted) {
        next(error);
      }
    });
  }

  private readonly connectPipe = asyncPipe<ClientCall>(async (call) => {
    const result = await this.executeRequest(call.request);
    const response = await this.getResult(result);
    if (!call.signal.aborted) {
      call.response = response;
    }
  });

  /**
   * Headers to send: the request headers, plus a JSON content type for
   * JSON bodies that have none.
   */
  protected requestHeaders(request: ClientRequest): Record<string, string> {
    if (request.body.type !== "json" || "content-type" in request.headers) {
      return { ...request.headers };
    }
    return { ...request.headers, "content-type": "application/json" };
  }

  /**
   * @returns The serialized body, `undefined` when there is none
   */
  protected requestBody(request: ClientRequest): string | undefined {
    return bodyText(request.body);
  }
}
