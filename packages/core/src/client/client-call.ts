import type { ClientRequest, ClientResponse } from "../models/request-params";

/**
 * The parameter threaded through a client pipeline: the request being
 * sent, and the response once a transport engine received one.
 */
export default class ClientCall {
  public response: ClientResponse | undefined;
  /** Name of the engine that served the call. */
  public engine: string | undefined;
  /** Free-form values pipes share during one call. */
  public readonly extras = new Map<string, unknown>();

  private readonly abortController = new AbortController();

  constructor(public readonly request: ClientRequest) {}

  /**
   * Aborted once the call was given up, e.g. on timeout. Work still in
   * flight for an aborted call must neither continue the chain nor write
   * to the call.
   */
  public get signal(): AbortSignal {
    return this.abortController.signal;
  }

  public abort(reason: Error): void {
    this.abortController.abort(reason);
  }

  /**
   * @throws {Error} If no response was received yet
   */
  public requireResponse(): ClientResponse {
    if (this.response === undefined) {
      throw new Error(`No response received for ${this.request.method} ${this.request.url}`);
    }
    return this.response;
  }
}
