import type { Middleware } from "../models/handlers";
import type { ClientRequest, ClientResponse } from "../models/request-params";
import type ClientPipeline from "../client/client-pipeline";

/**
 * Raised when a response status is not accepted.
 * Carries the response, so `getErrorStatus` finds its status.
 */
export class HttpStatusError extends Error {
  public readonly status: number;

  constructor(
    public readonly request: ClientRequest,
    public readonly response: ClientResponse
  ) {
    super(
      `Request ${request.method} ${request.url} failed with status ${response.status}`
    );
    this.name = "HttpStatusError";
    this.status = response.status;
  }
}

export interface StatusMiddlewareOptions {
  /** Decides which statuses pass. Defaults to 2xx and 3xx. */
  accept?: (status: number) => boolean;
}

const successful = (status: number): boolean => status >= 200 && status < 400;

/**
 * Aborts calls whose response status is not accepted with an
 * {@link HttpStatusError}.
 */
export function statusMiddleware(
  options: StatusMiddlewareOptions = {}
): Middleware<ClientPipeline> {
  const accept = options.accept ?? successful;
  return (pipeline) => {
    pipeline.receivedPipe((call, next) => {
      const response = call.requireResponse();
      if (accept(response.status)) {
        next();
        return;
      }
      next(new HttpStatusError(call.request, response));
    });
  };
}
