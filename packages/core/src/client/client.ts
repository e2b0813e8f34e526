import type { Middleware } from "../models/handlers";
import type {
  ClientRequest,
  ClientRequestInit,
  RetryConfig,
} from "../models/request-params";
import { EMPTY_BODY } from "../models/body";
import type Performer from "../concurrency/performer";
import { combineMiddlewares } from "../pipeline/combinators";
import { normalizeHeaders } from "../utils/headers";
import { createLogger, type Logger } from "../utils/logger";
import ClientCall from "./client-call";
import ClientPipeline from "./client-pipeline";
import type { ClientEngine } from "./request-adapter";

export interface ClientOptions {
  /** Transport that sends the requests. */
  engine: ClientEngine;
  /** Performer used to execute calls. Defaults to an `AsyncPerformer`. */
  performer?: Performer;
  /** Headers added to every request unless the request sets them. */
  headers?: Record<string, string>;
  /** Injected into every call, in order. */
  middlewares?: Middleware<ClientPipeline>[];
  logger?: Logger;
  retry?: RetryConfig;
  /** Time limit in milliseconds for each call's transport. */
  timeout?: number;
}

/**
 * Opens calls against one transport engine with shared defaults.
 *
 * @example
 * ```typescript
 * const client = new Client({
 *   engine: new FetchRequestAdapter(),
 *   middlewares: [jsonMiddleware(), statusMiddleware()],
 * });
 *
 * const call = await client.fetch({ url: "https://api.example.com/users/1" });
 * console.log(call.response?.body);
 * ```
 */
export default class Client {
  private readonly options: ClientOptions;
  private readonly logger: Logger;
  private readonly middleware: Middleware<ClientPipeline>;

  constructor(options: ClientOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger("client");
    this.middleware = combineMiddlewares(...(options.middlewares ?? []));
  }

  /**
   * Creates a configured pipeline for one call. Attach further pipes to it
   * and run it with `fetch()` or `execute()`.
   */
  public open(init: ClientRequestInit): ClientPipeline {
    const request: ClientRequest = {
      method: init.method ?? "GET",
      url: init.url,
      headers: {
        ...normalizeHeaders(this.options.headers),
        ...normalizeHeaders(init.headers),
      },
      body: init.body ?? EMPTY_BODY,
    };
    this.logger.debug("opening call", {
      method: request.method,
      url: request.url,
      engine: this.options.engine.name,
    });

    const pipeline = new ClientPipeline(new ClientCall(request), {
      engine: this.options.engine,
      performer: this.options.performer,
      retry: this.options.retry,
      timeout: this.options.timeout,
    });
    return pipeline.inject(this.middleware);
  }

  /**
   * Opens a call and executes it.
   *
   * @returns The completed call; rejects with the error that aborted it
   */
  public fetch(init: ClientRequestInit): Promise<ClientCall> {
    return this.open(init).fetch();
  }
}

/**
 * Opens a call with a one-off client.
 */
export function open(init: ClientRequestInit, options: ClientOptions): ClientPipeline {
  return new Client(options).open(init);
}

/**
 * Opens and executes a call with a one-off client.
 */
export function fetch(init: ClientRequestInit, options: ClientOptions): Promise<ClientCall> {
  return new Client(options).fetch(init);
}
