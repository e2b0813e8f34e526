import type { Interceptor, Pipe } from "../models/handlers";
import type { ClientRequest, RetryConfig } from "../models/request-params";
import type Performer from "../concurrency/performer";
import AsyncPerformer from "../concurrency/async-performer";
import Pipeline from "../pipeline/pipeline";
import {
  combineInterceptors,
  combinePipes,
  interceptorPipe,
  noopPipe,
} from "../pipeline/combinators";
import { retryPipe } from "../utils/retry-executor";
import { timeoutPipe } from "../utils/timeout";
import type ClientCall from "./client-call";
import type { ClientEngine } from "./request-adapter";

export interface ClientPipelineOptions {
  engine: ClientEngine;
  /** Performer used when none is passed to `execute` or `fetch`. */
  performer?: Performer;
  /** Retries the transport and the received-side pipes. */
  retry?: RetryConfig;
  /** Time limit in milliseconds for the transport and the received-side pipes, retries included. */
  timeout?: number;
}

/**
 * Pipeline over a single HTTP call.
 *
 * Pipes attached with `use`/`peek` run before the engine sends the
 * request; pipes attached with {@link ClientPipeline.received} and
 * {@link ClientPipeline.receivedPipe} run after the response arrived.
 */
export default class ClientPipeline extends Pipeline<ClientCall> {
  private responsePipe: Pipe<ClientCall> = noopPipe;
  private connectPipe: Pipe<ClientCall>;
  private readonly options: ClientPipelineOptions;

  constructor(call: ClientCall, options: ClientPipelineOptions) {
    super(call);
    this.options = options;
    const { engine } = options;
    this.connectPipe = (current, next) => {
      current.engine = engine.name;
      engine.connect(current, next);
    };
  }

  public get request(): ClientRequest {
    return this.parameter.request;
  }

  /**
   * Appends interceptors that run once the response arrived.
   */
  public received(...interceptors: Interceptor<ClientCall>[]): this {
    return this.receivedPipe(interceptorPipe(combineInterceptors(...interceptors)));
  }

  /**
   * Appends pipes that run once the response arrived.
   */
  public receivedPipe(...pipes: Pipe<ClientCall>[]): this {
    this.responsePipe = combinePipes(
      this.responsePipe === noopPipe ? null : this.responsePipe,
      ...pipes
    );
    return this;
  }

  /**
   * Replaces the step that hands the call to the engine with a function of
   * the current one. The replacement still runs inside retry and timeout,
   * before the received-side pipes.
   *
   * @param update - Receives the current connect step, returns its replacement
   * @returns The pipeline instance for method chaining
   */
  public updateConnect(update: (connect: Pipe<ClientCall>) => Pipe<ClientCall>): this {
    this.connectPipe = update(this.connectPipe);
    return this;
  }

  public execute(performer?: Performer): Promise<ClientCall> {
    return super.execute(performer ?? this.options.performer ?? new AsyncPerformer());
  }

  /**
   * Executes the call.
   *
   * @returns A promise resolving to the call once the tail ran, or
   * rejecting with the error that aborted the chain
   */
  public fetch(performer?: Performer): Promise<ClientCall> {
    let failure: Error | undefined;
    this.then((error) => {
      if (error && failure === undefined) {
        failure = error;
      }
    });
    return this.execute(performer).then((call) => {
      if (failure !== undefined) {
        throw failure;
      }
      return call;
    });
  }

  protected composePipe(): Pipe<ClientCall> {
    const { retry, timeout } = this.options;
    let transport = combinePipes(this.connectPipe, this.responsePipe);
    if (retry !== undefined) {
      transport = retryPipe(transport, retry, (call) => call.signal);
    }
    if (timeout !== undefined) {
      transport = timeoutPipe(transport, timeout, (call, error) => call.abort(error));
    }
    return combinePipes(this.pipe, transport);
  }
}
