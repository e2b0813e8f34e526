import type {
  Catcher,
  Interceptor,
  Middleware,
  Next,
  Pipe,
} from "../models/handlers";
import type Performer from "../concurrency/performer";
import AsyncPerformer from "../concurrency/async-performer";
import {
  catcherNext,
  combineInterceptors,
  combineNexts,
  combinePipes,
  interceptorPipe,
  noopNext,
  noopPipe,
} from "./combinators";
import { PipelineError } from "./pipeline-error";

/**
 * A mutable cursor over one pipe chain and one tail continuation, bound to
 * the parameter threaded through them.
 *
 * Configure it with {@link Pipeline.use}, {@link Pipeline.peek},
 * {@link Pipeline.then} and {@link Pipeline.inject}, then run it once with
 * {@link Pipeline.execute}. Pipes run in the order they were attached; the
 * tail continuation runs once, after the chain completed or aborted.
 *
 * Configuration is single-writer and must be done before execution.
 *
 * @template T - The type of the parameter threaded through the pipeline
 *
 * @example
 * ```typescript
 * const pipeline = new Pipeline({ visited: [] as string[] })
 *   .peek((p) => p.visited.push("a"))
 *   .use((p, next) => setTimeout(() => next(), 10))
 *   .catcher((error) => console.error(error));
 *
 * const result = await pipeline.execute();
 * ```
 */
export default class Pipeline<T> {
  protected pipe: Pipe<T> = noopPipe;
  protected next: Next = noopNext;
  private executed = false;

  /**
   * @param parameter - The parameter passed to every pipe
   */
  constructor(public readonly parameter: T) {}

  /**
   * @returns The current pipe chain
   */
  public getPipe(): Pipe<T> {
    return this.pipe;
  }

  /**
   * @returns The current tail continuation
   */
  public getNext(): Next {
    return this.next;
  }

  /**
   * Appends pipes to the pipe chain.
   *
   * @param pipes - The pipes to append, in execution order
   * @returns The pipeline instance for method chaining
   */
  public use(...pipes: Pipe<T>[]): this {
    return this.updatePipe((pipe) =>
      combinePipes(pipe === noopPipe ? null : pipe, ...pipes)
    );
  }

  /**
   * Appends an interceptor to the pipe chain.
   *
   * @param interceptor - The interceptor to append
   * @returns The pipeline instance for method chaining
   */
  public peek(interceptor: Interceptor<T>): this {
    return this.use(interceptorPipe(interceptor));
  }

  /**
   * Appends interceptors to the pipe chain as a single link.
   *
   * @param interceptors - The interceptors to append, run back to back
   * @returns The pipeline instance for method chaining
   */
  public intercept(...interceptors: Interceptor<T>[]): this {
    return this.peek(combineInterceptors(...interceptors));
  }

  /**
   * Appends continuations to the tail.
   *
   * @param nexts - The continuations to append
   * @returns The pipeline instance for method chaining
   */
  public then(...nexts: Next[]): this {
    return this.updateNext((next) =>
      combineNexts(next === noopNext ? null : next, ...nexts)
    );
  }

  /**
   * Appends an error handler to the tail.
   *
   * @param catcher - Invoked with the error that aborted the chain
   * @returns The pipeline instance for method chaining
   */
  public catcher(catcher: Catcher): this {
    return this.then(catcherNext(catcher));
  }

  /**
   * Lets a middleware configure this pipeline. Runs synchronously.
   * Injecting the same middleware twice registers its pipes twice.
   *
   * @param middleware - The middleware to inject
   * @returns The pipeline instance for method chaining
   */
  public inject(middleware: Middleware<this>): this {
    middleware(this);
    return this;
  }

  public setPipe(pipe: Pipe<T>): this {
    this.pipe = pipe;
    return this;
  }

  public setNext(next: Next): this {
    this.next = next;
    return this;
  }

  /**
   * Replaces the pipe chain with a function of the current one.
   *
   * @param update - Receives the current pipe, returns its replacement
   * @returns The pipeline instance for method chaining
   */
  public updatePipe(update: (pipe: Pipe<T>) => Pipe<T>): this {
    return this.setPipe(update(this.pipe));
  }

  /**
   * Replaces the tail continuation with a function of the current one.
   *
   * @param update - Receives the current continuation, returns its replacement
   * @returns The pipeline instance for method chaining
   */
  public updateNext(update: (next: Next) => Next): this {
    return this.setNext(update(this.next));
  }

  /**
   * Runs the configured chain once through a performer.
   *
   * @param performer - Drives the execution; defaults to an {@link AsyncPerformer}
   * @returns A promise resolving to the parameter once the tail ran
   * @throws {PipelineError} If the pipeline was already executed
   */
  public execute(performer: Performer = new AsyncPerformer()): Promise<T> {
    if (this.executed) {
      throw new PipelineError("Pipeline already executed");
    }
    this.executed = true;

    const pipe = this.composePipe();
    const next = this.next;
    return performer
      .execute((callback) => {
        pipe(this.parameter, (error) => {
          try {
            next(error);
          } finally {
            callback();
          }
        });
      })
      .then(() => this.parameter);
  }

  /**
   * Builds the pipe that {@link Pipeline.execute} runs. Subclasses extend
   * the chain here with links that must run after user pipes.
   *
   * @returns The pipe to execute
   */
  protected composePipe(): Pipe<T> {
    return this.pipe;
  }
}
