/**
 * Continuation callback threaded through a pipeline.
 * Calling it without an error (or with `null`) continues the chain,
 * calling it with an error aborts forward progress and routes the
 * error to the registered tail handlers.
 *
 * @param error - The error that aborted the chain, if any
 */
export interface Next {
  (error?: Error | null): void;
}

/**
 * A chain link. Does its work and then decides whether and when to call
 * `next`. It may call `next` later, after asynchronous work completes.
 *
 * @template T - The type of the parameter threaded through the pipeline
 * @param parameter - The pipeline parameter
 * @param next - The continuation of the chain
 */
export interface Pipe<T> {
  (parameter: T, next: Next): void;
}

/**
 * A side-effecting chain link that cannot abort the chain.
 * It is lowered into a {@link Pipe} that always continues after it returns.
 *
 * @template T - The type of the parameter threaded through the pipeline
 * @param parameter - The pipeline parameter
 */
export interface Interceptor<T> {
  (parameter: T): void;
}

/**
 * Handler for errors that aborted a pipeline.
 * It is lowered into a {@link Next} that ignores successful completion.
 *
 * @param error - The error that aborted the chain
 */
export interface Catcher {
  (error: Error): void;
}

/**
 * Configuration-time attacher. Receives a pipeline-capable target and
 * registers pipes, interceptors or catchers on it.
 *
 * @template Target - The type of the target being configured
 * @param target - The target to configure
 */
export interface Middleware<Target> {
  (target: Target): void;
}

