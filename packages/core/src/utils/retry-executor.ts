import type { Pipe } from "../models/handlers";
import type { RetryConfig } from "../models/request-params";
import { onceNext } from "../pipeline/combinators";
import { defaultRetryCondition } from "./retry-utils";
import { toError } from "./errors";

/**
 * Calculates the delay before the next retry attempt.
 *
 * @param attempt - The retry number, starting at 1
 * @param error - The error that occurred
 * @param retryConfig - The retry configuration
 * @returns The delay in milliseconds, never negative
 */
export function calculateRetryDelay(
  attempt: number,
  error: Error,
  retryConfig: RetryConfig
): number {
  const baseDelay = retryConfig.retryDelay ?? 1000;

  let delay: number;
  if (typeof baseDelay === "function") {
    delay = baseDelay(attempt, error);
  } else if (retryConfig.exponentialBackoff) {
    delay = baseDelay * Math.pow(2, attempt - 1);
    if (retryConfig.maxDelay !== undefined) {
      delay = Math.min(delay, retryConfig.maxDelay);
    }
  } else {
    delay = baseDelay;
  }

  return Math.max(0, delay);
}

/**
 * Wraps a pipe so that it runs again when it aborts with an error the
 * retry condition accepts. Only the last error reaches `next`.
 *
 * Each attempt gets its own guarded continuation, so a late second call
 * from an abandoned attempt is dropped. An attempt started from a timer
 * has no caller to throw to; its throws abort the chain instead.
 *
 * Once `signal` aborts, pending retries are dropped and no further
 * attempt starts.
 *
 * @template T - The type of the pipeline parameter
 * @param pipe - The pipe to retry
 * @param retryConfig - The retry configuration
 * @param signal - Reads the cancellation signal of a parameter
 * @returns The retrying pipe
 *
 * @example
 * ```typescript
 * pipeline.use(retryPipe(engine.connect, { maxRetries: 2, retryDelay: 250 }));
 * ```
 */
export function retryPipe<T>(
  pipe: Pipe<T>,
  retryConfig: RetryConfig,
  signal?: (parameter: T) => AbortSignal
): Pipe<T> {
  const maxRetries = retryConfig.maxRetries ?? 3;
  const retryCondition = retryConfig.retryCondition ?? defaultRetryCondition;

  return (parameter, next) => {
    const cancelled = signal?.(parameter);
    const attempt = (retry: number): void => {
      if (cancelled?.aborted) {
        return;
      }
      pipe(
        parameter,
        onceNext((error) => {
          if (!error) {
            next();
            return;
          }
          if (retry >= maxRetries || !retryCondition(error, retry)) {
            next(error);
            return;
          }
          const delay = calculateRetryDelay(retry + 1, error, retryConfig);
          if (delay === 0) {
            attempt(retry + 1);
            return;
          }
          const timer = setTimeout(() => {
            cancelled?.removeEventListener("abort", stop);
            try {
              attempt(retry + 1);
            } catch (thrown) {
              next(toError(thrown));
            }
          }, delay);
          const stop = (): void => clearTimeout(timer);
          cancelled?.addEventListener("abort", stop, { once: true });
        })
      );
    };
    attempt(0);
  };
}
