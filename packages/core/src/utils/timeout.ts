import type { Pipe } from "../models/handlers";
import { onceNext } from "../pipeline/combinators";

/**
 * Raised when a pipe did not continue within its time limit.
 */
export class TimeoutError extends Error {
  constructor(public readonly timeout: number) {
    super(`Timed out after ${timeout}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Races a pipe against a timer. Whichever finishes first continues the
 * chain; the other one is ignored. On timeout `onTimeout` runs first, so
 * the caller can cancel the work, then the chain aborts with a
 * {@link TimeoutError}.
 *
 * @template T - The type of the pipeline parameter
 * @param pipe - The pipe to limit
 * @param timeout - Time limit in milliseconds
 * @param onTimeout - Cancels the work of the timed-out pipe
 * @returns The time-limited pipe
 */
export function timeoutPipe<T>(
  pipe: Pipe<T>,
  timeout: number,
  onTimeout?: (parameter: T, error: TimeoutError) => void
): Pipe<T> {
  return (parameter, next) => {
    const done = onceNext(next);
    const timer = setTimeout(() => {
      const error = new TimeoutError(timeout);
      onTimeout?.(parameter, error);
      done(error);
    }, timeout);
    try {
      pipe(parameter, (error) => {
        clearTimeout(timer);
        done(error);
      });
    } catch (error) {
      clearTimeout(timer);
      throw error;
    }
  };
}
