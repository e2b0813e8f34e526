import type {
  Catcher,
  Interceptor,
  Middleware,
  Next,
  Pipe,
} from "../models/handlers";
import { toError } from "../utils/errors";
import {
  currentFailureHandler,
  withFailureHandler,
} from "../concurrency/failure-scope";

type Maybe<T> = T | null | undefined;

function present<T>(value: Maybe<T>): value is T {
  return value !== null && value !== undefined;
}

/**
 * A pipe that immediately continues the chain.
 */
export function noopPipe<T>(_parameter: T, next: Next): void {
  next();
}

/**
 * A continuation that does nothing.
 */
export function noopNext(_error?: Error | null): void {}

/**
 * Combines continuations into one that invokes each of them, in order,
 * with the same error. Nullish entries are skipped. A throwing entry
 * aborts the remaining ones and the throw propagates.
 *
 * @param nexts - The continuations to combine
 * @returns The combined continuation
 */
export function combineNexts(...nexts: Maybe<Next>[]): Next {
  const targets = nexts.filter(present);
  if (targets.length === 1) {
    return targets[0];
  }
  return (error) => {
    for (const next of targets) {
      next(error);
    }
  };
}

/**
 * Combines pipes into one continuation chain. Each pipe receives a
 * synthetic `next` that starts the following pipe; the last one continues
 * with the outer `next`. An error passed to any synthetic `next` goes
 * straight to the outer `next` and the remaining pipes are skipped.
 *
 * Throws from a pipe are not caught here.
 *
 * @template T - The type of the pipeline parameter
 * @param pipes - The pipes to combine, in execution order
 * @returns The combined pipe
 */
export function combinePipes<T>(...pipes: Maybe<Pipe<T>>[]): Pipe<T> {
  const chain = pipes.filter(present);
  if (chain.length === 0) {
    return noopPipe;
  }
  if (chain.length === 1) {
    return chain[0];
  }
  return (parameter, next) => {
    const step = (index: number): void => {
      if (index === chain.length) {
        next();
        return;
      }
      chain[index](parameter, (error) => {
        if (error) {
          next(error);
          return;
        }
        step(index + 1);
      });
    };
    step(0);
  };
}

/**
 * Combines interceptors into one that runs each of them back to back.
 * A throw aborts the remaining interceptors and propagates.
 *
 * @template T - The type of the pipeline parameter
 * @param interceptors - The interceptors to combine
 * @returns The combined interceptor
 */
export function combineInterceptors<T>(
  ...interceptors: Maybe<Interceptor<T>>[]
): Interceptor<T> {
  const targets = interceptors.filter(present);
  return (parameter) => {
    for (const interceptor of targets) {
      interceptor(parameter);
    }
  };
}

/**
 * Combines middlewares into one that injects each of them in order.
 *
 * @template Target - The type of the configured target
 * @param middlewares - The middlewares to combine
 * @returns The combined middleware
 */
export function combineMiddlewares<Target>(
  ...middlewares: Maybe<Middleware<Target>>[]
): Middleware<Target> {
  const targets = middlewares.filter(present);
  return (target) => {
    for (const middleware of targets) {
      middleware(target);
    }
  };
}

/**
 * Lowers an interceptor into a pipe. The pipe calls `next()` once the
 * interceptor returns. A throw propagates and is not passed to `next`.
 *
 * @template T - The type of the pipeline parameter
 * @param interceptor - The interceptor to lower
 * @returns A pipe running the interceptor
 */
export function interceptorPipe<T>(interceptor: Interceptor<T>): Pipe<T> {
  return (parameter, next) => {
    interceptor(parameter);
    next();
  };
}

/**
 * Lowers a catcher into a continuation that ignores successful completion.
 *
 * @param catcher - The catcher to lower
 * @returns A continuation invoking the catcher on errors only
 */
export function catcherNext(catcher: Catcher): Next {
  return (error) => {
    if (error) {
      catcher(error);
    }
  };
}

/**
 * Lowers an async function into a pipe. Resolution continues the chain,
 * rejection aborts it with the rejection reason.
 *
 * The continuation runs in a later tick. If it throws, the throw is not
 * turned into `next(error)`: it goes to the failure handler of the
 * performer that started the chain, or is rethrown when there is none.
 *
 * @template T - The type of the pipeline parameter
 * @param task - The async work to run for the parameter
 * @returns A pipe awaiting the task
 */
export function asyncPipe<T>(task: (parameter: T) => Promise<void>): Pipe<T> {
  return (parameter, next) => {
    const fail = currentFailureHandler();
    task(parameter)
      .then(
        () => withFailureHandler(fail, () => next()),
        (reason: unknown) => withFailureHandler(fail, () => next(toError(reason)))
      )
      .catch((thrown: unknown) => {
        const error = toError(thrown);
        if (fail === undefined) {
          queueMicrotask(() => {
            throw error;
          });
          return;
        }
        fail(error);
      });
  };
}

/**
 * Guards a continuation so that only its first invocation goes through.
 * Later invocations are dropped.
 *
 * @param next - The continuation to guard
 * @returns The guarded continuation
 */
export function onceNext(next: Next): Next {
  let called = false;
  return (error) => {
    if (called) {
      return;
    }
    called = true;
    next(error);
  };
}
