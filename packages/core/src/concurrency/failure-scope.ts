/**
 * Receives an exception thrown by a continuation that resumed outside the
 * performer's stack, e.g. after a transport promise settled.
 */
export type FailureHandler = (error: Error) => void;

let current: FailureHandler | undefined;

/**
 * Runs `task` with `handler` as the current failure handler and restores
 * the previous one afterwards.
 *
 * @param handler - The handler visible to code running inside `task`
 * @param task - The work to run
 * @returns What `task` returned
 */
export function withFailureHandler<R>(
  handler: FailureHandler | undefined,
  task: () => R
): R {
  const previous = current;
  current = handler;
  try {
    return task();
  } finally {
    current = previous;
  }
}

/**
 * @returns The failure handler of the performer running the current stack,
 * if any. Capture it synchronously, before scheduling asynchronous work.
 */
export function currentFailureHandler(): FailureHandler | undefined {
  return current;
}
