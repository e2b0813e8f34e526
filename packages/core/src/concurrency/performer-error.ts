/**
 * Raised when a {@link Performer} contract is broken: a missing or repeated
 * callback, or a block run more than once. It is a programming error and
 * is never retried.
 */
export class PerformerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PerformerError";
  }
}
