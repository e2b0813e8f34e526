/**
 * Raised when a pipeline cursor is misused, e.g. executed twice.
 */
export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineError";
  }
}
