import { PerformerError } from "./performer-error";
import { withFailureHandler } from "./failure-scope";

/**
 * Completion callback handed to a performer block.
 */
export type PerformerCallback = () => void;

/**
 * Work run by a performer. It must invoke `callback` exactly once,
 * synchronously or after asynchronous work completes.
 */
export type PerformerBlock = (callback: PerformerCallback) => void;

/**
 * Completion registered by a performer implementation. It receives the
 * error when the block failed from a later tick instead of completing.
 */
export type PerformerCompletion = (failure?: Error) => void;

/**
 * Runs a block and waits for its completion callback.
 *
 * Subclasses implement {@link Performer.perform}, which must register
 * exactly one completion callback through `callbackConsumer`, then run
 * `block` exactly once, and settle only after the callback fired.
 * {@link Performer.execute} enforces that contract and fails fast with a
 * {@link PerformerError} at the site of any violation.
 *
 * A continuation that throws after resuming from asynchronous work reaches
 * the performer through its failure handler (see `failure-scope`); the
 * registered completion then receives that error and the block counts as
 * finished.
 *
 * @example
 * ```typescript
 * await new AsyncPerformer().execute((callback) => {
 *   setTimeout(callback, 10);
 * });
 * ```
 */
export default abstract class Performer {
  /**
   * Implementation hook.
   *
   * @param block - Runs the user block; call it once, after registering the callback
   * @param callbackConsumer - Receives the completion callback of this performer
   * @returns A promise settled once the registered callback fired
   */
  protected abstract perform(
    block: () => void,
    callbackConsumer: (completion: PerformerCompletion) => void
  ): Promise<void>;

  /**
   * Runs `block` through this performer.
   *
   * @param block - The work to run; receives the completion callback
   * @returns A promise settled once the block invoked its callback
   * @throws {PerformerError} If the block invokes its callback twice, or the
   * performer runs the block twice or before providing a callback
   */
  public execute(block: PerformerBlock): Promise<void> {
    let completion: PerformerCompletion | undefined;
    let executed = false;
    let invoked = false;

    const guardedCallback: PerformerCallback = () => {
      if (invoked) {
        throw new PerformerError("Callback already invoked");
      }
      invoked = true;
      completion?.();
    };

    const fail = (error: Error): void => {
      if (invoked) {
        queueMicrotask(() => {
          throw error;
        });
        return;
      }
      invoked = true;
      completion?.(error);
    };

    const guardedBlock = (): void => {
      if (completion === undefined) {
        throw new PerformerError("Callback not provided");
      }
      if (executed) {
        throw new PerformerError("Block already executed");
      }
      executed = true;
      withFailureHandler(fail, () => block(guardedCallback));
    };

    const callbackConsumer = (provided: PerformerCompletion): void => {
      if (completion !== undefined) {
        throw new PerformerError("Callback already provided");
      }
      completion = provided;
    };

    return this.perform(guardedBlock, callbackConsumer);
  }
}
