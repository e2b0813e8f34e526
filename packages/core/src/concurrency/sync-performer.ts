import Performer, { type PerformerCompletion } from "./performer";
import { PerformerError } from "./performer-error";

/**
 * Performer for blocks that complete on the calling stack.
 *
 * The block runs to completion and its callback must have fired by the
 * time it returns. Errors thrown by the block surface synchronously from
 * {@link Performer.execute}; the returned promise is already resolved.
 */
export default class SyncPerformer extends Performer {
  protected perform(
    block: () => void,
    callbackConsumer: (completion: PerformerCompletion) => void
  ): Promise<void> {
    let done = false;
    let failed: Error | undefined;
    callbackConsumer((failure) => {
      done = true;
      failed = failure;
    });
    block();
    if (!done) {
      throw new PerformerError("Callback not invoked synchronously");
    }
    if (failed !== undefined) {
      throw failed;
    }
    return Promise.resolve();
  }
}
