import Performer, { type PerformerCompletion } from "./performer";
import { toError } from "../utils/errors";

/**
 * Performer that suspends the caller on a promise until the block's
 * callback fires, so the block may complete from any later tick.
 *
 * A throw from the block before the callback fired rejects the promise,
 * and so does a throw from a continuation that resumed in a later tick.
 * A throw after the callback fired cannot reject anymore and is rethrown
 * on the microtask queue.
 */
export default class AsyncPerformer extends Performer {
  protected perform(
    block: () => void,
    callbackConsumer: (completion: PerformerCompletion) => void
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      callbackConsumer((failure) => {
        settled = true;
        if (failure) {
          reject(failure);
          return;
        }
        resolve();
      });
      try {
        block();
      } catch (error) {
        if (settled) {
          queueMicrotask(() => {
            throw error;
          });
          return;
        }
        settled = true;
        reject(toError(error));
      }
    });
  }
}
