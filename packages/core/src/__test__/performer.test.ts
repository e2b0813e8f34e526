import { describe, test } from "node:test";
import * as assert from "node:assert";
import Performer, { type PerformerCompletion } from "../concurrency/performer";
import SyncPerformer from "../concurrency/sync-performer";
import AsyncPerformer from "../concurrency/async-performer";
import { PerformerError } from "../concurrency/performer-error";

/** Runs the block before registering its callback. */
class EagerPerformer extends Performer {
  protected perform(
    block: () => void,
    callbackConsumer: (completion: PerformerCompletion) => void
  ): Promise<void> {
    block();
    callbackConsumer(() => {});
    return Promise.resolve();
  }
}

/** Runs the block twice. */
class RepeatingPerformer extends Performer {
  protected perform(
    block: () => void,
    callbackConsumer: (completion: PerformerCompletion) => void
  ): Promise<void> {
    callbackConsumer(() => {});
    block();
    block();
    return Promise.resolve();
  }
}

/** Registers two callbacks. */
class GreedyPerformer extends Performer {
  protected perform(
    _block: () => void,
    callbackConsumer: (completion: PerformerCompletion) => void
  ): Promise<void> {
    callbackConsumer(() => {});
    callbackConsumer(() => {});
    return Promise.resolve();
  }
}

describe("Performer contract", () => {
  for (const performer of [new SyncPerformer(), new AsyncPerformer()]) {
    test(`${performer.constructor.name} rejects a second callback invocation`, async () => {
      let secondCall: unknown;
      await performer.execute((callback) => {
        callback();
        try {
          callback();
        } catch (error) {
          secondCall = error;
        }
      });

      assert.ok(secondCall instanceof PerformerError);
      assert.strictEqual(secondCall.message, "Callback already invoked");
    });
  }

  test("running the block twice is a contract violation", () => {
    let runs = 0;
    assert.throws(
      () =>
        new RepeatingPerformer().execute((callback) => {
          runs++;
          callback();
        }),
      { name: "PerformerError", message: "Block already executed" }
    );
    assert.strictEqual(runs, 1);
  });

  test("running the block before providing a callback is a contract violation", () => {
    let runs = 0;
    assert.throws(
      () =>
        new EagerPerformer().execute((callback) => {
          runs++;
          callback();
        }),
      { name: "PerformerError", message: "Callback not provided" }
    );
    assert.strictEqual(runs, 0);
  });

  test("providing a second callback is a contract violation", () => {
    assert.throws(() => new GreedyPerformer().execute(() => {}), {
      name: "PerformerError",
      message: "Callback already provided",
    });
  });
});

describe("SyncPerformer", () => {
  test("completes when the callback fires on the calling stack", async () => {
    const order: string[] = [];
    const done = new SyncPerformer().execute((callback) => {
      order.push("block");
      callback();
    });
    order.push("returned");

    await done;
    assert.deepStrictEqual(order, ["block", "returned"]);
  });

  test("fails when the callback has not fired by the time the block returns", () => {
    assert.throws(() => new SyncPerformer().execute(() => {}), {
      name: "PerformerError",
      message: "Callback not invoked synchronously",
    });
  });

  test("surfaces errors thrown by the block synchronously", () => {
    assert.throws(
      () =>
        new SyncPerformer().execute(() => {
          throw new Error("block failed");
        }),
      { message: "block failed" }
    );
  });
});

describe("AsyncPerformer", () => {
  test("settles only once the callback fired", async () => {
    let fired = false;
    await new AsyncPerformer().execute((callback) => {
      setTimeout(() => {
        fired = true;
        callback();
      }, 5);
    });

    assert.strictEqual(fired, true);
  });

  test("rejects with an error thrown before the callback fired", async () => {
    const failure = new Error("block failed");
    await assert.rejects(
      new AsyncPerformer().execute(() => {
        throw failure;
      }),
      (error: unknown) => error === failure
    );
  });

  test("wraps thrown values that are not errors", async () => {
    await assert.rejects(
      new AsyncPerformer().execute(() => {
        throw "plain";
      }),
      { message: "plain" }
    );
  });
});
