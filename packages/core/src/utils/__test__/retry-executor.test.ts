import { describe, test } from "node:test";
import * as assert from "node:assert";
import { calculateRetryDelay, retryPipe } from "../retry-executor";
import type { Next, Pipe } from "../../models/handlers";

type Outcome = Error | null | undefined;

/** A pipe failing with `errors` in turn, then succeeding. */
function flakyPipe(errors: Error[]): { pipe: Pipe<string[]>; attempts: () => number } {
  let attempts = 0;
  const pipe: Pipe<string[]> = (log, next) => {
    const error = errors[attempts++];
    log.push(error ? `failed: ${error.message}` : "ok");
    next(error ?? null);
  };
  return { pipe, attempts: () => attempts };
}

function runPipe(pipe: Pipe<string[]>, log: string[] = []): Promise<Outcome[]> {
  return new Promise((resolve) => {
    const outcomes: Outcome[] = [];
    const next: Next = (error) => {
      outcomes.push(error);
      resolve(outcomes);
    };
    pipe(log, next);
  });
}

const network = (message: string): Error => new TypeError(message);

describe("calculateRetryDelay", () => {
  const error = new Error("failed");

  test("defaults to one second", () => {
    assert.strictEqual(calculateRetryDelay(1, error, {}), 1000);
    assert.strictEqual(calculateRetryDelay(4, error, {}), 1000);
  });

  test("grows exponentially up to maxDelay", () => {
    const config = { retryDelay: 100, exponentialBackoff: true, maxDelay: 250 };
    assert.strictEqual(calculateRetryDelay(1, error, config), 100);
    assert.strictEqual(calculateRetryDelay(2, error, config), 200);
    assert.strictEqual(calculateRetryDelay(3, error, config), 250);
  });

  test("grows without a cap when maxDelay is not set", () => {
    const config = { retryDelay: 100, exponentialBackoff: true };
    assert.strictEqual(calculateRetryDelay(4, error, config), 800);
  });

  test("asks a delay function", () => {
    const seen: [number, Error][] = [];
    const delay = calculateRetryDelay(3, error, {
      retryDelay: (attempt, cause) => {
        seen.push([attempt, cause]);
        return attempt * 10;
      },
    });

    assert.strictEqual(delay, 30);
    assert.deepStrictEqual(seen, [[3, error]]);
  });

  test("never returns a negative delay", () => {
    assert.strictEqual(calculateRetryDelay(1, error, { retryDelay: () => -5 }), 0);
  });
});

describe("retryPipe", () => {
  test("runs the pipe again until it succeeds", async () => {
    const { pipe, attempts } = flakyPipe([network("first"), network("second")]);
    const log: string[] = [];

    const outcomes = await runPipe(retryPipe(pipe, { retryDelay: 0 }), log);

    assert.deepStrictEqual(outcomes, [undefined]);
    assert.strictEqual(attempts(), 3);
    assert.deepStrictEqual(log, ["failed: first", "failed: second", "ok"]);
  });

  test("hands the last error on after maxRetries", async () => {
    const last = network("third");
    const { pipe, attempts } = flakyPipe([network("first"), network("second"), last]);

    const outcomes = await runPipe(retryPipe(pipe, { maxRetries: 2, retryDelay: 0 }));

    assert.strictEqual(attempts(), 3);
    assert.strictEqual(outcomes.length, 1);
    assert.strictEqual(outcomes[0], last);
  });

  test("stops when the condition rejects the error", async () => {
    const failure = new Error("bad input");
    const { pipe, attempts } = flakyPipe([failure]);

    const outcomes = await runPipe(retryPipe(pipe, { retryDelay: 0 }));

    assert.strictEqual(attempts(), 1);
    assert.strictEqual(outcomes[0], failure);
  });

  test("passes the number of retries made to the condition", async () => {
    const seen: number[] = [];
    const { pipe } = flakyPipe([new Error("a"), new Error("b")]);

    await runPipe(
      retryPipe(pipe, {
        retryDelay: 0,
        retryCondition: (_error, attempt) => {
          seen.push(attempt);
          return true;
        },
      })
    );

    assert.deepStrictEqual(seen, [0, 1]);
  });

  test("waits between attempts", async () => {
    const { pipe, attempts } = flakyPipe([network("first")]);
    const started = Date.now();

    const outcomes = await runPipe(retryPipe(pipe, { retryDelay: 20 }));

    assert.deepStrictEqual(outcomes, [undefined]);
    assert.strictEqual(attempts(), 2);
    assert.ok(Date.now() - started >= 15);
  });

  test("drops late calls from an abandoned attempt", async () => {
    let attempts = 0;
    const pipe: Pipe<string[]> = (_log, next) => {
      attempts++;
      if (attempts === 1) {
        next(network("first"));
        next();
        return;
      }
      next();
    };
    const outcomes: Outcome[] = [];

    retryPipe(pipe, { retryDelay: 0 })([], (error) => outcomes.push(error));

    assert.strictEqual(attempts, 2);
    assert.deepStrictEqual(outcomes, [undefined]);
  });

  test("aborts with the throw of an attempt started from a timer", async () => {
    let attempts = 0;
    const pipe: Pipe<string[]> = (_log, next) => {
      attempts++;
      if (attempts === 1) {
        next(network("first"));
        return;
      }
      throw new Error("thrown on retry");
    };

    const outcomes = await runPipe(retryPipe(pipe, { retryDelay: 5 }));

    assert.strictEqual(attempts, 2);
    const [error] = outcomes;
    assert.ok(error instanceof Error);
    assert.strictEqual(error.message, "thrown on retry");
  });

  test("starts no further attempt once the signal aborted", async () => {
    const { pipe, attempts } = flakyPipe([network("first"), network("second")]);
    const controller = new AbortController();
    const outcomes: Outcome[] = [];

    retryPipe(pipe, { retryDelay: 20 }, () => controller.signal)([], (error) =>
      outcomes.push(error)
    );
    controller.abort(new Error("given up"));
    await new Promise((resolve) => setTimeout(resolve, 40));

    assert.strictEqual(attempts(), 1);
    assert.deepStrictEqual(outcomes, []);
  });

  test("does not run at all for an already aborted signal", () => {
    const { pipe, attempts } = flakyPipe([]);
    const controller = new AbortController();
    controller.abort(new Error("given up"));

    retryPipe(pipe, {}, () => controller.signal)([], () => {});

    assert.strictEqual(attempts(), 0);
  });
});
