import assert from "assert/strict";
import { test } from "node:test";
import { ConcurrencyLimiter } from "../modules/concurrency/concurrency.limiter";
import { IndexGuard } from "../modules/concurrency/index.guard";
import { callOrDefault, withTimeout } from "../modules/concurrency/timeout";
import { ExternalCallError, ExternalCallTimeout } from "../modules/errors/pipeline.errors";
import { never } from "./fixtures";

function deferred() {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

test("withTimeout returns the value of a call that settles in time", async () => {
  assert.equal(await withTimeout(async () => 42, 100, "fast call"), 42);
});

test("withTimeout rejects a slow call with ExternalCallTimeout", async () => {
  await assert.rejects(
    () => withTimeout(() => never<number>(), 10, "slow call"),
    (error: unknown) =>
      error instanceof ExternalCallTimeout &&
      error.label === "slow call" &&
      error.timeoutMs === 10 &&
      error.message === "slow call timed out after 10ms"
  );
});

test("withTimeout wraps other failures in ExternalCallError", async () => {
  await assert.rejects(
    () =>
      withTimeout(
        async () => {
          throw new Error("boom");
        },
        100,
        "failing call"
      ),
    (error: unknown) =>
      error instanceof ExternalCallError && error.message === "failing call failed: boom"
  );
});

test("callOrDefault reports how the call ended", async () => {
  const ok = await callOrDefault(async () => "value", 100, "ok call", "default");
  const timedOut = await callOrDefault(() => never<string>(), 10, "slow call", "default");
  const failed = await callOrDefault(
    async (): Promise<string> => {
      throw new Error("boom");
    },
    100,
    "failing call",
    "default"
  );

  assert.deepEqual(ok, { status: "ok", value: "value" });
  assert.equal(timedOut.status, "timeout");
  assert.equal(timedOut.value, "default");
  assert.equal(failed.status, "error");
  assert.equal(failed.value, "default");
});

test("readers share the index guard", async () => {
  const guard = new IndexGuard();
  const gate = deferred();

  const first = guard.read(() => gate.promise);
  const second = guard.read(() => gate.promise);
  await Promise.resolve();

  assert.equal(guard.activeReaders, 2);
  gate.release();
  await Promise.all([first, second]);
  assert.equal(guard.activeReaders, 0);
});

test("a rebuild waits for readers and blocks later ones", async () => {
  const guard = new IndexGuard();
  const events: string[] = [];
  const reading = deferred();
  const writing = deferred();

  const firstRead = guard.read(async () => {
    events.push("read-1 start");
    await reading.promise;
    events.push("read-1 end");
  });
  const rebuild = guard.exclusive(async () => {
    events.push("rebuild start");
    await writing.promise;
    events.push("rebuild end");
  });
  const lateRead = guard.read(async () => {
    events.push("read-2");
  });

  await Promise.resolve();
  assert.deepEqual(events, ["read-1 start"]);

  reading.release();
  await firstRead;
  await new Promise((resolve) => setImmediate(resolve));
  assert.equal(guard.isWriting, true);
  assert.deepEqual(events, ["read-1 start", "read-1 end", "rebuild start"]);

  writing.release();
  await Promise.all([rebuild, lateRead]);
  assert.deepEqual(events, [
    "read-1 start",
    "read-1 end",
    "rebuild start",
    "rebuild end",
    "read-2",
  ]);
  assert.equal(guard.isWriting, false);
});

test("a failing reader still releases the guard", async () => {
  const guard = new IndexGuard();

  await assert.rejects(() =>
    guard.read(async () => {
      throw new Error("search failed");
    })
  );

  assert.equal(guard.activeReaders, 0);
  assert.equal(await guard.exclusive(async () => "rebuilt"), "rebuilt");
});

test("the limiter never runs more tasks than its limit", async () => {
  const limiter = new ConcurrencyLimiter(2);
  let inFlight = 0;
  let peak = 0;
  const started: number[] = [];

  const results = await Promise.all(
    [1, 2, 3, 4, 5].map((n) =>
      limiter.run(async () => {
        started.push(n);
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return n * 10;
      })
    )
  );

  assert.deepEqual(results, [10, 20, 30, 40, 50]);
  assert.deepEqual(started, [1, 2, 3, 4, 5]);
  assert.equal(peak, 2);
  assert.equal(limiter.active, 0);
});

test("a failing task frees its slot for the next one", async () => {
  const limiter = new ConcurrencyLimiter(1);

  const [failed, succeeded] = await Promise.allSettled([
    limiter.run(async () => {
      throw new Error("case failed");
    }),
    limiter.run(async () => "next"),
  ]);

  assert.equal(failed.status, "rejected");
  assert.deepEqual(succeeded, { status: "fulfilled", value: "next" });
  assert.equal(limiter.active, 0);
});

test("the limiter rejects a non-positive limit", () => {
  assert.throws(() => new ConcurrencyLimiter(0), RangeError);
});
