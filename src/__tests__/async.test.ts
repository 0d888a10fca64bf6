import { describe, it } from "node:test";
import * as assert from "node:assert/strict";

import { AsyncLock, settlesWithin, sleep } from "../utils/async";

describe("sleep", () => {
  it("wakes early when the signal aborts", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;
    assert.ok(Date.now() - started < 1000);
  });

  it("returns immediately for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();
    await sleep(10_000, controller.signal);
    assert.ok(Date.now() - started < 1000);
  });
});

describe("settlesWithin", () => {
  it("is true for a promise that resolves in time", async () => {
    assert.equal(await settlesWithin(sleep(5), 1000), true);
  });

  it("is true for a promise that rejects in time", async () => {
    assert.equal(await settlesWithin(Promise.reject(new Error("boom")), 1000), true);
  });

  it("is false for a promise that outlives the wait", async () => {
    const controller = new AbortController();
    const slow = sleep(10_000, controller.signal);
    assert.equal(await settlesWithin(slow, 20), false);
    controller.abort();
    await slow;
  });
});

describe("AsyncLock", () => {
  it("runs critical sections one at a time in call order", async () => {
    const lock = new AsyncLock();
    const events: string[] = [];

    const first = lock.runExclusive(async () => {
      events.push("first:start");
      await sleep(20);
      events.push("first:end");
    });
    const second = lock.runExclusive(() => {
      events.push("second");
    });

    assert.equal(lock.isLocked(), true);
    await Promise.all([first, second]);
    assert.deepEqual(events, ["first:start", "first:end", "second"]);
    assert.equal(lock.isLocked(), false);
  });

  it("keeps serving callers after a section throws", async () => {
    const lock = new AsyncLock();
    await assert.rejects(
      lock.runExclusive(() => {
        throw new Error("section failed");
      }),
      /section failed/,
    );
    assert.equal(await lock.runExclusive(() => 42), 42);
  });
});
