import assert from "node:assert/strict";
import { test } from "node:test";
import { PerKeyLock } from "../util/gateway.lock.utils";
import { delay } from "./helpers";

test("runs calls for the same key one after another in arrival order", async () => {
  const lock = new PerKeyLock();
  const events: string[] = [];

  const first = lock.runExclusive("a", async () => {
    events.push("first:start");
    await delay(20);
    events.push("first:end");
    return 1;
  });
  const second = lock.runExclusive("a", async () => {
    events.push("second:start");
    events.push("second:end");
    return 2;
  });

  assert.deepEqual(await Promise.all([first, second]), [1, 2]);
  assert.deepEqual(events, ["first:start", "first:end", "second:start", "second:end"]);
});

test("runs calls for different keys concurrently", async () => {
  const lock = new PerKeyLock();
  const events: string[] = [];

  const slow = lock.runExclusive("a", async () => {
    events.push("a:start");
    await delay(20);
    events.push("a:end");
  });
  const fast = lock.runExclusive("b", async () => {
    events.push("b:start");
    events.push("b:end");
  });

  await Promise.all([slow, fast]);
  assert.deepEqual(events, ["a:start", "b:start", "b:end", "a:end"]);
});

test("releases the key when the holder throws", async () => {
  const lock = new PerKeyLock();

  await assert.rejects(
    lock.runExclusive("a", async () => {
      throw new Error("boom");
    }),
    /boom/,
  );

  const value = await lock.runExclusive("a", async () => "after");
  assert.equal(value, "after");
  assert.equal(lock.activeKeys, 0);
});

test("forgets idle keys", async () => {
  const lock = new PerKeyLock();

  await Promise.all([
    lock.runExclusive("a", async () => delay(5)),
    lock.runExclusive("a", async () => delay(5)),
    lock.runExclusive("b", async () => delay(5)),
  ]);

  assert.equal(lock.activeKeys, 0);
});
