import { test, describe } from "node:test";
import assert from "node:assert";
import { WatchCell } from "../src/utils/watch-cell.js";
import { sleep } from "../src/utils/sleep.js";

describe("WatchCell", () => {
  test("subscribe delivers the current value, then every set", () => {
    const cell = new WatchCell(1);
    const seen: number[] = [];
    cell.subscribe((v) => seen.push(v));
    cell.set(2);
    cell.set(3);
    assert.deepStrictEqual(seen, [1, 2, 3]);
    assert.strictEqual(cell.get(), 3);
  });

  test("unsubscribe stops delivery", () => {
    const cell = new WatchCell(0);
    const seen: number[] = [];
    const off = cell.subscribe((v) => seen.push(v));
    assert.strictEqual(cell.subscriberCount, 1);
    off();
    cell.set(5);
    assert.deepStrictEqual(seen, [0]);
    assert.strictEqual(cell.subscriberCount, 0);
  });

  test("a throwing subscriber does not stop the others or the writer", () => {
    const cell = new WatchCell(0);
    const seen: number[] = [];
    let armed = false;
    cell.subscribe(() => {
      if (armed) throw new Error("listener broke");
    });
    cell.subscribe((v) => seen.push(v));
    armed = true;
    assert.doesNotThrow(() => cell.set(7));
    assert.deepStrictEqual(seen, [0, 7]);
  });

  test("a subscriber may unsubscribe itself during delivery", () => {
    const cell = new WatchCell(0);
    const seen: number[] = [];
    const off = cell.subscribe((v) => {
      seen.push(v);
      if (v === 1) off();
    });
    cell.set(1);
    cell.set(2);
    assert.deepStrictEqual(seen, [0, 1]);
  });
});

describe("sleep", () => {
  test("resolves after the delay", async () => {
    const started = Date.now();
    await sleep(20);
    assert.ok(Date.now() - started >= 15);
  });

  test("an abort ends the wait early without rejecting", async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 10);
    await sleep(60_000, controller.signal);
    assert.ok(Date.now() - started < 1000);
  });

  test("an already aborted signal resolves at once", async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();
    await sleep(60_000, controller.signal);
    assert.ok(Date.now() - started < 1000);
  });
});
