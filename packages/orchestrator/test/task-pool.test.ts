import { strict as assert } from "node:assert";
import test from "node:test";

import { createTaskPool } from "../src/index.js";

const deferred = () => {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

test("never runs more tasks than its concurrency", async () => {
  const pool = createTaskPool(2);
  let running = 0;
  let peak = 0;

  await Promise.all(
    Array.from({ length: 6 }, (_, index) =>
      pool.run(async () => {
        running += 1;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running -= 1;
        return index;
      }),
    ),
  );

  assert.equal(peak, 2);
  assert.equal(pool.active, 0);
  assert.equal(pool.pending, 0);
});

test("starts queued tasks in submission order", async () => {
  const pool = createTaskPool(1);
  const gate = deferred();
  const started: string[] = [];

  const first = pool.run(async () => {
    started.push("first");
    await gate.promise;
  });
  const second = pool.run(async () => {
    started.push("second");
  });
  const third = pool.run(async () => {
    started.push("third");
  });

  await new Promise((resolve) => setImmediate(resolve));
  assert.deepEqual(started, ["first"]);
  assert.equal(pool.active, 1);
  assert.equal(pool.pending, 2);

  gate.resolve();
  await Promise.all([first, second, third]);
  assert.deepEqual(started, ["first", "second", "third"]);
});

test("a failing task rejects its caller and frees its slot", async () => {
  const pool = createTaskPool(1);
  await assert.rejects(
    pool.run(async () => {
      throw new Error("task failed");
    }),
    /task failed/,
  );
  assert.equal(await pool.run(async () => "next"), "next");
  assert.equal(pool.active, 0);
});

test("rejects a non-positive concurrency", () => {
  assert.throws(() => createTaskPool(0), /positive integer/);
});
