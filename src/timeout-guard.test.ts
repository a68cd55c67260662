import test from "node:test";
import assert from "node:assert/strict";
import { armTimeout } from "./control/timeout-guard.js";

test("armTimeout fires once after the deadline", async () => {
  let calls = 0;
  const guard = armTimeout(5, () => {
    calls += 1;
  });
  assert.equal(guard.fired, false);
  await new Promise((resolve) => setTimeout(resolve, 25));
  assert.equal(calls, 1);
  assert.equal(guard.fired, true);
  assert.equal(guard.disarm(), false);
});

test("a disarmed guard never fires", async () => {
  let calls = 0;
  const guard = armTimeout(5, () => {
    calls += 1;
  });
  assert.equal(guard.disarm(), true);
  assert.equal(guard.disarm(), false);
  await new Promise((resolve) => setTimeout(resolve, 25));
  assert.equal(calls, 0);
  assert.equal(guard.fired, false);
});
