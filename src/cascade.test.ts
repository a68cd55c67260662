import test from "node:test";
import assert from "node:assert/strict";
import { DispatchError } from "./errors.js";
import { createHarness, waitFor } from "./test-support.js";

const CAP = "data.transform";

function harness() {
  const h = createHarness();
  h.registry.register({
    agentId: "worker",
    endpoint: "http://worker.local",
    capabilities: [{ capabilityId: CAP, confidence: 1 }],
  });
  return h;
}

test("exhausted retries fail every transitive dependent without dispatching it", async () => {
  const h = harness();
  h.invoker.handler = async (req) => {
    if (req.taskId === "A") throw new DispatchError("boom");
    return "ok";
  };
  h.tasks.init();
  h.tasks.createTask({ taskId: "A", capabilityId: CAP, contextId: "c", maxRetries: 1 });
  h.tasks.createTask({ taskId: "B", capabilityId: CAP, contextId: "c", dependencies: ["A"] });
  h.tasks.createTask({ taskId: "C", capabilityId: CAP, contextId: "c", dependencies: ["B"] });

  await waitFor(() => h.tasks.getTask("C").state === "failed");

  assert.equal(h.tasks.getTask("A").failureReason, "retries_exhausted");
  for (const id of ["B", "C"]) {
    const task = h.tasks.getTask(id);
    assert.equal(task.state, "failed");
    assert.equal(task.failureReason, "dependency_failed");
    assert.equal(task.startedAt, null);
    assert.deepEqual(task.error, {
      code: "dependency_failed",
      message: `dependency A of ${id} did not complete`,
    });
  }
  assert.deepEqual(h.invoker.dispatched, ["A", "A"]);

  const failed = h.events.recent().filter((e) => e.type === "task.failed");
  assert.deepEqual(
    failed.map((e) => [e.taskId, e.detail?.cause]),
    [
      ["A", undefined],
      ["B", "A"],
      ["C", "A"],
    ]
  );
  h.tasks.shutdown();
});

test("a diamond fails once per dependent and leaves unrelated tasks alone", async () => {
  const h = harness();
  h.invoker.handler = async (req) => {
    if (req.taskId === "root") throw new Error("bad input");
    return "ok";
  };
  h.tasks.init();
  h.tasks.createTask({ taskId: "root", capabilityId: CAP, contextId: "c", maxRetries: 0 });
  h.tasks.createTask({ taskId: "left", capabilityId: CAP, contextId: "c", dependencies: ["root"] });
  h.tasks.createTask({ taskId: "right", capabilityId: CAP, contextId: "c", dependencies: ["root"] });
  h.tasks.createTask({
    taskId: "join",
    capabilityId: CAP,
    contextId: "c",
    dependencies: ["left", "right"],
  });
  h.tasks.createTask({ taskId: "other", capabilityId: CAP, contextId: "c" });

  await waitFor(
    () =>
      h.tasks.getTask("join").state === "failed" && h.tasks.getTask("other").state === "completed"
  );
  assert.equal(h.tasks.getTask("left").state, "failed");
  assert.equal(h.tasks.getTask("right").state, "failed");
  assert.equal(
    h.events.recent().filter((e) => e.type === "task.failed" && e.taskId === "join").length,
    1
  );
  assert.deepEqual(h.invoker.dispatched.sort(), ["other", "root"]);
  h.tasks.shutdown();
});

test("a dependent with another completed dependency still fails", async () => {
  const h = harness();
  h.invoker.handler = async (req) => {
    if (req.taskId === "bad") throw new Error("nope");
    return "ok";
  };
  h.tasks.init();
  h.tasks.createTask({ taskId: "good", capabilityId: CAP, contextId: "c" });
  await waitFor(() => h.tasks.getTask("good").state === "completed");

  h.tasks.createTask({ taskId: "bad", capabilityId: CAP, contextId: "c", maxRetries: 0 });
  h.tasks.createTask({ taskId: "x", capabilityId: CAP, contextId: "c", dependencies: ["good", "bad"] });
  await waitFor(() => h.tasks.getTask("x").state === "failed");

  assert.equal(h.tasks.getTask("good").state, "completed");
  assert.equal(h.tasks.getTask("x").failureReason, "dependency_failed");
  h.tasks.shutdown();
});

test("cancelling a task cancels its transitive dependents", () => {
  const h = harness();
  h.tasks.createTask({ taskId: "A", capabilityId: CAP, contextId: "c" });
  h.tasks.createTask({ taskId: "B", capabilityId: CAP, contextId: "c", dependencies: ["A"] });
  h.tasks.createTask({ taskId: "C", capabilityId: CAP, contextId: "c", dependencies: ["B"] });

  h.tasks.cancelTask("A");

  assert.equal(h.tasks.getTask("A").failureReason, "cancelled");
  for (const id of ["B", "C"]) {
    const task = h.tasks.getTask(id);
    assert.equal(task.state, "cancelled");
    assert.equal(task.failureReason, "dependency_cancelled");
    assert.equal(task.error, null);
  }
  assert.deepEqual(h.tasks.cancelTask("B"), { taskId: "B", cancelled: false, state: "cancelled" });
});

test("cancelling a dependent leaves its dependency running", async () => {
  const h = harness();
  h.tasks.createTask({ taskId: "A", capabilityId: CAP, contextId: "c" });
  h.tasks.createTask({ taskId: "B", capabilityId: CAP, contextId: "c", dependencies: ["A"] });
  h.tasks.cancelTask("B");
  h.tasks.init();

  await waitFor(() => h.tasks.getTask("A").state === "completed");
  assert.equal(h.tasks.getTask("B").state, "cancelled");
  assert.deepEqual(h.invoker.dispatched, ["A"]);
  h.tasks.shutdown();
});

test("new tasks on a failed or cancelled dependency are created terminal", async () => {
  const h = createHarness({ defaultMaxRetries: 0 });
  h.tasks.init();
  h.tasks.createTask({ taskId: "failed-dep", capabilityId: CAP, contextId: "c" });
  await waitFor(() => h.tasks.getTask("failed-dep").state === "failed");
  h.tasks.createTask({ taskId: "cancelled-dep", capabilityId: CAP, contextId: "c", priority: "low" });
  h.tasks.cancelTask("cancelled-dep");

  h.tasks.createTask({ taskId: "f", capabilityId: CAP, contextId: "c", dependencies: ["failed-dep"] });
  h.tasks.createTask({
    taskId: "k",
    capabilityId: CAP,
    contextId: "c",
    dependencies: ["cancelled-dep"],
  });
  h.tasks.createTask({
    taskId: "both",
    capabilityId: CAP,
    contextId: "c",
    dependencies: ["cancelled-dep", "failed-dep"],
  });

  assert.equal(h.tasks.getTask("f").state, "failed");
  assert.equal(h.tasks.getTask("f").failureReason, "dependency_failed");
  assert.equal(h.tasks.getTask("f").error?.code, "dependency_failed");
  assert.equal(h.tasks.getTask("k").state, "cancelled");
  assert.equal(h.tasks.getTask("k").failureReason, "dependency_cancelled");
  assert.equal(h.tasks.getTask("both").state, "failed");
  assert.equal(h.tasks.managerStats().laneDepths.medium, 0);
  h.tasks.shutdown();
});
