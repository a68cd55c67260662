import test from "node:test";
import assert from "node:assert/strict";
import pino from "pino";
import { buildControlPlane } from "./control-plane.js";
import { createRuntime } from "./runtime.js";
import {
  FakeInvoker,
  createTestRuntime,
  deferred,
  hangUntilAborted,
  testConfig,
  waitFor,
} from "./test-support.js";

const ADMIN = { "x-admin-token": "admin-dev" };

function setup(overrides: Parameters<typeof createTestRuntime>[0] = {}) {
  const { runtime, invoker } = createTestRuntime(overrides);
  const app = buildControlPlane(runtime);
  return { app, runtime, invoker };
}

async function registerAgent(
  app: ReturnType<typeof buildControlPlane>,
  agentId: string,
  capabilityId = "text.summarize"
) {
  const res = await app.inject({
    method: "POST",
    url: "/v1/agents/register",
    headers: ADMIN,
    payload: {
      agentId,
      endpoint: `http://${agentId}.local`,
      capabilities: [{ capabilityId, confidence: 0.9 }],
      tags: ["nlp"],
    },
  });
  assert.equal(res.statusCode, 200);
  return res;
}

type App = ReturnType<typeof buildControlPlane>;

async function getTask(app: App, taskId: string) {
  const res = await app.inject({ method: "GET", url: `/v1/tasks/${taskId}` });
  return res.json().task;
}

/** Polls GET /v1/tasks/:taskId until the task reaches the state. */
async function waitForState(app: App, taskId: string, state: string) {
  for (let i = 0; i < 400; i++) {
    const task = await getTask(app, taskId);
    if (task.state === state) return task;
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  throw new Error(`task ${taskId} never reached ${state}`);
}

async function createTask(app: ReturnType<typeof buildControlPlane>, payload: Record<string, unknown>) {
  return app.inject({ method: "POST", url: "/v1/tasks", payload });
}

test("request logs go through the runtime logger", async () => {
  const messages: string[] = [];
  const logger = pino(
    { level: "info" },
    {
      write(line: string) {
        const record: { msg?: unknown } = JSON.parse(line);
        if (typeof record.msg === "string") messages.push(record.msg);
      },
    }
  );
  const runtime = createRuntime({
    config: testConfig(),
    invoker: new FakeInvoker(),
    logger,
    manualProbes: true,
  });
  const app = buildControlPlane(runtime);

  await app.inject({ method: "GET", url: "/health" });
  await app.close();

  assert.ok(messages.includes("incoming request"));
  assert.ok(messages.includes("request completed"));
});

// ── Agents ─────────────────────────────────────────────────────────────────

test("GET /health returns ok", async () => {
  const { app } = setup();
  const res = await app.inject({ method: "GET", url: "/health" });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { ok: true });
  await app.close();
});

test("POST /v1/agents/register requires the admin token", async () => {
  const { app, runtime } = setup();
  const res = await app.inject({
    method: "POST",
    url: "/v1/agents/register",
    payload: { agentId: "a1", endpoint: "http://a1.local", capabilities: [] },
  });
  assert.equal(res.statusCode, 401);
  assert.deepEqual(res.json(), { ok: false, error: "unauthorized" });
  assert.equal(runtime.registry.size, 0);
  await app.close();
});

test("POST /v1/agents/register stores the agent", async () => {
  const { app } = setup();
  const res = await registerAgent(app, "a1");
  assert.equal(res.json().agent.agentId, "a1");
  assert.equal(res.json().agent.healthStatus, "unknown");

  const list = await app.inject({ method: "GET", url: "/v1/agents" });
  assert.deepEqual(
    list.json().agents.map((a: { agentId: string }) => a.agentId),
    ["a1"]
  );
  const byTag = await app.inject({ method: "GET", url: "/v1/agents?tag=gpu" });
  assert.deepEqual(byTag.json().agents, []);

  const one = await app.inject({ method: "GET", url: "/v1/agents/a1" });
  assert.equal(one.json().agent.endpoint, "http://a1.local");
  await app.close();
});

test("POST /v1/agents/register rejects a malformed body", async () => {
  const { app } = setup();
  const res = await app.inject({
    method: "POST",
    url: "/v1/agents/register",
    headers: ADMIN,
    payload: { agentId: "a1", endpoint: "e", capabilities: [{ capabilityId: "x", confidence: 2 }] },
  });
  assert.equal(res.statusCode, 400);
  assert.equal(res.json().error, "validation_failed");

  const badId = await app.inject({
    method: "POST",
    url: "/v1/agents/register",
    headers: ADMIN,
    payload: { agentId: "a1", endpoint: "e", capabilities: [{ capabilityId: "x y", confidence: 1 }] },
  });
  assert.equal(badId.statusCode, 400);
  assert.equal(badId.json().message, "invalid capability id: x y");
  await app.close();
});

test("DELETE /v1/agents/:agentId deregisters and 404s when unknown", async () => {
  const { app, runtime } = setup();
  await registerAgent(app, "a1");

  const denied = await app.inject({ method: "DELETE", url: "/v1/agents/a1" });
  assert.equal(denied.statusCode, 401);

  const res = await app.inject({ method: "DELETE", url: "/v1/agents/a1", headers: ADMIN });
  assert.deepEqual(res.json(), { ok: true, agentId: "a1" });
  assert.equal(runtime.registry.size, 0);

  const again = await app.inject({ method: "DELETE", url: "/v1/agents/a1", headers: ADMIN });
  assert.equal(again.statusCode, 404);
  assert.equal(again.json().error, "agent_not_found");

  const get = await app.inject({ method: "GET", url: "/v1/agents/a1" });
  assert.equal(get.statusCode, 404);
  await app.close();
});

test("GET /v1/registry/stats reports coverage", async () => {
  const { app } = setup();
  await registerAgent(app, "a1");
  await registerAgent(app, "a2");
  const res = await app.inject({ method: "GET", url: "/v1/registry/stats" });
  assert.deepEqual(res.json().stats, {
    totalAgents: 2,
    byHealth: { unknown: 2, healthy: 0, degraded: 0, unreachable: 0 },
    totalCapabilities: 1,
    capabilityCoverage: { "text.summarize": 2 },
    totalTags: 1,
  });
  await app.close();
});

test("GET /v1/capabilities/:capabilityId/route returns the chosen agent", async () => {
  const { app, runtime } = setup();
  await registerAgent(app, "a1");
  await registerAgent(app, "a2");
  runtime.registry.updateHealth("a1", "unreachable");

  const res = await app.inject({ method: "GET", url: "/v1/capabilities/text.summarize/route" });
  assert.equal(res.statusCode, 200);
  assert.equal(res.json().agentId, "a2");
  assert.deepEqual(
    res.json().candidates.map((c: { agentId: string }) => c.agentId),
    ["a2"]
  );

  const none = await app.inject({ method: "GET", url: "/v1/capabilities/image.render/route" });
  assert.equal(none.statusCode, 404);
  assert.equal(none.json().error, "no_live_agent");
  await app.close();
});

// ── Tasks ──────────────────────────────────────────────────────────────────

test("POST /v1/tasks creates a task that runs to completion", async () => {
  const { app } = setup();
  await registerAgent(app, "a1");

  const res = await createTask(app, {
    taskId: "t1",
    capabilityId: "text.summarize",
    contextId: "ctx",
    priority: "urgent",
    payload: { text: "long document" },
  });
  assert.equal(res.statusCode, 201);
  assert.equal(res.json().taskId, "t1");
  assert.equal(res.json().task.priority, "urgent");

  const task = await waitForState(app, "t1", "completed");
  assert.deepEqual(task.result, { echoed: { text: "long document" } });
  assert.equal(task.assignedAgentId, "a1");
  assert.equal(task.error, null);
  await app.close();
});

test("POST /v1/tasks rejects bad input with 400", async () => {
  const { app } = setup();
  const badPriority = await createTask(app, {
    capabilityId: "text.summarize",
    contextId: "ctx",
    priority: "critical",
  });
  assert.equal(badPriority.statusCode, 400);
  assert.equal(badPriority.json().error, "validation_failed");

  const unknownDep = await createTask(app, {
    capabilityId: "text.summarize",
    contextId: "ctx",
    dependencies: ["ghost"],
  });
  assert.equal(unknownDep.statusCode, 400);
  assert.equal(unknownDep.json().message, "unknown_dependency: ghost");

  await createTask(app, { taskId: "dup", capabilityId: "text.summarize", contextId: "ctx" });
  const dup = await createTask(app, { taskId: "dup", capabilityId: "text.summarize", contextId: "ctx" });
  assert.equal(dup.statusCode, 400);
  assert.equal(dup.json().message, "duplicate_task: dup already exists");
  await app.close();
});

test("POST /v1/tasks rejects a timeout setTimeout cannot hold", async () => {
  const { app } = setup();
  const res = await createTask(app, {
    capabilityId: "text.summarize",
    contextId: "ctx",
    timeoutMs: 2_592_000_000,
  });
  assert.equal(res.statusCode, 400);
  assert.equal(res.json().error, "validation_failed");
  await app.close();
});

test("POST /v1/tasks answers 409 for a self-dependency", async () => {
  const { app } = setup();
  const res = await createTask(app, {
    taskId: "loop",
    capabilityId: "text.summarize",
    contextId: "ctx",
    dependencies: ["loop"],
  });
  assert.equal(res.statusCode, 409);
  assert.equal(res.json().error, "dependency_cycle");
  const list = await app.inject({ method: "GET", url: "/v1/tasks" });
  assert.deepEqual(list.json().tasks, []);
  await app.close();
});

test("POST /v1/tasks answers 429 when the lane is full", async () => {
  const { app, invoker } = setup({ scheduler: { maxConcurrentTasks: 1, laneDepthLimit: 1 } });
  invoker.handler = hangUntilAborted;
  await registerAgent(app, "a1");

  await createTask(app, { taskId: "running", capabilityId: "text.summarize", contextId: "ctx" });
  await waitFor(() => invoker.calls.length === 1);
  const queued = await createTask(app, { taskId: "queued", capabilityId: "text.summarize", contextId: "ctx" });
  assert.equal(queued.statusCode, 201);

  const rejected = await createTask(app, { taskId: "extra", capabilityId: "text.summarize", contextId: "ctx" });
  assert.equal(rejected.statusCode, 429);
  assert.equal(rejected.json().error, "lane_full");

  const other = await createTask(app, {
    taskId: "urgent",
    capabilityId: "text.summarize",
    contextId: "ctx",
    priority: "urgent",
  });
  assert.equal(other.statusCode, 201);
  await app.close();
});

test("POST /v1/tasks/:taskId/cancel cancels once, then reports the terminal state", async () => {
  const { app, invoker } = setup();
  invoker.handler = hangUntilAborted;
  await registerAgent(app, "a1");
  await createTask(app, { taskId: "t1", capabilityId: "text.summarize", contextId: "ctx" });

  const first = await app.inject({ method: "POST", url: "/v1/tasks/t1/cancel" });
  assert.equal(first.statusCode, 200);
  assert.deepEqual(first.json(), { ok: true, taskId: "t1", cancelled: true, state: "cancelled" });

  const second = await app.inject({ method: "POST", url: "/v1/tasks/t1/cancel" });
  assert.deepEqual(second.json(), { ok: true, taskId: "t1", cancelled: false, state: "cancelled" });

  const missing = await app.inject({ method: "POST", url: "/v1/tasks/nope/cancel" });
  assert.equal(missing.statusCode, 404);
  assert.equal(missing.json().error, "task_not_found");
  await app.close();
});

test("cancelling a completed task answers 409", async () => {
  const { app } = setup();
  await registerAgent(app, "a1");
  await createTask(app, { taskId: "t1", capabilityId: "text.summarize", contextId: "ctx" });
  await waitForState(app, "t1", "completed");

  const res = await app.inject({ method: "POST", url: "/v1/tasks/t1/cancel" });
  assert.equal(res.statusCode, 409);
  assert.deepEqual(res.json(), { ok: false, error: "task_already_terminal", state: "completed" });
  await app.close();
});

test("cancelling a running task aborts its invocation", async () => {
  const { app, invoker } = setup();
  const aborted = deferred<unknown>();
  invoker.handler = (request) => {
    request.signal.addEventListener("abort", () => aborted.resolve(request.signal.reason), {
      once: true,
    });
    return hangUntilAborted(request);
  };
  await registerAgent(app, "a1");
  await createTask(app, { taskId: "t1", capabilityId: "text.summarize", contextId: "ctx" });
  await waitForState(app, "t1", "running");

  const res = await app.inject({ method: "POST", url: "/v1/tasks/t1/cancel" });
  assert.equal(res.json().cancelled, true);
  await aborted.promise;
  assert.equal((await getTask(app, "t1")).state, "cancelled");
  await app.close();
});

test("POST /v1/tasks/:taskId/dependencies adds an edge and blocks the task", async () => {
  const { app, invoker } = setup({ scheduler: { maxConcurrentTasks: 1 } });
  invoker.handler = hangUntilAborted;
  await registerAgent(app, "a1");
  await createTask(app, { taskId: "busy", capabilityId: "text.summarize", contextId: "ctx" });
  await waitFor(() => invoker.calls.length === 1);
  await createTask(app, { taskId: "a", capabilityId: "text.summarize", contextId: "ctx" });
  await createTask(app, { taskId: "b", capabilityId: "text.summarize", contextId: "ctx" });

  const res = await app.inject({
    method: "POST",
    url: "/v1/tasks/b/dependencies",
    payload: { dependencyId: "a" },
  });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json().task.dependencies, ["a"]);
  assert.equal(res.json().task.state, "blocked");
  assert.deepEqual((await getTask(app, "a")).dependents, ["b"]);

  const cycle = await app.inject({
    method: "POST",
    url: "/v1/tasks/a/dependencies",
    payload: { dependencyId: "b" },
  });
  assert.equal(cycle.statusCode, 409);
  assert.equal(cycle.json().message, "dependency cycle: a -> b -> a");

  const started = await app.inject({
    method: "POST",
    url: "/v1/tasks/busy/dependencies",
    payload: { dependencyId: "a" },
  });
  assert.equal(started.statusCode, 400);
  assert.equal(started.json().message, "task busy has already started (running)");

  const missingBody = await app.inject({
    method: "POST",
    url: "/v1/tasks/a/dependencies",
    payload: {},
  });
  assert.equal(missingBody.statusCode, 400);
  await app.close();
});

test("GET /v1/tasks filters by state and context", async () => {
  const { app, invoker } = setup({ scheduler: { maxConcurrentTasks: 1 } });
  invoker.handler = hangUntilAborted;
  await registerAgent(app, "a1");
  await createTask(app, { taskId: "a", capabilityId: "text.summarize", contextId: "one" });
  await waitFor(() => invoker.calls.length === 1);
  await createTask(app, { taskId: "b", capabilityId: "text.summarize", contextId: "two" });
  await createTask(app, { taskId: "c", capabilityId: "text.summarize", contextId: "two" });
  await app.inject({ method: "POST", url: "/v1/tasks/c/cancel" });

  const ids = async (url: string) =>
    (await app.inject({ method: "GET", url })).json().tasks.map((t: { taskId: string }) => t.taskId);

  assert.deepEqual(await ids("/v1/tasks?contextId=two"), ["b", "c"]);
  assert.deepEqual(await ids("/v1/tasks?state=cancelled"), ["c"]);
  assert.deepEqual(await ids("/v1/tasks?state=running&contextId=one"), ["a"]);
  assert.deepEqual(await ids("/v1/tasks?state=queued&contextId=one"), []);

  const bad = await app.inject({ method: "GET", url: "/v1/tasks?state=sleeping" });
  assert.equal(bad.statusCode, 400);

  const stats = (await app.inject({ method: "GET", url: "/v1/tasks/stats" })).json().stats;
  assert.equal(stats.totalTasks, 3);
  assert.equal(stats.running, 1);
  assert.equal(stats.byState.queued, 1);
  assert.equal(stats.byState.cancelled, 1);
  assert.equal(stats.laneDepths.medium, 1);
  await app.close();
});

test("GET /v1/tasks/:taskId answers 404 for unknown tasks", async () => {
  const { app } = setup();
  const res = await app.inject({ method: "GET", url: "/v1/tasks/ghost" });
  assert.equal(res.statusCode, 404);
  assert.deepEqual(res.json(), {
    ok: false,
    error: "task_not_found",
    message: "task ghost not found",
  });
  await app.close();
});

test("GET /v1/tasks/:taskId/stream replays a terminal task and ends", async () => {
  const { app, invoker } = setup();
  invoker.handler = hangUntilAborted;
  await registerAgent(app, "a1");
  await createTask(app, { taskId: "t1", capabilityId: "text.summarize", contextId: "ctx" });
  await app.inject({ method: "POST", url: "/v1/tasks/t1/cancel" });

  const res = await app.inject({ method: "GET", url: "/v1/tasks/t1/stream" });
  assert.equal(res.statusCode, 200);
  assert.equal(res.headers["content-type"], "text/event-stream; charset=utf-8");
  const frames = res.body.split("\n\n").filter(Boolean);
  assert.equal(frames.length, 1);
  const [eventLine, dataLine] = (frames[0] ?? "").split("\n");
  assert.equal(eventLine, "event: status");
  const update = JSON.parse((dataLine ?? "").slice("data: ".length));
  assert.equal(update.taskId, "t1");
  assert.equal(update.state, "cancelled");
  assert.equal(update.failureReason, "cancelled");
  await app.close();
});

test("GET /v1/tasks/:taskId/stream answers 404 for unknown tasks", async () => {
  const { app } = setup();
  const res = await app.inject({ method: "GET", url: "/v1/tasks/ghost/stream" });
  assert.equal(res.statusCode, 404);
  assert.equal(res.json().error, "task_not_found");
  await app.close();
});
