import { PassThrough } from "node:stream";
import Fastify from "fastify";
import type {
  FastifyBaseLogger,
  FastifyInstance,
  FastifyReply,
  FastifyRequest,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault,
} from "fastify";
import {
  PRIORITY_ORDER,
  TASK_STATES,
  type CreateTaskRequest,
  type HealthStatus,
  type RegisterAgentRequest,
  type TaskState,
} from "./contracts.js";
import { loadConfig, type TaskMeshConfig } from "./config.js";
import { MAX_TIMER_DELAY_MS } from "./control/timeout-guard.js";
import {
  AgentNotFoundError,
  CycleError,
  MeshError,
  NotFoundError,
  ResourceExhaustedError,
  TaskNotFoundError,
  ValidationError,
} from "./errors.js";
import type { MeshEvent, MeshPlugin } from "./plugins/types.js";
import { createTelemetryPlugin, type TelemetryPlugin } from "./plugins/telemetry-plugin.js";
import { createRuntime, type Runtime } from "./runtime.js";

const HEALTH_STATES: readonly HealthStatus[] = ["unknown", "healthy", "degraded", "unreachable"];

export interface ControlPlaneOptions {
  plugins?: MeshPlugin[];
  /** Defaults to config.http.adminToken. */
  adminToken?: string;
}

function statusFor(err: MeshError): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof CycleError) return 409;
  if (err instanceof ResourceExhaustedError) return 429;
  if (
    err instanceof TaskNotFoundError ||
    err instanceof AgentNotFoundError ||
    err instanceof NotFoundError
  ) {
    return 404;
  }
  return 500;
}

function sseHeaders(reply: FastifyReply): void {
  reply.header("content-type", "text/event-stream; charset=utf-8");
  reply.header("cache-control", "no-cache");
  reply.header("x-accel-buffering", "no");
}

/**
 * HTTP surface over a runtime. The app owns the runtime's lifecycle: it is
 * initialised when the app becomes ready and shut down when the app closes.
 */
export function buildControlPlane(
  runtime: Runtime = createRuntime(),
  options: ControlPlaneOptions = {}
): FastifyInstance {
  // HTTP logs go through the runtime's logger and share its level and transport.
  const app = Fastify<
    RawServerDefault,
    RawRequestDefaultExpression,
    RawReplyDefaultExpression,
    FastifyBaseLogger
  >({ logger: runtime.logger });
  const adminToken = options.adminToken ?? runtime.config.http.adminToken;
  const { tasks, registry, router, events } = runtime;

  const defaultTelemetry: TelemetryPlugin | null = options.plugins ? null : createTelemetryPlugin();
  const plugins: MeshPlugin[] = options.plugins ?? (defaultTelemetry ? [defaultTelemetry] : []);
  for (const plugin of plugins) {
    plugin.register(app, events);
  }

  const isAdmin = (req: FastifyRequest) => req.headers["x-admin-token"] === adminToken;

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof MeshError) {
      return reply.code(statusFor(err)).send({ ok: false, error: err.code, message: err.message });
    }
    if (err.validation) {
      return reply.code(400).send({ ok: false, error: "validation_failed", message: err.message });
    }
    req.log.error({ err }, "request failed");
    return reply
      .code(err.statusCode ?? 500)
      .send({ ok: false, error: "internal_error", message: err.message });
  });

  app.addHook("onReady", async () => {
    await runtime.init();
  });
  app.addHook("onClose", async () => {
    await runtime.shutdown();
  });

  app.get("/health", async () => ({ ok: true }));

  app.get("/metrics", async (_req, reply) => {
    const stats = tasks.managerStats();
    const registryStats = registry.stats();
    const c = defaultTelemetry?.snapshot().counters ?? {};

    const counter = (name: string, help: string, value: number) => [
      `# HELP ${name} ${help}`,
      `# TYPE ${name} counter`,
      `${name} ${value}`,
    ];

    const lines: string[] = [
      ...counter(
        "taskmesh_http_requests_total",
        "Total HTTP requests processed",
        c["http.requests.total"] ?? 0
      ),
      ...counter(
        "taskmesh_tasks_created_total",
        "Tasks created since startup",
        c["event.task.created"] ?? 0
      ),
      ...counter(
        "taskmesh_tasks_completed_total",
        "Tasks completed since startup",
        c["event.task.completed"] ?? 0
      ),
      ...counter(
        "taskmesh_tasks_failed_total",
        "Tasks that failed (terminal) since startup",
        c["event.task.failed"] ?? 0
      ),
      ...counter(
        "taskmesh_tasks_cancelled_total",
        "Tasks cancelled since startup",
        c["event.task.cancelled"] ?? 0
      ),
      ...counter(
        "taskmesh_task_retries_total",
        "Retries scheduled since startup",
        stats.retriesScheduled
      ),
      ...counter(
        "taskmesh_agents_registered_total",
        "Agent registrations since startup",
        c["event.agent.registered"] ?? 0
      ),
      "# HELP taskmesh_running_tasks Current number of running tasks",
      "# TYPE taskmesh_running_tasks gauge",
      `taskmesh_running_tasks ${stats.running}`,
      "# HELP taskmesh_open_streams Task status streams being consumed",
      "# TYPE taskmesh_open_streams gauge",
      `taskmesh_open_streams ${stats.openStreams}`,
      "# HELP taskmesh_lane_depth Tasks waiting in each priority lane",
      "# TYPE taskmesh_lane_depth gauge",
      ...PRIORITY_ORDER.map((p) => `taskmesh_lane_depth{priority="${p}"} ${stats.laneDepths[p]}`),
      "# HELP taskmesh_tasks Tasks by state",
      "# TYPE taskmesh_tasks gauge",
      ...TASK_STATES.map((s) => `taskmesh_tasks{state="${s}"} ${stats.byState[s]}`),
      "# HELP taskmesh_agents Registered agents by health",
      "# TYPE taskmesh_agents gauge",
      ...HEALTH_STATES.map((h) => `taskmesh_agents{health="${h}"} ${registryStats.byHealth[h]}`),
      "",
    ];

    reply.header("content-type", "text/plain; version=0.0.4; charset=utf-8");
    return reply.send(lines.join("\n"));
  });

  app.get("/v1/events", (_req, reply) => {
    const stream = new PassThrough();
    stream.write(": connected\n\n");

    const send = (event: MeshEvent) => stream.write(`data: ${JSON.stringify(event)}\n\n`);
    const unsubscribe = events.subscribe(send);

    const cleanup = () => {
      unsubscribe();
      if (!stream.destroyed) stream.end();
    };
    reply.raw.on("close", cleanup);

    sseHeaders(reply);
    return reply.send(stream);
  });

  // ── Agents ───────────────────────────────────────────────────────────────

  app.post<{ Body: RegisterAgentRequest }>(
    "/v1/agents/register",
    {
      schema: {
        body: {
          type: "object",
          required: ["agentId", "endpoint", "capabilities"],
          properties: {
            agentId: { type: "string", minLength: 1 },
            endpoint: { type: "string" },
            capabilities: {
              type: "array",
              items: {
                type: "object",
                required: ["capabilityId", "confidence"],
                properties: {
                  capabilityId: { type: "string", minLength: 1 },
                  confidence: { type: "number", minimum: 0, maximum: 1 },
                },
              },
            },
            tags: { type: "array", items: { type: "string" } },
            version: { type: "string" },
            metadata: { type: "object" },
          },
        },
      },
    },
    async (req, reply) => {
      if (!isAdmin(req)) return reply.code(401).send({ ok: false, error: "unauthorized" });
      const agent = runtime.registerAgent(req.body);
      return { ok: true, agent };
    }
  );

  app.delete<{ Params: { agentId: string } }>("/v1/agents/:agentId", async (req, reply) => {
    if (!isAdmin(req)) return reply.code(401).send({ ok: false, error: "unauthorized" });
    if (!runtime.deregisterAgent(req.params.agentId)) {
      throw new AgentNotFoundError(req.params.agentId);
    }
    return { ok: true, agentId: req.params.agentId };
  });

  app.get<{ Querystring: { tag?: string } }>("/v1/agents", async (req) => ({
    ok: true,
    agents: req.query.tag ? registry.findByTag(req.query.tag) : registry.listAgents(),
  }));

  app.get<{ Params: { agentId: string } }>("/v1/agents/:agentId", async (req) => {
    const agent = registry.getAgent(req.params.agentId);
    if (!agent) throw new AgentNotFoundError(req.params.agentId);
    return { ok: true, agent };
  });

  app.get("/v1/registry/stats", async () => ({ ok: true, stats: runtime.registryStats() }));

  app.get<{ Params: { capabilityId: string } }>(
    "/v1/capabilities/:capabilityId/route",
    async (req) => {
      const decision = router.route(req.params.capabilityId);
      return {
        ok: true,
        agentId: decision.agent.agentId,
        score: decision.score,
        confidence: decision.confidence,
        candidates: router.rank(req.params.capabilityId).map((d) => ({
          agentId: d.agent.agentId,
          healthStatus: d.agent.healthStatus,
          score: d.score,
        })),
      };
    }
  );

  // ── Tasks ────────────────────────────────────────────────────────────────

  app.post<{ Body: CreateTaskRequest }>(
    "/v1/tasks",
    {
      schema: {
        body: {
          type: "object",
          required: ["capabilityId", "contextId"],
          properties: {
            taskId: { type: "string", minLength: 1 },
            capabilityId: { type: "string", minLength: 1 },
            contextId: { type: "string", minLength: 1 },
            priority: { type: "string", enum: [...PRIORITY_ORDER] },
            dependencies: { type: "array", items: { type: "string" } },
            timeoutMs: { type: "integer", minimum: 1, maximum: MAX_TIMER_DELAY_MS },
            maxRetries: { type: "integer", minimum: 0 },
            payload: {},
          },
        },
      },
    },
    async (req, reply) => {
      const taskId = tasks.createTask(req.body);
      return reply.code(201).send({ ok: true, taskId, task: tasks.getTask(taskId) });
    }
  );

  app.get<{ Querystring: { state?: TaskState; contextId?: string } }>(
    "/v1/tasks",
    {
      schema: {
        querystring: {
          type: "object",
          properties: {
            state: { type: "string", enum: [...TASK_STATES] },
            contextId: { type: "string" },
          },
        },
      },
    },
    async (req) => ({
      ok: true,
      tasks: tasks.listTasks({ state: req.query.state, contextId: req.query.contextId }),
    })
  );

  app.get("/v1/tasks/stats", async () => ({ ok: true, stats: tasks.managerStats() }));

  app.get<{ Params: { taskId: string } }>("/v1/tasks/:taskId", async (req) => ({
    ok: true,
    task: tasks.getTask(req.params.taskId),
  }));

  app.post<{ Params: { taskId: string }; Body: { dependencyId: string } }>(
    "/v1/tasks/:taskId/dependencies",
    {
      schema: {
        body: {
          type: "object",
          required: ["dependencyId"],
          properties: { dependencyId: { type: "string", minLength: 1 } },
        },
      },
    },
    async (req) => ({
      ok: true,
      task: tasks.addDependency(req.params.taskId, req.body.dependencyId),
    })
  );

  app.post<{ Params: { taskId: string } }>("/v1/tasks/:taskId/cancel", async (req, reply) => {
    const task = tasks.getTask(req.params.taskId);
    if (task.state === "completed" || task.state === "failed") {
      return reply
        .code(409)
        .send({ ok: false, error: "task_already_terminal", state: task.state });
    }
    return { ok: true, ...tasks.cancelTask(req.params.taskId) };
  });

  app.get<{ Params: { taskId: string } }>("/v1/tasks/:taskId/stream", async (req, reply) => {
    const abort = new AbortController();
    const updates = tasks.streamStatus(req.params.taskId, { signal: abort.signal });
    const stream = new PassThrough();
    reply.raw.on("close", () => abort.abort());

    const pump = async () => {
      try {
        for await (const update of updates) {
          stream.write(`event: status\ndata: ${JSON.stringify(update)}\n\n`);
        }
      } finally {
        if (!stream.destroyed) stream.end();
      }
    };
    pump().catch((err: unknown) => req.log.error({ err }, "status stream failed"));

    sseHeaders(reply);
    return reply.send(stream);
  });

  return app;
}

export async function startControlPlane(config: TaskMeshConfig = loadConfig()) {
  const runtime = createRuntime({ config });
  const { logger } = runtime;
  const app = buildControlPlane(runtime);
  const { host, port } = config.http;
  await app.listen({ host, port });
  app.log.info(`taskmesh control plane listening on http://${host}:${port}`);

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, "shutdown failed");
          process.exit(1);
        }
      );
    });
  }
  return app;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  startControlPlane().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
