import type {
  AgentDescriptor,
  AgentInvoker,
  Clock,
  HealthSample,
  InvocationRequest,
} from "./contracts.js";
import type { TaskMeshConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createEventBus } from "./plugins/types.js";
import { CapabilityRegistry } from "./registry/capability-registry.js";
import { CapabilityRouter } from "./routing/capability-router.js";
import { createRuntime, defaultConfig } from "./runtime.js";
import { TaskManager, type TaskManagerOptions } from "./task-manager.js";

// Shared helpers for the *.test.ts files.

export const silentLogger = createLogger({ level: "silent" });

export async function waitFor(
  predicate: () => boolean,
  { timeoutMs = 2_000, intervalMs = 2 }: { timeoutMs?: number; intervalMs?: number } = {}
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

/** Lets every pending setImmediate drain run. */
export async function settle(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(err: unknown): void;
}

export function deferred<T = unknown>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export class ManualClock implements Clock {
  constructor(private current = 1_000) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

type InvokeHandler = (request: InvocationRequest) => Promise<unknown>;
type ProbeHandler = (agent: AgentDescriptor) => Promise<HealthSample>;

/** Records every call; behaviour is swapped per test through the handlers. */
export class FakeInvoker implements AgentInvoker {
  readonly calls: InvocationRequest[] = [];
  readonly probed: string[] = [];
  handler: InvokeHandler = async (request) => ({ echoed: request.payload });
  probeHandler: ProbeHandler = async () => ({ ok: true, latencyMs: 10 });

  invoke(request: InvocationRequest): Promise<unknown> {
    this.calls.push(request);
    return this.handler(request);
  }

  probe(agent: AgentDescriptor): Promise<HealthSample> {
    this.probed.push(agent.agentId);
    return this.probeHandler(agent);
  }

  /** Task ids in dispatch order. */
  get dispatched(): string[] {
    return this.calls.map((c) => c.taskId);
  }
}

/** Invocation that only settles when its signal aborts. */
export function hangUntilAborted(request: InvocationRequest): Promise<unknown> {
  return new Promise((_resolve, reject) => {
    request.signal.addEventListener("abort", () => reject(request.signal.reason), { once: true });
  });
}

type SectionOverrides = { [K in keyof TaskMeshConfig]?: Partial<TaskMeshConfig[K]> };

export function testConfig(overrides: SectionOverrides = {}): TaskMeshConfig {
  const base = defaultConfig();
  return {
    http: { ...base.http, ...overrides.http },
    logging: { ...base.logging, level: "silent", ...overrides.logging },
    scheduler: { ...base.scheduler, ...overrides.scheduler },
    retry: { ...base.retry, baseDelayMs: 1, maxDelayMs: 4, ...overrides.retry },
    routing: { ...base.routing, ...overrides.routing },
    health: { ...base.health, ...overrides.health },
    discovery: { ...base.discovery, ...overrides.discovery },
  };
}

export type HarnessOptions = Partial<Omit<TaskManagerOptions, "router" | "invoker">>;

/** Registry, router and task manager wired to a FakeInvoker; nothing started. */
export function createHarness(options: HarnessOptions = {}) {
  const events = createEventBus();
  const registry = new CapabilityRegistry({ events, logger: silentLogger });
  const router = new CapabilityRouter(registry);
  const invoker = new FakeInvoker();
  const tasks = new TaskManager({
    router,
    invoker,
    events,
    logger: silentLogger,
    retry: { baseDelayMs: 1, maxDelayMs: 4 },
    ...options,
  });
  return { events, registry, router, invoker, tasks };
}

/** Runtime on a FakeInvoker with silent logs and probes left to the test. */
export function createTestRuntime(overrides: SectionOverrides = {}) {
  const invoker = new FakeInvoker();
  const runtime = createRuntime({
    config: testConfig(overrides),
    invoker,
    logger: silentLogger,
    manualProbes: true,
  });
  return { runtime, invoker };
}
