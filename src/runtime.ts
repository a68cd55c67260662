import {
  systemClock,
  type AgentDescriptor,
  type AgentInvoker,
  type Clock,
  type RegisterAgentRequest,
  type RegistryStats,
} from "./contracts.js";
import { configSchema, type TaskMeshConfig } from "./config.js";
import { HealthMonitor } from "./health/health-monitor.js";
import { HttpAgentInvoker } from "./invokers/http-invoker.js";
import { createLogger, type Logger } from "./logger.js";
import { createEventBus, type MeshEvent, type MeshPluginContext } from "./plugins/types.js";
import { CapabilityRegistry } from "./registry/capability-registry.js";
import { discoverAgents } from "./registry/discovery.js";
import { CapabilityRouter } from "./routing/capability-router.js";
import { TaskManager } from "./task-manager.js";

export interface RuntimeOptions {
  config?: TaskMeshConfig;
  invoker?: AgentInvoker;
  clock?: Clock;
  logger?: Logger;
  events?: MeshPluginContext & { recent(): MeshEvent[] };
  /** Leave the health monitor stopped after init; probes then run only through runCycle(). */
  manualProbes?: boolean;
  random?: () => number;
}

export interface Runtime {
  config: TaskMeshConfig;
  logger: Logger;
  events: MeshPluginContext & { recent(): MeshEvent[] };
  registry: CapabilityRegistry;
  router: CapabilityRouter;
  monitor: HealthMonitor;
  tasks: TaskManager;
  init(): Promise<void>;
  shutdown(): Promise<void>;
  registerAgent(request: RegisterAgentRequest): AgentDescriptor;
  deregisterAgent(agentId: string): boolean;
  registryStats(): RegistryStats;
}

/** Every config section at its defaults. */
export function defaultConfig(): TaskMeshConfig {
  return configSchema.parse({
    http: {},
    logging: {},
    scheduler: {},
    retry: {},
    routing: {},
    health: {},
    discovery: {},
  });
}

/**
 * Builds the four components as explicit instances sharing one clock, logger
 * and event bus. Nothing is started until init().
 */
export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const config = options.config ?? defaultConfig();
  const clock = options.clock ?? systemClock;
  const logger =
    options.logger ?? createLogger({ level: config.logging.level, pretty: config.logging.pretty });
  const events = options.events ?? createEventBus();
  const invoker = options.invoker ?? new HttpAgentInvoker({ logger });

  const registry = new CapabilityRegistry({
    clock,
    events,
    logger,
    latencyEmaWeight: config.health.latencyEmaWeight,
  });
  const router = new CapabilityRouter(registry, config.routing);
  const monitor = new HealthMonitor(registry, invoker, {
    clock,
    logger,
    probeIntervalMs: config.health.probeIntervalMs,
    probeTimeoutMs: config.health.probeTimeoutMs,
    unreachableAfter: config.health.unreachableAfter,
    maxBackoffMs: config.health.maxBackoffMs,
  });
  const tasks = new TaskManager({
    router,
    invoker,
    clock,
    events,
    logger,
    maxConcurrentTasks: config.scheduler.maxConcurrentTasks,
    laneDepthLimit: config.scheduler.laneDepthLimit,
    defaultTimeoutMs: config.scheduler.defaultTimeoutMs,
    defaultMaxRetries: config.scheduler.defaultMaxRetries,
    retry: config.retry,
    random: options.random,
  });

  let started = false;

  return {
    config,
    logger,
    events,
    registry,
    router,
    monitor,
    tasks,
    async init() {
      if (started) return;
      started = true;
      if (config.discovery.urls.length > 0) {
        await discoverAgents(registry, config.discovery.urls, { logger });
      }
      tasks.init();
      if (!options.manualProbes) monitor.start();
    },
    async shutdown() {
      tasks.shutdown();
      await monitor.stop();
    },
    registerAgent: (request) => registry.register(request),
    deregisterAgent: (agentId) => registry.deregister(agentId),
    registryStats: () => registry.stats(),
  };
}
