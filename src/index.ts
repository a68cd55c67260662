export * from "./contracts.js";
export * from "./errors.js";
export { loadConfig, configSchema, type TaskMeshConfig } from "./config.js";
export { createLogger, logger, type Logger } from "./logger.js";
export { CapabilityRegistry, type CapabilityRegistryOptions } from "./registry/capability-registry.js";
export { discoverAgents, agentCardSchema, type AgentCard } from "./registry/discovery.js";
export { CapabilityRouter, scoreCandidates, type RouterWeights } from "./routing/capability-router.js";
export { HealthMonitor, type HealthMonitorOptions, type ProbeOutcome } from "./health/health-monitor.js";
export { TaskManager, type TaskManagerOptions, type TaskFilter } from "./task-manager.js";
export { HttpAgentInvoker, type HttpAgentInvokerOptions } from "./invokers/http-invoker.js";
export { createRuntime, defaultConfig, type Runtime, type RuntimeOptions } from "./runtime.js";
export { buildControlPlane, startControlPlane, type ControlPlaneOptions } from "./control-plane.js";
export { createEventBus, type MeshEvent, type MeshPlugin, type MeshPluginContext } from "./plugins/types.js";
export { createTelemetryPlugin, type TelemetryPlugin } from "./plugins/telemetry-plugin.js";
