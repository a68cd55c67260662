export type HealthStatus = "unknown" | "healthy" | "degraded" | "unreachable";

export interface CapabilityDeclaration {
  capabilityId: string;
  /** Agent-declared fitness for the capability, 0..1. */
  confidence: number;
}

export interface RegisterAgentRequest {
  agentId: string;
  /** Opaque to the core; handed to the invoker as-is. */
  endpoint: string;
  capabilities: CapabilityDeclaration[];
  tags?: string[];
  version?: string;
  metadata?: Record<string, unknown>;
}

export interface AgentDescriptor extends RegisterAgentRequest {
  tags: string[];
  healthStatus: HealthStatus;
  lastProbeAt: number | null;
  avgResponseTimeMs: number | null;
  registeredAt: number;
}

export interface CapabilityCandidate {
  agent: AgentDescriptor;
  confidence: number;
}

export interface RouteDecision {
  agent: AgentDescriptor;
  confidence: number;
  score: number;
}

export interface RegistryStats {
  totalAgents: number;
  byHealth: Record<HealthStatus, number>;
  totalCapabilities: number;
  capabilityCoverage: Record<string, number>;
  totalTags: number;
}

// ── Tasks ──────────────────────────────────────────────────────────────────

/** Dispatch order is urgent → high → medium → low; FIFO within a priority. */
export type TaskPriority = "urgent" | "high" | "medium" | "low";

export const PRIORITY_ORDER: readonly TaskPriority[] = ["urgent", "high", "medium", "low"];

export type TaskState = "queued" | "blocked" | "running" | "completed" | "failed" | "cancelled";

export const TASK_STATES: readonly TaskState[] = [
  "queued",
  "blocked",
  "running",
  "completed",
  "failed",
  "cancelled",
];

export type TerminalTaskState = Extract<TaskState, "completed" | "failed" | "cancelled">;

export function isTerminal(state: TaskState): state is TerminalTaskState {
  return state === "completed" || state === "failed" || state === "cancelled";
}

export type FailureReason =
  | "retries_exhausted"
  | "dependency_failed"
  | "dependency_cancelled"
  | "cancelled";

export interface TaskError {
  code: string;
  message: string;
}

export interface CreateTaskRequest {
  capabilityId: string;
  contextId: string;
  priority?: TaskPriority;
  dependencies?: string[];
  timeoutMs?: number;
  maxRetries?: number;
  payload?: unknown;
  /** Caller-chosen id; generated when omitted. */
  taskId?: string;
}

export interface Task {
  taskId: string;
  contextId: string;
  capabilityId: string;
  priority: TaskPriority;
  dependencies: string[];
  state: TaskState;
  payload: unknown;
  createdAt: number;
  queuedAt: number | null;
  startedAt: number | null;
  completedAt: number | null;
  retryCount: number;
  maxRetries: number;
  timeoutMs: number;
  result: unknown;
  error: TaskError | null;
  failureReason: FailureReason | null;
  assignedAgentId: string | null;
}

export interface TaskSnapshot extends Task {
  dependents: string[];
}

export interface TaskStatusEvent {
  taskId: string;
  state: TaskState;
  previousState: TaskState | null;
  at: number;
  retryCount: number;
  error: TaskError | null;
  failureReason: FailureReason | null;
}

export interface CancelTaskResult {
  taskId: string;
  /** False when the task was already terminal. */
  cancelled: boolean;
  state: TaskState;
}

export interface ManagerStats {
  totalTasks: number;
  byState: Record<TaskState, number>;
  running: number;
  maxConcurrentTasks: number;
  laneDepths: Record<TaskPriority, number>;
  meanQueuedToCompletedMs: number | null;
  retryRate: number;
  retriesScheduled: number;
  /** Status streams currently being iterated. */
  openStreams: number;
}

// ── Boundaries ─────────────────────────────────────────────────────────────

export interface InvocationRequest {
  taskId: string;
  capabilityId: string;
  payload: unknown;
  agent: AgentDescriptor;
  timeoutMs: number;
  /** Aborted on timeout or cancellation; honouring it is best effort. */
  signal: AbortSignal;
}

export interface HealthSample {
  ok: boolean;
  latencyMs?: number;
  detail?: string;
}

export interface AgentInvoker {
  invoke(request: InvocationRequest): Promise<unknown>;
  probe(
    agent: AgentDescriptor,
    options: { timeoutMs: number; signal: AbortSignal }
  ): Promise<HealthSample>;
}

/** Monotonic milliseconds. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => performance.timeOrigin + performance.now(),
};
