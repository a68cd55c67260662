export class MeshError extends Error {
  readonly code: string;
  readonly detail?: Record<string, unknown>;

  constructor(code: string, message: string, detail?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.detail = detail;
  }
}

/** Malformed arguments; rejected before anything is created. */
export class ValidationError extends MeshError {
  constructor(message: string, detail?: Record<string, unknown>) {
    super("validation_failed", message, detail);
  }
}

export class CycleError extends MeshError {
  readonly path: string[];

  constructor(path: string[]) {
    super("dependency_cycle", `dependency cycle: ${path.join(" -> ")}`, { path });
    this.path = path;
  }
}

export class ResourceExhaustedError extends MeshError {
  constructor(lane: string, limit: number) {
    super("lane_full", `lane ${lane} is at its depth limit (${limit})`, { lane, limit });
  }
}

/** No live agent declares the capability. Retryable. */
export class NotFoundError extends MeshError {
  constructor(capabilityId: string) {
    super("no_live_agent", `no live agent for capability ${capabilityId}`, { capabilityId });
  }
}

/** Remote invocation failed. Retryable. */
export class DispatchError extends MeshError {
  constructor(message: string, detail?: Record<string, unknown>) {
    super("dispatch_failed", message, detail);
  }
}

/** Named to avoid shadowing the DOM-style global TimeoutError. Retryable. */
export class TaskTimeoutError extends MeshError {
  constructor(taskId: string, timeoutMs: number) {
    super("task_timeout", `task ${taskId} exceeded ${timeoutMs}ms`, { taskId, timeoutMs });
  }
}

/** Assigned during a cascade; never retried. */
export class DependencyFailedError extends MeshError {
  constructor(taskId: string, dependencyId: string) {
    super("dependency_failed", `dependency ${dependencyId} of ${taskId} did not complete`, {
      taskId,
      dependencyId,
    });
  }
}

export class TaskNotFoundError extends MeshError {
  constructor(taskId: string) {
    super("task_not_found", `task ${taskId} not found`, { taskId });
  }
}

export class AgentNotFoundError extends MeshError {
  constructor(agentId: string) {
    super("agent_not_found", `agent ${agentId} not found`, { agentId });
  }
}

export function toTaskError(err: unknown): { code: string; message: string } {
  if (err instanceof MeshError) return { code: err.code, message: err.message };
  if (err instanceof Error) return { code: "dispatch_failed", message: err.message };
  return { code: "dispatch_failed", message: String(err) };
}
