import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  isTerminal,
  systemClock,
  type AgentInvoker,
  type CancelTaskResult,
  type Clock,
  type CreateTaskRequest,
  type ManagerStats,
  type RouteDecision,
  type Task,
  type TaskSnapshot,
  type TaskState,
  type TaskStatusEvent,
} from "./contracts.js";
import { computeRetryDecision, type RetryPolicyOptions } from "./control/retry-policy.js";
import { armTimeout, MAX_TIMER_DELAY_MS, type TimeoutGuard } from "./control/timeout-guard.js";
import {
  CycleError,
  DependencyFailedError,
  TaskNotFoundError,
  TaskTimeoutError,
  ValidationError,
  toTaskError,
} from "./errors.js";
import { logger as rootLogger, type Logger } from "./logger.js";
import type { EventSink } from "./plugins/types.js";
import { isCapabilityId } from "./registry/capability-registry.js";
import type { CapabilityRouter } from "./routing/capability-router.js";
import { DependencyGraph } from "./scheduler/dependency-graph.js";
import { PriorityLanes } from "./scheduler/priority-lanes.js";
import { SchedulerLoop, type WakeReason } from "./scheduler/scheduler-loop.js";

const createTaskSchema = z.object({
  capabilityId: z.string().refine(isCapabilityId, "invalid capability id"),
  contextId: z.string().min(1),
  priority: z.enum(["urgent", "high", "medium", "low"]).default("medium"),
  dependencies: z.array(z.string().min(1)).default([]),
  timeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).optional(),
  maxRetries: z.number().int().min(0).optional(),
  payload: z.unknown().optional(),
  taskId: z.string().min(1).optional(),
});

export interface TaskManagerOptions {
  router: CapabilityRouter;
  invoker: Pick<AgentInvoker, "invoke">;
  clock?: Clock;
  events?: EventSink;
  logger?: Logger;
  maxConcurrentTasks?: number;
  /** Applies to new submissions only; promotions and retries always enter their lane. */
  laneDepthLimit?: number;
  defaultTimeoutMs?: number;
  defaultMaxRetries?: number;
  retry?: RetryPolicyOptions;
  /** Jitter source, in [0, 1). */
  random?: () => number;
}

export interface TaskFilter {
  state?: TaskState;
  contextId?: string;
}

type StatusListener = (event: TaskStatusEvent) => void;

interface TaskEntry {
  task: Task;
  /** Bumped on every dispatch; a settlement carrying an older value is stale. */
  attempt: number;
  controller: AbortController | null;
  guard: TimeoutGuard | null;
  retryTimer: ReturnType<typeof setTimeout> | null;
}

type Settlement = { ok: true; result: unknown } | { ok: false; error: unknown };

/**
 * Owns every task record. All transitions happen synchronously on the event
 * loop; dispatch decisions are made only inside the scheduler drain.
 */
export class TaskManager {
  private readonly tasks = new Map<string, TaskEntry>();
  private readonly graph = new DependencyGraph();
  private readonly lanes: PriorityLanes;
  private readonly loop: SchedulerLoop;
  private readonly inFlight = new Set<string>();
  private readonly listeners = new Set<StatusListener>();
  private readonly streamClosers = new Set<() => void>();
  private readonly router: CapabilityRouter;
  private readonly invoker: Pick<AgentInvoker, "invoke">;
  private readonly clock: Clock;
  private readonly events?: EventSink;
  private readonly log: Logger;
  private readonly maxConcurrentTasks: number;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxRetries: number;
  private readonly retryOptions: RetryPolicyOptions;
  private readonly random: () => number;
  private lifecycle: "idle" | "running" | "stopped" = "idle";
  private retriesScheduled = 0;

  constructor(options: TaskManagerOptions) {
    this.router = options.router;
    this.invoker = options.invoker;
    this.clock = options.clock ?? systemClock;
    this.events = options.events;
    this.log = (options.logger ?? rootLogger).child({ component: "task-manager" });
    this.maxConcurrentTasks = options.maxConcurrentTasks ?? 10;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30_000;
    this.defaultMaxRetries = options.defaultMaxRetries ?? 3;
    this.retryOptions = options.retry ?? {};
    this.random = options.random ?? Math.random;
    this.lanes = new PriorityLanes(options.laneDepthLimit);
    this.loop = new SchedulerLoop((reasons) => this.drain(reasons));
  }

  init(): void {
    if (this.lifecycle !== "idle") return;
    this.lifecycle = "running";
    this.loop.start();
    this.loop.wake("manual");
  }

  shutdown(): void {
    if (this.lifecycle === "stopped") return;
    this.lifecycle = "stopped";
    this.loop.stop();
    for (const entry of this.tasks.values()) this.release(entry, "task manager stopped");
    this.inFlight.clear();
    for (const close of [...this.streamClosers]) close();
    this.log.info({ tasks: this.tasks.size }, "task manager stopped");
  }

  get isRunning(): boolean {
    return this.lifecycle === "running";
  }

  createTask(input: CreateTaskRequest): string {
    if (this.lifecycle === "stopped") {
      throw new ValidationError("manager_stopped: task manager is shut down");
    }

    const parsed = createTaskSchema.safeParse(input);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
        .join("; ");
      throw new ValidationError(detail);
    }
    const request = parsed.data;
    const taskId = request.taskId ?? randomUUID();
    const dependencies = [...new Set(request.dependencies)];

    if (this.tasks.has(taskId)) {
      throw new ValidationError(`duplicate_task: ${taskId} already exists`, { taskId });
    }
    const cycle = this.graph.findCycle(taskId, dependencies);
    if (cycle) throw new CycleError(cycle);

    const depEntries: TaskEntry[] = [];
    for (const dependencyId of dependencies) {
      const dependency = this.tasks.get(dependencyId);
      if (!dependency) {
        throw new ValidationError(`unknown_dependency: ${dependencyId}`, { taskId, dependencyId });
      }
      depEntries.push(dependency);
    }

    const failedDep = depEntries.find((d) => d.task.state === "failed");
    const cancelledDep = depEntries.find((d) => d.task.state === "cancelled");
    const ready = depEntries.every((d) => d.task.state === "completed");

    let initial: TaskState;
    if (failedDep) initial = "failed";
    else if (cancelledDep) initial = "cancelled";
    else if (ready) initial = "queued";
    else initial = "blocked";

    if (initial === "queued") this.lanes.push(taskId, request.priority, { enforceLimit: true });

    const now = this.clock.now();
    const task: Task = {
      taskId,
      contextId: request.contextId,
      capabilityId: request.capabilityId,
      priority: request.priority,
      dependencies,
      state: initial,
      payload: request.payload ?? null,
      createdAt: now,
      queuedAt: initial === "queued" ? now : null,
      startedAt: null,
      completedAt: null,
      retryCount: 0,
      maxRetries: request.maxRetries ?? this.defaultMaxRetries,
      timeoutMs: request.timeoutMs ?? this.defaultTimeoutMs,
      result: null,
      error: null,
      failureReason: null,
      assignedAgentId: null,
    };
    if (failedDep) {
      task.failureReason = "dependency_failed";
      task.error = toTaskError(new DependencyFailedError(taskId, failedDep.task.taskId));
      task.completedAt = now;
    } else if (cancelledDep) {
      task.failureReason = "dependency_cancelled";
      task.completedAt = now;
    }

    const entry: TaskEntry = { task, attempt: 0, controller: null, guard: null, retryTimer: null };
    this.tasks.set(taskId, entry);
    this.graph.addNode(taskId, dependencies);

    this.log.info(
      { taskId, capabilityId: task.capabilityId, priority: task.priority, state: initial },
      "task created"
    );
    this.events?.emit({
      type: "task.created",
      at: now,
      taskId,
      detail: { capabilityId: task.capabilityId, priority: task.priority, contextId: task.contextId },
    });
    this.publish(entry, null);

    if (initial === "queued") this.loop.wake("task-created");
    return taskId;
  }

  /** Makes a not-yet-started task wait on one more task. */
  addDependency(taskId: string, dependencyId: string): TaskSnapshot {
    const entry = this.require(taskId);
    const dependency = this.require(dependencyId);
    const { task } = entry;

    if ((task.state !== "blocked" && task.state !== "queued") || entry.retryTimer) {
      throw new ValidationError(`task ${taskId} has already started (${task.state})`, {
        taskId,
        state: task.state,
      });
    }
    if (dependency.task.state === "failed" || dependency.task.state === "cancelled") {
      throw new ValidationError(`dependency ${dependencyId} is ${dependency.task.state}`, {
        taskId,
        dependencyId,
      });
    }
    if (task.dependencies.includes(dependencyId)) return this.snapshot(entry);

    const cycle = this.graph.findCycle(taskId, [dependencyId]);
    if (cycle) throw new CycleError(cycle);

    this.graph.addEdge(taskId, dependencyId);
    task.dependencies.push(dependencyId);

    if (dependency.task.state !== "completed" && task.state === "queued") {
      this.lanes.remove(taskId);
      this.transition(entry, "blocked");
    }
    return this.snapshot(entry);
  }

  cancelTask(taskId: string): CancelTaskResult {
    const entry = this.require(taskId);
    const { task } = entry;
    if (isTerminal(task.state)) return { taskId, cancelled: false, state: task.state };

    this.release(entry, "cancelled");
    task.failureReason = "cancelled";
    task.completedAt = this.clock.now();
    this.transition(entry, "cancelled");
    this.log.info({ taskId }, "task cancelled");

    this.cascade(taskId, "cancelled");
    this.loop.wake("task-cancelled");
    return { taskId, cancelled: true, state: task.state };
  }

  getTask(taskId: string): TaskSnapshot {
    return this.snapshot(this.require(taskId));
  }

  listTasks(filter: TaskFilter = {}): TaskSnapshot[] {
    const result: TaskSnapshot[] = [];
    for (const entry of this.tasks.values()) {
      if (filter.state && entry.task.state !== filter.state) continue;
      if (filter.contextId && entry.task.contextId !== filter.contextId) continue;
      result.push(this.snapshot(entry));
    }
    return result;
  }

  /** Listener for every task's state changes; returns the remover. */
  subscribe(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Current state first, then every change, ending after a terminal state,
   * on shutdown, or when `signal` aborts. Throws TaskNotFoundError
   * immediately for an unknown id.
   */
  streamStatus(
    taskId: string,
    options: { signal?: AbortSignal } = {}
  ): AsyncGenerator<TaskStatusEvent> {
    return this.follow(this.require(taskId), options.signal);
  }

  /** Subscribes on the first next(); a stream closed before then holds nothing. */
  private async *follow(entry: TaskEntry, signal?: AbortSignal): AsyncGenerator<TaskStatusEvent> {
    const { taskId } = entry.task;
    const buffer: TaskStatusEvent[] = [this.currentStatus(entry)];
    let ended = isTerminal(entry.task.state) || this.lifecycle === "stopped" || signal?.aborted === true;
    let notify: (() => void) | null = null;

    const unsubscribe = ended
      ? () => undefined
      : this.subscribe((event) => {
          if (event.taskId !== taskId) return;
          buffer.push(event);
          notify?.();
        });
    const close = () => {
      ended = true;
      notify?.();
    };
    this.streamClosers.add(close);
    signal?.addEventListener("abort", close, { once: true });

    try {
      for (;;) {
        const next = buffer.shift();
        if (next) {
          yield next;
          if (isTerminal(next.state)) return;
          continue;
        }
        if (ended) return;
        await new Promise<void>((resolve) => {
          notify = resolve;
        });
        notify = null;
      }
    } finally {
      unsubscribe();
      this.streamClosers.delete(close);
      signal?.removeEventListener("abort", close);
    }
  }

  managerStats(): ManagerStats {
    const byState: Record<TaskState, number> = {
      queued: 0,
      blocked: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    let retried = 0;
    let completed = 0;
    let queuedToCompleted = 0;

    for (const { task } of this.tasks.values()) {
      byState[task.state] += 1;
      if (task.retryCount > 0) retried += 1;
      if (task.state === "completed" && task.queuedAt !== null && task.completedAt !== null) {
        completed += 1;
        queuedToCompleted += task.completedAt - task.queuedAt;
      }
    }

    return {
      totalTasks: this.tasks.size,
      byState,
      running: this.inFlight.size,
      maxConcurrentTasks: this.maxConcurrentTasks,
      laneDepths: this.lanes.depthsByPriority(),
      meanQueuedToCompletedMs: completed > 0 ? queuedToCompleted / completed : null,
      retryRate: this.tasks.size > 0 ? retried / this.tasks.size : 0,
      retriesScheduled: this.retriesScheduled,
      openStreams: this.streamClosers.size,
    };
  }

  // ── Scheduling ───────────────────────────────────────────────────────────

  private drain(reasons: WakeReason[]): void {
    let dispatched = 0;
    while (this.inFlight.size < this.maxConcurrentTasks) {
      const head = this.lanes.shift();
      if (!head) break;
      const entry = this.tasks.get(head.taskId);
      if (!entry || entry.task.state !== "queued") continue;
      this.dispatch(entry);
      dispatched += 1;
    }
    if (dispatched > 0) {
      this.log.debug({ reasons, dispatched, running: this.inFlight.size }, "scheduler drain");
    }
  }

  private dispatch(entry: TaskEntry): void {
    const { task } = entry;

    let decision: RouteDecision;
    try {
      decision = this.router.route(task.capabilityId);
    } catch (err) {
      this.fail(entry, err);
      return;
    }

    const attempt = ++entry.attempt;
    const controller = new AbortController();
    entry.controller = controller;
    task.startedAt = this.clock.now();
    task.assignedAgentId = decision.agent.agentId;
    this.inFlight.add(task.taskId);
    this.transition(entry, "running", { agentId: decision.agent.agentId, attempt });

    entry.guard = armTimeout(task.timeoutMs, () => this.onTimeout(entry, attempt));

    const request = {
      taskId: task.taskId,
      capabilityId: task.capabilityId,
      payload: task.payload,
      agent: decision.agent,
      timeoutMs: task.timeoutMs,
      signal: controller.signal,
    };
    Promise.resolve()
      .then(() => this.invoker.invoke(request))
      .then(
        (result) => this.settle(entry, attempt, { ok: true, result }),
        (error: unknown) => this.settle(entry, attempt, { ok: false, error })
      )
      .catch((err: unknown) => this.log.error({ err, taskId: task.taskId }, "settlement failed"));
  }

  private settle(entry: TaskEntry, attempt: number, outcome: Settlement): void {
    if (this.lifecycle === "stopped") return;
    const { task } = entry;
    if (entry.attempt !== attempt || task.state !== "running") {
      this.anomaly(entry, attempt, outcome.ok ? "late_completion" : "late_failure");
      return;
    }

    entry.guard?.disarm();
    entry.guard = null;
    entry.controller = null;
    this.inFlight.delete(task.taskId);

    if (outcome.ok) {
      this.complete(entry, outcome.result);
      this.loop.wake("task-completed");
    } else {
      this.fail(entry, outcome.error);
      this.loop.wake("task-failed");
    }
  }

  private onTimeout(entry: TaskEntry, attempt: number): void {
    const { task } = entry;
    if (entry.attempt !== attempt || task.state !== "running") return;

    const error = new TaskTimeoutError(task.taskId, task.timeoutMs);
    entry.guard = null;
    entry.controller?.abort(error);
    entry.controller = null;
    this.inFlight.delete(task.taskId);
    this.log.warn({ taskId: task.taskId, timeoutMs: task.timeoutMs, attempt }, "task timed out");

    this.fail(entry, error);
    this.loop.wake("timeout-fired");
  }

  private complete(entry: TaskEntry, result: unknown): void {
    const { task } = entry;
    task.result = result ?? null;
    task.completedAt = this.clock.now();
    this.transition(entry, "completed");
    this.log.info(
      { taskId: task.taskId, agentId: task.assignedAgentId, retryCount: task.retryCount },
      "task completed"
    );

    let promoted = 0;
    for (const dependentId of this.graph.dependentsOf(task.taskId)) {
      const dependent = this.tasks.get(dependentId);
      if (!dependent || dependent.task.state !== "blocked") continue;
      const ready = dependent.task.dependencies.every(
        (id) => this.tasks.get(id)?.task.state === "completed"
      );
      if (!ready) continue;
      dependent.task.queuedAt ??= this.clock.now();
      this.lanes.push(dependentId, dependent.task.priority);
      this.transition(dependent, "queued");
      promoted += 1;
    }
    if (promoted > 0) this.loop.wake("dependency-unblocked");
  }

  /** Failed attempt: schedule a retry or, when exhausted, fail the task and its dependents. */
  private fail(entry: TaskEntry, err: unknown): void {
    const { task } = entry;
    task.error = toTaskError(err);

    const decision = computeRetryDecision(task, this.retryOptions, this.random);
    if (decision.retry) {
      task.retryCount = decision.nextRetryCount;
      this.retriesScheduled += 1;
      if (task.state !== "queued") this.transition(entry, "queued");
      this.log.warn(
        { taskId: task.taskId, retryCount: task.retryCount, delayMs: decision.delayMs, error: task.error },
        "task retry scheduled"
      );
      this.events?.emit({
        type: "task.retry_scheduled",
        at: this.clock.now(),
        taskId: task.taskId,
        detail: { retryCount: task.retryCount, delayMs: decision.delayMs, error: task.error.code },
      });
      entry.retryTimer = setTimeout(() => {
        entry.retryTimer = null;
        if (task.state !== "queued") return;
        this.lanes.push(task.taskId, task.priority);
        this.loop.wake("retry-ready");
      }, decision.delayMs);
      return;
    }

    task.failureReason = "retries_exhausted";
    task.completedAt = this.clock.now();
    this.transition(entry, "failed");
    this.log.error(
      { taskId: task.taskId, retryCount: task.retryCount, error: task.error },
      "task failed"
    );
    this.cascade(task.taskId, "failed");
  }

  /** One sweep over every transitive dependent that is not yet terminal. */
  private cascade(rootId: string, outcome: "failed" | "cancelled"): void {
    const affected: string[] = [];
    for (const dependentId of this.graph.transitiveDependents(rootId)) {
      const dependent = this.tasks.get(dependentId);
      if (!dependent || isTerminal(dependent.task.state)) continue;
      this.release(dependent, `dependency ${rootId} ${outcome}`);
      dependent.task.completedAt = this.clock.now();
      if (outcome === "failed") {
        dependent.task.failureReason = "dependency_failed";
        dependent.task.error = toTaskError(new DependencyFailedError(dependentId, rootId));
      } else {
        dependent.task.failureReason = "dependency_cancelled";
      }
      this.transition(dependent, outcome, { cause: rootId });
      affected.push(dependentId);
    }
    if (affected.length > 0) {
      this.log.warn({ taskId: rootId, outcome, affected }, "dependents swept");
    }
  }

  /** Drops lane membership, the retry timer, the timeout and any in-flight invocation. */
  private release(entry: TaskEntry, reason: string): void {
    const { taskId } = entry.task;
    this.lanes.remove(taskId);
    if (entry.retryTimer) clearTimeout(entry.retryTimer);
    entry.retryTimer = null;
    entry.guard?.disarm();
    entry.guard = null;
    entry.controller?.abort(new Error(reason));
    entry.controller = null;
    this.inFlight.delete(taskId);
  }

  private anomaly(entry: TaskEntry, attempt: number, kind: string): void {
    const { task } = entry;
    this.log.warn(
      { taskId: task.taskId, attempt, currentAttempt: entry.attempt, state: task.state, kind },
      "stale settlement ignored"
    );
    this.events?.emit({
      type: "task.anomaly",
      at: this.clock.now(),
      taskId: task.taskId,
      detail: { kind, attempt, state: task.state },
    });
  }

  // ── State changes ────────────────────────────────────────────────────────

  private transition(entry: TaskEntry, next: TaskState, detail: Record<string, unknown> = {}): void {
    const previous = entry.task.state;
    entry.task.state = next;
    this.publish(entry, previous, detail);
  }

  private publish(entry: TaskEntry, previous: TaskState | null, detail: Record<string, unknown> = {}): void {
    const event = { ...this.currentStatus(entry), previousState: previous };
    this.events?.emit({
      type: `task.${event.state}`,
      at: event.at,
      taskId: event.taskId,
      detail: { from: previous, retryCount: event.retryCount, ...detail },
    });
    for (const listener of [...this.listeners]) listener(event);
  }

  private currentStatus(entry: TaskEntry): TaskStatusEvent {
    const { task } = entry;
    return {
      taskId: task.taskId,
      state: task.state,
      previousState: null,
      at: this.clock.now(),
      retryCount: task.retryCount,
      error: task.error ? { ...task.error } : null,
      failureReason: task.failureReason,
    };
  }

  private require(taskId: string): TaskEntry {
    const entry = this.tasks.get(taskId);
    if (!entry) throw new TaskNotFoundError(taskId);
    return entry;
  }

  private snapshot(entry: TaskEntry): TaskSnapshot {
    const { task } = entry;
    return {
      ...task,
      dependencies: [...task.dependencies],
      error: task.error ? { ...task.error } : null,
      dependents: this.graph.dependentsOf(task.taskId),
    };
  }
}
