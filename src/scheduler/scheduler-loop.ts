export type WakeReason =
  | "task-created"
  | "task-completed"
  | "task-failed"
  | "task-cancelled"
  | "timeout-fired"
  | "dependency-unblocked"
  | "retry-ready"
  | "manual";

/**
 * Coalesces wake events into one drain per macrotask. The drain callback is
 * the only place dispatch decisions are made, so every decision sees the
 * state left by all transitions that preceded it.
 */
export class SchedulerLoop {
  private pending: WakeReason[] = [];
  private handle: ReturnType<typeof setImmediate> | null = null;
  private running = false;
  private draining = false;
  private drains = 0;

  constructor(private readonly drain: (reasons: WakeReason[]) => void) {}

  start(): void {
    this.running = true;
    if (this.pending.length > 0) this.schedule();
  }

  stop(): void {
    this.running = false;
    if (this.handle) clearImmediate(this.handle);
    this.handle = null;
    this.pending = [];
  }

  wake(reason: WakeReason): void {
    this.pending.push(reason);
    if (this.running) this.schedule();
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Number of drains run so far. */
  get drainCount(): number {
    return this.drains;
  }

  private schedule(): void {
    if (this.handle || this.draining) return;
    this.handle = setImmediate(() => this.runDrain());
  }

  private runDrain(): void {
    this.handle = null;
    if (!this.running) return;
    const reasons = this.pending;
    this.pending = [];
    this.draining = true;
    try {
      this.drains += 1;
      this.drain(reasons);
    } finally {
      this.draining = false;
    }
    // Wakes raised during the drain get their own pass.
    if (this.pending.length > 0 && this.running) this.schedule();
  }
}
