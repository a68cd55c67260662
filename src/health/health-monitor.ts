import {
  systemClock,
  type AgentDescriptor,
  type AgentInvoker,
  type Clock,
  type HealthSample,
} from "../contracts.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import type { CapabilityRegistry } from "../registry/capability-registry.js";

export interface HealthMonitorOptions {
  probeIntervalMs?: number;
  probeTimeoutMs?: number;
  /** Consecutive failures before an agent is marked unreachable. */
  unreachableAfter?: number;
  maxBackoffMs?: number;
  clock?: Clock;
  logger?: Logger;
}

interface ProbeState {
  failures: number;
  nextProbeAt: number;
  /** registeredAt of the descriptor this state belongs to. */
  generation: number;
}

export interface ProbeOutcome {
  agentId: string;
  ok: boolean;
  latencyMs: number | null;
  failures: number;
  error?: string;
}

export class HealthMonitor {
  private readonly probeIntervalMs: number;
  private readonly probeTimeoutMs: number;
  private readonly unreachableAfter: number;
  private readonly maxBackoffMs: number;
  /** Interval ticks may land a hair before the scheduled time. */
  private readonly dueSlackMs: number;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly states = new Map<string, ProbeState>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<ProbeOutcome[]> | null = null;

  constructor(
    private readonly registry: CapabilityRegistry,
    private readonly invoker: Pick<AgentInvoker, "probe">,
    options: HealthMonitorOptions = {}
  ) {
    this.probeIntervalMs = options.probeIntervalMs ?? 30_000;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5_000;
    this.unreachableAfter = options.unreachableAfter ?? 3;
    this.maxBackoffMs = options.maxBackoffMs ?? 300_000;
    this.dueSlackMs = Math.min(25, Math.floor(this.probeIntervalMs / 10));
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child({ component: "health-monitor" });
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.runCycle().catch((err) => this.log.error({ err }, "probe cycle failed"));
    }, this.probeIntervalMs);
    this.timer.unref();
    this.runCycle().catch((err) => this.log.error({ err }, "probe cycle failed"));
  }

  async stop(): Promise<void> {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    if (this.inFlight) await this.inFlight;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Probes every agent that is due. A cycle requested while one is in flight
   * joins the running cycle instead of starting another.
   */
  runCycle(): Promise<ProbeOutcome[]> {
    if (this.inFlight) return this.inFlight;
    this.inFlight = this.probeDue().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /** Next scheduled probe time for an agent, if it has been seen. */
  nextProbeAt(agentId: string): number | undefined {
    return this.states.get(agentId)?.nextProbeAt;
  }

  consecutiveFailures(agentId: string): number {
    return this.states.get(agentId)?.failures ?? 0;
  }

  private async probeDue(): Promise<ProbeOutcome[]> {
    const agents = this.registry.listAgents();
    const live = new Set(agents.map((a) => a.agentId));
    for (const agentId of this.states.keys()) {
      if (!live.has(agentId)) this.states.delete(agentId);
    }

    const now = this.clock.now();
    const due = agents.filter((agent) => {
      const state = this.stateFor(agent);
      return state.nextProbeAt <= now + this.dueSlackMs;
    });

    return Promise.all(due.map((agent) => this.probeOne(agent, now)));
  }

  private stateFor(agent: AgentDescriptor): ProbeState {
    const existing = this.states.get(agent.agentId);
    if (existing && existing.generation === agent.registeredAt) return existing;
    const fresh: ProbeState = { failures: 0, nextProbeAt: 0, generation: agent.registeredAt };
    this.states.set(agent.agentId, fresh);
    return fresh;
  }

  /** The next probe is scheduled from cycleStart so probe latency does not stretch the cadence. */
  private async probeOne(agent: AgentDescriptor, cycleStart: number): Promise<ProbeOutcome> {
    const state = this.stateFor(agent);
    const startedAt = this.clock.now();
    let sample: HealthSample;
    let error: string | undefined;

    try {
      sample = await this.boundedProbe(agent);
    } catch (err) {
      error = err instanceof Error ? err.message : String(err);
      sample = { ok: false, detail: error };
    }

    // Dropped or re-registered while the probe was out: the result is stale.
    const current = this.registry.getAgent(agent.agentId);
    if (!current || current.registeredAt !== state.generation) {
      return { agentId: agent.agentId, ok: sample.ok, latencyMs: null, failures: 0, error };
    }

    if (sample.ok) {
      const latencyMs = sample.latencyMs ?? this.clock.now() - startedAt;
      state.failures = 0;
      state.nextProbeAt = cycleStart + this.probeIntervalMs;
      this.registry.updateHealth(agent.agentId, "healthy", latencyMs);
      return { agentId: agent.agentId, ok: true, latencyMs, failures: 0 };
    }

    state.failures += 1;
    const status = state.failures >= this.unreachableAfter ? "unreachable" : "degraded";
    const backoffMs = Math.min(this.maxBackoffMs, this.probeIntervalMs * 2 ** state.failures);
    state.nextProbeAt = cycleStart + backoffMs;
    this.registry.updateHealth(agent.agentId, status);
    this.log.warn(
      {
        agentId: agent.agentId,
        failures: state.failures,
        status,
        backoffMs,
        detail: sample.detail ?? error,
      },
      "agent probe failed"
    );
    return {
      agentId: agent.agentId,
      ok: false,
      latencyMs: null,
      failures: state.failures,
      error: sample.detail ?? error,
    };
  }

  private async boundedProbe(agent: AgentDescriptor): Promise<HealthSample> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new Error(`probe_timeout:${this.probeTimeoutMs}`));
      }, this.probeTimeoutMs);
    });

    try {
      return await Promise.race([
        this.invoker.probe(agent, { timeoutMs: this.probeTimeoutMs, signal: controller.signal }),
        deadline,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
