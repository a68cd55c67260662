import {
  systemClock,
  type AgentDescriptor,
  type CapabilityCandidate,
  type Clock,
  type HealthStatus,
  type RegisterAgentRequest,
  type RegistryStats,
} from "../contracts.js";
import { ValidationError } from "../errors.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import type { EventSink } from "../plugins/types.js";

const CAPABILITY_ID = /^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/;

export interface CapabilityRegistryOptions {
  clock?: Clock;
  events?: EventSink;
  logger?: Logger;
  /** Weight of a new latency sample in the moving average. */
  latencyEmaWeight?: number;
}

/**
 * Known agents, indexed by capability and by tag. Every method runs to
 * completion synchronously, so index rebuilds are never observed half done.
 */
export class CapabilityRegistry {
  private readonly agents = new Map<string, AgentDescriptor>();
  /** capabilityId → agentId → declared confidence */
  private readonly capabilityIndex = new Map<string, Map<string, number>>();
  private readonly tagIndex = new Map<string, Set<string>>();
  private readonly clock: Clock;
  private readonly events?: EventSink;
  private readonly log: Logger;
  private readonly emaWeight: number;

  constructor(options: CapabilityRegistryOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.events = options.events;
    this.log = (options.logger ?? rootLogger).child({ component: "capability-registry" });
    this.emaWeight = options.latencyEmaWeight ?? 0.3;
  }

  register(input: RegisterAgentRequest): AgentDescriptor {
    validateRegistration(input);

    const capabilities = new Map<string, number>();
    for (const declaration of input.capabilities) {
      // Last declaration of a repeated capability wins.
      capabilities.set(declaration.capabilityId, declaration.confidence);
    }
    const tags = [...new Set(input.tags ?? [])];

    const descriptor: AgentDescriptor = {
      agentId: input.agentId,
      endpoint: input.endpoint,
      capabilities: [...capabilities].map(([capabilityId, confidence]) => ({
        capabilityId,
        confidence,
      })),
      tags,
      version: input.version,
      metadata: input.metadata,
      healthStatus: "unknown",
      lastProbeAt: null,
      avgResponseTimeMs: null,
      registeredAt: this.clock.now(),
    };

    const replaced = this.agents.has(input.agentId);
    this.unindex(input.agentId);
    this.agents.set(descriptor.agentId, descriptor);
    for (const [capabilityId, confidence] of capabilities) {
      this.ensureCapability(capabilityId).set(descriptor.agentId, confidence);
    }
    for (const tag of tags) {
      this.ensureTag(tag).add(descriptor.agentId);
    }

    this.log.info(
      { agentId: descriptor.agentId, capabilities: [...capabilities.keys()], replaced },
      "agent registered"
    );
    this.events?.emit({
      type: "agent.registered",
      at: this.clock.now(),
      agentId: descriptor.agentId,
      detail: { replaced, capabilities: descriptor.capabilities.length },
    });
    return copyDescriptor(descriptor);
  }

  deregister(agentId: string): boolean {
    if (!this.agents.has(agentId)) return false;
    this.unindex(agentId);
    this.agents.delete(agentId);
    this.log.info({ agentId }, "agent deregistered");
    this.events?.emit({ type: "agent.deregistered", at: this.clock.now(), agentId });
    return true;
  }

  findByCapability(capabilityId: string): CapabilityCandidate[] {
    const entries = this.capabilityIndex.get(capabilityId);
    if (!entries) return [];
    const candidates: CapabilityCandidate[] = [];
    for (const [agentId, confidence] of entries) {
      const agent = this.agents.get(agentId);
      if (agent) candidates.push({ agent: copyDescriptor(agent), confidence });
    }
    return candidates.sort((a, b) => compareIds(a.agent.agentId, b.agent.agentId));
  }

  findByTag(tag: string): AgentDescriptor[] {
    const ids = this.tagIndex.get(tag);
    if (!ids) return [];
    return [...ids]
      .sort(compareIds)
      .map((id) => this.agents.get(id))
      .filter((agent): agent is AgentDescriptor => agent !== undefined)
      .map(copyDescriptor);
  }

  getAgent(agentId: string): AgentDescriptor | undefined {
    const agent = this.agents.get(agentId);
    return agent ? copyDescriptor(agent) : undefined;
  }

  listAgents(): AgentDescriptor[] {
    return [...this.agents.values()]
      .sort((a, b) => compareIds(a.agentId, b.agentId))
      .map(copyDescriptor);
  }

  updateHealth(agentId: string, status: HealthStatus, latencySampleMs?: number): void {
    const agent = this.agents.get(agentId);
    if (!agent) return;

    const previous = agent.healthStatus;
    agent.healthStatus = status;
    agent.lastProbeAt = this.clock.now();
    if (latencySampleMs !== undefined && Number.isFinite(latencySampleMs) && latencySampleMs >= 0) {
      agent.avgResponseTimeMs =
        agent.avgResponseTimeMs === null
          ? latencySampleMs
          : this.emaWeight * latencySampleMs + (1 - this.emaWeight) * agent.avgResponseTimeMs;
    }

    if (previous !== status) {
      this.log.info({ agentId, from: previous, to: status }, "agent health changed");
      this.events?.emit({
        type: "agent.health",
        at: agent.lastProbeAt,
        agentId,
        detail: { from: previous, to: status },
      });
    }
  }

  stats(): RegistryStats {
    const byHealth: Record<HealthStatus, number> = {
      unknown: 0,
      healthy: 0,
      degraded: 0,
      unreachable: 0,
    };
    for (const agent of this.agents.values()) byHealth[agent.healthStatus] += 1;

    const capabilityCoverage: Record<string, number> = {};
    for (const [capabilityId, entries] of this.capabilityIndex) {
      capabilityCoverage[capabilityId] = entries.size;
    }

    return {
      totalAgents: this.agents.size,
      byHealth,
      totalCapabilities: this.capabilityIndex.size,
      capabilityCoverage,
      totalTags: this.tagIndex.size,
    };
  }

  get size(): number {
    return this.agents.size;
  }

  private unindex(agentId: string): void {
    const existing = this.agents.get(agentId);
    if (!existing) return;
    for (const { capabilityId } of existing.capabilities) {
      const entries = this.capabilityIndex.get(capabilityId);
      if (!entries) continue;
      entries.delete(agentId);
      if (entries.size === 0) this.capabilityIndex.delete(capabilityId);
    }
    for (const tag of existing.tags) {
      const ids = this.tagIndex.get(tag);
      if (!ids) continue;
      ids.delete(agentId);
      if (ids.size === 0) this.tagIndex.delete(tag);
    }
  }

  private ensureCapability(capabilityId: string): Map<string, number> {
    let entries = this.capabilityIndex.get(capabilityId);
    if (!entries) {
      entries = new Map();
      this.capabilityIndex.set(capabilityId, entries);
    }
    return entries;
  }

  private ensureTag(tag: string): Set<string> {
    let ids = this.tagIndex.get(tag);
    if (!ids) {
      ids = new Set();
      this.tagIndex.set(tag, ids);
    }
    return ids;
  }
}

export function isCapabilityId(value: string): boolean {
  return CAPABILITY_ID.test(value);
}

function validateRegistration(input: RegisterAgentRequest): void {
  if (!input.agentId) throw new ValidationError("agentId is required");
  if (typeof input.endpoint !== "string") {
    throw new ValidationError("endpoint must be a string", { agentId: input.agentId });
  }
  for (const { capabilityId, confidence } of input.capabilities) {
    if (!isCapabilityId(capabilityId)) {
      throw new ValidationError(`invalid capability id: ${capabilityId}`, {
        agentId: input.agentId,
      });
    }
    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
      throw new ValidationError(`confidence for ${capabilityId} must be within 0..1`, {
        agentId: input.agentId,
      });
    }
  }
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function copyDescriptor(agent: AgentDescriptor): AgentDescriptor {
  return {
    ...agent,
    capabilities: agent.capabilities.map((c) => ({ ...c })),
    tags: [...agent.tags],
    metadata: agent.metadata ? { ...agent.metadata } : undefined,
  };
}
