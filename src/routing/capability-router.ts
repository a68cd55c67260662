import type { CapabilityCandidate, RouteDecision } from "../contracts.js";
import { NotFoundError } from "../errors.js";
import type { CapabilityRegistry } from "../registry/capability-registry.js";

export interface RouterWeights {
  confidenceWeight: number;
  latencyWeight: number;
}

const DEFAULT_WEIGHTS: RouterWeights = { confidenceWeight: 0.7, latencyWeight: 0.3 };

/**
 * Picks one live agent per request. Reads the registry on every call and keeps
 * nothing between calls, so a route always reflects the latest health.
 */
export class CapabilityRouter {
  private readonly weights: RouterWeights;

  constructor(
    private readonly registry: CapabilityRegistry,
    weights: Partial<RouterWeights> = {}
  ) {
    this.weights = { ...DEFAULT_WEIGHTS, ...weights };
  }

  route(capabilityId: string): RouteDecision {
    const ranked = this.rank(capabilityId);
    const best = ranked[0];
    if (!best) throw new NotFoundError(capabilityId);
    return best;
  }

  /** All eligible candidates, best first. Empty when nothing is live. */
  rank(capabilityId: string): RouteDecision[] {
    const candidates = this.registry.findByCapability(capabilityId);

    let eligible = candidates.filter(
      (c) => c.agent.healthStatus === "healthy" || c.agent.healthStatus === "unknown"
    );
    if (eligible.length === 0) {
      eligible = candidates.filter((c) => c.agent.healthStatus === "degraded");
    }
    if (eligible.length === 0) return [];

    return scoreCandidates(eligible, this.weights).sort(
      (a, b) =>
        b.score - a.score ||
        (a.agent.agentId < b.agent.agentId ? -1 : a.agent.agentId > b.agent.agentId ? 1 : 0)
    );
  }
}

export function scoreCandidates(
  candidates: CapabilityCandidate[],
  weights: RouterWeights = DEFAULT_WEIGHTS
): RouteDecision[] {
  const maxLatency = Math.max(0, ...candidates.map((c) => c.agent.avgResponseTimeMs ?? 0));

  return candidates.map(({ agent, confidence }) => {
    const normalizedLatency =
      candidates.length > 1 && maxLatency > 0 && agent.avgResponseTimeMs !== null
        ? agent.avgResponseTimeMs / maxLatency
        : 0;
    const score =
      weights.confidenceWeight * confidence + weights.latencyWeight * (1 - normalizedLatency);
    return { agent, confidence, score };
  });
}
