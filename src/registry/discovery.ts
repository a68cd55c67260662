import { z } from "zod";
import { joinUrl } from "../invokers/http-invoker.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import type { CapabilityRegistry } from "./capability-registry.js";

export const agentCardSchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1).optional(),
  version: z.string().optional(),
  tags: z.array(z.string()).optional(),
  skills: z.array(
    z.object({
      id: z.string().min(1),
      confidence: z.number().min(0).max(1).default(1),
    })
  ),
});

export type AgentCard = z.output<typeof agentCardSchema>;

export interface DiscoveryOptions {
  logger?: Logger;
  fetch?: typeof fetch;
  timeoutMs?: number;
}

/**
 * Fetches `{url}/agent-card` from every base URL and registers what it finds.
 * A card that cannot be fetched or parsed is logged and skipped.
 * Returns the number of agents registered.
 */
export async function discoverAgents(
  registry: CapabilityRegistry,
  urls: readonly string[],
  options: DiscoveryOptions = {}
): Promise<number> {
  const log = (options.logger ?? rootLogger).child({ component: "discovery" });
  const fetchImpl = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? 5_000;

  const results = await Promise.allSettled(
    urls.map(async (base) => {
      const res = await fetchImpl(joinUrl(base, "/agent-card"), {
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!res.ok) throw new Error(`HTTP ${res.status} from ${base}`);
      const card = agentCardSchema.parse(await res.json());
      return registry.register({
        agentId: card.name,
        endpoint: card.url ?? base,
        capabilities: card.skills.map((skill) => ({
          capabilityId: skill.id,
          confidence: skill.confidence,
        })),
        tags: card.tags,
        version: card.version,
        metadata: { discoveredFrom: base },
      });
    })
  );

  let registered = 0;
  results.forEach((result, i) => {
    if (result.status === "fulfilled") {
      registered += 1;
    } else {
      log.warn({ url: urls[i], err: result.reason }, "agent discovery failed");
    }
  });
  log.info({ registered, attempted: urls.length }, "agent discovery finished");
  return registered;
}
