import { z } from "zod";
import type {
  AgentDescriptor,
  AgentInvoker,
  HealthSample,
  InvocationRequest,
} from "../contracts.js";
import { DispatchError } from "../errors.js";
import { logger as rootLogger, type Logger } from "../logger.js";

// Error variant first: `result` is optional under z.unknown(), so the success
// shape would also accept an error response.
const rpcResponseSchema = z.union([
  z.object({
    jsonrpc: z.literal("2.0"),
    id: z.union([z.string(), z.number(), z.null()]),
    error: z.object({ code: z.number(), message: z.string(), data: z.unknown().optional() }),
  }),
  z.object({ jsonrpc: z.literal("2.0"), id: z.union([z.string(), z.number()]), result: z.unknown() }),
]);

export interface HttpAgentInvokerOptions {
  logger?: Logger;
  fetch?: typeof fetch;
}

/** Trailing slashes dropped so `${base}/rpc` never doubles up. */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}${path}`;
}

/**
 * Invokes agents over JSON-RPC 2.0 (`agent.invoke` on POST {endpoint}/rpc)
 * and probes them with GET {endpoint}/health.
 */
export class HttpAgentInvoker implements AgentInvoker {
  private readonly log: Logger;
  private readonly fetchImpl: typeof fetch;
  private nextId = 0;

  constructor(options: HttpAgentInvokerOptions = {}) {
    this.log = (options.logger ?? rootLogger).child({ component: "http-invoker" });
    this.fetchImpl = options.fetch ?? fetch;
  }

  async invoke(request: InvocationRequest): Promise<unknown> {
    const id = `${request.taskId}:${++this.nextId}`;
    const url = joinUrl(request.agent.endpoint, "/rpc");

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          jsonrpc: "2.0",
          id,
          method: "agent.invoke",
          params: {
            capability: request.capabilityId,
            taskId: request.taskId,
            arguments: request.payload,
          },
        }),
        signal: request.signal,
      });
    } catch (err) {
      throw new DispatchError(`request to ${url} failed: ${errorMessage(err)}`, {
        agentId: request.agent.agentId,
      });
    }

    if (!res.ok) {
      const text = await res.text();
      throw new DispatchError(`HTTP ${res.status} ${res.statusText}: ${text}`, {
        agentId: request.agent.agentId,
        status: res.status,
      });
    }

    const parsed = rpcResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new DispatchError(`malformed JSON-RPC response from ${url}`, {
        agentId: request.agent.agentId,
      });
    }
    if ("error" in parsed.data) {
      const { code, message } = parsed.data.error;
      throw new DispatchError(`agent error ${code}: ${message}`, {
        agentId: request.agent.agentId,
        rpcCode: code,
      });
    }

    this.log.debug({ taskId: request.taskId, agentId: request.agent.agentId }, "agent.invoke ok");
    return parsed.data.result;
  }

  async probe(
    agent: AgentDescriptor,
    options: { timeoutMs: number; signal: AbortSignal }
  ): Promise<HealthSample> {
    const startedAt = performance.now();
    try {
      const res = await this.fetchImpl(joinUrl(agent.endpoint, "/health"), {
        method: "GET",
        signal: options.signal,
      });
      const latencyMs = performance.now() - startedAt;
      // Drain the body so the connection can be reused.
      await res.arrayBuffer();
      return res.ok
        ? { ok: true, latencyMs }
        : { ok: false, latencyMs, detail: `HTTP ${res.status}` };
    } catch (err) {
      return { ok: false, detail: errorMessage(err) };
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
