import type { FastifyInstance } from "fastify";

export interface MeshEvent {
  type: string;
  at: number;
  agentId?: string;
  taskId?: string;
  detail?: Record<string, unknown>;
}

export interface EventSink {
  emit(event: MeshEvent): void;
}

export interface MeshPluginContext extends EventSink {
  /** Adds a listener in front of the sink; returns the remover. */
  subscribe(listener: (event: MeshEvent) => void): () => void;
}

export interface MeshPlugin {
  name: string;
  register(app: FastifyInstance, ctx: MeshPluginContext): void;
}

export function createEventBus(maxEvents = 2_000): MeshPluginContext & { recent(): MeshEvent[] } {
  const events: MeshEvent[] = [];
  const listeners = new Set<(event: MeshEvent) => void>();

  return {
    emit(event) {
      events.push(event);
      if (events.length > maxEvents) events.shift();
      for (const listener of listeners) listener(event);
    },
    subscribe(listener) {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
    recent() {
      return [...events];
    },
  };
}
