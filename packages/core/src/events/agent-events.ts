import type { BusEventName } from "./events.js";

export interface AgentEvent {
  type: BusEventName;
  /** Request the event belongs to, when the bus was created for one */
  requestId?: string;
  data: Record<string, unknown>;
  timestamp: number;
}

export type AgentEventHandler = (event: AgentEvent) => void;

/**
 * Synchronous progress bus for one rental request. Handlers run in
 * subscription order; a throwing handler is logged and skipped.
 */
export class AgentEventBus {
  private readonly handlers = new Set<AgentEventHandler>();

  constructor(readonly requestId?: string) {}

  get subscriberCount(): number {
    return this.handlers.size;
  }

  subscribe(handler: AgentEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  emit(type: BusEventName, data: Record<string, unknown> = {}): void {
    const event: AgentEvent = {
      type,
      ...(this.requestId !== undefined && { requestId: this.requestId }),
      data,
      timestamp: Date.now(),
    };
    for (const handler of [...this.handlers]) {
      try {
        handler(event);
      } catch (err: unknown) {
        console.error(`[agent-events] handler failed on ${type}:`, err);
      }
    }
  }
}
