/** SSE event names sent to clients of the rental stream */
export const SSE_EVENTS = {
  SESSION_START: "session:start",
  TASK_START: "task:start",
  TASK_END: "task:end",
  STATUS: "status",
  REPORT: "report",
  CANCELLED: "cancelled",
  ERROR: "error",
} as const;

export type SseEventName = (typeof SSE_EVENTS)[keyof typeof SSE_EVENTS];

/** Internal bus event names emitted by the orchestrator, agents and gateway */
export const BUS_EVENTS = {
  TASK_START: "task:start",
  TASK_END: "task:end",
  STATUS: "status",
} as const;

export type BusEventName = (typeof BUS_EVENTS)[keyof typeof BUS_EVENTS];

/** Maps internal bus event names to their corresponding SSE event names */
export const BUS_TO_SSE_MAP: Record<BusEventName, SseEventName> = {
  [BUS_EVENTS.TASK_START]: SSE_EVENTS.TASK_START,
  [BUS_EVENTS.TASK_END]: SSE_EVENTS.TASK_END,
  [BUS_EVENTS.STATUS]: SSE_EVENTS.STATUS,
};

/** Typed status codes for the `status` event */
export const STATUS_CODES = {
  PARSING: "parsing",
  EXECUTING_TASKS: "executing-tasks",
  SEARCHING: "searching",
  ROUTING: "routing",
  GENERATING: "generating",
  FALLBACK: "fallback",
  SYNTHESIZING: "synthesizing",
} as const;

export type StatusCode = (typeof STATUS_CODES)[keyof typeof STATUS_CODES];

export interface StatusPayload {
  code: StatusCode;
  message: string;
  agent?: string;
  metadata?: Record<string, unknown>;
}

export function emitStatus(bus: { emit(type: BusEventName, data: Record<string, unknown>): void } | undefined, payload: StatusPayload): void {
  bus?.emit(BUS_EVENTS.STATUS, { ...payload });
}
