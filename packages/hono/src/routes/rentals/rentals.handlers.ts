import type { Context } from "hono";
import { streamSSE } from "hono/streaming";
import {
  AgentEventBus,
  BUS_TO_SSE_MAP,
  QueryParseError,
  SSE_EVENTS,
  errorMessage,
  generateRequestId,
  isAbortError,
  RequestConflictError,
  type Report,
  type SseEventName,
} from "@rental-crew/core";
import { formatIssues } from "../../lib/validation.js";
import type { RentalPluginContext } from "../../types.js";
import { rentalRequestSchema, type ReportResponse } from "./rentals.schemas.js";

export function toReportResponse(report: Report): ReportResponse {
  return {
    requestId: report.requestId,
    query: { ...report.query },
    cars: { ...report.cars },
    route: { ...report.route },
    summary: { ...report.summary },
    tasks: report.tasks.map((t) => ({ ...t, dependencies: [...t.dependencies] })),
    generatedAt: report.generatedAt,
  };
}

interface StreamOutcome {
  event: SseEventName;
  data: Record<string, unknown>;
}

function failureOutcome(requestId: string, err: unknown): StreamOutcome {
  if (isAbortError(err)) {
    return { event: SSE_EVENTS.CANCELLED, data: { requestId } };
  }
  if (err instanceof QueryParseError || err instanceof RequestConflictError) {
    return { event: SSE_EVENTS.ERROR, data: { requestId, code: err.code, error: err.message } };
  }
  console.error(`[rental-plugin] stream ${requestId} failed:`, errorMessage(err));
  return { event: SSE_EVENTS.ERROR, data: { requestId, error: "Internal Server Error" } };
}

export function createRentalHandlers(ctx: RentalPluginContext) {
  /** Runs a request to completion, registered for cancellation under its id. */
  async function runRequest(text: string, requestId: string, events?: AgentEventBus): Promise<Report> {
    const controller = ctx.requests.register(requestId);
    try {
      return await ctx.orchestrator.processRentalRequest(text, { signal: controller.signal, events, requestId });
    } finally {
      ctx.requests.release(requestId, controller);
    }
  }

  /** Streams progress events, then the report (or a cancelled/error event), over SSE. */
  async function handleStream(c: Context) {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Request body must be JSON" }, 400);
    }
    const parsed = rentalRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: formatIssues(parsed.error) }, 400);
    }

    const { text } = parsed.data;
    const requestId = generateRequestId(parsed.data.requestId);
    if (ctx.requests.has(requestId)) {
      const conflict = new RequestConflictError(requestId);
      return c.json({ error: conflict.message, code: conflict.code }, 409);
    }
    const events = new AgentEventBus(requestId);

    return streamSSE(
      c,
      async (stream) => {
        let id = 0;
        let chain: Promise<void> = Promise.resolve();
        const send = (event: SseEventName, data: Record<string, unknown>) => {
          const message = { id: String(id++), event, data: JSON.stringify(data) };
          chain = chain.then(() => stream.writeSSE(message));
        };

        stream.onAbort(() => {
          ctx.requests.cancel(requestId);
        });
        const unsubscribe = events.subscribe((e) => send(BUS_TO_SSE_MAP[e.type], e.data));

        send(SSE_EVENTS.SESSION_START, { requestId });
        let outcome: StreamOutcome;
        try {
          const report = await runRequest(text, requestId, events);
          outcome = { event: SSE_EVENTS.REPORT, data: toReportResponse(report) };
        } catch (err: unknown) {
          outcome = failureOutcome(requestId, err);
        } finally {
          unsubscribe();
        }
        send(outcome.event, outcome.data);
        await chain;
      },
      async (err) => {
        console.warn(`[rental-plugin] stream ${requestId} closed early:`, err.message);
      },
    );
  }

  return { runRequest, handleStream };
}
