import { GenerationUnavailableError, abortError, errorMessage, isAbortError } from "../errors.js";
import { STATUS_CODES, emitStatus } from "../events/events.js";
import type { GenerationGateway } from "../generation/gateway.js";
import { withTimeout } from "../utils/resilience.js";
import type { AgentName, AgentResult, AgentStatus, GenerationConfig, ProviderId, RunContext } from "../types.js";

/** Collaborators shared by every agent. */
export interface AgentDeps {
  gateway: GenerationGateway;
  generation: GenerationConfig;
  /** Deadline for each search/route capability call */
  capabilityTimeoutMs: number;
}

export interface Agent<TInput, TResult extends AgentResult> {
  /** Task name in the orchestrator's graph, and the `agentName` of every result */
  readonly name: TResult["agentName"];
  run(input: TInput, ctx: RunContext): Promise<TResult>;
}

export interface ResultFields<TName extends AgentName, TData> {
  agentName: TName;
  status: AgentStatus;
  content: string;
  rawData?: TData;
  error?: string;
  provider?: ProviderId;
}

export function agentResult<TName extends AgentName, TData>(
  fields: ResultFields<TName, TData>,
  startTime: number,
): AgentResult<TName, TData> {
  return Object.freeze({
    ...fields,
    durationMs: Math.round(performance.now() - startTime),
  });
}

export type CapabilityOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

/** Calls a capability under the configured deadline. Only aborts propagate. */
export async function callCapability<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  deps: AgentDeps,
  ctx: RunContext,
): Promise<CapabilityOutcome<T>> {
  try {
    const value = await withTimeout(fn, { operation, timeoutMs: deps.capabilityTimeoutMs, signal: ctx.signal });
    return { ok: true, value };
  } catch (err: unknown) {
    if (isAbortError(err) || ctx.signal.aborted) throw abortError();
    console.warn(`[agent:${ctx.agent ?? "unknown"}] ${operation} failed:`, errorMessage(err));
    return { ok: false, error: errorMessage(err) };
  }
}

export type NarrativeOutcome = { ok: true; text: string; provider: ProviderId } | { ok: false; error: string };

/** Runs a prompt through the gateway, turning exhaustion of every provider into a failed outcome. */
export async function generateNarrative(prompt: string, deps: AgentDeps, ctx: RunContext): Promise<NarrativeOutcome> {
  emitStatus(ctx.events, { code: STATUS_CODES.GENERATING, message: "Generating response", agent: ctx.agent });
  const outcome = await deps.gateway.tryGenerate(prompt, deps.generation, ctx);
  if (outcome.ok) return { ok: true, text: outcome.text, provider: outcome.provider };
  return { ok: false, error: new GenerationUnavailableError(outcome.failures).message };
}
