import { createCarsAgent } from "../agents/cars-agent.js";
import { createRouteAgent } from "../agents/route-agent.js";
import { createSummaryAgent, type SummaryInput } from "../agents/summary-agent.js";
import type { Agent, AgentDeps } from "../agents/run-agent.js";
import { OrchestrationError, abortError, errorMessage, isAbortError } from "../errors.js";
import { BUS_EVENTS, STATUS_CODES, emitStatus } from "../events/events.js";
import type { AgentEventBus } from "../events/agent-events.js";
import type { GenerationGateway } from "../generation/gateway.js";
import { parseRentalQuery } from "../query/parse-query.js";
import { TaskGraph } from "./task-graph.js";
import type { RentalConfig } from "../config.js";
import type {
  AgentName,
  AgentResult,
  CarsResult,
  RentalQuery,
  Report,
  RouteCapability,
  RouteResult,
  RunContext,
  SearchCapability,
  SummaryResult,
} from "../types.js";

export interface RentalOrchestratorOptions {
  search: SearchCapability;
  routes: RouteCapability;
  gateway: GenerationGateway;
  config: RentalConfig;
  /** Clock for report timestamps and year-less dates (default: system clock) */
  now?: () => Date;
}

export interface ProcessOptions {
  signal?: AbortSignal;
  events?: AgentEventBus;
  requestId?: string;
}

const STEP_LABELS: Record<AgentName, string> = {
  cars: "rental search",
  route: "route planning",
  summary: "recommendation",
};

export function generateRequestId(existing?: string): string {
  return existing ?? `rental_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

/** Stand-in result for a step that threw or was skipped. */
function unfinishedResult<TName extends AgentName>(agentName: TName, error: unknown): AgentResult<TName, never> {
  const reason = errorMessage(error);
  return Object.freeze({
    agentName,
    status: "failed",
    content: `The ${STEP_LABELS[agentName]} step did not complete: ${reason}`,
    error: reason,
    durationMs: 0,
  });
}

/**
 * Runs the Cars and Route agents concurrently, then the Summary agent, and
 * assembles their results into a Report.
 *
 * Agent-level problems are reported inside each AgentResult. Only a malformed
 * request (`QueryParseError`), cancellation (AbortError), or an unexpected
 * failure of the run itself (`OrchestrationError`) reject.
 */
export class RentalOrchestrator {
  private readonly cars: Agent<RentalQuery, CarsResult>;
  private readonly route: Agent<RentalQuery, RouteResult>;
  private readonly summary: Agent<SummaryInput, SummaryResult>;
  private readonly now: () => Date;

  constructor(readonly options: RentalOrchestratorOptions) {
    const deps: AgentDeps = {
      gateway: options.gateway,
      generation: options.config.generation,
      capabilityTimeoutMs: options.config.capabilityTimeoutMs,
    };
    this.cars = createCarsAgent(options.search, deps);
    this.route = createRouteAgent(options.routes, deps);
    this.summary = createSummaryAgent(deps, options.config.summaryPolicy);
    this.now = options.now ?? (() => new Date());
  }

  parse(rawText: string): RentalQuery {
    return parseRentalQuery(rawText, { referenceDate: this.now() });
  }

  async processRentalRequest(rawText: string, opts: ProcessOptions = {}): Promise<Report> {
    const requestId = generateRequestId(opts.requestId);
    const signal = opts.signal ?? new AbortController().signal;
    const events = opts.events;

    emitStatus(events, { code: STATUS_CODES.PARSING, message: "Parsing rental request" });
    const query = this.parse(rawText);
    if (signal.aborted) throw abortError();

    const ctx: RunContext = { signal, events };
    const results: { cars?: CarsResult; route?: RouteResult; summary?: SummaryResult } = {};

    const { cars, route, summary } = this;
    const graph = new TaskGraph<AgentName>([
      {
        name: cars.name,
        dependencies: [],
        run: async () => { results.cars = await cars.run(query, { ...ctx, agent: cars.name }); },
      },
      {
        name: route.name,
        dependencies: [],
        run: async () => { results.route = await route.run(query, { ...ctx, agent: route.name }); },
      },
      {
        name: summary.name,
        dependencies: [cars.name, route.name],
        run: async () => {
          if (!results.cars || !results.route) throw new OrchestrationError("Summary started before its inputs were recorded");
          results.summary = await summary.run(
            { query, cars: results.cars, route: results.route },
            { ...ctx, agent: summary.name },
          );
        },
      },
    ]);

    emitStatus(events, { code: STATUS_CODES.EXECUTING_TASKS, message: "Running rental and route agents" });
    try {
      await graph.execute(signal, {
        onStart: (name) => events?.emit(BUS_EVENTS.TASK_START, { agent: name }),
        onEnd: (name, state, error) => {
          if (error !== undefined) console.error(`[orchestrator] ${name} did not complete:`, errorMessage(error));
          events?.emit(BUS_EVENTS.TASK_END, {
            agent: name,
            state,
            ...(state === "done" ? { status: results[name]?.status } : { error: errorMessage(error) }),
          });
        },
      });
    } catch (err: unknown) {
      if (isAbortError(err) || signal.aborted) throw abortError("Rental request cancelled");
      console.error(`[orchestrator] request ${requestId} failed:`, errorMessage(err));
      throw new OrchestrationError("Rental request failed unexpectedly", { cause: err });
    }

    return Object.freeze({
      requestId,
      query,
      cars: results.cars ?? unfinishedResult(cars.name, graph.error(cars.name)),
      route: results.route ?? unfinishedResult(route.name, graph.error(route.name)),
      summary: results.summary ?? unfinishedResult(summary.name, graph.error(summary.name)),
      tasks: Object.freeze(graph.snapshot()),
      generatedAt: this.now().toISOString(),
    });
  }
}
