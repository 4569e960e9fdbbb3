import { STATUS_CODES, emitStatus } from "../events/events.js";
import { AGENT_NAMES } from "../utils/constants.js";
import { agentResult, generateNarrative, type Agent, type AgentDeps, type ResultFields } from "./run-agent.js";
import type { AgentName, AgentStatus, CarsResult, RentalQuery, RouteResult, RunContext, SummaryResult } from "../types.js";

/**
 * When an upstream problem downgrades the summary to `degraded`:
 * - `any-issue`: a degraded or failed input
 * - `failure-only`: a failed input
 * - `never`: the summary is `ok` whenever it could be generated
 */
export type SummaryDegradePolicy = "any-issue" | "failure-only" | "never";

export interface SummaryInput {
  query: RentalQuery;
  cars: CarsResult;
  route: RouteResult;
}

const SUMMARY_PROMPT = `You are a car rental advisor. Write a clear, personalised recommendation from the specialist findings below.

1. Highlight the best overall value option
2. Highlight the most economical option and the premium option, if available
3. Summarise the route or local driving information in a user-friendly way
4. Give 3-5 specific tips for this rental

If a section is marked unavailable, say so briefly and work with what is there.`;

const SECTION_LABELS: Record<"cars" | "route", string> = {
  cars: "Rental options",
  route: "Route and local insights",
};

export function summaryStatus(inputs: readonly AgentStatus[], policy: SummaryDegradePolicy): AgentStatus {
  switch (policy) {
    case "never":
      return "ok";
    case "failure-only":
      return inputs.includes("failed") ? "degraded" : "ok";
    case "any-issue":
      return inputs.some((s) => s !== "ok") ? "degraded" : "ok";
  }
}

function section(result: CarsResult | RouteResult): string {
  const label = SECTION_LABELS[result.agentName];
  if (result.status === "failed") return `## ${label} (unavailable)\n${result.content}`;
  if (result.status === "degraded") return `## ${label} (limited data)\n${result.content}`;
  return `## ${label}\n${result.content}`;
}

export function buildSummaryPrompt({ query, cars, route }: SummaryInput): string {
  const trip = query.origin ? `from ${query.origin} to ${query.location}` : `in ${query.location}`;
  return `${SUMMARY_PROMPT}

Customer request: "${query.rawText}"
Rental ${trip}, ${query.startDate} to ${query.endDate}${query.roundTrip ? " (round trip)" : ""}

${section(cars)}

${section(route)}`;
}

/** Combines the cars and route findings. Never calls the gateway when both inputs failed. */
export function createSummaryAgent(deps: AgentDeps, policy: SummaryDegradePolicy = "any-issue"): Agent<SummaryInput, SummaryResult> {
  return {
    name: AGENT_NAMES.SUMMARY,
    async run(input: SummaryInput, ctx: RunContext): Promise<SummaryResult> {
      const startTime = performance.now();
      const finish = (fields: ResultFields<"summary", { sources: AgentName[] }>): SummaryResult => agentResult(fields, startTime);
      const { cars, route } = input;

      if (cars.status === "failed" && route.status === "failed") {
        return finish({
          agentName: AGENT_NAMES.SUMMARY,
          status: "failed",
          content: "Nothing to summarise: both the rental search and the route planning failed.",
          error: "No upstream results",
          rawData: { sources: [] },
        });
      }

      const sources: AgentName[] = [cars, route].filter((r) => r.status !== "failed").map((r) => r.agentName);
      emitStatus(ctx.events, { code: STATUS_CODES.SYNTHESIZING, message: "Combining results", agent: AGENT_NAMES.SUMMARY });

      const narrative = await generateNarrative(buildSummaryPrompt(input), deps, ctx);
      if (!narrative.ok) {
        return finish({
          agentName: AGENT_NAMES.SUMMARY,
          status: "failed",
          content: `The recommendation could not be written: ${narrative.error}`,
          error: narrative.error,
          rawData: { sources },
        });
      }

      return finish({
        agentName: AGENT_NAMES.SUMMARY,
        status: summaryStatus([cars.status, route.status], policy),
        content: narrative.text,
        rawData: { sources },
        provider: narrative.provider,
      });
    },
  };
}
