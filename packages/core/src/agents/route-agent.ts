import { STATUS_CODES, emitStatus } from "../events/events.js";
import { AGENT_NAMES } from "../utils/constants.js";
import { agentResult, callCapability, generateNarrative, type Agent, type AgentDeps, type ResultFields } from "./run-agent.js";
import type { RentalQuery, RouteCapability, RouteInfo, RouteRequest, RouteResult, RunContext } from "../types.js";

const JOURNEY_PROMPT = `You are a route planning expert. Using the route data below, write a short travel briefing for a rental car journey:

1. Estimated distance and driving time
2. The main highways or roads
3. Suggested times of day to travel and likely traffic issues
4. Practical tips for the drive (fuel, rest stops, parking)`;

const LOCAL_PROMPT = `You are a local driving expert. The customer picks up and returns the car in the same place. Using the notes below, write a short briefing about driving in and around the area: getting around, parking, traffic patterns and practical tips. Do not estimate travel durations.`;

/** True when the query names a pickup place distinct from the rental location. */
export function hasDistinctOrigin(query: RentalQuery): query is RentalQuery & { origin: string } {
  return query.origin !== undefined && query.origin.toLowerCase() !== query.location.toLowerCase();
}

export function toRouteRequest(query: RentalQuery): RouteRequest {
  return {
    origin: hasDistinctOrigin(query) ? query.origin : query.location,
    destination: query.location,
    startDate: query.startDate,
    endDate: query.endDate,
    roundTrip: query.roundTrip,
  };
}

export function isEmptyRoute(info: RouteInfo): boolean {
  return info.notes.length === 0
    && info.durationMinutes === undefined
    && info.distanceMiles === undefined
    && info.mainRoute === undefined;
}

function formatDuration(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const rest = Math.round(minutes % 60);
  if (hours === 0) return `${rest} min`;
  return rest === 0 ? `${hours} h` : `${hours} h ${rest} min`;
}

export function buildRoutePrompt(query: RentalQuery, info: RouteInfo, localOnly: boolean): string {
  const lines: string[] = [];
  if (localOnly) {
    lines.push(LOCAL_PROMPT, "", `Area: ${query.location}`);
  } else {
    lines.push(JOURNEY_PROMPT, "", `From: ${info.origin}`, `To: ${info.destination}`);
    if (query.roundTrip) lines.push("Trip type: round trip");
    if (info.distanceMiles !== undefined) lines.push(`Distance: ~${info.distanceMiles} miles`);
    if (info.durationMinutes !== undefined) lines.push(`Driving time: ~${formatDuration(info.durationMinutes)}`);
    if (info.mainRoute) lines.push(`Main route: ${info.mainRoute}`);
  }
  lines.push(`Dates: ${query.startDate} to ${query.endDate}`);
  if (info.notes.length > 0) {
    lines.push("", "Notes:", ...info.notes.map((note) => `- ${note}`));
  }
  return lines.join("\n");
}

/**
 * Plans the journey between the pickup place and the rental location. Without a
 * distinct pickup place it runs in local-insights mode: the route capability is
 * asked about the location alone and any duration estimate is dropped.
 */
export function createRouteAgent(routes: RouteCapability, deps: AgentDeps): Agent<RentalQuery, RouteResult> {
  return {
    name: AGENT_NAMES.ROUTE,
    async run(query: RentalQuery, ctx: RunContext): Promise<RouteResult> {
      const startTime = performance.now();
      const finish = (fields: ResultFields<"route", RouteInfo>): RouteResult => agentResult(fields, startTime);
      const localOnly = !hasDistinctOrigin(query);
      const request = toRouteRequest(query);
      emitStatus(ctx.events, {
        code: STATUS_CODES.ROUTING,
        message: localOnly ? `Gathering local insights for ${query.location}` : `Planning route ${request.origin} → ${request.destination}`,
        agent: AGENT_NAMES.ROUTE,
      });

      const found = await callCapability("route lookup", (signal) => routes.route(request, signal), deps, ctx);
      if (!found.ok) {
        return finish({
          agentName: AGENT_NAMES.ROUTE,
          status: "failed",
          content: `Route planning failed: ${found.error}`,
          error: found.error,
        });
      }

      const raw = found.value;
      const info: RouteInfo | null = raw && localOnly ? { ...raw, durationMinutes: undefined } : raw;
      if (!info || isEmptyRoute(info)) {
        return finish({
          agentName: AGENT_NAMES.ROUTE,
          status: "degraded",
          content: localOnly
            ? `No local driving insights are available for ${query.location}.`
            : `No route information is available from ${request.origin} to ${request.destination}.`,
          ...(info ? { rawData: info } : {}),
        });
      }

      const narrative = await generateNarrative(buildRoutePrompt(query, info, localOnly), deps, ctx);
      if (!narrative.ok) {
        return finish({
          agentName: AGENT_NAMES.ROUTE,
          status: "failed",
          content: `Route data was found but the briefing could not be written: ${narrative.error}`,
          rawData: info,
          error: narrative.error,
        });
      }

      return finish({
        agentName: AGENT_NAMES.ROUTE,
        status: "ok",
        content: narrative.text,
        rawData: info,
        provider: narrative.provider,
      });
    },
  };
}
