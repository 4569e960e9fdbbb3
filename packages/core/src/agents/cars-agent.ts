import { STATUS_CODES, emitStatus } from "../events/events.js";
import { rentalDays } from "../query/parse-query.js";
import { AGENT_NAMES } from "../utils/constants.js";
import { agentResult, callCapability, generateNarrative, type Agent, type AgentDeps, type ResultFields } from "./run-agent.js";
import type { CarsResult, RentalOffer, RentalQuery, RunContext, SearchCapability, SearchRequest } from "../types.js";

const SYSTEM_PROMPT = `You are a car rental expert. Compare the rental offers below and recommend the best options for the customer.

1. Rank the offers by overall value, weighing price, vehicle class and pickup convenience
2. For each recommended offer give the company, vehicle class, price and any special offer
3. Call out the cheapest option and the best premium option
4. Mention any trade-offs the customer should know about

Only use the offers listed. Do not invent companies, prices or vehicles.`;

export function toSearchRequest(query: RentalQuery): SearchRequest {
  return {
    location: query.location,
    startDate: query.startDate,
    endDate: query.endDate,
    ...(query.origin !== undefined && { origin: query.origin }),
    roundTrip: query.roundTrip,
    ...(query.carSize !== undefined && { carSize: query.carSize }),
  };
}

export function formatOffer(offer: RentalOffer, index: number): string {
  const parts = [
    `${index + 1}. ${offer.provider}`,
    offer.vehicleClass,
    `${offer.price} ${offer.currency}/${offer.pricePer ?? "day"}`,
    ...(offer.totalPrice !== undefined ? [`total: ${offer.totalPrice} ${offer.currency}`] : []),
    `pickup: ${offer.pickupLocation}`,
  ];
  if (offer.features?.length) parts.push(`features: ${offer.features.join(", ")}`);
  if (offer.specialOffer) parts.push(`special: ${offer.specialOffer}`);
  if (offer.rating !== undefined) parts.push(`rating: ${offer.rating}`);
  if (offer.bookingUrl) parts.push(`book: ${offer.bookingUrl}`);
  return parts.join(" | ");
}

export function buildCarsPrompt(query: RentalQuery, offers: readonly RentalOffer[]): string {
  const trip = query.origin
    ? `Pickup in ${query.origin}, drop-off in ${query.location}`
    : `Pickup and drop-off in ${query.location}`;
  const preference = query.carSize ? `\nPreferred vehicle class: ${query.carSize}` : "";
  return `${SYSTEM_PROMPT}

Customer request: "${query.rawText}"
${trip}, ${query.startDate} to ${query.endDate} (${rentalDays(query)} days)${preference}

Offers (${offers.length}):
${offers.map(formatOffer).join("\n")}`;
}

/** Searches rental offers and asks the gateway for a ranked comparison of all of them. */
export function createCarsAgent(search: SearchCapability, deps: AgentDeps): Agent<RentalQuery, CarsResult> {
  return {
    name: AGENT_NAMES.CARS,
    async run(query: RentalQuery, ctx: RunContext): Promise<CarsResult> {
      const startTime = performance.now();
      const finish = (fields: ResultFields<"cars", readonly RentalOffer[]>): CarsResult => agentResult(fields, startTime);
      emitStatus(ctx.events, { code: STATUS_CODES.SEARCHING, message: `Searching rentals in ${query.location}`, agent: AGENT_NAMES.CARS });

      const found = await callCapability("rental search", (signal) => search.search(toSearchRequest(query), signal), deps, ctx);
      if (!found.ok) {
        return finish({
          agentName: AGENT_NAMES.CARS,
          status: "failed",
          content: `Rental search failed: ${found.error}`,
          error: found.error,
        });
      }

      const offers = found.value;
      if (offers.length === 0) {
        return finish({
          agentName: AGENT_NAMES.CARS,
          status: "degraded",
          content: `No rental offers were found in ${query.location} for ${query.startDate} to ${query.endDate}.`,
          rawData: offers,
        });
      }

      const narrative = await generateNarrative(buildCarsPrompt(query, offers), deps, ctx);
      if (!narrative.ok) {
        return finish({
          agentName: AGENT_NAMES.CARS,
          status: "failed",
          content: `Found ${offers.length} rental offers but could not compare them: ${narrative.error}`,
          rawData: offers,
          error: narrative.error,
        });
      }

      return finish({
        agentName: AGENT_NAMES.CARS,
        status: "ok",
        content: narrative.text,
        rawData: offers,
        provider: narrative.provider,
      });
    },
  };
}
