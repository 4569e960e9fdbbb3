import { z } from "zod";
import { rentalDays, type RentalOffer, type SearchCapability, type SearchRequest } from "@rental-crew/core";
import { estimateMiles, loadRouteData, type RouteData } from "../estimated-route/estimated-route.js";
import { loadData } from "../shared/load-data.js";
import { seededInt } from "../shared/seeded.js";

export const rentalDataSchema = z.object({
  companies: z.array(z.object({ name: z.string(), website: z.string().url() })).min(1),
  vehicleClasses: z.array(z.object({ name: z.string(), features: z.array(z.string()) })).min(1),
  pricing: z.object({
    baseRate: z.number().positive(),
    classStep: z.number(),
    variation: z.tuple([z.number().int(), z.number().int()]),
    distanceFactors: z.array(z.object({ aboveMiles: z.number(), factor: z.number().positive() })),
    roundTripFactor: z.number().positive(),
    currency: z.string().length(3),
  }),
  specialOffers: z.object({
    // out of ten
    chance: z.number().int().min(0).max(10),
    roundTrip: z.array(z.string()).min(1),
    oneWay: z.array(z.string()).min(1),
  }),
  rating: z.object({ min: z.number(), max: z.number() }),
});

export type RentalData = z.infer<typeof rentalDataSchema>;

let bundled: RentalData | undefined;

export function loadRentalData(): RentalData {
  bundled ??= loadData(new URL("./rental-data.json", import.meta.url), rentalDataSchema);
  return bundled;
}

/** Multiplier for one-way distance (the largest matching tier) and the round-trip discount. */
export function priceFactor(distanceMiles: number, roundTrip: boolean, pricing: RentalData["pricing"]): number {
  const tier = pricing.distanceFactors.filter((t) => distanceMiles > t.aboveMiles).at(-1);
  const factor = tier?.factor ?? 1;
  return roundTrip ? factor * pricing.roundTripFactor : factor;
}

export interface EstimatedSearchOptions {
  data?: RentalData;
  routeData?: RouteData;
}

/**
 * Search capability that produces deterministic offers from the bundled rental
 * companies. The same request always yields the same offers. Daily prices
 * depend on the vehicle class, the trip distance and the round-trip discount;
 * `totalPrice` covers the whole rental. A requested `carSize` the companies
 * carry is offered by every company, otherwise each picks a class. Offers are
 * sorted by daily price.
 */
export function createEstimatedSearchCapability(options: EstimatedSearchOptions = {}): SearchCapability {
  const data = options.data ?? loadRentalData();
  const routeData = options.routeData ?? loadRouteData();
  const { pricing, specialOffers, vehicleClasses } = data;

  return {
    async search(request: SearchRequest): Promise<RentalOffer[]> {
      const { location, startDate, roundTrip } = request;
      const days = rentalDays(request);
      const preferred = vehicleClasses.findIndex((v) => v.name === request.carSize);
      const origin = request.origin ?? location;
      const oneWay = estimateMiles(origin, location, routeData);
      const distance = roundTrip ? oneWay * 2 : oneWay;
      const factor = priceFactor(distance, roundTrip, pricing);
      const seed = `${origin}-${location}-${startDate}${roundTrip ? "-roundtrip" : ""}`;
      const offersPool = roundTrip ? specialOffers.roundTrip : specialOffers.oneWay;

      const offers = data.companies.map(({ name: company, website }): RentalOffer => {
        const classIndex = preferred >= 0 ? preferred : seededInt(`${seed}-${company}-type`, 0, vehicleClasses.length - 1);
        const vehicle = vehicleClasses[classIndex];
        const variation = seededInt(`${seed}-${company}-var`, pricing.variation[0], pricing.variation[1]);
        const price = Math.trunc((pricing.baseRate + pricing.classStep * classIndex) * factor + variation);
        const special = seededInt(`${seed}-${company}-special`, 0, 9) < specialOffers.chance
          ? offersPool[seededInt(`${seed}-${company}-special-type`, 0, offersPool.length - 1)]
          : undefined;
        const rating = seededInt(`${seed}-${company}-rating`, data.rating.min * 10, data.rating.max * 10) / 10;

        return {
          provider: company,
          vehicleClass: vehicle.name,
          price,
          currency: pricing.currency,
          pricePer: "day",
          pickupLocation: origin,
          features: vehicle.features,
          ...(special !== undefined && { specialOffer: special }),
          rating,
          totalPrice: price * days,
          bookingUrl: website,
        };
      });

      return offers.sort((a, b) => a.price - b.price);
    },
  };
}
