import { z } from "zod";
import { errorMessage, isAbortError, type RouteCapability, type RouteInfo, type RouteRequest } from "@rental-crew/core";
import { loadData } from "../shared/load-data.js";
import { seededInt } from "../shared/seeded.js";

const coordinatesSchema = z.tuple([z.number(), z.number()]);

export const routeDataSchema = z.object({
  regions: z.record(z.array(z.string())),
  interstates: z.record(z.string()),
  cityRoutes: z.array(z.object({ from: z.string(), to: z.string(), route: z.string() })),
  defaultRoute: z.string(),
  crossCountry: z.object({ east: z.array(z.string()), west: z.array(z.string()) }),
  coordinates: z.record(coordinatesSchema),
  tips: z.object({
    generic: z.array(z.string()),
    roundTrip: z.array(z.string()),
    longDistance: z.array(z.object({ aboveMiles: z.number(), tips: z.array(z.string()) })),
    overnight: z.object({ aboveHours: z.number(), drivingHoursPerDay: z.number().positive() }),
    locations: z.array(z.object({ keywords: z.array(z.string()), tips: z.array(z.string()) })),
    limit: z.number().int().positive(),
  }),
});

export type RouteData = z.infer<typeof routeDataSchema>;
export type Coordinates = z.infer<typeof coordinatesSchema>;

/** Resolves a place name to latitude/longitude, or null when unknown. */
export type Geocoder = (place: string, signal: AbortSignal) => Promise<Coordinates | null>;

const AVERAGE_SPEED_MPH = 65;
const ROAD_FACTOR = 1.3;
const EARTH_RADIUS_MILES = 3956;

let bundled: RouteData | undefined;

export function loadRouteData(): RouteData {
  bundled ??= loadData(new URL("./route-data.json", import.meta.url), routeDataSchema);
  return bundled;
}

const includesAny = (text: string, keywords: readonly string[]) => keywords.some((k) => text.includes(k));

export function regionOf(place: string, data: RouteData = loadRouteData()): string | undefined {
  const lower = place.toLowerCase();
  return Object.entries(data.regions).find(([, keywords]) => includesAny(lower, keywords))?.[0];
}

/** Interstate between the two regions, else a known city-pair route, else the default. */
export function mainRouteFor(origin: string, destination: string, data: RouteData = loadRouteData()): string {
  const from = regionOf(origin, data);
  const to = regionOf(destination, data);
  const interstate = from && to ? data.interstates[`${from}>${to}`] : undefined;
  if (interstate) return interstate;

  const o = origin.toLowerCase();
  const d = destination.toLowerCase();
  const city = data.cityRoutes.find((r) => o.includes(r.from) && d.includes(r.to));
  return city?.route ?? data.defaultRoute;
}

export function lookupCoordinates(place: string, data: RouteData = loadRouteData()): Coordinates | null {
  const lower = place.toLowerCase();
  return Object.entries(data.coordinates).find(([city]) => lower.includes(city))?.[1] ?? null;
}

/** Great-circle distance in whole miles. */
export function haversineMiles([lat1, lon1]: Coordinates, [lat2, lon2]: Coordinates): number {
  const rad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = rad(lat2) - rad(lat1);
  const dLon = rad(lon2) - rad(lon1);
  const a = Math.sin(dLat / 2) ** 2 + Math.cos(rad(lat1)) * Math.cos(rad(lat2)) * Math.sin(dLon / 2) ** 2;
  return Math.trunc(2 * Math.asin(Math.sqrt(a)) * EARTH_RADIUS_MILES);
}

/** Seeded guess for places without coordinates: about 2500 miles coast to coast, 800 otherwise. */
export function guessMiles(origin: string, destination: string, data: RouteData = loadRouteData()): number {
  const o = origin.toLowerCase();
  const d = destination.toLowerCase();
  const { east, west } = data.crossCountry;
  const crossCountry = (includesAny(o, east) && includesAny(d, west)) || (includesAny(o, west) && includesAny(d, east));
  return (crossCountry ? 2500 : 800) + seededInt(`${o}-${d}`, -200, 200);
}

/** One-way road distance from coordinates when both ends have them. */
export function roadMiles(origin: string, destination: string, from: Coordinates | null, to: Coordinates | null, data: RouteData = loadRouteData()): number {
  if (origin.toLowerCase() === destination.toLowerCase()) return 0;
  if (from && to) return Math.trunc(haversineMiles(from, to) * ROAD_FACTOR);
  return guessMiles(origin, destination, data);
}

/** One-way road distance using the bundled coordinate table only. */
export function estimateMiles(origin: string, destination: string, data: RouteData = loadRouteData()): number {
  return roadMiles(origin, destination, lookupCoordinates(origin, data), lookupCoordinates(destination, data), data);
}

export interface TipInput {
  origin: string;
  destination: string;
  roundTrip: boolean;
  /** Total distance of the trip, both ways for round trips */
  distanceMiles: number;
  drivingHours: number;
}

/** Up to `tips.limit` unique tips: round trip, long distance, location, then generic ones. */
export function rentalTips({ origin, destination, roundTrip, distanceMiles, drivingHours }: TipInput, data: RouteData = loadRouteData()): string[] {
  const { tips } = data;
  const longDistance = tips.longDistance.filter((t) => distanceMiles > t.aboveMiles).flatMap((t) => t.tips);
  if (drivingHours > tips.overnight.aboveHours) {
    longDistance.push(`Plan for a ${Math.trunc(drivingHours / tips.overnight.drivingHoursPerDay)} day journey with overnight stops`);
  }
  const places = [origin.toLowerCase(), destination.toLowerCase()];
  const local = tips.locations.filter((l) => places.some((p) => includesAny(p, l.keywords))).flatMap((l) => l.tips);

  const ordered = [...(roundTrip ? tips.roundTrip : []), ...longDistance, ...local, ...tips.generic];
  return [...new Set(ordered)].slice(0, tips.limit);
}

export interface EstimatedRouteOptions {
  /** Defaults to the bundled coordinate table */
  geocode?: Geocoder;
  data?: RouteData;
}

/**
 * Route capability that estimates the journey offline: distance from
 * coordinates (or a seeded guess), driving time at 65 mph, the main
 * interstate between regions, and rental tips. Round trips double the
 * distance and time. A request whose two ends are the same place gets tips only.
 */
export function createEstimatedRouteCapability(options: EstimatedRouteOptions = {}): { route(request: RouteRequest, signal: AbortSignal): Promise<RouteInfo> } {
  const data = options.data ?? loadRouteData();
  const geocode: Geocoder = options.geocode ?? (async (place) => lookupCoordinates(place, data));

  async function locate(place: string, signal: AbortSignal): Promise<Coordinates | null> {
    try {
      return await geocode(place, signal);
    } catch (err: unknown) {
      if (isAbortError(err) || signal.aborted) throw err;
      console.warn(`[estimated-route] geocoding "${place}" failed, estimating instead:`, errorMessage(err));
      return null;
    }
  }

  return {
    async route({ origin, destination, roundTrip }: RouteRequest, signal: AbortSignal): Promise<RouteInfo> {
      if (origin.toLowerCase() === destination.toLowerCase()) {
        return { origin, destination, notes: rentalTips({ origin, destination, roundTrip, distanceMiles: 0, drivingHours: 0 }, data) };
      }

      const [from, to] = await Promise.all([locate(origin, signal), locate(destination, signal)]);
      const oneWay = roadMiles(origin, destination, from, to, data);
      const distanceMiles = roundTrip ? oneWay * 2 : oneWay;
      const drivingHours = Math.round((distanceMiles / AVERAGE_SPEED_MPH) * 10) / 10;
      const outbound = mainRouteFor(origin, destination, data);

      return {
        origin,
        destination,
        distanceMiles,
        durationMinutes: Math.round(drivingHours * 60),
        mainRoute: roundTrip ? `${outbound} (outbound), ${mainRouteFor(destination, origin, data)} (return)` : outbound,
        notes: rentalTips({ origin, destination, roundTrip, distanceMiles, drivingHours }, data),
      };
    },
  };
}
