import { z } from "zod";
import { RouteUnavailableError } from "@rental-crew/core";
import type { Geocoder } from "./estimated-route.js";

const searchResultSchema = z.array(z.object({ lat: z.coerce.number(), lon: z.coerce.number() }));

export interface NominatimOptions {
  baseUrl?: string;
  /** Nominatim rejects requests without an identifying User-Agent */
  userAgent?: string;
}

/** Geocoder backed by an OpenStreetMap Nominatim search endpoint. */
export function createNominatimGeocoder(options: NominatimOptions = {}): Geocoder {
  const baseUrl = (options.baseUrl ?? "https://nominatim.openstreetmap.org").replace(/\/+$/, "");
  const userAgent = options.userAgent ?? "rental-crew/0.1";

  return async (place, signal) => {
    const response = await fetch(`${baseUrl}/search?q=${encodeURIComponent(place)}&format=json&limit=1`, {
      headers: { "User-Agent": userAgent },
      signal,
    });
    if (!response.ok) throw new RouteUnavailableError(`Geocoding failed: ${response.status} ${response.statusText}`);

    const parsed = searchResultSchema.safeParse(await response.json());
    if (!parsed.success) throw new RouteUnavailableError("Geocoding returned an unexpected response");
    const [first] = parsed.data;
    return first ? [first.lat, first.lon] : null;
  };
}
