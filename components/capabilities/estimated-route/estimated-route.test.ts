import { describe, it, expect, vi } from "vitest";
import { abortError, isAbortError } from "@rental-crew/core";
import { createEstimatedRouteCapability, loadRouteData, mainRouteFor, regionOf, rentalTips } from "./estimated-route.js";
import { createNominatimGeocoder } from "./nominatim.js";

const signal = () => new AbortController().signal;
const request = (origin: string, destination: string, roundTrip = false) => ({
  origin,
  destination,
  startDate: "2024-06-01",
  endDate: "2024-06-05",
  roundTrip,
});

describe("regions and main routes", () => {
  it("places cities and states in regions", () => {
    expect(regionOf("Miami, FL")).toBe("southeast");
    expect(regionOf("Denver, Colorado")).toBe("west");
    expect(regionOf("Springfield")).toBeUndefined();
  });

  it("prefers the interstate between regions, then known city pairs", () => {
    expect(mainRouteFor("Chicago", "Denver")).toBe("I-80 W, I-90 W");
    expect(mainRouteFor("Boston", "New York")).toBe("I-95 S");
    expect(mainRouteFor("Springfield", "Shelbyville")).toBe("Major Interstates");
  });
});

describe("rentalTips", () => {
  it("puts round-trip tips first and caps the list", () => {
    const data = loadRouteData();
    const tips = rentalTips({ origin: "Denver", destination: "Denver", roundTrip: true, distanceMiles: 0, drivingHours: 0 });
    expect(tips).toEqual(data.tips.roundTrip);
  });
});

describe("createEstimatedRouteCapability", () => {
  it("estimates a one-way journey from known coordinates", async () => {
    const info = await createEstimatedRouteCapability().route(request("Miami", "Orlando"), signal());

    expect(info).toEqual({
      origin: "Miami",
      destination: "Orlando",
      distanceMiles: 266,
      durationMinutes: 246,
      mainRoute: "Florida's Turnpike N",
      notes: [
        "Request a car with good AC for hot weather",
        "Consider a convertible for beach driving",
        "Ask about water/sand damage policies",
        "Book 2+ weeks ahead for best rates",
        "Check insurance coverage before renting",
      ],
    });
  });

  it("doubles distance and time for round trips and names both directions", async () => {
    const info = await createEstimatedRouteCapability().route(request("Boston", "New York", true), signal());

    expect(info.distanceMiles).toBe(494);
    expect(info.durationMinutes).toBe(456);
    expect(info.mainRoute).toBe("I-95 S (outbound), I-95 N (return)");
    expect(info.notes[0]).toBe("Round-trip rentals typically offer better daily rates");
  });

  it("adds long-distance tips for cross-country drives", async () => {
    const info = await createEstimatedRouteCapability().route(request("New York", "Los Angeles"), signal());

    expect(info.distanceMiles).toBe(3175);
    expect(info.notes).toEqual([
      "Check the vehicle's comfort for long drives",
      "Plan your route with regular rest stops every 2-3 hours",
      "Consider reserving hotels along your route in advance",
      "Verify if there are mileage limits on your rental",
      "Pack emergency supplies for long interstate drives",
    ]);
  });

  it("guesses a stable distance for places it cannot locate", async () => {
    const info = await createEstimatedRouteCapability().route(request("Springfield", "Shelbyville"), signal());

    expect(info.distanceMiles).toBe(929);
    expect(info.durationMinutes).toBe(858);
    expect(info.mainRoute).toBe("Major Interstates");
    expect(info.notes.slice(0, 2)).toEqual([
      "Check the vehicle's comfort for long drives",
      "Plan for a 1 day journey with overnight stops",
    ]);
  });

  it("returns tips only when both ends are the same place", async () => {
    const info = await createEstimatedRouteCapability().route(request("Miami", "miami", true), signal());

    expect(info.distanceMiles).toBeUndefined();
    expect(info.durationMinutes).toBeUndefined();
    expect(info.notes).toHaveLength(5);
  });

  it("falls back to an estimate when the geocoder fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const geocode = vi.fn(async () => {
      throw new Error("geocoder offline");
    });

    const info = await createEstimatedRouteCapability({ geocode }).route(request("Springfield", "Shelbyville"), signal());

    expect(info.distanceMiles).toBe(929);
    expect(geocode).toHaveBeenCalledTimes(2);
    warn.mockRestore();
  });

  it("propagates cancellation from the geocoder", async () => {
    const controller = new AbortController();
    controller.abort();
    const geocode = vi.fn(async () => {
      throw abortError();
    });

    const err = await createEstimatedRouteCapability({ geocode })
      .route(request("Miami", "Orlando"), controller.signal)
      .catch((e: unknown) => e);

    expect(isAbortError(err)).toBe(true);
  });
});

describe("createNominatimGeocoder", () => {
  it("queries the search endpoint and reads the first result", async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify([{ lat: "25.76", lon: "-80.19" }]), { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const coords = await createNominatimGeocoder({ baseUrl: "http://geo.test/" })("Miami, FL", signal());

    expect(coords).toEqual([25.76, -80.19]);
    expect(fetchMock).toHaveBeenCalledWith("http://geo.test/search?q=Miami%2C%20FL&format=json&limit=1", expect.anything());
    vi.unstubAllGlobals();
  });

  it("returns null when nothing matches", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("[]", { status: 200 })));

    expect(await createNominatimGeocoder()("Nowhere", signal())).toBeNull();
    vi.unstubAllGlobals();
  });
});
