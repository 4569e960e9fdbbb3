import { describe, it, expect } from "vitest";
import { QueryParseError } from "../errors.js";
import { parseRentalQuery, rentalDays } from "./parse-query.js";

const referenceDate = new Date("2024-03-01T12:00:00Z");

function parseError(text: string): unknown {
  try {
    parseRentalQuery(text, { referenceDate });
  } catch (err) {
    return err;
  }
  throw new Error(`Expected "${text}" to be rejected`);
}

describe("parseRentalQuery", () => {
  it("parses a single-location request with month-name dates", () => {
    const rawText = "car rental in Miami from June 1st to June 5th";
    const query = parseRentalQuery(rawText, { referenceDate });

    expect(query).toEqual({
      location: "Miami",
      startDate: "2024-06-01",
      endDate: "2024-06-05",
      rawText,
      roundTrip: true,
    });
    expect(Object.isFrozen(query)).toBe(true);
  });

  it("reads a pickup place and destination from 'from X to Y'", () => {
    const rawText = "I need an SUV from Miami to Orlando, 2024-07-10 to 2024-07-14";
    const query = parseRentalQuery(rawText, { referenceDate });

    expect(query).toEqual({
      location: "Orlando",
      startDate: "2024-07-10",
      endDate: "2024-07-14",
      rawText,
      origin: "Miami",
      roundTrip: false,
      carSize: "suv",
    });
  });

  it("keeps one-way journeys marked as round trips when asked", () => {
    const query = parseRentalQuery("from Boston to New York and back, round trip, June 1 to June 8", { referenceDate });

    expect(query.origin).toBe("Boston");
    expect(query.location).toBe("New York");
    expect(query.roundTrip).toBe(true);
  });

  it("accepts numeric month/day dates", () => {
    const query = parseRentalQuery("minivan at LAX 6/10 - 6/15", { referenceDate });

    expect(query.location).toBe("LAX");
    expect(query.carSize).toBe("minivan");
    expect(query.startDate).toBe("2024-06-10");
    expect(query.endDate).toBe("2024-06-15");
  });

  it("moves a year-less return date into the next year", () => {
    const query = parseRentalQuery("car in Denver from December 28 to January 3", {
      referenceDate: new Date("2024-11-01T00:00:00Z"),
    });

    expect(query.location).toBe("Denver");
    expect(query.startDate).toBe("2024-12-28");
    expect(query.endDate).toBe("2025-01-03");
  });

  it("gives a year-less pickup date the year written on the return date", () => {
    const rawText = "car rental in Miami from June 1st to June 5th 2025";
    const query = parseRentalQuery(rawText, { referenceDate });

    expect(query.startDate).toBe("2025-06-01");
    expect(query.endDate).toBe("2025-06-05");
    expect(rentalDays(query)).toBe(4);
  });

  it("puts a year-less pickup in the previous year when the return year would put it after return", () => {
    const query = parseRentalQuery("car in Denver from December 28 to January 3, 2025", { referenceDate });

    expect(query.startDate).toBe("2024-12-28");
    expect(query.endDate).toBe("2025-01-03");
  });

  it("skips number pairs that cannot be a month and day", () => {
    const rawText = "car rental in Miami with 24/7 roadside from June 1 to June 5";
    const query = parseRentalQuery(rawText, { referenceDate });

    expect(query).toEqual({
      location: "Miami",
      startDate: "2024-06-01",
      endDate: "2024-06-05",
      rawText,
      roundTrip: true,
    });
  });

  it("keeps a two-letter state after the place", () => {
    expect(parseRentalQuery("car rental in Miami, FL from June 1 to June 5", { referenceDate }).location).toBe("Miami, FL");

    const journey = parseRentalQuery("from Tampa to Miami, FL, June 1 to June 5", { referenceDate });
    expect(journey.origin).toBe("Tampa");
    expect(journey.location).toBe("Miami, FL");
  });

  it("rejects a return date equal to the pickup date", () => {
    const rawText = "car in Boston from 2024-05-01 to 2024-05-01";
    const err = parseError(rawText);

    expect(err).toBeInstanceOf(QueryParseError);
    expect(err instanceof QueryParseError && err.message).toBe("Return date must be after the pickup date");
    expect(err instanceof QueryParseError && err.rawText).toBe(rawText);
  });

  it("rejects requests without two dates", () => {
    const err = parseError("car in Boston on June 3rd");
    expect(err instanceof QueryParseError && err.message).toBe("Could not find both a pickup and a return date");
  });

  it("rejects requests without a location", () => {
    const err = parseError("rent a car June 1 to June 4");
    expect(err instanceof QueryParseError && err.message).toBe("Could not find a rental location");
  });

  it("rejects impossible calendar dates", () => {
    const err = parseError("car in Denver from 2024-02-30 to 2024-03-02");
    expect(err).toBeInstanceOf(QueryParseError);
    expect(err instanceof Error && err.message).toMatch(/^Invalid date in request/);
  });

  it("rejects empty text", () => {
    const err = parseError("   ");
    expect(err instanceof QueryParseError && err.message).toBe("Request text is empty");
  });
});

describe("rentalDays", () => {
  it("counts whole days between pickup and return", () => {
    expect(rentalDays({ startDate: "2024-06-01", endDate: "2024-06-05" })).toBe(4);
  });
});
