import { DateTime } from "luxon";
import { QueryParseError } from "../errors.js";
import type { RentalQuery, VehicleClass } from "../types.js";

export interface ParseQueryOptions {
  /** Supplies the year for dates written without one (default: now) */
  referenceDate?: Date;
}

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

// ISO dates, then "June 1st[, 2024]", then "6/1[/2024]".
const DATE_PATTERN = new RegExp(
  [
    String.raw`\b(\d{4})-(\d{2})-(\d{2})\b`,
    String.raw`\b(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\.?\s+(\d{1,2})(?:st|nd|rd|th)?(?:,?\s+(\d{4}))?\b`,
    String.raw`\b(\d{1,2})\/(\d{1,2})(?:\/(\d{4}))?\b`,
  ].join("|"),
  "gi",
);

const DATE_MARKER = "|";
const STOP_WORDS = "from|to|between|on|for|until|through|till|starting|and|with";

const ROUTE_PATTERN = new RegExp(
  String.raw`\bfrom\s+([a-z][^|]*?)\s+to\s+([a-z][^|]*?)(?=\s*(?:\||[,;!?]|$|\b(?:from|between|on|for|in|until|through|starting|and|with)\b))`,
  "i",
);
const LOCATION_PATTERN = new RegExp(
  String.raw`\b(?:in|at|near)\s+([a-z][^|]*?)(?=\s*(?:\||[,;!?]|\.\s|\.$|$|\b(?:${STOP_WORDS})\b))`,
  "i",
);

// Case-sensitive: "Miami, FL" but not "Miami, so".
const STATE_SUFFIX = /^,\s*([A-Z]{2})\b/;

const VEHICLE_CLASS_PATTERNS: Array<[VehicleClass, RegExp]> = [
  ["economy", /\beconomy\b/i],
  ["compact", /\bcompact\b/i],
  ["mid-size", /\b(?:mid-?size|intermediate)\b/i],
  ["full-size", /\b(?:full-?size|standard)\b/i],
  ["suv", /\bsuvs?\b/i],
  ["minivan", /\b(?:minivan|van)\b/i],
  ["convertible", /\bconvertible\b/i],
  ["luxury", /\b(?:luxury|premium)\b/i],
];

interface DateMatch {
  index: number;
  length: number;
  year?: number;
  month: number;
  day: number;
}

function toDateMatch(m: RegExpMatchArray): DateMatch {
  const index = m.index ?? 0;
  const length = m[0].length;
  if (m[1] !== undefined) {
    return { index, length, year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) };
  }
  if (m[4] !== undefined) {
    const month = MONTHS[m[4].slice(0, 3).toLowerCase()] ?? 0;
    return { index, length, year: m[6] !== undefined ? Number(m[6]) : undefined, month, day: Number(m[5]) };
  }
  return { index, length, year: m[9] !== undefined ? Number(m[9]) : undefined, month: Number(m[7]), day: Number(m[8]) };
}

/** Rules out tokens like "24/7" before they are taken as dates. */
function isPlausibleDate(match: DateMatch): boolean {
  return match.month >= 1 && match.month <= 12 && match.day >= 1 && match.day <= 31;
}

function toDateTime(match: DateMatch, year: number, rawText: string): DateTime {
  const date = DateTime.fromObject({ year: match.year ?? year, month: match.month, day: match.day }, { zone: "utc" });
  if (!date.isValid) {
    throw new QueryParseError(`Invalid date in request: ${date.invalidExplanation ?? date.invalidReason ?? "unknown"}`, rawText);
  }
  return date;
}

function cleanPlace(place: string): string {
  return place.replace(/\s+/g, " ").replace(/^[\s,.;:-]+|[\s,.;:!?-]+$/g, "").trim();
}

/** Appends a two-letter state written right after the place ("Miami, FL"). */
function withState(place: string, text: string, end: number): string {
  const state = text.slice(end).match(STATE_SUFFIX)?.[1];
  return state === undefined ? place : `${place}, ${state}`;
}

function extractPlaces(text: string): { location?: string; origin?: string } {
  const route = text.match(ROUTE_PATTERN);
  if (route?.[1] !== undefined && route[2] !== undefined) {
    const origin = cleanPlace(route[1]);
    const destination = withState(cleanPlace(route[2]), text, (route.index ?? 0) + route[0].length);
    if (destination) {
      return origin && origin.toLowerCase() !== destination.toLowerCase()
        ? { location: destination, origin }
        : { location: destination };
    }
  }
  const single = text.match(LOCATION_PATTERN);
  if (single?.[1] !== undefined) {
    const location = withState(cleanPlace(single[1]), text, (single.index ?? 0) + single[0].length);
    if (location) return { location };
  }
  return {};
}

function extractCarSize(text: string): VehicleClass | undefined {
  for (const [vehicleClass, pattern] of VEHICLE_CLASS_PATTERNS) {
    if (pattern.test(text)) return vehicleClass;
  }
  return undefined;
}

/**
 * Turn a free-text request ("car rental in Miami from June 1st to June 5th")
 * into a frozen RentalQuery.
 *
 * The first two dates found are the pickup and return dates; number pairs
 * that cannot be a month and day are skipped. A pickup date without a year
 * takes the return date's year when that one has it, else the reference
 * year. A year-less return date that would fall before pickup moves into the
 * following year. "from X to Y" names a pickup
 * place and a destination; otherwise "in/at/near X" names the location.
 *
 * @throws QueryParseError when no location or fewer than two dates are found,
 * a date is not a real calendar date, or pickup is not before return.
 */
export function parseRentalQuery(rawText: string, options: ParseQueryOptions = {}): RentalQuery {
  const text = rawText.trim();
  if (!text) throw new QueryParseError("Request text is empty", rawText);

  const referenceYear = DateTime.fromJSDate(options.referenceDate ?? new Date(), { zone: "utc" }).year;
  const matches = [...text.matchAll(DATE_PATTERN)].map(toDateMatch).filter(isPlausibleDate);
  if (matches.length < 2) {
    throw new QueryParseError("Could not find both a pickup and a return date", rawText);
  }

  const [startMatch, endMatch] = matches;
  let start: DateTime;
  let end: DateTime;
  if (startMatch.year === undefined && endMatch.year !== undefined) {
    end = toDateTime(endMatch, endMatch.year, rawText);
    start = toDateTime(startMatch, end.year, rawText);
    if (start > end) start = start.minus({ years: 1 });
  } else {
    start = toDateTime(startMatch, referenceYear, rawText);
    end = toDateTime(endMatch, start.year, rawText);
    if (endMatch.year === undefined && end < start) end = end.plus({ years: 1 });
  }

  if (start >= end) {
    throw new QueryParseError("Return date must be after the pickup date", rawText);
  }

  let withoutDates = text;
  for (const m of [...matches].reverse()) {
    withoutDates = withoutDates.slice(0, m.index) + DATE_MARKER + withoutDates.slice(m.index + m.length);
  }

  const { location, origin } = extractPlaces(withoutDates);
  if (!location) throw new QueryParseError("Could not find a rental location", rawText);

  const carSize = extractCarSize(withoutDates);
  const roundTrip = origin === undefined || /\bround[\s-]?trip\b/i.test(text);

  return Object.freeze({
    location,
    startDate: start.toISODate() ?? "",
    endDate: end.toISODate() ?? "",
    rawText,
    ...(origin !== undefined && { origin }),
    roundTrip,
    ...(carSize !== undefined && { carSize }),
  });
}

/** Whole days between pickup and return. */
export function rentalDays(query: Pick<RentalQuery, "startDate" | "endDate">): number {
  const start = DateTime.fromISO(query.startDate, { zone: "utc" });
  const end = DateTime.fromISO(query.endDate, { zone: "utc" });
  return Math.max(1, Math.round(end.diff(start, "days").days));
}
