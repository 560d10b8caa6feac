import { format, isExists, isValid, parse, subHours } from "date-fns";
import { DateParseError, UpstreamSchemaError } from "./errors";
import type { DateRange } from "../types";

export const DATE_FORMAT_HUMANS = "yyyy-MM-dd";
export const DATE_FORMAT_API = "dd/MM/yyyy";

// DD/MM/YYYY, optionally followed by HH:mm or HH:mm:ss
const VENDOR_TIMESTAMP =
  /^(\d{2})\/(\d{2})\/(\d{4})(?: (\d{2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * Parses a `YYYY-MM-DD` argument as UTC midnight of that calendar day.
 * Throws {@link DateParseError} for anything else, including impossible
 * dates such as 2022-02-30.
 */
export function parseHumanDate(input: string): Date {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(input)) {
    throw new DateParseError(input);
  }
  const local = parse(input, DATE_FORMAT_HUMANS, new Date(0));
  if (!isValid(local)) {
    throw new DateParseError(input);
  }
  return new Date(
    Date.UTC(local.getFullYear(), local.getMonth(), local.getDate())
  );
}

/** Renders the UTC calendar day of `instant` as DD/MM/YYYY. */
export function formatApiDate(instant: Date): string {
  const day = new Date(
    instant.getUTCFullYear(),
    instant.getUTCMonth(),
    instant.getUTCDate()
  );
  return format(day, DATE_FORMAT_API);
}

/**
 * Resolves the optional CLI dates into the vendor's encoding.
 *
 * Defaults to yesterday (now - 24h) through today. An inverted range is
 * returned as is; the vendor decides what it means.
 */
export function resolveDateRange(
  start?: string,
  end?: string,
  now: Date = new Date()
): DateRange {
  const startDate = start ? parseHumanDate(start) : subHours(now, 24);
  const endDate = end ? parseHumanDate(end) : now;
  return {
    start: formatApiDate(startDate),
    end: formatApiDate(endDate),
  };
}

/**
 * Rewrites a vendor timestamp as `YYYY-MM-DDTHH:mm:ss` wall-clock time.
 * Fields are copied as written; no time zone applies.
 */
export function toCatalogTimestamp(raw: string): string {
  const match = VENDOR_TIMESTAMP.exec(raw);
  if (match) {
    const [, day, month, year, hours = "00", minutes = "00", seconds = "00"] =
      match;
    if (
      isExists(Number(year), Number(month) - 1, Number(day)) &&
      Number(hours) < 24 &&
      Number(minutes) < 60 &&
      Number(seconds) < 60
    ) {
      return `${year}-${month}-${day}T${hours}:${minutes}:${seconds}`;
    }
  }
  throw new UpstreamSchemaError(
    "readings",
    `unrecognised timestamp '${raw}'`
  );
}
