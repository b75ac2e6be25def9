import type { Schema } from "../types.js";

export const DEFAULT_BASE_URL = "https://www.ndbc.noaa.gov";

/** First year published in the post-2007 layout */
export const MIN_YEAR = 2007;

// Monthly files of the current year use a month code in place of the file code
const MONTH_CODES = "123456789abc";
const MONTH_NAMES = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

/**
 * One archival file: a whole year, or a month of the current year.
 */
export interface Period {
  year: number;
  month?: number;
}

export type PeriodRange =
  | { year: number }
  | { month: number }
  | { from?: number; to?: number };

/**
 * List the archival periods covered by a range, oldest first.
 *
 * Past years are published as one file each. The current year is published
 * month by month, up to (not including) the current month.
 */
export function historicalPeriods(
  range: PeriodRange = {},
  now: Date = new Date(),
): Period[] {
  const currentYear = now.getUTCFullYear();
  const currentMonth = now.getUTCMonth() + 1;

  if ("year" in range) {
    const { year } = range;
    if (!Number.isInteger(year) || year < MIN_YEAR || year >= currentYear) {
      throw new RangeError(
        `Year must be between ${MIN_YEAR} and ${currentYear - 1}: ${year}`,
      );
    }
    return [{ year }];
  }

  if ("month" in range) {
    const { month } = range;
    if (!Number.isInteger(month) || month < 1 || month >= currentMonth) {
      throw new RangeError(
        `Month must be a published month of ${currentYear}: ${month}`,
      );
    }
    return [{ year: currentYear, month }];
  }

  const from = range.from ?? MIN_YEAR;
  const to = range.to ?? currentYear;

  if (from < MIN_YEAR) {
    throw new RangeError(`Minimum year is ${MIN_YEAR}`);
  }
  if (to < from) {
    throw new RangeError(`Invalid year range: ${from}-${to}`);
  }

  const periods: Period[] = [];
  for (let year = from; year <= Math.min(to, currentYear - 1); year++) {
    periods.push({ year });
  }
  if (to >= currentYear) {
    for (let month = 1; month < currentMonth; month++) {
      periods.push({ year: currentYear, month });
    }
  }
  return periods;
}

function trimBase(baseUrl: string) {
  return baseUrl.replace(/\/+$/, "");
}

/**
 * Locator of the rolling ~45 day window of a continuous category.
 */
export function realtimeLocator(
  schema: Schema,
  station: string,
  baseUrl = DEFAULT_BASE_URL,
): string {
  if (schema.feed !== "continuous") {
    throw new Error(`${schema.id} is not a realtime category`);
  }
  return `${trimBase(baseUrl)}/data/realtime2/${station.toUpperCase()}.${schema.code}`;
}

export function historicalLocator(
  schema: Schema,
  station: string,
  period: Period,
  baseUrl = DEFAULT_BASE_URL,
): string {
  if (schema.feed !== "archival") {
    throw new Error(`${schema.id} is not a historical category`);
  }

  const id = station.toLowerCase();
  const base = `${trimBase(baseUrl)}/view_text_file.php`;

  if (period.month === undefined) {
    return `${base}?filename=${id}${schema.code}${period.year}.txt.gz&dir=data/historical/${schema.name}/`;
  }

  const code = MONTH_CODES[period.month - 1];
  const name = MONTH_NAMES[period.month - 1];
  if (!code || !name) {
    throw new RangeError(`Invalid month: ${period.month}`);
  }
  return `${base}?filename=${id}${code}${period.year}.txt.gz&dir=data/${schema.name}/${name}/`;
}

export function metadataLocator(
  station: string,
  baseUrl = DEFAULT_BASE_URL,
): string {
  return `${trimBase(baseUrl)}/station_page.php?station=${station.toLowerCase()}`;
}

export function stationTableLocator(baseUrl = DEFAULT_BASE_URL): string {
  return `${trimBase(baseUrl)}/data/stations/station_table.txt`;
}

export function stationOwnersLocator(baseUrl = DEFAULT_BASE_URL): string {
  return `${trimBase(baseUrl)}/data/stations/station_owners.txt`;
}

export function formatPeriod(period: Period): string {
  return period.month === undefined
    ? `${period.year}`
    : `${period.year}-${String(period.month).padStart(2, "0")}`;
}
