/**
 * Value normalizers shared by the source clients.
 *
 * All functions are pure and return null for values they cannot read;
 * the caller decides whether a null makes the whole record malformed.
 */

import type { PriceState } from "../types/index.js";

// ============================================================================
// Patterns
// ============================================================================

const MONTHS_SHORT = [
  "jan",
  "feb",
  "mar",
  "apr",
  "may",
  "jun",
  "jul",
  "aug",
  "sep",
  "oct",
  "nov",
  "dec",
];

const MONTHS_LONG = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

// "Aug 21, 2012" / "Sept 5, 2019"
const MONTH_DAY_YEAR_PATTERN = /^([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})$/;
// "21 Aug, 2012"
const DAY_MONTH_YEAR_PATTERN = /^(\d{1,2})\s+([A-Za-z]{3,9})\.?,?\s+(\d{4})$/;
// "January 2024"
const MONTH_YEAR_PATTERN = /^([A-Za-z]+)\s+(\d{4})$/;

const OWNERS_SEPARATOR = "..";
const MAX_COMPANY_LENGTH = 500;

// ============================================================================
// Numbers
// ============================================================================

/**
 * Parse a numeric cell such as "1,234", "+1,234.5" or "-56".
 * "-", "N/A" and empty strings read as null.
 */
export function parseNumber(value: string | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const cleaned = value.replaceAll(",", "").trim().replace(/^\+/, "");
  if (cleaned === "" || cleaned === "-" || cleaned.toUpperCase() === "N/A") {
    return null;
  }
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parse "+5.2%" / "-10.5%" into 5.2 / -10.5.
 */
export function parsePercent(value: string | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  return parseNumber(value.replace(/%\s*$/, ""));
}

/**
 * Coerce a JSON value that may be a number or a numeric string.
 */
export function toNumber(value: number | string | null | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    return parseNumber(value);
  }
  return null;
}

// ============================================================================
// Owners
// ============================================================================

export interface OwnersRange {
  min: number;
  max: number;
}

/**
 * Split a SteamSpy owners estimate ("50,000,000 .. 100,000,000").
 */
export function parseOwnersRange(
  value: string | null | undefined
): OwnersRange | null {
  if (value === null || value === undefined) {
    return null;
  }
  const parts = value.split(OWNERS_SEPARATOR);
  if (parts.length !== 2) {
    return null;
  }
  const min = parseNumber(parts[0]);
  const max = parseNumber(parts[1]);
  if (
    min === null ||
    max === null ||
    !Number.isInteger(min) ||
    !Number.isInteger(max) ||
    min < 0 ||
    min > max
  ) {
    return null;
  }
  return { min, max };
}

// ============================================================================
// Collections
// ============================================================================

/**
 * Split a comma-separated listing into a sorted, deduplicated set of names.
 */
export function splitNameList(value: string | null | undefined): string[] {
  if (value === null || value === undefined) {
    return [];
  }
  return uniqueSorted(value.split(","));
}

/**
 * Reduce a tag-name → weight mapping to its names.
 * SteamSpy sends [] instead of {} for apps without tags.
 */
export function tagNames(value: Record<string, number> | unknown[] | undefined): string[] {
  if (value === undefined || Array.isArray(value)) {
    return [];
  }
  return uniqueSorted(Object.keys(value));
}

export function uniqueSorted(values: Iterable<string>): string[] {
  const set = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed !== "") {
      set.add(trimmed);
    }
  }
  return [...set].sort();
}

/**
 * Join company names and cap the result at the column width.
 */
export function joinCompanies(names: string[] | undefined): string | null {
  if (names === undefined) {
    return null;
  }
  const joined = names
    .map((name) => name.trim())
    .filter((name) => name !== "")
    .join(", ");
  return joined === "" ? null : joined.slice(0, MAX_COMPANY_LENGTH);
}

/**
 * Empty or whitespace-only strings read as null.
 */
export function nonEmpty(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

// ============================================================================
// Money
// ============================================================================

/**
 * Minor currency units (cents) to a two-decimal currency amount.
 */
export function centsToAmount(cents: number): number {
  return Math.round(cents) / 100;
}

export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(100, Math.max(0, Math.round(value)));
}

/**
 * Build a price state from cent amounts. Returns null when the current or
 * original price is missing.
 */
export function priceFromCents(
  finalCents: number | null,
  initialCents: number | null,
  discountPercent: number | null
): PriceState | null {
  if (finalCents === null || initialCents === null) {
    return null;
  }
  const discountPct = clampPercent(discountPercent ?? 0);
  return {
    currentPrice: centsToAmount(finalCents),
    originalPrice: centsToAmount(initialCents),
    discountPct,
    isDiscountActive: discountPct > 0,
  };
}

// ============================================================================
// Dates
// ============================================================================

function monthIndex(name: string): number | null {
  const lower = name.toLowerCase();
  const long = MONTHS_LONG.indexOf(lower);
  if (long !== -1) {
    return long + 1;
  }
  const short = MONTHS_SHORT.indexOf(lower.slice(0, 3));
  // "Sept" and similar abbreviations; reject words that only share a prefix
  if (short !== -1 && lower.length <= 4) {
    return short + 1;
  }
  return null;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function toIsoDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Parse a store release date ("Aug 21, 2012" or "21 Aug, 2012") to
 * YYYY-MM-DD. "Coming soon", "To be announced" and absent values are null.
 */
export function parseReleaseDate(value: string | null | undefined): string | null {
  const text = nonEmpty(value);
  if (text === null) {
    return null;
  }

  const mdy = MONTH_DAY_YEAR_PATTERN.exec(text);
  if (mdy?.[1] !== undefined && mdy[2] !== undefined && mdy[3] !== undefined) {
    const month = monthIndex(mdy[1]);
    return month === null
      ? null
      : toIsoDate(Number(mdy[3]), month, Number(mdy[2]));
  }

  const dmy = DAY_MONTH_YEAR_PATTERN.exec(text);
  if (dmy?.[1] !== undefined && dmy[2] !== undefined && dmy[3] !== undefined) {
    const month = monthIndex(dmy[2]);
    return month === null
      ? null
      : toIsoDate(Number(dmy[3]), month, Number(dmy[1]));
  }

  return null;
}

/**
 * Parse a month label ("January 2024") to a period key ("2024-01").
 */
export function parseMonthPeriod(value: string | null | undefined): string | null {
  const text = nonEmpty(value);
  if (text === null) {
    return null;
  }
  const match = MONTH_YEAR_PATTERN.exec(text);
  if (match?.[1] === undefined || match[2] === undefined) {
    return null;
  }
  const month = MONTHS_LONG.indexOf(match[1].toLowerCase());
  if (month === -1) {
    return null;
  }
  return `${match[2]}-${pad(month + 1)}`;
}

/**
 * First calendar day of a period key ("2024-01" → "2024-01-01").
 */
export function periodStartDate(period: string): string {
  return `${period}-01`;
}
