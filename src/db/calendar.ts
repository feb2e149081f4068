/**
 * Calendar dimension rows, including the recurring Steam sale windows.
 */

import { sql, type Kysely } from "kysely";

import { dbLogger } from "../logger.js";

import type { Database, NewDimDate } from "./types.js";

// ============================================================================
// Sale Windows
// ============================================================================

interface SaleWindow {
  name: string;
  /** Inclusive [month, day] bounds; a window may wrap the year end */
  from: [number, number];
  to: [number, number];
}

export const SALE_WINDOWS: readonly SaleWindow[] = [
  { name: "Winter Sale", from: [12, 20], to: [1, 5] },
  { name: "Summer Sale", from: [6, 20], to: [7, 10] },
  { name: "Spring Sale", from: [3, 15], to: [3, 30] },
  { name: "Autumn Sale", from: [11, 20], to: [11, 30] },
];

function ordinal(month: number, day: number): number {
  return month * 100 + day;
}

export function saleWindowFor(month: number, day: number): string | null {
  const current = ordinal(month, day);
  for (const window of SALE_WINDOWS) {
    const start = ordinal(...window.from);
    const end = ordinal(...window.to);
    const inside =
      start <= end
        ? current >= start && current <= end
        : current >= start || current <= end;
    if (inside) {
      return window.name;
    }
  }
  return null;
}

// ============================================================================
// Day Rows
// ============================================================================

const DAY_MS = 24 * 60 * 60 * 1000;

function parseIsoDate(value: string): number {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (match?.[1] === undefined || match[2] === undefined || match[3] === undefined) {
    throw new RangeError(`Expected YYYY-MM-DD, got "${value}"`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

/**
 * One row per day between two dates, both inclusive.
 * day_of_week is 0 for Sunday through 6 for Saturday.
 */
export function buildCalendarDays(from: string, to: string): NewDimDate[] {
  const start = parseIsoDate(from);
  const end = parseIsoDate(to);
  if (end < start) {
    throw new RangeError(`Calendar range ends before it starts: ${from} > ${to}`);
  }

  const rows: NewDimDate[] = [];
  for (let time = start; time <= end; time += DAY_MS) {
    const date = new Date(time);
    const year = date.getUTCFullYear();
    const month = date.getUTCMonth() + 1;
    const day = date.getUTCDate();
    const dayOfWeek = date.getUTCDay();
    const sale = saleWindowFor(month, day);

    rows.push({
      full_date: date.toISOString().slice(0, 10),
      year,
      quarter: Math.floor((month - 1) / 3) + 1,
      month,
      day,
      day_of_week: dayOfWeek,
      is_weekend: dayOfWeek === 0 || dayOfWeek === 6,
      is_steam_sale_period: sale !== null,
      steam_sale_name: sale,
    });
  }
  return rows;
}

// ============================================================================
// Seeding
// ============================================================================

export const DEFAULT_CALENDAR_RANGE = {
  from: "2015-01-01",
  to: "2035-12-31",
} as const;

const SEED_BATCH_SIZE = 1000;

/**
 * Insert calendar days that are not there yet. Returns the number of new rows.
 */
export async function seedCalendar(
  db: Kysely<Database>,
  range: { from: string; to: string } = DEFAULT_CALENDAR_RANGE
): Promise<number> {
  const rows = buildCalendarDays(range.from, range.to);
  let inserted = 0;

  for (let i = 0; i < rows.length; i += SEED_BATCH_SIZE) {
    const result = await db
      .insertInto("dim_date")
      .values(rows.slice(i, i + SEED_BATCH_SIZE))
      .onConflict((oc) => oc.column("full_date").doNothing())
      .executeTakeFirst();
    inserted += Number(result.numInsertedOrUpdatedRows ?? 0n);
  }

  const total = await db
    .selectFrom("dim_date")
    .select(sql<number>`COUNT(*)::int`.as("count"))
    .executeTakeFirstOrThrow();

  dbLogger.info(
    { ...range, inserted, total: total.count },
    "Calendar seeded"
  );
  return inserted;
}
