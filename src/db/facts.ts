import { periodStartDate } from "../scraper/normalize.js";

import type { Database } from "./types.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface FactQuery {
  appids?: readonly number[];
  /** Inclusive "YYYY-MM" bounds */
  from?: string;
  to?: string;
}

export interface FactReadRow {
  appid: number;
  name: string;
  period: string;
  avgPlayers: number | null;
  peakPlayers: number | null;
  gainPct: number | null;
  currentPrice: number | null;
  originalPrice: number | null;
  discountPct: number | null;
  isDiscountActive: boolean;
  isSalePeriod: boolean;
  saleName: string | null;
}

const PERIOD_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

export function assertPeriod(value: string): string {
  if (!PERIOD_PATTERN.test(value)) {
    throw new RangeError(`Expected a YYYY-MM period, got "${value}"`);
  }
  return value;
}

// ============================================================================
// Reader
// ============================================================================

/**
 * Read side of the fact table for downstream analysis.
 */
export class FactReader {
  constructor(private readonly db: Kysely<Database>) {}

  async readFacts(query: FactQuery = {}): Promise<FactReadRow[]> {
    if (query.appids?.length === 0) {
      return [];
    }

    let builder = this.db
      .selectFrom("fact_player_price as f")
      .innerJoin("dim_game as g", "g.game_id", "f.game_id")
      .innerJoin("dim_date as d", "d.date_id", "f.date_id")
      .select([
        "g.appid",
        "g.name",
        "d.full_date",
        "d.is_steam_sale_period",
        "d.steam_sale_name",
        "f.concurrent_players_avg",
        "f.concurrent_players_peak",
        "f.gain_pct",
        "f.current_price",
        "f.original_price",
        "f.discount_pct",
        "f.is_discount_active",
      ]);

    if (query.appids !== undefined) {
      builder = builder.where("g.appid", "in", [...query.appids]);
    }
    if (query.from !== undefined) {
      builder = builder.where(
        "d.full_date",
        ">=",
        periodStartDate(assertPeriod(query.from))
      );
    }
    if (query.to !== undefined) {
      builder = builder.where(
        "d.full_date",
        "<=",
        periodStartDate(assertPeriod(query.to))
      );
    }

    const rows = await builder
      .orderBy("g.appid")
      .orderBy("d.full_date")
      .execute();

    return rows.map((row) => ({
      appid: row.appid,
      name: row.name,
      period: row.full_date.slice(0, 7),
      avgPlayers: row.concurrent_players_avg,
      peakPlayers: row.concurrent_players_peak,
      gainPct: row.gain_pct,
      currentPrice: row.current_price,
      originalPrice: row.original_price,
      discountPct: row.discount_pct,
      isDiscountActive: row.is_discount_active,
      isSalePeriod: row.is_steam_sale_period,
      saleName: row.steam_sale_name,
    }));
  }
}
