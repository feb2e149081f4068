import type {
  ColumnType,
  Generated,
  Insertable,
  Selectable,
  Updateable,
} from "kysely";

// ============================================================================
// Column Helpers
// ============================================================================

/**
 * DATE columns are read back as "YYYY-MM-DD" strings and NUMERIC columns as
 * numbers (see the type parsers in connection.ts).
 */
type DateColumn = string;

type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;

// ============================================================================
// ENUM Types (matching CHECK constraints in postgres-schema.sql)
// ============================================================================

export type RunStatus =
  | "running"
  | "succeeded"
  | "partial"
  | "failed"
  | "aborted"
  | "cancelled";

export type RunType = "full" | "metadata" | "timeseries" | "pricing";

// ============================================================================
// Dimension Tables
// ============================================================================

/**
 * dim_date - Calendar with sale period flags. Seeded once, read-only to
 * the pipeline.
 */
export interface DimDateTable {
  date_id: Generated<number>;
  full_date: DateColumn;
  year: number;
  quarter: number;
  month: number;
  day: number;
  day_of_week: number;
  is_weekend: boolean;
  is_steam_sale_period: Generated<boolean>;
  steam_sale_name: string | null;
  created_at: Generated<Timestamp>;
}

export interface DimGenreTable {
  genre_id: Generated<number>;
  genre_name: string;
  created_at: Generated<Timestamp>;
}

export interface DimTagTable {
  tag_id: Generated<number>;
  tag_name: string;
  created_at: Generated<Timestamp>;
}

/**
 * dim_game - One row per Steam appid
 */
export interface DimGameTable {
  game_id: Generated<number>;
  appid: number;
  name: string;
  developer: string | null;
  publisher: string | null;
  release_date: DateColumn | null;
  is_free: boolean | null;
  steamspy_owners_min: number | null;
  steamspy_owners_max: number | null;
  positive_reviews: Generated<number>;
  negative_reviews: Generated<number>;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

// ============================================================================
// Bridge Tables
// ============================================================================

export interface BridgeGameTagTable {
  game_id: number;
  tag_id: number;
}

export interface BridgeGameGenreTable {
  game_id: number;
  genre_id: number;
}

// ============================================================================
// Fact Table
// ============================================================================

/**
 * fact_player_price - One row per (game, month); date_id points at the
 * first day of the month.
 */
export interface FactPlayerPriceTable {
  fact_id: Generated<number>;
  game_id: number;
  date_id: number;
  concurrent_players_avg: number | null;
  concurrent_players_peak: number | null;
  gain_pct: number | null;
  current_price: number | null;
  original_price: number | null;
  discount_pct: number | null;
  is_discount_active: Generated<boolean>;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

// ============================================================================
// Run History
// ============================================================================

/**
 * pipeline_runs - One row per orchestrator run with its JSON summary
 */
export interface PipelineRunsTable {
  run_id: Generated<number>;
  run_type: RunType;
  status: RunStatus;
  started_at: Timestamp;
  finished_at: Timestamp | null;
  requested_appids: number | null;
  games_loaded: number | null;
  facts_loaded: number | null;
  failures: number | null;
  summary: unknown;
  created_at: Generated<Timestamp>;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  dim_date: DimDateTable;
  dim_genre: DimGenreTable;
  dim_tag: DimTagTable;
  dim_game: DimGameTable;
  bridge_game_tag: BridgeGameTagTable;
  bridge_game_genre: BridgeGameGenreTable;
  fact_player_price: FactPlayerPriceTable;
  pipeline_runs: PipelineRunsTable;
}

// ============================================================================
// Row Types
// ============================================================================

export type DimDate = Selectable<DimDateTable>;
export type NewDimDate = Insertable<DimDateTable>;

export type DimGame = Selectable<DimGameTable>;
export type NewDimGame = Insertable<DimGameTable>;
export type DimGameUpdate = Updateable<DimGameTable>;

export type FactPlayerPrice = Selectable<FactPlayerPriceTable>;
export type NewFactPlayerPrice = Insertable<FactPlayerPriceTable>;

export type PipelineRun = Selectable<PipelineRunsTable>;
export type NewPipelineRun = Insertable<PipelineRunsTable>;
