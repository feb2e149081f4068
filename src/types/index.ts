/**
 * Normalized record shapes produced by the source clients and consumed by
 * the merge engine, deduplicator and loader.
 */

// ============================================================================
// Sources
// ============================================================================

export type SourceName = "metadata" | "timeseries" | "pricing";

export const SOURCE_NAMES: readonly SourceName[] = [
  "metadata",
  "timeseries",
  "pricing",
];

/**
 * Price state in currency units (never cents).
 */
export interface PriceState {
  currentPrice: number;
  originalPrice: number;
  discountPct: number;
  isDiscountActive: boolean;
}

/**
 * SteamSpy: discovery authority, owner estimates, reviews, tags, genres.
 */
export interface MetadataRecord {
  appid: number;
  name: string | null;
  developer: string | null;
  publisher: string | null;
  ownersMin: number | null;
  ownersMax: number | null;
  positiveReviews: number;
  negativeReviews: number;
  genres: string[];
  tags: string[];
  price: PriceState | null;
}

/**
 * Steam Store: price snapshot, release info and company names.
 */
export interface PricingRecord {
  appid: number;
  name: string | null;
  isFree: boolean | null;
  releaseDate: string | null; // YYYY-MM-DD
  developer: string | null;
  publisher: string | null;
  price: PriceState | null;
  currency: string | null;
}

/**
 * SteamCharts: one row per (appid, month).
 */
export interface PlayerMonthRecord {
  appid: number;
  period: string; // YYYY-MM
  avgPlayers: number | null;
  peakPlayers: number | null;
  gain: number | null;
  gainPct: number | null;
}

export interface SourceRecordMap {
  metadata: MetadataRecord;
  timeseries: PlayerMonthRecord;
  pricing: PricingRecord;
}

// ============================================================================
// Merge Output
// ============================================================================

export interface GameRow {
  appid: number;
  name: string;
  developer: string | null;
  publisher: string | null;
  releaseDate: string | null;
  /** null when no source states it */
  isFree: boolean | null;
  ownersMin: number | null;
  ownersMax: number | null;
  positiveReviews: number;
  negativeReviews: number;
}

/**
 * A merged game keeps the resolved price state in memory; the price is
 * persisted on fact rows only.
 */
export interface MergedGame extends GameRow {
  price: PriceState | null;
  tags: string[];
  genres: string[];
}

export interface FactRow {
  appid: number;
  period: string; // YYYY-MM
  avgPlayers: number | null;
  peakPlayers: number | null;
  gainPct: number | null;
  currentPrice: number | null;
  originalPrice: number | null;
  discountPct: number | null;
  isDiscountActive: boolean;
}

export interface GameTagRow {
  appid: number;
  tag: string;
}

export interface GameGenreRow {
  appid: number;
  genre: string;
}

export interface MergedEntitySet {
  games: MergedGame[];
  genres: string[];
  tags: string[];
  facts: FactRow[];
  gameTags: GameTagRow[];
  gameGenres: GameGenreRow[];
}

export interface MergeStats {
  games: number;
  genres: number;
  tags: number;
  facts: number;
  gameTags: number;
  gameGenres: number;
  excludedAppIds: number[];
}

// ============================================================================
// Natural Keys
// ============================================================================

export function factKey(row: { appid: number; period: string }): string {
  return `${String(row.appid)}:${row.period}`;
}

export function gameTagKey(row: GameTagRow): string {
  return `${String(row.appid)}:${row.tag}`;
}

export function gameGenreKey(row: GameGenreRow): string {
  return `${String(row.appid)}:${row.genre}`;
}
