import type {
  FactRow,
  GameGenreRow,
  GameRow,
  GameTagRow,
  MetadataRecord,
  PlayerMonthRecord,
  PricingRecord,
} from "../../types/index.js";

// ============================================================================
// Write Outcomes
// ============================================================================

export type WriteOutcome = "inserted" | "updated" | "unchanged";

/** Outcome per natural key of one batch write */
export type WriteOutcomes = Map<string, WriteOutcome>;

// ============================================================================
// Baseline
// ============================================================================

/**
 * Stored state expressed as source records, used in place of sources a run
 * does not fetch.
 */
export interface StoreBaseline {
  metadata: MetadataRecord[];
  pricing: PricingRecord[];
  timeseries: PlayerMonthRecord[];
}

// ============================================================================
// Destination Store
// ============================================================================

/**
 * Natural-key batch primitives the loader needs from the destination.
 *
 * Keys in the returned maps:
 * - genres/tags: the name
 * - games: String(appid)
 * - facts: factKey() ("appid:YYYY-MM")
 * - bridges: gameTagKey() / gameGenreKey()
 *
 * A batch either applies completely or throws; the loader then retries the
 * rows one at a time.
 */
export interface DestinationStore {
  /** Insert missing names; existing names are left untouched */
  upsertGenres(names: readonly string[]): Promise<WriteOutcomes>;
  upsertTags(names: readonly string[]): Promise<WriteOutcomes>;
  /**
   * Insert or update by appid. Nullable fields are never overwritten with
   * null; the creation timestamp is preserved.
   */
  upsertGames(games: readonly GameRow[]): Promise<WriteOutcomes>;
  /** Periods ("YYYY-MM") whose first day exists in the calendar */
  resolvePeriods(periods: readonly string[]): Promise<Set<string>>;
  /** Insert or update every metric field by (appid, period) */
  upsertFacts(facts: readonly FactRow[]): Promise<WriteOutcomes>;
  linkGameTags(rows: readonly GameTagRow[]): Promise<WriteOutcomes>;
  linkGameGenres(rows: readonly GameGenreRow[]): Promise<WriteOutcomes>;
  knownAppIds(): Promise<number[]>;
  loadBaseline(appids: readonly number[]): Promise<StoreBaseline>;
}
