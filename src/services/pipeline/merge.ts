/**
 * Merge Engine
 *
 * Joins the three normalized record sets on appid. Metadata is the
 * discovery authority (left side of every join); pricing and time-series
 * records for appids it does not know are excluded.
 *
 * Field authority:
 * - price state: pricing, else metadata
 * - release date, developer, publisher, free flag: pricing when it has a
 *   value, else the metadata value is kept
 * - player metrics: time-series only
 */

import {
  gameGenreKey,
  gameTagKey,
  type FactRow,
  type GameGenreRow,
  type GameTagRow,
  type MergedEntitySet,
  type MergedGame,
  type MergeStats,
  type MetadataRecord,
  type PlayerMonthRecord,
  type PriceState,
  type PricingRecord,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface MergeInput {
  metadata: readonly MetadataRecord[];
  timeseries: readonly PlayerMonthRecord[];
  pricing: readonly PricingRecord[];
}

export interface MergeResult {
  entities: MergedEntitySet;
  stats: MergeStats;
}

export const UNKNOWN_GAME_NAME = "Unknown";

// ============================================================================
// Grouping
// ============================================================================

function canonical(value: unknown): string {
  return JSON.stringify(value);
}

function compareCanonical(a: unknown, b: unknown): number {
  const left = canonical(a);
  const right = canonical(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function groupByAppId<T extends { appid: number }>(
  records: readonly T[]
): Map<number, T[]> {
  const groups = new Map<number, T[]>();
  for (const record of records) {
    const group = groups.get(record.appid);
    if (group !== undefined) {
      group.push(record);
    } else {
      groups.set(record.appid, [record]);
    }
  }
  return groups;
}

function firstNonNull<T, V>(
  records: readonly T[],
  pick: (record: T) => V | null
): V | null {
  for (const record of records) {
    const value = pick(record);
    if (value !== null) {
      return value;
    }
  }
  return null;
}

function union(lists: readonly string[][]): string[] {
  return [...new Set(lists.flat())].sort();
}

/**
 * Collapse several metadata records for one appid. Records are ordered
 * canonically first so the result does not depend on arrival order.
 */
export function combineMetadata(
  records: readonly MetadataRecord[]
): MetadataRecord | null {
  const ordered = [...records].sort(compareCanonical);
  const first = ordered[0];
  if (first === undefined) {
    return null;
  }
  return {
    appid: first.appid,
    name: firstNonNull(ordered, (r) => r.name),
    developer: firstNonNull(ordered, (r) => r.developer),
    publisher: firstNonNull(ordered, (r) => r.publisher),
    ownersMin: firstNonNull(ordered, (r) =>
      r.ownersMin !== null && r.ownersMax !== null ? r.ownersMin : null
    ),
    ownersMax: firstNonNull(ordered, (r) =>
      r.ownersMin !== null && r.ownersMax !== null ? r.ownersMax : null
    ),
    positiveReviews: first.positiveReviews,
    negativeReviews: first.negativeReviews,
    genres: union(ordered.map((r) => r.genres)),
    tags: union(ordered.map((r) => r.tags)),
    price: firstNonNull(ordered, (r) => r.price),
  };
}

export function combinePricing(
  records: readonly PricingRecord[]
): PricingRecord | null {
  const ordered = [...records].sort(compareCanonical);
  const first = ordered[0];
  if (first === undefined) {
    return null;
  }
  return {
    appid: first.appid,
    name: firstNonNull(ordered, (r) => r.name),
    isFree: firstNonNull(ordered, (r) => r.isFree),
    releaseDate: firstNonNull(ordered, (r) => r.releaseDate),
    developer: firstNonNull(ordered, (r) => r.developer),
    publisher: firstNonNull(ordered, (r) => r.publisher),
    price: firstNonNull(ordered, (r) => r.price),
    currency: firstNonNull(ordered, (r) => r.currency),
  };
}

// ============================================================================
// Row Builders
// ============================================================================

export function resolvePrice(
  metadata: MetadataRecord,
  pricing: PricingRecord | null
): PriceState | null {
  return pricing?.price ?? metadata.price;
}

export function buildGame(
  metadata: MetadataRecord,
  pricing: PricingRecord | null
): MergedGame {
  return {
    appid: metadata.appid,
    name: metadata.name ?? pricing?.name ?? UNKNOWN_GAME_NAME,
    developer: pricing?.developer ?? metadata.developer,
    publisher: pricing?.publisher ?? metadata.publisher,
    releaseDate: pricing?.releaseDate ?? null,
    isFree: pricing?.isFree ?? null,
    ownersMin: metadata.ownersMin,
    ownersMax: metadata.ownersMax,
    positiveReviews: metadata.positiveReviews,
    negativeReviews: metadata.negativeReviews,
    price: resolvePrice(metadata, pricing),
    tags: metadata.tags,
    genres: metadata.genres,
  };
}

/**
 * Stamp a month of player metrics with the game's current price snapshot.
 */
export function buildFact(
  month: PlayerMonthRecord,
  price: PriceState | null
): FactRow {
  return {
    appid: month.appid,
    period: month.period,
    avgPlayers: month.avgPlayers,
    peakPlayers: month.peakPlayers,
    gainPct: month.gainPct,
    currentPrice: price?.currentPrice ?? null,
    originalPrice: price?.originalPrice ?? null,
    discountPct: price?.discountPct ?? null,
    isDiscountActive: price?.isDiscountActive ?? false,
  };
}

// ============================================================================
// Merge
// ============================================================================

/**
 * Merge the three sources into games, lookups, facts and bridges.
 *
 * Output sets are sorted by natural key. Facts are not deduplicated here;
 * see dedupeFacts().
 */
export function mergeSources(input: MergeInput): MergeResult {
  const metadataById = groupByAppId(input.metadata);
  const pricingById = groupByAppId(input.pricing);
  const monthsById = groupByAppId(input.timeseries);

  const games: MergedGame[] = [];
  const facts: FactRow[] = [];
  const gameTags = new Map<string, GameTagRow>();
  const gameGenres = new Map<string, GameGenreRow>();
  const tags = new Set<string>();
  const genres = new Set<string>();

  const appids = [...metadataById.keys()].sort((a, b) => a - b);

  for (const appid of appids) {
    const metadata = combineMetadata(metadataById.get(appid) ?? []);
    if (metadata === null) {
      continue;
    }
    const pricing = combinePricing(pricingById.get(appid) ?? []);
    const game = buildGame(metadata, pricing);
    games.push(game);

    for (const tag of game.tags) {
      tags.add(tag);
      const row = { appid, tag };
      gameTags.set(gameTagKey(row), row);
    }
    for (const genre of game.genres) {
      genres.add(genre);
      const row = { appid, genre };
      gameGenres.set(gameGenreKey(row), row);
    }

    const months = [...(monthsById.get(appid) ?? [])].sort(compareCanonical);
    for (const month of months) {
      facts.push(buildFact(month, game.price));
    }
  }

  const excluded = new Set<number>();
  for (const appid of [...pricingById.keys(), ...monthsById.keys()]) {
    if (!metadataById.has(appid)) {
      excluded.add(appid);
    }
  }

  const entities: MergedEntitySet = {
    games,
    genres: [...genres].sort(),
    tags: [...tags].sort(),
    facts: facts.sort(
      (a, b) => a.appid - b.appid || a.period.localeCompare(b.period)
    ),
    gameTags: [...gameTags.values()],
    gameGenres: [...gameGenres.values()],
  };

  return {
    entities,
    stats: {
      games: entities.games.length,
      genres: entities.genres.length,
      tags: entities.tags.length,
      facts: entities.facts.length,
      gameTags: entities.gameTags.length,
      gameGenres: entities.gameGenres.length,
      excludedAppIds: [...excluded].sort((a, b) => a - b),
    },
  };
}
