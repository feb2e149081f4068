/**
 * Loader - idempotent persistence of a merged entity set
 *
 * Writes table groups in dependency order:
 *   genres → tags → games → periods → facts → game_tags → game_genres
 * Each group completes before the next starts. Rows are written in batches;
 * a batch that fails is retried row by row so one bad row does not take the
 * rest of the batch with it.
 */

import { errorMessage } from "../../errors.js";
import { pipelineLogger } from "../../logger.js";
import {
  factKey,
  gameGenreKey,
  gameTagKey,
  type FactRow,
  type GameRow,
  type MergedEntitySet,
} from "../../types/index.js";

import type { DestinationStore, WriteOutcomes } from "./store.js";

// ============================================================================
// Types
// ============================================================================

export interface LoadFailure {
  key: string;
  reason: string;
}

export interface TableLoadStats {
  inserted: number;
  updated: number;
  unchanged: number;
  failed: number;
  failures: LoadFailure[];
}

export interface PeriodStats {
  resolved: number;
  missing: string[];
}

export interface LoadStats {
  genres: TableLoadStats;
  tags: TableLoadStats;
  games: TableLoadStats;
  periods: PeriodStats;
  facts: TableLoadStats;
  gameTags: TableLoadStats;
  gameGenres: TableLoadStats;
}

export type LoadTable = Exclude<keyof LoadStats, "periods">;

export interface LoaderOptions {
  batchSize: number;
}

export const DEFAULT_LOADER_OPTIONS: LoaderOptions = { batchSize: 100 };

export function emptyTableStats(): TableLoadStats {
  return { inserted: 0, updated: 0, unchanged: 0, failed: 0, failures: [] };
}

function chunk<T>(rows: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < rows.length; i += size) {
    chunks.push(rows.slice(i, i + size));
  }
  return chunks;
}

function gameRow(game: GameRow): GameRow {
  return {
    appid: game.appid,
    name: game.name,
    developer: game.developer,
    publisher: game.publisher,
    releaseDate: game.releaseDate,
    isFree: game.isFree,
    ownersMin: game.ownersMin,
    ownersMax: game.ownersMax,
    positiveReviews: game.positiveReviews,
    negativeReviews: game.negativeReviews,
  };
}

// ============================================================================
// Loader
// ============================================================================

export class Loader {
  private readonly options: LoaderOptions;

  constructor(
    private readonly store: DestinationStore,
    options: Partial<LoaderOptions> = {}
  ) {
    this.options = { ...DEFAULT_LOADER_OPTIONS, ...options };
  }

  async load(entities: MergedEntitySet): Promise<LoadStats> {
    const startTime = performance.now();

    const genres = await this.writeTable(
      "genres",
      entities.genres,
      (name) => name,
      (rows) => this.store.upsertGenres(rows)
    );
    const tags = await this.writeTable(
      "tags",
      entities.tags,
      (name) => name,
      (rows) => this.store.upsertTags(rows)
    );
    const games = await this.writeTable(
      "games",
      entities.games.map(gameRow),
      (game) => String(game.appid),
      (rows) => this.store.upsertGames(rows)
    );

    const failedGames = new Set(games.failures.map((f) => f.key));
    const loadedGames = new Set(
      entities.games
        .map((game) => game.appid)
        .filter((appid) => !failedGames.has(String(appid)))
    );
    const failedTags = new Set(tags.failures.map((f) => f.key));
    const failedGenres = new Set(genres.failures.map((f) => f.key));

    // Periods are read-only; facts for a month the calendar lacks fail
    const periodList = [...new Set(entities.facts.map((fact) => fact.period))];
    const knownPeriods =
      periodList.length > 0
        ? await this.store.resolvePeriods(periodList)
        : new Set<string>();
    const periods: PeriodStats = {
      resolved: periodList.filter((p) => knownPeriods.has(p)).length,
      missing: periodList.filter((p) => !knownPeriods.has(p)).sort(),
    };

    const factFailures: LoadFailure[] = [];
    const writableFacts: FactRow[] = [];
    for (const fact of entities.facts) {
      if (!loadedGames.has(fact.appid)) {
        factFailures.push({
          key: factKey(fact),
          reason: `game ${String(fact.appid)} was not loaded`,
        });
      } else if (!knownPeriods.has(fact.period)) {
        factFailures.push({
          key: factKey(fact),
          reason: `period ${fact.period} is not in the calendar`,
        });
      } else {
        writableFacts.push(fact);
      }
    }
    const facts = await this.writeTable(
      "facts",
      writableFacts,
      factKey,
      (rows) => this.store.upsertFacts(rows)
    );
    facts.failures.unshift(...factFailures);
    facts.failed += factFailures.length;

    const gameTags = await this.writeBridge(
      "gameTags",
      entities.gameTags,
      gameTagKey,
      (row) => loadedGames.has(row.appid) && !failedTags.has(row.tag),
      (rows) => this.store.linkGameTags(rows)
    );
    const gameGenres = await this.writeBridge(
      "gameGenres",
      entities.gameGenres,
      gameGenreKey,
      (row) => loadedGames.has(row.appid) && !failedGenres.has(row.genre),
      (rows) => this.store.linkGameGenres(rows)
    );

    const stats: LoadStats = {
      genres,
      tags,
      games,
      periods,
      facts,
      gameTags,
      gameGenres,
    };

    pipelineLogger.info(
      {
        games: summarize(games),
        facts: summarize(facts),
        gameTags: summarize(gameTags),
        missingPeriods: periods.missing.length,
        duration: `${String(Math.round(performance.now() - startTime))}ms`,
      },
      "Load complete"
    );

    return stats;
  }

  private async writeBridge<T>(
    table: LoadTable,
    rows: readonly T[],
    keyOf: (row: T) => string,
    writable: (row: T) => boolean,
    write: (rows: T[]) => Promise<WriteOutcomes>
  ): Promise<TableLoadStats> {
    const skipped = rows.filter((row) => !writable(row));
    const stats = await this.writeTable(
      table,
      rows.filter(writable),
      keyOf,
      write
    );
    for (const row of skipped) {
      stats.failures.push({
        key: keyOf(row),
        reason: "referenced game or lookup was not loaded",
      });
      stats.failed++;
    }
    return stats;
  }

  private async writeTable<T>(
    table: LoadTable,
    rows: readonly T[],
    keyOf: (row: T) => string,
    write: (rows: T[]) => Promise<WriteOutcomes>
  ): Promise<TableLoadStats> {
    const stats = emptyTableStats();

    for (const batch of chunk(rows, this.options.batchSize)) {
      try {
        tally(stats, batch, keyOf, await write(batch));
        continue;
      } catch (error) {
        pipelineLogger.warn(
          { table, rows: batch.length, error: errorMessage(error) },
          "Batch write failed, retrying rows individually"
        );
      }

      for (const row of batch) {
        try {
          tally(stats, [row], keyOf, await write([row]));
        } catch (error) {
          const reason = errorMessage(error);
          pipelineLogger.error(
            { table, key: keyOf(row), error: reason },
            "Row write failed"
          );
          stats.failures.push({ key: keyOf(row), reason });
          stats.failed++;
        }
      }
    }

    return stats;
  }
}

function tally<T>(
  stats: TableLoadStats,
  rows: readonly T[],
  keyOf: (row: T) => string,
  outcomes: WriteOutcomes
): void {
  for (const row of rows) {
    const outcome = outcomes.get(keyOf(row)) ?? "unchanged";
    stats[outcome]++;
  }
}

function summarize(stats: TableLoadStats): string {
  return `+${String(stats.inserted)} ~${String(stats.updated)} =${String(stats.unchanged)} !${String(stats.failed)}`;
}
