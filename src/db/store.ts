/**
 * PostgreSQL destination store
 *
 * Natural-key upserts for the loader. Inserts use ON CONFLICT; whether a
 * returned row was inserted or updated is read from xmax (0 on insert).
 * Conflicting rows whose values would not change are filtered by the
 * DO UPDATE ... WHERE clause, are not returned, and count as unchanged.
 */

import { sql, type Kysely } from "kysely";

import { ConstraintViolationError } from "../errors.js";
import { periodStartDate } from "../scraper/normalize.js";
import {
  factKey,
  gameGenreKey,
  gameTagKey,
  type FactRow,
  type GameGenreRow,
  type GameRow,
  type GameTagRow,
  type MetadataRecord,
  type PlayerMonthRecord,
  type PriceState,
  type PricingRecord,
} from "../types/index.js";

import type { Database } from "./types.js";
import type {
  DestinationStore,
  StoreBaseline,
  WriteOutcome,
  WriteOutcomes,
} from "../services/pipeline/store.js";

// Keeps IN (...) lists well under the bind parameter limit
const LOOKUP_CHUNK_SIZE = 1000;

function chunked<T>(values: readonly T[], size = LOOKUP_CHUNK_SIZE): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    chunks.push(values.slice(i, i + size));
  }
  return chunks;
}

function outcomeFromXmax(xmax: string): WriteOutcome {
  // xmax = 0 means INSERT, xmax > 0 means UPDATE
  return xmax === "0" ? "inserted" : "updated";
}

function withUnchanged(
  keys: readonly string[],
  written: Map<string, WriteOutcome>
): WriteOutcomes {
  return new Map(
    keys.map((key): [string, WriteOutcome] => [
      key,
      written.get(key) ?? "unchanged",
    ])
  );
}

function priceFromFact(fact: {
  current_price: number | null;
  original_price: number | null;
  discount_pct: number | null;
  is_discount_active: boolean;
}): PriceState | null {
  if (fact.current_price === null || fact.original_price === null) {
    return null;
  }
  return {
    currentPrice: fact.current_price,
    originalPrice: fact.original_price,
    discountPct: fact.discount_pct ?? 0,
    isDiscountActive: fact.is_discount_active,
  };
}

// ============================================================================
// Store
// ============================================================================

export class KyselyDestinationStore implements DestinationStore {
  constructor(private readonly db: Kysely<Database>) {}

  // --------------------------------------------------------------------------
  // Lookups
  // --------------------------------------------------------------------------

  async upsertGenres(names: readonly string[]): Promise<WriteOutcomes> {
    if (names.length === 0) {
      return new Map();
    }
    const rows = await this.db
      .insertInto("dim_genre")
      .values(names.map((genre_name) => ({ genre_name })))
      .onConflict((oc) => oc.column("genre_name").doNothing())
      .returning("genre_name")
      .execute();
    return withUnchanged(
      names,
      new Map(rows.map((row) => [row.genre_name, "inserted"] as const))
    );
  }

  async upsertTags(names: readonly string[]): Promise<WriteOutcomes> {
    if (names.length === 0) {
      return new Map();
    }
    const rows = await this.db
      .insertInto("dim_tag")
      .values(names.map((tag_name) => ({ tag_name })))
      .onConflict((oc) => oc.column("tag_name").doNothing())
      .returning("tag_name")
      .execute();
    return withUnchanged(
      names,
      new Map(rows.map((row) => [row.tag_name, "inserted"] as const))
    );
  }

  // --------------------------------------------------------------------------
  // Games
  // --------------------------------------------------------------------------

  async upsertGames(games: readonly GameRow[]): Promise<WriteOutcomes> {
    if (games.length === 0) {
      return new Map();
    }

    const values = games.map(
      (g) => sql`(
        ${g.appid},
        ${g.name},
        ${g.developer},
        ${g.publisher},
        ${g.releaseDate},
        ${g.isFree},
        ${g.ownersMin},
        ${g.ownersMax},
        ${g.positiveReviews},
        ${g.negativeReviews}
      )`
    );

    // Nullable columns keep their stored value when the new one is null
    const result = await sql<{ appid: number; xmax: string }>`
      INSERT INTO dim_game (
        appid,
        name,
        developer,
        publisher,
        release_date,
        is_free,
        steamspy_owners_min,
        steamspy_owners_max,
        positive_reviews,
        negative_reviews
      ) VALUES ${sql.join(values, sql`, `)}
      ON CONFLICT (appid) DO UPDATE SET
        name = EXCLUDED.name,
        developer = COALESCE(EXCLUDED.developer, dim_game.developer),
        publisher = COALESCE(EXCLUDED.publisher, dim_game.publisher),
        release_date = COALESCE(EXCLUDED.release_date, dim_game.release_date),
        is_free = COALESCE(EXCLUDED.is_free, dim_game.is_free),
        steamspy_owners_min = COALESCE(EXCLUDED.steamspy_owners_min, dim_game.steamspy_owners_min),
        steamspy_owners_max = COALESCE(EXCLUDED.steamspy_owners_max, dim_game.steamspy_owners_max),
        positive_reviews = EXCLUDED.positive_reviews,
        negative_reviews = EXCLUDED.negative_reviews,
        updated_at = NOW()
      WHERE (
        dim_game.name,
        dim_game.developer,
        dim_game.publisher,
        dim_game.release_date,
        dim_game.is_free,
        dim_game.steamspy_owners_min,
        dim_game.steamspy_owners_max,
        dim_game.positive_reviews,
        dim_game.negative_reviews
      ) IS DISTINCT FROM (
        EXCLUDED.name,
        COALESCE(EXCLUDED.developer, dim_game.developer),
        COALESCE(EXCLUDED.publisher, dim_game.publisher),
        COALESCE(EXCLUDED.release_date, dim_game.release_date),
        COALESCE(EXCLUDED.is_free, dim_game.is_free),
        COALESCE(EXCLUDED.steamspy_owners_min, dim_game.steamspy_owners_min),
        COALESCE(EXCLUDED.steamspy_owners_max, dim_game.steamspy_owners_max),
        EXCLUDED.positive_reviews,
        EXCLUDED.negative_reviews
      )
      RETURNING appid, xmax::text
    `.execute(this.db);

    return withUnchanged(
      games.map((g) => String(g.appid)),
      new Map(
        result.rows.map(
          (row) => [String(row.appid), outcomeFromXmax(row.xmax)] as const
        )
      )
    );
  }

  // --------------------------------------------------------------------------
  // Periods and Facts
  // --------------------------------------------------------------------------

  async resolvePeriods(periods: readonly string[]): Promise<Set<string>> {
    const dateIds = await this.dateIds(periods.map(periodStartDate));
    return new Set(periods.filter((p) => dateIds.has(periodStartDate(p))));
  }

  async upsertFacts(facts: readonly FactRow[]): Promise<WriteOutcomes> {
    if (facts.length === 0) {
      return new Map();
    }

    const gameIds = await this.gameIds(facts.map((f) => f.appid));
    const dateIds = await this.dateIds(facts.map((f) => periodStartDate(f.period)));
    const keyByIds = new Map<string, string>();

    const values = facts.map((f) => {
      const gameId = gameIds.get(f.appid);
      const dateId = dateIds.get(periodStartDate(f.period));
      if (gameId === undefined || dateId === undefined) {
        throw new ConstraintViolationError(
          factKey(f),
          gameId === undefined
            ? `No game row for appid ${String(f.appid)}`
            : `No calendar row for ${periodStartDate(f.period)}`
        );
      }
      keyByIds.set(`${String(gameId)}:${String(dateId)}`, factKey(f));
      return sql`(
        ${gameId},
        ${dateId},
        ${f.avgPlayers},
        ${f.peakPlayers},
        ${f.gainPct},
        ${f.currentPrice},
        ${f.originalPrice},
        ${f.discountPct},
        ${f.isDiscountActive}
      )`;
    });

    const result = await sql<{ game_id: number; date_id: number; xmax: string }>`
      INSERT INTO fact_player_price (
        game_id,
        date_id,
        concurrent_players_avg,
        concurrent_players_peak,
        gain_pct,
        current_price,
        original_price,
        discount_pct,
        is_discount_active
      ) VALUES ${sql.join(values, sql`, `)}
      ON CONFLICT (game_id, date_id) DO UPDATE SET
        concurrent_players_avg = EXCLUDED.concurrent_players_avg,
        concurrent_players_peak = EXCLUDED.concurrent_players_peak,
        gain_pct = EXCLUDED.gain_pct,
        current_price = EXCLUDED.current_price,
        original_price = EXCLUDED.original_price,
        discount_pct = EXCLUDED.discount_pct,
        is_discount_active = EXCLUDED.is_discount_active,
        updated_at = NOW()
      WHERE (
        fact_player_price.concurrent_players_avg,
        fact_player_price.concurrent_players_peak,
        fact_player_price.gain_pct,
        fact_player_price.current_price,
        fact_player_price.original_price,
        fact_player_price.discount_pct,
        fact_player_price.is_discount_active
      ) IS DISTINCT FROM (
        EXCLUDED.concurrent_players_avg,
        EXCLUDED.concurrent_players_peak,
        EXCLUDED.gain_pct,
        EXCLUDED.current_price,
        EXCLUDED.original_price,
        EXCLUDED.discount_pct,
        EXCLUDED.is_discount_active
      )
      RETURNING game_id, date_id, xmax::text
    `.execute(this.db);

    const written = new Map<string, WriteOutcome>();
    for (const row of result.rows) {
      const key = keyByIds.get(`${String(row.game_id)}:${String(row.date_id)}`);
      if (key !== undefined) {
        written.set(key, outcomeFromXmax(row.xmax));
      }
    }
    return withUnchanged(facts.map(factKey), written);
  }

  // --------------------------------------------------------------------------
  // Bridges
  // --------------------------------------------------------------------------

  async linkGameTags(rows: readonly GameTagRow[]): Promise<WriteOutcomes> {
    if (rows.length === 0) {
      return new Map();
    }
    const gameIds = await this.gameIds(rows.map((r) => r.appid));
    const tagIds = await this.lookupIds(
      "dim_tag",
      rows.map((r) => r.tag)
    );

    const values = rows.map((row) => {
      const game_id = gameIds.get(row.appid);
      const tag_id = tagIds.get(row.tag);
      if (game_id === undefined || tag_id === undefined) {
        throw new ConstraintViolationError(
          gameTagKey(row),
          `Missing game or tag for ${gameTagKey(row)}`
        );
      }
      return { game_id, tag_id };
    });

    const inserted = await this.db
      .insertInto("bridge_game_tag")
      .values(values)
      .onConflict((oc) => oc.columns(["game_id", "tag_id"]).doNothing())
      .returning(["game_id", "tag_id"])
      .execute();

    const inv = new Set(
      inserted.map((r) => `${String(r.game_id)}:${String(r.tag_id)}`)
    );
    return new Map(
      rows.map((row, i): [string, WriteOutcome] => {
        const ids = values[i];
        const isNew =
          ids !== undefined &&
          inv.has(`${String(ids.game_id)}:${String(ids.tag_id)}`);
        return [gameTagKey(row), isNew ? "inserted" : "unchanged"];
      })
    );
  }

  async linkGameGenres(rows: readonly GameGenreRow[]): Promise<WriteOutcomes> {
    if (rows.length === 0) {
      return new Map();
    }
    const gameIds = await this.gameIds(rows.map((r) => r.appid));
    const genreIds = await this.lookupIds(
      "dim_genre",
      rows.map((r) => r.genre)
    );

    const values = rows.map((row) => {
      const game_id = gameIds.get(row.appid);
      const genre_id = genreIds.get(row.genre);
      if (game_id === undefined || genre_id === undefined) {
        throw new ConstraintViolationError(
          gameGenreKey(row),
          `Missing game or genre for ${gameGenreKey(row)}`
        );
      }
      return { game_id, genre_id };
    });

    const inserted = await this.db
      .insertInto("bridge_game_genre")
      .values(values)
      .onConflict((oc) => oc.columns(["game_id", "genre_id"]).doNothing())
      .returning(["game_id", "genre_id"])
      .execute();

    const inv = new Set(
      inserted.map((r) => `${String(r.game_id)}:${String(r.genre_id)}`)
    );
    return new Map(
      rows.map((row, i): [string, WriteOutcome] => {
        const ids = values[i];
        const isNew =
          ids !== undefined &&
          inv.has(`${String(ids.game_id)}:${String(ids.genre_id)}`);
        return [gameGenreKey(row), isNew ? "inserted" : "unchanged"];
      })
    );
  }

  // --------------------------------------------------------------------------
  // Incremental Runs
  // --------------------------------------------------------------------------

  async knownAppIds(): Promise<number[]> {
    const rows = await this.db
      .selectFrom("dim_game")
      .select("appid")
      .orderBy("appid")
      .execute();
    return rows.map((row) => row.appid);
  }

  async loadBaseline(appids: readonly number[]): Promise<StoreBaseline> {
    const baseline: StoreBaseline = { metadata: [], pricing: [], timeseries: [] };

    for (const ids of chunked([...new Set(appids)])) {
      const games = await this.db
        .selectFrom("dim_game")
        .selectAll()
        .where("appid", "in", ids)
        .orderBy("appid")
        .execute();
      if (games.length === 0) {
        continue;
      }

      const tags = await this.db
        .selectFrom("bridge_game_tag as b")
        .innerJoin("dim_game as g", "g.game_id", "b.game_id")
        .innerJoin("dim_tag as t", "t.tag_id", "b.tag_id")
        .select(["g.appid", "t.tag_name"])
        .where("g.appid", "in", ids)
        .execute();
      const genres = await this.db
        .selectFrom("bridge_game_genre as b")
        .innerJoin("dim_game as g", "g.game_id", "b.game_id")
        .innerJoin("dim_genre as r", "r.genre_id", "b.genre_id")
        .select(["g.appid", "r.genre_name"])
        .where("g.appid", "in", ids)
        .execute();

      // Latest month per game
      const latest = await this.db
        .selectFrom("fact_player_price as f")
        .innerJoin("dim_game as g", "g.game_id", "f.game_id")
        .innerJoin("dim_date as d", "d.date_id", "f.date_id")
        .distinctOn("g.appid")
        .select([
          "g.appid",
          "d.full_date",
          "f.concurrent_players_avg",
          "f.concurrent_players_peak",
          "f.gain_pct",
          "f.current_price",
          "f.original_price",
          "f.discount_pct",
          "f.is_discount_active",
        ])
        .where("g.appid", "in", ids)
        .orderBy("g.appid")
        .orderBy("d.full_date", "desc")
        .execute();

      const tagsByApp = groupNames(tags.map((r) => [r.appid, r.tag_name] as const));
      const genresByApp = groupNames(genres.map((r) => [r.appid, r.genre_name] as const));
      const latestByApp = new Map(latest.map((row) => [row.appid, row] as const));

      for (const game of games) {
        const fact = latestByApp.get(game.appid);
        const price = fact !== undefined ? priceFromFact(fact) : null;

        const metadata: MetadataRecord = {
          appid: game.appid,
          name: game.name,
          developer: game.developer,
          publisher: game.publisher,
          ownersMin: game.steamspy_owners_min,
          ownersMax: game.steamspy_owners_max,
          positiveReviews: game.positive_reviews,
          negativeReviews: game.negative_reviews,
          genres: genresByApp.get(game.appid) ?? [],
          tags: tagsByApp.get(game.appid) ?? [],
          price,
        };
        const pricing: PricingRecord = {
          appid: game.appid,
          name: game.name,
          isFree: game.is_free,
          releaseDate: game.release_date,
          developer: game.developer,
          publisher: game.publisher,
          price,
          currency: null,
        };
        baseline.metadata.push(metadata);
        baseline.pricing.push(pricing);

        if (fact !== undefined) {
          const month: PlayerMonthRecord = {
            appid: game.appid,
            period: fact.full_date.slice(0, 7),
            avgPlayers: fact.concurrent_players_avg,
            peakPlayers: fact.concurrent_players_peak,
            gain: null,
            gainPct: fact.gain_pct,
          };
          baseline.timeseries.push(month);
        }
      }
    }

    return baseline;
  }

  // --------------------------------------------------------------------------
  // Id Resolution
  // --------------------------------------------------------------------------

  private async gameIds(appids: readonly number[]): Promise<Map<number, number>> {
    const ids = new Map<number, number>();
    for (const batch of chunked([...new Set(appids)])) {
      const rows = await this.db
        .selectFrom("dim_game")
        .select(["appid", "game_id"])
        .where("appid", "in", batch)
        .execute();
      for (const row of rows) {
        ids.set(row.appid, row.game_id);
      }
    }
    return ids;
  }

  private async dateIds(dates: readonly string[]): Promise<Map<string, number>> {
    const ids = new Map<string, number>();
    for (const batch of chunked([...new Set(dates)])) {
      const rows = await this.db
        .selectFrom("dim_date")
        .select(["full_date", "date_id"])
        .where("full_date", "in", batch)
        .execute();
      for (const row of rows) {
        ids.set(row.full_date, row.date_id);
      }
    }
    return ids;
  }

  private async lookupIds(
    table: "dim_tag" | "dim_genre",
    names: readonly string[]
  ): Promise<Map<string, number>> {
    const ids = new Map<string, number>();
    for (const batch of chunked([...new Set(names)])) {
      const rows =
        table === "dim_tag"
          ? (
              await this.db
                .selectFrom("dim_tag")
                .select(["tag_name", "tag_id"])
                .where("tag_name", "in", batch)
                .execute()
            ).map((row) => ({ name: row.tag_name, id: row.tag_id }))
          : (
              await this.db
                .selectFrom("dim_genre")
                .select(["genre_name", "genre_id"])
                .where("genre_name", "in", batch)
                .execute()
            ).map((row) => ({ name: row.genre_name, id: row.genre_id }));
      for (const row of rows) {
        ids.set(row.name, row.id);
      }
    }
    return ids;
  }
}

function groupNames(
  pairs: readonly (readonly [number, string])[]
): Map<number, string[]> {
  const groups = new Map<number, string[]>();
  for (const [appid, name] of pairs) {
    const names = groups.get(appid) ?? [];
    names.push(name);
    groups.set(appid, names);
  }
  for (const names of groups.values()) {
    names.sort();
  }
  return groups;
}
