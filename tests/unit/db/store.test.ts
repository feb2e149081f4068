import { describe, it, expect } from "vitest";

import { KyselyDestinationStore } from "../../../src/db/store.js";
import { ConstraintViolationError } from "../../../src/errors.js";
import { factRow, HALF_PRICE } from "../../fixtures/records.js";
import { FakeDatabase } from "../../mocks/kysely.js";

import type { GameRow } from "../../../src/types/index.js";

function gameRow(overrides: Partial<GameRow> = {}): GameRow {
  return {
    appid: 730,
    name: "Counter-Strike 2",
    developer: "Valve Corporation",
    publisher: "Valve",
    releaseDate: "2012-08-21",
    isFree: false,
    ownersMin: 50000000,
    ownersMax: 100000000,
    positiveReviews: 7000000,
    negativeReviews: 1000000,
    ...overrides,
  };
}

describe("db/store", () => {
  describe("lookups", () => {
    it("should mark names returned by the insert as inserted", async () => {
      const fake = new FakeDatabase().respondRows([{ tag_name: "FPS" }]);
      const store = new KyselyDestinationStore(fake.db);

      const outcomes = await store.upsertTags(["FPS", "Shooter"]);

      expect([...outcomes]).toEqual([
        ["FPS", "inserted"],
        ["Shooter", "unchanged"],
      ]);
      expect(fake.queries[0]?.sql).toContain('on conflict ("tag_name") do nothing');
      expect(fake.queries[0]?.parameters).toEqual(["FPS", "Shooter"]);
    });

    it("should not query for an empty batch", async () => {
      const fake = new FakeDatabase();
      const store = new KyselyDestinationStore(fake.db);

      expect((await store.upsertGenres([])).size).toBe(0);
      expect(fake.queries).toEqual([]);
    });
  });

  describe("upsertGames", () => {
    it("should read inserts and updates from xmax", async () => {
      const fake = new FakeDatabase().respondRows([
        { appid: 730, xmax: "0" },
        { appid: 570, xmax: "4821" },
      ]);
      const store = new KyselyDestinationStore(fake.db);

      const outcomes = await store.upsertGames([
        gameRow(),
        gameRow({ appid: 570 }),
        gameRow({ appid: 10 }),
      ]);

      expect([...outcomes]).toEqual([
        ["730", "inserted"],
        ["570", "updated"],
        ["10", "unchanged"],
      ]);
    });

    it("should keep stored values when the new ones are null", async () => {
      const fake = new FakeDatabase();
      const store = new KyselyDestinationStore(fake.db);

      await store.upsertGames([gameRow({ releaseDate: null })]);

      const query = fake.queries[0];
      expect(query?.sql).toContain(
        "release_date = COALESCE(EXCLUDED.release_date, dim_game.release_date)"
      );
      expect(query?.sql).toContain("IS DISTINCT FROM");
      expect(query?.parameters).toEqual([
        730,
        "Counter-Strike 2",
        "Valve Corporation",
        "Valve",
        null,
        false,
        50000000,
        100000000,
        7000000,
        1000000,
      ]);
    });
  });

  describe("facts", () => {
    it("should resolve periods through the calendar", async () => {
      const fake = new FakeDatabase().respondRows([
        { full_date: "2024-01-01", date_id: 3288 },
      ]);
      const store = new KyselyDestinationStore(fake.db);

      const periods = await store.resolvePeriods(["2024-01", "1999-01"]);

      expect([...periods]).toEqual(["2024-01"]);
      expect(fake.queries[0]?.parameters).toEqual(["2024-01-01", "1999-01-01"]);
    });

    it("should upsert facts by game and date id", async () => {
      const fake = new FakeDatabase().respondRows(
        [{ appid: 730, game_id: 1 }],
        [{ full_date: "2024-01-01", date_id: 3288 }],
        [{ game_id: 1, date_id: 3288, xmax: "0" }]
      );
      const store = new KyselyDestinationStore(fake.db);

      const outcomes = await store.upsertFacts([factRow()]);

      expect([...outcomes]).toEqual([["730:2024-01", "inserted"]]);
      const insert = fake.queries[2];
      expect(insert?.sql).toContain("ON CONFLICT (game_id, date_id) DO UPDATE SET");
      expect(insert?.parameters).toEqual([
        1,
        3288,
        32456,
        65789,
        3.95,
        HALF_PRICE.currentPrice,
        HALF_PRICE.originalPrice,
        50,
        true,
      ]);
    });

    it("should count rows filtered by the change check as unchanged", async () => {
      const fake = new FakeDatabase().respondRows(
        [{ appid: 730, game_id: 1 }],
        [{ full_date: "2024-01-01", date_id: 3288 }],
        []
      );
      const store = new KyselyDestinationStore(fake.db);

      const outcomes = await store.upsertFacts([factRow()]);

      expect(outcomes.get("730:2024-01")).toBe("unchanged");
    });

    it("should refuse facts for months missing from the calendar", async () => {
      const fake = new FakeDatabase().respondRows([{ appid: 730, game_id: 1 }], []);
      const store = new KyselyDestinationStore(fake.db);

      const error = await store.upsertFacts([factRow()]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConstraintViolationError);
      expect(error).toMatchObject({
        key: "730:2024-01",
        message: "No calendar row for 2024-01-01",
      });
      expect(fake.queries).toHaveLength(2);
    });
  });

  describe("bridges", () => {
    it("should report existing links as unchanged", async () => {
      const fake = new FakeDatabase().respondRows(
        [{ appid: 730, game_id: 1 }],
        [
          { tag_name: "FPS", tag_id: 10 },
          { tag_name: "Shooter", tag_id: 11 },
        ],
        [{ game_id: 1, tag_id: 11 }]
      );
      const store = new KyselyDestinationStore(fake.db);

      const outcomes = await store.linkGameTags([
        { appid: 730, tag: "FPS" },
        { appid: 730, tag: "Shooter" },
      ]);

      expect([...outcomes]).toEqual([
        ["730:FPS", "unchanged"],
        ["730:Shooter", "inserted"],
      ]);
      expect(fake.queries[2]?.parameters).toEqual([1, 10, 1, 11]);
    });

    it("should refuse links to unknown lookups", async () => {
      const fake = new FakeDatabase().respondRows([{ appid: 730, game_id: 1 }], []);
      const store = new KyselyDestinationStore(fake.db);

      await expect(
        store.linkGameGenres([{ appid: 730, genre: "Action" }])
      ).rejects.toThrow("Missing game or genre for 730:Action");
    });
  });

  describe("incremental runs", () => {
    it("should list stored appids", async () => {
      const fake = new FakeDatabase().respondRows([{ appid: 10 }, { appid: 730 }]);

      await expect(new KyselyDestinationStore(fake.db).knownAppIds()).resolves.toEqual([
        10, 730,
      ]);
    });

    it("should rebuild source records from stored rows", async () => {
      const fake = new FakeDatabase().respondRows(
        [
          {
            game_id: 1,
            appid: 730,
            name: "Counter-Strike 2",
            developer: "Valve Corporation",
            publisher: "Valve",
            release_date: "2012-08-21",
            is_free: false,
            steamspy_owners_min: 50000000,
            steamspy_owners_max: 100000000,
            positive_reviews: 7000000,
            negative_reviews: 1000000,
          },
        ],
        [
          { appid: 730, tag_name: "Shooter" },
          { appid: 730, tag_name: "FPS" },
        ],
        [{ appid: 730, genre_name: "Action" }],
        [
          {
            appid: 730,
            full_date: "2024-01-01",
            concurrent_players_avg: 32456,
            concurrent_players_peak: 65789,
            gain_pct: 3.95,
            current_price: 7.49,
            original_price: 14.99,
            discount_pct: 50,
            is_discount_active: true,
          },
        ]
      );
      const store = new KyselyDestinationStore(fake.db);

      const baseline = await store.loadBaseline([730]);

      expect(baseline).toEqual({
        metadata: [
          {
            appid: 730,
            name: "Counter-Strike 2",
            developer: "Valve Corporation",
            publisher: "Valve",
            ownersMin: 50000000,
            ownersMax: 100000000,
            positiveReviews: 7000000,
            negativeReviews: 1000000,
            genres: ["Action"],
            tags: ["FPS", "Shooter"],
            price: HALF_PRICE,
          },
        ],
        pricing: [
          {
            appid: 730,
            name: "Counter-Strike 2",
            isFree: false,
            releaseDate: "2012-08-21",
            developer: "Valve Corporation",
            publisher: "Valve",
            price: HALF_PRICE,
            currency: null,
          },
        ],
        timeseries: [
          {
            appid: 730,
            period: "2024-01",
            avgPlayers: 32456,
            peakPlayers: 65789,
            gain: null,
            gainPct: 3.95,
          },
        ],
      });
      expect(fake.queries[3]?.sql).toContain('distinct on ("g"."appid")');
    });

    it("should skip follow-up queries when no game is stored", async () => {
      const fake = new FakeDatabase();

      const baseline = await new KyselyDestinationStore(fake.db).loadBaseline([1]);

      expect(baseline).toEqual({ metadata: [], pricing: [], timeseries: [] });
      expect(fake.queries).toHaveLength(1);
    });
  });
});
