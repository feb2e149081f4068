import { describe, it, expect } from "vitest";

import {
  UNKNOWN_GAME_NAME,
  buildFact,
  combineMetadata,
  mergeSources,
} from "../../../../src/services/pipeline/merge.js";
import {
  HALF_PRICE,
  metadataRecord,
  monthRecord,
  pricingRecord,
} from "../../../fixtures/records.js";

describe("services/pipeline/merge", () => {
  describe("mergeSources", () => {
    it("should join the three sources on appid", () => {
      const { entities, stats } = mergeSources({
        metadata: [metadataRecord()],
        pricing: [pricingRecord()],
        timeseries: [monthRecord()],
      });

      expect(entities.games).toEqual([
        {
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
          price: HALF_PRICE,
          tags: ["FPS", "Shooter"],
          genres: ["Action"],
        },
      ]);
      expect(entities.facts).toEqual([
        {
          appid: 730,
          period: "2024-01",
          avgPlayers: 32456,
          peakPlayers: 65789,
          gainPct: 3.95,
          currentPrice: 7.49,
          originalPrice: 14.99,
          discountPct: 50,
          isDiscountActive: true,
        },
      ]);
      expect(entities.gameTags).toEqual([
        { appid: 730, tag: "FPS" },
        { appid: 730, tag: "Shooter" },
      ]);
      expect(entities.gameGenres).toEqual([{ appid: 730, genre: "Action" }]);
      expect(entities.tags).toEqual(["FPS", "Shooter"]);
      expect(entities.genres).toEqual(["Action"]);
      expect(stats).toEqual({
        games: 1,
        genres: 1,
        tags: 2,
        facts: 1,
        gameTags: 2,
        gameGenres: 1,
        excludedAppIds: [],
      });
    });

    it("should fall back to the metadata price without a pricing record", () => {
      const metadataPrice = {
        currentPrice: 14.99,
        originalPrice: 14.99,
        discountPct: 0,
        isDiscountActive: false,
      };

      const { entities } = mergeSources({
        metadata: [metadataRecord({ price: metadataPrice })],
        pricing: [],
        timeseries: [monthRecord()],
      });

      expect(entities.games[0]?.price).toEqual(metadataPrice);
      expect(entities.games[0]?.releaseDate).toBeNull();
      expect(entities.games[0]?.isFree).toBeNull();
      expect(entities.facts[0]).toMatchObject({
        currentPrice: 14.99,
        discountPct: 0,
        isDiscountActive: false,
      });
    });

    it("should keep metadata companies when the store has none", () => {
      const { entities } = mergeSources({
        metadata: [metadataRecord({ developer: "Valve" })],
        pricing: [pricingRecord({ developer: null })],
        timeseries: [],
      });

      expect(entities.games[0]?.developer).toBe("Valve");
    });

    it("should leave fact prices empty when no source has a price", () => {
      const { entities } = mergeSources({
        metadata: [metadataRecord()],
        pricing: [],
        timeseries: [monthRecord()],
      });

      expect(entities.facts[0]).toMatchObject({
        currentPrice: null,
        originalPrice: null,
        discountPct: null,
        isDiscountActive: false,
      });
    });

    it("should exclude records for appids the metadata does not know", () => {
      const { entities, stats } = mergeSources({
        metadata: [metadataRecord()],
        pricing: [pricingRecord(), pricingRecord({ appid: 999 })],
        timeseries: [monthRecord({ appid: 888 })],
      });

      expect(entities.games.map((game) => game.appid)).toEqual([730]);
      expect(entities.facts).toEqual([]);
      expect(stats.excludedAppIds).toEqual([888, 999]);
    });

    it("should fall back to the store name, then a placeholder", () => {
      const { entities } = mergeSources({
        metadata: [
          metadataRecord({ appid: 1, name: null }),
          metadataRecord({ appid: 2, name: null }),
        ],
        pricing: [pricingRecord({ appid: 1, name: "Store Name" })],
        timeseries: [],
      });

      expect(entities.games.map((game) => game.name)).toEqual([
        "Store Name",
        UNKNOWN_GAME_NAME,
      ]);
    });

    it("should order games and facts by natural key", () => {
      const { entities } = mergeSources({
        metadata: [metadataRecord({ appid: 570 }), metadataRecord({ appid: 10 })],
        pricing: [],
        timeseries: [
          monthRecord({ appid: 570, period: "2024-02" }),
          monthRecord({ appid: 570, period: "2023-12" }),
          monthRecord({ appid: 10, period: "2024-01" }),
        ],
      });

      expect(entities.games.map((game) => game.appid)).toEqual([10, 570]);
      expect(
        entities.facts.map((fact) => `${String(fact.appid)}:${fact.period}`)
      ).toEqual(["10:2024-01", "570:2023-12", "570:2024-02"]);
    });
  });

  describe("combineMetadata", () => {
    it("should not depend on arrival order", () => {
      const a = metadataRecord({ tags: ["FPS"], developer: null });
      const b = metadataRecord({ tags: ["Shooter"], positiveReviews: 5 });

      const forward = combineMetadata([a, b]);
      const backward = combineMetadata([b, a]);

      expect(forward).toEqual(backward);
      expect(forward?.tags).toEqual(["FPS", "Shooter"]);
      expect(forward?.developer).toBe("Valve");
    });

    it("should return null for an empty group", () => {
      expect(combineMetadata([])).toBeNull();
    });
  });

  describe("buildFact", () => {
    it("should stamp the month with the price snapshot", () => {
      expect(buildFact(monthRecord({ gainPct: null }), HALF_PRICE)).toEqual({
        appid: 730,
        period: "2024-01",
        avgPlayers: 32456,
        peakPlayers: 65789,
        gainPct: null,
        currentPrice: 7.49,
        originalPrice: 14.99,
        discountPct: 50,
        isDiscountActive: true,
      });
    });
  });
});
