import { describe, it, expect } from "vitest";

import { SourceError } from "../../../../src/errors.js";
import { SteamSpyAdapter } from "../../../../src/scraper/sources/steamspy.js";
import { loadFixtureJson } from "../../../fixtures/index.js";

import type { DiscoveredEntity } from "../../../../src/scraper/client.js";
import type { SteamSpyApp } from "../../../../src/types/payloads.js";

const adapter = new SteamSpyAdapter("https://steamspy.test/api.php");

function parseError(raw: unknown): SourceError | undefined {
  try {
    adapter.parse(raw, 730);
  } catch (error) {
    if (error instanceof SourceError) {
      return error;
    }
    throw error;
  }
  return undefined;
}

function listedApp(entity: DiscoveredEntity<SteamSpyApp> | undefined): SteamSpyApp {
  if (entity === undefined || "error" in entity) {
    throw new Error("Expected a listed app");
  }
  return entity.parsed;
}

describe("scraper/sources/steamspy", () => {
  it("should address appdetails by appid", () => {
    expect(adapter.requestFor(730)).toEqual({
      endpoint: "appdetails",
      url: "https://steamspy.test/api.php?request=appdetails&appid=730",
      format: "json",
    });
  });

  it("should normalize an appdetails payload", () => {
    const app = adapter.parse(loadFixtureJson("steamspy-appdetails-730.json"), 730);

    expect(adapter.normalize(app, 730)).toEqual([
      {
        appid: 730,
        name: "Counter-Strike 2",
        developer: "Valve, Hidden Path Entertainment",
        publisher: "Valve",
        ownersMin: 50000000,
        ownersMax: 100000000,
        positiveReviews: 7000000,
        negativeReviews: 1000000,
        genres: ["Action", "Free To Play"],
        tags: ["FPS", "Shooter"],
        price: {
          currentPrice: 14.99,
          originalPrice: 14.99,
          discountPct: 0,
          isDiscountActive: false,
        },
      },
    ]);
  });

  it("should report unknown apps as not found", () => {
    expect(parseError({ appid: 999999, name: null })?.kind).toBe("not_found");
  });

  it("should reject payloads of the wrong shape", () => {
    expect(parseError({ name: 42 })?.kind).toBe("malformed");
    expect(parseError("<html>")?.kind).toBe("malformed");
  });

  it("should zero out missing or negative review counts", () => {
    const [record] = adapter.normalize(
      { name: "Test Game", positive: -3, negative: null, tags: [] },
      10
    );

    expect(record).toMatchObject({
      positiveReviews: 0,
      negativeReviews: 0,
      tags: [],
      ownersMin: null,
      ownersMax: null,
      price: null,
    });
  });

  describe("discovery", () => {
    it("should request the bulk listing", () => {
      expect(adapter.discovery.request()).toEqual({
        endpoint: "all",
        url: "https://steamspy.test/api.php?request=all",
        format: "json",
      });
    });

    it("should list valid apps in appid order", () => {
      const entities = adapter.discovery.parse(loadFixtureJson("steamspy-all.json"));

      expect(entities.map((entity) => entity.appid)).toEqual([570, 730]);
      expect(adapter.normalize(listedApp(entities[1]), 730)).toEqual([
        {
          appid: 730,
          name: "Counter-Strike 2",
          developer: "Valve",
          publisher: "Valve",
          ownersMin: 50000000,
          ownersMax: 100000000,
          positiveReviews: 7000000,
          negativeReviews: 1000000,
          genres: [],
          tags: [],
          price: {
            currentPrice: 0,
            originalPrice: 0,
            discountPct: 0,
            isDiscountActive: false,
          },
        },
      ]);
    });

    it("should reject drifted entries one by one", () => {
      const entities = adapter.discovery.parse({
        "730": { name: "Counter-Strike 2", owners: "50,000,000 .. 100,000,000" },
        "570": { name: "Dota 2" },
        "999": { name: "Drifted", owners: 12345 },
      });

      expect(entities.map((entity) => entity.appid)).toEqual([570, 730, 999]);
      expect(listedApp(entities[0]).name).toBe("Dota 2");
      const rejected = entities[2];
      expect(rejected !== undefined && "error" in rejected).toBe(true);
      expect(rejected).toMatchObject({
        appid: 999,
        error: {
          kind: "malformed",
          message:
            "SteamSpy listing entry 999 failed validation (/owners: Expected union value)",
        },
      });
    });

    it("should reject a listing that is not an object of apps", () => {
      expect(() => adapter.discovery.parse([1, 2, 3])).toThrow(SourceError);
    });
  });
});
