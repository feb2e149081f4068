import { describe, it, expect } from "vitest";

import {
  compareFactPreference,
  dedupeFacts,
} from "../../../../src/services/pipeline/dedupe.js";
import { factRow } from "../../../fixtures/records.js";

describe("services/pipeline/dedupe", () => {
  it("should pass unique facts through in key order", () => {
    const a = factRow({ appid: 570, period: "2024-01" });
    const b = factRow({ appid: 10, period: "2024-02" });
    const c = factRow({ appid: 10, period: "2024-01" });

    expect(dedupeFacts([a, b, c])).toEqual({
      facts: [c, b, a],
      collisions: [],
      dropped: 0,
    });
  });

  it("should prefer the row with player metrics", () => {
    const priceOnly = factRow({ avgPlayers: null, peakPlayers: null });
    const withPlayers = factRow({ currentPrice: null, originalPrice: null });

    const result = dedupeFacts([priceOnly, withPlayers]);

    expect(result.facts).toEqual([withPlayers]);
    expect(result.collisions).toEqual(["730:2024-01"]);
    expect(result.dropped).toBe(1);
  });

  it("should prefer the more complete row", () => {
    const sparse = factRow({ peakPlayers: null, gainPct: null });
    const full = factRow();

    expect(dedupeFacts([full, sparse]).facts).toEqual([full]);
    expect(dedupeFacts([sparse, full]).facts).toEqual([full]);
  });

  it("should pick the same winner whatever the input order", () => {
    const lower = factRow({ avgPlayers: 100 });
    const higher = factRow({ avgPlayers: 200 });

    expect(dedupeFacts([lower, higher]).facts).toEqual(
      dedupeFacts([higher, lower]).facts
    );
  });

  it("should rank equal rows as equal", () => {
    expect(compareFactPreference(factRow(), factRow())).toBe(0);
  });
});
