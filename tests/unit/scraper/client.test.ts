import { describe, it, expect, vi } from "vitest";

import { CancelledError } from "../../../src/errors.js";
import {
  SourceClient,
  type SourceAdapter,
} from "../../../src/scraper/client.js";
import { RateGovernor } from "../../../src/scraper/rate-governor.js";
import { SteamSpyAdapter } from "../../../src/scraper/sources/steamspy.js";
import { SteamStoreAdapter } from "../../../src/scraper/sources/steam-store.js";
import { loadFixtureText } from "../../fixtures/index.js";
import { VirtualClock } from "../../mocks/clock.js";

import type { FetchLike } from "../../../src/scraper/session.js";

const RETRY = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 };

function createClient<TParsed, TRecord>(
  adapter: SourceAdapter<TParsed, TRecord>,
  fetch: FetchLike,
  clock = new VirtualClock()
): SourceClient<TParsed, TRecord> {
  return new SourceClient(adapter, {
    governor: new RateGovernor({
      name: adapter.provider,
      maxConcurrent: 1,
      defaultIntervalMs: 0,
      clock,
    }),
    userAgent: "test-agent/1.0",
    timeoutMs: 1000,
    retry: RETRY,
    clock,
    fetch,
  });
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

const storeAdapter = new SteamStoreAdapter("https://store.test/api/appdetails", "us");
const spyAdapter = new SteamSpyAdapter("https://steamspy.test/api.php");

describe("scraper/client", () => {
  it("should expose the adapter's capabilities", () => {
    const fetch = vi.fn<FetchLike>();

    expect(createClient(storeAdapter, fetch).canDiscover).toBe(false);
    expect(createClient(spyAdapter, fetch).canDiscover).toBe(true);
    expect(createClient(spyAdapter, fetch).provider).toBe("steamspy");
  });

  it("should collect records and per-entity failures", async () => {
    const fetch = vi.fn<FetchLike>((url) =>
      Promise.resolve(
        url.includes("appids=730")
          ? new Response(loadFixtureText("store-appdetails-730.json"))
          : json({ "570": { success: false } })
      )
    );
    const client = createClient(storeAdapter, fetch);

    const result = await client.acquire([730, 570, 730]);

    expect(result.requested).toEqual([730, 570]);
    expect(result.succeeded).toEqual([730]);
    expect(result.records.map((record) => record.appid)).toEqual([730]);
    expect(result.failures).toEqual([
      {
        appid: 570,
        kind: "not_found",
        message: "Store has no app 570",
        attempts: 1,
      },
    ]);
    expect(result.requests).toBe(2);
  });

  it("should retry transient failures with backoff", async () => {
    const clock = new VirtualClock();
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(new Response("", { status: 503 }))
      .mockResolvedValueOnce(
        new Response(loadFixtureText("store-appdetails-730.json"))
      );
    const client = createClient(storeAdapter, fetch, clock);

    const result = await client.acquire([730]);

    expect(result.succeeded).toEqual([730]);
    expect(result.requests).toBe(2);
    expect(clock.sleeps).toEqual([100]);
  });

  it("should discover entities through the bulk listing", async () => {
    const fetch = vi.fn<FetchLike>(() =>
      Promise.resolve(new Response(loadFixtureText("steamspy-all.json")))
    );
    const client = createClient(spyAdapter, fetch);

    const result = await client.acquire("all", { discoveryLimit: 1 });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0]?.[0]).toBe(
      "https://steamspy.test/api.php?request=all"
    );
    expect(result.requested).toEqual([570]);
    expect(result.succeeded).toEqual([570]);
    expect(result.records[0]?.name).toBe("Dota 2");
  });

  it("should keep listed apps when one listing entry is malformed", async () => {
    const fetch = vi.fn<FetchLike>(() =>
      Promise.resolve(
        json({
          "730": { appid: 730, name: "Counter-Strike 2" },
          "999": { appid: 999, name: "Drifted", owners: 12345 },
        })
      )
    );
    const client = createClient(spyAdapter, fetch);

    const result = await client.acquire("all");

    expect(result.requested).toEqual([730, 999]);
    expect(result.succeeded).toEqual([730]);
    expect(result.failures).toEqual([
      {
        appid: 999,
        kind: "malformed",
        message:
          "SteamSpy listing entry 999 failed validation (/owners: Expected union value)",
        attempts: 1,
      },
    ]);
  });

  it("should record a discovery failure without an appid", async () => {
    const fetch = vi.fn<FetchLike>(() =>
      Promise.resolve(new Response("", { status: 500, statusText: "Server Error" }))
    );
    const client = createClient(spyAdapter, fetch);

    const result = await client.acquire("all");

    expect(result.requested).toEqual([]);
    expect(result.failures).toEqual([
      {
        appid: null,
        kind: "transient",
        message: "HTTP 500 Server Error for https://steamspy.test/api.php?request=all",
        attempts: 3,
      },
    ]);
  });

  it("should refuse discovery for sources without it", async () => {
    const client = createClient(storeAdapter, vi.fn<FetchLike>());

    await expect(client.acquire("all")).rejects.toThrow(
      "steam-store cannot discover entities"
    );
  });

  it("should report normalization errors as malformed payloads", async () => {
    const adapter: SourceAdapter<string, { appid: number }> = {
      source: "timeseries",
      provider: "fake",
      requestFor: (appid) => ({
        endpoint: "page",
        url: `https://fake.test/${String(appid)}`,
        format: "text",
      }),
      parse: (raw) => String(raw),
      normalize: () => {
        throw new Error("boom");
      },
    };
    const client = createClient(adapter, () =>
      Promise.resolve(new Response("<html></html>"))
    );

    const result = await client.acquire([1]);

    expect(result.failures).toEqual([
      {
        appid: 1,
        kind: "malformed",
        message: "Could not normalize fake payload for 1: boom",
        attempts: 1,
      },
    ]);
  });

  it("should propagate cancellation", async () => {
    const controller = new AbortController();
    controller.abort(new CancelledError("stop"));
    const fetch = vi.fn<FetchLike>();
    const client = createClient(storeAdapter, fetch);

    await expect(
      client.acquire([730], { signal: controller.signal })
    ).rejects.toThrow("stop");
    expect(fetch).not.toHaveBeenCalled();
  });
});
