import { Value } from "@sinclair/typebox/value";

import { SourceError } from "../../errors.js";
import { describeSchemaError } from "./validation.js";
import {
  joinCompanies,
  nonEmpty,
  parseOwnersRange,
  priceFromCents,
  splitNameList,
  tagNames,
  toNumber,
} from "../normalize.js";
import {
  SteamSpyAllSchema,
  SteamSpyAppSchema,
  type SteamSpyApp,
} from "../../types/payloads.js";

import type { DiscoveredEntity, SourceAdapter, SourceRequest } from "../client.js";
import type { MetadataRecord } from "../../types/index.js";

// ============================================================================
// Endpoints
// ============================================================================

export const STEAMSPY_ENDPOINTS = {
  all: "all",
  appdetails: "appdetails",
} as const;


function count(value: number | string | null | undefined): number {
  const parsed = toNumber(value);
  return parsed !== null && parsed > 0 ? Math.round(parsed) : 0;
}

// ============================================================================
// Adapter
// ============================================================================

/**
 * SteamSpy api.php: discovery authority for the metadata source.
 *
 * appdetails carries tags and genres; the bulk "all" listing only carries
 * owners, reviews, companies and prices.
 */
export class SteamSpyAdapter
  implements SourceAdapter<SteamSpyApp, MetadataRecord>
{
  readonly source = "metadata" as const;
  readonly provider = "steamspy";

  constructor(private readonly baseUrl: string) {}

  requestFor(appid: number): SourceRequest {
    const url = new URL(this.baseUrl);
    url.searchParams.set("request", "appdetails");
    url.searchParams.set("appid", String(appid));
    return {
      endpoint: STEAMSPY_ENDPOINTS.appdetails,
      url: url.toString(),
      format: "json",
    };
  }

  parse(raw: unknown, appid: number): SteamSpyApp {
    if (!Value.Check(SteamSpyAppSchema, raw)) {
      throw new SourceError(
        "malformed",
        `SteamSpy payload for ${String(appid)} failed validation (${describeSchemaError(SteamSpyAppSchema, raw)})`
      );
    }
    // Unknown apps come back as an empty record with a null name
    if (nonEmpty(raw.name) === null) {
      throw new SourceError("not_found", `SteamSpy has no app ${String(appid)}`);
    }
    return raw;
  }

  normalize(app: SteamSpyApp, appid: number): MetadataRecord[] {
    const owners = parseOwnersRange(app.owners);
    return [
      {
        appid,
        name: nonEmpty(app.name),
        developer: joinCompanies(splitCompanies(app.developer)),
        publisher: joinCompanies(splitCompanies(app.publisher)),
        ownersMin: owners?.min ?? null,
        ownersMax: owners?.max ?? null,
        positiveReviews: count(app.positive),
        negativeReviews: count(app.negative),
        genres: splitNameList(app.genre),
        tags: tagNames(app.tags),
        price: priceFromCents(
          toNumber(app.price),
          toNumber(app.initialprice),
          toNumber(app.discount)
        ),
      },
    ];
  }

  readonly discovery = {
    request: (): SourceRequest => {
      const url = new URL(this.baseUrl);
      url.searchParams.set("request", "all");
      return {
        endpoint: STEAMSPY_ENDPOINTS.all,
        url: url.toString(),
        format: "json",
      };
    },

    parse: (raw: unknown): DiscoveredEntity<SteamSpyApp>[] => {
      if (!Value.Check(SteamSpyAllSchema, raw)) {
        throw new SourceError(
          "malformed",
          `SteamSpy listing failed validation (${describeSchemaError(SteamSpyAllSchema, raw)})`
        );
      }

      const entities: DiscoveredEntity<SteamSpyApp>[] = [];
      for (const [key, entry] of Object.entries(raw)) {
        const appid = Number(key);
        if (!Number.isSafeInteger(appid) || appid <= 0) {
          continue;
        }
        if (!Value.Check(SteamSpyAppSchema, entry)) {
          entities.push({
            appid,
            error: new SourceError(
              "malformed",
              `SteamSpy listing entry ${key} failed validation (${describeSchemaError(SteamSpyAppSchema, entry)})`
            ),
          });
          continue;
        }
        if (nonEmpty(entry.name) !== null) {
          entities.push({ appid, parsed: entry });
        }
      }
      return entities.sort((a, b) => a.appid - b.appid);
    },
  };
}

// "Valve, Hidden Path Entertainment" keeps its order; only blanks are dropped
function splitCompanies(value: string | null | undefined): string[] | undefined {
  const text = nonEmpty(value);
  return text === null ? undefined : text.split(",");
}
