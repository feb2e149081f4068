import { Value } from "@sinclair/typebox/value";

import { SourceError } from "../../errors.js";
import {
  joinCompanies,
  nonEmpty,
  parseReleaseDate,
  priceFromCents,
} from "../normalize.js";
import {
  StoreAppDetailsSchema,
  type StoreAppData,
} from "../../types/payloads.js";
import { describeSchemaError } from "./validation.js";

import type { SourceAdapter, SourceRequest } from "../client.js";
import type { PriceState, PricingRecord } from "../../types/index.js";

export const STEAM_STORE_ENDPOINT = "appdetails";

const ZERO_PRICE: PriceState = {
  currentPrice: 0,
  originalPrice: 0,
  discountPct: 0,
  isDiscountActive: false,
};

/**
 * Steam Store appdetails: authoritative for prices, release date, companies
 * and the free flag.
 */
export class SteamStoreAdapter
  implements SourceAdapter<StoreAppData, PricingRecord>
{
  readonly source = "pricing" as const;
  readonly provider = "steam-store";

  constructor(
    private readonly baseUrl: string,
    private readonly countryCode: string
  ) {}

  requestFor(appid: number): SourceRequest {
    const url = new URL(this.baseUrl);
    url.searchParams.set("appids", String(appid));
    url.searchParams.set("cc", this.countryCode);
    return {
      endpoint: STEAM_STORE_ENDPOINT,
      url: url.toString(),
      format: "json",
    };
  }

  parse(raw: unknown, appid: number): StoreAppData {
    if (!Value.Check(StoreAppDetailsSchema, raw)) {
      throw new SourceError(
        "malformed",
        `Store payload for ${String(appid)} failed validation (${describeSchemaError(StoreAppDetailsSchema, raw)})`
      );
    }

    const envelope = raw[String(appid)];
    if (envelope === undefined) {
      throw new SourceError(
        "malformed",
        `Store payload has no entry for ${String(appid)}`
      );
    }
    if (!envelope.success) {
      throw new SourceError("not_found", `Store has no app ${String(appid)}`);
    }
    // Filtered responses send [] when the app has nothing to report
    const data = envelope.data;
    return data === undefined || Array.isArray(data) ? {} : data;
  }

  normalize(data: StoreAppData, appid: number): PricingRecord[] {
    const overview = data.price_overview;
    const isFree = data.is_free ?? null;

    let price: PriceState | null = null;
    if (overview !== undefined) {
      price = priceFromCents(
        overview.final,
        overview.initial,
        overview.discount_percent ?? null
      );
    } else if (isFree === true) {
      price = ZERO_PRICE;
    }

    const releaseDate =
      data.release_date?.coming_soon === true
        ? null
        : parseReleaseDate(data.release_date?.date);

    return [
      {
        appid,
        name: nonEmpty(data.name),
        isFree,
        releaseDate,
        developer: joinCompanies(data.developers),
        publisher: joinCompanies(data.publishers),
        price,
        currency: overview?.currency ?? null,
      },
    ];
  }
}
