/**
 * Raw payload schemas for the JSON sources. Validation happens at the
 * client boundary; anything that fails is reported as a malformed payload.
 */

import { Type, type Static } from "@sinclair/typebox";

// Prices and counts arrive as strings or numbers depending on the endpoint
const NumericLike = Type.Union([Type.Number(), Type.String(), Type.Null()]);

// ============================================================================
// SteamSpy
// ============================================================================

export const SteamSpyAppSchema = Type.Object({
  appid: Type.Optional(Type.Union([Type.Number(), Type.String()])),
  name: Type.Union([Type.String(), Type.Null()]),
  developer: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  publisher: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  owners: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  positive: Type.Optional(NumericLike),
  negative: Type.Optional(NumericLike),
  price: Type.Optional(NumericLike),
  initialprice: Type.Optional(NumericLike),
  discount: Type.Optional(NumericLike),
  genre: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  // An app without tags comes back as []
  tags: Type.Optional(
    Type.Union([
      Type.Record(Type.String(), Type.Number()),
      Type.Array(Type.Unknown()),
    ])
  ),
});

export type SteamSpyApp = Static<typeof SteamSpyAppSchema>;

// Entries are checked one by one so a single drifted app fails on its own
export const SteamSpyAllSchema = Type.Record(Type.String(), Type.Unknown());

export type SteamSpyAll = Static<typeof SteamSpyAllSchema>;

// ============================================================================
// Steam Store
// ============================================================================

export const StorePriceOverviewSchema = Type.Object({
  currency: Type.Optional(Type.String()),
  initial: Type.Number(),
  final: Type.Number(),
  discount_percent: Type.Optional(Type.Number()),
});

export const StoreAppDataSchema = Type.Object({
  name: Type.Optional(Type.String()),
  type: Type.Optional(Type.String()),
  is_free: Type.Optional(Type.Boolean()),
  developers: Type.Optional(Type.Array(Type.String())),
  publishers: Type.Optional(Type.Array(Type.String())),
  price_overview: Type.Optional(StorePriceOverviewSchema),
  release_date: Type.Optional(
    Type.Object({
      coming_soon: Type.Optional(Type.Boolean()),
      date: Type.Optional(Type.String()),
    })
  ),
  genres: Type.Optional(
    Type.Array(Type.Object({ description: Type.String() }))
  ),
});

export type StoreAppData = Static<typeof StoreAppDataSchema>;

export const StoreAppEnvelopeSchema = Type.Object({
  success: Type.Boolean(),
  data: Type.Optional(Type.Union([StoreAppDataSchema, Type.Array(Type.Unknown())])),
});

export type StoreAppEnvelope = Static<typeof StoreAppEnvelopeSchema>;

export const StoreAppDetailsSchema = Type.Record(
  Type.String(),
  StoreAppEnvelopeSchema
);
