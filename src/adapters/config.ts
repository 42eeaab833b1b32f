/**
 * Venue adapter configuration schemas.
 */

import * as v from "valibot";

import { bigintSchema } from "./types";

const credentialsEntries = {
  apiKey: v.pipe(v.string(), v.minLength(1)),
  apiSecret: v.pipe(v.string(), v.minLength(1)),
};

export const VenueAdapterConfigSchema = v.variant("venue", [
  v.object({
    venue: v.literal("gateio"),
    ...credentialsEntries,
    baseUrl: v.optional(v.pipe(v.string(), v.url())),
  }),
  v.object({
    venue: v.literal("bybit"),
    ...credentialsEntries,
    testnet: v.optional(v.boolean(), false),
  }),
  v.object({
    venue: v.literal("paper"),
    market: v.picklist(["spot", "perp"]),
    initialBalances: v.optional(v.record(v.string(), bigintSchema)),
  }),
]);

export type VenueAdapterConfig = v.InferOutput<typeof VenueAdapterConfigSchema>;

export const parseVenueAdapterConfig = (config: unknown): VenueAdapterConfig =>
  v.parse(VenueAdapterConfigSchema, config);
