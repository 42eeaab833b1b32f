/**
 * Venue adapter construction from configuration.
 */

import type { AppConfig } from "@/lib/config";
import type { Logger } from "@/lib/logger";

import { createBybitAdapter } from "./bybit";
import type { VenueAdapterConfig } from "./config";
import { createGateioAdapter } from "./gateio";
import { createPaperAdapter } from "./paper";
import { type VenueAdapter, splitSymbol } from "./types";

/**
 * Create a venue adapter from validated configuration.
 */
export const createVenueAdapter = (config: VenueAdapterConfig, logger?: Logger): VenueAdapter => {
  switch (config.venue) {
    case "gateio":
      return createGateioAdapter({
        apiKey: config.apiKey,
        apiSecret: config.apiSecret,
        baseUrl: config.baseUrl,
        logger,
      });
    case "bybit":
      return createBybitAdapter({
        apiKey: config.apiKey,
        apiSecret: config.apiSecret,
        testnet: config.testnet,
        logger,
      });
    case "paper":
      return createPaperAdapter({
        market: config.market,
        initialBalances: config.initialBalances ?? {},
      });
  }
};

export interface VenuePair {
  /** Leg A: spot venue */
  spot: VenueAdapter;
  /** Leg B: perpetual venue */
  perp: VenueAdapter;
}

export class MissingCredentialsError extends Error {
  constructor(public readonly venue: string) {
    super(`Missing API credentials for ${venue}`);
    this.name = "MissingCredentialsError";
  }
}

/**
 * Build both legs. A dry run trades against in-memory venues priced by the
 * live public order book streams, so no credentials are needed.
 */
export const createVenuePair = (
  venues: AppConfig["venues"],
  symbol: string,
  logger?: Logger,
): VenuePair => {
  const { spot, perp } = venues;

  if (venues.dryRun) {
    const { quote } = splitSymbol(symbol);
    const publicSpot = createVenueAdapter(
      { venue: spot.venue, apiKey: "public", apiSecret: "public", ...spot.credentials },
      logger,
    );
    const publicPerp = createVenueAdapter(
      {
        venue: perp.venue,
        apiKey: "public",
        apiSecret: "public",
        testnet: perp.testnet,
        ...perp.credentials,
      },
      logger,
    );
    logger?.warn("Dry run: orders are simulated against live order books", {
      spot: spot.venue,
      perp: perp.venue,
    });
    return {
      spot: createPaperAdapter({
        market: "spot",
        marketData: publicSpot,
        initialBalances: { [quote]: venues.dryRunBalanceQuote },
      }),
      perp: createPaperAdapter({
        market: "perp",
        marketData: publicPerp,
        initialBalances: { [quote]: venues.dryRunBalanceQuote },
      }),
    };
  }

  if (!spot.credentials) throw new MissingCredentialsError(spot.venue);
  if (!perp.credentials) throw new MissingCredentialsError(perp.venue);

  return {
    spot: createVenueAdapter({ venue: spot.venue, ...spot.credentials }, logger),
    perp: createVenueAdapter(
      { venue: perp.venue, testnet: perp.testnet, ...perp.credentials },
      logger,
    ),
  };
};
