import type { MarginMode, VenueAdapter } from "@/adapters/types";
import { netPositionBase } from "@/adapters/types";
import type { Logger } from "@/lib/logger";

/** Used when neither the config nor the venue names a leverage */
export const DEFAULT_LEVERAGE = 10;

export interface VenueSetupConfig {
  symbol: string;
  /** Null takes the venue's maximum */
  leverage: number | null;
  marginMode: MarginMode;
}

export interface VenueSetup {
  leverage: number;
  initialPerpPositionBase: bigint;
}

/**
 * Connect both venues and put the perpetual account into the configured
 * margin mode and leverage. Both venue calls are idempotent, so a restart
 * repeats them safely.
 */
export const prepareVenues = async (
  config: VenueSetupConfig,
  deps: { spot: VenueAdapter; perp: VenueAdapter; logger: Logger },
): Promise<VenueSetup> => {
  const { spot, perp, logger } = deps;
  await Promise.all([spot.connect(), perp.connect()]);

  const leverage =
    config.leverage ?? (await perp.getMaxLeverage(config.symbol)) ?? DEFAULT_LEVERAGE;
  await perp.setMarginMode(config.symbol, config.marginMode);
  await perp.setLeverage(config.symbol, leverage);

  const initialPerpPositionBase = netPositionBase(
    await perp.fetchPositions(config.symbol),
    config.symbol,
  );

  logger.info("Venues ready", {
    spot: spot.venue,
    perp: perp.venue,
    symbol: config.symbol,
    leverage,
    marginMode: config.marginMode,
    initialPerpPositionBase,
  });

  return { leverage, initialPerpPositionBase };
};
