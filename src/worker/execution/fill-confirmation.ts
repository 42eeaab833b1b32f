/**
 * Order fill confirmation polling.
 *
 * Never assume an order filled without a status read from the venue. Polls
 * until a terminal state or the timeout, whichever comes first. A timeout
 * is not an error: the caller gets the last observed fill and treats the
 * status as ambiguous.
 */

import { isFatalAdapterError } from "@/adapters/errors";
import type { OrderFill, OrderHandle, VenueAdapter } from "@/adapters/types";
import type { Logger } from "@/lib/logger";
import { sleep } from "@/lib/sleep";

import type { FillPollingConfig, OrderSettlement } from "./types";

export const EMPTY_FILL: OrderFill = { filledQuantityBase: 0n, avgFillPriceQuote: null, fee: null };

const describeHandle = (handle: OrderHandle): Record<string, unknown> => ({
  venue: handle.venue,
  orderId: handle.orderId,
  clientOrderId: handle.clientOrderId,
});

/**
 * Poll `handle` until it settles. `not-found` and transient poll errors
 * keep polling; a `FatalAdapterError` ends polling and is returned on the
 * settlement for the caller to rethrow once its bookkeeping is done.
 */
export const awaitOrderSettlement = async (
  adapter: VenueAdapter,
  handle: OrderHandle,
  config: FillPollingConfig,
  logger: Logger,
): Promise<OrderSettlement> => {
  const startMs = Date.now();
  let fill = EMPTY_FILL;
  let attempt = 0;

  while (true) {
    try {
      const result = await adapter.pollOrder(handle);

      if (result.kind === "terminal") {
        logger.debug("Order reached terminal state", {
          ...describeHandle(handle),
          state: result.state,
          filledQuantityBase: result.fill.filledQuantityBase,
          attempt,
          elapsedMs: Date.now() - startMs,
        });
        return { state: result.state, fill: result.fill, fatal: null };
      }

      if (result.kind === "pending") {
        fill = result.fill;
      } else {
        logger.debug("Order not visible yet", { ...describeHandle(handle), attempt });
      }
    } catch (error) {
      if (isFatalAdapterError(error)) {
        logger.error("Fatal venue error while polling order", error, describeHandle(handle));
        return { state: "timeout", fill, fatal: error };
      }
      logger.warn("Order status poll failed", {
        ...describeHandle(handle),
        attempt,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (Date.now() - startMs >= config.fillTimeoutMs) {
      logger.warn("Order did not settle before timeout", {
        ...describeHandle(handle),
        timeoutMs: config.fillTimeoutMs,
        lastFilledBase: fill.filledQuantityBase,
      });
      return { state: "timeout", fill, fatal: null };
    }

    attempt++;
    await sleep(config.fillPollIntervalMs);
  }
};
