/**
 * Gate.io API v4 rate limits.
 *
 * @see https://www.gate.io/docs/developers/apiv4/#frequency-limit-rule
 *
 * - Public: 200 requests per 10 seconds per endpoint
 * - Private (wallet, earn): 200 requests per 10 seconds
 * - Spot orders: 10 requests per second
 */

import type { VenueRateLimitConfig } from "@/lib/rate-limiter";

export const GATEIO_RATE_LIMITS: VenueRateLimitConfig = {
  rest: {
    public: { maxTokens: 200, refillRatePerSecond: 20 },
    private: { maxTokens: 200, refillRatePerSecond: 20 },
    orders: { maxTokens: 10, refillRatePerSecond: 10 },
  },
  defaultTimeoutMs: 5000,
};
