/**
 * Per-venue rate limit shapes and endpoint classification.
 */

import type { TokenBucketConfig } from "./token-bucket";

export type EndpointCategory = "public" | "private" | "orders";

export interface VenueRateLimitConfig {
  rest: Record<EndpointCategory, TokenBucketConfig>;
  /** Per-request timeout for idempotent calls (ms) */
  defaultTimeoutMs: number;
}

const ORDER_PATTERNS = ["/spot/orders", "/v5/order", "/v5/position/set-leverage"];

const PRIVATE_PATTERNS = ["/spot/accounts", "/v5/account", "/v5/position", "/earn"];

/**
 * Bucket an endpoint path by the venue limit that governs it.
 *
 * @example
 * ```typescript
 * getEndpointCategory("/v5/order/create"); // "orders"
 * getEndpointCategory("/spot/accounts"); // "private"
 * getEndpointCategory("/v5/market/instruments-info"); // "public"
 * ```
 */
export const getEndpointCategory = (endpoint: string): EndpointCategory => {
  if (ORDER_PATTERNS.some((pattern) => endpoint.includes(pattern))) return "orders";
  if (PRIVATE_PATTERNS.some((pattern) => endpoint.includes(pattern))) return "private";
  return "public";
};
