/**
 * Bybit API v5 request signing.
 *
 * @see https://bybit-exchange.github.io/docs/v5/guide#authentication
 */

import { createHmac } from "node:crypto";

export const DEFAULT_RECV_WINDOW_MS = 5000;

export interface BybitSignInput {
  timestampMs: number;
  recvWindowMs: number;
  /** Query string for GET, JSON body for POST */
  payload: string;
}

/**
 * HMAC-SHA256 hex over `timestamp + apiKey + recvWindow + payload`.
 */
export const signBybitRequest = (
  input: BybitSignInput,
  apiKey: string,
  apiSecret: string,
): string =>
  createHmac("sha256", apiSecret)
    .update(`${input.timestampMs}${apiKey}${input.recvWindowMs}${input.payload}`)
    .digest("hex");

export const createBybitHeaders = (
  input: BybitSignInput,
  apiKey: string,
  apiSecret: string,
): Record<string, string> => ({
  "X-BAPI-API-KEY": apiKey,
  "X-BAPI-TIMESTAMP": String(input.timestampMs),
  "X-BAPI-RECV-WINDOW": String(input.recvWindowMs),
  "X-BAPI-SIGN": signBybitRequest(input, apiKey, apiSecret),
});
