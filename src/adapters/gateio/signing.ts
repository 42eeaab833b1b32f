/**
 * Gate.io API v4 request signing.
 *
 * @see https://www.gate.io/docs/developers/apiv4/#authentication
 */

import { createHash, createHmac } from "node:crypto";

export const GATEIO_API_PREFIX = "/api/v4";

export interface GateioSignInput {
  method: string;
  /** Path below the API prefix, e.g. `/spot/orders` */
  path: string;
  /** Encoded query string without `?` */
  query: string;
  /** Exact request body sent on the wire */
  body: string;
  timestampSec: number;
}

/**
 * HMAC-SHA512 over `METHOD\nPATH\nQUERY\nSHA512(BODY)\nTIMESTAMP`.
 */
export const signGateioRequest = (input: GateioSignInput, apiSecret: string): string => {
  const bodyHash = createHash("sha512").update(input.body).digest("hex");
  const payload = [
    input.method.toUpperCase(),
    `${GATEIO_API_PREFIX}${input.path}`,
    input.query,
    bodyHash,
    String(input.timestampSec),
  ].join("\n");
  return createHmac("sha512", apiSecret).update(payload).digest("hex");
};

export const createGateioHeaders = (
  input: GateioSignInput,
  apiKey: string,
  apiSecret: string,
): Record<string, string> => ({
  KEY: apiKey,
  Timestamp: String(input.timestampSec),
  SIGN: signGateioRequest(input, apiSecret),
});
