import { randomBytes } from "node:crypto";

/**
 * Short client order id accepted by every supported venue
 * (alphanumeric, at most 20 characters with the default prefix).
 */
export const createClientOrderId = (prefix = "hx"): string =>
  `${prefix}${Date.now().toString(36)}${randomBytes(4).toString("hex")}`;
