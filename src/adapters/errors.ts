import { isAxiosError } from "axios";

import {
  CircuitOpenError,
  RequestTimeoutError,
  unwrapPolicyError,
} from "@/lib/rate-limiter";

/**
 * Venue adapter error types.
 *
 * `RejectedOrderError` and `StreamDisconnectError` are recoverable at the
 * leg and stream level. `FatalAdapterError` (authentication, venue outage)
 * is the only adapter error that ends a hedge session.
 */

export type VenueErrorCode =
  | "AUTHENTICATION_FAILED"
  | "RATE_LIMITED"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_ORDER"
  | "ORDER_NOT_FOUND"
  | "STREAM_DISCONNECTED"
  | "VENUE_UNAVAILABLE"
  | "NETWORK_ERROR"
  | "CIRCUIT_OPEN"
  | "UNKNOWN";

export class VenueError extends Error {
  public override readonly name: string = "VenueError";

  constructor(
    message: string,
    public readonly code: VenueErrorCode,
    public readonly venue: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

/**
 * The venue refused an order before it reached the book
 * (insufficient balance, invalid size).
 */
export class RejectedOrderError extends VenueError {
  public override readonly name: string = "RejectedOrderError";
}

/**
 * An order book stream lost its connection. Callers resubscribe.
 */
export class StreamDisconnectError extends VenueError {
  public override readonly name: string = "StreamDisconnectError";

  constructor(message: string, venue: string, cause?: unknown) {
    super(message, "STREAM_DISCONNECTED", venue, cause);
  }
}

/**
 * Authentication failure or venue outage. Stops the session.
 */
export class FatalAdapterError extends VenueError {
  public override readonly name: string = "FatalAdapterError";
}

export const isFatalAdapterError = (error: unknown): error is FatalAdapterError =>
  error instanceof FatalAdapterError;

const REJECTION_CODES: ReadonlySet<VenueErrorCode> = new Set([
  "INSUFFICIENT_BALANCE",
  "INVALID_ORDER",
]);

const FATAL_CODES: ReadonlySet<VenueErrorCode> = new Set([
  "AUTHENTICATION_FAILED",
  "VENUE_UNAVAILABLE",
]);

/**
 * Build the error subclass that matches `code`.
 */
export const createVenueError = (
  message: string,
  code: VenueErrorCode,
  venue: string,
  cause?: unknown,
): VenueError => {
  if (FATAL_CODES.has(code)) return new FatalAdapterError(message, code, venue, cause);
  if (REJECTION_CODES.has(code)) return new RejectedOrderError(message, code, venue, cause);
  if (code === "STREAM_DISCONNECTED") return new StreamDisconnectError(message, venue, cause);
  return new VenueError(message, code, venue, cause);
};

/**
 * Map an HTTP status code to a venue error code.
 */
export const classifyHttpStatus = (status: number | undefined): VenueErrorCode => {
  if (status === undefined) return "NETWORK_ERROR";
  if (status === 401 || status === 403) return "AUTHENTICATION_FAILED";
  if (status === 429) return "RATE_LIMITED";
  if (status === 404) return "ORDER_NOT_FOUND";
  if (status === 400 || status === 422) return "INVALID_ORDER";
  if (status === 503) return "VENUE_UNAVAILABLE";
  if (status >= 500) return "NETWORK_ERROR";
  return "UNKNOWN";
};

/**
 * Whether a failed order placement may still have reached the venue.
 * Only definite refusals (and requests that never left) count as "not placed".
 */
export const isAmbiguousPlacementError = (error: unknown): boolean => {
  if (!(error instanceof VenueError)) return true;
  return error.code === "NETWORK_ERROR" || error.code === "UNKNOWN";
};

/**
 * Reads a venue-specific error code from a response body, or null to fall
 * back to the HTTP status.
 */
export type BodyClassifier = (body: unknown) => VenueErrorCode | null;

const describeBody = (body: unknown): string => {
  if (body === undefined || body === null || body === "") return "";
  return typeof body === "string" ? body : JSON.stringify(body);
};

/**
 * Convert anything a request can throw (axios errors, request policy
 * errors, venue errors) into a typed `VenueError`.
 */
export const toVenueError = (
  error: unknown,
  venue: string,
  action: string,
  classifyBody?: BodyClassifier,
): VenueError => {
  const cause = unwrapPolicyError(error);
  if (cause instanceof VenueError) return cause;

  if (cause instanceof CircuitOpenError) {
    return new VenueError(`${action}: circuit open`, "CIRCUIT_OPEN", venue, cause);
  }
  if (cause instanceof RequestTimeoutError) {
    return new VenueError(`${action}: ${cause.message}`, "NETWORK_ERROR", venue, cause);
  }

  if (isAxiosError(cause)) {
    const status = cause.response?.status;
    const body: unknown = cause.response?.data;
    const code = classifyBody?.(body) ?? classifyHttpStatus(status);
    const detail = describeBody(body) || cause.message;
    const message = `${action} failed (${status ?? "no response"}): ${detail}`;
    return createVenueError(message, code, venue, cause);
  }

  const message = cause instanceof Error ? cause.message : String(cause);
  return new VenueError(`${action} failed: ${message}`, "UNKNOWN", venue, cause);
};
