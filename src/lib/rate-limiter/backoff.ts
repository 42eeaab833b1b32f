/**
 * Exponential backoff and retry classification.
 */

export interface BackoffConfig {
  /** Delay before the first retry (ms) */
  initialDelayMs: number;
  /** Upper bound for any single delay (ms) */
  maxDelayMs: number;
  /** Growth factor per attempt */
  multiplier: number;
  /** Random extra delay as a fraction of the base delay (0-1) */
  jitterFactor: number;
}

/** 1s, doubling, capped at 60s, 10% jitter. */
export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  multiplier: 2,
  jitterFactor: 0.1,
};

/** Used after HTTP 429: 2s, tripling, capped at 120s, 20% jitter. */
export const RATE_LIMIT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 2000,
  maxDelayMs: 120000,
  multiplier: 3,
  jitterFactor: 0.2,
};

/**
 * Delay before retry number `attempt` (0-indexed), jitter included.
 *
 * @example
 * ```typescript
 * calculateBackoffMs(0); // ~1000
 * calculateBackoffMs(2); // ~4000
 * ```
 */
export const calculateBackoffMs = (
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
): number => {
  const { initialDelayMs, maxDelayMs, multiplier, jitterFactor } = config;
  const cappedDelayMs = Math.min(initialDelayMs * multiplier ** attempt, maxDelayMs);
  const jitter = cappedDelayMs * jitterFactor * Math.random();
  return Math.floor(cappedDelayMs + jitter);
};

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into ms.
 */
export const parseRetryAfterMs = (value: string | null | undefined): number | null => {
  if (!value) return null;

  if (/^\d+$/.test(value)) {
    return Number.parseInt(value, 10) * 1000;
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.max(date - Date.now(), 0);
  }

  return null;
};

export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export const NON_RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([400, 401, 403, 404, 422]);

const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_NETWORK",
  "ERR_SOCKET_TIMEOUT",
]);

const NON_RETRYABLE_ERROR_NAMES: ReadonlySet<string> = new Set([
  "RequestTimeoutError",
  "CircuitOpenError",
  "MaxRetriesExceededError",
  "RejectedOrderError",
  "FatalAdapterError",
]);

const NON_RETRYABLE_PATTERNS = [
  "insufficient balance",
  "insufficient margin",
  "invalid api key",
  "invalid signature",
  "order rejected",
];

/**
 * Reads an HTTP status from axios-style (`response.status`) or plain
 * (`status`, `statusCode`) error objects.
 */
export const getErrorStatus = (error: unknown): number | undefined => {
  if (error === null || typeof error !== "object") return undefined;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  if (
    "response" in error &&
    error.response !== null &&
    typeof error.response === "object" &&
    "status" in error.response &&
    typeof error.response.status === "number"
  ) {
    return error.response.status;
  }
  return undefined;
};

/**
 * Retryable: 429, 5xx, network failures and unknown errors.
 * Not retryable: auth and validation statuses, balance/rejection messages,
 * timeouts, open circuits and typed rejections.
 */
export const isRetryableError = (error: unknown): boolean => {
  if (error === null || typeof error !== "object") return true;

  if (
    "name" in error &&
    typeof error.name === "string" &&
    NON_RETRYABLE_ERROR_NAMES.has(error.name)
  ) {
    return false;
  }

  const status = getErrorStatus(error);
  if (status !== undefined) {
    if (NON_RETRYABLE_STATUS_CODES.has(status)) return false;
    if (RETRYABLE_STATUS_CODES.has(status)) return true;
  }

  if ("code" in error && typeof error.code === "string" && NETWORK_ERROR_CODES.has(error.code)) {
    return true;
  }

  if ("message" in error && typeof error.message === "string") {
    const message = error.message.toLowerCase();
    if (NON_RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern))) {
      return false;
    }
  }

  return true;
};
