/**
 * Request policy: token bucket, circuit breaker, timeout and retry around
 * one venue's REST calls.
 *
 * 1. Take a token from the endpoint's bucket (waiting if empty)
 * 2. Run inside the circuit breaker, with a timeout for idempotent calls
 * 3. Retry retryable failures with backoff (Retry-After wins when present)
 *
 * Calls marked `idempotent: false` (order placement) run exactly once and
 * without a policy timeout: a retried or abandoned order request could
 * leave a live order the caller does not know about.
 */

import {
  type BackoffConfig,
  DEFAULT_BACKOFF_CONFIG,
  RATE_LIMIT_BACKOFF_CONFIG,
  calculateBackoffMs,
  getErrorStatus,
  isRetryableError,
  parseRetryAfterMs,
} from "./backoff";
import {
  type CircuitBreakerConfig,
  type CircuitBreakerState,
  CircuitOpenError,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  createCircuitBreaker,
} from "./circuit-breaker";
import { type TokenBucket, createTokenBucket } from "./token-bucket";
import { type EndpointCategory, type VenueRateLimitConfig, getEndpointCategory } from "./venues";

import type { Logger } from "@/lib/logger";

export interface RequestPolicyConfig {
  venue: string;
  rateLimits: VenueRateLimitConfig;
  circuitBreakerConfig?: CircuitBreakerConfig;
  backoffConfig?: BackoffConfig;
  /** Retries for idempotent calls (default 3) */
  maxRetries?: number;
  logger?: Logger;
}

export interface ExecuteOptions {
  /** Endpoint path, used to pick the rate limit bucket */
  endpoint: string;
  /** `false` disables retries and the policy timeout (default true) */
  idempotent?: boolean;
  timeoutMs?: number;
  maxRetries?: number;
}

export interface RequestPolicyMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalRetries: number;
  rateLimitWaits: number;
  rateLimitWaitTimeMs: number;
  circuitBreakerTrips: number;
}

export interface RequestPolicy {
  execute: <T>(fn: () => Promise<T>, options: ExecuteOptions) => Promise<T>;
  getMetrics: () => RequestPolicyMetrics;
  getCircuitState: () => CircuitBreakerState;
  getAvailableTokens: (endpoint: string) => number;
}

export class RequestTimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = "RequestTimeoutError";
  }
}

export class MaxRetriesExceededError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(message);
    this.name = "MaxRetriesExceededError";
  }
}

/**
 * The error a caller should classify: the last attempt's error when
 * retries ran out, otherwise the error itself.
 */
export const unwrapPolicyError = (error: unknown): unknown =>
  error instanceof MaxRetriesExceededError ? error.lastError : error;

const withTimeout = <T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> =>
  new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new RequestTimeoutError(`Request timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);

    fn().then(
      (result) => {
        clearTimeout(timeoutId);
        resolve(result);
      },
      (error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      },
    );
  });

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const readRetryAfter = (error: unknown): string | null => {
  if (error === null || typeof error !== "object") return null;
  const headers =
    "headers" in error
      ? error.headers
      : "response" in error &&
          error.response !== null &&
          typeof error.response === "object" &&
          "headers" in error.response
        ? error.response.headers
        : undefined;
  if (headers === null || typeof headers !== "object") return null;
  const value = "retry-after" in headers ? headers["retry-after"] : undefined;
  return typeof value === "string" ? value : null;
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * @example
 * ```typescript
 * const policy = createRequestPolicy({ venue: "bybit", rateLimits: BYBIT_RATE_LIMITS });
 * const balances = await policy.execute(() => http.get("/v5/account/wallet-balance"), {
 *   endpoint: "/v5/account/wallet-balance",
 * });
 * ```
 */
export const createRequestPolicy = (config: RequestPolicyConfig): RequestPolicy => {
  const {
    venue,
    rateLimits,
    circuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    backoffConfig = DEFAULT_BACKOFF_CONFIG,
    maxRetries = 3,
    logger,
  } = config;

  const buckets: Record<EndpointCategory, TokenBucket> = {
    public: createTokenBucket(rateLimits.rest.public),
    private: createTokenBucket(rateLimits.rest.private),
    orders: createTokenBucket(rateLimits.rest.orders),
  };

  const breaker = createCircuitBreaker(circuitBreakerConfig);

  const metrics: RequestPolicyMetrics = {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    totalRetries: 0,
    rateLimitWaits: 0,
    rateLimitWaitTimeMs: 0,
    circuitBreakerTrips: 0,
  };

  breaker.onStateChange((state) => {
    if (state === "OPEN") {
      metrics.circuitBreakerTrips++;
      logger?.warn("Circuit breaker opened", { venue, trips: metrics.circuitBreakerTrips });
    } else if (state === "CLOSED") {
      logger?.info("Circuit breaker closed", { venue });
    }
  });

  const execute = async <T>(fn: () => Promise<T>, options: ExecuteOptions): Promise<T> => {
    const { endpoint, idempotent = true } = options;
    const timeoutMs = options.timeoutMs ?? rateLimits.defaultTimeoutMs;
    const retries = idempotent ? (options.maxRetries ?? maxRetries) : 0;
    const bucket = buckets[getEndpointCategory(endpoint)];
    const run = idempotent ? (): Promise<T> => withTimeout(fn, timeoutMs) : fn;

    metrics.totalRequests++;

    for (let attempt = 0; ; attempt++) {
      const waitTimeMs = bucket.getWaitTimeMs();
      if (waitTimeMs > 0) {
        metrics.rateLimitWaits++;
        metrics.rateLimitWaitTimeMs += waitTimeMs;
        logger?.debug("Rate limit wait", { venue, endpoint, waitTimeMs });
      }
      await bucket.consume();

      try {
        const result = await breaker.execute(run);
        metrics.successfulRequests++;
        if (attempt > 0) {
          logger?.info("Request succeeded after retry", { venue, endpoint, attempt });
        }
        return result;
      } catch (error) {
        if (error instanceof CircuitOpenError || !isRetryableError(error) || retries === 0) {
          metrics.failedRequests++;
          throw error;
        }

        if (attempt >= retries) {
          metrics.failedRequests++;
          throw new MaxRetriesExceededError(
            `Max retries (${retries}) exceeded for ${endpoint}`,
            attempt + 1,
            error,
          );
        }

        const retryAfterMs = parseRetryAfterMs(readRetryAfter(error));
        const backoffMs =
          retryAfterMs ??
          calculateBackoffMs(
            attempt,
            getErrorStatus(error) === 429 ? RATE_LIMIT_BACKOFF_CONFIG : backoffConfig,
          );

        metrics.totalRetries++;
        logger?.debug("Retrying request", {
          venue,
          endpoint,
          attempt,
          backoffMs,
          error: errorMessage(error),
        });
        await sleep(backoffMs);
      }
    }
  };

  return {
    execute,
    getMetrics: () => ({ ...metrics }),
    getCircuitState: () => breaker.getState(),
    getAvailableTokens: (endpoint) => buckets[getEndpointCategory(endpoint)].getAvailableTokens(),
  };
};
