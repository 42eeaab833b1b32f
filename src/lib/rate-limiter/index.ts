export {
  createTokenBucket,
  type TokenBucket,
  type TokenBucketConfig,
} from "./token-bucket";

export {
  calculateBackoffMs,
  DEFAULT_BACKOFF_CONFIG,
  getErrorStatus,
  isRetryableError,
  NON_RETRYABLE_STATUS_CODES,
  parseRetryAfterMs,
  RATE_LIMIT_BACKOFF_CONFIG,
  RETRYABLE_STATUS_CODES,
  type BackoffConfig,
} from "./backoff";

export {
  CircuitOpenError,
  createCircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  type CircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerState,
} from "./circuit-breaker";

export {
  getEndpointCategory,
  type EndpointCategory,
  type VenueRateLimitConfig,
} from "./venues";

export {
  createRequestPolicy,
  MaxRetriesExceededError,
  RequestTimeoutError,
  unwrapPolicyError,
  type ExecuteOptions,
  type RequestPolicy,
  type RequestPolicyConfig,
  type RequestPolicyMetrics,
} from "./request-policy";
