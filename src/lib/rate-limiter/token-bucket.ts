/**
 * Token bucket rate limiter.
 */

export interface TokenBucketConfig {
  /** Bucket capacity */
  maxTokens: number;
  /** Tokens added per second */
  refillRatePerSecond: number;
  /** Starting tokens (default: maxTokens) */
  initialTokens?: number;
}

export interface TokenBucket {
  /** Take tokens if available right now */
  tryConsume: (tokens?: number) => boolean;
  /** Take tokens, waiting for the refill if needed */
  consume: (tokens?: number) => Promise<void>;
  getAvailableTokens: () => number;
  /** Time until `tokens` are available (0 if they already are) */
  getWaitTimeMs: (tokens?: number) => number;
  reset: () => void;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export const createTokenBucket = (config: TokenBucketConfig): TokenBucket => {
  const { maxTokens, refillRatePerSecond, initialTokens = maxTokens } = config;

  let tokens = initialTokens;
  let lastRefillMs = Date.now();

  const refill = (): void => {
    const now = Date.now();
    tokens = Math.min(maxTokens, tokens + ((now - lastRefillMs) / 1000) * refillRatePerSecond);
    lastRefillMs = now;
  };

  const tryConsume = (count = 1): boolean => {
    refill();
    if (tokens < count) return false;
    tokens -= count;
    return true;
  };

  const getWaitTimeMs = (count = 1): number => {
    refill();
    if (tokens >= count) return 0;
    return Math.ceil(((count - tokens) / refillRatePerSecond) * 1000);
  };

  const consume = async (count = 1): Promise<void> => {
    const waitMs = getWaitTimeMs(count);
    if (waitMs > 0) {
      await sleep(waitMs);
      refill();
    }
    tokens -= count;
  };

  const getAvailableTokens = (): number => {
    refill();
    return tokens;
  };

  const reset = (): void => {
    tokens = maxTokens;
    lastRefillMs = Date.now();
  };

  return {
    tryConsume,
    consume,
    getAvailableTokens,
    getWaitTimeMs,
    reset,
  };
};
