import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  RATE_LIMIT_BACKOFF_CONFIG,
  calculateBackoffMs,
  getErrorStatus,
  isRetryableError,
  parseRetryAfterMs,
} from "./backoff";

describe("calculateBackoffMs", () => {
  beforeEach(() => {
    vi.spyOn(Math, "random").mockReturnValue(0.5);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should grow exponentially up to the cap", () => {
    const config = { initialDelayMs: 1000, maxDelayMs: 5000, multiplier: 2, jitterFactor: 0 };

    expect(calculateBackoffMs(0, config)).toBe(1000);
    expect(calculateBackoffMs(2, config)).toBe(4000);
    expect(calculateBackoffMs(3, config)).toBe(5000);
  });

  it("should add jitter proportional to the delay", () => {
    // 1000 + 1000 * 0.1 * 0.5
    expect(calculateBackoffMs(0)).toBe(1050);
    // 2000 * 3 = 6000, + 6000 * 0.2 * 0.5
    expect(calculateBackoffMs(1, RATE_LIMIT_BACKOFF_CONFIG)).toBe(6600);
  });
});

describe("parseRetryAfterMs", () => {
  it("should parse delta seconds", () => {
    expect(parseRetryAfterMs("3")).toBe(3000);
  });

  it("should parse an HTTP date relative to now", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-15T10:00:00.000Z"));

    expect(parseRetryAfterMs("Thu, 15 Jan 2026 10:00:05 GMT")).toBe(5000);

    vi.useRealTimers();
  });

  it("should return null for missing or garbage values", () => {
    expect(parseRetryAfterMs(null)).toBeNull();
    expect(parseRetryAfterMs("soon")).toBeNull();
  });
});

describe("getErrorStatus", () => {
  it("should read axios-style and plain status fields", () => {
    expect(getErrorStatus({ response: { status: 503 } })).toBe(503);
    expect(getErrorStatus({ status: 429 })).toBe(429);
    expect(getErrorStatus({ statusCode: 401 })).toBe(401);
    expect(getErrorStatus(new Error("x"))).toBeUndefined();
  });
});

describe("isRetryableError", () => {
  it("should retry rate limits, server errors and network failures", () => {
    expect(isRetryableError({ status: 429 })).toBe(true);
    expect(isRetryableError({ response: { status: 502 } })).toBe(true);
    expect(isRetryableError(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe(true);
  });

  it("should not retry client errors", () => {
    expect(isRetryableError({ status: 400 })).toBe(false);
    expect(isRetryableError({ response: { status: 403 } })).toBe(false);
  });

  it("should not retry balance failures or typed rejections", () => {
    expect(isRetryableError(new Error("Insufficient balance for order"))).toBe(false);

    const rejected = new Error("refused");
    rejected.name = "RejectedOrderError";
    expect(isRetryableError(rejected)).toBe(false);
  });
});
