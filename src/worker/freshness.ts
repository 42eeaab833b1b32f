/**
 * Order book freshness thresholds and staleness checks.
 */

export interface FreshnessConfig {
  /** A venue's latest top of book older than this is not paired for trading */
  snapshotMaxAgeMs: number;
  /** A stream that yields nothing for this long is torn down and resubscribed */
  streamIdleTimeoutMs: number;
}

export const DEFAULT_FRESHNESS_CONFIG: FreshnessConfig = {
  snapshotMaxAgeMs: 3000,
  streamIdleTimeoutMs: 30_000,
};

/**
 * Fresh while the age is within the bound; a snapshot exactly
 * `maxAgeMs` old still counts.
 */
export const isFresh = (receivedAt: number | null, nowMs: number, maxAgeMs: number): boolean =>
  receivedAt !== null && nowMs - receivedAt <= maxAgeMs;
