/**
 * In-memory session counters rendered in the Prometheus text format.
 */

import type { LedgerSnapshot } from "@/domains/ledger";
import type { TradeOutcomeKind } from "@/domains/reporting";
import type { Decision } from "@/domains/strategy";
import { formatBase, formatQuote } from "@/lib/decimal";

export type FailureReason = "stale-data" | "insufficient-collateral" | "trade" | "rebalance";

export const PROMETHEUS_CONTENT_TYPE = "text/plain; version=0.0.4";

const DURATION_BUCKETS_MS = [100, 500, 1000] as const;
const MAX_DURATIONS = 1000;

export interface SessionMetrics {
  recordDecision(decision: Decision): void;
  recordTrade(kind: TradeOutcomeKind): void;
  recordRebalance(outcome: "rebalanced" | "failed"): void;
  recordFailure(reason: FailureReason): void;
  setImbalance(ledger: LedgerSnapshot): void;
  recordHttpRequest(durationMs: number): void;
  render(): string;
}

type Sample = [labels: string, value: number | string];

const block = (name: string, help: string, type: string, samples: Sample[]): string =>
  [
    `# HELP ${name} ${help}`,
    `# TYPE ${name} ${type}`,
    ...samples.map(([labels, value]) => `${name}${labels} ${value}`),
  ].join("\n");

const label = (key: string, value: string): string => `{${key}="${value}"}`;

export const createSessionMetrics = (): SessionMetrics => {
  const decisions = { trade: 0, skip: 0 };
  const skips = new Map<string, number>();
  const trades: Record<TradeOutcomeKind, number> = { verified: 0, mismatch: 0, "leg-failed": 0 };
  const rebalances = { rebalanced: 0, failed: 0 };
  const failures: Record<FailureReason, number> = {
    "stale-data": 0,
    "insufficient-collateral": 0,
    trade: 0,
    rebalance: 0,
  };
  let imbalanceBase = 0n;
  let imbalanceQuote = 0n;
  let httpRequests = 0;
  const durations: number[] = [];

  return {
    recordDecision: (decision) => {
      decisions[decision.action]++;
      if (decision.action === "skip") {
        skips.set(decision.reason, (skips.get(decision.reason) ?? 0) + 1);
      }
    },
    recordTrade: (kind) => {
      trades[kind]++;
    },
    recordRebalance: (outcome) => {
      rebalances[outcome]++;
    },
    recordFailure: (reason) => {
      failures[reason]++;
    },
    setImbalance: (ledger) => {
      imbalanceBase = ledger.cumulativeDiffBase;
      imbalanceQuote = ledger.valueQuote;
    },
    recordHttpRequest: (durationMs) => {
      httpRequests++;
      durations.push(durationMs);
      if (durations.length > MAX_DURATIONS) durations.shift();
    },
    render: () =>
      [
        block("hedge_decisions_total", "Gate decisions by action", "counter", [
          [label("action", "trade"), decisions.trade],
          [label("action", "skip"), decisions.skip],
        ]),
        block(
          "hedge_skips_total",
          "Skipped opportunities by reason",
          "counter",
          Array.from(skips, ([reason, count]): Sample => [label("reason", reason), count]),
        ),
        block(
          "hedge_trades_total",
          "Paired trades by outcome",
          "counter",
          Object.entries(trades).map(([kind, count]): Sample => [label("outcome", kind), count]),
        ),
        block("hedge_rebalances_total", "Rebalance orders by outcome", "counter", [
          [label("outcome", "rebalanced"), rebalances.rebalanced],
          [label("outcome", "failed"), rebalances.failed],
        ]),
        block(
          "hedge_failures_total",
          "Failed iterations by reason",
          "counter",
          Object.entries(failures).map(
            ([reason, count]): Sample => [label("reason", reason), count],
          ),
        ),
        block("hedge_imbalance_base", "Cumulative leg difference in base units", "gauge", [
          ["", formatBase(imbalanceBase)],
        ]),
        block("hedge_imbalance_quote", "Leg difference valued in quote units", "gauge", [
          ["", formatQuote(imbalanceQuote)],
        ]),
        block("http_requests_total", "Total number of HTTP requests", "counter", [
          ["", httpRequests],
        ]),
        block(
          "http_request_duration_seconds",
          "HTTP request duration in seconds",
          "histogram",
          [
            ...DURATION_BUCKETS_MS.map(
              (bucketMs): Sample => [
                `_bucket${label("le", (bucketMs / 1000).toFixed(1))}`,
                durations.filter((duration) => duration < bucketMs).length,
              ],
            ),
            [`_bucket${label("le", "+Inf")}`, durations.length],
          ],
        ),
      ].join("\n\n"),
  };
};
