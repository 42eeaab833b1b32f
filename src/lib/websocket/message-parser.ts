/**
 * Typed routing for venue stream messages: extract a message type,
 * validate against the registered valibot schema, drop duplicates, and
 * return the handler's result.
 *
 * Invalid or unknown messages are logged and yield null.
 */

import { LRUCache } from "lru-cache";
import * as v from "valibot";

import type { Logger } from "@/lib/logger";

export interface MessageHandler<T, R> {
  schema: v.GenericSchema<unknown, T>;
  handler: (message: T) => R;
  /** Messages with a key seen within the TTL are dropped */
  getDedupeKey?: (message: T) => string;
}

export interface MessageParserConfig {
  /** Returns the routing key of a decoded message, or null to ignore it */
  getType: (message: unknown) => string | null;
  maxDedupeSize?: number;
  dedupeTtlMs?: number;
  logger?: Logger;
}

export interface MessageParser<R> {
  registerHandler<T>(type: string, handler: MessageHandler<T, R>): void;
  /** Route one decoded message; null when ignored, invalid or duplicate */
  parse(message: unknown): R | null;
  getDedupeStats(): { size: number; hits: number; misses: number };
}

type RegisteredHandler<R> = (message: unknown) => R | null;

/**
 * @example
 * ```typescript
 * const parser = createMessageParser<OrderBookSnapshot>({
 *   getType: (message) => (isRecord(message) && message.event === "update" ? "book" : null),
 * });
 * parser.registerHandler("book", {
 *   schema: bookTickerSchema,
 *   handler: toSnapshot,
 *   getDedupeKey: (m) => `${m.result.s}:${m.result.u}`,
 * });
 * ```
 */
export const createMessageParser = <R>(config: MessageParserConfig): MessageParser<R> => {
  const { getType, maxDedupeSize = 10000, dedupeTtlMs = 60000, logger } = config;

  const handlers = new Map<string, RegisteredHandler<R>>();
  // perf.now keeps TTL expiry in step with fake timers
  const dedupeCache = new LRUCache<string, true>({
    max: maxDedupeSize,
    ttl: dedupeTtlMs,
    perf: {
      now: () => Date.now(),
    },
  });
  let dedupeHits = 0;
  let dedupeMisses = 0;

  const registerHandler = <T>(type: string, entry: MessageHandler<T, R>): void => {
    handlers.set(type, (message) => {
      const result = v.safeParse(entry.schema, message);
      if (!result.success) {
        logger?.warn("Message validation failed", {
          type,
          issues: result.issues.map((issue) => issue.message),
        });
        return null;
      }

      if (entry.getDedupeKey) {
        const key = entry.getDedupeKey(result.output);
        if (dedupeCache.get(key) !== undefined) {
          dedupeHits++;
          return null;
        }
        dedupeMisses++;
        dedupeCache.set(key, true);
      }

      return entry.handler(result.output);
    });
  };

  const parse = (message: unknown): R | null => {
    const type = getType(message);
    if (type === null) return null;

    const handler = handlers.get(type);
    return handler ? handler(message) : null;
  };

  return {
    registerHandler,
    parse,
    getDedupeStats: () => ({ size: dedupeCache.size, hits: dedupeHits, misses: dedupeMisses }),
  };
};

/**
 * Narrow a decoded message to a plain object.
 */
export const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);
