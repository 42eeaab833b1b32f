/**
 * One WebSocket connection per market data stream, exposed as an async
 * iterable of parsed JSON messages.
 *
 * The socket never reconnects by itself: a close or error ends the
 * iterable with `StreamDisconnectError` (or `FatalAdapterError` for
 * auth close codes) and the consumer decides when to resubscribe.
 * Aborting `signal` closes the socket and ends the iterable quietly.
 */

import WebSocket from "ws";

import { FatalAdapterError, StreamDisconnectError } from "@/adapters/errors";
import { createAsyncQueue } from "@/lib/async-queue";
import type { Logger } from "@/lib/logger";

export type CloseCategory = "AUTH_FAILURE" | "RATE_LIMITED" | "NORMAL" | "UNKNOWN";

/**
 * @see https://developer.mozilla.org/en-US/docs/Web/API/CloseEvent/code
 */
export const classifyCloseCode = (code: number): CloseCategory => {
  if (code === 4401 || code === 4403 || code === 1008) return "AUTH_FAILURE";
  if (code === 4429 || code === 1013) return "RATE_LIMITED";
  if (code === 1000 || code === 1001 || code === 1006) return "NORMAL";
  return "UNKNOWN";
};

export interface HeartbeatConfig {
  intervalMs: number;
  /** Close the socket when nothing arrives this long after a ping */
  timeoutMs: number;
  /** App-level ping some venues require on top of protocol pings */
  pingMessage?: () => unknown;
}

export interface StreamSocketConfig {
  venue: string;
  url: string;
  /** Sent in order once the socket opens */
  subscribeMessages: unknown[];
  heartbeat?: HeartbeatConfig;
  signal?: AbortSignal;
  logger?: Logger;
}

const toText = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  return Buffer.from(data).toString("utf-8");
};

const decode = (data: WebSocket.RawData): unknown => {
  const text = toText(data);
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

/**
 * @example
 * ```typescript
 * const messages = openStreamSocket({
 *   venue: "bybit",
 *   url: "wss://stream.bybit.com/v5/public/linear",
 *   subscribeMessages: [{ op: "subscribe", args: ["orderbook.1.ETHUSDT"] }],
 *   signal,
 * });
 * for await (const message of messages) router.route(message);
 * ```
 */
export const openStreamSocket = (config: StreamSocketConfig): AsyncIterable<unknown> => {
  const { venue, url, subscribeMessages, heartbeat, signal, logger } = config;
  const queue = createAsyncQueue<unknown>();

  if (signal?.aborted) {
    queue.close();
    return queue;
  }

  const socket = new WebSocket(url);
  let heartbeatTimer: NodeJS.Timeout | null = null;
  let livenessTimer: NodeJS.Timeout | null = null;

  const stopTimers = (): void => {
    if (heartbeatTimer) clearInterval(heartbeatTimer);
    if (livenessTimer) clearTimeout(livenessTimer);
    heartbeatTimer = null;
    livenessTimer = null;
  };

  const markAlive = (): void => {
    if (livenessTimer) {
      clearTimeout(livenessTimer);
      livenessTimer = null;
    }
  };

  const teardown = (): void => {
    stopTimers();
    signal?.removeEventListener("abort", onAbort);
    socket.removeAllListeners();
    // A late error from a closing socket must not crash the process.
    socket.on("error", () => undefined);
    if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
      socket.terminate();
    }
  };

  const onAbort = (): void => {
    teardown();
    queue.close();
  };

  const send = (message: unknown): void => {
    socket.send(typeof message === "string" ? message : JSON.stringify(message));
  };

  socket.on("open", () => {
    logger?.debug("Stream socket open", { venue, url });
    for (const message of subscribeMessages) {
      send(message);
    }

    if (heartbeat) {
      heartbeatTimer = setInterval(() => {
        if (socket.readyState !== WebSocket.OPEN) return;
        socket.ping();
        if (heartbeat.pingMessage) send(heartbeat.pingMessage());
        if (!livenessTimer) {
          livenessTimer = setTimeout(() => {
            logger?.warn("Stream heartbeat timeout", { venue });
            socket.terminate();
          }, heartbeat.timeoutMs);
        }
      }, heartbeat.intervalMs);
    }
  });

  socket.on("message", (data: WebSocket.RawData) => {
    markAlive();
    queue.push(decode(data));
  });

  socket.on("pong", markAlive);

  socket.on("error", (error: Error) => {
    teardown();
    queue.fail(new StreamDisconnectError(`Stream error: ${error.message}`, venue, error));
  });

  socket.on("close", (code: number, reason: Buffer) => {
    teardown();
    const reasonText = reason.toString("utf-8");
    if (classifyCloseCode(code) === "AUTH_FAILURE") {
      queue.fail(
        new FatalAdapterError(
          `Stream rejected (${code} ${reasonText})`,
          "AUTHENTICATION_FAILED",
          venue,
        ),
      );
      return;
    }
    queue.fail(new StreamDisconnectError(`Stream closed (${code} ${reasonText})`, venue));
  });

  signal?.addEventListener("abort", onAbort, { once: true });

  return queue;
};
