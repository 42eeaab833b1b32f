import { EventEmitter } from "node:events";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { FatalAdapterError, StreamDisconnectError } from "@/adapters/errors";

import { classifyCloseCode, openStreamSocket } from "./stream-socket";

const sockets = vi.hoisted((): unknown[] => []);

vi.mock("ws", async () => {
  const { EventEmitter: Emitter } = await import("node:events");

  class FakeSocket extends Emitter {
    static CONNECTING = 0;
    static OPEN = 1;
    static CLOSING = 2;
    static CLOSED = 3;

    readyState = 0;
    sent: string[] = [];
    pings = 0;

    constructor(public url: string) {
      super();
      sockets.push(this);
    }

    send(message: string): void {
      this.sent.push(message);
    }

    ping(): void {
      this.pings++;
    }

    terminate(): void {
      this.readyState = 3;
    }
  }

  return { default: FakeSocket };
});

interface FakeSocketView extends EventEmitter {
  url: string;
  readyState: number;
  sent: string[];
  pings: number;
}

const isFakeSocket = (value: unknown): value is FakeSocketView => value instanceof EventEmitter;

const latestSocket = (): FakeSocketView => {
  const socket = sockets.at(-1);
  if (!isFakeSocket(socket)) throw new Error("no socket opened");
  return socket;
};

const open = (socket: FakeSocketView): void => {
  socket.readyState = 1;
  socket.emit("open");
};

describe("classifyCloseCode", () => {
  it("should classify auth, rate limit and normal closes", () => {
    expect(classifyCloseCode(4401)).toBe("AUTH_FAILURE");
    expect(classifyCloseCode(1013)).toBe("RATE_LIMITED");
    expect(classifyCloseCode(1006)).toBe("NORMAL");
    expect(classifyCloseCode(4999)).toBe("UNKNOWN");
  });
});

describe("openStreamSocket", () => {
  beforeEach(() => {
    sockets.length = 0;
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should subscribe on open and yield decoded messages", async () => {
    const iterator = openStreamSocket({
      venue: "bybit",
      url: "wss://example.test/stream",
      subscribeMessages: [{ op: "subscribe", args: ["orderbook.1.ETHUSDT"] }],
    })[Symbol.asyncIterator]();
    const socket = latestSocket();

    open(socket);
    socket.emit("message", Buffer.from('{"topic":"orderbook.1.ETHUSDT"}'));

    expect(socket.sent).toEqual(['{"op":"subscribe","args":["orderbook.1.ETHUSDT"]}']);
    await expect(iterator.next()).resolves.toEqual({
      value: { topic: "orderbook.1.ETHUSDT" },
      done: false,
    });
  });

  it("should fail with StreamDisconnectError when the socket closes", async () => {
    const iterator = openStreamSocket({
      venue: "gateio",
      url: "wss://example.test/stream",
      subscribeMessages: [],
    })[Symbol.asyncIterator]();
    const socket = latestSocket();

    open(socket);
    socket.emit("close", 1006, Buffer.from("gone"));

    await expect(iterator.next()).rejects.toBeInstanceOf(StreamDisconnectError);
  });

  it("should fail with FatalAdapterError on an auth close code", async () => {
    const iterator = openStreamSocket({
      venue: "gateio",
      url: "wss://example.test/stream",
      subscribeMessages: [],
    })[Symbol.asyncIterator]();
    const socket = latestSocket();

    socket.emit("close", 4401, Buffer.from("unauthorized"));

    await expect(iterator.next()).rejects.toBeInstanceOf(FatalAdapterError);
  });

  it("should end quietly when aborted", async () => {
    const controller = new AbortController();
    const iterator = openStreamSocket({
      venue: "gateio",
      url: "wss://example.test/stream",
      subscribeMessages: [],
      signal: controller.signal,
    })[Symbol.asyncIterator]();
    const socket = latestSocket();
    open(socket);

    controller.abort();

    await expect(iterator.next()).resolves.toEqual({ value: undefined, done: true });
    expect(socket.readyState).toBe(3);
  });

  it("should ping and terminate when the heartbeat goes unanswered", async () => {
    const iterator = openStreamSocket({
      venue: "gateio",
      url: "wss://example.test/stream",
      subscribeMessages: [],
      heartbeat: {
        intervalMs: 1000,
        timeoutMs: 500,
        pingMessage: () => ({ channel: "spot.ping" }),
      },
    })[Symbol.asyncIterator]();
    const socket = latestSocket();
    open(socket);

    await vi.advanceTimersByTimeAsync(1000);
    expect(socket.pings).toBe(1);
    expect(socket.sent).toEqual(['{"channel":"spot.ping"}']);

    await vi.advanceTimersByTimeAsync(500);
    expect(socket.readyState).toBe(3);

    socket.emit("close", 1006, Buffer.from(""));
    await expect(iterator.next()).rejects.toBeInstanceOf(StreamDisconnectError);
  });
});
