import { AxiosError, AxiosHeaders } from "axios";
import { describe, expect, it } from "vitest";

import { CircuitOpenError, MaxRetriesExceededError, RequestTimeoutError } from "@/lib/rate-limiter";

import {
  FatalAdapterError,
  RejectedOrderError,
  StreamDisconnectError,
  VenueError,
  classifyHttpStatus,
  createVenueError,
  isAmbiguousPlacementError,
  toVenueError,
} from "./errors";

const httpError = (status: number, data: unknown): AxiosError =>
  new AxiosError("Request failed", "ERR_BAD_REQUEST", undefined, undefined, {
    status,
    statusText: "",
    data,
    headers: {},
    config: { headers: new AxiosHeaders() },
  });

describe("createVenueError", () => {
  it("should pick the subclass from the code", () => {
    expect(createVenueError("x", "AUTHENTICATION_FAILED", "gateio")).toBeInstanceOf(
      FatalAdapterError,
    );
    expect(createVenueError("x", "INSUFFICIENT_BALANCE", "gateio")).toBeInstanceOf(
      RejectedOrderError,
    );
    expect(createVenueError("x", "STREAM_DISCONNECTED", "gateio")).toBeInstanceOf(
      StreamDisconnectError,
    );
    const generic = createVenueError("x", "RATE_LIMITED", "gateio");
    expect(generic).not.toBeInstanceOf(RejectedOrderError);
    expect(generic.name).toBe("VenueError");
  });
});

describe("classifyHttpStatus", () => {
  it("should map statuses to codes", () => {
    expect(classifyHttpStatus(undefined)).toBe("NETWORK_ERROR");
    expect(classifyHttpStatus(403)).toBe("AUTHENTICATION_FAILED");
    expect(classifyHttpStatus(429)).toBe("RATE_LIMITED");
    expect(classifyHttpStatus(422)).toBe("INVALID_ORDER");
    expect(classifyHttpStatus(503)).toBe("VENUE_UNAVAILABLE");
    expect(classifyHttpStatus(502)).toBe("NETWORK_ERROR");
  });
});

describe("toVenueError", () => {
  it("should pass venue errors through unchanged", () => {
    const error = new RejectedOrderError("nope", "INVALID_ORDER", "bybit");

    expect(toVenueError(error, "bybit", "Place order")).toBe(error);
  });

  it("should unwrap the last error of an exhausted retry loop", () => {
    const wrapped = new MaxRetriesExceededError("gave up", 4, httpError(401, ""));

    const error = toVenueError(wrapped, "gateio", "Fetch balances");

    expect(error).toBeInstanceOf(FatalAdapterError);
    expect(error.message).toBe("Fetch balances failed (401): Request failed");
  });

  it("should describe the response body", () => {
    const cause = httpError(401, { label: "INVALID_KEY" });

    const error = toVenueError(cause, "gateio", "Fetch balances");

    expect(error.message).toBe('Fetch balances failed (401): {"label":"INVALID_KEY"}');
  });

  it("should let a body classifier override the status", () => {
    const error = toVenueError(
      httpError(400, { label: "BALANCE_NOT_ENOUGH" }),
      "gateio",
      "Place order",
      () => "INSUFFICIENT_BALANCE",
    );

    expect(error).toBeInstanceOf(RejectedOrderError);
    expect(error.code).toBe("INSUFFICIENT_BALANCE");
  });

  it("should map policy failures", () => {
    expect(toVenueError(new CircuitOpenError(), "bybit", "Poll order").code).toBe("CIRCUIT_OPEN");
    expect(
      toVenueError(new RequestTimeoutError("timed out", 5000), "bybit", "Poll order").code,
    ).toBe("NETWORK_ERROR");
  });

  it("should wrap anything else as unknown", () => {
    const error = toVenueError(new Error("boom"), "bybit", "Poll order");

    expect(error.code).toBe("UNKNOWN");
    expect(error.message).toBe("Poll order failed: boom");
  });
});

describe("isAmbiguousPlacementError", () => {
  it("should treat definite refusals as not placed", () => {
    const rejected = new RejectedOrderError("x", "INVALID_ORDER", "bybit");
    const fatal = new FatalAdapterError("x", "AUTHENTICATION_FAILED", "bybit");

    expect(isAmbiguousPlacementError(rejected)).toBe(false);
    expect(isAmbiguousPlacementError(fatal)).toBe(false);
  });

  it("should treat lost responses as possibly placed", () => {
    expect(isAmbiguousPlacementError(new VenueError("x", "NETWORK_ERROR", "bybit"))).toBe(true);
    expect(isAmbiguousPlacementError(new Error("socket hang up"))).toBe(true);
  });
});
