import { describe, expect, it } from "vitest";

import { createBybitHeaders, signBybitRequest } from "./signing";

describe("signBybitRequest", () => {
  it("should sign the query string of a GET request", () => {
    const signature = signBybitRequest(
      {
        timestampMs: 1_700_000_000_000,
        recvWindowMs: 5000,
        payload: "category=linear&symbol=ETHUSDT",
      },
      "test-key",
      "test-secret",
    );

    expect(signature).toBe("0a58e5400c1d03db985c5c454c73d48c030de027efe8cd2e519f6f1a3944c6d4");
  });

  it("should sign the JSON body of a POST request", () => {
    const signature = signBybitRequest(
      { timestampMs: 1_700_000_000_000, recvWindowMs: 5000, payload: '{"category":"linear"}' },
      "test-key",
      "test-secret",
    );

    expect(signature).toBe("d715cb0aa121cb8e960f32859dda886b45f61606300b22904bf744773b7d8c05");
  });
});

describe("createBybitHeaders", () => {
  it("should carry key, timestamp, receive window and signature", () => {
    const headers = createBybitHeaders(
      { timestampMs: 1_700_000_000_000, recvWindowMs: 5000, payload: '{"category":"linear"}' },
      "test-key",
      "test-secret",
    );

    expect(headers).toEqual({
      "X-BAPI-API-KEY": "test-key",
      "X-BAPI-TIMESTAMP": "1700000000000",
      "X-BAPI-RECV-WINDOW": "5000",
      "X-BAPI-SIGN": "d715cb0aa121cb8e960f32859dda886b45f61606300b22904bf744773b7d8c05",
    });
  });
});
