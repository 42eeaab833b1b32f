import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { sleep } from "./sleep";

describe("sleep", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve after the delay", async () => {
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it("should resolve early when aborted", async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeUndefined();
    expect(vi.getTimerCount()).toBe(0);
  });
});
