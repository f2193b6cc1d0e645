import { describe, expect, it, vi } from "vitest";
import {
  ANONYMOUS_DELAY_MS,
  defaultPacer,
  fixedIntervalPacer,
  immediatePacer,
  KEYED_DELAY_MS,
} from "./pacing.js";
import type { ResolutionOutcome } from "./types.js";

const rateLimited: ResolutionOutcome = {
  kind: "rate-limited",
  paperId: { kind: "corpus", value: "1" },
};

describe("defaultPacer", () => {
  it("waits 1.5 s with an API key", async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);

    await defaultPacer("test-key", sleep).pause(rateLimited);

    expect(sleep).toHaveBeenCalledWith(KEYED_DELAY_MS);
    expect(KEYED_DELAY_MS).toBe(1500);
  });

  it("waits 3 s without an API key", async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);

    await defaultPacer(undefined, sleep).pause(rateLimited);

    expect(sleep).toHaveBeenCalledWith(ANONYMOUS_DELAY_MS);
    expect(ANONYMOUS_DELAY_MS).toBe(3000);
  });

  it("treats an empty key as no key", async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);

    await defaultPacer("", sleep).pause(rateLimited);

    expect(sleep).toHaveBeenCalledWith(3000);
  });
});

describe("fixedIntervalPacer", () => {
  it("does not back off after repeated rate limits", async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const pacer = fixedIntervalPacer(250, sleep);

    await pacer.pause(rateLimited);
    await pacer.pause(rateLimited);

    expect(sleep.mock.calls).toEqual([[250], [250]]);
  });

  it("uses a real timer by default", async () => {
    vi.useFakeTimers();
    try {
      let done = false;
      const pending = fixedIntervalPacer(1000)
        .pause(rateLimited)
        .then(() => {
          done = true;
        });

      await vi.advanceTimersByTimeAsync(999);
      expect(done).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(done).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("immediatePacer", () => {
  it("resolves without waiting", async () => {
    await expect(immediatePacer.pause(rateLimited)).resolves.toBeUndefined();
  });
});
