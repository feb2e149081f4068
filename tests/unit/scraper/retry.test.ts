import { describe, it, expect, vi } from "vitest";

import { CancelledError, SourceError } from "../../../src/errors.js";
import {
  backoffDelay,
  classifyError,
  executeWithRetry,
} from "../../../src/scraper/retry.js";
import { VirtualClock } from "../../mocks/clock.js";

const OPTIONS = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 };

describe("scraper/retry", () => {
  describe("backoffDelay", () => {
    it("should double the delay per attempt", () => {
      expect(backoffDelay(1, 2000, 30_000)).toBe(2000);
      expect(backoffDelay(2, 2000, 30_000)).toBe(4000);
      expect(backoffDelay(4, 2000, 30_000)).toBe(16_000);
    });

    it("should cap the delay", () => {
      expect(backoffDelay(5, 2000, 30_000)).toBe(30_000);
    });
  });

  describe("classifyError", () => {
    it("should keep source errors as they are", () => {
      const error = new SourceError("not_found", "gone");
      expect(classifyError(error)).toBe(error);
    });

    it("should treat other errors as transient", () => {
      const classified = classifyError(new TypeError("fetch failed"));
      expect(classified.kind).toBe("transient");
      expect(classified.message).toBe("fetch failed");
    });
  });

  describe("executeWithRetry", () => {
    it("should return the first successful value", async () => {
      const clock = new VirtualClock();
      const attempt = vi.fn().mockResolvedValue("payload");

      const outcome = await executeWithRetry(attempt, { ...OPTIONS, clock });

      expect(outcome).toEqual({ ok: true, value: "payload", attempts: 1 });
      expect(clock.sleeps).toEqual([]);
    });

    it("should back off between transient failures", async () => {
      const clock = new VirtualClock();
      const attempt = vi
        .fn()
        .mockRejectedValueOnce(new SourceError("transient", "timeout"))
        .mockRejectedValueOnce(new SourceError("transient", "reset"))
        .mockResolvedValue("payload");

      const outcome = await executeWithRetry(attempt, { ...OPTIONS, clock });

      expect(outcome).toEqual({ ok: true, value: "payload", attempts: 3 });
      expect(clock.sleeps).toEqual([100, 200]);
      expect(attempt.mock.calls).toEqual([[1], [2], [3]]);
    });

    it("should not retry permanent failures", async () => {
      const clock = new VirtualClock();
      const attempt = vi
        .fn()
        .mockRejectedValue(new SourceError("not_found", "no such app"));

      const outcome = await executeWithRetry(attempt, { ...OPTIONS, clock });

      expect(outcome.ok).toBe(false);
      expect(outcome.attempts).toBe(1);
      if (!outcome.ok) {
        expect(outcome.error.kind).toBe("not_found");
      }
      expect(clock.sleeps).toEqual([]);
    });

    it("should honour Retry-After when it exceeds the backoff", async () => {
      const clock = new VirtualClock();
      const attempt = vi
        .fn()
        .mockRejectedValueOnce(
          new SourceError("throttled", "slow down", { retryAfterMs: 5000 })
        )
        .mockResolvedValue("payload");

      await executeWithRetry(attempt, { ...OPTIONS, clock });

      expect(clock.sleeps).toEqual([5000]);
    });

    it("should give up after the last attempt", async () => {
      const clock = new VirtualClock();
      const attempt = vi.fn().mockRejectedValue(new Error("socket hang up"));

      const outcome = await executeWithRetry(attempt, { ...OPTIONS, clock });

      expect(outcome.ok).toBe(false);
      expect(outcome.attempts).toBe(3);
      if (!outcome.ok) {
        expect(outcome.error.kind).toBe("transient");
        expect(outcome.error.message).toBe("socket hang up");
      }
      expect(clock.sleeps).toEqual([100, 200]);
    });

    it("should rethrow cancellation from the attempt", async () => {
      const clock = new VirtualClock();
      const attempt = vi.fn().mockRejectedValue(new CancelledError("stop"));

      await expect(
        executeWithRetry(attempt, { ...OPTIONS, clock })
      ).rejects.toThrow(CancelledError);
      expect(attempt).toHaveBeenCalledTimes(1);
    });

    it("should not start when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort(new CancelledError("Run timed out"));
      const attempt = vi.fn().mockResolvedValue("payload");

      await expect(
        executeWithRetry(attempt, {
          ...OPTIONS,
          clock: new VirtualClock(),
          signal: controller.signal,
        })
      ).rejects.toThrow("Run timed out");
      expect(attempt).not.toHaveBeenCalled();
    });
  });
});
