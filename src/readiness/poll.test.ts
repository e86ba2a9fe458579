/**
 * Polling Primitive Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AttemptTimeoutError, PollTimeoutError, pollUntil } from "./poll.js";

describe("pollUntil", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("retries at the interval until the check passes", async () => {
    const check = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new Error("refused"))
      .mockRejectedValueOnce(new Error("refused"))
      .mockResolvedValue("up");
    const failed = vi.fn();

    const pending = pollUntil(check, { intervalMs: 1_000, timeoutMs: 10_000, onAttemptFailed: failed });
    await vi.advanceTimersByTimeAsync(2_000);

    await expect(pending).resolves.toEqual({ value: "up", attempts: 3, elapsedMs: 2_000 });
    expect(failed).toHaveBeenCalledTimes(2);
  });

  it("gives up once the timeout passes", async () => {
    const check = vi.fn().mockRejectedValue(new Error("refused"));

    const pending = pollUntil(check, { intervalMs: 10_000, timeoutMs: 30_000 }).catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(30_000);
    const err = await pending;

    expect(err).toBeInstanceOf(PollTimeoutError);
    expect(err).toMatchObject({ elapsedMs: 30_000, attempts: 4 });
  });

  it("cuts off attempts that hang and aborts their signal", async () => {
    const signals: AbortSignal[] = [];
    const check = (signal: AbortSignal) => {
      signals.push(signal);
      return new Promise<never>(() => {});
    };

    const pending = pollUntil(check, { intervalMs: 1_000, timeoutMs: 2_000, attemptTimeoutMs: 500 }).catch(
      (e: unknown) => e,
    );
    await vi.advanceTimersByTimeAsync(2_000);
    const err = await pending;

    expect(err).toMatchObject({ elapsedMs: 2_000, attempts: 2 });
    expect(err).toBeInstanceOf(PollTimeoutError);
    if (err instanceof PollTimeoutError) expect(err.lastError).toBeInstanceOf(AttemptTimeoutError);
    expect(signals.map((s) => s.aborted)).toEqual([true, true]);
  });
});
