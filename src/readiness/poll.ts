/**
 * Bounded retry with timeout. Every wait-for-something loop in the tool goes
 * through `pollUntil`.
 *
 * An attempt runs immediately and then every `intervalMs` until one
 * succeeds or `timeoutMs` has passed. Each attempt is cut off after
 * `attemptTimeoutMs`, so the whole poll never takes longer than
 * `timeoutMs + attemptTimeoutMs`.
 */

export type PollOptions = {
  intervalMs: number;
  timeoutMs: number;
  /** Per-attempt limit (default: intervalMs). */
  attemptTimeoutMs?: number;
  onAttemptFailed?: (error: unknown, attempt: number) => void;
};

export type PollResult<T> = {
  value: T;
  attempts: number;
  elapsedMs: number;
};

export class PollTimeoutError extends Error {
  constructor(
    public readonly elapsedMs: number,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(`Gave up after ${attempts} attempts in ${elapsedMs}ms`, { cause: lastError });
    this.name = "PollTimeoutError";
  }
}

export class AttemptTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Run one attempt, aborting its signal and rejecting once `ms` passes. */
export async function withAttemptTimeout<T>(
  attempt: (signal: AbortSignal) => Promise<T>,
  ms: number,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new AttemptTimeoutError(ms));
    }, ms);
  });
  try {
    return await Promise.race([attempt(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

export async function pollUntil<T>(
  check: (signal: AbortSignal) => Promise<T>,
  options: PollOptions,
): Promise<PollResult<T>> {
  const attemptTimeoutMs = options.attemptTimeoutMs ?? options.intervalMs;
  const started = Date.now();
  let attempts = 0;

  for (;;) {
    attempts++;
    let lastError: unknown;
    try {
      const value = await withAttemptTimeout(check, attemptTimeoutMs);
      return { value, attempts, elapsedMs: Date.now() - started };
    } catch (err) {
      lastError = err;
      options.onAttemptFailed?.(err, attempts);
    }

    const elapsed = Date.now() - started;
    if (elapsed >= options.timeoutMs) {
      throw new PollTimeoutError(elapsed, attempts, lastError);
    }
    await sleep(Math.min(options.intervalMs, options.timeoutMs - elapsed));
  }
}
