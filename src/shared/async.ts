/**
 * Async utilities for sleeping and polling
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export interface PollOptions {
  intervalMs: number;
  /** Give up once this much time has passed since the first attempt */
  timeoutMs?: number;
  /** Give up after this many attempts */
  maxAttempts?: number;
  sleep?: Sleep;
  now?: () => number;
}

export type PollOutcome<T> = { done: true; value: T } | { done: false; reason: string };

export type PollResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; reason: string; attempts: number };

/**
 * Call `check` until it reports done, the timeout elapses or the attempts run out.
 * A failed poll carries the reason from the last attempt.
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<PollOutcome<T>>,
  { intervalMs, timeoutMs, maxAttempts, sleep: wait = sleep, now = Date.now }: PollOptions,
): Promise<PollResult<T>> {
  const deadline = timeoutMs === undefined ? undefined : now() + timeoutMs;
  let attempts = 0;

  for (;;) {
    attempts++;
    const outcome = await check(attempts);
    if (outcome.done) {
      return { ok: true, value: outcome.value, attempts };
    }

    if (maxAttempts !== undefined && attempts >= maxAttempts) {
      return { ok: false, reason: outcome.reason, attempts };
    }
    let delay = intervalMs;
    if (deadline !== undefined) {
      const remaining = deadline - now();
      if (remaining <= 0) return { ok: false, reason: outcome.reason, attempts };
      delay = Math.min(intervalMs, remaining);
    }
    await wait(delay);
  }
}
