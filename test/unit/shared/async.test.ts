import { describe, it, expect, jest } from '@jest/globals';
import { pollUntil, type PollOutcome, type Sleep } from '../../../src/shared/async';

function fakeClock(start = 0): { now: () => number; sleep: Sleep; slept: number[] } {
  let time = start;
  const slept: number[] = [];
  return {
    now: () => time,
    sleep: async (ms: number) => {
      slept.push(ms);
      time += ms;
    },
    slept,
  };
}

describe('pollUntil', () => {
  it('should return the first done value with the attempt count', async () => {
    const clock = fakeClock();
    const check = jest.fn(async (attempt: number): Promise<PollOutcome<string>> =>
      attempt < 3 ? { done: false, reason: 'not yet' } : { done: true, value: 'ready' },
    );

    const result = await pollUntil(check, { intervalMs: 100, sleep: clock.sleep, now: clock.now });

    expect(result).toEqual({ ok: true, value: 'ready', attempts: 3 });
    expect(clock.slept).toEqual([100, 100]);
  });

  it('should give up after maxAttempts with the last reason', async () => {
    const clock = fakeClock();
    let calls = 0;
    const result = await pollUntil<number>(
      async () => {
        calls++;
        return { done: false, reason: `attempt ${calls}` };
      },
      { intervalMs: 10, maxAttempts: 2, sleep: clock.sleep },
    );

    expect(result).toEqual({ ok: false, reason: 'attempt 2', attempts: 2 });
    expect(clock.slept).toEqual([10]);
  });

  it('should shorten the last sleep to the deadline', async () => {
    const clock = fakeClock(1000);
    const result = await pollUntil<number>(async () => ({ done: false, reason: 'missing' }), {
      intervalMs: 40,
      timeoutMs: 100,
      sleep: clock.sleep,
      now: clock.now,
    });

    expect(result).toEqual({ ok: false, reason: 'missing', attempts: 4 });
    expect(clock.slept).toEqual([40, 40, 20]);
  });
});
