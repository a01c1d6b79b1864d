export type Clock = {
  now(): number;
  sleep(ms: number): Promise<void>;
};

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise(resolve => setTimeout(resolve, ms)),
};

export type PollOptions = {
  intervalMs: number;
  timeoutMs: number;
  clock: Clock;
  /** Called before each sleep with the time spent so far. */
  onWait?: (elapsedMs: number) => void;
};

export type PollResult<T> = {
  ok: boolean;
  value: T;
  elapsedMs: number;
  attempts: number;
};

/**
 * Call `check` until `isDone` accepts the value or the wall-clock budget runs out.
 * `check` always runs at least once; a timeout is reported, never thrown.
 */
export async function pollUntil<T>(
  check: () => Promise<T>,
  isDone: (value: T) => boolean,
  options: PollOptions
): Promise<PollResult<T>> {
  const { clock, intervalMs, timeoutMs } = options;
  const start = clock.now();
  let attempts = 0;

  while (true) {
    const value = await check();
    attempts++;
    const elapsedMs = clock.now() - start;

    if (isDone(value)) {
      return { ok: true, value, elapsedMs, attempts };
    }
    if (elapsedMs >= timeoutMs) {
      return { ok: false, value, elapsedMs, attempts };
    }

    options.onWait?.(elapsedMs);
    await clock.sleep(Math.min(intervalMs, timeoutMs - elapsedMs));
  }
}
