/** Longest delay a single Node timer honours; anything above fires after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Waits for `ms` milliseconds. Resolves true when the full wait elapsed and
 * false when `signal` aborted it first (including when it was already
 * aborted on entry). Waits past the timer limit are taken in steps.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
    let remaining = ms;
    let timer: NodeJS.Timeout | undefined;

    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };

    const step = () => {
      const wait = Math.min(remaining, MAX_TIMER_DELAY_MS);
      remaining -= wait;
      timer = setTimeout(() => {
        if (remaining > 0) {
          step();
          return;
        }
        signal?.removeEventListener('abort', onAbort);
        resolve(true);
      }, wait);
    };

    step();
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
