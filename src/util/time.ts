export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((r) => setTimeout(r, Math.max(0, ms)));

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, Math.max(0, ms));
    signal.addEventListener("abort", done, { once: true });
  });
}

/** Lets queued I/O and timers run before the next iteration of a loop. */
export const yieldToLoop = () => new Promise<void>((r) => setImmediate(r));
