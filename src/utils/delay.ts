/** Resolves after `ms`, or straight away once `signal` aborts */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();

  return new Promise(resolve => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/** Human-like pause of a random length in [minMs, maxMs] */
export function randomDelay(minMs: number, maxMs: number, signal?: AbortSignal): Promise<void> {
  const low = Math.max(0, Math.min(minMs, maxMs));
  const high = Math.max(0, minMs, maxMs);
  return sleep(low + Math.random() * (high - low), signal);
}
