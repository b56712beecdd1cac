export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Returns a gate that lets callers through one at a time, at least
 * `delayMs` apart. Callers queue in arrival order.
 */
export function createThrottle(delayMs: number): () => Promise<void> {
  let last = 0;
  let chain = Promise.resolve();
  return async () => {
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const prev = chain;
    chain = chain.then(() => current);
    await prev;

    const now = Date.now();
    const wait = Math.max(0, last + delayMs - now);
    if (wait > 0) {
      await sleep(wait);
    }
    last = Date.now();
    release();
  };
}
