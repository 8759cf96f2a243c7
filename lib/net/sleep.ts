/**
 * Wait `ms` milliseconds. Resolves early (without throwing) when `signal` aborts;
 * returns true when the full delay elapsed.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(t);
      resolve(false);
    };
    const t = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, Math.max(0, Math.floor(ms)));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export default sleep;
