import { setTimeout as sleep } from "node:timers/promises";

/**
 * Runs `worker` over `items` with at most `limit` in flight. Results keep the
 * order of `items`, whatever order the workers finish in.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;
  const lanes = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  });
  await Promise.all(lanes);
  return results;
}

/**
 * Runs `fn` with a child signal that aborts when `parent` aborts or after
 * `timeoutMs`, whichever comes first. Rejects with the abort reason even if
 * `fn` ignores its signal.
 */
export async function callWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  opts: { timeoutMs: number; parent: AbortSignal; onTimeout: () => Error }
): Promise<T> {
  const { parent } = opts;
  if (parent.aborted) throw parent.reason;

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent.reason);
  parent.addEventListener("abort", onParentAbort, { once: true });
  const timer = setTimeout(() => controller.abort(opts.onTimeout()), opts.timeoutMs);

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
  });

  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent.removeEventListener("abort", onParentAbort);
  }
}

/** Sleeps for `ms`; rejects with the signal's reason if it aborts first. */
export async function delay(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) throw signal.reason;
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) throw signal.reason;
    throw error;
  }
}
