import { abortError } from "../utils/errors.js";

export type PoolWorker<T> = (item: T, signal: AbortSignal) => Promise<void>;

/**
 * Runs worker over items with at most limit in flight. The first failure
 * aborts the shared signal and stops new items from starting; workers
 * already running are awaited before that failure is rethrown.
 */
export async function runPool<T>(
  items: T[],
  limit: number,
  worker: PoolWorker<T>,
  parent?: AbortSignal
): Promise<void> {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    onParentAbort();
  }
  parent?.addEventListener("abort", onParentAbort, { once: true });

  let next = 0;
  let firstError: unknown = null;
  let failed = false;

  const lane = async (): Promise<void> => {
    while (next < items.length && !controller.signal.aborted) {
      const item = items[next++];
      try {
        await worker(item, controller.signal);
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
          controller.abort(error);
        }
      }
    }
  };

  const width = Math.max(1, Math.min(Math.floor(limit), items.length));
  try {
    await Promise.all(Array.from({ length: width }, () => lane()));
  } finally {
    parent?.removeEventListener("abort", onParentAbort);
  }

  if (failed) {
    throw firstError;
  }
  if (parent?.aborted) {
    throw abortError();
  }
}
