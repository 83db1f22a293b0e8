/**
 * Loadout Core — Concurrency Primitives
 *
 * SingleFlight: at most one in-flight task per key. A second caller for a
 * key that is already running joins the existing promise instead of
 * starting another. This is what keeps two writers off the same staging
 * file.
 *
 * runBounded: a task queue drained by a fixed number of worker loops.
 */

export class SingleFlight<V> {
  private readonly inFlight = new Map<string, Promise<V>>();

  /**
   * Run `task` for `key`, or join the run already in progress.
   * The key is released when the task settles, whether it resolved or rejected.
   */
  run(key: string, task: () => Promise<V>): Promise<V> {
    const existing = this.inFlight.get(key);
    if (existing !== undefined) return existing;

    const started = task().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, started);
    return started;
  }

  isRunning(key: string): boolean {
    return this.inFlight.has(key);
  }
}

/**
 * Process `items` with at most `limit` workers, preserving input order in the
 * result array.
 *
 * `shouldContinue` is checked before each item is taken from the queue. Once
 * it returns false, no new items start; items already running finish, and
 * unstarted items are absent from the result.
 */
export async function runBounded<T, R>(
  items: ReadonlyArray<T>,
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  shouldContinue: () => boolean = () => true,
): Promise<ReadonlyArray<R>> {
  const results = new Map<number, R>();
  let next = 0;

  const loop = async (): Promise<void> => {
    while (next < items.length && shouldContinue()) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results.set(index, await worker(item, index));
    }
  };

  const cap = Number.isFinite(limit) ? Math.floor(limit) : 1;
  const workers = Math.max(1, Math.min(cap, items.length));
  await Promise.all(Array.from({ length: workers }, () => loop()));

  return [...results.entries()].sort(([a], [b]) => a - b).map(([, r]) => r);
}
