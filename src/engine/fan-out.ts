/**
 * Bounded-concurrency fan-out.
 *
 * Launches at most `maxConcurrency` tasks at once and hands each settlement
 * to `onSettled` as it arrives. Once `shouldStop` reports true no further
 * tasks are launched; tasks already in flight are awaited and still
 * settled, so the caller decides whether to keep or discard them.
 */

export interface FanOutTask<R> {
  key: string;
  run: () => Promise<R>;
}

export type FanOutSettlement<R> =
  | { key: string; ok: true; value: R }
  | { key: string; ok: false; error: unknown };

export interface FanOutOptions<R> {
  maxConcurrency: number;
  onSettled?: (settlement: FanOutSettlement<R>) => Promise<void> | void;
  shouldStop?: () => boolean;
}

/** Returns settlements in completion order. Tasks never launched are absent. */
export async function runBounded<R>(
  tasks: FanOutTask<R>[],
  options: FanOutOptions<R>,
): Promise<FanOutSettlement<R>[]> {
  const limit = Math.max(1, Math.floor(options.maxConcurrency));
  const queue = [...tasks];
  const inFlight = new Map<string, Promise<FanOutSettlement<R>>>();
  const settled: FanOutSettlement<R>[] = [];

  const launch = (task: FanOutTask<R>) => {
    const wrapped = Promise.resolve()
      .then(task.run)
      .then(
        (value): FanOutSettlement<R> => ({ key: task.key, ok: true, value }),
        (error: unknown): FanOutSettlement<R> => ({ key: task.key, ok: false, error }),
      );
    inFlight.set(task.key, wrapped);
  };

  const schedule = () => {
    while (inFlight.size < limit && queue.length > 0 && !options.shouldStop?.()) {
      const next = queue.shift();
      if (!next) break;
      launch(next);
    }
  };

  schedule();
  while (inFlight.size > 0) {
    const completion = await Promise.race(inFlight.values());
    inFlight.delete(completion.key);
    settled.push(completion);
    if (options.onSettled) {
      await options.onSettled(completion);
    }
    schedule();
  }

  return settled;
}
