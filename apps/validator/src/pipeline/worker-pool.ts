/**
 * Bounded-concurrency fan-out.
 *
 * Runs `task` for every item with at most `limit` in flight and yields each
 * outcome as soon as it settles (first completed, first yielded). A slot is
 * refilled before the outcome is handed to the consumer, so a slow consumer
 * never holds back tasks that are already running.
 */

export type SettledTask<I, R> =
  | { item: I; status: 'fulfilled'; value: R }
  | { item: I; status: 'rejected'; reason: unknown };

export async function* runBounded<I, R>(
  items: Iterable<I>,
  limit: number,
  task: (item: I) => Promise<R>,
): AsyncGenerator<SettledTask<I, R>> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const iterator = items[Symbol.iterator]();
  const inFlight = new Map<number, Promise<{ id: number; outcome: SettledTask<I, R> }>>();
  let sequence = 0;

  const launch = (): boolean => {
    const step = iterator.next();
    if (step.done) return false;

    const id = sequence++;
    const item = step.value;
    const running = Promise.resolve()
      .then(() => task(item))
      .then(
        (value): { id: number; outcome: SettledTask<I, R> } => ({
          id,
          outcome: { item, status: 'fulfilled', value },
        }),
        (reason: unknown): { id: number; outcome: SettledTask<I, R> } => ({
          id,
          outcome: { item, status: 'rejected', reason },
        }),
      );
    inFlight.set(id, running);
    return true;
  };

  while (inFlight.size < limit && launch()) {
    // fill initial slots
  }

  while (inFlight.size > 0) {
    const settled = await Promise.race(inFlight.values());
    inFlight.delete(settled.id);
    launch();
    yield settled.outcome;
  }
}
