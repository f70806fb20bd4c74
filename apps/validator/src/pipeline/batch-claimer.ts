import type { ValidationStore } from '../data/store.js';
import type { QueueItem } from '../types.js';

/**
 * Claim up to `limit` queued items (queued -> processing, attempts + 1).
 *
 * This is the only path that moves items out of `queued`. An empty result
 * means the queue is drained and the caller should back off.
 */
export async function claimBatch(store: ValidationStore, limit: number): Promise<QueueItem[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${limit}`);
  }

  const items = await store.claimQueued(limit);

  // RETURNING carries no ordering guarantee; hand items back oldest first
  return [...items].sort(
    (a, b) =>
      a.enqueuedAt.getTime() - b.enqueuedAt.getTime() ||
      compareIds(a.id, b.id),
  );
}

function compareIds(a: string, b: string): number {
  return a.length - b.length || (a < b ? -1 : a > b ? 1 : 0);
}
