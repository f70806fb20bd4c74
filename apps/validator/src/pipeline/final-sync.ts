/**
 * Final Sync
 *
 * Mirrors the snapshot table into the sunat_* columns of
 * purchase_invoice_header. Rows are matched on invoice_id and only rows
 * whose mirrored values differ are written, so repeated runs converge to 0.
 */

import type { Logger } from 'pino';
import type { ValidationStore } from '../data/store.js';
import { SyncError, errorMessage } from '../errors.js';
import type { FinalStatusColumns, StateSnapshot } from '../types.js';

type SnapshotMirror = Pick<
  StateSnapshot,
  | 'currentStatus'
  | 'statusDescription'
  | 'responseCode'
  | 'message'
  | 'statusChanged'
  | 'firstQueriedAt'
  | 'lastQueriedAt'
  | 'lastChangedAt'
>;

function sameInstant(a: Date | null, b: Date | null): boolean {
  if (a === null || b === null) return a === b;
  return a.getTime() === b.getTime();
}

/**
 * Next column values for one final row, or null when the row is already in
 * sync. Same rule as SYNC_FINAL_SQL.
 */
export function planFinalUpdate(
  final: FinalStatusColumns,
  snapshot: SnapshotMirror,
): FinalStatusColumns | null {
  const needsUpdate =
    final.lastStatus !== snapshot.currentStatus ||
    final.statusDescription !== snapshot.statusDescription ||
    final.responseCode !== snapshot.responseCode ||
    final.message !== snapshot.message ||
    final.statusChanged !== snapshot.statusChanged ||
    (final.firstQueriedAt === null && snapshot.firstQueriedAt !== null) ||
    !sameInstant(final.lastQueriedAt, snapshot.lastQueriedAt) ||
    (snapshot.statusChanged && !sameInstant(final.changedAt, snapshot.lastChangedAt));

  if (!needsUpdate) return null;

  return {
    lastStatus: snapshot.currentStatus,
    statusDescription: snapshot.statusDescription,
    responseCode: snapshot.responseCode,
    message: snapshot.message,
    statusChanged: snapshot.statusChanged,
    firstQueriedAt: final.firstQueriedAt ?? snapshot.firstQueriedAt,
    lastQueriedAt: snapshot.lastQueriedAt,
    changedAt: snapshot.statusChanged ? snapshot.lastChangedAt : final.changedAt,
  };
}

/**
 * Run the set-based sync once. Returns the number of final rows modified.
 */
export async function syncFinal(store: ValidationStore, logger: Logger): Promise<number> {
  try {
    const updated = await store.syncFinalRecords();
    if (updated > 0) {
      logger.info({ updated }, 'Final records synchronized');
    } else {
      logger.debug('Final records already in sync');
    }
    return updated;
  } catch (error) {
    throw new SyncError(`Final sync failed: ${errorMessage(error)}`, { cause: error });
  }
}
