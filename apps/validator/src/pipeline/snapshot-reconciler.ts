/**
 * Snapshot Reconciler
 *
 * Keeps one sunat_current_status row per invoice. The change flag compares
 * the new (status, description) pair against the pair stored by the
 * previous reconciliation, never against anything seen in the same batch.
 * first_queried_at is written on insert only.
 */

import type { StoreSession } from '../data/store.js';
import type { QueueItem, RecordedStatus, SnapshotStatusPair } from '../types.js';

export interface ReconcileResult {
  inserted: boolean;
  changed: boolean;
}

/** Exact string comparison with null treated as '' */
export function statusPairChanged(
  previous: SnapshotStatusPair,
  next: Pick<RecordedStatus, 'statusText' | 'statusDescription'>,
): boolean {
  return (
    (previous.currentStatus ?? '') !== (next.statusText ?? '') ||
    (previous.statusDescription ?? '') !== (next.statusDescription ?? '')
  );
}

export async function reconcileSnapshot(
  session: StoreSession,
  item: QueueItem,
  status: RecordedStatus,
  now: Date,
): Promise<ReconcileResult> {
  const previous = await session.findSnapshotStatus(item.invoiceId);

  if (!previous) {
    const changed = status.statusText !== null;
    await session.insertSnapshot({
      invoiceId: item.invoiceId,
      issuerRuc: item.issuerRuc,
      receiverRuc: item.receiverRuc,
      documentType: item.documentType,
      series: item.series,
      number: item.number,
      totalAmount: item.totalAmount,
      currentStatus: status.statusText,
      statusDescription: status.statusDescription,
      responseCode: status.statusCode,
      message: status.message,
      firstQueriedAt: now,
      lastQueriedAt: now,
      lastChangedAt: now,
      statusChanged: changed,
    });
    return { inserted: true, changed };
  }

  if (statusPairChanged(previous, status)) {
    await session.applySnapshotChange(item.invoiceId, {
      currentStatus: status.statusText,
      statusDescription: status.statusDescription,
      responseCode: status.statusCode,
      message: status.message,
      queriedAt: now,
    });
    return { inserted: false, changed: true };
  }

  await session.touchSnapshot(item.invoiceId, {
    responseCode: status.statusCode,
    message: status.message,
    queriedAt: now,
  });
  return { inserted: false, changed: false };
}
