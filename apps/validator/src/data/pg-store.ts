/**
 * PostgreSQL adapter for the ValidationStore port.
 *
 * Tables (see sql/schema.sql):
 *   sunat_queue             work queue, claimed with FOR UPDATE SKIP LOCKED
 *   sunat_validation        append-only audit log
 *   sunat_current_status    one snapshot row per invoice
 *   purchase_invoice_header externally owned; only sunat_* columns are written
 */

import type { Pool, PoolClient } from 'pg';
import type { Logger } from 'pino';
import type { QueueItem, QueueStatus, SnapshotStatusPair, StateSnapshot, ValidationRecord } from '../types.js';
import type {
  SnapshotStatusChange,
  SnapshotTouch,
  StoreSession,
  ValidationStore,
} from './store.js';

// --------------------------------------------------------------------------
// Row types
// --------------------------------------------------------------------------

/** sunat_queue row as returned by pg */
export type QueueRow = {
  id: string;
  invoice_id: string;
  issuer_ruc: string;
  receiver_ruc: string | null;
  document_type: string;
  series: string;
  number: string;
  issue_date: string | null;
  total_amount: string | null;
  status: QueueStatus;
  attempts: number;
  last_error: string | null;
  enqueued_at: Date;
};

type SnapshotPairRow = {
  current_status: string | null;
  status_description: string | null;
};

// --------------------------------------------------------------------------
// SQL
// --------------------------------------------------------------------------

export const CLAIM_BATCH_SQL = `
WITH next AS (
  SELECT id
    FROM sunat_queue
   WHERE status = 'queued'
   ORDER BY enqueued_at ASC, id ASC
   LIMIT $1
   FOR UPDATE SKIP LOCKED
)
UPDATE sunat_queue AS q
   SET status = 'processing',
       attempts = q.attempts + 1
  FROM next
 WHERE q.id = next.id
RETURNING q.id, q.invoice_id, q.issuer_ruc, q.receiver_ruc, q.document_type,
          q.series, q.number, q.issue_date, q.total_amount, q.status,
          q.attempts, q.last_error, q.enqueued_at`;

export const INSERT_VALIDATION_SQL = `
INSERT INTO sunat_validation
  (invoice_id, issuer_ruc, receiver_ruc, document_type, series, number,
   issue_date, total_amount, status_text, response_code, message,
   token_expires_at, raw_json)
VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`;

export const SELECT_SNAPSHOT_SQL = `
SELECT current_status, status_description
  FROM sunat_current_status
 WHERE invoice_id = $1
   FOR UPDATE`;

export const INSERT_SNAPSHOT_SQL = `
INSERT INTO sunat_current_status
  (invoice_id, issuer_ruc, receiver_ruc, document_type, series, number,
   total_amount, current_status, status_description, response_code, message,
   first_queried_at, last_queried_at, last_changed_at, status_changed)
VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)`;

export const APPLY_SNAPSHOT_CHANGE_SQL = `
UPDATE sunat_current_status
   SET current_status = $2,
       status_description = $3,
       response_code = $4,
       message = $5,
       last_queried_at = $6,
       last_changed_at = $6,
       status_changed = TRUE
 WHERE invoice_id = $1`;

export const TOUCH_SNAPSHOT_SQL = `
UPDATE sunat_current_status
   SET response_code = $2,
       message = $3,
       last_queried_at = $4,
       status_changed = FALSE
 WHERE invoice_id = $1`;

export const MARK_DONE_SQL = `
UPDATE sunat_queue
   SET status = 'done', last_error = NULL
 WHERE id = $1 AND status = 'processing'`;

export const MARK_ERROR_SQL = `
UPDATE sunat_queue
   SET status = 'error', last_error = $2
 WHERE id = $1 AND status = 'processing'`;

/**
 * Only rows whose mirrored columns differ are touched, so a re-run against
 * an unchanged snapshot modifies nothing.
 *   - sunat_first_queried_at is only filled when still empty
 *   - sunat_changed_at only follows the snapshot when status_changed is set
 *
 * planFinalUpdate in pipeline/final-sync.ts is the row-level form of this
 * statement; the two change together.
 */
export const SYNC_FINAL_SQL = `
UPDATE purchase_invoice_header AS d
   SET sunat_last_status        = s.current_status,
       sunat_status_description = s.status_description,
       sunat_response_code      = s.response_code,
       sunat_message            = s.message,
       sunat_status_changed     = s.status_changed,
       sunat_first_queried_at   = COALESCE(d.sunat_first_queried_at, s.first_queried_at),
       sunat_last_queried_at    = s.last_queried_at,
       sunat_changed_at         = CASE WHEN s.status_changed
                                       THEN s.last_changed_at
                                       ELSE d.sunat_changed_at
                                  END
  FROM sunat_current_status AS s
 WHERE s.invoice_id = d.invoice_id
   AND (
        d.sunat_last_status        IS DISTINCT FROM s.current_status
     OR d.sunat_status_description IS DISTINCT FROM s.status_description
     OR d.sunat_response_code      IS DISTINCT FROM s.response_code
     OR d.sunat_message            IS DISTINCT FROM s.message
     OR d.sunat_status_changed     IS DISTINCT FROM s.status_changed
     OR (d.sunat_first_queried_at IS NULL AND s.first_queried_at IS NOT NULL)
     OR d.sunat_last_queried_at    IS DISTINCT FROM s.last_queried_at
     OR (s.status_changed AND d.sunat_changed_at IS DISTINCT FROM s.last_changed_at)
   )`;

// --------------------------------------------------------------------------
// Mapping
// --------------------------------------------------------------------------

export function toQueueItem(row: QueueRow): QueueItem {
  return {
    id: String(row.id),
    invoiceId: String(row.invoice_id),
    issuerRuc: row.issuer_ruc,
    receiverRuc: row.receiver_ruc,
    documentType: row.document_type,
    series: row.series,
    number: row.number,
    issueDate: row.issue_date,
    totalAmount: row.total_amount,
    status: row.status,
    attempts: row.attempts,
    lastError: row.last_error,
    enqueuedAt: row.enqueued_at,
  };
}

// --------------------------------------------------------------------------
// Session
// --------------------------------------------------------------------------

class PgStoreSession implements StoreSession {
  constructor(private readonly client: PoolClient) {}

  async insertValidation(record: ValidationRecord): Promise<void> {
    await this.client.query(INSERT_VALIDATION_SQL, [
      record.invoiceId,
      record.issuerRuc,
      record.receiverRuc,
      record.documentType,
      record.series,
      record.number,
      record.issueDate,
      record.totalAmount,
      record.statusText,
      record.statusCode,
      record.message,
      record.tokenExpiresAt,
      JSON.stringify(record.rawPayload),
    ]);
  }

  async findSnapshotStatus(invoiceId: string): Promise<SnapshotStatusPair | null> {
    const result = await this.client.query<SnapshotPairRow>(SELECT_SNAPSHOT_SQL, [invoiceId]);
    const row = result.rows[0];
    if (!row) return null;
    return {
      currentStatus: row.current_status,
      statusDescription: row.status_description,
    };
  }

  async insertSnapshot(snapshot: StateSnapshot): Promise<void> {
    await this.client.query(INSERT_SNAPSHOT_SQL, [
      snapshot.invoiceId,
      snapshot.issuerRuc,
      snapshot.receiverRuc,
      snapshot.documentType,
      snapshot.series,
      snapshot.number,
      snapshot.totalAmount,
      snapshot.currentStatus,
      snapshot.statusDescription,
      snapshot.responseCode,
      snapshot.message,
      snapshot.firstQueriedAt,
      snapshot.lastQueriedAt,
      snapshot.lastChangedAt,
      snapshot.statusChanged,
    ]);
  }

  async applySnapshotChange(invoiceId: string, change: SnapshotStatusChange): Promise<void> {
    await this.client.query(APPLY_SNAPSHOT_CHANGE_SQL, [
      invoiceId,
      change.currentStatus,
      change.statusDescription,
      change.responseCode,
      change.message,
      change.queriedAt,
    ]);
  }

  async touchSnapshot(invoiceId: string, touch: SnapshotTouch): Promise<void> {
    await this.client.query(TOUCH_SNAPSHOT_SQL, [
      invoiceId,
      touch.responseCode,
      touch.message,
      touch.queriedAt,
    ]);
  }

  async markQueueDone(queueId: string): Promise<void> {
    await this.client.query(MARK_DONE_SQL, [queueId]);
  }

  async markQueueError(queueId: string, lastError: string): Promise<void> {
    await this.client.query(MARK_ERROR_SQL, [queueId, lastError]);
  }
}

// --------------------------------------------------------------------------
// Store
// --------------------------------------------------------------------------

export class PgValidationStore implements ValidationStore {
  private readonly log: Logger;

  constructor(
    private readonly pool: Pool,
    logger: Logger,
  ) {
    this.log = logger.child({ component: 'PgValidationStore' });
  }

  async claimQueued(limit: number): Promise<QueueItem[]> {
    const result = await this.pool.query<QueueRow>(CLAIM_BATCH_SQL, [limit]);
    return result.rows.map(toQueueItem);
  }

  async withSession<T>(fn: (session: StoreSession) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await fn(new PgStoreSession(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.log.error({ error: rollbackError }, 'Rollback failed');
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async syncFinalRecords(): Promise<number> {
    const result = await this.pool.query(SYNC_FINAL_SQL);
    return result.rowCount ?? 0;
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
