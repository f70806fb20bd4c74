/**
 * Persistence port for the validation pipeline.
 *
 * The pipeline only talks to these interfaces. PgValidationStore is the
 * production adapter; tests run against an in-process implementation.
 */

import type {
  QueueItem,
  SnapshotStatusPair,
  StateSnapshot,
  ValidationRecord,
} from '../types.js';

/** Snapshot update when the (status, description) pair changed */
export interface SnapshotStatusChange {
  currentStatus: string | null;
  statusDescription: string | null;
  responseCode: string | null;
  message: string | null;
  queriedAt: Date;
}

/** Snapshot update when the pair is unchanged */
export interface SnapshotTouch {
  responseCode: string | null;
  message: string | null;
  queriedAt: Date;
}

/**
 * Writes for one queue item, executed inside a single transaction
 */
export interface StoreSession {
  insertValidation(record: ValidationRecord): Promise<void>;
  /** Locks the snapshot row for the rest of the session */
  findSnapshotStatus(invoiceId: string): Promise<SnapshotStatusPair | null>;
  insertSnapshot(snapshot: StateSnapshot): Promise<void>;
  applySnapshotChange(invoiceId: string, change: SnapshotStatusChange): Promise<void>;
  touchSnapshot(invoiceId: string, touch: SnapshotTouch): Promise<void>;
  markQueueDone(queueId: string): Promise<void>;
  markQueueError(queueId: string, lastError: string): Promise<void>;
}

export interface ValidationStore {
  /**
   * Atomically move up to `limit` queued rows (oldest first) to processing,
   * incrementing attempts and skipping rows locked by concurrent claimers
   */
  claimQueued(limit: number): Promise<QueueItem[]>;
  /** Run `fn` in one transaction; rolls back if it throws */
  withSession<T>(fn: (session: StoreSession) => Promise<T>): Promise<T>;
  /** Mirror snapshot state into the final table; returns rows modified */
  syncFinalRecords(): Promise<number>;
  /** Connectivity probe */
  ping(): Promise<void>;
}
