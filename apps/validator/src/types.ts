/**
 * Queue lifecycle states. Transitions: queued -> processing -> done | error
 */
export type QueueStatus = 'queued' | 'processing' | 'done' | 'error';

/**
 * Document identity fields shared by the queue, history and snapshot rows.
 * BIGINT ids and NUMERIC amounts arrive from pg as strings and stay that way.
 */
export interface InvoiceDocument {
  invoiceId: string;
  issuerRuc: string;
  receiverRuc: string | null;
  documentType: string;
  series: string;
  number: string;
  /** YYYY-MM-DD */
  issueDate: string | null;
  totalAmount: string | number | null;
}

/**
 * One row of sunat_queue
 */
export interface QueueItem extends InvoiceDocument {
  id: string;
  status: QueueStatus;
  attempts: number;
  lastError: string | null;
  enqueuedAt: Date;
}

/**
 * Opaque JSON object returned by (or synthesised around) the validation API
 */
export type ValidationPayload = Record<string, unknown>;

/**
 * Canonical status derived from data.estadoCp
 */
export interface MappedStatus {
  statusText: string | null;
  statusDescription: string | null;
  statusCode: string | null;
}

/**
 * What the history recorder hands to the snapshot reconciler
 */
export interface RecordedStatus extends MappedStatus {
  message: string | null;
}

/**
 * Append-only audit row (sunat_validation)
 */
export interface ValidationRecord extends InvoiceDocument {
  statusText: string | null;
  statusCode: string | null;
  message: string | null;
  tokenExpiresAt: Date | null;
  rawPayload: ValidationPayload;
}

/**
 * Current-truth row per invoice (sunat_current_status)
 */
export interface StateSnapshot extends Omit<InvoiceDocument, 'issueDate'> {
  currentStatus: string | null;
  statusDescription: string | null;
  responseCode: string | null;
  message: string | null;
  firstQueriedAt: Date | null;
  lastQueriedAt: Date | null;
  lastChangedAt: Date | null;
  statusChanged: boolean;
}

/**
 * The previously stored status pair used for change detection
 */
export interface SnapshotStatusPair {
  currentStatus: string | null;
  statusDescription: string | null;
}

/**
 * Mirrored sunat_* columns of the downstream purchase_invoice_header table
 */
export interface FinalStatusColumns {
  lastStatus: string | null;
  statusDescription: string | null;
  responseCode: string | null;
  message: string | null;
  statusChanged: boolean | null;
  firstQueriedAt: Date | null;
  lastQueriedAt: Date | null;
  changedAt: Date | null;
}

/**
 * Result of one poll cycle
 */
export interface BatchResult {
  claimed: number;
  succeeded: number;
  failed: number;
  /** Rows touched by the final sync, null when the sync failed */
  finalUpdated: number | null;
}

/**
 * Health check response
 */
export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: number;
  checks: {
    database: {
      connected: boolean;
    };
    poller: {
      running: boolean;
      lastCycleAt: number | null;
      consecutiveFailures: number;
    };
    token: {
      cached: boolean;
      expiresAt: number | null;
    };
    memory: {
      heapUsed: number;
      heapTotal: number;
      rss: number;
      belowThreshold: boolean;
    };
  };
}
