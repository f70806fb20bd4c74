export { TokenCache, TOKEN_SAFETY_MARGIN_MS, type AccessToken, type TokenCacheConfig } from './auth/token-cache.js';
export { loadConfig, getConfig, resetConfig, type Config } from './config.js';
export { createPool, initDatabase, checkConnection, closeDatabase } from './data/database.js';
export { PgValidationStore } from './data/pg-store.js';
export type { StoreSession, ValidationStore, SnapshotStatusChange, SnapshotTouch } from './data/store.js';
export * from './errors.js';
export { HealthServer } from './health.js';
export { createLogger, type Logger } from './logger.js';
export { claimBatch } from './pipeline/batch-claimer.js';
export { planFinalUpdate, syncFinal } from './pipeline/final-sync.js';
export { extractMessage, recordHistory } from './pipeline/history-recorder.js';
export { formatErrorInfo, markDone, markError, truncateUtf8 } from './pipeline/queue-status.js';
export { reconcileSnapshot, type ReconcileResult } from './pipeline/snapshot-reconciler.js';
export { STATUS_CATALOG, mapStatus, normalizeStatusCode } from './pipeline/status-mapper.js';
export { runBounded, type SettledTask } from './pipeline/worker-pool.js';
export {
  createValidationPoller,
  type PollerStatus,
  type ValidationPoller,
  type ValidationPollerConfig,
  type ValidationPollerDeps,
} from './poller.js';
export type * from './types.js';
export { ValidationClient, type ValidationOutcome } from './validation/client.js';
export { formatAmount, formatIssueDate, toValidationRequest, type ValidationRequest } from './validation/request.js';
