/**
 * Validation Poller
 *
 * One cycle: token -> claim -> bounded parallel validation -> serialized
 * per-item persistence -> final sync. Cycles run back to back while the
 * queue yields work and fall back to the idle interval once it is drained
 * or a cycle fails.
 *
 * Only the HTTP calls run concurrently. Every database write for an item
 * (history, snapshot, queue status) goes through one writer lock and one
 * transaction, so an item's writes commit before the next item's begin.
 */

import type { Logger } from 'pino';
import type { AccessToken } from './auth/token-cache.js';
import type { ValidationStore } from './data/store.js';
import { PersistenceError, errorMessage } from './errors.js';
import { claimBatch } from './pipeline/batch-claimer.js';
import { syncFinal } from './pipeline/final-sync.js';
import { recordHistory } from './pipeline/history-recorder.js';
import { markDone, markError } from './pipeline/queue-status.js';
import { reconcileSnapshot } from './pipeline/snapshot-reconciler.js';
import { runBounded } from './pipeline/worker-pool.js';
import type { BatchResult, QueueItem, ValidationPayload } from './types.js';
import { REAL_CLOCK, type Clock } from './utils/clock.js';
import { Mutex } from './utils/mutex.js';
import type { ValidationOutcome } from './validation/client.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface TokenSource {
  getToken(): Promise<AccessToken>;
}

export interface Validator {
  validate(headers: Record<string, string>, item: QueueItem): Promise<ValidationOutcome>;
}

export interface ValidationPollerDeps {
  store: ValidationStore;
  tokenCache: TokenSource;
  client: Validator;
  logger: Logger;
  clock?: Clock;
}

export interface ValidationPollerConfig {
  /** Items claimed per cycle (default: 300) */
  batchSize?: number;
  /** Concurrent validation calls (default: 10) */
  concurrency?: number;
  /** Wait after an empty or failed cycle (default: 5000) */
  idlePollIntervalMs?: number;
}

export interface PollerTotals {
  cycles: number;
  claimed: number;
  succeeded: number;
  failed: number;
}

export interface PollerStatus {
  running: boolean;
  lastCycleAt: number | null;
  lastResult: BatchResult | null;
  consecutiveFailures: number;
  totals: PollerTotals;
}

export type ValidationPoller = ReturnType<typeof createValidationPoller>;

type ItemResult = 'succeeded' | 'failed';

// --------------------------------------------------------------------------
// Constants
// --------------------------------------------------------------------------

const DEFAULT_BATCH_SIZE = 300;
const DEFAULT_CONCURRENCY = 10;
const DEFAULT_IDLE_POLL_INTERVAL_MS = 5_000;

// --------------------------------------------------------------------------
// Factory
// --------------------------------------------------------------------------

export function createValidationPoller(deps: ValidationPollerDeps, config: ValidationPollerConfig = {}) {
  const { store, tokenCache, client } = deps;
  const log = deps.logger.child({ component: 'ValidationPoller' });
  const clock = deps.clock ?? REAL_CLOCK;
  const batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
  const concurrency = config.concurrency ?? DEFAULT_CONCURRENCY;
  const idlePollIntervalMs = config.idlePollIntervalMs ?? DEFAULT_IDLE_POLL_INTERVAL_MS;

  const writer = new Mutex();

  let running = false;
  let pollTimer: ReturnType<typeof setTimeout> | null = null;
  let inFlight: Promise<void> | null = null;
  let lastCycleAt: number | null = null;
  let lastResult: BatchResult | null = null;
  let consecutiveFailures = 0;
  const totals: PollerTotals = { cycles: 0, claimed: 0, succeeded: 0, failed: 0 };

  // -----------------------------------------------------------------------
  // Per-item persistence
  // -----------------------------------------------------------------------

  async function persistItem(
    item: QueueItem,
    ok: boolean,
    payload: ValidationPayload,
    credentialExpiry: Date,
  ): Promise<ItemResult> {
    try {
      await store.withSession(async (session) => {
        const status = await recordHistory(session, item, credentialExpiry, payload);
        await reconcileSnapshot(session, item, status, new Date(clock.now()));
        if (ok) {
          await markDone(session, item.id);
        } else {
          await markError(session, item.id, payload);
        }
      });
      return ok ? 'succeeded' : 'failed';
    } catch (error) {
      const failure = new PersistenceError(
        `Persisting queue item ${item.id} failed: ${errorMessage(error)}`,
        item.id,
        { cause: error },
      );
      log.error({ queueId: item.id, invoiceId: item.invoiceId, error: failure }, 'Item persistence failed, transaction rolled back');

      try {
        await store.withSession((session) => markError(session, item.id, failure));
      } catch (fallbackError) {
        log.error(
          { queueId: item.id, error: fallbackError },
          'Could not mark item as error, it stays in processing',
        );
      }
      return 'failed';
    }
  }

  // -----------------------------------------------------------------------
  // Cycle
  // -----------------------------------------------------------------------

  async function runBatch(): Promise<BatchResult> {
    const token = await tokenCache.getToken();
    const items = await claimBatch(store, batchSize);

    if (items.length === 0) {
      log.debug('Queue empty');
      return { claimed: 0, succeeded: 0, failed: 0, finalUpdated: 0 };
    }

    log.info({ claimed: items.length, concurrency }, 'Batch claimed');

    const headers = { Authorization: `Bearer ${token.token}` };
    const writes: Promise<ItemResult>[] = [];

    for await (const settled of runBounded(items, concurrency, (item) => client.validate(headers, item))) {
      const { item } = settled;
      let ok: boolean;
      let payload: ValidationPayload;

      if (settled.status === 'fulfilled') {
        const outcome = settled.value;
        ok = outcome.ok;
        payload = outcome.payload;
        if (!outcome.ok) {
          log.warn({ queueId: item.id, invoiceId: item.invoiceId, error: outcome.error }, 'Validation failed');
        }
      } else {
        ok = false;
        payload = { error: errorMessage(settled.reason) };
        log.error({ queueId: item.id, error: settled.reason }, 'Validation task raised');
      }

      writes.push(writer.runExclusive(() => persistItem(item, ok, payload, token.expiresAt)));
    }

    const itemResults = await Promise.all(writes);
    const succeeded = itemResults.filter((r) => r === 'succeeded').length;

    let finalUpdated: number | null;
    try {
      finalUpdated = await syncFinal(store, log);
    } catch (error) {
      log.error({ error }, 'Final sync failed, retrying next cycle');
      finalUpdated = null;
    }

    const result: BatchResult = {
      claimed: items.length,
      succeeded,
      failed: items.length - succeeded,
      finalUpdated,
    };
    log.info(result, 'Batch processed');
    return result;
  }

  /**
   * Run one cycle. Throws when no token can be obtained or the claim fails;
   * nothing is claimed in either case.
   */
  async function processBatch(): Promise<BatchResult> {
    try {
      const result = await runBatch();
      lastCycleAt = clock.now();
      lastResult = result;
      consecutiveFailures = 0;
      totals.cycles++;
      totals.claimed += result.claimed;
      totals.succeeded += result.succeeded;
      totals.failed += result.failed;
      return result;
    } catch (error) {
      lastCycleAt = clock.now();
      consecutiveFailures++;
      totals.cycles++;
      throw error;
    }
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  function schedule(delayMs: number): void {
    if (!running) return;
    pollTimer = setTimeout(() => {
      pollTimer = null;
      inFlight = runCycle();
    }, delayMs);
  }

  async function runCycle(): Promise<void> {
    let delayMs = idlePollIntervalMs;
    try {
      const result = await processBatch();
      if (result.claimed > 0) delayMs = 0;
    } catch (error) {
      log.error({ error, consecutiveFailures }, 'Validation cycle failed');
    }
    inFlight = null;
    schedule(delayMs);
  }

  function start(): void {
    if (running) return;
    running = true;
    log.info({ batchSize, concurrency, idlePollIntervalMs }, 'Validation poller started');
    schedule(0);
  }

  /** Stop scheduling and wait for the cycle in progress to finish */
  async function stop(): Promise<void> {
    running = false;
    if (pollTimer) {
      clearTimeout(pollTimer);
      pollTimer = null;
    }
    if (inFlight) {
      await inFlight;
    }
    log.info('Validation poller stopped');
  }

  function getStatus(): PollerStatus {
    return {
      running,
      lastCycleAt,
      lastResult,
      consecutiveFailures,
      totals: { ...totals },
    };
  }

  return {
    processBatch,
    start,
    stop,
    getStatus,
  };
}
