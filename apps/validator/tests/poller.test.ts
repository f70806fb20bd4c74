import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TokenCache } from '../src/auth/token-cache.js';
import { ApiError, AuthError } from '../src/errors.js';
import { createValidationPoller, type TokenSource, type Validator } from '../src/poller.js';
import type { Clock } from '../src/utils/clock.js';
import { ValidationClient, type ValidationOutcome } from '../src/validation/client.js';
import { InMemoryValidationStore } from './helpers/in-memory-store.js';
import { jsonResponse, makeQueueItem, silentLogger } from './helpers/fixtures.js';

const NOW = Date.UTC(2024, 0, 15, 10, 30, 0);
const clock: Clock = { now: () => NOW };

const TOKEN: TokenSource = {
  getToken: async () => ({ token: 'test-token', expiresAt: new Date(NOW + 3_600_000) }),
};

function authorizedValidator(): Validator {
  return {
    validate: async () => ({ ok: true, payload: { success: true, data: { estadoCp: '3' } } }),
  };
}

describe('ValidationPoller', () => {
  let store: InMemoryValidationStore;

  beforeEach(() => {
    store = new InMemoryValidationStore();
  });

  describe('processBatch', () => {
    it('validates, records and syncs an authorized invoice end to end', async () => {
      const fetchMock = vi.fn<typeof fetch>(async (input) =>
        String(input).includes('/oauth2/token/')
          ? jsonResponse({ access_token: 'test-token', expires_in: 3600 })
          : jsonResponse({ success: true, message: 'Operation Success! ', data: { estadoCp: 3 } }),
      );
      vi.stubGlobal('fetch', fetchMock);

      try {
        store.enqueue(makeQueueItem());
        store.addFinalRecord('100');

        const tokenCache = new TokenCache({
          config: {
            clientId: 'test-client',
            clientSecret: 'test-secret',
            authBaseUrl: 'https://auth.test/v1',
            timeoutMs: 5000,
          },
          logger: silentLogger,
          clock,
        });
        const client = new ValidationClient({
          config: { apiBaseUrl: 'https://api.test/v1', ruc: '20100000001', timeoutMs: 5000, retryMax: 3 },
          logger: silentLogger,
        });
        const poller = createValidationPoller({ store, tokenCache, client, logger: silentLogger, clock });

        const result = await poller.processBatch();

        expect(result).toEqual({ claimed: 1, succeeded: 1, failed: 0, finalUpdated: 1 });
        expect(store.queueItem('1')).toMatchObject({ status: 'done', attempts: 1, lastError: null });

        expect(store.state.validations).toHaveLength(1);
        expect(store.state.validations[0]).toMatchObject({
          invoiceId: '100',
          statusText: 'AUTORIZADO',
          statusCode: '3',
          message: 'Operation Success! ',
          tokenExpiresAt: new Date(NOW + 3_600_000),
        });

        expect(store.state.snapshots.get('100')).toMatchObject({
          currentStatus: 'AUTORIZADO',
          statusDescription: 'AUTORIZADO (3)',
          responseCode: '3',
          statusChanged: true,
          firstQueriedAt: new Date(NOW),
        });

        expect(store.state.finals.get('100')).toMatchObject({
          lastStatus: 'AUTORIZADO',
          statusDescription: 'AUTORIZADO (3)',
          responseCode: '3',
          statusChanged: true,
          firstQueriedAt: new Date(NOW),
          lastQueriedAt: new Date(NOW),
          changedAt: new Date(NOW),
        });

        const apiCall = fetchMock.mock.calls.find(([input]) => String(input).includes('validarcomprobante'));
        expect(new Headers(apiCall?.[1]?.headers).get('Authorization')).toBe('Bearer test-token');

        // Nothing left to claim; nothing left to sync
        expect(await poller.processBatch()).toEqual({ claimed: 0, succeeded: 0, failed: 0, finalUpdated: 0 });
        expect(await store.syncFinalRecords()).toBe(0);
      } finally {
        vi.unstubAllGlobals();
      }
    });

    it('records an API failure and marks the item as error', async () => {
      store.enqueue(makeQueueItem());
      const client: Validator = {
        validate: async (): Promise<ValidationOutcome> => ({
          ok: false,
          payload: { http: 500, message: 'boom' },
          error: new ApiError('Validation API responded with HTTP 500', 500),
        }),
      };
      const poller = createValidationPoller({ store, tokenCache: TOKEN, client, logger: silentLogger, clock });

      const result = await poller.processBatch();

      expect(result).toEqual({ claimed: 1, succeeded: 0, failed: 1, finalUpdated: 0 });
      expect(store.queueItem('1')).toMatchObject({ status: 'error', lastError: '{"http":500,"message":"boom"}' });
      expect(store.state.validations).toHaveLength(1);
      expect(store.state.validations[0]).toMatchObject({ statusText: null, statusCode: null, message: 'boom' });
      expect(store.state.snapshots.get('100')).toMatchObject({ currentStatus: null, statusChanged: false });
    });

    it('records exhausted transport retries with the timeout detail', async () => {
      const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
      const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(timeout);
      vi.stubGlobal('fetch', fetchMock);

      try {
        store.enqueue(makeQueueItem());
        const sleep = vi.fn(async (_ms: number) => undefined);
        const client = new ValidationClient({
          config: { apiBaseUrl: 'https://api.test/v1', ruc: '20100000001', timeoutMs: 5000, retryMax: 3 },
          logger: silentLogger,
          sleep,
        });
        const poller = createValidationPoller({ store, tokenCache: TOKEN, client, logger: silentLogger, clock });

        const result = await poller.processBatch();

        expect(result).toMatchObject({ claimed: 1, succeeded: 0, failed: 1 });
        expect(fetchMock).toHaveBeenCalledTimes(3);
        expect(store.queueItem('1')).toMatchObject({
          status: 'error',
          lastError: '{"error":"timeout: The operation was aborted due to timeout"}',
        });
        expect(store.state.validations[0]).toMatchObject({ statusCode: null, statusText: null });
      } finally {
        vi.unstubAllGlobals();
      }
    });

    it('records a rejected validation task as a failure', async () => {
      store.enqueue(makeQueueItem());
      const client: Validator = {
        validate: async () => {
          throw new Error('unexpected');
        },
      };
      const poller = createValidationPoller({ store, tokenCache: TOKEN, client, logger: silentLogger, clock });

      await poller.processBatch();

      expect(store.queueItem('1')).toMatchObject({ status: 'error', lastError: '{"error":"unexpected"}' });
    });

    it('claims nothing when no token can be obtained', async () => {
      store.enqueue(makeQueueItem());
      const tokenCache: TokenSource = {
        getToken: async () => {
          throw new AuthError('Could not obtain SUNAT token. Last error: none');
        },
      };
      const validate = vi.fn(authorizedValidator().validate);
      const poller = createValidationPoller({
        store,
        tokenCache,
        client: { validate },
        logger: silentLogger,
        clock,
      });

      await expect(poller.processBatch()).rejects.toBeInstanceOf(AuthError);

      expect(store.queueItem('1')).toMatchObject({ status: 'queued', attempts: 0 });
      expect(validate).not.toHaveBeenCalled();
      expect(poller.getStatus().consecutiveFailures).toBe(1);
    });

    it('isolates a persistence failure to its item', async () => {
      store.enqueue(makeQueueItem({ id: '1', invoiceId: '100' }));
      store.enqueue(makeQueueItem({ id: '2', invoiceId: '200', enqueuedAt: new Date('2024-01-15T10:00:01.000Z') }));
      store.failure = (operation, key) =>
        operation === 'insertSnapshot' && key === '100' ? new Error('disk full') : null;
      const poller = createValidationPoller({
        store,
        tokenCache: TOKEN,
        client: authorizedValidator(),
        logger: silentLogger,
        clock,
      });

      const result = await poller.processBatch();

      expect(result).toMatchObject({ claimed: 2, succeeded: 1, failed: 1 });
      expect(store.queueItem('1')).toMatchObject({
        status: 'error',
        lastError: 'PersistenceError: Persisting queue item 1 failed: disk full',
      });
      expect(store.queueItem('2')?.status).toBe('done');
      // The failed item's history row was rolled back with its transaction
      expect(store.state.validations.map((v) => v.invoiceId)).toEqual(['200']);
      expect(store.state.snapshots.has('100')).toBe(false);
    });

    it('leaves the item processing when the fallback write also fails', async () => {
      store.enqueue(makeQueueItem());
      store.failure = (operation) =>
        operation === 'markQueueDone' || operation === 'markQueueError' ? new Error('connection lost') : null;
      const poller = createValidationPoller({
        store,
        tokenCache: TOKEN,
        client: authorizedValidator(),
        logger: silentLogger,
        clock,
      });

      const result = await poller.processBatch();

      expect(result).toMatchObject({ claimed: 1, succeeded: 0, failed: 1 });
      expect(store.queueItem('1')?.status).toBe('processing');
    });

    it('keeps the batch result when the final sync fails', async () => {
      store.enqueue(makeQueueItem());
      store.syncFailure = new Error('deadlock detected');
      const poller = createValidationPoller({
        store,
        tokenCache: TOKEN,
        client: authorizedValidator(),
        logger: silentLogger,
        clock,
      });

      const result = await poller.processBatch();

      expect(result).toEqual({ claimed: 1, succeeded: 1, failed: 0, finalUpdated: null });
      expect(store.queueItem('1')?.status).toBe('done');
      expect(poller.getStatus().consecutiveFailures).toBe(0);
    });

    it('serializes writes while validations run concurrently', async () => {
      for (let i = 1; i <= 8; i++) {
        store.enqueue(
          makeQueueItem({
            id: String(i),
            invoiceId: String(100 + i),
            enqueuedAt: new Date(Date.UTC(2024, 0, 15, 10, 0, i)),
          }),
        );
      }
      let active = 0;
      let peak = 0;
      const client: Validator = {
        validate: async () => {
          active++;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          active--;
          return { ok: true, payload: { data: { estadoCp: '1' } } };
        },
      };
      const poller = createValidationPoller(
        { store, tokenCache: TOKEN, client, logger: silentLogger, clock },
        { concurrency: 4 },
      );

      const result = await poller.processBatch();

      expect(result).toMatchObject({ claimed: 8, succeeded: 8 });
      expect(peak).toBe(4);
      expect(store.maxOpenSessions).toBe(1);
      expect(store.state.validations).toHaveLength(8);
    });

    it('leaves no claimed item in processing after a mixed batch', async () => {
      for (let i = 1; i <= 6; i++) {
        store.enqueue(
          makeQueueItem({
            id: String(i),
            invoiceId: String(100 + i),
            enqueuedAt: new Date(Date.UTC(2024, 0, 15, 10, 0, i)),
          }),
        );
      }
      const client: Validator = {
        validate: async (_headers, item): Promise<ValidationOutcome> =>
          Number(item.id) % 2 === 0
            ? { ok: true, payload: { data: { estadoCp: '1' } } }
            : {
                ok: false,
                payload: { http: 404 },
                error: new ApiError('Validation API responded with HTTP 404', 404),
              },
      };
      const poller = createValidationPoller({ store, tokenCache: TOKEN, client, logger: silentLogger, clock });

      const result = await poller.processBatch();

      expect(result).toMatchObject({ claimed: 6, succeeded: 3, failed: 3 });
      expect([...store.state.queue.values()].map((item) => item.status)).toEqual([
        'error', 'done', 'error', 'done', 'error', 'done',
      ]);
    });

    it('respects the batch size', async () => {
      for (let i = 1; i <= 3; i++) {
        store.enqueue(makeQueueItem({ id: String(i), enqueuedAt: new Date(Date.UTC(2024, 0, 15, 10, 0, i)) }));
      }
      const poller = createValidationPoller(
        { store, tokenCache: TOKEN, client: authorizedValidator(), logger: silentLogger, clock },
        { batchSize: 2 },
      );

      expect((await poller.processBatch()).claimed).toBe(2);
      expect(store.queueItem('3')?.status).toBe('queued');
    });

    it('tracks totals across cycles', async () => {
      store.enqueue(makeQueueItem());
      const poller = createValidationPoller({
        store,
        tokenCache: TOKEN,
        client: authorizedValidator(),
        logger: silentLogger,
        clock,
      });

      await poller.processBatch();
      await poller.processBatch();

      expect(poller.getStatus()).toEqual({
        running: false,
        lastCycleAt: NOW,
        lastResult: { claimed: 0, succeeded: 0, failed: 0, finalUpdated: 0 },
        consecutiveFailures: 0,
        totals: { cycles: 2, claimed: 1, succeeded: 1, failed: 0 },
      });
    });
  });

  describe('lifecycle', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('drains the queue back to back, then waits the idle interval', async () => {
      vi.useFakeTimers();
      for (let i = 1; i <= 3; i++) {
        store.enqueue(makeQueueItem({ id: String(i), enqueuedAt: new Date(Date.UTC(2024, 0, 15, 10, 0, i)) }));
      }
      const claimSpy = vi.spyOn(store, 'claimQueued');
      const poller = createValidationPoller(
        { store, tokenCache: TOKEN, client: authorizedValidator(), logger: silentLogger, clock },
        { batchSize: 2, idlePollIntervalMs: 5000 },
      );

      poller.start();
      await vi.advanceTimersByTimeAsync(10);

      // Two batches with work, then one empty claim
      expect(claimSpy).toHaveBeenCalledTimes(3);
      expect(store.queueItem('3')?.status).toBe('done');

      await vi.advanceTimersByTimeAsync(4980);
      expect(claimSpy).toHaveBeenCalledTimes(3);

      await vi.advanceTimersByTimeAsync(20);
      expect(claimSpy).toHaveBeenCalledTimes(4);

      await poller.stop();
      expect(poller.getStatus().running).toBe(false);
    });

    it('backs off after a failed cycle', async () => {
      vi.useFakeTimers();
      const getToken = vi.fn(async () => {
        throw new AuthError('Could not obtain SUNAT token. Last error: none');
      });
      const poller = createValidationPoller(
        { store, tokenCache: { getToken }, client: authorizedValidator(), logger: silentLogger, clock },
        { idlePollIntervalMs: 1000 },
      );

      poller.start();
      await vi.advanceTimersByTimeAsync(1);
      expect(getToken).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1000);
      expect(getToken).toHaveBeenCalledTimes(2);
      expect(poller.getStatus().consecutiveFailures).toBe(2);

      await poller.stop();
      await vi.advanceTimersByTimeAsync(5000);
      expect(getToken).toHaveBeenCalledTimes(2);
    });

    it('waits for the cycle in progress when stopped', async () => {
      store.enqueue(makeQueueItem());
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      let validated = false;
      const client: Validator = {
        validate: async () => {
          await gate;
          validated = true;
          return { ok: true, payload: { data: { estadoCp: '1' } } };
        },
      };
      const poller = createValidationPoller({ store, tokenCache: TOKEN, client, logger: silentLogger, clock });

      poller.start();
      await vi.waitFor(() => expect(store.queueItem('1')?.status).toBe('processing'));

      const stopped = poller.stop();
      release();
      await stopped;

      expect(validated).toBe(true);
      expect(store.queueItem('1')?.status).toBe('done');
    });
  });
});
