import pino, { type Logger } from 'pino';
import type { QueueItem } from '../../src/types.js';
import { logSerializers } from '../../src/utils/log-sanitizer.js';

export const silentLogger: Logger = pino({ level: 'silent' });

export function makeQueueItem(overrides: Partial<QueueItem> = {}): QueueItem {
  return {
    id: '1',
    invoiceId: '100',
    issuerRuc: '20123456789',
    receiverRuc: '20999999999',
    documentType: '01',
    series: 'F001',
    number: '123',
    issueDate: '2024-01-15',
    totalAmount: 150.5,
    status: 'queued',
    attempts: 0,
    lastError: null,
    enqueuedAt: new Date('2024-01-15T10:00:00.000Z'),
    ...overrides,
  };
}

/**
 * Logger that keeps every emitted line as a parsed object
 */
export function createCapturingLogger(): { logger: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    {
      level: 'trace',
      serializers: { ...pino.stdSerializers, ...logSerializers },
    },
    {
      write(chunk: string): void {
        const parsed: unknown = JSON.parse(chunk);
        if (typeof parsed === 'object' && parsed !== null) {
          lines.push(Object.fromEntries(Object.entries(parsed)));
        }
      },
    },
  );
  return { logger, lines };
}

/** JSON response helper for fetch mocks */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
