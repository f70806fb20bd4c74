/**
 * Queue Status Updater: the only writer of the terminal states.
 */

import type { StoreSession } from '../data/store.js';

/** Byte budget for sunat_queue.last_error */
export const LAST_ERROR_MAX_BYTES = 3900;

/**
 * Cut a string to at most `maxBytes` of UTF-8 without splitting a character
 */
export function truncateUtf8(value: string, maxBytes: number): string {
  const bytes = Buffer.from(value, 'utf8');
  if (bytes.length <= maxBytes) return value;

  let end = maxBytes;
  // Step back over continuation bytes (10xxxxxx) to a character boundary
  while (end > 0 && ((bytes[end] ?? 0) & 0xc0) === 0x80) {
    end--;
  }
  return bytes.subarray(0, end).toString('utf8');
}

/**
 * Text form of whatever caused the failure, capped at the byte budget
 */
export function formatErrorInfo(errorInfo: unknown): string {
  let text: string;
  if (typeof errorInfo === 'string') {
    text = errorInfo;
  } else if (errorInfo instanceof Error) {
    text = `${errorInfo.name}: ${errorInfo.message}`;
  } else {
    text = JSON.stringify(errorInfo) ?? String(errorInfo);
  }
  return truncateUtf8(text, LAST_ERROR_MAX_BYTES);
}

export async function markDone(session: StoreSession, queueId: string): Promise<void> {
  await session.markQueueDone(queueId);
}

export async function markError(session: StoreSession, queueId: string, errorInfo: unknown): Promise<void> {
  await session.markQueueError(queueId, formatErrorInfo(errorInfo));
}
