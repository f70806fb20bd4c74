/**
 * History Recorder
 *
 * Appends exactly one sunat_validation row per processed item, whether the
 * API call succeeded or not. Failure payloads usually map to a null status.
 */

import type { StoreSession } from '../data/store.js';
import type { QueueItem, RecordedStatus, ValidationPayload, ValidationRecord } from '../types.js';
import { mapStatus } from './status-mapper.js';

const MESSAGE_KEYS = ['message', 'mensaje', 'observacion'] as const;

/**
 * First non-empty string among message / mensaje / observacion
 */
export function extractMessage(payload: ValidationPayload): string | null {
  for (const key of MESSAGE_KEYS) {
    const value = payload[key];
    if (typeof value === 'string' && value.trim() !== '') {
      return value;
    }
  }
  return null;
}

export async function recordHistory(
  session: StoreSession,
  item: QueueItem,
  credentialExpiry: Date | null,
  payload: ValidationPayload,
): Promise<RecordedStatus> {
  const mapped = mapStatus(payload);
  const message = extractMessage(payload);

  const record: ValidationRecord = {
    invoiceId: item.invoiceId,
    issuerRuc: item.issuerRuc,
    receiverRuc: item.receiverRuc,
    documentType: item.documentType,
    series: item.series,
    number: item.number,
    issueDate: item.issueDate,
    totalAmount: item.totalAmount,
    statusText: mapped.statusText,
    statusCode: mapped.statusCode,
    message,
    tokenExpiresAt: credentialExpiry,
    rawPayload: payload,
  };

  await session.insertValidation(record);

  return { ...mapped, message };
}
