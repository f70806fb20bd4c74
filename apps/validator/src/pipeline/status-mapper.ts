/**
 * Status Mapper
 *
 * Translates the validation API's `data.estadoCp` into the canonical
 * (status text, description, code) triple. Total over every input: known
 * codes come from the catalogue, any other code gets a synthetic CODE_<n>
 * entry, and a missing code maps to all-null.
 */

import type { MappedStatus, ValidationPayload } from '../types.js';

export const STATUS_CATALOG = {
  '0': 'NO EXISTE',
  '1': 'ACEPTADO',
  '2': 'ANULADO',
  '3': 'AUTORIZADO',
  '4': 'NO AUTORIZADO',
} as const;

export type CatalogCode = keyof typeof STATUS_CATALOG;

const NULL_STATUS: MappedStatus = {
  statusText: null,
  statusDescription: null,
  statusCode: null,
};

function isCatalogCode(code: string): code is CatalogCode {
  return Object.prototype.hasOwnProperty.call(STATUS_CATALOG, code);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalise an estadoCp value to its code text.
 * Integer-like input ("03", " 3 ", 3, 3.0) becomes "3"; other non-empty
 * text is kept trimmed; empty, null and structured values become null.
 */
export function normalizeStatusCode(value: unknown): string | null {
  if (value === null || value === undefined) return null;

  if (typeof value === 'number') {
    return Number.isFinite(value) ? BigInt(Math.trunc(value)).toString() : null;
  }

  if (typeof value === 'boolean') {
    return value ? '1' : '0';
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    if (/^[+-]?\d+$/.test(trimmed)) {
      return BigInt(trimmed).toString();
    }
    return trimmed;
  }

  return null;
}

export function mapStatus(payload: ValidationPayload | null | undefined): MappedStatus {
  const data = payload?.['data'];
  if (!isRecord(data)) return NULL_STATUS;

  const code = normalizeStatusCode(data['estadoCp']);
  if (code === null) return NULL_STATUS;

  if (isCatalogCode(code)) {
    const name = STATUS_CATALOG[code];
    return {
      statusText: name,
      statusDescription: `${name} (${code})`,
      statusCode: code,
    };
  }

  return {
    statusText: `CODE_${code}`,
    statusDescription: `NO_MAPEADO (${code})`,
    statusCode: code,
  };
}
