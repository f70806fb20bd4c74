import type { QueueItem } from '../types.js';

/**
 * Wire body of POST .../validarcomprobante
 */
export interface ValidationRequest {
  numRuc: string;
  codComp: string;
  numeroSerie: string;
  numero: string;
  /** DD/MM/YYYY */
  fechaEmision: string | null;
  /** Two-decimal text, e.g. "150.50" */
  monto: string;
}

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Render an amount with exactly two decimals, rounding half away from zero.
 * Works on the decimal digits, never on binary floats, so "2.675" gives
 * "2.68". Null or empty gives "0.00".
 */
export function formatAmount(amount: string | number | null | undefined): string {
  if (amount === null || amount === undefined) return '0.00';

  let text: string;
  if (typeof amount === 'number') {
    if (!Number.isFinite(amount)) {
      throw new RangeError(`Amount is not finite: ${amount}`);
    }
    text = String(amount);
    if (/e/i.test(text)) {
      text = amount.toFixed(12);
    }
  } else {
    text = amount.trim();
  }
  if (text === '') return '0.00';

  const match = DECIMAL_PATTERN.exec(text);
  if (!match || (match[2] === '' && (match[3] ?? '') === '')) {
    throw new RangeError(`Amount is not a decimal number: ${text}`);
  }

  const negative = match[1] === '-';
  const integerDigits = match[2] || '0';
  const fraction = match[3] ?? '';

  // Scale to hundredths, then round on the third decimal digit
  let cents = BigInt(integerDigits + fraction.padEnd(2, '0').slice(0, 2));
  const roundingDigit = fraction.length > 2 ? Number(fraction[2]) : 0;
  if (roundingDigit >= 5) {
    cents += 1n;
  }

  const digits = cents.toString().padStart(3, '0');
  const rendered = `${digits.slice(0, -2)}.${digits.slice(-2)}`;
  return negative && cents !== 0n ? `-${rendered}` : rendered;
}

/**
 * Render an issue date as DD/MM/YYYY. Accepts a YYYY-MM-DD string (pg DATE
 * text) or a Date, read in UTC.
 */
export function formatIssueDate(date: string | Date | null | undefined): string | null {
  if (date === null || date === undefined) return null;

  if (date instanceof Date) {
    if (Number.isNaN(date.getTime())) {
      throw new RangeError('Issue date is an invalid Date');
    }
    const day = String(date.getUTCDate()).padStart(2, '0');
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    return `${day}/${month}/${date.getUTCFullYear()}`;
  }

  const match = ISO_DATE_PATTERN.exec(date.trim());
  if (!match) {
    throw new RangeError(`Issue date is not YYYY-MM-DD: ${date}`);
  }
  const [, year, month, day] = match;
  return `${day}/${month}/${year}`;
}

/**
 * Serialize a claimed queue item into the validation API's request shape
 */
export function toValidationRequest(item: QueueItem): ValidationRequest {
  return {
    numRuc: item.issuerRuc,
    codComp: item.documentType,
    numeroSerie: item.series,
    numero: item.number,
    fechaEmision: formatIssueDate(item.issueDate),
    monto: formatAmount(item.totalAmount),
  };
}
