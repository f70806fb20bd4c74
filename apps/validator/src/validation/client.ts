/**
 * SUNAT validarcomprobante client
 *
 * - HTTP 200 with a JSON body is a success; the body is the payload
 * - Any other status is a failed outcome carrying { http, ...body }; the
 *   HTTP layer never retries these
 * - Transport failures (network errors, per-attempt timeout, a body that
 *   fails mid-read) are retried up
 *   to retryMax attempts with linear backoff (2s x attempt number), then
 *   surface as a failed outcome carrying { error }
 *
 * validate() never throws: every outcome is recorded by the pipeline.
 */

import type { Logger } from 'pino';
import { ApiError, TransportError, errorMessage } from '../errors.js';
import type { QueueItem, ValidationPayload } from '../types.js';
import { toValidationRequest } from './request.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export type ValidationOutcome =
  | { ok: true; payload: ValidationPayload }
  | { ok: false; payload: ValidationPayload; error: ApiError | TransportError };

export interface ValidationClientConfig {
  /** e.g. https://api.sunat.gob.pe/v1 */
  apiBaseUrl: string;
  /** RUC of the querying taxpayer, part of the URL */
  ruc: string;
  timeoutMs: number;
  retryMax: number;
}

export interface ValidationClientDeps {
  config: ValidationClientConfig;
  logger: Logger;
  /** Backoff sleep; injectable so tests do not wait */
  sleep?: (ms: number) => Promise<void>;
}

// --------------------------------------------------------------------------
// Constants
// --------------------------------------------------------------------------

const BACKOFF_STEP_MS = 2_000;
const RAW_BODY_LIMIT = 1_000;

// --------------------------------------------------------------------------
// Client
// --------------------------------------------------------------------------

export class ValidationClient {
  private readonly log: Logger;
  private readonly config: ValidationClientConfig;
  private readonly sleep: (ms: number) => Promise<void>;
  readonly url: string;

  constructor(deps: ValidationClientDeps) {
    this.log = deps.logger.child({ component: 'ValidationClient' });
    this.config = deps.config;
    this.sleep = deps.sleep ?? sleep;
    this.url = `${this.config.apiBaseUrl}/contribuyente/contribuyentes/${encodeURIComponent(this.config.ruc)}/validarcomprobante`;
  }

  async validate(headers: Record<string, string>, item: QueueItem): Promise<ValidationOutcome> {
    const body = JSON.stringify(toValidationRequest(item));
    const maxAttempts = Math.max(1, this.config.retryMax);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let status: number;
      let text: string;
      try {
        // The timeout signal covers the body read as well as the headers
        const response = await fetch(this.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', ...headers },
          body,
          signal: AbortSignal.timeout(this.config.timeoutMs),
        });
        status = response.status;
        text = await response.text();
      } catch (error) {
        lastError = error;
        if (attempt < maxAttempts) {
          const delayMs = BACKOFF_STEP_MS * attempt;
          this.log.warn(
            { queueId: item.id, attempt, delayMs, error },
            'Validation transport failure, backing off',
          );
          await this.sleep(delayMs);
        }
        continue;
      }

      return this.toOutcome(status, text, item);
    }

    const description = describeTransportError(lastError);
    this.log.warn({ queueId: item.id, attempts: maxAttempts, reason: description }, 'Validation retries exhausted');
    return {
      ok: false,
      payload: { error: description },
      error: new TransportError(description, maxAttempts, { cause: lastError }),
    };
  }

  private toOutcome(status: number, text: string, item: QueueItem): ValidationOutcome {
    const decoded = decodeJsonObject(text);

    if (status === 200 && decoded) {
      return { ok: true, payload: decoded };
    }

    const payload: ValidationPayload = {
      http: status,
      ...(decoded ?? { raw: text.slice(0, RAW_BODY_LIMIT) }),
    };

    this.log.info({ queueId: item.id, status, payload }, 'Validation API returned a failure');
    return {
      ok: false,
      payload,
      error: new ApiError(`Validation API responded with HTTP ${status}`, status),
    };
  }
}

// --------------------------------------------------------------------------
// Helpers
// --------------------------------------------------------------------------

function decodeJsonObject(text: string): ValidationPayload | null {
  try {
    const value: unknown = JSON.parse(text);
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
    return null;
  } catch {
    return null;
  }
}

function describeTransportError(error: unknown): string {
  if (error === null) return 'unknown';
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return `timeout: ${error.message}`;
  }
  if (error instanceof Error && error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return errorMessage(error);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
