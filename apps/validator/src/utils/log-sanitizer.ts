/**
 * Log sanitization utilities
 *
 * Keeps SUNAT credentials and bearer tokens out of the logs while leaving
 * enough of an identifier to correlate entries.
 */

import { createHash } from 'node:crypto';

/**
 * Hash an identifier for logging purposes
 *
 * Preserves the first 4 characters and replaces the rest with a short
 * sha256 digest. Format: "abcd...a1b2c3d4"
 */
export function hashId(id: string | null | undefined): string | null {
  if (!id || typeof id !== 'string') {
    return null;
  }

  const prefix = id.slice(0, 4);
  const hash = createHash('sha256').update(id).digest('hex').slice(0, 8);
  return `${prefix}...${hash}`;
}

export function redact(): string {
  return '[REDACTED]';
}

/**
 * Truncate a string for safe logging (default 100 characters)
 */
export function truncate(value: string | null | undefined, maxLength: number = 100): string | null {
  if (!value || typeof value !== 'string') {
    return null;
  }

  if (value.length <= maxLength) {
    return value;
  }

  return `${value.slice(0, maxLength)}...[truncated]`;
}

const SENSITIVE_PATTERNS: RegExp[] = [
  // Connection strings
  /postgres(?:ql)?:\/\/[^\s]+/gi,
  // Bearer and Basic credentials
  /Bearer\s+[A-Za-z0-9\-._~+/]+=*/gi,
  /Basic\s+[A-Za-z0-9+/]+=*/gi,
  // Form-encoded client secrets
  /client_secret=[^\s&]+/gi,
  /access_token["']?\s*[:=]\s*["']?[^\s"'&,}]+/gi,
];

function sanitizeErrorMessage(message: string): string {
  if (!message) {
    return 'Unknown error';
  }

  let sanitized = message;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }

  return truncate(sanitized, 500) ?? 'Unknown error';
}

/**
 * Sanitize an error for safe logging
 *
 * Keeps name, message, code and HTTP status. The message is scrubbed of
 * connection strings and credentials; stack traces are dropped.
 */
export function sanitizeError(error: unknown): Record<string, unknown> | null {
  if (!error) {
    return null;
  }

  if (error instanceof Error) {
    const sanitized: Record<string, unknown> = {
      name: error.name,
      message: sanitizeErrorMessage(error.message),
    };

    if ('code' in error && typeof error.code === 'string') {
      sanitized['code'] = error.code;
    }

    if ('status' in error && typeof error.status === 'number') {
      sanitized['status'] = error.status;
    }

    if (error.cause instanceof Error) {
      sanitized['cause'] = sanitizeErrorMessage(error.cause.message);
    }

    return sanitized;
  }

  if (typeof error === 'string') {
    return { message: sanitizeErrorMessage(error) };
  }

  return { type: typeof error };
}

/**
 * Pino serializers keyed by log field name
 */
export const logSerializers = {
  clientId: (id: string | null | undefined): string | null => hashId(id),

  token: (): string => redact(),
  accessToken: (): string => redact(),
  clientSecret: (): string => redact(),
  secret: (): string => redact(),
  password: (): string => redact(),
  authorization: (): string => redact(),

  error: (err: unknown): Record<string, unknown> | null => sanitizeError(err),
  err: (err: unknown): Record<string, unknown> | null => sanitizeError(err),

  payload: (p: unknown): unknown => {
    if (typeof p === 'string') {
      return truncate(p, 200);
    }
    if (p && typeof p === 'object') {
      return truncate(JSON.stringify(p), 200);
    }
    return p;
  },
};
