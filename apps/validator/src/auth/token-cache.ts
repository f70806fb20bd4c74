/**
 * SUNAT OAuth Token Cache
 *
 * Owns the bearer credential used by the validation client. A cached token
 * is reused while it has more than 60 seconds of validity left; otherwise a
 * new one is acquired under the cache's own mutex, re-checking the cache
 * once the lock is held so concurrent callers share a single acquisition.
 *
 * Acquisition walks a fixed search space (client-credentials grant):
 *   endpoint realm (clientessol, clientesextranet)
 *     x credential transmission (Basic header, form body)
 *       x scope (contribuyentes, contribuyente/*, none)
 * and stops at the first HTTP 200.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { AuthError, errorMessage } from '../errors.js';
import { REAL_CLOCK, type Clock } from '../utils/clock.js';
import { Mutex } from '../utils/mutex.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface AccessToken {
  token: string;
  expiresAt: Date;
}

export type CredentialMode = 'basic' | 'body';

export interface TokenCacheConfig {
  clientId: string;
  clientSecret: string;
  /** e.g. https://api-seguridad.sunat.gob.pe/v1 */
  authBaseUrl: string;
  timeoutMs: number;
}

export interface TokenCacheDeps {
  config: TokenCacheConfig;
  logger: Logger;
  clock?: Clock;
}

interface TokenAttempt {
  realm: string;
  mode: CredentialMode;
  scope: string | null;
}

// --------------------------------------------------------------------------
// Constants
// --------------------------------------------------------------------------

export const TOKEN_SAFETY_MARGIN_MS = 60_000;

export const TOKEN_REALMS = ['clientessol', 'clientesextranet'] as const;
export const CREDENTIAL_MODES: readonly CredentialMode[] = ['basic', 'body'];
export const TOKEN_SCOPES: readonly (string | null)[] = [
  'https://api.sunat.gob.pe/v1/contribuyente/contribuyentes',
  'https://api.sunat.gob.pe/v1/contribuyente/*',
  null,
];

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().nonnegative().optional(),
});

// --------------------------------------------------------------------------
// Token Cache
// --------------------------------------------------------------------------

export class TokenCache {
  private readonly log: Logger;
  private readonly config: TokenCacheConfig;
  private readonly clock: Clock;
  private readonly lock = new Mutex();
  private cached: AccessToken | null = null;

  constructor(deps: TokenCacheDeps) {
    this.log = deps.logger.child({ component: 'TokenCache' });
    this.config = deps.config;
    this.clock = deps.clock ?? REAL_CLOCK;
  }

  /**
   * Return a token valid for at least the safety margin, acquiring one if
   * needed. Throws AuthError when no combination yields a token.
   */
  async getToken(): Promise<AccessToken> {
    const cid = this.config.clientId.trim();
    const secret = this.config.clientSecret.trim();
    if (!cid || !secret) {
      throw new AuthError('SUNAT client id or secret is not configured');
    }

    const fresh = this.validCached();
    if (fresh) return fresh;

    return this.lock.runExclusive(async () => {
      // Another caller may have refreshed while we waited for the lock
      const refreshed = this.validCached();
      if (refreshed) return refreshed;

      this.cached = await this.acquire(cid, secret);
      return this.cached;
    });
  }

  /** Currently cached token, without triggering acquisition */
  peek(): AccessToken | null {
    return this.cached;
  }

  invalidate(): void {
    this.cached = null;
  }

  private validCached(): AccessToken | null {
    if (!this.cached) return null;
    const remaining = this.cached.expiresAt.getTime() - this.clock.now();
    return remaining > TOKEN_SAFETY_MARGIN_MS ? this.cached : null;
  }

  private async acquire(cid: string, secret: string): Promise<AccessToken> {
    let lastError: string | null = null;

    for (const realm of TOKEN_REALMS) {
      for (const mode of CREDENTIAL_MODES) {
        for (const scope of TOKEN_SCOPES) {
          const attempt: TokenAttempt = { realm, mode, scope };
          const label = `[${realm} | auth=${mode} | scope=${scope ?? 'none'}]`;

          try {
            const response = await this.requestToken(attempt, cid, secret);
            const text = await response.text();

            if (response.status === 200) {
              const token = this.parseToken(text);
              if (token) {
                this.log.info(
                  { realm, mode, scope: scope ?? 'none', expiresAt: token.expiresAt.toISOString() },
                  'SUNAT token renewed',
                );
                return token;
              }
              lastError = `${label} -> HTTP 200 without a usable access_token`;
            } else {
              lastError = `${label} -> HTTP ${response.status}`;
            }

            this.log.warn(
              { realm, mode, scope: scope ?? 'none', status: response.status },
              'SUNAT token attempt failed',
            );
          } catch (error) {
            lastError = `${label} -> ${errorMessage(error)}`;
            this.log.warn(
              { realm, mode, scope: scope ?? 'none', error },
              'SUNAT token attempt raised',
            );
          }
        }
      }
    }

    throw new AuthError(`Could not obtain SUNAT token. Last error: ${lastError ?? 'none'}`);
  }

  private async requestToken(attempt: TokenAttempt, cid: string, secret: string): Promise<Response> {
    const url = `${this.config.authBaseUrl}/${attempt.realm}/${encodeURIComponent(cid)}/oauth2/token/`;

    const form = new URLSearchParams({ grant_type: 'client_credentials' });
    if (attempt.scope) {
      form.set('scope', attempt.scope);
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': 'application/x-www-form-urlencoded',
    };

    if (attempt.mode === 'basic') {
      headers['Authorization'] = `Basic ${Buffer.from(`${cid}:${secret}`).toString('base64')}`;
    } else {
      form.set('client_id', cid);
      form.set('client_secret', secret);
    }

    return fetch(url, {
      method: 'POST',
      headers,
      body: form.toString(),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
  }

  private parseToken(text: string): AccessToken | null {
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return null;
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) return null;

    const expiresInSeconds = parsed.data.expires_in ?? 0;
    return {
      token: parsed.data.access_token,
      expiresAt: new Date(this.clock.now() + expiresInSeconds * 1000),
    };
  }
}
