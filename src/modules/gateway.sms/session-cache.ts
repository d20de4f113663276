// ---------------------------------------------------------------------------
// Mail2SMS — Session Cache
// ---------------------------------------------------------------------------
// Holds the provider session credential shared by all transactions.
//
//   - a credential is reused until it is older than the TTL or invalidated
//   - concurrent misses share one login call (single-flight)
//   - once invalidated, a credential is never handed out again
//
// Lives in memory only; a restart logs in again lazily.
// ---------------------------------------------------------------------------

import { ILogger } from '../../core/types/module';
import { AuthError, toError } from '../../shared/errors';
import { ISmsApiClient, SessionCredential } from './types';

export interface SessionCacheOptions {
  username: string;
  password: string;
  /** Maximum age of a credential before it is re-acquired. */
  ttlMs: number;
  /** Clock, in epoch ms. Overridden in tests. */
  now?: () => number;
}

interface CachedSession {
  credential: SessionCredential;
  expiresAt: number;
}

export class SessionCache {
  private current: CachedSession | null = null;
  private pending: Promise<SessionCredential> | null = null;
  private readonly now: () => number;
  private loginCount = 0;

  constructor(
    private readonly client: ISmsApiClient,
    private readonly options: SessionCacheOptions,
    private readonly logger: ILogger,
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Return a usable credential, logging in if none is cached.
   *
   * @throws AuthError when the login fails. Every caller waiting on that
   *         login receives the same error.
   */
  acquire(): Promise<SessionCredential> {
    const cached = this.current;
    if (cached) {
      if (this.now() < cached.expiresAt) {
        return Promise.resolve(cached.credential);
      }
      this.logger.debug('Session credential expired', { ttlMs: this.options.ttlMs });
      this.current = null;
    }

    if (!this.pending) {
      this.pending = this.login().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * Drop the cached credential so the next `acquire()` logs in again.
   *
   * With `stale`, only drops it if it is still the cached one: a request
   * that failed with an old credential must not evict a newer one.
   *
   * @returns Whether a credential was dropped.
   */
  invalidate(stale?: SessionCredential): boolean {
    const cached = this.current;
    if (!cached) return false;
    if (stale && !sameSession(cached.credential, stale)) return false;

    this.current = null;
    this.logger.info('Session credential invalidated');
    return true;
  }

  hasCredential(): boolean {
    return this.current !== null && this.now() < this.current.expiresAt;
  }

  /** Number of login calls issued so far. */
  getLoginCount(): number {
    return this.loginCount;
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private async login(): Promise<SessionCredential> {
    this.loginCount++;
    this.logger.debug('Logging in to SMS provider');

    let credential: SessionCredential;
    try {
      credential = await this.client.login(this.options.username, this.options.password);
    } catch (err) {
      const error = err instanceof AuthError
        ? err
        : new AuthError('Unreachable', `Login failed: ${toError(err).message}`, undefined, toError(err));
      this.logger.warn('SMS provider login failed', { kind: error.kind, status: error.status });
      throw error;
    }

    this.current = { credential, expiresAt: this.now() + this.options.ttlMs };
    this.logger.info('SMS provider session established');
    return credential;
  }
}

function sameSession(a: SessionCredential, b: SessionCredential): boolean {
  return a.userKey === b.userKey && a.sessionKey === b.sessionKey;
}
