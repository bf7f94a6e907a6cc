/**
 * @clusterops/sdk — Session/Credential Manager
 *
 * Sole source of the credential sent with every request.
 *
 * API tokens are returned as they are. Session credentials are exchanged for
 * a short-lived token which is refreshed once it is near expiry; however many
 * callers ask at once, only one login is in flight and they all share it.
 */
import type { Logger } from '@clusterops/core';
import {
  createLogger,
  DEFAULT_EXPIRY_BUFFER_SECS,
  DEFAULT_SESSION_TTL_SECS,
  getErrorMessage,
  METRIC_SESSION_REFRESH_FAILURES,
  METRIC_SESSION_REFRESHES,
} from '@clusterops/core';
import { TokenRefreshError } from './errors.js';
import { MetricsCollector } from './metrics.js';

export interface SessionCredentials {
  kind: 'session';
  username: string;
  password: string;
}

export type AuthStrategy = { kind: 'api-token'; token: string } | SessionCredentials;

/** Exchanges username/password for a session token. */
export type LoginFn = (username: string, password: string) => Promise<string>;

export interface SessionManagerOptions {
  /** Lifetime of a session token in seconds (default: 3600) */
  ttlSeconds?: number;
  /** Refresh this many seconds before the token would expire (default: 60) */
  expiryBufferSeconds?: number;
  metrics?: MetricsCollector;
  logger?: Logger;
  now?: () => number;
}

export class SessionManager {
  private token: string | null = null;
  private issuedAt = 0;
  private inFlight: Promise<string> | null = null;

  private readonly ttlMs: number;
  private readonly bufferMs: number;
  private readonly metrics: MetricsCollector;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(
    private readonly strategy: AuthStrategy,
    private readonly login: LoginFn,
    options: SessionManagerOptions = {},
  ) {
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_SESSION_TTL_SECS) * 1_000;
    this.bufferMs = (options.expiryBufferSeconds ?? DEFAULT_EXPIRY_BUFFER_SECS) * 1_000;
    this.metrics = options.metrics ?? MetricsCollector.disabled();
    this.log = options.logger ?? createLogger('clusterops:session');
    this.now = options.now ?? Date.now;
  }

  get isApiToken(): boolean {
    return this.strategy.kind === 'api-token';
  }

  /**
   * Current credential, refreshing the session first when needed.
   *
   * @throws TokenRefreshError when the login fails; every concurrent waiter gets it
   */
  async getCredential(): Promise<string> {
    const strategy = this.strategy;
    if (strategy.kind === 'api-token') return strategy.token;

    if (this.token !== null && !this.isNearExpiry()) return this.token;
    return this.refresh(strategy);
  }

  /** True when there is no session token or it is within the expiry buffer. */
  isNearExpiry(): boolean {
    if (this.token === null) return true;
    return this.now() - this.issuedAt >= this.ttlMs - this.bufferMs;
  }

  /**
   * Forget `token` after the server rejected it. A token that has already
   * been replaced by a newer refresh is left alone.
   */
  invalidate(token: string): void {
    if (this.strategy.kind === 'api-token') return;
    if (this.token === token) {
      this.token = null;
      this.log.debug('Session token invalidated');
    }
  }

  clear(): void {
    this.token = null;
    this.issuedAt = 0;
  }

  private refresh(credentials: SessionCredentials): Promise<string> {
    if (this.inFlight) return this.inFlight;

    const { username, password } = credentials;
    this.metrics.increment(METRIC_SESSION_REFRESHES);
    this.inFlight = Promise.resolve()
      .then(() => this.login(username, password))
      .then(
        (token) => {
          this.token = token;
          this.issuedAt = this.now();
          this.log.info('Session established', { username });
          return token;
        },
        (err: unknown) => {
          this.token = null;
          this.metrics.increment(METRIC_SESSION_REFRESH_FAILURES);
          this.log.warn('Session refresh failed', { username, error: getErrorMessage(err) });
          throw new TokenRefreshError(username, err);
        },
      )
      .finally(() => {
        this.inFlight = null;
      });
    return this.inFlight;
  }
}
