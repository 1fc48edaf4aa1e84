import { AuthFailure, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Credential, TokenState, TokenStatus } from '../types.js';
import type { CredentialSource } from './credential-source.js';
import type { RequestLogger } from './request-logger.js';
import { TokenStore } from './token-store.js';

export const TOKEN_ENV_VAR = 'CUSTOM_LLM_API_KEY';
export const DEFAULT_SAFETY_MARGIN_MS = 60_000;
const MAX_INTERVAL_MS = 2_147_483_647;

export type RefreshReason = 'on_demand' | 'background' | 'manual' | 'startup';

export interface TokenManagerOptions {
  source: CredentialSource;
  events: RequestLogger;
  logger: Logger;
  store?: TokenStore;
  safetyMarginMs?: number;
  now?: () => number;
  /** Called with every newly fetched credential */
  publish?: (credential: Credential) => void;
}

/**
 * Expose the current token to child processes started from this one
 */
export function publishTokenEnvironment(credential: Credential): void {
  process.env[TOKEN_ENV_VAR] = credential.token;
}

/**
 * Owns the cached OAuth credential.
 *
 * `getToken()` serves the cached credential until it is within the safety
 * margin of expiry, then fetches a new one. At most one fetch runs at a time;
 * callers arriving while it is pending share its result or its failure.
 * A background timer can additionally refresh on a fixed interval.
 */
export class TokenManager {
  private readonly source: CredentialSource;
  private readonly events: RequestLogger;
  private readonly logger: Logger;
  private readonly store: TokenStore;
  private readonly safetyMarginMs: number;
  private readonly now: () => number;
  private readonly publish?: (credential: Credential) => void;

  private inFlight?: Promise<Credential>;
  private refreshTimer: NodeJS.Timeout | null = null;
  private refreshCount = 0;
  private lastRefreshAt: Date | null = null;
  private lastError: string | null = null;

  constructor(options: TokenManagerOptions) {
    this.source = options.source;
    this.events = options.events;
    this.logger = options.logger.child({ component: 'token-manager' });
    this.store = options.store ?? new TokenStore();
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_SAFETY_MARGIN_MS;
    this.now = options.now ?? (() => Date.now());
    this.publish = options.publish;
  }

  get mockMode(): boolean {
    return this.source.kind === 'mock';
  }

  /**
   * Return a credential that is valid for at least the safety margin,
   * fetching a new one when the cache cannot provide it
   * @throws {AuthFailure} when the fetch fails
   */
  async getToken(): Promise<Credential> {
    const cached = this.store.get();
    if (cached && this.store.isUsable(this.now(), this.safetyMarginMs)) {
      return cached;
    }

    const credential = await this.refresh('on_demand');
    if (credential.expiresAt.getTime() <= this.now()) {
      throw new AuthFailure('OAuth token expired before it could be used', 'invalid_response');
    }
    return credential;
  }

  /**
   * Fetch a new credential regardless of the cached one. Joins the pending
   * fetch when there is one.
   */
  refresh(reason: RefreshReason = 'manual'): Promise<Credential> {
    if (!this.inFlight) {
      this.inFlight = this.fetchAndStore(reason).finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  startBackgroundRefresh(intervalMs: number, signal?: AbortSignal): void {
    if (this.refreshTimer) {
      this.logger.debug('Background token refresh already running');
      return;
    }
    if (signal?.aborted) {
      return;
    }
    if (!Number.isFinite(intervalMs) || intervalMs <= 0 || intervalMs > MAX_INTERVAL_MS) {
      throw new RangeError(
        `Refresh interval must be between 1 and ${MAX_INTERVAL_MS} ms, got ${intervalMs}`,
      );
    }

    this.refreshTimer = setInterval(() => {
      void this.backgroundCycle();
    }, intervalMs);
    signal?.addEventListener('abort', () => this.stopBackgroundRefresh(), { once: true });

    const seconds = Math.round(intervalMs / 1000);
    this.logger.info({ intervalMs }, 'Background token refresh started');
    this.events.append('info', 'Token refresh enabled', `Interval: ${seconds}s`);
  }

  stopBackgroundRefresh(): void {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
      this.logger.info('Background token refresh stopped');
    }
  }

  get backgroundRefreshRunning(): boolean {
    return this.refreshTimer !== null;
  }

  getStatus(): TokenStatus {
    const credential = this.store.get();
    return {
      state: this.computeState(credential),
      refreshCount: this.refreshCount,
      lastRefreshAt: this.lastRefreshAt,
      expiresAt: credential ? credential.expiresAt : null,
      lastError: this.lastError,
    };
  }

  private computeState(credential: Credential | null): TokenState {
    if (!credential) {
      return 'not_initialized';
    }
    if (this.mockMode) {
      return 'mock';
    }
    const now = this.now();
    const expiresAt = credential.expiresAt.getTime();
    if (now >= expiresAt) {
      return 'expired';
    }
    return now >= expiresAt - this.safetyMarginMs ? 'expiring' : 'active';
  }

  private async backgroundCycle(): Promise<void> {
    this.events.append('info', 'Refreshing OAuth token (background)');
    try {
      await this.refresh('background');
    } catch (error) {
      // the stale credential stays cached until getToken finds it expired
      this.logger.debug({ err: error }, 'Background refresh cycle ended with an error');
    }
  }

  private async fetchAndStore(reason: RefreshReason): Promise<Credential> {
    this.logger.debug({ reason, source: this.source.kind }, 'Requesting OAuth token');

    let credential: Credential;
    try {
      credential = this.store.replace(await this.source.fetchCredential());
    } catch (error) {
      const failure =
        error instanceof AuthFailure
          ? error
          : new AuthFailure(`Unexpected error fetching OAuth token: ${errorMessage(error)}`, 'invalid_response', error);
      this.lastError = failure.message;
      this.logger.warn({ reason, code: failure.code, error: failure.message }, 'Failed to fetch OAuth token');
      // on-demand failures are reported once, by the request that needed the token
      if (reason !== 'on_demand') {
        this.events.append(
          reason === 'background' ? 'warning' : 'error',
          'Failed to refresh OAuth token',
          failure.message,
        );
      }
      throw failure;
    }

    this.refreshCount++;
    this.lastRefreshAt = new Date(this.now());
    this.lastError = null;

    if (this.publish) {
      this.publish(credential);
    }

    this.logger.info(
      { reason, expiresAt: credential.expiresAt.toISOString(), refreshCount: this.refreshCount },
      'OAuth token obtained',
    );
    this.events.append(
      'success',
      this.mockMode ? 'Mock OAuth token issued' : 'OAuth token refreshed',
      `Expires: ${credential.expiresAt.toISOString()}`,
    );
    return credential;
  }
}
