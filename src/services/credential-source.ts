import { request, type Dispatcher } from 'undici';
import { AuthFailure, errorMessage } from '../errors.js';
import { isRecord, isTimeoutError, truncate } from '../utils/http.js';
import type { Credential, OAuthConfig } from '../types.js';

export const OAUTH_TIMEOUT_MS = 30_000;
export const DEFAULT_EXPIRES_IN_SECONDS = 3600;
export const MOCK_TOKEN = 'mock_token_for_local_development_' + 'x'.repeat(50);
export const MOCK_TOKEN_LIFETIME_SECONDS = 24 * 60 * 60;

/**
 * Produces a fresh credential on every call
 */
export interface CredentialSource {
  readonly kind: 'oauth' | 'mock';
  fetchCredential(): Promise<Credential>;
}

export interface OAuthCredentialSourceOptions {
  dispatcher?: Dispatcher;
  timeoutMs?: number;
  now?: () => number;
}

/**
 * OAuth2 client credentials grant (RFC 6749 section 4.4), credentials sent in
 * the form body.
 */
export class OAuthCredentialSource implements CredentialSource {
  readonly kind = 'oauth';
  private readonly dispatcher?: Dispatcher;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(
    private readonly config: OAuthConfig,
    options: OAuthCredentialSourceOptions = {},
  ) {
    this.dispatcher = options.dispatcher;
    this.timeoutMs = options.timeoutMs ?? OAUTH_TIMEOUT_MS;
    this.now = options.now ?? (() => Date.now());
  }

  async fetchCredential(): Promise<Credential> {
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
    });

    let statusCode: number;
    let text: string;
    try {
      const response = await request(this.config.endpoint, {
        method: 'POST',
        headers: {
          'content-type': 'application/x-www-form-urlencoded',
          accept: 'application/json',
        },
        body: body.toString(),
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
        signal: AbortSignal.timeout(this.timeoutMs),
        dispatcher: this.dispatcher,
      });
      statusCode = response.statusCode;
      text = await response.body.text();
    } catch (error) {
      if (isTimeoutError(error)) {
        throw AuthFailure.timeout(this.timeoutMs, error);
      }
      throw AuthFailure.networkError(errorMessage(error), error);
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw new AuthFailure(
        `OAuth endpoint returned HTTP ${statusCode}: ${truncate(text, 200)}`,
        'http_error',
      );
    }

    return this.parseTokenResponse(text);
  }

  private parseTokenResponse(text: string): Credential {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new AuthFailure('OAuth response is not valid JSON', 'invalid_response', error);
    }

    if (!isRecord(parsed)) {
      throw new AuthFailure('OAuth response is not a JSON object', 'invalid_response');
    }

    const accessToken = parsed.access_token;
    if (typeof accessToken !== 'string' || accessToken.length === 0) {
      throw new AuthFailure('No access_token in OAuth response', 'missing_access_token');
    }

    const expiresIn = parseExpiresIn(parsed.expires_in);
    const obtainedAt = this.now();

    return {
      token: accessToken,
      obtainedAt: new Date(obtainedAt),
      expiresAt: new Date(obtainedAt + expiresIn * 1000),
    };
  }
}

function parseExpiresIn(value: unknown): number {
  if (value === undefined || value === null) {
    return DEFAULT_EXPIRES_IN_SECONDS;
  }

  const seconds = typeof value === 'string' ? Number(value) : value;
  if (typeof seconds !== 'number' || !Number.isFinite(seconds) || seconds <= 0) {
    throw new AuthFailure(
      `OAuth response has an invalid expires_in: ${String(value)}`,
      'invalid_response',
    );
  }
  return seconds;
}

/**
 * Local development source: a fixed placeholder token, no network
 */
export class MockCredentialSource implements CredentialSource {
  readonly kind = 'mock';

  constructor(private readonly now: () => number = () => Date.now()) {}

  async fetchCredential(): Promise<Credential> {
    const obtainedAt = this.now();
    return {
      token: MOCK_TOKEN,
      obtainedAt: new Date(obtainedAt),
      expiresAt: new Date(obtainedAt + MOCK_TOKEN_LIFETIME_SECONDS * 1000),
    };
  }
}

export function createCredentialSource(
  config: OAuthConfig,
  options: OAuthCredentialSourceOptions = {},
): CredentialSource {
  return config.mockMode
    ? new MockCredentialSource(options.now)
    : new OAuthCredentialSource(config, options);
}
