/**
 * Errors raised while relaying a completion request.
 * Each carries the HTTP status the relay answers with.
 */

export type AuthFailureCode =
  | 'network_error'
  | 'timeout'
  | 'http_error'
  | 'invalid_response'
  | 'missing_access_token';

/**
 * Strips bearer tokens and credential fragments so error messages can be
 * logged and returned to callers.
 */
export function sanitizeMessage(message: string): string {
  return message
    .replace(/\bBearer\s+[A-Za-z0-9._~+/-]+=*/gi, 'Bearer [REDACTED]')
    .replace(/\baccess_token(["']?\s*[=:]\s*["']?)[^\s&"',}]+/gi, 'access_token$1[REDACTED]')
    .replace(/\bclient_secret(["']?\s*[=:]\s*["']?)[^\s&"',}]+/gi, 'client_secret$1[REDACTED]');
}

export abstract class RelayError extends Error {
  public abstract readonly statusCode: number;

  public constructor(message: string, options?: { cause?: unknown }) {
    super(sanitizeMessage(message), options);
    this.name = new.target.name;
  }
}

export class AuthFailure extends RelayError {
  public readonly statusCode = 401;
  public readonly code: AuthFailureCode;

  public constructor(message: string, code: AuthFailureCode, cause?: unknown) {
    super(message, { cause });
    this.code = code;
  }

  public static timeout(timeoutMs: number, cause?: unknown): AuthFailure {
    return new AuthFailure(
      `OAuth token request timed out after ${timeoutMs / 1000} seconds`,
      'timeout',
      cause,
    );
  }

  public static networkError(message: string, cause?: unknown): AuthFailure {
    return new AuthFailure(`Failed to fetch OAuth token: ${message}`, 'network_error', cause);
  }
}

export class UpstreamError extends RelayError {
  public readonly statusCode: number;

  public constructor(statusCode: number, message: string) {
    super(message);
    this.statusCode = statusCode;
  }
}

export class TransportError extends RelayError {
  public readonly statusCode: number;
  public readonly timedOut: boolean;

  public constructor(message: string, timedOut: boolean, cause?: unknown) {
    super(message, { cause });
    this.timedOut = timedOut;
    this.statusCode = timedOut ? 504 : 500;
  }
}

/** Inbound payload could not be understood. */
export class ConfigError extends RelayError {
  public readonly statusCode = 400;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
