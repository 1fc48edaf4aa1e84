import { errors } from 'undici';

export function isTimeoutError(error: unknown): boolean {
  if (
    error instanceof errors.HeadersTimeoutError ||
    error instanceof errors.BodyTimeoutError ||
    error instanceof errors.ConnectTimeoutError
  ) {
    return true;
  }
  // AbortSignal.timeout() rejects with a DOMException named TimeoutError
  return error instanceof Error && error.name === 'TimeoutError';
}

/**
 * Join a base URL and a path suffix with exactly one slash between them
 */
export function joinUrl(baseUrl: string, suffix: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return base + suffix.replace(/^\/+/, '');
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.substring(0, maxLength) : text;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
