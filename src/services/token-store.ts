import type { Credential } from '../types.js';

interface StoredCredential {
  readonly token: string;
  readonly obtainedAtMs: number;
  readonly expiresAtMs: number;
}

function toCredential(stored: StoredCredential): Credential {
  return Object.freeze({
    token: stored.token,
    obtainedAt: new Date(stored.obtainedAtMs),
    expiresAt: new Date(stored.expiresAtMs),
  });
}

/**
 * Holds the current credential. Contents are swapped wholesale and kept as
 * epoch milliseconds; every read builds new Date objects, so nothing a caller
 * does to a returned credential reaches the store.
 */
export class TokenStore {
  private current: StoredCredential | null = null;

  get(): Credential | null {
    return this.current ? toCredential(this.current) : null;
  }

  replace(credential: Credential): Credential {
    const obtainedAtMs = credential.obtainedAt.getTime();
    const expiresAtMs = credential.expiresAt.getTime();
    if (!(expiresAtMs > obtainedAtMs)) {
      throw new RangeError('Credential must expire after it was obtained');
    }

    this.current = Object.freeze({ token: credential.token, obtainedAtMs, expiresAtMs });
    return toCredential(this.current);
  }

  /**
   * True when a credential is cached and `now` is before its expiry minus the margin
   */
  isUsable(now: number, marginMs = 0): boolean {
    return this.current !== null && now < this.current.expiresAtMs - marginMs;
  }
}
