import { createPrivateKey, KeyObject } from 'crypto';
import jwt from 'jsonwebtoken';
import { ClockError, InitializeError, SignError } from '../utils/errors';

/** APNs rejects provider tokens older than an hour and throttles refreshes under twenty minutes */
export const TOKEN_REFRESH_INTERVAL_MS = 20 * 60 * 1000;

export interface SignerIdentity {
  teamId: string;
  keyId: string;
  /** PEM encoded P-256 key (the contents of the .p8 file) or an already parsed key */
  privateKey: string | KeyObject;
}

export interface CachedToken {
  readonly token: string;
  /** Milliseconds since the epoch */
  readonly signedAt: number;
}

export type Clock = () => number;

export interface ProviderTokenClaims {
  iss: string;
  iat: number;
}

/**
 * Parse the signing key, failing if it is not an EC P-256 private key.
 */
export function parsePrivateKey(key: string | KeyObject): KeyObject {
  let parsed: KeyObject;
  try {
    parsed = typeof key === 'string' ? createPrivateKey(key) : key;
  } catch (error) {
    throw new InitializeError('Unable to parse private key', { cause: error });
  }

  if (parsed.type !== 'private' || parsed.asymmetricKeyType !== 'ec') {
    throw new InitializeError('Private key must be an EC private key');
  }
  if (parsed.asymmetricKeyDetails?.namedCurve !== 'prime256v1') {
    throw new InitializeError('Private key must use the P-256 curve');
  }

  return parsed;
}

/**
 * Signs APNs provider tokens and caches the last one until it is due for refresh.
 * One signer per client; the cache is never shared.
 */
export class TokenSigner {
  private readonly teamId: string;
  private readonly keyId: string;
  private readonly key: KeyObject;
  private readonly clock: Clock;
  private cache: CachedToken | null = null;

  constructor(identity: SignerIdentity, clock: Clock = Date.now) {
    this.teamId = identity.teamId;
    this.keyId = identity.keyId;
    this.key = parsePrivateKey(identity.privateKey);
    this.clock = clock;
  }

  get cachedToken(): CachedToken | null {
    return this.cache;
  }

  /**
   * Drop the cached token so the next call signs a fresh one.
   */
  invalidate(): void {
    this.cache = null;
  }

  /**
   * Return the cached token while it is younger than the refresh interval,
   * otherwise sign and cache a new one.
   */
  sign(): string {
    const now = this.now();

    if (this.cache) {
      const elapsed = now - this.cache.signedAt;
      if (elapsed < 0) {
        throw new ClockError('System time moved backwards since the token was signed');
      }
      if (elapsed < TOKEN_REFRESH_INTERVAL_MS) {
        return this.cache.token;
      }
    }

    const claims: ProviderTokenClaims = {
      iss: this.teamId,
      iat: Math.floor(now / 1000),
    };

    let token: string;
    try {
      token = jwt.sign(claims, this.key, {
        algorithm: 'ES256',
        header: { alg: 'ES256', kid: this.keyId, typ: undefined },
      });
    } catch (error) {
      throw new SignError('Unable to sign token', { cause: error });
    }

    this.cache = { token, signedAt: now };
    return token;
  }

  private now(): number {
    const now = this.clock();
    if (!Number.isFinite(now) || now < 0) {
      throw new ClockError('System time is before the Unix epoch');
    }
    // An iat of 0 is replaced by the wall clock when signing
    if (now < 1000) {
      throw new ClockError('System time is within the first second of the Unix epoch');
    }
    return now;
  }
}
