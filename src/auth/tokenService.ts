import { SignJWT, errors, jwtVerify } from 'jose';
import type { PasswordStore } from './credentialStore';
import type { Principal } from './types';

const ALGORITHM = 'HS256';

export type TokenErrorKind = 'invalid_signature' | 'expired' | 'unknown_subject';

export class TokenError extends Error {
  constructor(
    readonly kind: TokenErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'TokenError';
  }
}

export interface IssuedToken {
  token: string;
  expiresAt: Date;
  expiresIn: number;
}

export interface TokenServiceOptions {
  secret: string;
  ttlSeconds: number;
  store: Pick<PasswordStore, 'lookup'>;
  now?: () => Date;
}

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Issues and verifies stateless HS256 access tokens.
 *
 * The subject is looked up again on every verification, so disabling a user
 * takes effect before their outstanding tokens expire.
 */
export class TokenService {
  private readonly key: Uint8Array;
  private readonly ttlSeconds: number;
  private readonly store: Pick<PasswordStore, 'lookup'>;
  private readonly now: () => Date;

  constructor(options: TokenServiceOptions) {
    this.key = new TextEncoder().encode(options.secret);
    this.ttlSeconds = options.ttlSeconds;
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
  }

  async issue(principal: Principal, ttlSeconds: number = this.ttlSeconds): Promise<IssuedToken> {
    const issuedAt = toEpochSeconds(this.now());
    const expiresAt = issuedAt + ttlSeconds;

    const token = await new SignJWT({})
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .setSubject(principal.username)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .sign(this.key);

    return { token, expiresAt: new Date(expiresAt * 1000), expiresIn: ttlSeconds };
  }

  async verify(token: string): Promise<Principal> {
    let subject: unknown;
    try {
      const { payload } = await jwtVerify(token, this.key, {
        algorithms: [ALGORITHM],
        currentDate: this.now(),
        clockTolerance: 0,
        requiredClaims: ['exp'],
      });
      subject = payload.sub;
    } catch (err) {
      if (err instanceof errors.JWTExpired) {
        throw new TokenError('expired', 'Token has expired');
      }
      if (err instanceof errors.JOSEError) {
        throw new TokenError('invalid_signature', `Token rejected: ${err.code}`);
      }
      throw err;
    }

    if (typeof subject !== 'string' || subject.length === 0) {
      throw new TokenError('unknown_subject', 'Token has no subject');
    }

    const principal = this.store.lookup(subject);
    if (!principal || !principal.active) {
      throw new TokenError('unknown_subject', 'Token subject is unknown or inactive');
    }
    return principal;
  }
}
