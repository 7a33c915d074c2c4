import type { Request } from 'express';
import { AppConfig, TEST_USERNAME } from '../config';
import { InvalidCredentialError, MissingCredentialError } from '../errors';
import type { Logger } from '../logger';
import { PasswordStore, StaticKeyStore } from './credentialStore';
import { hashPassword } from './password';
import { TokenError, TokenService } from './tokenService';
import type { Authenticator, Credential, Principal } from './types';

export const API_KEY_HEADER = 'x-api-key';

const BEARER_CHALLENGE = { 'WWW-Authenticate': 'Bearer' } as const;

export const AUTH_MESSAGES = {
  apiKeyMissing: 'API key required',
  apiKeyInvalid: 'Invalid API key',
  tokenMissing: 'Not authenticated',
  tokenInvalid: 'Could not validate credentials',
  loginFailed: 'Incorrect username or password',
} as const;

// X-API-Key header checked against a static key map
export class ApiKeyAuthenticator implements Authenticator {
  readonly scheme = 'api_key';

  constructor(
    private readonly store: StaticKeyStore,
    private readonly logger: Logger,
  ) {}

  extractCredential(req: Request): Credential | undefined {
    const key = req.headers[API_KEY_HEADER];
    if (typeof key !== 'string' || key.length === 0) {
      return undefined;
    }
    return { kind: 'api_key', key };
  }

  async resolve(credential: Credential): Promise<Principal> {
    const principal = credential.kind === 'api_key' ? this.store.resolve(credential.key) : undefined;
    if (!principal) {
      throw new InvalidCredentialError(AUTH_MESSAGES.apiKeyInvalid);
    }
    if (!principal.active) {
      this.logger.warn({ user: principal.username }, 'Inactive user presented a valid API key');
      throw new InvalidCredentialError(AUTH_MESSAGES.apiKeyInvalid);
    }
    return principal;
  }

  missingCredential(): Error {
    return new MissingCredentialError(AUTH_MESSAGES.apiKeyMissing);
  }
}

// Authorization: Bearer <jwt>, tokens obtained from POST /token
export class BearerTokenAuthenticator implements Authenticator {
  readonly scheme = 'bearer';

  constructor(
    private readonly passwords: PasswordStore,
    readonly tokens: TokenService,
    private readonly logger: Logger,
  ) {}

  extractCredential(req: Request): Credential | undefined {
    const header = req.headers['authorization'];
    if (typeof header !== 'string') {
      return undefined;
    }
    const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
    if (!match) {
      return undefined;
    }
    return { kind: 'bearer', token: match[1] };
  }

  async resolve(credential: Credential): Promise<Principal> {
    if (credential.kind === 'password') {
      const principal = await this.passwords.authenticate(credential.username, credential.password);
      if (!principal || !principal.active) {
        throw new InvalidCredentialError(AUTH_MESSAGES.loginFailed, BEARER_CHALLENGE);
      }
      return principal;
    }

    if (credential.kind !== 'bearer') {
      throw new InvalidCredentialError(AUTH_MESSAGES.tokenInvalid, BEARER_CHALLENGE);
    }

    try {
      return await this.tokens.verify(credential.token);
    } catch (err) {
      if (err instanceof TokenError) {
        this.logger.warn({ reason: err.kind }, 'Bearer token rejected');
        throw new InvalidCredentialError(AUTH_MESSAGES.tokenInvalid, BEARER_CHALLENGE);
      }
      throw err;
    }
  }

  missingCredential(): Error {
    return new MissingCredentialError(AUTH_MESSAGES.tokenMissing, BEARER_CHALLENGE);
  }
}

// Builds the single authenticator selected by AUTH_MODE
export function createAuthenticator(config: AppConfig, logger: Logger): Authenticator {
  const { auth } = config;

  if (auth.mode === 'api_key') {
    const store = new StaticKeyStore(auth.apiKeys, auth.disabledUsers, logger);
    logger.info({ keys: store.size }, 'API key authentication enabled');
    return new ApiKeyAuthenticator(store, logger);
  }

  const users =
    auth.testUserPassword !== undefined
      ? [{ username: TEST_USERNAME, passwordHash: hashPassword(auth.testUserPassword) }]
      : auth.users;
  const passwords = new PasswordStore(users, auth.disabledUsers, logger);
  const tokens = new TokenService({
    secret: auth.jwtSecret,
    ttlSeconds: auth.tokenTtlSeconds,
    store: passwords,
  });
  logger.info({ users: users.length, ttlSeconds: auth.tokenTtlSeconds }, 'Bearer token authentication enabled');
  return new BearerTokenAuthenticator(passwords, tokens, logger);
}
