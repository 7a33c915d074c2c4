import { createHash, timingSafeEqual } from 'node:crypto';
import type { Logger } from '../logger';
import { hashPassword, verifyPassword } from './password';
import type { Principal } from './types';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

function toPrincipal(username: string, disabled: ReadonlySet<string>): Principal {
  return { username, active: !disabled.has(username) };
}

// Static API key -> username map. Keys are compared as SHA-256 digests so every
// comparison has the same length, and the whole table is always scanned.
export class StaticKeyStore {
  private readonly entries: ReadonlyArray<{ username: string; digest: Buffer }>;
  private readonly disabled: ReadonlySet<string>;

  constructor(
    apiKeys: Readonly<Record<string, string>>,
    disabledUsers: readonly string[] = [],
    private readonly logger?: Logger,
  ) {
    this.entries = Object.freeze(
      Object.entries(apiKeys).map(([username, key]) => ({ username, digest: digest(key) })),
    );
    this.disabled = new Set(disabledUsers);
  }

  get size(): number {
    return this.entries.length;
  }

  resolve(key: string): Principal | undefined {
    const presented = digest(key);
    let match: string | undefined;
    for (const entry of this.entries) {
      if (timingSafeEqual(presented, entry.digest) && match === undefined) {
        match = entry.username;
      }
    }

    if (match === undefined) {
      this.logger?.warn({ keyLength: key.length }, 'Unknown API key presented');
      return undefined;
    }
    return toPrincipal(match, this.disabled);
  }
}

// username -> scrypt hash. Unknown users still cost one hash verification.
export class PasswordStore {
  private readonly hashes: ReadonlyMap<string, string>;
  private readonly disabled: ReadonlySet<string>;
  private readonly dummyHash = hashPassword('unknown-user-placeholder');

  constructor(
    users: ReadonlyArray<{ username: string; passwordHash: string }>,
    disabledUsers: readonly string[] = [],
    private readonly logger?: Logger,
  ) {
    this.hashes = new Map(users.map((user) => [user.username, user.passwordHash]));
    this.disabled = new Set(disabledUsers);
  }

  lookup(username: string): Principal | undefined {
    if (!this.hashes.has(username)) {
      return undefined;
    }
    return toPrincipal(username, this.disabled);
  }

  async authenticate(username: string, password: string): Promise<Principal | undefined> {
    const stored = this.hashes.get(username);
    const valid = await verifyPassword(password, stored ?? this.dummyHash);

    if (!valid || stored === undefined) {
      this.logger?.warn({ username }, 'Password authentication failed');
      return undefined;
    }
    return toPrincipal(username, this.disabled);
  }
}
