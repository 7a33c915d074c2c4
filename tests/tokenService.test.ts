import { PasswordStore } from '../src/auth/credentialStore';
import { TokenError, TokenService } from '../src/auth/tokenService';
import { hashPassword } from '../src/auth/password';

const SECRET = 'test-secret-for-token-signing';
const ISSUED_AT = new Date('2026-03-01T12:00:00.000Z');
const TTL_SECONDS = 30 * 60;

function serviceAt(clock: { now: Date }, store: Pick<PasswordStore, 'lookup'>, secret = SECRET): TokenService {
  return new TokenService({ secret, ttlSeconds: TTL_SECONDS, store, now: () => clock.now });
}

async function verifyError(service: TokenService, token: string): Promise<TokenError> {
  try {
    await service.verify(token);
  } catch (err) {
    if (err instanceof TokenError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected verify() to reject');
}

describe('TokenService', () => {
  const store = new PasswordStore([{ username: 'alice', passwordHash: hashPassword('alice-pw') }], ['carol']);
  const storeWithCarol = new PasswordStore(
    [
      { username: 'alice', passwordHash: hashPassword('alice-pw') },
      { username: 'carol', passwordHash: hashPassword('carol-pw') },
    ],
    ['carol'],
  );
  let clock: { now: Date };

  beforeEach(() => {
    clock = { now: ISSUED_AT };
  });

  it('issues a token whose expiry is now + ttl', async () => {
    const service = serviceAt(clock, store);

    const issued = await service.issue({ username: 'alice', active: true });

    expect(issued.expiresIn).toBe(TTL_SECONDS);
    expect(issued.expiresAt.toISOString()).toBe('2026-03-01T12:30:00.000Z');
  });

  it('honours an explicit ttl', async () => {
    const service = serviceAt(clock, store);

    const issued = await service.issue({ username: 'alice', active: true }, 60);

    expect(issued.expiresAt.toISOString()).toBe('2026-03-01T12:01:00.000Z');
  });

  it('accepts a token one second before expiry and rejects it at expiry', async () => {
    const service = serviceAt(clock, store);
    const { token } = await service.issue({ username: 'alice', active: true }, 60);

    clock.now = new Date(ISSUED_AT.getTime() + 59_000);
    await expect(service.verify(token)).resolves.toEqual({ username: 'alice', active: true });

    clock.now = new Date(ISSUED_AT.getTime() + 60_000);
    expect((await verifyError(service, token)).kind).toBe('expired');

    clock.now = new Date(ISSUED_AT.getTime() + 61_000);
    expect((await verifyError(service, token)).kind).toBe('expired');
  });

  it('reports invalid_signature for a token signed with another key', async () => {
    const forger = serviceAt(clock, store, 'another-secret-entirely');
    const { token } = await forger.issue({ username: 'alice', active: true });

    const err = await verifyError(serviceAt(clock, store), token);

    expect(err.kind).toBe('invalid_signature');
  });

  it('reports invalid_signature for a tampered payload', async () => {
    const service = serviceAt(clock, store);
    const { token } = await service.issue({ username: 'alice', active: true });
    const [header, , signature] = token.split('.');
    const payload = Buffer.from(JSON.stringify({ sub: 'admin', exp: 9_999_999_999 })).toString('base64url');

    const err = await verifyError(service, `${header}.${payload}.${signature}`);

    expect(err.kind).toBe('invalid_signature');
  });

  it('reports invalid_signature for a malformed token', async () => {
    const err = await verifyError(serviceAt(clock, store), 'not.a.token');

    expect(err.kind).toBe('invalid_signature');
  });

  it('reports unknown_subject when the user no longer exists', async () => {
    const service = serviceAt(clock, store);
    const { token } = await service.issue({ username: 'bob', active: true });

    const err = await verifyError(service, token);

    expect(err.kind).toBe('unknown_subject');
  });

  it('re-resolves the subject so a disabled user is rejected immediately', async () => {
    const issuer = serviceAt(clock, storeWithCarol);
    const { token } = await issuer.issue({ username: 'carol', active: true });

    const err = await verifyError(issuer, token);

    expect(err.kind).toBe('unknown_subject');
  });
});
