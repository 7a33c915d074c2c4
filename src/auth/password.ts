// scrypt password hashing: "scrypt$<salt b64>$<key b64>"
import { randomBytes, scrypt, scryptSync, timingSafeEqual } from 'node:crypto';

const PREFIX = 'scrypt';
const SALT_BYTES = 16;
const KEY_BYTES = 64;

function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_BYTES, (err, key) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(key);
    });
  });
}

export function hashPassword(password: string): string {
  const salt = randomBytes(SALT_BYTES);
  const key = scryptSync(password, salt, KEY_BYTES);
  return [PREFIX, salt.toString('base64'), key.toString('base64')].join('$');
}

function parseHash(stored: string): { salt: Buffer; key: Buffer } | undefined {
  const parts = stored.split('$');
  if (parts.length !== 3 || parts[0] !== PREFIX) {
    return undefined;
  }
  const salt = Buffer.from(parts[1], 'base64');
  const key = Buffer.from(parts[2], 'base64');
  if (salt.length === 0 || key.length !== KEY_BYTES) {
    return undefined;
  }
  return { salt, key };
}

export function isPasswordHash(stored: string): boolean {
  return parseHash(stored) !== undefined;
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const parsed = parseHash(stored);
  if (!parsed) {
    return false;
  }
  const candidate = await deriveKey(password, parsed.salt);
  return timingSafeEqual(candidate, parsed.key);
}
