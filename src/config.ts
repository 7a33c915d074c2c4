// Gateway configuration, parsed once from environment variables at startup
import 'dotenv/config';
import { z } from 'zod';

export type AuthMode = 'api_key' | 'token';

export interface PasswordEntry {
  username: string;
  passwordHash: string;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  isProduction: boolean;
  testing: boolean;
  logLevel: string;
  scanApiUrl: string;
  bodyLimit: string;
  corsOrigin: string;
  auth: {
    mode: AuthMode;
    // username -> API key
    apiKeys: Readonly<Record<string, string>>;
    users: readonly PasswordEntry[];
    // Plaintext password for the test user; only set in test mode
    testUserPassword?: string;
    disabledUsers: readonly string[];
    jwtSecret: string;
    tokenTtlSeconds: number;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

export const TEST_USERNAME = 'test_user';

// Fallback keys for local development only; production must set API_KEYS
const DEV_API_KEYS = {
  user1: 'secret-key-123',
  user2: 'secret-key-456',
} as const;

const DEV_JWT_SECRET = 'dev-only-jwt-secret-change-me';

const flag = z
  .string()
  .optional()
  .transform((value) => value !== undefined && value !== '' && value !== '0' && value.toLowerCase() !== 'false');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PUBLIC_AI_API_URL: z.string().url().default('https://api.example.com/scan'),
  AUTH_MODE: z.enum(['api_key', 'token']).default('api_key'),
  API_KEYS: z.string().optional(),
  API_KEY_USER1: z.string().min(1).optional(),
  API_KEY_USER2: z.string().min(1).optional(),
  AUTH_USERS: z.string().optional(),
  AUTH_DISABLED_USERS: z.string().optional(),
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters').optional(),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().positive().default(30),
  TESTING: flag,
  API_KEY_TEST_USER: z.string().min(1).default('test-api-key'),
  TEST_USER_PASSWORD: z.string().min(1).default('test123'),
  BODY_LIMIT: z.string().default('10mb'),
  CORS_ORIGIN: z.string().default('*'),
});

type Env = z.infer<typeof envSchema>;

function parseList(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  const unique = new Set<string>();
  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    if (trimmed.length > 0) {
      unique.add(trimmed);
    }
  }
  return [...unique];
}

// Parses "name:value,name:value". The value may itself contain ':' (split on the first one only).
function parsePairs(raw: string | undefined, variable: string, issues: string[]): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  const seen = new Set<string>();
  for (const entry of parseList(raw)) {
    const separator = entry.indexOf(':');
    const name = separator > 0 ? entry.slice(0, separator).trim() : '';
    const value = separator > 0 ? entry.slice(separator + 1).trim() : '';
    if (!name || !value) {
      issues.push(`${variable}: entry "${name || entry.slice(0, 16)}" must look like name:value`);
      continue;
    }
    if (seen.has(name)) {
      issues.push(`${variable}: duplicate entry for "${name}"`);
      continue;
    }
    seen.add(name);
    pairs.push([name, value]);
  }
  return pairs;
}

function resolveApiKeys(env: Env, isProduction: boolean, issues: string[]): Record<string, string> {
  if (env.TESTING) {
    return { [TEST_USERNAME]: env.API_KEY_TEST_USER };
  }

  const configured = parsePairs(env.API_KEYS, 'API_KEYS', issues);
  if (configured.length > 0) {
    const keys = Object.fromEntries(configured);
    const distinct = new Set(Object.values(keys));
    if (distinct.size !== configured.length) {
      issues.push('API_KEYS: each user needs a distinct key');
    }
    return keys;
  }

  if (isProduction && env.AUTH_MODE === 'api_key') {
    issues.push('API_KEYS is required in production when AUTH_MODE=api_key');
    return {};
  }

  return {
    user1: env.API_KEY_USER1 ?? DEV_API_KEYS.user1,
    user2: env.API_KEY_USER2 ?? DEV_API_KEYS.user2,
  };
}

function resolveJwtSecret(env: Env, isProduction: boolean, issues: string[]): string {
  if (env.JWT_SECRET) {
    return env.JWT_SECRET;
  }
  if (env.TESTING) {
    return 'test-secret-for-token-signing';
  }
  if (env.AUTH_MODE === 'token' && isProduction) {
    issues.push('JWT_SECRET is required in production when AUTH_MODE=token');
  }
  return DEV_JWT_SECRET;
}

// A variable set to an empty string (`JWT_SECRET=` in a .env file) counts as unset
function withoutBlankValues(source: NodeJS.ProcessEnv): Record<string, string> {
  const present: Record<string, string> = {};
  for (const [name, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') {
      present[name] = value;
    }
  }
  return present;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlankValues(source));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const env = parsed.data;
  const isProduction = env.NODE_ENV === 'production';
  const issues: string[] = [];

  const apiKeys = resolveApiKeys(env, isProduction, issues);
  const users = env.TESTING
    ? []
    : parsePairs(env.AUTH_USERS, 'AUTH_USERS', issues).map(([username, passwordHash]) => ({ username, passwordHash }));
  const jwtSecret = resolveJwtSecret(env, isProduction, issues);

  if (env.AUTH_MODE === 'token' && !env.TESTING && users.length === 0) {
    issues.push('AUTH_USERS must list at least one user when AUTH_MODE=token');
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  const config: AppConfig = {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    isProduction,
    testing: env.TESTING,
    logLevel: env.LOG_LEVEL,
    scanApiUrl: env.PUBLIC_AI_API_URL,
    bodyLimit: env.BODY_LIMIT,
    corsOrigin: env.CORS_ORIGIN,
    auth: {
      mode: env.AUTH_MODE,
      apiKeys: Object.freeze(apiKeys),
      users: Object.freeze(users),
      ...(env.TESTING ? { testUserPassword: env.TEST_USER_PASSWORD } : {}),
      disabledUsers: Object.freeze(parseList(env.AUTH_DISABLED_USERS)),
      jwtSecret,
      tokenTtlSeconds: Math.round(env.ACCESS_TOKEN_EXPIRE_MINUTES * 60),
    },
  };

  return Object.freeze(config);
}
