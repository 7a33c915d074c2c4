// Shared fixtures: test-mode config, an in-memory log sink and downstream client stubs
import type { AxiosInstance } from 'axios';
import type { Express } from 'express';
import { createApp } from '../src/app';
import { loadConfig, type AppConfig } from '../src/config';
import { createLogger, type Logger } from '../src/logger';

export const TEST_API_KEY = 'test-api-key';
export const TEST_USERNAME = 'test_user';
export const TEST_PASSWORD = 'test123';
export const SCAN_URL = 'http://scanner.test/scan';

export class MemoryLog {
  readonly lines: string[] = [];

  write(chunk: string): void {
    this.lines.push(chunk);
  }

  records(): Array<Record<string, unknown>> {
    return this.lines.map((line) => JSON.parse(line) as Record<string, unknown>);
  }

  text(): string {
    return this.lines.join('');
  }
}

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    TESTING: 'true',
    LOG_LEVEL: 'info',
    PUBLIC_AI_API_URL: SCAN_URL,
    ...env,
  });
}

export interface TestApp {
  app: Express;
  config: AppConfig;
  logger: Logger;
  log: MemoryLog;
}

export function buildTestApp(env: Record<string, string> = {}): TestApp {
  const config = testConfig(env);
  const log = new MemoryLog();
  const logger = createLogger(config, log);
  return { app: createApp({ config, logger }), config, logger, log };
}

// Shape of the stub handed out by the mocked createScanClient
export function scanClientStub(post: jest.Mock): AxiosInstance {
  return { post } as unknown as AxiosInstance;
}

export function downstreamOk(body: unknown, status = 200) {
  return { status, data: JSON.stringify(body), headers: {} };
}

// Mirrors what axios rejects with: a flagged Error, with `response` only when the server answered
export function downstreamHttpError(status: number, data = '') {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    isAxiosError: true,
    code: status >= 500 ? 'ERR_BAD_RESPONSE' : 'ERR_BAD_REQUEST',
    response: { status, data, headers: {} },
  });
}

export function downstreamTransportError(code: string, message: string) {
  return Object.assign(new Error(message), {
    isAxiosError: true,
    code,
    response: undefined,
  });
}
