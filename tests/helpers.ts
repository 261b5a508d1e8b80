import { vi } from 'vitest';
import { loadConfig } from '../src/config';

export const TEST_SIGNING_KEY = 'test-secret';
export const TEST_COOKIE_KEY = 'test-cookie-secret';

export function testConfig(overrides: NodeJS.ProcessEnv = {}) {
  return loadConfig({
    STORAGE_DRIVER: 'memory',
    SIGNING_KEY: TEST_SIGNING_KEY,
    COOKIE_SIGNING_KEY: TEST_COOKIE_KEY,
    PASSWORD_HASH_COST: '1024',
    LOG_LEVEL: 'silent',
    ...overrides
  });
}

export function createTestLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}
