import type { Config } from '../../src/config.js';
import { buildServer } from '../../src/api/server.js';

export const TEST_CONFIG: Config = {
  port: 0,
  host: '127.0.0.1',
  logLevel: 'silent',
  prefixed: true,
  maxCriteriaDepth: 4,
};

export function createTestServer(overrides: Partial<Config> = {}) {
  return buildServer({ ...TEST_CONFIG, ...overrides });
}
