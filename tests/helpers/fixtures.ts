import type { AppConfig } from '../../app/core/config';
import { Logger } from '../../app/core/logging';

export const TEST_CREDENTIALS = ['test-key-a', 'test-key-b'] as const;

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    environment: 'test',
    credentials: [...TEST_CREDENTIALS],
    listen: { host: '::', port: 8080 },
    logLevel: 'error',
    metricsPrefix: '',
    ...overrides
  };
}

export function createSilentLogger(): Logger {
  return new Logger({ level: 'error', silent: true }, 'Test');
}
