import { describe, expect, test } from '@jest/globals';
import { ApplicationBootstrap } from '../../app/bootstrap';
import { TYPES } from '../../app/core/container';
import { StartupError } from '../../app/core/errors';
import type { CredentialPool } from '../../app/domain/services';
import { createFakeClientFactory } from '../helpers/fake-upstream';

const TEST_ENV = { GEMINI_API_KEY: 'test-key-a;test-key-b;test-key-c', NODE_ENV: 'test', METRICS_ADDR: ':9100' };

describe('ApplicationBootstrap', () => {
  test('loads the configuration and builds the pool', async () => {
    const bootstrap = new ApplicationBootstrap({
      env: TEST_ENV,
      overrides: { clientFactory: createFakeClientFactory().factory }
    });

    const container = await bootstrap.initialize();

    expect(bootstrap.configuration.metrics).toEqual({ host: '::', port: 9100 });
    expect(container.get<CredentialPool>(TYPES.CredentialPool).size).toBe(3);
    await bootstrap.shutdown();
  });

  test('fails without credentials', async () => {
    const bootstrap = new ApplicationBootstrap({ env: { NODE_ENV: 'test' } });

    await expect(bootstrap.initialize()).rejects.toBeInstanceOf(StartupError);
  });

  test('runs shutdown hooks in order, once', async () => {
    const bootstrap = new ApplicationBootstrap({
      env: TEST_ENV,
      overrides: { clientFactory: createFakeClientFactory().factory }
    });
    const container = await bootstrap.initialize();
    const calls: string[] = [];
    bootstrap.onShutdown(async () => {
      calls.push('listeners');
    });
    bootstrap.onShutdown(async () => {
      calls.push('other');
    });

    await bootstrap.shutdown();
    await bootstrap.shutdown();

    expect(calls).toEqual(['listeners', 'other']);
    expect(container.isBound(TYPES.CredentialPool)).toBe(false);
  });

  test('releases the container when a shutdown hook fails', async () => {
    const bootstrap = new ApplicationBootstrap({
      env: TEST_ENV,
      overrides: { clientFactory: createFakeClientFactory().factory }
    });
    const container = await bootstrap.initialize();
    bootstrap.onShutdown(async () => {
      throw new Error('listener already closed');
    });

    await expect(bootstrap.shutdown()).rejects.toThrow('listener already closed');
    expect(container.isBound(TYPES.CredentialPool)).toBe(false);
  });

  test('has no configuration before initialization', () => {
    expect(() => new ApplicationBootstrap().configuration).toThrow('Application is not initialized');
  });
});
