import { describe, expect, test } from '@jest/globals';
import { ApplicationBootstrap } from '../../app/bootstrap';
import { ApplicationServer } from '../../app/server';
import { createFakeClientFactory } from '../helpers/fake-upstream';

function createServer() {
  const bootstrap = new ApplicationBootstrap({
    env: {
      GEMINI_API_KEY: 'test-key-a;test-key-b',
      LISTEN_ADDR: '127.0.0.1:0',
      METRICS_ADDR: '127.0.0.1:0',
      NODE_ENV: 'test'
    },
    overrides: { clientFactory: createFakeClientFactory().factory }
  });
  return { bootstrap, server: new ApplicationServer(bootstrap) };
}

describe('ApplicationServer', () => {
  test('starts the API and metrics listeners', async () => {
    const { bootstrap, server } = createServer();

    await server.start();

    expect(server.activeListeners).toHaveLength(2);
    await bootstrap.shutdown();
  });

  test('stops every listener on shutdown', async () => {
    const { bootstrap, server } = createServer();
    await server.start();

    await expect(bootstrap.shutdown()).resolves.toBeUndefined();
    expect(server.activeListeners).toHaveLength(0);
  });
});
