import { describe, expect, test } from '@jest/globals';
import { ModelsService } from '../../../../app/application/services';
import { CredentialPool } from '../../../../app/domain/services';
import { UpstreamError } from '../../../../app/core/errors';
import type { UpstreamModel } from '../../../../app/infrastructure/providers/gemini';
import { createFakeClientFactory, type FakeUpstreamOptions } from '../../../helpers/fake-upstream';
import { createSilentLogger, createTestConfig } from '../../../helpers/fixtures';

const CATALOG: UpstreamModel[] = [
  { name: 'models/gemini-1.5-flash', supportedActions: ['generateContent', 'countTokens'] },
  { name: 'models/text-embedding-004', supportedActions: ['embedContent'] },
  { name: 'models/aqa', supportedActions: ['generateAnswer'] },
  { name: 'models/embedding-001', supportedActions: ['embedContent', 'countTokens'] }
];

function createService(options: FakeUpstreamOptions) {
  const logger = createSilentLogger();
  const { clients, factory } = createFakeClientFactory(options);
  const pool = new CredentialPool(createTestConfig(), factory, logger);
  return { clients, pool, service: new ModelsService(logger, pool) };
}

describe('ModelsService', () => {
  test('lists only embedding models', async () => {
    const { service } = createService({ models: CATALOG });

    expect(await service.listModels({ requestId: 'req-1' })).toEqual({
      object: 'list',
      data: [
        { object: 'model', id: 'models/text-embedding-004', created: 0, owned_by: 'google' },
        { object: 'model', id: 'models/embedding-001', created: 0, owned_by: 'google' }
      ]
    });
  });

  test('always asks the primary client and leaves the rotation alone', async () => {
    const { service, clients, pool } = createService({ models: CATALOG });

    await service.listModels({ requestId: 'req-2' });
    await service.listModels({ requestId: 'req-3' });

    expect(clients.map(client => client.listCalls)).toEqual([2, 0]);
    expect(pool.position).toBe(0);
  });

  test('returns an empty list when nothing embeds', async () => {
    const { service } = createService({ models: [CATALOG[0]] });

    expect(await service.listModels({ requestId: 'req-4' })).toEqual({ object: 'list', data: [] });
  });

  test('discards partial results when a page fails', async () => {
    const cause = new Error('page token expired');
    const { service } = createService({ models: CATALOG, listError: cause, listErrorAfter: 2 });

    const failure = service.listModels({ requestId: 'req-5' });

    await expect(failure).rejects.toBeInstanceOf(UpstreamError);
    await expect(failure).rejects.toMatchObject({ message: 'failed to list models: page token expired', cause });
  });
});
