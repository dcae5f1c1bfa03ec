import { describe, expect, test } from '@jest/globals';
import { fakeVector } from '../../helpers/fake-upstream';
import { BASE_URL, createTestApplication, postJson, postRaw } from './app-harness';

const MODEL = 'models/text-embedding-004';
const BAD_REQUEST = { error: { message: 'Bad Request', type: 'invalid_request_error', code: null } };

describe('POST /v1/embeddings', () => {
  test('embeds a single string', async () => {
    const { app, clients } = await createTestApplication();

    const response = await app.handle(postJson('/v1/embeddings', { input: 'hello', model: MODEL }));

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('application/json');
    expect(await response.json()).toEqual({
      object: 'list',
      data: [{ object: 'embedding', embedding: fakeVector('hello', 0), index: 0 }],
      model: MODEL,
      usage: { prompt_tokens: 0, total_tokens: 0 }
    });
    expect(clients[1].embedCalls).toHaveLength(1);
  });

  test('embeds a list in input order', async () => {
    const { app } = await createTestApplication();

    const response = await app.handle(postJson('/v1/embeddings', { input: ['x', 'yy'], model: MODEL, encoding_format: 'float' }));

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      data: [
        { object: 'embedding', embedding: [1, 0], index: 0 },
        { object: 'embedding', embedding: [2, 1], index: 1 }
      ]
    });
  });

  test('parses the body as JSON whatever the content type', async () => {
    const { app } = await createTestApplication();

    const response = await app.handle(
      postRaw('/v1/embeddings', JSON.stringify({ input: 'text', model: MODEL }), { 'content-type': 'text/plain' })
    );

    expect(response.status).toBe(200);
  });

  test('accepts null optional fields and unused options', async () => {
    const { app } = await createTestApplication();

    const response = await app.handle(
      postJson('/v1/embeddings', { input: 'text', model: MODEL, encoding_format: null, dimensions: 256, user: 'user-1' })
    );

    expect(response.status).toBe(200);
  });

  test('alternates credentials between requests', async () => {
    const { app, clients } = await createTestApplication();

    for (let i = 0; i < 3; i++) {
      await app.handle(postJson('/v1/embeddings', { input: `text ${i}`, model: MODEL }));
    }

    expect(clients.map(client => client.embedCalls.length)).toEqual([1, 2]);
  });

  test('hands the request signal to the upstream call', async () => {
    const { app, clients } = await createTestApplication();

    await app.handle(postJson('/v1/embeddings', { input: 'text', model: MODEL }));

    expect(clients[1].embedCalls[0].signal).toBeInstanceOf(AbortSignal);
  });

  test('cancels the upstream call when the client goes away', async () => {
    const inbound = new AbortController();
    const { app, clients } = await createTestApplication({
      onEmbedStarted: () => inbound.abort(),
      waitForAbort: true
    });

    const response = await app.handle(
      new Request(`${BASE_URL}/v1/embeddings`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ input: 'text', model: MODEL }),
        signal: inbound.signal
      })
    );

    expect(clients[1].embedCalls[0].signal?.aborted).toBe(true);
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: { message: 'Internal Server Error', type: 'upstream_error', code: null }
    });
  });

  test.each([
    ['malformed JSON', '{"input": "text",'],
    ['an empty body', ''],
    ['a JSON array', '[]'],
    ['a missing model', JSON.stringify({ input: 'text' })],
    ['a numeric model', JSON.stringify({ input: 'text', model: 42 })],
    ['a missing input', JSON.stringify({ model: MODEL })],
    ['a base64 encoding format', JSON.stringify({ input: 'text', model: MODEL, encoding_format: 'base64' })],
    ['a numeric input', JSON.stringify({ input: 42, model: MODEL })],
    ['an object input', JSON.stringify({ input: { text: 'a' }, model: MODEL })],
    ['a non-string element', JSON.stringify({ input: ['a', 1], model: MODEL })],
    ['token arrays', JSON.stringify({ input: [[1, 2]], model: MODEL })],
    ['fractional dimensions', JSON.stringify({ input: 'text', model: MODEL, dimensions: 1.5 })]
  ])('answers 400 for %s', async (_description, body) => {
    const { app, clients } = await createTestApplication();

    const response = await app.handle(postRaw('/v1/embeddings', body, { 'content-type': 'application/json' }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual(BAD_REQUEST);
    expect(clients.every(client => client.embedCalls.length === 0)).toBe(true);
  });

  test.each(['GET', 'PUT', 'DELETE'])('answers 405 to %s without reading the body', async method => {
    const { app, clients } = await createTestApplication();

    const response = await app.handle(new Request(`${BASE_URL}/v1/embeddings`, { method }));

    expect(response.status).toBe(405);
    expect(await response.json()).toEqual({
      error: { message: 'Method Not Allowed', type: 'invalid_request_error', code: null }
    });
    expect(clients.every(client => client.embedCalls.length === 0)).toBe(true);
  });

  test('answers 500 when the upstream call fails', async () => {
    const { app } = await createTestApplication({ embedError: new Error('quota exceeded') });

    const response = await app.handle(postJson('/v1/embeddings', { input: 'text', model: MODEL }));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: { message: 'Internal Server Error', type: 'upstream_error', code: null }
    });
  });

  test('answers 500 when upstream drops an embedding', async () => {
    const { app } = await createTestApplication({ shortResult: true });

    const response = await app.handle(postJson('/v1/embeddings', { input: ['a', 'b'], model: MODEL }));

    expect(response.status).toBe(500);
  });

  test('records every outcome', async () => {
    const { app, metrics } = await createTestApplication();

    await app.handle(postJson('/v1/embeddings', { input: ['a', 'b'], model: MODEL }));
    await app.handle(postRaw('/v1/embeddings', 'not json'));
    await app.handle(new Request(`${BASE_URL}/v1/embeddings`));

    const output = await metrics();
    expect(output).toContain('requests_total{path="/v1/embeddings",method="POST",status="OK"} 1');
    expect(output).toContain('requests_total{path="/v1/embeddings",method="POST",status="Bad Request"} 1');
    expect(output).toContain('requests_total{path="/v1/embeddings",method="GET",status="Method Not Allowed"} 1');
    expect(output).toContain('request_latency_seconds_count{path="/v1/embeddings",method="POST"} 2');
    expect(output).toContain(`embedding_batch_size_count{model="${MODEL}"} 1`);
  });
});
