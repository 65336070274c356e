import { describe, it, expect } from 'vitest';
import { HttpClient } from '../services/HttpClient.js';
import { mockAdapter, networkError } from './helpers/mockAdapter.js';

function createClient(responder: Parameters<typeof mockAdapter>[0]) {
  const { adapter, calls } = mockAdapter(responder);
  const client = new HttpClient('Test', {
    baseURL: 'https://api.example.test',
    maxRetries: 2,
    retryDelay: 0,
    adapter,
  });
  return { client, calls };
}

describe('HttpClient', () => {
  it('returns the response body', async () => {
    const { client } = createClient(() => ({ status: 200, data: { ok: true } }));

    await expect(client.get('/status')).resolves.toEqual({ ok: true });
  });

  it('retries a GET that fails with a server error', async () => {
    let attempts = 0;
    const { client, calls } = createClient(() => {
      attempts++;
      return attempts < 3 ? { status: 502 } : { status: 200, data: 'recovered' };
    });

    await expect(client.get('/status')).resolves.toBe('recovered');
    expect(calls).toHaveLength(3);
  });

  it('does not retry a POST answered with a server error', async () => {
    const { client, calls } = createClient(() => ({ status: 502 }));

    await expect(client.post('/channels/C1/messages', { content: 'hello' })).rejects.toMatchObject({
      response: { status: 502 },
    });
    expect(calls).toHaveLength(1);
  });

  it('does not retry a POST whose connection dropped after sending', async () => {
    const { client, calls } = createClient((request) => {
      throw networkError(request, 'ECONNRESET');
    });

    await expect(client.post('/channels/C1/messages', { content: 'hello' })).rejects.toMatchObject({
      code: 'ECONNRESET',
    });
    expect(calls).toHaveLength(1);
  });

  it('retries a POST that never reached the server', async () => {
    let attempts = 0;
    const { client, calls } = createClient((request) => {
      attempts++;
      if (attempts === 1) {
        throw networkError(request, 'ECONNREFUSED');
      }
      return { status: 200, data: { id: 'reply-1' } };
    });

    await expect(client.post('/channels/C1/messages', { content: 'hello' })).resolves.toEqual({ id: 'reply-1' });
    expect(calls).toHaveLength(2);
  });

  it('does not retry client errors', async () => {
    const { client, calls } = createClient(() => ({ status: 404 }));

    await expect(client.get('/missing')).rejects.toMatchObject({ response: { status: 404 } });
    expect(calls).toHaveLength(1);
  });
});
