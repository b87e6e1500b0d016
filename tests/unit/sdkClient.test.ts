import { describe, it, expect, beforeAll, vi } from 'vitest';
import { AnonymizerClient, AnonymizerRequestError } from '../../sdk/node';
import { createServer } from '../../src/api/server';
import { configureLogger } from '../../src/common/logger';

function clientFor(app: ReturnType<typeof createServer>): AnonymizerClient {
  return new AnonymizerClient({
    baseUrl: 'http://anonymizer.test/',
    fetch: async (input, init) => {
      const response = await app.inject({
        method: init?.method === 'POST' ? 'POST' : 'GET',
        url: new URL(input).pathname,
        headers: { 'content-type': 'application/json' },
        payload: typeof init?.body === 'string' ? init.body : undefined,
      });
      return new Response(response.body, { status: response.statusCode, headers: { 'content-type': 'application/json' } });
    },
  });
}

describe('AnonymizerClient', () => {
  beforeAll(() => {
    configureLogger({ level: 'silent' });
  });

  it('anonymizes through the HTTP API', async () => {
    const client = clientFor(createServer());
    const result = await client.anonymize('please REPLACE ME.', [{ entityType: 'SSN', start: 7, end: 17, score: 0.8 }]);
    expect(result.text).toBe('please <SSN>.');
    expect(await client.listAnonymizers()).toEqual(['hash', 'mask', 'redact', 'replace', 'encrypt']);
    expect(await client.listDeanonymizers()).toEqual(['decrypt']);
  });

  it('raises request errors with status and body', async () => {
    const client = clientFor(createServer());
    const attempt = client.deanonymize('abc', [{ entityType: 'X', start: 0, end: 1 }]);
    await expect(attempt).rejects.toBeInstanceOf(AnonymizerRequestError);
    await expect(client.deanonymize('abc', [{ entityType: 'X', start: 0, end: 1 }])).rejects.toMatchObject({
      status: 422,
    });
  });

  it('sends configured headers', async () => {
    const fetchMock = vi.fn(async () => new Response('[]', { status: 200 }));
    const client = new AnonymizerClient({ baseUrl: 'http://anonymizer.test', headers: { authorization: 'Bearer test-token' }, fetch: fetchMock });
    await client.listAnonymizers();
    expect(fetchMock).toHaveBeenCalledWith('http://anonymizer.test/anonymizers', {
      method: 'GET',
      headers: { 'content-type': 'application/json', authorization: 'Bearer test-token' },
      body: undefined,
    });
  });
});
