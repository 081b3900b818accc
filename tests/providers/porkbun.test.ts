import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { keyAndSecret } from '../../src/auth.js';
import { porkbun } from '../../src/providers/porkbun.js';
import { errorResponse, jsonResponse, requestAt } from '../fixtures/fetch.js';

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

const config = { domain: 'example.com' };
const auth = keyAndSecret('test-key', 'test-secret');
const API = 'https://api.porkbun.com/api/json/v3/dns';
const credentials = { apikey: 'test-key', secretapikey: 'test-secret' };

function retrieved(records: unknown[]) {
  return jsonResponse({ status: 'SUCCESS', records });
}

describe('porkbun', () => {
  it('reads a record, coercing string ids and TTLs', async () => {
    mockFetch.mockResolvedValueOnce(
      retrieved([{ id: '106926659', name: 'www.example.com', type: 'A', content: '192.0.2.1', ttl: '600' }])
    );

    const record = await porkbun(config, auth).getRecord('www', 'A');

    expect(record).toEqual({ kind: 'A', host: 'www', value: '192.0.2.1', ttl: 600 });
    const req = requestAt(mockFetch, 0);
    expect(req.method).toBe('POST');
    expect(req.url).toBe(`${API}/retrieveByNameType/example.com/A/www`);
    expect(req.body).toEqual(credentials);
  });

  it('addresses the apex with an empty name', async () => {
    mockFetch.mockResolvedValueOnce(
      retrieved([{ id: '1', name: 'example.com', type: 'TXT', content: 'v=spf1 -all', ttl: '300' }])
    );

    const record = await porkbun(config, auth).getRecord('@', 'TXT');

    expect(record.host).toBe('@');
    expect(requestAt(mockFetch, 0).url).toBe(`${API}/retrieveByNameType/example.com/TXT/`);
  });

  it('creates a record that does not exist', async () => {
    mockFetch
      .mockResolvedValueOnce(retrieved([]))
      .mockResolvedValueOnce(jsonResponse({ status: 'SUCCESS', id: 5 }));

    await porkbun(config, auth).setRecord('www', 'A', '192.0.2.1');

    const req = requestAt(mockFetch, 1);
    expect(req.url).toBe(`${API}/create/example.com`);
    expect(req.body).toEqual({
      ...credentials,
      name: 'www',
      type: 'A',
      content: '192.0.2.1',
      ttl: '300',
    });
  });

  it('edits an existing record by id', async () => {
    mockFetch
      .mockResolvedValueOnce(
        retrieved([{ id: '77', name: 'www.example.com', type: 'A', content: '192.0.2.1', ttl: '300' }])
      )
      .mockResolvedValueOnce(jsonResponse({ status: 'SUCCESS' }));

    await porkbun(config, auth).setRecord('www', 'A', '192.0.2.2', 900);

    const req = requestAt(mockFetch, 1);
    expect(req.url).toBe(`${API}/edit/example.com/77`);
    expect(req.body).toMatchObject({ content: '192.0.2.2', ttl: '900' });
  });

  it('deletes by id', async () => {
    mockFetch
      .mockResolvedValueOnce(
        retrieved([{ id: '77', name: 'www.example.com', type: 'A', content: '192.0.2.1', ttl: '300' }])
      )
      .mockResolvedValueOnce(jsonResponse({ status: 'SUCCESS' }));

    await porkbun(config, auth).deleteRecord('www', 'A');

    expect(requestAt(mockFetch, 1).url).toBe(`${API}/delete/example.com/77`);
    expect(requestAt(mockFetch, 1).body).toEqual(credentials);
  });

  it('treats an ERROR status as a provider error', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ status: 'ERROR', message: 'Domain is not opted in to API access.' })
    );

    const err = await porkbun(config, auth)
      .getRecord('www', 'A')
      .catch((e: unknown) => e);

    expect(err).toMatchObject({
      kind: 'ProviderError',
      message: 'porkbun: request failed: Domain is not opted in to API access.',
    });
  });

  it('maps a rejected key pair to AuthFailed', async () => {
    mockFetch.mockResolvedValueOnce(
      errorResponse(400, '{"status":"ERROR","message":"Invalid API key. (002)"}')
    );

    await expect(porkbun(config, auth).getRecord('www', 'A')).rejects.toMatchObject({
      kind: 'AuthFailed',
      status: 400,
    });
  });

  it('keeps other 400s as provider errors', async () => {
    mockFetch.mockResolvedValueOnce(errorResponse(400, 'Bad request'));

    await expect(porkbun(config, auth).getRecord('www', 'A')).rejects.toMatchObject({
      kind: 'ProviderError',
      message: 'porkbun: API error 400: Bad request',
    });
  });

  it('lists the zone, filtering by type locally', async () => {
    mockFetch.mockResolvedValueOnce(
      retrieved([
        { id: '1', name: 'example.com', type: 'NS', content: 'curitiba.ns.porkbun.com', ttl: '86400' },
        { id: '2', name: 'www.example.com', type: 'A', content: '192.0.2.1', ttl: '600' },
        { id: '3', name: 'example.com', type: 'ALIAS', content: 'pixie.porkbun.com', ttl: '600' },
      ])
    );

    expect(await porkbun(config, auth).listRecords('A')).toEqual([
      { kind: 'A', host: 'www', value: '192.0.2.1', ttl: 600 },
    ]);
    expect(requestAt(mockFetch, 0).url).toBe(`${API}/retrieve/example.com`);
  });
});
