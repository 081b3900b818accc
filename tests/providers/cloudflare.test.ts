import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { token } from '../../src/auth.js';
import { cloudflare, listCloudflareZones } from '../../src/providers/cloudflare.js';
import { emptyResponse, errorResponse, jsonResponse, requestAt } from '../fixtures/fetch.js';

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

function cfResponse<T>(result: T, resultInfo?: { page: number; total_pages: number }) {
  return jsonResponse({ success: true, errors: [], result, result_info: resultInfo });
}

const config = { domain: 'example.com' };
const auth = token('test-token');
const API = 'https://api.cloudflare.com/client/v4';
const RECORDS = `${API}/zones/z1/dns_records`;

describe('cloudflare', () => {
  describe('with a zone id', () => {
    it('getRecord queries by fully-qualified name and type', async () => {
      mockFetch.mockResolvedValueOnce(
        cfResponse([{ id: 'r1', type: 'A', name: 'rm.example.com', content: '192.0.2.4', ttl: 1 }])
      );

      const provider = cloudflare(config, auth, { accountId: 'z1' });
      const record = await provider.getRecord('rm', 'A');

      expect(record).toEqual({ kind: 'A', host: 'rm', value: '192.0.2.4', ttl: 1 });
      const req = requestAt(mockFetch, 0);
      expect(req.headers.get('Authorization')).toBe('Bearer test-token');
      expect(req.url).toBe(`${RECORDS}?name=rm.example.com&type=A`);
    });

    it('setRecord posts a new record', async () => {
      mockFetch
        .mockResolvedValueOnce(cfResponse([]))
        .mockResolvedValueOnce(cfResponse({ id: 'new-1' }));

      const provider = cloudflare(config, auth, { accountId: 'z1' });
      await provider.setRecord('rm', 'CNAME', 'to.example.net');

      const req = requestAt(mockFetch, 1);
      expect(req.method).toBe('POST');
      expect(req.url).toBe(RECORDS);
      expect(req.headers.get('Content-Type')).toBe('application/json');
      expect(req.body).toEqual({
        type: 'CNAME',
        name: 'rm.example.com',
        content: 'to.example.net',
        ttl: 300,
      });
    });

    it('setRecord sends TXT text in quoted form and reads it back bare', async () => {
      mockFetch
        .mockResolvedValueOnce(cfResponse([]))
        .mockResolvedValueOnce(cfResponse({ id: 'new-2' }))
        .mockResolvedValueOnce(
          cfResponse([
            { id: 'new-2', type: 'TXT', name: 'q.example.com', content: '"say \\"hi\\""', ttl: 300 },
          ])
        );

      const provider = cloudflare(config, auth, { accountId: 'z1' });
      await provider.setRecord('q', 'TXT', 'say "hi"');

      expect(requestAt(mockFetch, 1).body).toEqual({
        type: 'TXT',
        name: 'q.example.com',
        content: '"say \\"hi\\""',
        ttl: 300,
      });
      expect((await provider.getRecord('q', 'TXT')).value).toBe('say "hi"');
    });

    it('setRecord replaces an existing record in place', async () => {
      mockFetch
        .mockResolvedValueOnce(
          cfResponse([{ id: 'r1', type: 'A', name: 'example.com', content: '192.0.2.1', ttl: 300 }])
        )
        .mockResolvedValueOnce(cfResponse({ id: 'r1' }));

      const provider = cloudflare(config, auth, { accountId: 'z1' });
      await provider.setRecord('@', 'A', '192.0.2.2', 120);

      expect(requestAt(mockFetch, 0).url).toBe(`${RECORDS}?name=example.com&type=A`);
      const req = requestAt(mockFetch, 1);
      expect(req.method).toBe('PUT');
      expect(req.url).toBe(`${RECORDS}/r1`);
      expect(req.body).toEqual({ type: 'A', name: 'example.com', content: '192.0.2.2', ttl: 120 });
    });

    it('deleteRecord sends DELETE for the record id', async () => {
      mockFetch
        .mockResolvedValueOnce(
          cfResponse([{ id: 'r1', type: 'TXT', name: 'rm.example.com', content: '"x"', ttl: 300 }])
        )
        .mockResolvedValueOnce(emptyResponse(200));

      const provider = cloudflare(config, auth, { accountId: 'z1' });
      await provider.deleteRecord('rm', 'TXT');

      expect(requestAt(mockFetch, 1).method).toBe('DELETE');
      expect(requestAt(mockFetch, 1).url).toBe(`${RECORDS}/r1`);
    });

    it('throws on API error', async () => {
      mockFetch.mockResolvedValueOnce(errorResponse(403, 'Forbidden'));

      const provider = cloudflare(config, token('bad-token'), { accountId: 'z1' });
      await expect(provider.getRecord('rm', 'A')).rejects.toMatchObject({
        kind: 'AuthFailed',
        message: 'cloudflare: API error 403: Forbidden',
      });
    });

    it('throws on success: false with error details', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ success: false, errors: [{ code: 1001, message: 'Invalid zone' }], result: null })
      );

      const provider = cloudflare(config, auth, { accountId: 'z1' });
      await expect(provider.getRecord('rm', 'A')).rejects.toThrow(
        'cloudflare: API error: 1001: Invalid zone'
      );
    });

    it('listRecords paginates', async () => {
      mockFetch
        .mockResolvedValueOnce(
          cfResponse([{ id: 'r1', type: 'A', name: 'a.example.com', content: '192.0.2.1', ttl: 300 }], {
            page: 1,
            total_pages: 2,
          })
        )
        .mockResolvedValueOnce(
          cfResponse([{ id: 'r2', type: 'TXT', name: 'example.com', content: '"v=spf1 -all"', ttl: 300 }], {
            page: 2,
            total_pages: 2,
          })
        );

      const provider = cloudflare(config, auth, { accountId: 'z1' });
      const records = await provider.listRecords();

      expect(records).toEqual([
        { kind: 'A', host: 'a', value: '192.0.2.1', ttl: 300 },
        { kind: 'TXT', host: '@', value: 'v=spf1 -all', ttl: 300 },
      ]);
      expect(requestAt(mockFetch, 1).url).toBe(`${RECORDS}?page=2&per_page=100`);
    });
  });

  describe('with domain (auto-lookup)', () => {
    it('looks up the zone id once, even for concurrent callers', async () => {
      mockFetch.mockResolvedValueOnce(cfResponse([{ id: 'zone-abc', name: 'example.com' }]));

      const provider = cloudflare(config, auth);
      const ids = await Promise.all([provider.resolveAccountId(), provider.resolveAccountId()]);

      expect(ids).toEqual(['zone-abc', 'zone-abc']);
      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(requestAt(mockFetch, 0).url).toBe(`${API}/zones?name=example.com`);
    });

    it('reuses the zone id across operations', async () => {
      mockFetch
        .mockResolvedValueOnce(cfResponse([{ id: 'zone-abc', name: 'example.com' }]))
        .mockResolvedValueOnce(cfResponse([]))
        .mockResolvedValueOnce(cfResponse([]));

      const provider = cloudflare(config, auth);
      await expect(provider.getRecord('www', 'A')).rejects.toMatchObject({ kind: 'NotFound' });
      await expect(provider.getRecord('www', 'AAAA')).rejects.toMatchObject({ kind: 'NotFound' });

      expect(mockFetch).toHaveBeenCalledTimes(3);
      expect(requestAt(mockFetch, 2).url).toBe(
        `${API}/zones/zone-abc/dns_records?name=www.example.com&type=AAAA`
      );
    });

    it('throws when no zone is found', async () => {
      mockFetch.mockResolvedValueOnce(cfResponse([]));

      await expect(cloudflare(config, auth).resolveAccountId()).rejects.toThrow(
        'cloudflare: no zone found for domain "example.com"'
      );
    });

    it('retries the lookup after a failure', async () => {
      mockFetch
        .mockResolvedValueOnce(errorResponse(500, 'oops'))
        .mockResolvedValueOnce(cfResponse([{ id: 'zone-abc', name: 'example.com' }]));

      const provider = cloudflare(config, auth);
      await expect(provider.resolveAccountId()).rejects.toMatchObject({ kind: 'ProviderError' });
      expect(await provider.resolveAccountId()).toBe('zone-abc');
    });
  });
});

describe('listCloudflareZones', () => {
  it('returns zones from a single page', async () => {
    mockFetch.mockResolvedValueOnce(
      cfResponse(
        [
          { id: 'z1', name: 'example.com' },
          { id: 'z2', name: 'example.org' },
        ],
        { page: 1, total_pages: 1 }
      )
    );

    const zones = await listCloudflareZones(auth);

    expect(zones).toEqual([
      { id: 'z1', name: 'example.com' },
      { id: 'z2', name: 'example.org' },
    ]);
    expect(requestAt(mockFetch, 0).url).toBe(`${API}/zones?page=1&per_page=50`);
  });

  it('paginates through multiple pages', async () => {
    mockFetch
      .mockResolvedValueOnce(cfResponse([{ id: 'z1', name: 'a.com' }], { page: 1, total_pages: 2 }))
      .mockResolvedValueOnce(cfResponse([{ id: 'z2', name: 'b.com' }], { page: 2, total_pages: 2 }));

    const zones = await listCloudflareZones(auth);

    expect(zones).toEqual([
      { id: 'z1', name: 'a.com' },
      { id: 'z2', name: 'b.com' },
    ]);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('throws on API error', async () => {
    mockFetch.mockResolvedValueOnce(errorResponse(401, 'Unauthorized'));

    await expect(listCloudflareZones(token('bad-token'))).rejects.toThrow(
      'cloudflare: API error 401: Unauthorized'
    );
  });
});
