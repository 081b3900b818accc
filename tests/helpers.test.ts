import { describe, it, expect } from 'vitest';
import { apiKey } from '../src/auth.js';
import {
  deleteARecord,
  deleteTxtRecord,
  getARecord,
  getTxtRecord,
  setARecord,
  setTxtRecord,
} from '../src/helpers.js';
import { gandi } from '../src/providers/gandi.js';
import { LIVEDNS_KEY, createLiveDns } from './fixtures/livedns.js';

function setup() {
  const live = createLiveDns();
  const provider = gandi({ domain: 'example.com' }, apiKey(LIVEDNS_KEY), { fetch: live.fetch });
  return { live, provider };
}

describe('TXT helpers', () => {
  it('stores the text quoted and reads it back bare', async () => {
    const { live, provider } = setup();

    await setTxtRecord(provider, '_acme-challenge', 'challenge-token', 60);

    expect(live.rrsets()).toEqual([
      {
        rrset_name: '_acme-challenge',
        rrset_type: 'TXT',
        rrset_ttl: 60,
        rrset_values: ['"challenge-token"'],
      },
    ]);
    expect(await getTxtRecord(provider, '_acme-challenge.example.com')).toBe('challenge-token');
  });

  it('keeps quotes that are part of the text', async () => {
    const { live, provider } = setup();

    await setTxtRecord(provider, 'q', '"abc"');

    expect(live.rrsets()[0]?.rrset_values).toEqual(['"\\"abc\\""']);
    expect(await getTxtRecord(provider, 'q')).toBe('"abc"');
  });

  it('deletes the record', async () => {
    const { live, provider } = setup();
    await setTxtRecord(provider, '_acme-challenge', 'challenge-token');

    const ack = await deleteTxtRecord(provider, '_acme-challenge');

    expect(ack).toEqual({ operation: 'delete', host: '_acme-challenge', kind: 'TXT', dryRun: false });
    expect(live.rrsets()).toEqual([]);
  });
});

describe('A helpers', () => {
  it('round-trips an address', async () => {
    const { provider } = setup();

    await setARecord(provider, 'home', '192.0.2.44');

    expect(await getARecord(provider, 'home')).toBe('192.0.2.44');
  });

  it('getARecord rejects when there is no record', async () => {
    const { provider } = setup();

    await expect(getARecord(provider, 'home')).rejects.toMatchObject({
      kind: 'NotFound',
      message: 'gandi: no A record for "home"',
    });
  });

  it('deleteARecord rejects a second delete', async () => {
    const { provider } = setup();
    await setARecord(provider, 'home', '192.0.2.44');

    await deleteARecord(provider, 'home');

    await expect(deleteARecord(provider, 'home')).rejects.toMatchObject({ kind: 'NotFound' });
  });
});
