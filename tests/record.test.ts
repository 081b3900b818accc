import { describe, it, expect } from 'vitest';
import { ZoneError } from '../src/errors.js';
import {
  aRecord,
  createRecord,
  formatRecord,
  parseRecordKind,
  quoteTxt,
  recordsEqual,
  stripQuotes,
  txtRecord,
  unquoteTxt,
  validateRecordValue,
  validateTtl,
} from '../src/record.js';

function invalid(fn: () => unknown): ZoneError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ZoneError) return err;
    throw err;
  }
  throw new Error('expected a ZoneError');
}

describe('parseRecordKind', () => {
  it('accepts any case and surrounding space', () => {
    expect(parseRecordKind(' txt ')).toBe('TXT');
  });

  it('rejects unsupported types', () => {
    expect(() => parseRecordKind('SOA')).toThrow('unknown record type "SOA"');
  });
});

describe('createRecord', () => {
  it('normalises host and value', () => {
    const record = createRecord(
      { kind: 'A', host: 'WWW.example.com.', value: ' 192.0.2.1 ', ttl: 300 },
      'example.com'
    );
    expect(record).toEqual({ kind: 'A', host: 'www', value: '192.0.2.1', ttl: 300 });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('leaves out ttl when none is given', () => {
    const record = createRecord({ kind: 'TXT', host: '_acme-challenge', value: 'token-value' });
    expect('ttl' in record).toBe(false);
  });

  it('maps the zone apex to @', () => {
    expect(aRecord('', '192.0.2.1').host).toBe('@');
  });

  it('rejects an invalid host', () => {
    const err = invalid(() => createRecord({ kind: 'A', host: 'bad host', value: '192.0.2.1' }));
    expect(err.kind).toBe('InvalidInput');
    expect(err.message).toBe('invalid host "bad host"');
  });
});

describe('validateRecordValue', () => {
  it('accepts well-formed values', () => {
    expect(validateRecordValue('A', '192.0.2.1')).toBe('192.0.2.1');
    expect(validateRecordValue('AAAA', '2001:db8::1')).toBe('2001:db8::1');
    expect(validateRecordValue('CNAME', 'target.example.net.')).toBe('target.example.net.');
    expect(validateRecordValue('MX', '10 mail.example.com')).toBe('10 mail.example.com');
    expect(validateRecordValue('SRV', '10 5 5060 sip.example.com')).toBe(
      '10 5 5060 sip.example.com'
    );
    expect(validateRecordValue('CAA', '0 issue "ca.example.net"')).toBe(
      '0 issue "ca.example.net"'
    );
  });

  it('rejects an A value that is not IPv4', () => {
    expect(() => validateRecordValue('A', '300.1.1.1')).toThrow(
      'invalid A record value "300.1.1.1": not an IPv4 address'
    );
  });

  it('rejects an AAAA value that is not IPv6', () => {
    expect(() => validateRecordValue('AAAA', '192.0.2.1')).toThrow(
      'invalid AAAA record value "192.0.2.1": not an IPv6 address'
    );
  });

  it('rejects an MX value without a priority', () => {
    expect(() => validateRecordValue('MX', 'mail.example.com')).toThrow(
      'invalid MX record value "mail.example.com": expected "<priority> <host>"'
    );
  });

  it('rejects an SRV port out of range', () => {
    expect(() => validateRecordValue('SRV', '10 5 70000 sip.example.com')).toThrow(
      'priority, weight and port must be 0-65535'
    );
  });

  it('rejects text with a line break', () => {
    expect(() => validateRecordValue('TXT', 'one\ntwo')).toThrow('contains a line break');
  });

  it('rejects an empty value', () => {
    expect(() => validateRecordValue('TXT', '   ')).toThrow('empty TXT record value');
  });
});

describe('validateTtl', () => {
  it('accepts positive integers', () => {
    expect(validateTtl(3600)).toBe(3600);
  });

  it.each([0, -1, 1.5, 2_147_483_648])('rejects %s', (ttl) => {
    expect(() => validateTtl(ttl)).toThrow(
      `invalid TTL ${ttl}: must be an integer between 1 and 2147483647`
    );
  });
});

describe('formatRecord', () => {
  it('includes the ttl when present', () => {
    expect(formatRecord({ kind: 'A', host: 'www', value: '192.0.2.1', ttl: 300 })).toBe(
      'www A 192.0.2.1 ttl=300'
    );
    expect(formatRecord(txtRecord('@', 'v=spf1 -all'))).toBe('@ TXT v=spf1 -all');
  });
});

describe('TXT quoting', () => {
  it('strips one pair of surrounding quotes', () => {
    expect(stripQuotes('"abc"')).toBe('abc');
    expect(stripQuotes('abc')).toBe('abc');
    expect(stripQuotes('"')).toBe('"');
  });

  it('always quotes and escapes quotes and backslashes', () => {
    expect(quoteTxt('say "hi"')).toBe('"say \\"hi\\""');
    expect(quoteTxt('"already"')).toBe('"\\"already\\""');
    expect(quoteTxt('a\\b')).toBe('"a\\\\b"');
  });

  it('unquoteTxt reverses quoteTxt', () => {
    for (const text of ['plain', 'say "hi"', '"abc"', 'back\\slash', '', '\\"']) {
      expect(unquoteTxt(quoteTxt(text))).toBe(text);
    }
  });

  it('unquoteTxt leaves values that are not one quoted string alone', () => {
    expect(unquoteTxt('abc')).toBe('abc');
    expect(unquoteTxt('"a" "b"')).toBe('"a" "b"');
    expect(unquoteTxt('"')).toBe('"');
  });
});

describe('recordsEqual', () => {
  it('compares every field', () => {
    expect(recordsEqual(aRecord('www', '192.0.2.1'), aRecord('www', '192.0.2.1'))).toBe(true);
    expect(recordsEqual(aRecord('www', '192.0.2.1'), aRecord('www', '192.0.2.1', 60))).toBe(
      false
    );
  });
});
