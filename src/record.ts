import { z } from 'zod/v4';
import { isValidDomain, normalizeHost } from './domain.js';
import { invalidInput } from './errors.js';

/** Record types every adapter must be able to encode */
export const RECORD_KINDS = [
  'A',
  'AAAA',
  'CAA',
  'CNAME',
  'HINFO',
  'MX',
  'NAPTR',
  'NS',
  'PTR',
  'SRV',
  'SPF',
  'SSHFP',
  'TXT',
] as const;

export type RecordKind = (typeof RECORD_KINDS)[number];

export const RecordKindSchema = z.enum(RECORD_KINDS);

/** A single DNS resource record, with `host` relative to the zone ("@" for the apex) */
export interface DnsRecord {
  readonly kind: RecordKind;
  readonly host: string;
  readonly value: string;
  /** Time to live in seconds */
  readonly ttl?: number;
}

export const DnsRecordSchema = z.object({
  kind: RecordKindSchema,
  host: z.string(),
  value: z.string(),
  ttl: z.number().optional(),
});

export interface RecordInput {
  kind: RecordKind;
  host: string;
  value: string;
  ttl?: number;
}

const MAX_TTL = 2_147_483_647;
const MAX_TEXT_LENGTH = 4096;

const Ipv4Schema = z.ipv4();
const Ipv6Schema = z.ipv6();

export function isRecordKind(value: string): value is RecordKind {
  return RecordKindSchema.safeParse(value).success;
}

export function parseRecordKind(value: string): RecordKind {
  const kind = value.trim().toUpperCase();
  if (!isRecordKind(kind)) {
    throw invalidInput(`unknown record type "${value}"`);
  }
  return kind;
}

function isHostValue(value: string): boolean {
  const name = value.endsWith('.') ? value.slice(0, -1) : value;
  return isValidDomain(name.toLowerCase());
}

function isUint16(value: string): boolean {
  return /^\d{1,5}$/.test(value) && Number(value) <= 65535;
}

function checkValue(kind: RecordKind, value: string): string | undefined {
  switch (kind) {
    case 'A':
      return Ipv4Schema.safeParse(value).success ? undefined : 'not an IPv4 address';
    case 'AAAA':
      return Ipv6Schema.safeParse(value).success ? undefined : 'not an IPv6 address';
    case 'CNAME':
    case 'NS':
    case 'PTR':
      return isHostValue(value) ? undefined : 'not a host name';
    case 'MX': {
      const [priority, host, ...rest] = value.split(/\s+/);
      if (rest.length || priority === undefined || host === undefined) {
        return 'expected "<priority> <host>"';
      }
      if (!isUint16(priority)) return 'priority must be 0-65535';
      return isHostValue(host) ? undefined : 'not a host name';
    }
    case 'SRV': {
      const [priority, weight, port, target, ...rest] = value.split(/\s+/);
      if (rest.length || target === undefined) {
        return 'expected "<priority> <weight> <port> <target>"';
      }
      if (![priority, weight, port].every((n) => n !== undefined && isUint16(n))) {
        return 'priority, weight and port must be 0-65535';
      }
      return target === '.' || isHostValue(target) ? undefined : 'not a host name';
    }
    case 'CAA': {
      const match = /^(\d{1,3})\s+([a-zA-Z0-9]+)\s+(.+)$/.exec(value);
      if (!match || Number(match[1]) > 255) {
        return 'expected "<flags> <tag> <value>"';
      }
      return undefined;
    }
    default:
      if (value.length > MAX_TEXT_LENGTH) return `longer than ${MAX_TEXT_LENGTH} characters`;
      return /[\r\n]/.test(value) ? 'contains a line break' : undefined;
  }
}

/** Reject a value whose shape does not match its record type */
export function validateRecordValue(kind: RecordKind, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw invalidInput(`empty ${kind} record value`);
  }
  const problem = checkValue(kind, trimmed);
  if (problem) {
    throw invalidInput(`invalid ${kind} record value "${value}": ${problem}`);
  }
  return trimmed;
}

export function validateTtl(ttl: number): number {
  if (!Number.isInteger(ttl) || ttl < 1 || ttl > MAX_TTL) {
    throw invalidInput(`invalid TTL ${ttl}: must be an integer between 1 and ${MAX_TTL}`);
  }
  return ttl;
}

/**
 * Build a validated record.
 *
 * With `domain`, a fully-qualified host inside that zone is made relative.
 */
export function createRecord(input: RecordInput, domain?: string): DnsRecord {
  if (!isRecordKind(input.kind)) {
    throw invalidInput(`unknown record type "${String(input.kind)}"`);
  }
  const host = normalizeHost(input.host, domain);
  const value = validateRecordValue(input.kind, input.value);

  return Object.freeze(
    input.ttl === undefined
      ? { kind: input.kind, host, value }
      : { kind: input.kind, host, value, ttl: validateTtl(input.ttl) }
  );
}

export function aRecord(host: string, ip: string, ttl?: number): DnsRecord {
  return createRecord({ kind: 'A', host, value: ip, ttl });
}

export function txtRecord(host: string, text: string, ttl?: number): DnsRecord {
  return createRecord({ kind: 'TXT', host, value: text, ttl });
}

export function recordsEqual(a: DnsRecord, b: DnsRecord): boolean {
  return a.kind === b.kind && a.host === b.host && a.value === b.value && a.ttl === b.ttl;
}

/** "www A 192.0.2.1 ttl=300" */
export function formatRecord(record: DnsRecord): string {
  const base = `${record.host} ${record.kind} ${record.value}`;
  return record.ttl === undefined ? base : `${base} ttl=${record.ttl}`;
}

/**
 * Remove one pair of surrounding double quotes.
 *
 * For vendors that store TXT content as sent but may hand it back quoted;
 * values without the pair are returned unchanged.
 */
export function stripQuotes(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

/** Zone-file form of a TXT value: always quoted, with `\` and `"` escaped */
export function quoteTxt(value: string): string {
  return `"${value.replace(/[\\"]/g, '\\$&')}"`;
}

/**
 * Inverse of `quoteTxt`.
 *
 * A value that is not a single quoted string is returned unchanged.
 */
export function unquoteTxt(value: string): string {
  const inner = /^"((?:[^"\\]|\\.)*)"$/s.exec(value)?.[1];
  if (inner === undefined) return value;
  return inner.replace(/\\(.)/gs, '$1');
}

/** A value in the form vendors store it: TXT text quoted, anything else as is */
export function toWireValue(kind: RecordKind, value: string): string {
  return kind === 'TXT' ? quoteTxt(value) : value;
}

/** Inverse of `toWireValue` */
export function fromWireValue(kind: RecordKind, value: string): string {
  return kind === 'TXT' ? unquoteTxt(value) : value;
}
