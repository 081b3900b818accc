import { createHmac } from 'node:crypto';
import { z } from 'zod/v4';
import type { Auth } from '../auth.js';
import type { ConfigInput, ProviderOptions } from '../config.js';
import { APEX } from '../domain.js';
import { createHttpClient } from '../http.js';
import { Once } from '../once.js';
import { defineProvider, singleRecord, type DnsProvider } from '../provider.js';
import {
  fromWireValue,
  isRecordKind,
  toWireValue,
  type DnsRecord,
  type RecordKind,
} from '../record.js';

const DNSMADEEASY_API = 'https://api.dnsmadeeasy.com/V2.0';

/** DNS Made Easy's sandbox, for use as the `endpoint` option */
export const DNSMADEEASY_SANDBOX_API = 'https://api.sandbox.dnsmadeeasy.com/V2.0';

const DomainSchema = z.object({
  id: z.number(),
  name: z.string(),
});

const ManagedRecordSchema = z.object({
  id: z.number(),
  name: z.string(),
  type: z.string(),
  value: z.string(),
  ttl: z.number(),
});

const ManagedRecordsSchema = z.object({
  data: z.array(ManagedRecordSchema),
});

type ManagedRecord = z.infer<typeof ManagedRecordSchema>;

/**
 * Request signature: HMAC-SHA1 of the request date, keyed with the secret,
 * hex encoded.
 */
export function signRequest(secret: string, date: string): string {
  return createHmac('sha1', secret).update(date).digest('hex');
}

function toName(host: string): string {
  return host === APEX ? '' : host;
}

function toRecord(r: ManagedRecord, kind: RecordKind): DnsRecord {
  return {
    kind,
    host: r.name === '' ? APEX : r.name,
    value: fromWireValue(kind, r.value),
    ttl: r.ttl,
  };
}

/**
 * DNS Made Easy adapter.
 *
 * Requests are signed with the key/secret pair. Records live under the
 * managed domain's numeric id, looked up once by name.
 */
export const dnsmadeeasyProvider = defineProvider({
  name: 'dnsmadeeasy',
  auth: ['keyAndSecret'],
  endpoint: DNSMADEEASY_API,
  backend({ config, auth, endpoint, options, logger }) {
    const http = createHttpClient({
      provider: 'dnsmadeeasy',
      baseUrl: endpoint,
      fetch: options.fetch,
      headers: () => {
        const date = new Date().toUTCString();
        return {
          'x-dnsme-apiKey': auth.key,
          'x-dnsme-requestDate': date,
          'x-dnsme-hmac': signRequest(auth.secret, date),
        };
      },
    });

    const domainId = new Once(async () => {
      const domain = await http.json('GET', '/dns/managed/name', DomainSchema, {
        query: { domainname: config.domain },
      });
      const id = String(domain.id);
      logger.debug({ domainId: id }, 'Resolved domain id');
      return id;
    }, options.accountId);

    async function recordsPath(): Promise<string> {
      return `/dns/managed/${encodeURIComponent(await domainId.get())}/records`;
    }

    async function find(host: string, kind: RecordKind): Promise<ManagedRecord | undefined> {
      const data = await http.json('GET', await recordsPath(), ManagedRecordsSchema, {
        query: { recordName: toName(host), type: kind },
      });
      return singleRecord('dnsmadeeasy', host, kind, data.data);
    }

    return {
      async get(host, kind) {
        const found = await find(host, kind);
        return found && toRecord(found, kind);
      },

      async upsert(record) {
        const existing = await find(record.host, record.kind);
        const path = await recordsPath();
        const body = {
          name: toName(record.host),
          type: record.kind,
          value: toWireValue(record.kind, record.value),
          ttl: record.ttl,
          gtdLocation: 'DEFAULT',
        };

        if (existing) {
          await http.send('PUT', `${path}/${existing.id}`, { body: { id: existing.id, ...body } });
        } else {
          await http.send('POST', path, { body });
        }
      },

      async remove(host, kind) {
        const existing = await find(host, kind);
        if (!existing) return false;
        await http.send('DELETE', `${await recordsPath()}/${existing.id}`);
        return true;
      },

      async list(kind) {
        const data = await http.json('GET', await recordsPath(), ManagedRecordsSchema, {
          query: { type: kind },
        });
        return data.data.flatMap((r) => (isRecordKind(r.type) ? [toRecord(r, r.type)] : []));
      },

      accountId: () => domainId.get(),
    };
  },
});

/**
 * Create a DNS Made Easy provider.
 *
 * Pass `DNSMADEEASY_SANDBOX_API` as `endpoint` for the sandbox.
 */
export function dnsmadeeasy(config: ConfigInput, auth: Auth, options?: ProviderOptions): DnsProvider {
  return dnsmadeeasyProvider.connect(config, auth, options);
}
