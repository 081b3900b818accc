import { z } from 'zod/v4';
import type { Auth } from '../auth.js';
import type { ConfigInput, ProviderOptions } from '../config.js';
import { toFqdn } from '../domain.js';
import { createHttpClient } from '../http.js';
import { defineProvider, singleRecord, type DnsProvider } from '../provider.js';
import {
  fromWireValue,
  isRecordKind,
  toWireValue,
  type DnsRecord,
  type RecordKind,
} from '../record.js';

const DO_API = 'https://api.digitalocean.com/v2/domains';

const PAGE_SIZE = 100;

const DomainRecordSchema = z.object({
  id: z.number(),
  type: z.string(),
  // Relative, "@" for the apex
  name: z.string(),
  ttl: z.number(),
  data: z.string(),
});

const DomainRecordsSchema = z.object({
  domain_records: z.array(DomainRecordSchema),
  links: z
    .object({ pages: z.object({ next: z.string().optional() }).optional() })
    .optional(),
});

type DomainRecord = z.infer<typeof DomainRecordSchema>;

function toRecord(r: DomainRecord, kind: RecordKind): DnsRecord {
  return {
    kind,
    host: r.name,
    value: fromWireValue(kind, r.data),
    ttl: r.ttl,
  };
}

/**
 * DigitalOcean adapter.
 *
 * Lookups filter by type and fully-qualified name; records are then
 * addressed by numeric id.
 */
export const digitaloceanProvider = defineProvider({
  name: 'digitalocean',
  auth: ['token'],
  endpoint: DO_API,
  backend({ config, auth, endpoint, options }) {
    const http = createHttpClient({
      provider: 'digitalocean',
      baseUrl: endpoint,
      fetch: options.fetch,
      headers: () => ({ Authorization: `Bearer ${auth.token}` }),
    });

    const recordsPath = `/${encodeURIComponent(config.domain)}/records`;

    async function find(host: string, kind: RecordKind): Promise<DomainRecord | undefined> {
      const data = await http.json('GET', recordsPath, DomainRecordsSchema, {
        query: { type: kind, name: toFqdn(host, config.domain) },
      });
      return singleRecord('digitalocean', host, kind, data.domain_records);
    }

    return {
      async get(host, kind) {
        const found = await find(host, kind);
        return found && toRecord(found, kind);
      },

      async upsert(record) {
        const existing = await find(record.host, record.kind);
        const body = {
          type: record.kind,
          name: record.host,
          ttl: record.ttl,
          data: toWireValue(record.kind, record.value),
        };

        if (existing) {
          await http.send('PUT', `${recordsPath}/${existing.id}`, { body });
        } else {
          await http.send('POST', recordsPath, { body });
        }
      },

      async remove(host, kind) {
        const existing = await find(host, kind);
        if (!existing) return false;
        await http.send('DELETE', `${recordsPath}/${existing.id}`);
        return true;
      },

      async list(kind) {
        const records: DnsRecord[] = [];
        let page = 1;

        while (true) {
          const data = await http.json('GET', recordsPath, DomainRecordsSchema, {
            query: { type: kind, page, per_page: PAGE_SIZE },
          });
          for (const r of data.domain_records) {
            if (isRecordKind(r.type)) records.push(toRecord(r, r.type));
          }
          if (!data.links?.pages?.next) break;
          page++;
        }

        return records;
      },
    };
  },
});

/**
 * Create a DigitalOcean DNS provider.
 *
 * Uses the DigitalOcean API v2 domains endpoints.
 */
export function digitalocean(config: ConfigInput, auth: Auth, options?: ProviderOptions): DnsProvider {
  return digitaloceanProvider.connect(config, auth, options);
}
