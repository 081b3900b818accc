import { z } from 'zod/v4';
import type { Auth } from '../auth.js';
import type { ConfigInput, ProviderOptions } from '../config.js';
import { APEX } from '../domain.js';
import { notFound } from '../errors.js';
import { createHttpClient, type HttpClient } from '../http.js';
import { Once } from '../once.js';
import { defineProvider, singleRecord, type DnsProvider } from '../provider.js';
import {
  fromWireValue,
  isRecordKind,
  toWireValue,
  type DnsRecord,
  type RecordKind,
} from '../record.js';

const LINODE_API = 'https://api.linode.com/v4/domains';

function pageOf<T extends z.ZodType>(item: T) {
  return z.object({
    data: z.array(item),
    page: z.number().optional(),
    pages: z.number().optional(),
  });
}

const DomainSchema = z.object({ id: z.number(), domain: z.string() });

const LinodeRecordSchema = z.object({
  id: z.number(),
  name: z.string(),
  target: z.string(),
  type: z.string(),
  ttl_sec: z.number(),
});

type LinodeRecord = z.infer<typeof LinodeRecordSchema>;

/** Walk every page of a Linode collection */
async function collect<T extends z.ZodType>(
  http: HttpClient,
  path: string,
  schema: T
): Promise<z.output<T>[]> {
  const items: z.output<T>[] = [];
  const pageSchema = pageOf(schema);
  let page = 1;

  while (true) {
    const data = await http.json('GET', path, pageSchema, { query: { page } });
    items.push(...data.data);
    if (!data.pages || page >= data.pages) break;
    page++;
  }

  return items;
}

function toRecord(r: LinodeRecord, kind: RecordKind): DnsRecord {
  return {
    kind,
    host: r.name === '' ? APEX : r.name,
    value: fromWireValue(kind, r.target),
    ttl: r.ttl_sec,
  };
}

/**
 * Linode adapter.
 *
 * The records endpoint has no filters, so lookups fetch the domain's
 * records and match name and type locally. The domain id is found once in
 * the account's domain list.
 */
export const linodeProvider = defineProvider({
  name: 'linode',
  auth: ['token'],
  endpoint: LINODE_API,
  backend({ config, auth, endpoint, options, logger }) {
    const http = createHttpClient({
      provider: 'linode',
      baseUrl: endpoint,
      fetch: options.fetch,
      headers: () => ({ Authorization: `Bearer ${auth.token}` }),
    });

    const domainId = new Once(async () => {
      const domains = await collect(http, '', DomainSchema);
      const match = domains.find((d) => d.domain.toLowerCase() === config.domain);
      if (!match) {
        throw notFound(`no domain found for "${config.domain}"`, { provider: 'linode' });
      }
      const id = String(match.id);
      logger.debug({ domainId: id }, 'Resolved domain id');
      return id;
    }, options.accountId);

    async function recordsPath(): Promise<string> {
      return `/${encodeURIComponent(await domainId.get())}/records`;
    }

    async function allRecords(): Promise<LinodeRecord[]> {
      return collect(http, await recordsPath(), LinodeRecordSchema);
    }

    async function find(host: string, kind: RecordKind): Promise<LinodeRecord | undefined> {
      const name = host === APEX ? '' : host;
      const matches = (await allRecords()).filter((r) => r.type === kind && r.name === name);
      return singleRecord('linode', host, kind, matches);
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
          name: record.host === APEX ? '' : record.host,
          target: toWireValue(record.kind, record.value),
          ttl_sec: record.ttl,
          type: record.kind,
        };

        if (existing) {
          await http.send('PUT', `${path}/${existing.id}`, { body });
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
        return (await allRecords()).flatMap((r) =>
          isRecordKind(r.type) && (!kind || r.type === kind) ? [toRecord(r, r.type)] : []
        );
      },

      accountId: () => domainId.get(),
    };
  },
});

/**
 * Create a Linode DNS provider.
 *
 * Uses the Linode API v4 domains endpoints.
 */
export function linode(config: ConfigInput, auth: Auth, options?: ProviderOptions): DnsProvider {
  return linodeProvider.connect(config, auth, options);
}
