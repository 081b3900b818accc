import { z } from 'zod/v4';
import type { Auth } from '../auth.js';
import type { ConfigInput, ProviderOptions } from '../config.js';
import { APEX } from '../domain.js';
import { invalidInput, providerError } from '../errors.js';
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

const DNSIMPLE_API = 'https://api.dnsimple.com/v2';

/** DNSimple's sandbox, for use as the `endpoint` option */
export const DNSIMPLE_SANDBOX_API = 'https://api.sandbox.dnsimple.com/v2';

const AccountsSchema = z.object({
  data: z.array(z.object({ id: z.number() })),
});

const ZoneRecordSchema = z.object({
  id: z.number(),
  name: z.string(),
  type: z.string(),
  content: z.string(),
  ttl: z.number(),
});

const ZoneRecordsSchema = z.object({
  data: z.array(ZoneRecordSchema),
  pagination: z
    .object({ current_page: z.number(), total_pages: z.number() })
    .optional(),
});

type ZoneRecord = z.infer<typeof ZoneRecordSchema>;

const PAGE_SIZE = 100;

/** DNSimple names the apex with an empty string */
function toName(host: string): string {
  return host === APEX ? '' : host;
}

function toRecord(r: ZoneRecord, kind: RecordKind): DnsRecord {
  return {
    kind,
    host: r.name === '' ? APEX : r.name,
    value: fromWireValue(kind, r.content),
    ttl: r.ttl,
  };
}

/**
 * DNSimple adapter.
 *
 * Every zone call is scoped to an account id. It is taken from the
 * `accountId` option or looked up once from `/accounts`, which must list
 * exactly one account for the token.
 */
export const dnsimpleProvider = defineProvider({
  name: 'dnsimple',
  auth: ['token'],
  endpoint: DNSIMPLE_API,
  backend({ config, auth, endpoint, options, logger }) {
    const http = createHttpClient({
      provider: 'dnsimple',
      baseUrl: endpoint,
      fetch: options.fetch,
      headers: () => ({ Authorization: `Bearer ${auth.token}` }),
    });

    const accountId = new Once(async () => {
      const accounts = await http.json('GET', '/accounts', AccountsSchema);
      const [first, ...rest] = accounts.data;
      if (!first) {
        throw providerError('no accounts returned for this token', { provider: 'dnsimple' });
      }
      if (rest.length) {
        throw invalidInput('more than one account returned; set the accountId option', {
          provider: 'dnsimple',
        });
      }
      const id = String(first.id);
      logger.debug({ accountId: id }, 'Resolved account id');
      return id;
    }, options.accountId);

    async function recordsPath(): Promise<string> {
      const id = await accountId.get();
      return `/${encodeURIComponent(id)}/zones/${encodeURIComponent(config.domain)}/records`;
    }

    async function find(host: string, kind: RecordKind): Promise<ZoneRecord | undefined> {
      const path = await recordsPath();
      const page = await http.json('GET', path, ZoneRecordsSchema, {
        query: { name: toName(host), type: kind },
      });
      return singleRecord('dnsimple', host, kind, page.data);
    }

    return {
      async get(host, kind) {
        const found = await find(host, kind);
        return found && toRecord(found, kind);
      },

      async upsert(record) {
        const existing = await find(record.host, record.kind);
        const path = await recordsPath();

        if (existing) {
          await http.send('PATCH', `${path}/${existing.id}`, {
            body: { content: toWireValue(record.kind, record.value), ttl: record.ttl },
          });
        } else {
          await http.send('POST', path, {
            body: {
              name: toName(record.host),
              type: record.kind,
              content: toWireValue(record.kind, record.value),
              ttl: record.ttl,
            },
          });
        }
      },

      async remove(host, kind) {
        const existing = await find(host, kind);
        if (!existing) return false;
        await http.send('DELETE', `${await recordsPath()}/${existing.id}`);
        return true;
      },

      async list(kind) {
        const path = await recordsPath();
        const records: DnsRecord[] = [];
        let page = 1;

        while (true) {
          const data = await http.json('GET', path, ZoneRecordsSchema, {
            query: { type: kind, page, per_page: PAGE_SIZE },
          });
          for (const r of data.data) {
            if (isRecordKind(r.type)) records.push(toRecord(r, r.type));
          }
          if (!data.pagination || page >= data.pagination.total_pages) break;
          page++;
        }

        return records;
      },

      accountId: () => accountId.get(),
    };
  },
});

/**
 * Create a DNSimple DNS provider.
 *
 * Uses the DNSimple API v2; pass `DNSIMPLE_SANDBOX_API` as `endpoint` for
 * the sandbox.
 */
export function dnsimple(config: ConfigInput, auth: Auth, options?: ProviderOptions): DnsProvider {
  return dnsimpleProvider.connect(config, auth, options);
}
