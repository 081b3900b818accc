import { z } from 'zod/v4';
import type { Auth } from '../auth.js';
import type { ConfigInput, ProviderOptions } from '../config.js';
import { APEX } from '../domain.js';
import { notFound, unsupported } from '../errors.js';
import { createHttpClient } from '../http.js';
import { Once } from '../once.js';
import { defineProvider, singleRecord, type DnsProvider } from '../provider.js';
import {
  RECORD_KINDS,
  fromWireValue,
  toWireValue,
  type DnsRecord,
  type RecordKind,
} from '../record.js';

const BUNNY_API = 'https://api.bunny.net/dnszone';

/** Bunny identifies record types by number */
const TYPE_CODES: Partial<Record<RecordKind, number>> = {
  A: 0,
  AAAA: 1,
  CNAME: 2,
  TXT: 3,
  MX: 4,
  SRV: 8,
  CAA: 9,
  PTR: 10,
  NS: 12,
};

const KINDS_BY_CODE = new Map<number, RecordKind>(
  RECORD_KINDS.flatMap((kind) => {
    const code = TYPE_CODES[kind];
    return code === undefined ? [] : [[code, kind] as const];
  })
);

const ZoneListSchema = z.object({
  Items: z.array(z.object({ Id: z.number(), Domain: z.string() })),
});

const BunnyRecordSchema = z.object({
  Id: z.number(),
  Type: z.number(),
  Name: z.string(),
  Value: z.string(),
  Ttl: z.number(),
});

const ZoneSchema = z.object({
  Records: z.array(BunnyRecordSchema),
});

type BunnyRecord = z.infer<typeof BunnyRecordSchema>;

function typeCode(kind: RecordKind): number {
  const code = TYPE_CODES[kind];
  if (code === undefined) {
    throw unsupported(`${kind} records are not supported`, { provider: 'bunny' });
  }
  return code;
}

function toRecord(r: BunnyRecord, kind: RecordKind): DnsRecord {
  return {
    kind,
    host: r.Name === '' ? APEX : r.Name,
    value: fromWireValue(kind, r.Value),
    ttl: r.Ttl,
  };
}

/**
 * Bunny DNS adapter.
 *
 * The zone is found once by searching for the domain; its records are
 * fetched whole and matched locally.
 */
export const bunnyProvider = defineProvider({
  name: 'bunny',
  auth: ['apiKey'],
  endpoint: BUNNY_API,
  backend({ config, auth, endpoint, options, logger }) {
    const http = createHttpClient({
      provider: 'bunny',
      baseUrl: endpoint,
      fetch: options.fetch,
      headers: () => ({ AccessKey: auth.key }),
    });

    const zoneId = new Once(async () => {
      const zones = await http.json('GET', '', ZoneListSchema, {
        query: { search: config.domain },
      });
      const zone = zones.Items.find((item) => item.Domain.toLowerCase() === config.domain);
      if (!zone) {
        throw notFound(`no zone found for domain "${config.domain}"`, { provider: 'bunny' });
      }
      const id = String(zone.Id);
      logger.debug({ zoneId: id }, 'Resolved zone id');
      return id;
    }, options.accountId);

    async function zonePath(): Promise<string> {
      return `/${encodeURIComponent(await zoneId.get())}`;
    }

    async function find(host: string, kind: RecordKind): Promise<BunnyRecord | undefined> {
      const code = typeCode(kind);
      const name = host === APEX ? '' : host;
      const zone = await http.json('GET', await zonePath(), ZoneSchema);
      const matches = zone.Records.filter((r) => r.Type === code && r.Name === name);
      return singleRecord('bunny', host, kind, matches);
    }

    return {
      async get(host, kind) {
        const found = await find(host, kind);
        return found && toRecord(found, kind);
      },

      async upsert(record) {
        const existing = await find(record.host, record.kind);
        const path = await zonePath();
        const body = {
          Type: typeCode(record.kind),
          Name: record.host === APEX ? '' : record.host,
          Value: toWireValue(record.kind, record.value),
          Ttl: record.ttl,
        };

        // Bunny creates with PUT and updates with POST
        if (existing) {
          await http.send('POST', `${path}/records/${existing.Id}`, { body });
        } else {
          await http.send('PUT', `${path}/records`, { body });
        }
      },

      async remove(host, kind) {
        const existing = await find(host, kind);
        if (!existing) return false;
        await http.send('DELETE', `${await zonePath()}/records/${existing.Id}`);
        return true;
      },

      async list(kind) {
        const zone = await http.json('GET', await zonePath(), ZoneSchema);
        return zone.Records.flatMap((r) => {
          const type = KINDS_BY_CODE.get(r.Type);
          return type && (!kind || type === kind) ? [toRecord(r, type)] : [];
        });
      },

      accountId: () => zoneId.get(),

      validate(kind) {
        typeCode(kind);
      },
    };
  },
});

/**
 * Create a Bunny DNS provider.
 *
 * Authenticates with the account API key in the `AccessKey` header.
 */
export function bunny(config: ConfigInput, auth: Auth, options?: ProviderOptions): DnsProvider {
  return bunnyProvider.connect(config, auth, options);
}
