import { z } from 'zod/v4';
import type { Auth, AuthOf } from '../auth.js';
import type { ConfigInput, FetchLike, ProviderOptions } from '../config.js';
import { toFqdn, toRelativeName } from '../domain.js';
import { notFound, providerError } from '../errors.js';
import {
  createHttpClient,
  type HttpClient,
  type HttpMethod,
  type RequestOptions,
} from '../http.js';
import { Once } from '../once.js';
import { defineProvider, singleRecord, type DnsProvider } from '../provider.js';
import {
  fromWireValue,
  isRecordKind,
  toWireValue,
  type DnsRecord,
  type RecordKind,
} from '../record.js';

const CF_API = 'https://api.cloudflare.com/client/v4';

const PAGE_SIZE = 100;

export interface CloudflareZone {
  id: string;
  name: string;
}

const EnvelopeSchema = z.object({
  success: z.boolean(),
  errors: z.array(z.object({ code: z.number(), message: z.string() })).optional(),
  result: z.unknown(),
  result_info: z.object({ page: z.number(), total_pages: z.number() }).optional(),
});

type Envelope = z.infer<typeof EnvelopeSchema>;

const ZoneSchema = z.object({ id: z.string(), name: z.string() });

const CfRecordSchema = z.object({
  id: z.string(),
  type: z.string(),
  name: z.string(),
  content: z.string(),
  ttl: z.number(),
});

type CfRecord = z.infer<typeof CfRecordSchema>;

interface CloudflareResult<T> {
  result: T;
  info: Envelope['result_info'];
}

interface CloudflareClient {
  /** Issue a request, check the envelope, then validate its `result` */
  call<S extends z.ZodType>(
    method: HttpMethod,
    path: string,
    schema: S,
    options?: RequestOptions
  ): Promise<CloudflareResult<z.output<S>>>;
  send: HttpClient['send'];
}

// Cloudflare can answer 200 with success: false
function checkSuccess(data: Envelope): void {
  if (!data.success) {
    const details =
      data.errors?.map((e) => `${e.code}: ${e.message}`).join(', ') || 'unknown error';
    throw providerError(`API error: ${details}`, { provider: 'cloudflare', providerMessage: details });
  }
}

function cloudflareClient(auth: AuthOf<'token'>, baseUrl: string, fetch?: FetchLike): CloudflareClient {
  const http = createHttpClient({
    provider: 'cloudflare',
    baseUrl,
    fetch,
    headers: () => ({ Authorization: `Bearer ${auth.token}` }),
  });

  return {
    async call(method, path, schema, options) {
      const data = await http.json(method, path, EnvelopeSchema, options);
      checkSuccess(data);

      const parsed = schema.safeParse(data.result);
      if (!parsed.success) {
        throw providerError(
          `${method} ${path} returned an unexpected result: ${z.prettifyError(parsed.error)}`,
          { provider: 'cloudflare' }
        );
      }
      return { result: parsed.data, info: data.result_info };
    },
    send: http.send,
  };
}

/**
 * List all zones (domains) accessible with the given API token.
 *
 * Useful for building a domain picker after the user provides a token.
 */
export async function listCloudflareZones(
  auth: AuthOf<'token'>,
  options: Pick<ProviderOptions, 'endpoint' | 'fetch'> = {}
): Promise<CloudflareZone[]> {
  const http = cloudflareClient(auth, options.endpoint ?? CF_API, options.fetch);
  const zones: CloudflareZone[] = [];
  let page = 1;

  while (true) {
    const { result, info } = await http.call('GET', '/zones', z.array(ZoneSchema), {
      query: { page, per_page: 50 },
    });

    for (const zone of result) {
      zones.push({ id: zone.id, name: zone.name });
    }

    if (!info || page >= info.total_pages) break;
    page++;
  }

  return zones;
}

/**
 * Cloudflare adapter.
 *
 * Records are addressed by fully-qualified name under a zone id, which is
 * taken from the `accountId` option or looked up once by domain name.
 */
export const cloudflareProvider = defineProvider({
  name: 'cloudflare',
  auth: ['token'],
  endpoint: CF_API,
  backend({ config, auth, endpoint, options, logger }) {
    const http = cloudflareClient(auth, endpoint, options.fetch);

    const zoneId = new Once(async () => {
      const { result } = await http.call('GET', '/zones', z.array(ZoneSchema), {
        query: { name: config.domain },
      });

      const zone = result[0];
      if (!zone) {
        throw notFound(`no zone found for domain "${config.domain}"`, { provider: 'cloudflare' });
      }
      logger.debug({ zoneId: zone.id }, 'Resolved zone id');
      return zone.id;
    }, options.accountId);

    async function recordsPath(): Promise<string> {
      return `/zones/${encodeURIComponent(await zoneId.get())}/dns_records`;
    }

    function toRecord(r: CfRecord, kind: RecordKind): DnsRecord {
      return {
        kind,
        host: toRelativeName(r.name, config.domain),
        value: fromWireValue(kind, r.content),
        ttl: r.ttl,
      };
    }

    async function find(host: string, kind: RecordKind): Promise<CfRecord | undefined> {
      const { result } = await http.call('GET', await recordsPath(), z.array(CfRecordSchema), {
        query: { name: toFqdn(host, config.domain), type: kind },
      });
      return singleRecord('cloudflare', host, kind, result);
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
          type: record.kind,
          name: toFqdn(record.host, config.domain),
          content: toWireValue(record.kind, record.value),
          ttl: record.ttl,
        };

        if (existing) {
          await http.call('PUT', `${path}/${existing.id}`, z.unknown(), { body });
        } else {
          await http.call('POST', path, z.unknown(), { body });
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
          const { result, info } = await http.call('GET', path, z.array(CfRecordSchema), {
            query: { type: kind, page, per_page: PAGE_SIZE },
          });

          for (const r of result) {
            if (isRecordKind(r.type)) records.push(toRecord(r, r.type));
          }

          if (!info || page >= info.total_pages) break;
          page++;
        }

        return records;
      },

      accountId: () => zoneId.get(),
    };
  },
});

/**
 * Create a Cloudflare DNS provider.
 *
 * Uses Cloudflare API v4 with native `fetch`. Pass the zone id as the
 * `accountId` option to skip the lookup by domain.
 */
export function cloudflare(config: ConfigInput, auth: Auth, options?: ProviderOptions): DnsProvider {
  return cloudflareProvider.connect(config, auth, options);
}
