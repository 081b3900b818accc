import { z } from 'zod/v4';
import type { Auth } from '../auth.js';
import type { ConfigInput, ProviderOptions } from '../config.js';
import { APEX } from '../domain.js';
import { createHttpClient, ifFound } from '../http.js';
import { defineProvider, singleRecord, type DnsProvider } from '../provider.js';
import {
  fromWireValue,
  isRecordKind,
  toWireValue,
  type DnsRecord,
  type RecordKind,
} from '../record.js';

const DESEC_API = 'https://desec.io/api/v1';

/** deSEC rejects TTLs below this */
export const DESEC_MIN_TTL = 3600;

const RrsetSchema = z.object({
  subname: z.string(),
  type: z.string(),
  ttl: z.number(),
  records: z.array(z.string()),
});

type DesecRrset = z.infer<typeof RrsetSchema>;

function flatten(rrset: DesecRrset, kind: RecordKind): DnsRecord[] {
  return rrset.records.map((value) => ({
    kind,
    host: rrset.subname === '' ? APEX : rrset.subname,
    value: fromWireValue(kind, value),
    ttl: rrset.ttl,
  }));
}

/**
 * deSEC adapter.
 *
 * Records are rrsets addressed by subname and type. The rrset URL takes
 * "@" for the apex while the body uses an empty subname.
 */
export const desecProvider = defineProvider({
  name: 'desec',
  auth: ['token'],
  endpoint: DESEC_API,
  backend({ config, auth, endpoint, options, logger }) {
    const http = createHttpClient({
      provider: 'desec',
      baseUrl: endpoint,
      fetch: options.fetch,
      headers: () => ({ Authorization: `Token ${auth.token}` }),
    });

    const zonePath = `/domains/${encodeURIComponent(config.domain)}/rrsets/`;

    function rrsetPath(host: string, kind: RecordKind): string {
      return `${zonePath}${encodeURIComponent(host)}/${kind}/`;
    }

    async function find(host: string, kind: RecordKind): Promise<DesecRrset | undefined> {
      return ifFound(http.json('GET', rrsetPath(host, kind), RrsetSchema));
    }

    return {
      async get(host, kind) {
        const rrset = await find(host, kind);
        if (!rrset) return undefined;
        return singleRecord('desec', host, kind, flatten(rrset, kind));
      },

      async upsert(record) {
        let ttl = record.ttl;
        if (ttl < DESEC_MIN_TTL) {
          logger.debug({ ttl, minimum: DESEC_MIN_TTL }, 'Raising TTL to the deSEC minimum');
          ttl = DESEC_MIN_TTL;
        }
        const records = [toWireValue(record.kind, record.value)];
        const existing = await find(record.host, record.kind);

        if (existing) {
          await http.send('PUT', rrsetPath(record.host, record.kind), {
            body: { ttl, records },
          });
        } else {
          await http.send('POST', zonePath, {
            body: {
              subname: record.host === APEX ? '' : record.host,
              type: record.kind,
              ttl,
              records,
            },
          });
        }
      },

      // DELETE on an absent rrset still answers 204
      async remove(host, kind) {
        if (!(await find(host, kind))) return false;
        await http.send('DELETE', rrsetPath(host, kind));
        return true;
      },

      async list(kind) {
        const rrsets = await http.json('GET', zonePath, z.array(RrsetSchema), {
          query: { type: kind },
        });
        return rrsets.flatMap((rrset) =>
          isRecordKind(rrset.type) && (!kind || rrset.type === kind)
            ? flatten(rrset, rrset.type)
            : []
        );
      },
    };
  },
});

/**
 * Create a deSEC DNS provider.
 *
 * TTLs below 3600 are raised to the deSEC minimum.
 */
export function desec(config: ConfigInput, auth: Auth, options?: ProviderOptions): DnsProvider {
  return desecProvider.connect(config, auth, options);
}
