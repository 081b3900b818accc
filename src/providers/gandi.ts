import { z } from 'zod/v4';
import type { Auth } from '../auth.js';
import type { ConfigInput, ProviderOptions } from '../config.js';
import { createHttpClient, ifFound, succeeded } from '../http.js';
import { defineProvider, singleRecord, type DnsProvider } from '../provider.js';
import {
  fromWireValue,
  isRecordKind,
  toWireValue,
  type DnsRecord,
  type RecordKind,
} from '../record.js';

const GANDI_API = 'https://api.gandi.net/v5/livedns';

const RrsetSchema = z.object({
  rrset_name: z.string(),
  rrset_type: z.string(),
  rrset_ttl: z.number().optional(),
  rrset_values: z.array(z.string()),
});

type GandiRrset = z.infer<typeof RrsetSchema>;

/**
 * Gandi LiveDNS adapter.
 *
 * Records are addressed as rrsets by relative name and type; a PUT on the
 * rrset replaces it or creates it, so upsert is a single request.
 * API keys are sent as `Apikey`, personal access tokens as `Bearer`.
 */
export const gandiProvider = defineProvider({
  name: 'gandi',
  auth: ['apiKey', 'token'],
  endpoint: GANDI_API,
  backend({ config, auth, endpoint, options }) {
    const http = createHttpClient({
      provider: 'gandi',
      baseUrl: endpoint,
      fetch: options.fetch,
      headers: () => ({
        Authorization: auth.type === 'apiKey' ? `Apikey ${auth.key}` : `Bearer ${auth.token}`,
      }),
    });

    const zonePath = `/domains/${encodeURIComponent(config.domain)}/records`;

    function rrsetPath(host: string, kind: RecordKind): string {
      return `${zonePath}/${encodeURIComponent(host)}/${kind}`;
    }

    function flatten(rrset: GandiRrset, kind: RecordKind): DnsRecord[] {
      return rrset.rrset_values.map((value) => ({
        kind,
        host: rrset.rrset_name,
        value: fromWireValue(kind, value),
        ...(rrset.rrset_ttl !== undefined ? { ttl: rrset.rrset_ttl } : {}),
      }));
    }

    return {
      async get(host, kind) {
        const rrset = await ifFound(http.json('GET', rrsetPath(host, kind), RrsetSchema));
        if (!rrset) return undefined;

        return singleRecord('gandi', host, kind, flatten(rrset, kind));
      },

      async upsert(record) {
        await http.send('PUT', rrsetPath(record.host, record.kind), {
          body: {
            rrset_values: [toWireValue(record.kind, record.value)],
            rrset_ttl: record.ttl,
          },
        });
      },

      async remove(host, kind) {
        return succeeded(http.send('DELETE', rrsetPath(host, kind)));
      },

      async list(kind) {
        const rrsets = await http.json('GET', zonePath, z.array(RrsetSchema), {
          query: { rrset_type: kind },
        });
        // Types outside the supported set (SOA, ALIAS, ...) are skipped
        return rrsets.flatMap((rrset) => {
          const type = rrset.rrset_type;
          if (!isRecordKind(type) || (kind && type !== kind)) return [];
          return flatten(rrset, type);
        });
      },
    };
  },
});

/**
 * Create a Gandi DNS provider.
 *
 * Uses Gandi LiveDNS API v5 with native `fetch`.
 */
export function gandi(config: ConfigInput, auth: Auth, options?: ProviderOptions): DnsProvider {
  return gandiProvider.connect(config, auth, options);
}
