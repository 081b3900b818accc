import { z } from 'zod/v4';
import type { Auth } from '../auth.js';
import type { ConfigInput, ProviderOptions } from '../config.js';
import { APEX, toRelativeName } from '../domain.js';
import { authFailed, errorFromStatus, providerError } from '../errors.js';
import { createHttpClient } from '../http.js';
import { defineProvider, singleRecord, type DnsProvider } from '../provider.js';
import {
  fromWireValue,
  isRecordKind,
  toWireValue,
  type DnsRecord,
  type RecordKind,
} from '../record.js';

const PORKBUN_API = 'https://api.porkbun.com/api/json/v3/dns';

// Porkbun sends ids and TTLs as strings
const PorkbunRecordSchema = z.object({
  id: z.coerce.string(),
  name: z.string(),
  type: z.string(),
  content: z.string(),
  ttl: z.coerce.number().optional(),
});

const RetrieveSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  records: z.array(PorkbunRecordSchema).optional(),
});

const StatusSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
});

type PorkbunRecord = z.infer<typeof PorkbunRecordSchema>;

/** Porkbun names the apex with an empty string */
function toName(host: string): string {
  return host === APEX ? '' : host;
}

function checkStatus(data: { status: string; message?: string | undefined }): void {
  if (data.status !== 'SUCCESS') {
    throw providerError(`request failed: ${data.message ?? data.status}`, {
      provider: 'porkbun',
      providerMessage: data.message,
    });
  }
}

/**
 * Porkbun adapter.
 *
 * Every call is a POST carrying the key pair in its JSON body; records are
 * addressed by numeric id after a lookup by name and type.
 */
export const porkbunProvider = defineProvider({
  name: 'porkbun',
  auth: ['keyAndSecret'],
  endpoint: PORKBUN_API,
  backend({ config, auth, endpoint, options }) {
    const http = createHttpClient({
      provider: 'porkbun',
      baseUrl: endpoint,
      fetch: options.fetch,
      // Bad keys come back as 400 rather than 401
      classify: (status, body) =>
        status === 400 && /invalid api key/i.test(body)
          ? authFailed(`API error ${status}: ${body}`, {
              provider: 'porkbun',
              status,
              providerMessage: body,
            })
          : errorFromStatus('porkbun', status, body),
    });

    const credentials = { apikey: auth.key, secretapikey: auth.secret };
    const domain = encodeURIComponent(config.domain);

    function toRecord(r: PorkbunRecord, kind: RecordKind): DnsRecord {
      return {
        kind,
        host: toRelativeName(r.name, config.domain),
        value: fromWireValue(kind, r.content),
        ...(r.ttl !== undefined ? { ttl: r.ttl } : {}),
      };
    }

    async function find(host: string, kind: RecordKind): Promise<PorkbunRecord | undefined> {
      const data = await http.json(
        'POST',
        `/retrieveByNameType/${domain}/${kind}/${encodeURIComponent(toName(host))}`,
        RetrieveSchema,
        { body: credentials }
      );
      checkStatus(data);
      return singleRecord('porkbun', host, kind, data.records ?? []);
    }

    return {
      async get(host, kind) {
        const found = await find(host, kind);
        return found && toRecord(found, kind);
      },

      async upsert(record) {
        const existing = await find(record.host, record.kind);
        const path = existing ? `/edit/${domain}/${existing.id}` : `/create/${domain}`;
        const data = await http.json('POST', path, StatusSchema, {
          body: {
            ...credentials,
            name: toName(record.host),
            type: record.kind,
            content: toWireValue(record.kind, record.value),
            ttl: String(record.ttl),
          },
        });
        checkStatus(data);
      },

      async remove(host, kind) {
        const existing = await find(host, kind);
        if (!existing) return false;
        const data = await http.json('POST', `/delete/${domain}/${existing.id}`, StatusSchema, {
          body: credentials,
        });
        checkStatus(data);
        return true;
      },

      async list(kind) {
        const data = await http.json('POST', `/retrieve/${domain}`, RetrieveSchema, {
          body: credentials,
        });
        checkStatus(data);
        return (data.records ?? []).flatMap((r) =>
          isRecordKind(r.type) && (!kind || r.type === kind) ? [toRecord(r, r.type)] : []
        );
      },
    };
  },
});

/**
 * Create a Porkbun DNS provider.
 *
 * Uses the Porkbun JSON API v3 with native `fetch`.
 */
export function porkbun(config: ConfigInput, auth: Auth, options?: ProviderOptions): DnsProvider {
  return porkbunProvider.connect(config, auth, options);
}
