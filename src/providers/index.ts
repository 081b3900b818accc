import { z } from 'zod/v4';
import { AuthSchema, type Auth, type AuthType } from '../auth.js';
import type { ConfigInput, ProviderOptions } from '../config.js';
import { invalidInput } from '../errors.js';
import type { DnsProvider, ProviderDefinition } from '../provider.js';
import { bunnyProvider } from './bunny.js';
import { cloudflareProvider } from './cloudflare.js';
import { desecProvider } from './desec.js';
import { digitaloceanProvider } from './digitalocean.js';
import { dnsimpleProvider } from './dnsimple.js';
import { dnsmadeeasyProvider } from './dnsmadeeasy.js';
import { gandiProvider } from './gandi.js';
import { linodeProvider } from './linode.js';
import { porkbunProvider } from './porkbun.js';

export const PROVIDER_NAMES = [
  'bunny',
  'cloudflare',
  'desec',
  'digitalocean',
  'dnsimple',
  'dnsmadeeasy',
  'gandi',
  'linode',
  'porkbun',
] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export const PROVIDERS: Readonly<Record<ProviderName, ProviderDefinition>> = {
  bunny: bunnyProvider,
  cloudflare: cloudflareProvider,
  desec: desecProvider,
  digitalocean: digitaloceanProvider,
  dnsimple: dnsimpleProvider,
  dnsmadeeasy: dnsmadeeasyProvider,
  gandi: gandiProvider,
  linode: linodeProvider,
  porkbun: porkbunProvider,
};

/**
 * Serialisable description of a provider handle: which adapter, which
 * credentials and the options that can travel as plain data.
 */
export const ProviderSpecSchema = z.object({
  name: z.enum(PROVIDER_NAMES),
  auth: AuthSchema,
  endpoint: z.url().optional(),
  accountId: z.string().min(1).optional(),
  ttl: z.number().int().min(1).optional(),
});

export type ProviderSpec = z.infer<typeof ProviderSpecSchema>;

export function isProviderName(value: string): value is ProviderName {
  const names: readonly string[] = PROVIDER_NAMES;
  return names.includes(value);
}

/** Validate an untyped provider description, e.g. from a config file */
export function parseProviderSpec(input: unknown): ProviderSpec {
  const result = ProviderSpecSchema.safeParse(input);
  if (!result.success) {
    throw invalidInput(`invalid provider spec: ${z.prettifyError(result.error)}`);
  }
  return result.data;
}

/** Credential variants the named adapter accepts */
export function supportedAuth(name: ProviderName): readonly AuthType[] {
  return PROVIDERS[name].auth;
}

/**
 * Build a provider handle, selecting the adapter at run time.
 *
 * Unknown names and unsupported credentials fail here, before any request.
 */
export function createProvider(
  spec: ProviderSpec,
  config: ConfigInput,
  options: Omit<ProviderOptions, 'endpoint' | 'accountId' | 'ttl'> = {}
): DnsProvider {
  const { name, auth, endpoint, accountId, ttl } = parseProviderSpec(spec);
  const credentials: Auth = auth;
  return PROVIDERS[name].connect(config, credentials, {
    ...options,
    ...(endpoint !== undefined ? { endpoint } : {}),
    ...(accountId !== undefined ? { accountId } : {}),
    ...(ttl !== undefined ? { ttl } : {}),
  });
}

export { bunny, bunnyProvider } from './bunny.js';
export { cloudflare, cloudflareProvider, listCloudflareZones, type CloudflareZone } from './cloudflare.js';
export { desec, desecProvider, DESEC_MIN_TTL } from './desec.js';
export { digitalocean, digitaloceanProvider } from './digitalocean.js';
export { dnsimple, dnsimpleProvider, DNSIMPLE_SANDBOX_API } from './dnsimple.js';
export {
  dnsmadeeasy,
  dnsmadeeasyProvider,
  DNSMADEEASY_SANDBOX_API,
  signRequest,
} from './dnsmadeeasy.js';
export { gandi, gandiProvider } from './gandi.js';
export { linode, linodeProvider } from './linode.js';
export { porkbun, porkbunProvider } from './porkbun.js';
