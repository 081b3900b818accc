import { z } from 'zod/v4';
import { cleanDomain, isValidDomain } from './domain.js';
import { invalidInput } from './errors.js';
import type { Logger } from './logger.js';

/** Per-session configuration, owned by exactly one provider handle */
export interface Config {
  /** The zone being edited, e.g. "example.com" */
  readonly domain: string;
  /** Validate and log writes without sending them */
  readonly dryRun: boolean;
}

export const ConfigSchema = z.object({
  domain: z
    .string()
    .transform((value) => cleanDomain(value))
    .refine(isValidDomain, { message: 'must be a valid domain name' }),
  dryRun: z.boolean().default(false),
});

export type ConfigInput = z.input<typeof ConfigSchema>;

export function createConfig(input: ConfigInput): Config {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    throw invalidInput(`invalid config: ${z.prettifyError(result.error)}`);
  }
  return Object.freeze(result.data);
}

/** The HTTP transport adapters issue requests through */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** Optional per-handle settings */
export interface ProviderOptions {
  /** Base URL override, e.g. a vendor sandbox */
  endpoint?: string;
  /** Pre-fetched account or zone identifier; skips the lookup request */
  accountId?: string;
  /** TTL in seconds applied when a write does not give one (default 300) */
  ttl?: number;
  /** Transport override; defaults to the global `fetch` */
  fetch?: FetchLike;
  logger?: Logger;
}

export const DEFAULT_TTL = 300;
