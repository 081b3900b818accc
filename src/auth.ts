import { z } from 'zod/v4';
import { invalidInput } from './errors.js';

/**
 * Credentials for a provider.
 *
 * Provider-agnostic: each adapter decides where a variant goes on the
 * wire (header, query parameter, body field or request signature).
 */
export type Auth =
  | { readonly type: 'apiKey'; readonly key: string }
  | { readonly type: 'keyAndSecret'; readonly key: string; readonly secret: string }
  | { readonly type: 'token'; readonly token: string };

export type AuthType = Auth['type'];

export type AuthOf<T extends AuthType> = Extract<Auth, { type: T }>;

export const AUTH_TYPES: readonly AuthType[] = ['apiKey', 'keyAndSecret', 'token'];

const credential = z.string().trim().min(1);

export const AuthSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('apiKey'), key: credential }),
  z.object({ type: z.literal('keyAndSecret'), key: credential, secret: credential }),
  z.object({ type: z.literal('token'), token: credential }),
]);

function required(field: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw invalidInput(`invalid credentials: ${field} is required`);
  }
  return trimmed;
}

export function apiKey(key: string): AuthOf<'apiKey'> {
  return Object.freeze({ type: 'apiKey', key: required('key', key) });
}

export function keyAndSecret(key: string, secret: string): AuthOf<'keyAndSecret'> {
  return Object.freeze({
    type: 'keyAndSecret',
    key: required('key', key),
    secret: required('secret', secret),
  });
}

export function token(value: string): AuthOf<'token'> {
  return Object.freeze({ type: 'token', token: required('token', value) });
}

/** Validate untyped credentials (e.g. from a parsed config file) */
export function parseAuth(input: unknown): Auth {
  const result = AuthSchema.safeParse(input);
  if (!result.success) {
    throw invalidInput(`invalid credentials: ${z.prettifyError(result.error)}`);
  }
  return Object.freeze(result.data);
}

export function isAuthOf<T extends AuthType>(
  auth: Auth,
  types: readonly T[]
): auth is AuthOf<T> {
  const allowed: readonly AuthType[] = types;
  return allowed.includes(auth.type);
}

function mask(secret: string): string {
  return secret.length > 8 ? `****${secret.slice(-4)}` : '****';
}

/** Render credentials for logs without exposing them */
export function describeAuth(auth: Auth): string {
  switch (auth.type) {
    case 'apiKey':
      return `apiKey(${mask(auth.key)})`;
    case 'keyAndSecret':
      return `keyAndSecret(${mask(auth.key)}, ****)`;
    case 'token':
      return `token(${mask(auth.token)})`;
  }
}
