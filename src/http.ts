import { z } from 'zod/v4';
import type { FetchLike } from './config.js';
import {
  errorFromStatus,
  isZoneError,
  providerError,
  transportFailure,
  type ZoneError,
} from './errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type Query = Record<string, string | number | undefined>;

export interface HttpClientOptions {
  provider: string;
  baseUrl: string;
  /** Headers sent with every request; may depend on the request (signatures) */
  headers?: (method: HttpMethod, url: string, body: string) => Record<string, string>;
  fetch?: FetchLike;
  /**
   * Vendor-specific mapping of a failed response, consulted before the
   * generic status mapping. Return undefined to fall through.
   */
  classify?: (status: number, body: string) => ZoneError | undefined;
}

export interface RequestOptions {
  query?: Query;
  body?: unknown;
}

export interface HttpClient {
  readonly baseUrl: string;
  url(path: string, query?: Query): string;
  /** Issue a request whose response body is not needed */
  send(method: HttpMethod, path: string, options?: RequestOptions): Promise<void>;
  /** Issue a request and validate its JSON response against `schema` */
  json<S extends z.ZodType>(
    method: HttpMethod,
    path: string,
    schema: S,
    options?: RequestOptions
  ): Promise<z.output<S>>;
}

/**
 * JSON-over-HTTP client shared by the adapters.
 *
 * Uses `fetch` (the global one unless overridden) and maps every failure
 * onto the common error taxonomy.
 */
export function createHttpClient(options: HttpClientOptions): HttpClient {
  const { provider } = options;
  const baseUrl = options.baseUrl.replace(/\/+$/, '');

  function url(path: string, query?: Query): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) params.set(key, String(value));
    }
    const search = params.toString();
    return `${baseUrl}${path}${search ? `?${search}` : ''}`;
  }

  async function exchange(
    method: HttpMethod,
    path: string,
    opts: RequestOptions
  ): Promise<{ target: string; text: string }> {
    const target = url(path, opts.query);
    const body = opts.body !== undefined ? JSON.stringify(opts.body) : '';

    const headers = new Headers(options.headers?.(method, target, body));
    headers.set('Accept', 'application/json');
    if (body) headers.set('Content-Type', 'application/json');

    // Looked up per request so a replaced global is honoured
    const doFetch = options.fetch ?? globalThis.fetch;

    let res: Response;
    let text: string;
    try {
      res = await doFetch(target, {
        method,
        headers,
        ...(body ? { body } : {}),
      });
      text = await res.text();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw transportFailure(`${method} ${target} failed: ${reason}`, {
        provider,
        cause: err,
      });
    }

    if (!res.ok) {
      throw options.classify?.(res.status, text) ?? errorFromStatus(provider, res.status, text);
    }

    return { target, text };
  }

  async function send(method: HttpMethod, path: string, opts: RequestOptions = {}): Promise<void> {
    await exchange(method, path, opts);
  }

  async function json<S extends z.ZodType>(
    method: HttpMethod,
    path: string,
    schema: S,
    opts: RequestOptions = {}
  ): Promise<z.output<S>> {
    const { target, text } = await exchange(method, path, opts);

    let data: unknown;
    try {
      data = text ? JSON.parse(text) : undefined;
    } catch (err) {
      throw providerError(`${method} ${target} returned invalid JSON`, {
        provider,
        providerMessage: text,
        cause: err,
      });
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      throw providerError(
        `${method} ${target} returned an unexpected response: ${z.prettifyError(result.error)}`,
        { provider, providerMessage: text }
      );
    }
    return result.data;
  }

  return { baseUrl, url, send, json };
}

/** Resolve to undefined instead of rejecting when the resource is absent */
export async function ifFound<T>(request: Promise<T>): Promise<T | undefined> {
  try {
    return await request;
  } catch (err) {
    if (isZoneError(err, 'NotFound')) return undefined;
    throw err;
  }
}

/** True when the request succeeded, false when the resource was absent */
export async function succeeded(request: Promise<unknown>): Promise<boolean> {
  return (await ifFound(request.then(() => true))) ?? false;
}
