/** Failure classes surfaced by every provider, independent of vendor */
export const ZONE_ERROR_KINDS = [
  'NotFound',
  'AuthFailed',
  'InvalidInput',
  'TransportFailure',
  'ProviderError',
  'Unsupported',
] as const;

export type ZoneErrorKind = (typeof ZONE_ERROR_KINDS)[number];

export interface ZoneErrorDetails {
  /** Provider the failing handle is bound to */
  provider?: string;
  /** HTTP status returned by the provider, when there was a response */
  status?: number;
  /** Response body or vendor error message, verbatim */
  providerMessage?: string;
  cause?: unknown;
}

export class ZoneError extends Error {
  readonly kind: ZoneErrorKind;
  readonly provider?: string;
  readonly status?: number;
  readonly providerMessage?: string;

  constructor(kind: ZoneErrorKind, message: string, details: ZoneErrorDetails = {}) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'ZoneError';
    this.kind = kind;
    this.provider = details.provider;
    this.status = details.status;
    this.providerMessage = details.providerMessage;
  }
}

function prefix(provider: string | undefined, message: string): string {
  return provider ? `${provider}: ${message}` : message;
}

export function notFound(message: string, details: ZoneErrorDetails = {}): ZoneError {
  return new ZoneError('NotFound', prefix(details.provider, message), details);
}

export function authFailed(message: string, details: ZoneErrorDetails = {}): ZoneError {
  return new ZoneError('AuthFailed', prefix(details.provider, message), details);
}

export function invalidInput(message: string, details: ZoneErrorDetails = {}): ZoneError {
  return new ZoneError('InvalidInput', prefix(details.provider, message), details);
}

export function transportFailure(message: string, details: ZoneErrorDetails = {}): ZoneError {
  return new ZoneError('TransportFailure', prefix(details.provider, message), details);
}

export function providerError(message: string, details: ZoneErrorDetails = {}): ZoneError {
  return new ZoneError('ProviderError', prefix(details.provider, message), details);
}

export function unsupported(message: string, details: ZoneErrorDetails = {}): ZoneError {
  return new ZoneError('Unsupported', prefix(details.provider, message), details);
}

export function isZoneError(err: unknown, kind?: ZoneErrorKind): err is ZoneError {
  return err instanceof ZoneError && (kind === undefined || err.kind === kind);
}

/**
 * Map a non-success HTTP status to the common taxonomy.
 *
 * 401/403 → AuthFailed, 404 → NotFound, anything else → ProviderError.
 * The body is kept verbatim for diagnosis.
 */
export function errorFromStatus(
  provider: string,
  status: number,
  body: string,
  context = 'API error'
): ZoneError {
  const message = `${context} ${status}: ${body}`;
  const details = { provider, status, providerMessage: body };

  if (status === 401 || status === 403) return authFailed(message, details);
  if (status === 404) return notFound(message, details);
  return providerError(message, details);
}

/**
 * Normalise anything thrown below the contract into a ZoneError.
 *
 * ZoneErrors pass through untouched; anything else is a failure of the
 * transport underneath the adapter and keeps the original as `cause`.
 */
export function toZoneError(err: unknown, provider?: string): ZoneError {
  if (err instanceof ZoneError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return transportFailure(`request failed: ${message}`, { provider, cause: err });
}
