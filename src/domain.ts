import { invalidInput } from './errors.js';

/** Relative name of the zone apex */
export const APEX = '@';

const LABEL_RE = /^(\*|_?[a-z0-9]([a-z0-9_-]*[a-z0-9])?)$/;
const DOMAIN_RE = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?(\.[a-z0-9]([a-z0-9-]*[a-z0-9])?)*$/;

/**
 * Clean a domain input. Accepts email addresses, URLs, or bare domains.
 *
 * Examples:
 * - `user@example.com` → `example.com`
 * - `https://www.example.com/path` → `example.com`
 * - `www.example.com` → `example.com`
 * - `example.com` → `example.com`
 * - `EXAMPLE.COM.` → `example.com`
 */
export function cleanDomain(input: string): string {
  let domain = input.trim().toLowerCase();

  // Extract domain from email
  if (domain.includes('@')) {
    domain = domain.split('@').pop() ?? domain;
  }

  // Extract hostname from URL
  if (domain.includes('://')) {
    try {
      domain = new URL(domain).hostname;
    } catch {
      // If URL parsing fails, strip protocol manually
      domain = domain.split('://')[1]?.split('/')[0] ?? domain;
    }
  }

  // Remove path, query, fragment if present (non-URL input with path)
  domain = domain.split('/')[0] ?? domain;

  // Remove trailing dot (FQDN notation)
  if (domain.endsWith('.')) {
    domain = domain.slice(0, -1);
  }

  // Remove www prefix
  if (domain.startsWith('www.')) {
    domain = domain.slice(4);
  }

  return domain;
}

export function isValidDomain(domain: string): boolean {
  if (domain.length === 0 || domain.length > 253) return false;
  if (domain.split('.').some((label) => label.length === 0 || label.length > 63)) {
    return false;
  }
  return DOMAIN_RE.test(domain);
}

export function assertValidDomain(domain: string): void {
  if (!isValidDomain(domain)) {
    throw invalidInput(`invalid domain name "${domain}"`);
  }
}

/**
 * Normalise a caller-supplied host to a name relative to the zone.
 *
 * "www" → "www"
 * "WWW.example.com." with domain "example.com" → "www"
 * "example.com" or "" or "@" with domain "example.com" → "@"
 */
export function normalizeHost(host: string, domain?: string): string {
  let name = host.trim().toLowerCase();
  if (name.endsWith('.')) name = name.slice(0, -1);

  if (name === '' || name === APEX || name === domain) return APEX;

  const suffix = domain ? `.${domain}` : '';
  if (suffix && name.endsWith(suffix)) {
    name = name.slice(0, -suffix.length);
  }

  const labels = name.split('.');
  const fqdnLength = name.length + suffix.length;
  if (
    fqdnLength > 253 ||
    labels.some((label) => label.length === 0 || label.length > 63 || !LABEL_RE.test(label))
  ) {
    throw invalidInput(`invalid host "${host}"`);
  }

  return name;
}

/**
 * Convert a relative name to a fully-qualified domain name.
 *
 * "@" with domain "example.com" → "example.com"
 * "rm" with domain "example.com" → "rm.example.com"
 */
export function toFqdn(relativeName: string, domain: string): string {
  if (relativeName === APEX || relativeName === '') return domain;
  return `${relativeName}.${domain}`;
}

/**
 * Convert a fully-qualified domain name to a relative record name.
 *
 * "rm.example.com" with domain "example.com" → "rm"
 * "example.com" with domain "example.com" → "@"
 */
export function toRelativeName(fqdn: string, domain: string): string {
  let lower = fqdn.toLowerCase();
  if (lower.endsWith('.')) lower = lower.slice(0, -1);
  const zoneLower = domain.toLowerCase();

  if (lower === zoneLower || lower === '') return APEX;

  const suffix = `.${zoneLower}`;
  if (lower.endsWith(suffix)) {
    return lower.slice(0, -suffix.length);
  }

  return lower;
}
