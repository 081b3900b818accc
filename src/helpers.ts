import type { Ack, DnsProvider } from './provider.js';

// Shorthands for the two record types DDNS and DNS-01 clients touch

/** Text of the TXT record at `host`; adapters have already removed the wire quoting */
export async function getTxtRecord(provider: DnsProvider, host: string): Promise<string> {
  const record = await provider.getRecord(host, 'TXT');
  return record.value;
}

export function setTxtRecord(
  provider: DnsProvider,
  host: string,
  text: string,
  ttl?: number
): Promise<Ack> {
  return provider.setRecord(host, 'TXT', text, ttl);
}

export function deleteTxtRecord(provider: DnsProvider, host: string): Promise<Ack> {
  return provider.deleteRecord(host, 'TXT');
}

/** IPv4 address of the A record at `host` */
export async function getARecord(provider: DnsProvider, host: string): Promise<string> {
  const record = await provider.getRecord(host, 'A');
  return record.value;
}

export function setARecord(
  provider: DnsProvider,
  host: string,
  ip: string,
  ttl?: number
): Promise<Ack> {
  return provider.setRecord(host, 'A', ip, ttl);
}

export function deleteARecord(provider: DnsProvider, host: string): Promise<Ack> {
  return provider.deleteRecord(host, 'A');
}
