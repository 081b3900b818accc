import { pino, type Logger } from 'pino';

export type { Logger };

export const defaultLogger: Logger = pino({
  name: 'dns-zone-edit',
  level: process.env.DNS_ZONE_EDIT_LOG_LEVEL ?? 'warn',
});
