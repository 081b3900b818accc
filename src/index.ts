export {
  APEX,
  assertValidDomain,
  cleanDomain,
  isValidDomain,
  normalizeHost,
  toFqdn,
  toRelativeName,
} from './domain.js';
export {
  DnsRecordSchema,
  RECORD_KINDS,
  RecordKindSchema,
  aRecord,
  createRecord,
  formatRecord,
  fromWireValue,
  isRecordKind,
  parseRecordKind,
  quoteTxt,
  recordsEqual,
  stripQuotes,
  toWireValue,
  txtRecord,
  unquoteTxt,
  validateRecordValue,
  validateTtl,
} from './record.js';
export type { DnsRecord, RecordInput, RecordKind } from './record.js';
export {
  AUTH_TYPES,
  AuthSchema,
  apiKey,
  describeAuth,
  isAuthOf,
  keyAndSecret,
  parseAuth,
  token,
} from './auth.js';
export type { Auth, AuthOf, AuthType } from './auth.js';
export { ConfigSchema, DEFAULT_TTL, createConfig } from './config.js';
export type { Config, ConfigInput, FetchLike, ProviderOptions } from './config.js';
export {
  ZONE_ERROR_KINDS,
  ZoneError,
  authFailed,
  errorFromStatus,
  invalidInput,
  isZoneError,
  notFound,
  providerError,
  toZoneError,
  transportFailure,
  unsupported,
} from './errors.js';
export type { ZoneErrorDetails, ZoneErrorKind } from './errors.js';
export { defaultLogger } from './logger.js';
export type { Logger } from './logger.js';
export { Once } from './once.js';
export { createHttpClient, ifFound, succeeded } from './http.js';
export type { HttpClient, HttpClientOptions, HttpMethod, Query, RequestOptions } from './http.js';
export {
  assertSupportedAuth,
  checkRecordKind,
  defineProvider,
  singleRecord,
} from './provider.js';
export type {
  Ack,
  BackendContext,
  DnsProvider,
  ProviderCapabilities,
  ProviderDefinition,
  ProviderDefinitionInput,
  ZoneBackend,
} from './provider.js';
export {
  DESEC_MIN_TTL,
  DNSIMPLE_SANDBOX_API,
  DNSMADEEASY_SANDBOX_API,
  PROVIDERS,
  PROVIDER_NAMES,
  ProviderSpecSchema,
  bunny,
  cloudflare,
  createProvider,
  desec,
  digitalocean,
  dnsimple,
  dnsmadeeasy,
  gandi,
  isProviderName,
  linode,
  listCloudflareZones,
  parseProviderSpec,
  porkbun,
  supportedAuth,
} from './providers/index.js';
export type { CloudflareZone, ProviderName, ProviderSpec } from './providers/index.js';
export { OPERATIONS, invokeOperation } from './execution/operations.js';
export type {
  OperationArgs,
  OperationCall,
  OperationName,
  OperationResults,
} from './execution/operations.js';
export { abandonOnAbort, createAsyncProvider } from './execution/suspend.js';
export type { AsyncProviderOptions } from './execution/suspend.js';
export { createBlockingProvider } from './execution/blocking.js';
export type {
  Blocking,
  BlockingDnsProvider,
  BlockingProviderOptions,
} from './execution/blocking.js';
export {
  deleteARecord,
  deleteTxtRecord,
  getARecord,
  getTxtRecord,
  setARecord,
  setTxtRecord,
} from './helpers.js';
