import { describeAuth, isAuthOf, type Auth, type AuthOf, type AuthType } from './auth.js';
import {
  DEFAULT_TTL,
  createConfig,
  type Config,
  type ConfigInput,
  type ProviderOptions,
} from './config.js';
import { normalizeHost } from './domain.js';
import {
  invalidInput,
  notFound,
  providerError,
  toZoneError,
  unsupported,
  type ZoneError,
} from './errors.js';
import { defaultLogger, type Logger } from './logger.js';
import {
  createRecord,
  formatRecord,
  isRecordKind,
  validateTtl,
  type DnsRecord,
  type RecordKind,
} from './record.js';

/** Acknowledgement of a write; identical in shape for live and dry-run calls */
export interface Ack {
  readonly operation: 'set' | 'delete';
  readonly host: string;
  readonly kind: RecordKind;
  readonly dryRun: boolean;
}

export interface ProviderCapabilities {
  /** `listRecords` is implemented */
  readonly listRecords: boolean;
  /** The provider works against an account or zone identifier */
  readonly accountId: boolean;
}

/**
 * The uniform interface every provider handle exposes.
 *
 * Record types are values, not type parameters, so handles for different
 * providers can be held and called interchangeably.
 */
export interface DnsProvider {
  readonly name: string;
  readonly config: Config;
  readonly capabilities: ProviderCapabilities;
  /** Fetch the record at `host`; rejects with NotFound when there is none */
  getRecord(host: string, kind: RecordKind): Promise<DnsRecord>;
  /** Create the record, or replace it when one exists */
  setRecord(host: string, kind: RecordKind, value: string, ttl?: number): Promise<Ack>;
  /** Remove the record; rejects with NotFound when there is none */
  deleteRecord(host: string, kind: RecordKind): Promise<Ack>;
  /** All records in the zone, optionally of one type; Unsupported where the API has no listing */
  listRecords(kind?: RecordKind): Promise<DnsRecord[]>;
  /** The account or zone identifier the provider works against; resolved once per handle */
  resolveAccountId(): Promise<string>;
}

/**
 * What a vendor adapter implements.
 *
 * Inputs arrive validated and normalised: hosts are relative ("@" for the
 * apex) and records carry a TTL.
 */
export interface ZoneBackend {
  /** The single record at host/kind, or undefined when there is none */
  get(host: string, kind: RecordKind): Promise<DnsRecord | undefined>;
  upsert(record: DnsRecord & { ttl: number }): Promise<void>;
  /** Returns false when there was nothing to delete */
  remove(host: string, kind: RecordKind): Promise<boolean>;
  list?(kind?: RecordKind): Promise<DnsRecord[]>;
  accountId?(): Promise<string>;
  /** Reject a record type the vendor cannot store; runs before any request, dry-run included */
  validate?(kind: RecordKind): void;
}

export interface BackendContext<A extends Auth> {
  config: Config;
  auth: A;
  /** Base URL: the provider default or the `endpoint` option */
  endpoint: string;
  options: ProviderOptions;
  logger: Logger;
}

export interface ProviderDefinition {
  readonly name: string;
  /** Credential variants the adapter can place on the wire */
  readonly auth: readonly AuthType[];
  readonly endpoint: string;
  connect(config: ConfigInput, auth: Auth, options?: ProviderOptions): DnsProvider;
}

export interface ProviderDefinitionInput<T extends AuthType> {
  name: string;
  auth: readonly T[];
  endpoint: string;
  backend(context: BackendContext<AuthOf<T>>): ZoneBackend;
}

/**
 * Turn a vendor backend into a provider definition.
 *
 * The returned `connect` builds handles that share one behaviour across
 * vendors: credentials are checked against the adapter at construction,
 * inputs are validated before any request, dry-run writes never reach the
 * backend, and every failure surfaces as a ZoneError.
 */
export function defineProvider<T extends AuthType>(
  input: ProviderDefinitionInput<T>
): ProviderDefinition {
  const { name } = input;

  function connect(config: ConfigInput, auth: Auth, options: ProviderOptions = {}): DnsProvider {
    if (!isAuthOf(auth, input.auth)) {
      throw unsupportedAuth(name, input.auth, auth);
    }
    const session = createConfig(config);
    const defaultTtl = validateTtl(options.ttl ?? DEFAULT_TTL);
    const logger = (options.logger ?? defaultLogger).child({
      provider: name,
      domain: session.domain,
    });

    logger.debug({ auth: describeAuth(auth), dryRun: session.dryRun }, 'Provider created');

    const backend = input.backend({
      config: session,
      auth,
      endpoint: options.endpoint ?? input.endpoint,
      options,
      logger,
    });

    function checkKind(kind: string): RecordKind {
      const known = checkRecordKind(name, kind);
      backend.validate?.(known);
      return known;
    }

    async function guarded<R>(body: () => Promise<R>): Promise<R> {
      try {
        return await body();
      } catch (err) {
        throw toZoneError(err, name);
      }
    }

    return {
      name,
      config: session,
      capabilities: {
        listRecords: backend.list !== undefined,
        accountId: backend.accountId !== undefined,
      },

      getRecord(host, kind) {
        return guarded(async () => {
          checkKind(kind);
          const relative = normalizeHost(host, session.domain);
          const record = await backend.get(relative, kind);
          if (!record) {
            logger.debug({ host: relative, kind }, 'Record not found');
            throw notFound(`no ${kind} record for "${relative}"`, { provider: name });
          }
          return record;
        });
      },

      setRecord(host, kind, value, ttl) {
        return guarded(async () => {
          const record = createRecord(
            { kind: checkKind(kind), host, value, ttl: ttl ?? defaultTtl },
            session.domain
          );
          const ack: Ack = { operation: 'set', host: record.host, kind, dryRun: session.dryRun };

          if (session.dryRun) {
            logger.info(`DRY-RUN: would set ${formatRecord(record)}`);
            return ack;
          }
          await backend.upsert({ ...record, ttl: record.ttl ?? defaultTtl });
          return ack;
        });
      },

      deleteRecord(host, kind) {
        return guarded(async () => {
          checkKind(kind);
          const relative = normalizeHost(host, session.domain);
          const ack: Ack = { operation: 'delete', host: relative, kind, dryRun: session.dryRun };

          if (session.dryRun) {
            logger.info(`DRY-RUN: would delete ${relative} ${kind}`);
            return ack;
          }
          const removed = await backend.remove(relative, kind);
          if (!removed) {
            throw notFound(`no ${kind} record for "${relative}" to delete`, { provider: name });
          }
          return ack;
        });
      },

      listRecords(kind) {
        return guarded(async () => {
          if (kind !== undefined) checkKind(kind);
          if (!backend.list) {
            throw unsupported('listing records is not supported', { provider: name });
          }
          return backend.list(kind);
        });
      },

      resolveAccountId() {
        return guarded(async () => {
          if (!backend.accountId) {
            throw unsupported('this provider has no account or zone identifier', {
              provider: name,
            });
          }
          return backend.accountId();
        });
      },
    };
  }

  return { name, auth: input.auth, endpoint: input.endpoint, connect };
}

/**
 * Reject record types outside the supported set; every operation checks
 * the type before anything else.
 */
export function checkRecordKind(provider: string, kind: string): RecordKind {
  if (!isRecordKind(kind)) {
    throw invalidInput(`unknown record type "${kind}"`, { provider });
  }
  return kind;
}

function unsupportedAuth(provider: string, accepted: readonly AuthType[], auth: Auth): ZoneError {
  return invalidInput(
    `${auth.type} credentials are not supported (expected ${accepted.join(' or ')})`,
    { provider }
  );
}

/** Throw InvalidInput unless the definition accepts this credential variant */
export function assertSupportedAuth(definition: ProviderDefinition, auth: Auth): void {
  if (!isAuthOf(auth, definition.auth)) {
    throw unsupportedAuth(definition.name, definition.auth, auth);
  }
}

/**
 * The one record at host/kind, or undefined when there is none.
 *
 * DDNS and DNS-01 work on single-valued record sets; more than one value
 * is reported rather than guessed at.
 */
export function singleRecord<R>(
  provider: string,
  host: string,
  kind: RecordKind,
  records: readonly R[]
): R | undefined {
  if (records.length > 1) {
    throw providerError(`expected a single ${kind} record for "${host}", got ${records.length}`, {
      provider,
    });
  }
  return records[0];
}
