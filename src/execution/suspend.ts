import type { ConfigInput, ProviderOptions } from '../config.js';
import { defaultLogger, type Logger } from '../logger.js';
import type { DnsProvider } from '../provider.js';
import { createProvider, type ProviderSpec } from '../providers/index.js';
import {
  invokeOperation,
  type OperationArgs,
  type OperationName,
  type OperationResults,
} from './operations.js';

export interface AsyncProviderOptions extends Omit<ProviderOptions, 'endpoint' | 'accountId' | 'ttl'> {
  /** Abandon every pending call on this handle when the signal aborts */
  signal?: AbortSignal;
}

/**
 * Let a caller stop waiting for `request`.
 *
 * When `signal` aborts, the returned promise rejects with the signal's
 * reason. The request itself is not cancelled: it runs to completion and
 * its outcome is discarded, so an abandoned write may still have been
 * applied.
 */
export function abandonOnAbort<T>(
  signal: AbortSignal,
  request: Promise<T>,
  logger: Logger = defaultLogger
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      logger.debug('Caller abandoned a pending request');
      reject(signal.reason);
    };

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    // Settling an already rejected promise is a no-op, so a late outcome is dropped
    void request.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Build a provider handle for callers that suspend on promises.
 *
 * Every method goes through `invokeOperation`, the dispatcher the blocking
 * front end uses as well.
 */
export function createAsyncProvider(
  spec: ProviderSpec,
  config: ConfigInput,
  options: AsyncProviderOptions = {}
): DnsProvider {
  const { signal, ...providerOptions } = options;
  const provider = createProvider(spec, config, providerOptions);
  const logger = options.logger ?? defaultLogger;

  function bind<K extends OperationName>(op: K) {
    return (...args: OperationArgs[K]): Promise<OperationResults[K]> => {
      // An abandoned handle sends nothing
      if (signal?.aborted) {
        logger.debug({ op }, 'Skipped call on an aborted handle');
        return Promise.reject(signal.reason);
      }
      const pending = invokeOperation(provider, op, args);
      return signal ? abandonOnAbort(signal, pending, logger) : pending;
    };
  }

  return {
    name: provider.name,
    config: provider.config,
    capabilities: provider.capabilities,
    getRecord: bind('getRecord'),
    setRecord: bind('setRecord'),
    deleteRecord: bind('deleteRecord'),
    listRecords: bind('listRecords'),
    resolveAccountId: bind('resolveAccountId'),
  };
}
