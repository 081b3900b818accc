import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { MessageChannel, Worker, receiveMessageOnPort, type MessagePort } from 'node:worker_threads';
import { createConfig, type ConfigInput } from '../config.js';
import { invalidInput, transportFailure, type ZoneError } from '../errors.js';
import { defaultLogger } from '../logger.js';
import { assertSupportedAuth, checkRecordKind, type DnsProvider } from '../provider.js';
import { PROVIDERS, parseProviderSpec, type ProviderSpec } from '../providers/index.js';
import {
  FAILED_ID,
  READY_ID,
  WorkerReplySchema,
  deserializeError,
  unwrap,
  type WorkerReply,
  type WorkerRequest,
} from './envelope.js';
import {
  CapabilitiesSchema,
  RESULT_SCHEMAS,
  type OperationArgs,
  type OperationName,
  type OperationResults,
} from './operations.js';

/** Promise-returning methods of `T` turned into methods that return the value */
export type Blocking<T> = {
  readonly [K in keyof T]: T[K] extends (...args: infer A) => Promise<infer R>
    ? (...args: A) => R
    : T[K];
};

export type BlockingDnsProvider = Blocking<DnsProvider> & {
  /** Release the handle; later calls throw InvalidInput */
  close(): void;
};

export interface BlockingProviderOptions {
  /** How long a call may block before failing with TransportFailure; unbounded by default */
  timeoutMs?: number;
  /**
   * URL of a module exporting `createFetch()`, loaded inside the worker to
   * build the transport. Functions cannot cross threads, so this replaces
   * the `fetch` option.
   */
  transportModule?: string | URL;
}

// Bounds worker startup and opening a handle; `timeoutMs` bounds operations
const SETUP_TIMEOUT_MS = 10_000;

interface Bridge {
  port: MessagePort;
  signal: Int32Array;
  nextId: number;
  nextHandle: number;
  /** Set once the worker has died; every later call fails with it */
  failure?: ZoneError;
}

let bridge: Bridge | undefined;

function workerEntry(): URL {
  // Running from sources: a small entry registers the TypeScript loader first
  return extname(fileURLToPath(import.meta.url)) === '.ts'
    ? new URL('./worker-tsx.mjs', import.meta.url)
    : new URL('./worker.js', import.meta.url);
}

function markFailed(state: Bridge, failure: ZoneError): ZoneError {
  const recorded = state.failure ?? failure;
  state.failure = recorded;
  if (bridge === state) bridge = undefined;
  return recorded;
}

function take(state: Bridge, id: number): WorkerReply | undefined {
  for (
    let received = receiveMessageOnPort(state.port);
    received;
    received = receiveMessageOnPort(state.port)
  ) {
    const parsed = WorkerReplySchema.safeParse(received.message);
    if (!parsed.success) {
      throw markFailed(state, transportFailure('malformed reply from the execution worker'));
    }
    const reply = parsed.data;
    if (reply.id === FAILED_ID && !reply.envelope.ok) {
      throw markFailed(state, deserializeError(reply.envelope.error));
    }
    // Anything else answers a call that already timed out
    if (reply.id === id) return reply;
  }
  return undefined;
}

/** Park the calling thread until the worker answers `id` */
function awaitReply(state: Bridge, id: number, timeoutMs: number): unknown {
  const deadline = Date.now() + timeoutMs;

  while (true) {
    if (state.failure) throw state.failure;
    Atomics.store(state.signal, 0, 0);
    const reply = take(state, id);
    if (reply) return unwrap(reply.envelope);

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw transportFailure(`no reply from the execution worker within ${timeoutMs} ms`);
    }
    Atomics.wait(state.signal, 0, 0, remaining);
  }
}

function getBridge(): Bridge {
  if (bridge) return bridge;

  const { port1, port2 } = new MessageChannel();
  const signal = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
  const state: Bridge = { port: port1, signal, nextId: 1, nextHandle: 1 };

  const worker = new Worker(workerEntry(), {
    workerData: { port: port2, signal },
    transferList: [port2],
  });
  // These run between calls; a worker that dies while a caller is parked reports itself
  worker.on('error', (err) => {
    defaultLogger.error({ err }, 'Execution worker failed');
    markFailed(state, transportFailure(`execution worker failed: ${err.message}`, { cause: err }));
  });
  worker.on('exit', (code) => {
    defaultLogger.debug({ code }, 'Execution worker exited');
    markFailed(state, transportFailure(`execution worker exited with code ${code}`));
  });
  // Neither the worker nor its port keeps the process alive
  worker.unref();
  port1.unref();

  try {
    awaitReply(state, READY_ID, SETUP_TIMEOUT_MS);
  } catch (err) {
    void worker.terminate();
    throw err;
  }
  bridge = state;
  return state;
}

function checkKind(provider: string, op: OperationName, args: readonly unknown[]): void {
  const kind = op === 'listRecords' ? args[0] : args[1];
  if (kind !== undefined) checkRecordKind(provider, String(kind));
}

function exchange(state: Bridge, request: WorkerRequest, timeoutMs: number): unknown {
  state.port.postMessage(request);
  return awaitReply(state, request.id, timeoutMs);
}

/**
 * Build a provider handle whose operations return their result directly.
 *
 * The handle's provider lives on a shared worker thread; each call posts
 * the operation there and blocks the calling thread until it completes.
 * The spec, config and credentials are checked here, so an unsupported
 * credential variant fails before the worker is involved.
 */
export function createBlockingProvider(
  spec: ProviderSpec,
  config: ConfigInput,
  options: BlockingProviderOptions = {}
): BlockingDnsProvider {
  const parsed = parseProviderSpec(spec);
  const definition = PROVIDERS[parsed.name];
  assertSupportedAuth(definition, parsed.auth);
  const session = createConfig(config);
  const timeoutMs = options.timeoutMs ?? Infinity;

  const state = getBridge();
  const handle = state.nextHandle++;
  let closed = false;

  const opened = exchange(
    state,
    {
      type: 'open',
      id: state.nextId++,
      handle,
      spec: parsed,
      config: session,
      ...(options.transportModule !== undefined
        ? { transportModule: String(options.transportModule) }
        : {}),
    },
    SETUP_TIMEOUT_MS
  );
  const capabilities = CapabilitiesSchema.parse(opened);

  function bind<K extends OperationName>(op: K) {
    return (...args: OperationArgs[K]): OperationResults[K] => {
      if (closed) {
        throw invalidInput('provider handle is closed', { provider: definition.name });
      }
      // Same first check as the handle inside the worker, so errors match
      checkKind(definition.name, op, args);
      const value = exchange(
        state,
        { type: 'call', id: state.nextId++, handle, call: { op, args } },
        timeoutMs
      );
      return RESULT_SCHEMAS[op].parse(value);
    };
  }

  return {
    name: definition.name,
    config: session,
    capabilities,
    getRecord: bind('getRecord'),
    setRecord: bind('setRecord'),
    deleteRecord: bind('deleteRecord'),
    listRecords: bind('listRecords'),
    resolveAccountId: bind('resolveAccountId'),
    close() {
      if (closed) return;
      closed = true;
      // A dead worker holds no handles
      if (state.failure) return;
      exchange(state, { type: 'close', id: state.nextId++, handle }, timeoutMs);
    },
  };
}
