import { MessagePort, workerData } from 'node:worker_threads';
import { z } from 'zod/v4';
import type { FetchLike } from '../config.js';
import { invalidInput, transportFailure } from '../errors.js';
import { defaultLogger } from '../logger.js';
import type { DnsProvider } from '../provider.js';
import { createProvider } from '../providers/index.js';
import {
  FAILED_ID,
  READY_ID,
  WorkerRequestSchema,
  serializeError,
  settle,
  type OpenRequest,
  type WorkerReply,
  type WorkerRequest,
} from './envelope.js';
import { CapabilitiesSchema, OperationCallSchema, invokeCall } from './operations.js';

// Holds the provider handles of blocking callers and runs their operations

const WorkerDataSchema = z.object({
  port: z.instanceof(MessagePort),
  signal: z.instanceof(Int32Array),
});

interface TransportModule {
  createFetch(): FetchLike;
}

const { port, signal } = WorkerDataSchema.parse(workerData);
const logger = defaultLogger.child({ component: 'execution-worker' });
const handles = new Map<number, DnsProvider>();
let failed = false;

function isTransportModule(value: unknown): value is TransportModule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'createFetch' in value &&
    typeof value.createFetch === 'function'
  );
}

async function loadTransport(url: string): Promise<FetchLike> {
  const mod: unknown = await import(url);
  if (!isTransportModule(mod)) {
    throw invalidInput(`transport module ${url} does not export createFetch()`);
  }
  return mod.createFetch();
}

async function open(request: OpenRequest): Promise<unknown> {
  const options = request.transportModule
    ? { fetch: await loadTransport(request.transportModule) }
    : {};
  const provider = createProvider(request.spec, request.config, options);
  handles.set(request.handle, provider);
  logger.debug({ handle: request.handle, provider: provider.name }, 'Opened provider handle');
  return CapabilitiesSchema.parse(provider.capabilities);
}

async function serve(request: WorkerRequest): Promise<unknown> {
  switch (request.type) {
    case 'open':
      return open(request);
    case 'call': {
      const provider = handles.get(request.handle);
      if (!provider) {
        throw invalidInput('provider handle is closed');
      }
      const parsed = OperationCallSchema.safeParse(request.call);
      if (!parsed.success) {
        throw invalidInput(`malformed ${request.call.op} call`, { provider: provider.name });
      }
      return invokeCall(provider, parsed.data);
    }
    case 'close':
      handles.delete(request.handle);
      return undefined;
  }
}

function reply(message: WorkerReply): void {
  port.postMessage(message);
  Atomics.store(signal, 0, 1);
  Atomics.notify(signal, 0);
}

/** Tell every parked and future caller that this worker is done */
function fail(err: unknown): void {
  if (failed) return;
  failed = true;
  const message = err instanceof Error ? err.message : String(err);
  const error = transportFailure(`execution worker crashed: ${message}`, { cause: err });
  reply({ id: FAILED_ID, envelope: { ok: false, error: serializeError(error) } });
}

process.on('uncaughtException', (err) => {
  logger.error({ err }, 'Execution worker crashed');
  fail(err);
  process.exit(1);
});

process.on('exit', (code) => fail(`exited with code ${code}`));

port.on('message', (message: unknown) => {
  const parsed = WorkerRequestSchema.safeParse(message);
  if (!parsed.success) {
    fail(`malformed request: ${z.prettifyError(parsed.error)}`);
    return;
  }
  const request = parsed.data;
  void settle(serve(request))
    .then((envelope) => reply({ id: request.id, envelope }))
    .catch((err: unknown) => logger.error({ err, id: request.id }, 'Could not reply to request'));
});

reply({ id: READY_ID, envelope: { ok: true, value: undefined } });
