import { z } from 'zod/v4';
import { ConfigSchema } from '../config.js';
import { ZONE_ERROR_KINDS, ZoneError, toZoneError } from '../errors.js';
import { ProviderSpecSchema } from '../providers/index.js';
import { OPERATIONS } from './operations.js';

const SerializedErrorSchema = z.object({
  kind: z.enum(ZONE_ERROR_KINDS),
  message: z.string(),
  provider: z.string().optional(),
  status: z.number().optional(),
  providerMessage: z.string().optional(),
  /** Only the name and message of the underlying error cross the thread */
  cause: z.object({ name: z.string(), message: z.string() }).optional(),
});

export type SerializedError = z.infer<typeof SerializedErrorSchema>;

const EnvelopeSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), value: z.unknown() }),
  z.object({ ok: z.literal(false), error: SerializedErrorSchema }),
]);

/** Outcome of an operation in a form that survives structured cloning */
export type Envelope<T> = { ok: true; value: T } | { ok: false; error: SerializedError };

function serializeCause(cause: unknown): SerializedError['cause'] {
  if (cause === undefined) return undefined;
  return cause instanceof Error
    ? { name: cause.name, message: cause.message }
    : { name: 'Error', message: String(cause) };
}

export function serializeError(err: unknown): SerializedError {
  const error = toZoneError(err);
  return {
    kind: error.kind,
    message: error.message,
    provider: error.provider,
    status: error.status,
    providerMessage: error.providerMessage,
    cause: serializeCause(error.cause),
  };
}

export function deserializeError(error: SerializedError): ZoneError {
  let cause: Error | undefined;
  if (error.cause) {
    cause = new Error(error.cause.message);
    cause.name = error.cause.name;
  }
  // The message already carries its provider prefix
  return new ZoneError(error.kind, error.message, {
    provider: error.provider,
    status: error.status,
    providerMessage: error.providerMessage,
    cause,
  });
}

/** Resolve to an envelope; never rejects */
export async function settle<T>(work: Promise<T>): Promise<Envelope<T>> {
  try {
    return { ok: true, value: await work };
  } catch (err) {
    return { ok: false, error: serializeError(err) };
  }
}

export function unwrap<T>(envelope: Envelope<T>): T {
  if (!envelope.ok) throw deserializeError(envelope.error);
  return envelope.value;
}

// Messages between a blocking handle and the execution worker

const IdSchema = z.number().int();

export const WorkerRequestSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('open'),
    id: IdSchema,
    handle: IdSchema,
    spec: ProviderSpecSchema,
    config: ConfigSchema,
    /** Module URL exporting `createFetch()` */
    transportModule: z.string().optional(),
  }),
  z.object({
    type: z.literal('call'),
    id: IdSchema,
    handle: IdSchema,
    /** Arguments are checked against `OperationCallSchema` once the handle is known */
    call: z.object({ op: z.enum(OPERATIONS), args: z.array(z.unknown()) }),
  }),
  z.object({ type: z.literal('close'), id: IdSchema, handle: IdSchema }),
]);

export type WorkerRequest = z.infer<typeof WorkerRequestSchema>;
export type OpenRequest = Extract<WorkerRequest, { type: 'open' }>;

/** Reply id of the worker's startup signal */
export const READY_ID = 0;
/** Reply id the worker uses to report that it failed and can serve nothing more */
export const FAILED_ID = -1;

export const WorkerReplySchema = z.object({ id: IdSchema, envelope: EnvelopeSchema });

export type WorkerReply = z.infer<typeof WorkerReplySchema>;
