import { z } from 'zod/v4';
import type { Ack, DnsProvider } from '../provider.js';
import { DnsRecordSchema, RecordKindSchema, type DnsRecord, type RecordKind } from '../record.js';

/** Contract operations, listed once for every execution front end */
export const OPERATIONS = [
  'getRecord',
  'setRecord',
  'deleteRecord',
  'listRecords',
  'resolveAccountId',
] as const;

export type OperationName = (typeof OPERATIONS)[number];

export interface OperationArgs {
  getRecord: [host: string, kind: RecordKind];
  setRecord: [host: string, kind: RecordKind, value: string, ttl?: number];
  deleteRecord: [host: string, kind: RecordKind];
  listRecords: [kind?: RecordKind];
  resolveAccountId: [];
}

export interface OperationResults {
  getRecord: DnsRecord;
  setRecord: Ack;
  deleteRecord: Ack;
  listRecords: DnsRecord[];
  resolveAccountId: string;
}

/** An operation and its arguments as plain, cloneable data */
export type OperationCall<K extends OperationName = OperationName> = {
  [P in K]: { op: P; args: OperationArgs[P] };
}[K];

type Dispatch = {
  [K in OperationName]: (
    provider: DnsProvider,
    args: OperationArgs[K]
  ) => Promise<OperationResults[K]>;
};

const DISPATCH: Dispatch = {
  getRecord: (provider, args) => provider.getRecord(...args),
  setRecord: (provider, args) => provider.setRecord(...args),
  deleteRecord: (provider, args) => provider.deleteRecord(...args),
  listRecords: (provider, args) => provider.listRecords(...args),
  resolveAccountId: (provider) => provider.resolveAccountId(),
};

/** The single dispatcher behind both execution front ends */
export function invokeOperation<K extends OperationName>(
  provider: DnsProvider,
  op: K,
  args: OperationArgs[K]
): Promise<OperationResults[K]> {
  return DISPATCH[op](provider, args);
}

/** Dispatch an operation received as data, e.g. from another thread */
export function invokeCall(provider: DnsProvider, call: OperationCall): Promise<unknown> {
  switch (call.op) {
    case 'getRecord':
      return invokeOperation(provider, call.op, call.args);
    case 'setRecord':
      return invokeOperation(provider, call.op, call.args);
    case 'deleteRecord':
      return invokeOperation(provider, call.op, call.args);
    case 'listRecords':
      return invokeOperation(provider, call.op, call.args);
    case 'resolveAccountId':
      return invokeOperation(provider, call.op, call.args);
  }
}

const HostSchema = z.string();

/** Validates an operation call received from another thread */
export const OperationCallSchema: z.ZodType<OperationCall> = z.discriminatedUnion('op', [
  z.object({ op: z.literal('getRecord'), args: z.tuple([HostSchema, RecordKindSchema]) }),
  z.object({
    op: z.literal('setRecord'),
    args: z.union([
      z.tuple([HostSchema, RecordKindSchema, z.string()]),
      z.tuple([HostSchema, RecordKindSchema, z.string(), z.number().optional()]),
    ]),
  }),
  z.object({ op: z.literal('deleteRecord'), args: z.tuple([HostSchema, RecordKindSchema]) }),
  z.object({
    op: z.literal('listRecords'),
    args: z.union([z.tuple([]), z.tuple([RecordKindSchema.optional()])]),
  }),
  z.object({ op: z.literal('resolveAccountId'), args: z.tuple([]) }),
]);

const AckSchema = z.object({
  operation: z.enum(['set', 'delete']),
  host: z.string(),
  kind: RecordKindSchema,
  dryRun: z.boolean(),
});

export const CapabilitiesSchema = z.object({
  listRecords: z.boolean(),
  accountId: z.boolean(),
});

/** Shapes of operation results as they arrive from another thread */
export const RESULT_SCHEMAS: { [K in OperationName]: z.ZodType<OperationResults[K]> } = {
  getRecord: DnsRecordSchema,
  setRecord: AckSchema,
  deleteRecord: AckSchema,
  listRecords: z.array(DnsRecordSchema),
  resolveAccountId: z.string(),
};
