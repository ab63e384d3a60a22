// src/core/contract/codec.ts
import type {
  AbiValue,
  DecodedCall,
  DecodedEvent,
  EventSchema,
  FunctionSchema,
  JsonAbi,
  LogRecord,
} from '../types/abi';
import type { Hex } from '../types/primitives';
import { OP_CONTRACT, type TryResult } from '../types/errors';
import { createError } from '../errors/factory';
import { createErrorHandlers } from '../errors/error-ops';
import { formatSignature } from '../codec/descriptor';
import { defaultCodecDeps, type CodecDeps } from '../codec/hash';
import { toAbiValue, toAbiValues } from '../codec/values';
import { parseJsonAbi } from '../schema/json-abi';
import { parseDeclaration } from '../schema/signature';
import { toFields } from '../schema/function';
import {
  createCallMultiplexer,
  decodeFunctionResult,
  encodeFunctionData,
  type CallMultiplexer,
} from '../dispatch/calls';
import { createEventDemultiplexer, encodeEventTopics, type EventDemultiplexer } from '../dispatch/events';

const { wrapAs } = createErrorHandlers('contract');

export interface ContractCodecOptions {
  /** Label used in log lines and error context. */
  name?: string;
  deps?: CodecDeps;
  /** Strict decoding for routed calls. Defaults to true. */
  strict?: boolean;
  /** Log rejected dispatch candidates through console.debug. */
  debug?: boolean;
}

/** Function reference: a name, a signature, or an already resolved schema. */
export type FunctionRef = string | FunctionSchema;
export type EventRef = string | EventSchema;

export interface ContractCodec {
  readonly name: string;
  readonly functions: readonly FunctionSchema[];
  readonly events: readonly EventSchema[];
  readonly calls: CallMultiplexer;
  readonly logs: EventDemultiplexer;

  getFunction(ref: FunctionRef, arity?: number): FunctionSchema;
  getEvent(ref: EventRef): EventSchema;

  encodeFunctionData(ref: FunctionRef, args?: readonly unknown[]): Hex;
  decodeFunctionResult(ref: FunctionRef, data: Hex | Uint8Array): AbiValue[];
  decodeCall(data: Hex | Uint8Array): DecodedCall;
  tryDecodeCall(data: Hex | Uint8Array): TryResult<DecodedCall>;
  decodeLog(log: LogRecord): DecodedEvent;
  tryDecodeLog(log: LogRecord): TryResult<DecodedEvent>;
  /** Topic filter; `null` or `undefined` leaves an indexed field unconstrained. */
  eventTopics(ref: EventRef, args?: readonly unknown[]): (Hex | null)[];
}

/** `dispatch(uint32, bytes32 recipient, bytes)` → `dispatch(uint32,bytes32,bytes)` */
function canonicalSignature(text: string): string {
  const item = parseDeclaration(text);
  return formatSignature(item.name ?? '', toFields(item.inputs));
}

function resolve<T extends { name: string; signature: string }>(
  kind: 'function' | 'event',
  contract: string,
  items: readonly T[],
  ref: string,
  arity: (item: T) => number,
  wanted?: number,
): T {
  const operation = kind === 'function' ? OP_CONTRACT.getFunction : OP_CONTRACT.getEvent;

  if (ref.includes('(')) {
    const signature = wrapAs('SCHEMA', operation, () => canonicalSignature(ref), {
      message: `Malformed ${kind} signature "${ref}".`,
    });
    const hit = items.find((i) => i.signature === signature);
    if (hit) return hit;
    throw createError('SCHEMA', {
      resource: 'contract',
      operation,
      message: `${contract} has no ${kind} ${signature}.`,
      context: { signature },
    });
  }

  const named = items.filter((i) => i.name === ref);
  const matches = wanted === undefined ? named : named.filter((i) => arity(i) === wanted);
  if (matches.length === 1) return matches[0];

  throw createError('SCHEMA', {
    resource: 'contract',
    operation,
    message: matches.length
      ? `${kind} name "${ref}" is ambiguous on ${contract}; pass a full signature.`
      : `${contract} has no ${kind} "${ref}"${wanted === undefined ? '' : ` taking ${wanted} arguments`}.`,
    context: { candidates: named.map((i) => i.signature) },
  });
}

/**
 * Registry for one contract interface: ordered schemas, a call multiplexer and
 * an event demultiplexer, plus name-based helpers for building calls and
 * filters.
 *
 * Anonymous events stay available for topic building but are not routed, as
 * they carry no topic0.
 */
export function createContractCodec(
  abi: JsonAbi | readonly string[],
  opts: ContractCodecOptions = {},
): ContractCodec {
  const name = opts.name ?? 'contract';
  const deps = opts.deps ?? defaultCodecDeps;
  const { functions, events } = parseJsonAbi(abi, deps);

  const calls = createCallMultiplexer(functions, { strict: opts.strict ?? true, debug: opts.debug });
  const logs = createEventDemultiplexer([], { strict: opts.strict ?? false, debug: opts.debug });
  for (const event of events) {
    if (event.anonymous) {
      console.warn(`[abi-mux] ${name}: anonymous event ${event.signature} has no topic0, not routed.`);
      continue;
    }
    logs.register(event);
  }

  const getFunction = (ref: FunctionRef, arity?: number) =>
    typeof ref === 'string'
      ? resolve('function', name, functions, ref, (f) => f.inputs.length, arity)
      : ref;

  const getEvent = (ref: EventRef) =>
    typeof ref === 'string' ? resolve('event', name, events, ref, (e) => e.inputs.length) : ref;

  return {
    name,
    functions,
    events,
    calls,
    logs,
    getFunction,
    getEvent,

    encodeFunctionData(ref, args = []) {
      const schema = getFunction(ref, args.length);
      const values = toAbiValues(
        schema.inputs.map((f) => f.type),
        args,
      );
      return encodeFunctionData(schema, values);
    },

    decodeFunctionResult(ref, data) {
      return decodeFunctionResult(getFunction(ref), data, { strict: opts.strict ?? false });
    },

    decodeCall: (data) => calls.decodeCall(data),
    tryDecodeCall: (data) => calls.tryDecodeCall(data),
    decodeLog: (log) => logs.decodeLog(log),
    tryDecodeLog: (log) => logs.tryDecodeLog(log),

    eventTopics(ref, args = []) {
      const schema = getEvent(ref);
      const indexed = schema.inputs.filter((f) => f.indexed);
      if (args.length > indexed.length) {
        throw createError('ENCODING', {
          resource: 'contract',
          operation: OP_CONTRACT.eventTopics,
          message: `${schema.name} has ${indexed.length} indexed fields, received ${args.length} values.`,
          context: { signature: schema.signature },
        });
      }
      const values = args.map((arg, i) =>
        arg === null || arg === undefined ? null : toAbiValue(indexed[i].type, arg, `$[${i}]`),
      );
      return encodeEventTopics(schema, values, deps);
    },
  };
}
