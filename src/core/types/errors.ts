// src/core/types/errors.ts

import { formatEnvelopePretty } from '../errors/formatter';

const hasSymbolInspect = typeof Symbol === 'function' && typeof Symbol.for === 'function';
const kInspect: symbol | undefined = hasSymbolInspect
  ? Symbol.for('nodejs.util.inspect.custom')
  : undefined;

/**
 * Broad failure category.
 *
 * - `SCHEMA`: malformed type descriptor or interface definition (fatal at startup)
 * - `ENCODING`: value does not match its descriptor (caller bug, never retried)
 * - `DECODING`: malformed, truncated or out-of-range wire data (expected for untrusted input)
 * - `NO_MATCHING_SCHEMA`: selector/topic unknown, or no candidate decoded
 * - `TRANSPORT`: the injected call transport failed
 */
export type ErrorType = 'SCHEMA' | 'ENCODING' | 'DECODING' | 'NO_MATCHING_SCHEMA' | 'TRANSPORT';

/** Codec surface */
export type Resource =
  | 'types'
  | 'values'
  | 'encoder'
  | 'decoder'
  | 'schema'
  | 'selectors'
  | 'calls'
  | 'events'
  | 'contract'
  | 'transport';

/** Envelope we throw for every codec-domain error. */
export interface ErrorEnvelope {
  /** Codec surface that raised the error. */
  resource: Resource;
  /** Operation, e.g. 'calls.decodeCall' */
  operation: string;
  /** Broad category */
  type: ErrorType;
  /** Human-readable, stable message for developers. */
  message: string;

  /** Optional detail (selector, offset, type path…) */
  context?: Record<string, unknown>;

  /** Original thrown error */
  cause?: unknown;
}

/**
 * Error class for every failure raised by the codec.
 * The envelope keeps the structured detail; `message` is its pretty rendering.
 */
export class AbiCodecError extends Error {
  constructor(public readonly envelope: ErrorEnvelope) {
    super(formatEnvelopePretty(envelope), envelope.cause ? { cause: envelope.cause } : undefined);
    this.name = 'AbiCodecError';
  }

  get type(): ErrorType {
    return this.envelope.type;
  }

  toJSON() {
    return { name: this.name, ...this.envelope };
  }
}

if (kInspect) {
  Object.defineProperty(AbiCodecError.prototype, kInspect, {
    value(this: AbiCodecError) {
      return `${this.name}: ${formatEnvelopePretty(this.envelope)}`;
    },
    enumerable: false,
  });
}

//  ---- Type guards ----
export function isAbiCodecError(e: unknown): e is AbiCodecError {
  if (e instanceof AbiCodecError) return true;
  if (!e || typeof e !== 'object' || !('envelope' in e)) return false;

  const envelope: unknown = e.envelope;
  if (!envelope || typeof envelope !== 'object') return false;
  return (
    'type' in envelope &&
    typeof envelope.type === 'string' &&
    'message' in envelope &&
    typeof envelope.message === 'string'
  );
}

export function isErrorOfType(e: unknown, type: ErrorType): e is AbiCodecError {
  return isAbiCodecError(e) && e.envelope.type === type;
}

// TryResult type for operations that can fail without throwing
export type TryResult<T> = { ok: true; value: T } | { ok: false; error: AbiCodecError };

export const OP_TYPES = {
  construct: 'types.construct',
  parse: 'types.parse',
} as const;

export const OP_VALUES = {
  toAbiValue: 'values.toAbiValue',
  named: 'values.namedValues',
} as const;

export const OP_ENCODER = {
  encode: 'encoder.encodeAbiParameters',
} as const;

export const OP_DECODER = {
  decode: 'decoder.decodeAbiParameters',
  topic: 'decoder.decodeTopic',
} as const;

export const OP_SCHEMA = {
  defineFunction: 'schema.defineFunction',
  defineEvent: 'schema.defineEvent',
  parseJsonAbi: 'schema.parseJsonAbi',
} as const;

export const OP_CALLS = {
  register: 'calls.register',
  decodeCall: 'calls.decodeCall',
  tryDecodeCall: 'calls.tryDecodeCall',
  encodeFunctionData: 'calls.encodeFunctionData',
  decodeFunctionResult: 'calls.decodeFunctionResult',
  encodeFunctionResult: 'calls.encodeFunctionResult',
} as const;

export const OP_EVENTS = {
  register: 'events.register',
  decodeLog: 'events.decodeLog',
  tryDecodeLog: 'events.tryDecodeLog',
  encodeTopics: 'events.encodeEventTopics',
  encodeLog: 'events.encodeEventLog',
} as const;

export const OP_CONTRACT = {
  getFunction: 'contract.getFunction',
  getEvent: 'contract.getEvent',
  eventTopics: 'contract.eventTopics',
  read: 'contract.read',
} as const;

export const OP_TRANSPORT = {
  call: 'transport.call',
} as const;
