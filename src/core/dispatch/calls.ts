// src/core/dispatch/calls.ts
import type { AbiValue, DecodedCall, FunctionSchema } from '../types/abi';
import type { Hex } from '../types/primitives';
import { OP_CALLS, type AbiCodecError, type TryResult } from '../types/errors';
import { createError } from '../errors/factory';
import { createErrorHandlers } from '../errors/error-ops';
import { bytesToHex, concatBytes, hexEq, hexToBytes, toBytes } from '../utils';
import { encodeAbiParametersToBytes } from '../codec/encoder';
import { decodeAbiParameters, tryDecodeAbiParameters, type DecodeOptions } from '../codec/decoder';
import { namedValues } from '../codec/values';
import { createSelectorTable } from './selector-table';

const { wrapAs, toResult } = createErrorHandlers('calls');

const SELECTOR_SIZE = 4;

const types = (fields: FunctionSchema['inputs']) => fields.map((f) => f.type);

// -----------------------------------------------------------------------------
// Single-schema operations
// -----------------------------------------------------------------------------

/** Selector followed by the encoded arguments. */
export function encodeFunctionData(schema: FunctionSchema, values: readonly AbiValue[]): Hex {
  return wrapAs(
    'ENCODING',
    OP_CALLS.encodeFunctionData,
    () =>
      bytesToHex(
        concatBytes(
          hexToBytes(schema.selector),
          encodeAbiParametersToBytes(types(schema.inputs), values),
        ),
      ),
    { ctx: { signature: schema.signature } },
  );
}

/** Decodes the arguments of a call known to target `schema`. */
export function decodeFunctionData(
  schema: FunctionSchema,
  data: Hex | Uint8Array,
  opts: DecodeOptions = {},
): AbiValue[] {
  return wrapAs(
    'DECODING',
    OP_CALLS.decodeCall,
    () => {
      const bytes = toBytes(data);
      const selector = bytesToHex(bytes.subarray(0, SELECTOR_SIZE));
      if (bytes.length < SELECTOR_SIZE || !hexEq(selector, schema.selector)) {
        throw createError('DECODING', {
          resource: 'calls',
          operation: OP_CALLS.decodeCall,
          message: `Call data does not start with ${schema.selector} (${schema.signature}).`,
          context: { selector, signature: schema.signature },
        });
      }
      return decodeAbiParameters(types(schema.inputs), bytes.subarray(SELECTOR_SIZE), opts);
    },
    { ctx: { signature: schema.signature } },
  );
}

/** Decodes the return data of a call made with `schema`. */
export function decodeFunctionResult(
  schema: FunctionSchema,
  data: Hex | Uint8Array,
  opts: DecodeOptions = {},
): AbiValue[] {
  return wrapAs(
    'DECODING',
    OP_CALLS.decodeFunctionResult,
    () => decodeAbiParameters(types(schema.outputs), data, opts),
    { ctx: { signature: schema.signature } },
  );
}

export function encodeFunctionResult(schema: FunctionSchema, values: readonly AbiValue[]): Hex {
  return wrapAs(
    'ENCODING',
    OP_CALLS.encodeFunctionResult,
    () => bytesToHex(encodeAbiParametersToBytes(types(schema.outputs), values)),
    { ctx: { signature: schema.signature } },
  );
}

export function toDecodedCall(schema: FunctionSchema, values: readonly AbiValue[]): DecodedCall {
  return {
    schema,
    name: schema.name,
    signature: schema.signature,
    selector: schema.selector,
    values,
    args: namedValues(schema.inputs, values),
  };
}

// -----------------------------------------------------------------------------
// Multiplexer
// -----------------------------------------------------------------------------

export interface CallMultiplexerOptions {
  /**
   * Reject candidates that leave trailing bytes or dirty padding.
   * Defaults to true: a lenient decode lets a shorter overload swallow the
   * call data of a longer one.
   */
  strict?: boolean;
  /** Log every rejected candidate through console.debug. */
  debug?: boolean;
}

export interface CallMultiplexer {
  /** Adds a schema; its position among same-selector schemas is its priority. */
  register(schema: FunctionSchema): Hex;
  /** Registered schemas in registration order. */
  schemas(): readonly FunctionSchema[];
  /** Schemas registered under `selector`, in the order they are tried. */
  candidates(selector: Hex): readonly FunctionSchema[];
  /** Throws `DECODING` or `NO_MATCHING_SCHEMA` on failure. */
  decodeCall(data: Hex | Uint8Array): DecodedCall;
  tryDecodeCall(data: Hex | Uint8Array): TryResult<DecodedCall>;
}

/**
 * Routes raw call data to the schema it was encoded with.
 *
 * Candidates are the schemas sharing the data's 4-byte selector, tried in
 * registration order; the first whose full argument decode succeeds wins.
 */
export function createCallMultiplexer(
  schemas: readonly FunctionSchema[] = [],
  opts: CallMultiplexerOptions = {},
): CallMultiplexer {
  const table = createSelectorTable<FunctionSchema>(SELECTOR_SIZE, OP_CALLS.register);
  const decodeOpts: DecodeOptions = { strict: opts.strict ?? true };

  const register = (schema: FunctionSchema) => table.register(schema.selector, schema);
  schemas.forEach(register);

  function decodeCall(data: Hex | Uint8Array): DecodedCall {
    const bytes = wrapAs('DECODING', OP_CALLS.decodeCall, () => toBytes(data), {
      message: 'Call data is not valid hex.',
    });
    if (bytes.length < SELECTOR_SIZE) {
      throw createError('DECODING', {
        resource: 'calls',
        operation: OP_CALLS.decodeCall,
        message: `Call data is ${bytes.length} bytes, shorter than a selector.`,
        context: { length: bytes.length },
      });
    }

    const selector = bytesToHex(bytes.subarray(0, SELECTOR_SIZE));
    const candidates = table.lookup(selector);
    if (!candidates) {
      throw createError('NO_MATCHING_SCHEMA', {
        resource: 'calls',
        operation: OP_CALLS.decodeCall,
        message: `Unknown call selector ${selector}.`,
        context: { selector },
      });
    }

    const body = bytes.subarray(SELECTOR_SIZE);
    let lastError: AbiCodecError | undefined;
    for (const schema of candidates) {
      const res = tryDecodeAbiParameters(types(schema.inputs), body, decodeOpts);
      if (res.ok) return toDecodedCall(schema, res.value);
      lastError = res.error;
      if (opts.debug) {
        console.debug(
          `[abi-mux] ${schema.signature} rejected for ${selector}:`,
          res.error.envelope.message,
        );
      }
    }

    throw createError('NO_MATCHING_SCHEMA', {
      resource: 'calls',
      operation: OP_CALLS.decodeCall,
      message: `No candidate for selector ${selector} decoded the call data.`,
      context: { selector, candidates: candidates.map((c) => c.signature) },
      cause: lastError?.envelope,
    });
  }

  return {
    register,
    schemas: () => table.entries(),
    candidates: (selector) => table.lookup(selector) ?? [],
    decodeCall,
    tryDecodeCall: (data) => toResult('DECODING', OP_CALLS.tryDecodeCall, () => decodeCall(data)),
  };
}
