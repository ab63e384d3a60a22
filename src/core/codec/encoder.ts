// src/core/codec/encoder.ts
import type { AbiType, AbiValue } from '../types/abi';
import type { Hex } from '../types/primitives';
import { OP_ENCODER } from '../types/errors';
import { createError } from '../errors/factory';
import { createErrorHandlers } from '../errors/error-ops';
import {
  assertNever,
  bigintToWord,
  bytesToHex,
  concatBytes,
  joinBytes,
  hexToBytes,
  padLeft,
  padRight,
  utf8ToBytes,
} from '../utils';
import { formatAbiType, headSize, isDynamicType } from './descriptor';

const { wrapAs } = createErrorHandlers('encoder');

const TWO_256 = 1n << 256n;

function encodingError(message: string, type: AbiType, path: string) {
  return createError('ENCODING', {
    resource: 'encoder',
    operation: OP_ENCODER.encode,
    message,
    context: { type: formatAbiType(type), path },
  });
}

function assertKind<K extends AbiValue['kind']>(
  type: AbiType,
  value: AbiValue,
  kind: K,
  path: string,
): asserts value is Extract<AbiValue, { kind: K }> {
  if (value.kind !== kind) {
    throw encodingError(
      `Value of kind "${value.kind}" does not match ${formatAbiType(type)} at ${path}.`,
      type,
      path,
    );
  }
}

function assertCount(type: AbiType, expected: number, actual: number, path: string) {
  if (expected !== actual) {
    throw encodingError(
      `Expected ${expected} items for ${formatAbiType(type)} at ${path}, received ${actual}.`,
      type,
      path,
    );
  }
}

function encodeInteger(type: Extract<AbiType, { kind: 'uint' | 'int' }>, value: bigint, path: string) {
  const { bits } = type;
  const [min, max] =
    type.kind === 'uint'
      ? [0n, (1n << BigInt(bits)) - 1n]
      : [-(1n << BigInt(bits - 1)), (1n << BigInt(bits - 1)) - 1n];
  if (value < min || value > max) {
    throw encodingError(`Value ${value} is out of range for ${formatAbiType(type)} at ${path}.`, type, path);
  }
  return bigintToWord(value < 0n ? TWO_256 + value : value);
}

function encodeDynamicBytes(content: Uint8Array): Uint8Array {
  return concatBytes(bigintToWord(BigInt(content.length)), padRight(content));
}

/**
 * Encodes a list of values as one head/tail block.
 * Offsets in the head are relative to the start of this block.
 */
function encodeSequence(types: readonly AbiType[], values: readonly AbiValue[], path: string) {
  const headLength = types.reduce((n, t) => n + headSize(t), 0);
  const heads: Uint8Array[] = [];
  const tails: Uint8Array[] = [];
  let tailLength = 0;

  types.forEach((type, i) => {
    const encoded = encodeValue(type, values[i], `${path}[${i}]`);
    if (isDynamicType(type)) {
      heads.push(bigintToWord(BigInt(headLength + tailLength)));
      tails.push(encoded);
      tailLength += encoded.length;
    } else {
      heads.push(encoded);
    }
  });

  return joinBytes(heads.concat(tails));
}

/** Static types: their head bytes. Dynamic types: their tail content. */
function encodeValue(type: AbiType, value: AbiValue, path: string): Uint8Array {
  switch (type.kind) {
    case 'bool':
      assertKind(type, value, 'bool', path);
      return bigintToWord(value.value ? 1n : 0n);
    case 'uint':
    case 'int':
      assertKind(type, value, type.kind, path);
      return encodeInteger(type, value.value, path);
    case 'address': {
      assertKind(type, value, 'address', path);
      const raw = hexToBytes(value.value);
      if (raw.length !== 20) throw encodingError(`Address at ${path} is not 20 bytes.`, type, path);
      return padLeft(raw);
    }
    case 'fixedBytes': {
      assertKind(type, value, 'fixedBytes', path);
      const raw = hexToBytes(value.value);
      if (raw.length !== type.size) {
        throw encodingError(
          `Expected ${type.size} bytes for ${formatAbiType(type)} at ${path}, received ${raw.length}.`,
          type,
          path,
        );
      }
      return padRight(raw);
    }
    case 'bytes':
      assertKind(type, value, 'bytes', path);
      return encodeDynamicBytes(hexToBytes(value.value));
    case 'string':
      assertKind(type, value, 'string', path);
      return encodeDynamicBytes(utf8ToBytes(value.value));
    case 'fixedArray': {
      assertKind(type, value, 'array', path);
      assertCount(type, type.length, value.items.length, path);
      const element = type.element;
      return encodeSequence(value.items.map(() => element), value.items, path);
    }
    case 'array': {
      assertKind(type, value, 'array', path);
      const element = type.element;
      const types = value.items.map(() => element);
      return concatBytes(bigintToWord(BigInt(value.items.length)), encodeSequence(types, value.items, path));
    }
    case 'tuple': {
      assertKind(type, value, 'tuple', path);
      assertCount(type, type.components.length, value.items.length, path);
      return encodeSequence(
        type.components.map((c) => c.type),
        value.items,
        path,
      );
    }
    default:
      return assertNever(type);
  }
}

/**
 * ABI-encodes `values` against `types` (no selector).
 * Fails with an `ENCODING` error on any shape, range or cardinality mismatch.
 */
export function encodeAbiParametersToBytes(
  types: readonly AbiType[],
  values: readonly AbiValue[],
): Uint8Array {
  return wrapAs(
    'ENCODING',
    OP_ENCODER.encode,
    () => {
      if (types.length !== values.length) {
        throw createError('ENCODING', {
          resource: 'encoder',
          operation: OP_ENCODER.encode,
          message: `Expected ${types.length} values, received ${values.length}.`,
          context: { length: values.length },
        });
      }
      return encodeSequence(types, values, '$');
    },
    { message: 'Malformed value passed to the encoder.' },
  );
}

export function encodeAbiParameters(types: readonly AbiType[], values: readonly AbiValue[]): Hex {
  return bytesToHex(encodeAbiParametersToBytes(types, values));
}

/**
 * In-place encoding used for hashed indexed event arguments: value types are
 * padded words, byte strings are padded without a length prefix, arrays and
 * tuples are the concatenation of their members' in-place encodings.
 */
export function encodeInPlace(type: AbiType, value: AbiValue, path = '$'): Uint8Array {
  switch (type.kind) {
    case 'bytes':
      assertKind(type, value, 'bytes', path);
      return padRight(hexToBytes(value.value));
    case 'string':
      assertKind(type, value, 'string', path);
      return padRight(utf8ToBytes(value.value));
    case 'fixedArray':
    case 'array': {
      assertKind(type, value, 'array', path);
      if (type.kind === 'fixedArray') assertCount(type, type.length, value.items.length, path);
      const element = type.element;
      return joinBytes(value.items.map((item, i) => encodeInPlace(element, item, `${path}[${i}]`)));
    }
    case 'tuple': {
      assertKind(type, value, 'tuple', path);
      assertCount(type, type.components.length, value.items.length, path);
      const { components } = type;
      return joinBytes(
        value.items.map((item, i) => encodeInPlace(components[i].type, item, `${path}[${i}]`)),
      );
    }
    default:
      return encodeValue(type, value, path);
  }
}
