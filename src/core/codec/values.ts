// src/core/codec/values.ts
import type { AbiField, AbiType, AbiValue, PlainValue } from '../types/abi';
import type { Address, Hex } from '../types/primitives';
import { OP_VALUES } from '../types/errors';
import { createError } from '../errors/factory';
import { assertNever, bytesToHex, isAddress, isHash } from '../utils';
import { formatAbiType } from './descriptor';

export const abiValue = {
  bool: (value: boolean): AbiValue => ({ kind: 'bool', value }),
  uint: (value: bigint | number): AbiValue => ({ kind: 'uint', value: BigInt(value) }),
  int: (value: bigint | number): AbiValue => ({ kind: 'int', value: BigInt(value) }),
  address: (value: Address): AbiValue => ({ kind: 'address', value }),
  fixedBytes: (value: Hex): AbiValue => ({ kind: 'fixedBytes', value }),
  bytes: (value: Hex): AbiValue => ({ kind: 'bytes', value }),
  string: (value: string): AbiValue => ({ kind: 'string', value }),
  array: (items: readonly AbiValue[]): AbiValue => ({ kind: 'array', items }),
  tuple: (items: readonly AbiValue[]): AbiValue => ({ kind: 'tuple', items }),
};

function shapeError(type: AbiType, path: string, expected: string, input: unknown) {
  const got = input === null ? 'null' : Array.isArray(input) ? 'array' : typeof input;
  return createError('ENCODING', {
    resource: 'values',
    operation: OP_VALUES.toAbiValue,
    message: `Expected ${expected} for ${formatAbiType(type)} at ${path}, received ${got}.`,
    context: { type: formatAbiType(type), path },
  });
}

function toHexInput(type: AbiType, path: string, input: unknown): Hex {
  if (input instanceof Uint8Array) return bytesToHex(input);
  if (isHash(input) && input.length % 2 === 0) return input;
  throw shapeError(type, path, 'an even-length 0x-hex string or Uint8Array', input);
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return x !== null && typeof x === 'object' && !Array.isArray(x) && !(x instanceof Uint8Array);
}

/**
 * Lifts a plain JS value into an AbiValue shaped by `type`.
 *
 * Integers accept `bigint` or safe integer `number`; byte strings accept hex
 * or `Uint8Array`; tuples accept positional arrays or objects keyed by member
 * name. Range and length checks are left to the encoder.
 */
export function toAbiValue(type: AbiType, input: unknown, path = '$'): AbiValue {
  switch (type.kind) {
    case 'bool':
      if (typeof input !== 'boolean') throw shapeError(type, path, 'a boolean', input);
      return abiValue.bool(input);
    case 'uint':
    case 'int':
      if (typeof input === 'bigint') return { kind: type.kind, value: input };
      if (typeof input === 'number' && Number.isSafeInteger(input)) {
        return { kind: type.kind, value: BigInt(input) };
      }
      throw shapeError(type, path, 'a bigint or safe integer', input);
    case 'address':
      if (!isAddress(input)) throw shapeError(type, path, 'a 20-byte 0x-hex address', input);
      return abiValue.address(input);
    case 'fixedBytes':
      return abiValue.fixedBytes(toHexInput(type, path, input));
    case 'bytes':
      return abiValue.bytes(toHexInput(type, path, input));
    case 'string':
      if (typeof input !== 'string') throw shapeError(type, path, 'a string', input);
      return abiValue.string(input);
    case 'fixedArray':
    case 'array': {
      if (!Array.isArray(input)) throw shapeError(type, path, 'an array', input);
      const element = type.element;
      return abiValue.array(input.map((item: unknown, i) => toAbiValue(element, item, `${path}[${i}]`)));
    }
    case 'tuple': {
      const { components } = type;
      if (Array.isArray(input)) {
        if (input.length !== components.length) {
          throw shapeError(type, path, `${components.length} members`, input);
        }
        return abiValue.tuple(
          input.map((item: unknown, i) => toAbiValue(components[i].type, item, `${path}.${i}`)),
        );
      }
      if (isRecord(input)) {
        return abiValue.tuple(
          components.map((c, i) => {
            const key = c.name || `${i}`;
            if (!(key in input)) throw shapeError(c.type, `${path}.${key}`, 'a value', undefined);
            return toAbiValue(c.type, input[key], `${path}.${key}`);
          }),
        );
      }
      throw shapeError(type, path, 'an array or object', input);
    }
    default:
      return assertNever(type);
  }
}

/** Lowers each descriptor/value pair at once; fails on cardinality mismatch. */
export function toAbiValues(types: readonly AbiType[], inputs: readonly unknown[]): AbiValue[] {
  if (types.length !== inputs.length) {
    throw createError('ENCODING', {
      resource: 'values',
      operation: OP_VALUES.toAbiValue,
      message: `Expected ${types.length} values, received ${inputs.length}.`,
      context: { length: inputs.length },
    });
  }
  return types.map((t, i) => toAbiValue(t, inputs[i], `$[${i}]`));
}

/** Plain JS projection: bigint, boolean, hex or text string, arrays. */
export function fromAbiValue(value: AbiValue): PlainValue {
  switch (value.kind) {
    case 'array':
    case 'tuple':
      return value.items.map(fromAbiValue);
    default:
      return value.value;
  }
}

/** Structural equality; hex payloads compare case-insensitively. */
export function isAbiValueEqual(a: AbiValue, b: AbiValue): boolean {
  if (a.kind !== b.kind) return false;
  if (a.kind === 'array' || a.kind === 'tuple') {
    if (b.kind !== 'array' && b.kind !== 'tuple') return false;
    return (
      a.items.length === b.items.length &&
      a.items.every((item, i) => isAbiValueEqual(item, b.items[i]))
    );
  }
  if (b.kind === 'array' || b.kind === 'tuple') return false;
  if (typeof a.value === 'string' && typeof b.value === 'string') {
    return a.kind === 'string' ? a.value === b.value : a.value.toLowerCase() === b.value.toLowerCase();
  }
  return a.value === b.value;
}

/**
 * Record keyed by field name, positional index for unnamed fields.
 * Stands in for the one-struct-per-function types of generated bindings.
 */
export function namedValues(
  fields: readonly AbiField[],
  values: readonly AbiValue[],
): Record<string, PlainValue> {
  if (fields.length !== values.length) {
    throw createError('ENCODING', {
      resource: 'values',
      operation: OP_VALUES.named,
      message: `Expected ${fields.length} values, received ${values.length}.`,
    });
  }
  // fromEntries defines own properties, so `__proto__` survives as a key
  return Object.fromEntries(
    fields.map((f, i): [string, PlainValue] => [f.name || `${i}`, fromAbiValue(values[i])]),
  );
}
