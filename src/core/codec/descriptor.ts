// src/core/codec/descriptor.ts
import type { AbiField, AbiType, JsonAbiParameter } from '../types/abi';
import { OP_TYPES } from '../types/errors';
import { createError } from '../errors/factory';
import { assertNever } from '../utils';

function schemaError(message: string, context: Record<string, unknown> = {}) {
  return createError('SCHEMA', { resource: 'types', operation: OP_TYPES.construct, message, context });
}

function assertBits(bits: number, kind: 'uint' | 'int') {
  if (!Number.isInteger(bits) || bits < 8 || bits > 256 || bits % 8 !== 0) {
    throw schemaError(`Invalid ${kind} width ${bits}: expected a multiple of 8 in 8..256.`, {
      type: `${kind}${bits}`,
    });
  }
}

/**
 * Descriptor constructors. Every descriptor is frozen; widths and lengths are
 * validated here so nothing downstream has to.
 */
export const abiType = {
  bool: (): AbiType => Object.freeze({ kind: 'bool' }),

  uint: (bits = 256): AbiType => {
    assertBits(bits, 'uint');
    return Object.freeze({ kind: 'uint', bits });
  },

  int: (bits = 256): AbiType => {
    assertBits(bits, 'int');
    return Object.freeze({ kind: 'int', bits });
  },

  address: (): AbiType => Object.freeze({ kind: 'address' }),

  fixedBytes: (size: number): AbiType => {
    if (!Number.isInteger(size) || size < 1 || size > 32) {
      throw schemaError(`Invalid fixed bytes size ${size}: expected 1..32.`, { type: `bytes${size}` });
    }
    return Object.freeze({ kind: 'fixedBytes', size });
  },

  bytes: (): AbiType => Object.freeze({ kind: 'bytes' }),

  string: (): AbiType => Object.freeze({ kind: 'string' }),

  fixedArray: (element: AbiType, length: number): AbiType => {
    if (!Number.isSafeInteger(length) || length < 1) {
      throw schemaError(`Invalid fixed array length ${length}: expected a positive integer.`, {
        type: `${formatAbiType(element)}[${length}]`,
      });
    }
    return Object.freeze({ kind: 'fixedArray', element, length });
  },

  array: (element: AbiType): AbiType => Object.freeze({ kind: 'array', element }),

  tuple: (components: readonly (AbiField | AbiType)[]): AbiType => {
    if (!components.length) throw schemaError('Tuples must have at least one component.');
    const fields = components.map((c, i) => ('kind' in c ? field(`${i}`, c) : field(c.name, c.type)));
    return Object.freeze({ kind: 'tuple', components: Object.freeze(fields) });
  },
};

export function field(name: string, type: AbiType): AbiField {
  return Object.freeze({ name, type });
}

// -----------------------------------------------------------------------------
// Canonical rendering & structural facts
// -----------------------------------------------------------------------------

/** Canonical type string, as used inside signatures. */
export function formatAbiType(type: AbiType): string {
  switch (type.kind) {
    case 'bool':
    case 'address':
    case 'bytes':
    case 'string':
      return type.kind;
    case 'uint':
    case 'int':
      return `${type.kind}${type.bits}`;
    case 'fixedBytes':
      return `bytes${type.size}`;
    case 'fixedArray':
      return `${formatAbiType(type.element)}[${type.length}]`;
    case 'array':
      return `${formatAbiType(type.element)}[]`;
    case 'tuple':
      return `(${type.components.map((c) => formatAbiType(c.type)).join(',')})`;
    default:
      return assertNever(type);
  }
}

/** `name(type1,type2,…)` */
export function formatSignature(name: string, fields: readonly AbiField[]): string {
  return `${name}(${fields.map((f) => formatAbiType(f.type)).join(',')})`;
}

/** Structural equality. Member names do not take part: they never reach the wire. */
export function isAbiTypeEqual(a: AbiType, b: AbiType): boolean {
  return formatAbiType(a) === formatAbiType(b);
}

export function isDynamicType(type: AbiType): boolean {
  switch (type.kind) {
    case 'bytes':
    case 'string':
    case 'array':
      return true;
    case 'fixedArray':
      return isDynamicType(type.element);
    case 'tuple':
      return type.components.some((c) => isDynamicType(c.type));
    default:
      return false;
  }
}

/** Bytes a value of this type occupies in its enclosing head. */
export function headSize(type: AbiType): number {
  if (isDynamicType(type)) return 32;
  if (type.kind === 'fixedArray') return type.length * headSize(type.element);
  if (type.kind === 'tuple') return type.components.reduce((n, c) => n + headSize(c.type), 0);
  return 32;
}

/** Value types travel in a topic as-is; everything else is hashed. */
export function isValueType(type: AbiType): boolean {
  switch (type.kind) {
    case 'bool':
    case 'uint':
    case 'int':
    case 'address':
    case 'fixedBytes':
      return true;
    default:
      return false;
  }
}

// -----------------------------------------------------------------------------
// Parsing
// -----------------------------------------------------------------------------

const ELEMENTARY = /^(uint|int|bytes)(\d*)$/;

function splitTopLevel(body: string, source: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === '(') depth++;
    else if (ch === ')') depth--;
    else if (ch === ',' && depth === 0) {
      parts.push(body.slice(start, i));
      start = i + 1;
    }
    if (depth < 0) break;
  }
  if (depth !== 0) throw parseError(source, 'unbalanced parentheses');
  parts.push(body.slice(start));
  return parts.map((p) => p.trim());
}

function parseError(text: string, reason: string) {
  return createError('SCHEMA', {
    resource: 'types',
    operation: OP_TYPES.parse,
    message: `Cannot parse ABI type "${text}": ${reason}.`,
    context: { type: text },
  });
}

function parseElementary(text: string): AbiType {
  switch (text) {
    case 'bool':
      return abiType.bool();
    case 'address':
      return abiType.address();
    case 'string':
      return abiType.string();
    case 'bytes':
      return abiType.bytes();
    case 'byte':
      return abiType.fixedBytes(1);
  }
  const m = ELEMENTARY.exec(text);
  if (!m) throw parseError(text, 'unknown elementary type');
  const [, base, digits] = m;
  if (digits.startsWith('0')) throw parseError(text, 'leading zero in size');
  if (base === 'bytes') return abiType.fixedBytes(Number(digits));
  const bits = digits ? Number(digits) : 256;
  return base === 'uint' ? abiType.uint(bits) : abiType.int(bits);
}

/**
 * Parses a type string as found in JSON ABIs or signatures.
 *
 * `tuple` (with any array suffix) takes its members from `components`;
 * inline tuples such as `(uint32,bytes)[]` are accepted too.
 */
export function parseAbiType(text: string, components?: readonly JsonAbiParameter[]): AbiType {
  const src = text.trim();

  const arr = /^(.*)\[(\d*)\]$/.exec(src);
  if (arr) {
    const [, inner, len] = arr;
    const element = parseAbiType(inner, components);
    if (len === '') return abiType.array(element);
    if (len.length > 1 && len.startsWith('0')) throw parseError(src, 'leading zero in length');
    return abiType.fixedArray(element, Number(len));
  }

  if (src === 'tuple') {
    if (!components?.length) throw parseError(src, 'tuple without components');
    return abiType.tuple(components.map((c) => field(c.name ?? '', parseAbiType(c.type, c.components))));
  }

  if (src.startsWith('(')) {
    if (!src.endsWith(')')) throw parseError(src, 'unterminated tuple');
    const body = src.slice(1, -1);
    if (!body.trim()) throw parseError(src, 'empty tuple');
    return abiType.tuple(splitTopLevel(body, src).map((part) => parseAbiType(part)));
  }

  return parseElementary(src);
}

/** Parses the parameter list of a signature, e.g. `uint32,bytes32,bytes`. */
export function parseTypeList(list: string): AbiType[] {
  const body = list.trim();
  if (!body) return [];
  return splitTopLevel(body, `(${body})`).map((part) => parseAbiType(part));
}
