// src/core/codec/decoder.ts
import type { AbiType, AbiValue } from '../types/abi';
import type { Hex } from '../types/primitives';
import { OP_DECODER, type TryResult } from '../types/errors';
import { createError } from '../errors/factory';
import { createErrorHandlers } from '../errors/error-ops';
import {
  assertNever,
  bytesToBigint,
  bytesToHex,
  bytesToUtf8,
  isZero,
  paddedLength,
  toBytes,
  toChecksumAddress,
  WORD,
} from '../utils';
import { abiValue } from './values';
import { formatAbiType, headSize, isDynamicType } from './descriptor';

const { wrapAs, toResult } = createErrorHandlers('decoder');

const TWO_255 = 1n << 255n;
const TWO_256 = 1n << 256n;

// Upper bound on bytes read per input byte; stops offset-aliasing blowups.
const MAX_INFLATION = 16;
const INFLATION_SLACK = 1024;

export interface DecodeOptions {
  /**
   * Require the layout to consume the whole buffer and every padding byte to
   * be zero. Off by default.
   */
  strict?: boolean;
}

interface Ctx {
  readonly data: Uint8Array;
  readonly strict: boolean;
  /** Furthest byte touched, for the trailing-bytes check. */
  end: number;
  read: number;
}

function decodingError(message: string, context: Record<string, unknown> = {}) {
  return createError('DECODING', {
    resource: 'decoder',
    operation: OP_DECODER.decode,
    message,
    context,
  });
}

function touch(ctx: Ctx, from: number, length: number, path: string): Uint8Array {
  const to = from + length;
  if (from < 0 || to > ctx.data.length) {
    throw decodingError(
      `Data too short at ${path}: need bytes ${from}..${to}, have ${ctx.data.length}.`,
      { path, offset: from, length: ctx.data.length },
    );
  }
  ctx.read += length;
  if (ctx.read > ctx.data.length * MAX_INFLATION + INFLATION_SLACK) {
    throw decodingError(`Excessive data inflation at ${path}.`, { path, offset: from });
  }
  if (to > ctx.end) ctx.end = to;
  return ctx.data.subarray(from, to);
}

function readWord(ctx: Ctx, pos: number, path: string): Uint8Array {
  return touch(ctx, pos, WORD, path);
}

/** Reads an offset or length word that must be usable as an index into the data. */
function readSize(ctx: Ctx, pos: number, path: string, what: 'offset' | 'length'): number {
  const raw = bytesToBigint(readWord(ctx, pos, path));
  if (raw > BigInt(ctx.data.length)) {
    throw decodingError(`${what === 'offset' ? 'Offset' : 'Length'} ${raw} at ${path} exceeds data size.`, {
      path,
      offset: pos,
      length: ctx.data.length,
    });
  }
  return Number(raw);
}

function checkPadding(ctx: Ctx, padding: Uint8Array, path: string, pos: number) {
  if (ctx.strict && !isZero(padding)) {
    throw decodingError(`Non-zero padding at ${path}.`, { path, offset: pos });
  }
}

function decodeStatic(ctx: Ctx, type: AbiType, pos: number, path: string): AbiValue {
  switch (type.kind) {
    case 'bool': {
      const word = readWord(ctx, pos, path);
      const raw = bytesToBigint(word);
      if (raw > 1n) throw decodingError(`Invalid bool at ${path}.`, { path, offset: pos, type: 'bool' });
      return abiValue.bool(raw === 1n);
    }
    case 'uint': {
      const raw = bytesToBigint(readWord(ctx, pos, path));
      if (raw >> BigInt(type.bits) !== 0n) {
        throw decodingError(`Value out of range for ${formatAbiType(type)} at ${path}.`, {
          path,
          offset: pos,
          type: formatAbiType(type),
        });
      }
      return abiValue.uint(raw);
    }
    case 'int': {
      const raw = bytesToBigint(readWord(ctx, pos, path));
      const value = raw >= TWO_255 ? raw - TWO_256 : raw;
      const limit = 1n << BigInt(type.bits - 1);
      if (value < -limit || value >= limit) {
        throw decodingError(`Value out of range for ${formatAbiType(type)} at ${path}.`, {
          path,
          offset: pos,
          type: formatAbiType(type),
        });
      }
      return abiValue.int(value);
    }
    case 'address': {
      const word = readWord(ctx, pos, path);
      if (!isZero(word.subarray(0, 12))) {
        throw decodingError(`Dirty high bytes in address at ${path}.`, { path, offset: pos, type: 'address' });
      }
      return abiValue.address(toChecksumAddress(bytesToHex(word.subarray(12))));
    }
    case 'fixedBytes': {
      const word = readWord(ctx, pos, path);
      checkPadding(ctx, word.subarray(type.size), path, pos);
      return abiValue.fixedBytes(bytesToHex(word.subarray(0, type.size)));
    }
    case 'fixedArray': {
      const element = type.element;
      return abiValue.array(decodeSequence(ctx, Array.from({ length: type.length }, () => element), pos, path));
    }
    case 'tuple':
      return abiValue.tuple(
        decodeSequence(
          ctx,
          type.components.map((c) => c.type),
          pos,
          path,
        ),
      );
    case 'bytes':
    case 'string':
    case 'array':
      throw decodingError(`Internal type tag inconsistency: ${type.kind} is not static.`, { path });
    default:
      return assertNever(type);
  }
}

function readDynamicBytes(ctx: Ctx, pos: number, path: string): Uint8Array {
  const length = readSize(ctx, pos, path, 'length');
  const content = touch(ctx, pos + WORD, length, path);
  if (ctx.strict) {
    const padding = touch(ctx, pos + WORD + length, paddedLength(length) - length, path);
    checkPadding(ctx, padding, path, pos);
  }
  return content;
}

/** Decodes the tail content of a dynamic type located at `pos`. */
function decodeDynamic(ctx: Ctx, type: AbiType, pos: number, path: string): AbiValue {
  switch (type.kind) {
    case 'bytes':
      return abiValue.bytes(bytesToHex(readDynamicBytes(ctx, pos, path)));
    case 'string': {
      const raw = readDynamicBytes(ctx, pos, path);
      try {
        return abiValue.string(bytesToUtf8(raw));
      } catch (e) {
        throw createError('DECODING', {
          resource: 'decoder',
          operation: OP_DECODER.decode,
          message: `Invalid UTF-8 string at ${path}.`,
          context: { path, offset: pos },
          cause: e,
        });
      }
    }
    case 'array': {
      const length = readSize(ctx, pos, path, 'length');
      const start = pos + WORD;
      // every element needs at least one head word
      if (length * WORD > ctx.data.length - Math.min(start, ctx.data.length)) {
        throw decodingError(`Array length ${length} at ${path} overruns the data.`, {
          path,
          offset: pos,
          length: ctx.data.length,
        });
      }
      const element = type.element;
      return abiValue.array(decodeSequence(ctx, Array.from({ length }, () => element), start, path));
    }
    default:
      // dynamic fixed arrays and tuples are laid out like a nested head/tail block
      return decodeStatic(ctx, type, pos, path);
  }
}

function decodeSequence(ctx: Ctx, types: readonly AbiType[], base: number, path: string): AbiValue[] {
  const out: AbiValue[] = [];
  let head = base;
  types.forEach((type, i) => {
    const at = `${path}[${i}]`;
    if (isDynamicType(type)) {
      const offset = readSize(ctx, head, at, 'offset');
      out.push(decodeDynamic(ctx, type, base + offset, at));
    } else {
      out.push(decodeStatic(ctx, type, head, at));
    }
    head += headSize(type);
  });
  return out;
}

/**
 * Decodes an ABI blob (no selector) into values shaped by `types`.
 *
 * Every offset and length is checked against the buffer before it is followed,
 * so truncated or hostile input fails with a `DECODING` error and never reads
 * out of bounds.
 */
export function decodeAbiParameters(
  types: readonly AbiType[],
  data: Hex | Uint8Array,
  opts: DecodeOptions = {},
): AbiValue[] {
  return wrapAs(
    'DECODING',
    OP_DECODER.decode,
    () => {
      const ctx: Ctx = { data: toBytes(data), strict: opts.strict ?? false, end: 0, read: 0 };
      const values = decodeSequence(ctx, types, 0, '$');
      if (ctx.strict && ctx.end !== ctx.data.length) {
        throw decodingError(`Unexpected ${ctx.data.length - ctx.end} trailing bytes.`, {
          offset: ctx.end,
          length: ctx.data.length,
        });
      }
      return values;
    },
    { message: 'Malformed data passed to the decoder.' },
  );
}

export function tryDecodeAbiParameters(
  types: readonly AbiType[],
  data: Hex | Uint8Array,
  opts: DecodeOptions = {},
): TryResult<AbiValue[]> {
  return toResult('DECODING', OP_DECODER.decode, () => decodeAbiParameters(types, data, opts));
}

/** Decodes a single value type stored in one 32-byte topic. */
export function decodeTopicValue(type: AbiType, topic: Hex, opts: DecodeOptions = {}): AbiValue {
  return wrapAs(
    'DECODING',
    OP_DECODER.topic,
    () => {
      if (isDynamicType(type) || headSize(type) !== WORD) {
        throw decodingError(`${formatAbiType(type)} cannot be read from a single topic.`, {
          type: formatAbiType(type),
        });
      }
      const ctx: Ctx = { data: toBytes(topic), strict: opts.strict ?? false, end: 0, read: 0 };
      if (ctx.data.length !== WORD) {
        throw decodingError(`Topic must be 32 bytes, received ${ctx.data.length}.`, {
          length: ctx.data.length,
        });
      }
      return decodeStatic(ctx, type, 0, '$');
    },
    { message: 'Malformed topic passed to the decoder.' },
  );
}
