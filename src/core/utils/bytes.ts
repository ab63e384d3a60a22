// src/core/utils/bytes.ts
import { bytesToHex as toHexBody, concatBytes, hexToBytes as fromHexBody, utf8ToBytes } from '@noble/hashes/utils';
import type { Hex } from '../types/primitives';
import { isHash } from './hash';

export { concatBytes, utf8ToBytes };

/** Size of one ABI word in bytes. */
export const WORD = 32;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export function bytesToHex(bytes: Uint8Array): Hex {
  return `0x${toHexBody(bytes)}`;
}

/** Parses 0x-prefixed hex. Throws on odd length or non-hex characters. */
export function hexToBytes(hex: string): Uint8Array {
  if (!isHash(hex)) throw new Error(`Expected 0x-prefixed hex, received "${hex.slice(0, 20)}".`);
  return fromHexBody(hex.slice(2));
}

/** Accepts either representation of a byte string. */
export function toBytes(data: Hex | Uint8Array): Uint8Array {
  return typeof data === 'string' ? hexToBytes(data) : data;
}

/** Decodes UTF-8, throwing on invalid sequences. */
export function bytesToUtf8(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

/** Rounds a byte length up to the next multiple of 32. */
export function paddedLength(n: number): number {
  return Math.ceil(n / WORD) * WORD;
}

/** Right-pads to a whole number of words. */
export function padRight(bytes: Uint8Array): Uint8Array {
  const out = new Uint8Array(paddedLength(bytes.length));
  out.set(bytes, 0);
  return out;
}

/** Left-pads to exactly one word. */
export function padLeft(bytes: Uint8Array, size = WORD): Uint8Array {
  if (bytes.length > size) throw new Error(`Value of ${bytes.length} bytes does not fit ${size}.`);
  const out = new Uint8Array(size);
  out.set(bytes, size - bytes.length);
  return out;
}

/** Big-endian unsigned bigint, read from an arbitrary slice. */
export function bytesToBigint(bytes: Uint8Array): bigint {
  return bytes.length === 0 ? 0n : BigInt(`0x${toHexBody(bytes)}`);
}

/** One 32-byte big-endian word. `value` must already be in `0..2^256-1`. */
export function bigintToWord(value: bigint): Uint8Array {
  return fromHexBody(value.toString(16).padStart(WORD * 2, '0'));
}

/** Concatenates any number of chunks into one buffer without spreading them as arguments. */
export function joinBytes(chunks: readonly Uint8Array[]): Uint8Array {
  let length = 0;
  for (const chunk of chunks) length += chunk.length;
  const out = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

export function isZero(bytes: Uint8Array): boolean {
  return bytes.every((b) => b === 0);
}
