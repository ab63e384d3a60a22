import type { Hex } from '../types/primitives';

const RegExpHex = /^0x[0-9a-fA-F]*$/;

export const isHash = (x: unknown, length?: number): x is Hex => {
  if (!x || typeof x !== 'string') return false;
  return (length === undefined || x.length === length) && RegExpHex.test(x);
};

// Returns true if the string is a 0x-prefixed hex of length 66 (32 bytes + '0x')
export const isHash66 = (x: unknown): x is Hex => isHash(x, 66);
export const isNumber = (x: unknown): x is number => typeof x === 'number' && Number.isFinite(x);

export const isBigint = (x: unknown): x is bigint => typeof x === 'bigint';
