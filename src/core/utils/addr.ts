import { keccak_256 } from '@noble/hashes/sha3';
import { utf8ToBytes } from '@noble/hashes/utils';
import type { Address, Hex } from '../types/primitives';
import { isHash } from './hash';

export function isAddress(x: unknown): x is Address {
  return isHash(x, 42); // 40 hex chars + '0x' prefix
}

// Hex comparison for bytes32 values and topics
export const hexEq = (a: Hex, b: Hex): boolean => a.toLowerCase() === b.toLowerCase();

/** EIP-55 mixed-case checksum encoding. */
export function toChecksumAddress(address: Address): Address {
  if (!isAddress(address)) throw new Error(`Invalid address "${String(address)}".`);
  const body = address.slice(2).toLowerCase();
  const hash = keccak_256(utf8ToBytes(body));

  let out = '';
  for (let i = 0; i < body.length; i++) {
    // high nibble for even positions, low nibble for odd ones
    const nibble = i % 2 === 0 ? hash[i >> 1] >> 4 : hash[i >> 1] & 0x0f;
    out += nibble >= 8 ? body[i].toUpperCase() : body[i];
  }
  return `0x${out}`;
}
