// src/core/codec/hash.ts
import { keccak_256 } from '@noble/hashes/sha3';
import type { Bytes32, Hex } from '../types/primitives';
import { OP_SCHEMA } from '../types/errors';
import { createError } from '../errors/factory';
import { bytesToHex, utf8ToBytes } from '../utils';

/**
 * Dependencies injected into schema construction.
 * The core ships a default; adapters (ethers or viem) can supply their own.
 */
export interface CodecDeps {
  /** Keccak-256 over raw bytes, returning the 32-byte digest. */
  keccak256(data: Uint8Array): Uint8Array;
}

export const defaultCodecDeps: CodecDeps = {
  keccak256: (data) => keccak_256(data),
};

/** Keccak-256 of a canonical signature string. */
export function hashSignature(signature: string, deps: CodecDeps = defaultCodecDeps): Bytes32 {
  const digest = deps.keccak256(utf8ToBytes(signature));
  if (digest.length !== 32) {
    throw createError('SCHEMA', {
      resource: 'schema',
      operation: OP_SCHEMA.defineFunction,
      message: `Hasher returned ${digest.length} bytes for "${signature}", expected 32.`,
      context: { signature },
    });
  }
  return bytesToHex(digest);
}

/** First 4 bytes of the signature hash. */
export function toFunctionSelector(signature: string, deps: CodecDeps = defaultCodecDeps): Hex {
  return `0x${hashSignature(signature, deps).slice(2, 10)}`;
}
