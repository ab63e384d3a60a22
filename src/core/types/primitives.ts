// src/core/types/primitives.ts

/** 0x-prefixed hex string. */
export type Hex = `0x${string}`;

/** 0x-prefixed, 20-byte hex address. */
export type Address = `0x${string}`;

/** 0x-prefixed, 32-byte hex word (hashes, topics, bytes32 values). */
export type Bytes32 = `0x${string}`;
