// src/adapters/ethers/codec.ts
import { getBytes, keccak256, type Log } from 'ethers';

import type { CodecDeps } from '../../core/codec/hash';
import type { LogRecord } from '../../core/types/abi';
import type { Hex } from '../../core/types/primitives';
import { OP_EVENTS } from '../../core/types/errors';
import { createError } from '../../core/errors/factory';
import { isHash } from '../../core/utils/hash';

/** Codec dependencies backed by ethers' hasher. */
export function createEthersCodecDeps(): CodecDeps {
  return {
    keccak256: (data) => getBytes(keccak256(data)),
  };
}

function asHex(value: string, what: string): Hex {
  if (isHash(value)) return value;
  throw createError('DECODING', {
    resource: 'events',
    operation: OP_EVENTS.decodeLog,
    message: `Log ${what} is not 0x-prefixed hex.`,
    context: { path: what },
  });
}

/** Ethers types topics and data as plain strings; they are checked here. */
export function fromEthersLog(log: Pick<Log, 'topics' | 'data'>): LogRecord {
  return {
    topics: log.topics.map((t, i) => asHex(t, `topics[${i}]`)),
    data: asHex(log.data, 'data'),
  };
}
