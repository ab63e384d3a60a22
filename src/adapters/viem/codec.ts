// src/adapters/viem/codec.ts
import { keccak256, type Log } from 'viem';

import type { CodecDeps } from '../../core/codec/hash';
import type { LogRecord } from '../../core/types/abi';

/** Codec dependencies backed by viem's hasher. */
export function createViemCodecDeps(): CodecDeps {
  return {
    keccak256: (data) => keccak256(data, 'bytes'),
  };
}

/** Narrows a viem log (or any log with the same shape) to what the demultiplexer reads. */
export function fromViemLog(log: Pick<Log, 'topics' | 'data'>): LogRecord {
  return { topics: [...log.topics], data: log.data };
}
