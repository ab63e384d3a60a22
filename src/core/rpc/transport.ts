// src/core/rpc/transport.ts

import type { Hex } from '../types/primitives';
import { createError } from '../errors/factory';
import { OP_TRANSPORT } from '../types/errors';
import { isHash } from '../utils/hash';
import type { CallRequest, CallTransport } from './types';

function toReturnData(raw: unknown): Hex {
  if (raw === undefined || raw === null) return '0x';
  if (isHash(raw) && raw.length % 2 === 0) return raw;
  throw createError('TRANSPORT', {
    resource: 'transport',
    operation: OP_TRANSPORT.call,
    message: 'Transport returned something other than hex return data.',
    context: { type: typeof raw },
  });
}

// Ethers: provider.call({ to, data })
export function makeCallTransportFromEthers(provider: {
  call: (tx: CallRequest) => Promise<string>;
}): CallTransport {
  return async (req) => toReturnData(await provider.call({ to: req.to, data: req.data }));
}

// Viem: client.call({ to, data }) resolves to { data }
export function makeCallTransportFromViem(client: {
  call: (args: CallRequest) => Promise<{ data?: Hex }>;
}): CallTransport {
  return async (req) => toReturnData((await client.call({ to: req.to, data: req.data })).data);
}
