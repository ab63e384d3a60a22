import type { Address, Hex } from '../types/primitives';

/** eth_call shaped request: target contract and ABI-encoded call data. */
export type CallRequest = {
  to: Address;
  data: Hex;
};

/**
 * The only I/O boundary the codec knows about. Returns the raw return data
 * of a read-only call.
 */
export type CallTransport = (request: CallRequest) => Promise<Hex>;
