// src/core/contract/caller.ts
import type { AbiValue, FunctionSchema, PlainValue } from '../types/abi';
import type { Address, Hex } from '../types/primitives';
import type { CallTransport } from '../rpc/types';
import { OP_CONTRACT } from '../types/errors';
import { createErrorHandlers } from '../errors/error-ops';
import { namedValues } from '../codec/values';
import type { ContractCodec, FunctionRef } from './codec';

const { wrapAsync } = createErrorHandlers('transport');

export interface ContractCallerConfig {
  codec: ContractCodec;
  address: Address;
  transport: CallTransport;
}

export interface ReadResult {
  schema: FunctionSchema;
  values: AbiValue[];
  /** Outputs keyed by name (positional index when unnamed). */
  result: Record<string, PlainValue>;
}

export interface ContractCaller {
  readonly address: Address;
  readonly codec: ContractCodec;
  /** Encoded call data for `fn(args)`, selector included. */
  calldata(fn: FunctionRef, args?: readonly unknown[]): Hex;
  /** Encodes, runs the call through the transport and decodes the return data. */
  read(fn: FunctionRef, args?: readonly unknown[]): Promise<ReadResult>;
}

/**
 * Binds a contract codec to an address and a transport.
 * Transport failures surface as `TRANSPORT` errors; nothing is retried.
 */
export function createContractCaller(config: ContractCallerConfig): ContractCaller {
  const { codec, address, transport } = config;

  const calldata = (fn: FunctionRef, args: readonly unknown[] = []) =>
    codec.encodeFunctionData(codec.getFunction(fn, args.length), args);

  async function read(fn: FunctionRef, args: readonly unknown[] = []): Promise<ReadResult> {
    const schema = codec.getFunction(fn, args.length);
    const data = codec.encodeFunctionData(schema, args);

    const raw = await wrapAsync('TRANSPORT', OP_CONTRACT.read, () => transport({ to: address, data }), {
      ctx: { signature: schema.signature, selector: schema.selector, address },
      message: `Call to ${codec.name}.${schema.name} failed in the transport.`,
    });

    const values = codec.decodeFunctionResult(schema, raw);
    return { schema, values, result: namedValues(schema.outputs, values) };
  }

  return { address, codec, calldata, read };
}
