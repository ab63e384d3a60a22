// src/core/index.ts

// Descriptors & values
export {
  abiType,
  field,
  formatAbiType,
  formatSignature,
  headSize,
  isAbiTypeEqual,
  isDynamicType,
  isValueType,
  parseAbiType,
  parseTypeList,
} from './codec/descriptor';
export {
  abiValue,
  fromAbiValue,
  isAbiValueEqual,
  namedValues,
  toAbiValue,
  toAbiValues,
} from './codec/values';

// Wire codec
export { encodeAbiParameters, encodeAbiParametersToBytes, encodeInPlace } from './codec/encoder';
export { decodeAbiParameters, decodeTopicValue, tryDecodeAbiParameters } from './codec/decoder';
export type { DecodeOptions } from './codec/decoder';
export { defaultCodecDeps, hashSignature, toFunctionSelector } from './codec/hash';
export type { CodecDeps } from './codec/hash';

// Schemas
export { defineFunction, toMutability } from './schema/function';
export { defineEvent } from './schema/event';
export { parseJsonAbi } from './schema/json-abi';
export type { ParsedAbi } from './schema/json-abi';
export { parseDeclaration } from './schema/signature';

// Dispatch
export { createSelectorTable } from './dispatch/selector-table';
export type { SelectorTable } from './dispatch/selector-table';
export {
  createCallMultiplexer,
  decodeFunctionData,
  decodeFunctionResult,
  encodeFunctionData,
  encodeFunctionResult,
  toDecodedCall,
} from './dispatch/calls';
export type { CallMultiplexer, CallMultiplexerOptions } from './dispatch/calls';
export {
  createEventDemultiplexer,
  decodeEventLog,
  encodeEventLog,
  encodeEventTopics,
  encodeTopic,
} from './dispatch/events';
export type { EventDemultiplexer, EventDemultiplexerOptions } from './dispatch/events';

// Contracts
export { createContractCodec } from './contract/codec';
export type { ContractCodec, ContractCodecOptions, EventRef, FunctionRef } from './contract/codec';
export { createContractCaller } from './contract/caller';
export type { ContractCaller, ContractCallerConfig, ReadResult } from './contract/caller';
export { formatAbiValue, formatDecodedCall, formatDecodedEvent } from './contract/format';
export { getMailboxCodec, MailboxABI } from './contract/mailbox';

// Transport
export { makeCallTransportFromEthers, makeCallTransportFromViem } from './rpc/transport';

// Errors
export * as errors from './errors/factory';
export { formatEnvelopePretty } from './errors/formatter';
export { AbiCodecError, isAbiCodecError, isErrorOfType } from './types/errors';

export * from './utils/addr';
export { lazy } from './utils/lazy';

// Core types (type-only)
export type * from './types';
