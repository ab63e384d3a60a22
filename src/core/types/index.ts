// src/core/types/index.ts
export type * from './abi';
export type * from './primitives';
export type { ErrorEnvelope, ErrorType, Resource, TryResult } from './errors';
export type { CallRequest, CallTransport } from '../rpc/types';
