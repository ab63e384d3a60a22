// src/core/types/abi.ts
import type { Address, Bytes32, Hex } from './primitives';

// -----------------------------------------------------------------------------
// Type descriptors
// -----------------------------------------------------------------------------

export type AbiType =
  | { readonly kind: 'bool' }
  | { readonly kind: 'uint'; readonly bits: number }
  | { readonly kind: 'int'; readonly bits: number }
  | { readonly kind: 'address' }
  | { readonly kind: 'fixedBytes'; readonly size: number }
  | { readonly kind: 'bytes' }
  | { readonly kind: 'string' }
  | { readonly kind: 'fixedArray'; readonly element: AbiType; readonly length: number }
  | { readonly kind: 'array'; readonly element: AbiType }
  | { readonly kind: 'tuple'; readonly components: readonly AbiField[] };

export type AbiTypeKind = AbiType['kind'];

/** Named member of a tuple, function parameter list or event. */
export interface AbiField {
  readonly name: string;
  readonly type: AbiType;
}

export interface EventField extends AbiField {
  readonly indexed: boolean;
}

// -----------------------------------------------------------------------------
// Values
// -----------------------------------------------------------------------------

export type AbiValue =
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'uint'; readonly value: bigint }
  | { readonly kind: 'int'; readonly value: bigint }
  | { readonly kind: 'address'; readonly value: Address }
  | { readonly kind: 'fixedBytes'; readonly value: Hex }
  | { readonly kind: 'bytes'; readonly value: Hex }
  | { readonly kind: 'string'; readonly value: string }
  /** Fixed-size and dynamic arrays alike. */
  | { readonly kind: 'array'; readonly items: readonly AbiValue[] }
  | { readonly kind: 'tuple'; readonly items: readonly AbiValue[] };

/** Plain JS projection of an AbiValue (tuples become arrays). */
export type PlainValue = bigint | boolean | string | readonly PlainValue[];

// -----------------------------------------------------------------------------
// Schemas
// -----------------------------------------------------------------------------

export type StateMutability = 'pure' | 'view' | 'nonpayable' | 'payable';

/** Coarse mutability class derived from `stateMutability`. */
export type Mutability = 'read-only' | 'state-changing' | 'payable';

export interface FunctionSchema {
  readonly name: string;
  readonly inputs: readonly AbiField[];
  readonly outputs: readonly AbiField[];
  readonly stateMutability: StateMutability;
  readonly mutability: Mutability;
  /** Canonical signature, e.g. `dispatch(uint32,bytes32,bytes)` */
  readonly signature: string;
  /** 4-byte selector as 0x…8 hex */
  readonly selector: Hex;
}

export interface EventSchema {
  readonly name: string;
  readonly inputs: readonly EventField[];
  readonly anonymous: boolean;
  /** Canonical signature, e.g. `Dispatch(address,uint32,bytes32,bytes)` */
  readonly signature: string;
  /** Keccak-256 of the signature. */
  readonly topic0: Bytes32;
}

// -----------------------------------------------------------------------------
// Records
// -----------------------------------------------------------------------------

/** Raw log entry as handed over by the transport. */
export interface LogRecord {
  readonly topics: readonly Hex[];
  readonly data: Hex;
}

export interface DecodedCall {
  readonly schema: FunctionSchema;
  readonly name: string;
  readonly signature: string;
  readonly selector: Hex;
  readonly values: readonly AbiValue[];
  /** Arguments keyed by parameter name (positional index when unnamed). */
  readonly args: Readonly<Record<string, PlainValue>>;
}

export interface DecodedEventField {
  readonly name: string;
  readonly type: AbiType;
  readonly indexed: boolean;
  /** Indexed reference types only carry their Keccak-256 hash. */
  readonly hashed: boolean;
  readonly value: AbiValue;
}

export interface DecodedEvent {
  readonly schema: EventSchema;
  readonly name: string;
  readonly signature: string;
  readonly topic0: Bytes32;
  readonly fields: readonly DecodedEventField[];
  readonly args: Readonly<Record<string, PlainValue>>;
}

// -----------------------------------------------------------------------------
// JSON ABI (static interface definition)
// -----------------------------------------------------------------------------

export interface JsonAbiParameter {
  readonly name?: string;
  readonly type: string;
  readonly internalType?: string;
  readonly indexed?: boolean;
  readonly components?: readonly JsonAbiParameter[];
}

export interface JsonAbiItem {
  readonly type: string;
  readonly name?: string;
  readonly inputs?: readonly JsonAbiParameter[];
  readonly outputs?: readonly JsonAbiParameter[];
  readonly stateMutability?: string;
  readonly anonymous?: boolean;
}

export type JsonAbi = readonly JsonAbiItem[];
