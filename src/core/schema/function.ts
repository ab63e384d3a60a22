// src/core/schema/function.ts
import type {
  AbiField,
  FunctionSchema,
  JsonAbiItem,
  JsonAbiParameter,
  Mutability,
  StateMutability,
} from '../types/abi';
import { OP_SCHEMA } from '../types/errors';
import { createError } from '../errors/factory';
import { field, formatSignature, parseAbiType } from '../codec/descriptor';
import { defaultCodecDeps, toFunctionSelector, type CodecDeps } from '../codec/hash';
import { parseDeclaration } from './signature';

const STATE_MUTABILITY: readonly StateMutability[] = ['pure', 'view', 'nonpayable', 'payable'];

export function toMutability(stateMutability: StateMutability): Mutability {
  switch (stateMutability) {
    case 'pure':
    case 'view':
      return 'read-only';
    case 'payable':
      return 'payable';
    default:
      return 'state-changing';
  }
}

function isStateMutability(x: unknown): x is StateMutability {
  return STATE_MUTABILITY.some((m) => m === x);
}

export function toFields(params: readonly JsonAbiParameter[] = []): AbiField[] {
  return params.map((p) => field(p.name ?? '', parseAbiType(p.type, p.components)));
}

/**
 * Builds an immutable function schema from a JSON ABI item or a
 * human-readable declaration (`dispatch(uint32,bytes32,bytes)`).
 */
export function defineFunction(
  def: JsonAbiItem | string,
  deps: CodecDeps = defaultCodecDeps,
): FunctionSchema {
  const item = typeof def === 'string' ? parseDeclaration(def) : def;
  if (item.type !== 'function' || !item.name) {
    throw createError('SCHEMA', {
      resource: 'schema',
      operation: OP_SCHEMA.defineFunction,
      message: `Expected a named function item, received "${item.type}".`,
      context: { type: item.type },
    });
  }

  const stateMutability = item.stateMutability ?? 'nonpayable';
  if (!isStateMutability(stateMutability)) {
    throw createError('SCHEMA', {
      resource: 'schema',
      operation: OP_SCHEMA.defineFunction,
      message: `Unknown stateMutability "${stateMutability}" on ${item.name}.`,
    });
  }

  const inputs = Object.freeze(toFields(item.inputs));
  const outputs = Object.freeze(toFields(item.outputs));
  const signature = formatSignature(item.name, inputs);

  return Object.freeze({
    name: item.name,
    inputs,
    outputs,
    stateMutability,
    mutability: toMutability(stateMutability),
    signature,
    selector: toFunctionSelector(signature, deps),
  });
}
