import { describe, it, expect } from 'vitest';
import { defineFunction, toMutability } from '../function';
import { defineEvent } from '../event';
import { parseJsonAbi } from '../json-abi';
import { isErrorOfType } from '../../types/errors';
import type { JsonAbi } from '../../types/abi';

const ERC20_ABI: JsonAbi = [
  { type: 'constructor', inputs: [] },
  {
    type: 'function',
    name: 'transfer',
    stateMutability: 'nonpayable',
    inputs: [
      { name: 'to', type: 'address' },
      { name: 'amount', type: 'uint256' },
    ],
    outputs: [{ name: '', type: 'bool' }],
  },
  {
    type: 'function',
    name: 'balanceOf',
    stateMutability: 'view',
    inputs: [{ name: 'owner', type: 'address' }],
    outputs: [{ name: '', type: 'uint256' }],
  },
  {
    type: 'event',
    name: 'Transfer',
    anonymous: false,
    inputs: [
      { name: 'from', type: 'address', indexed: true },
      { name: 'to', type: 'address', indexed: true },
      { name: 'value', type: 'uint256', indexed: false },
    ],
  },
  { type: 'error', name: 'Insufficient', inputs: [] },
];

function schemaErrorOf(fn: () => unknown) {
  try {
    fn();
  } catch (e) {
    return isErrorOfType(e, 'SCHEMA') ? e : undefined;
  }
  return undefined;
}

describe('schema/function.defineFunction', () => {
  it('derives the canonical signature and selector', () => {
    const f = defineFunction('function transfer(address to, uint256 amount) returns (bool)');
    expect(f.signature).toBe('transfer(address,uint256)');
    expect(f.selector).toBe('0xa9059cbb');
    expect(f.mutability).toBe('state-changing');
    expect(f.outputs.map((o) => o.type.kind)).toEqual(['bool']);
  });

  it('canonicalizes integer aliases before hashing', () => {
    expect(defineFunction('transfer(address,uint)').selector).toBe('0xa9059cbb');
  });

  it('returns a frozen schema', () => {
    const f = defineFunction('balanceOf(address)');
    expect(f.selector).toBe('0x70a08231');
    expect(Object.isFrozen(f)).toBe(true);
    expect(Object.isFrozen(f.inputs)).toBe(true);
  });

  it('rejects non-function items and unknown mutability', () => {
    expect(schemaErrorOf(() => defineFunction({ type: 'event', name: 'X', inputs: [] }))).toBeDefined();
    expect(
      schemaErrorOf(() => defineFunction({ type: 'function', name: 'x', inputs: [], stateMutability: 'constant' })),
    ).toBeDefined();
  });

  it('maps stateMutability to a coarse class', () => {
    expect(toMutability('pure')).toBe('read-only');
    expect(toMutability('view')).toBe('read-only');
    expect(toMutability('nonpayable')).toBe('state-changing');
    expect(toMutability('payable')).toBe('payable');
  });
});

describe('schema/event.defineEvent', () => {
  it('derives topic0 from the canonical signature', () => {
    const e = defineEvent('event Transfer(address indexed from, address indexed to, uint256 value)');
    expect(e.signature).toBe('Transfer(address,address,uint256)');
    expect(e.topic0).toBe('0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef');
    expect(e.inputs.map((f) => f.indexed)).toEqual([true, true, false]);
  });

  it('allows at most three indexed fields, four when anonymous', () => {
    const four = 'uint8 indexed a, uint8 indexed b, uint8 indexed c, uint8 indexed d';
    expect(schemaErrorOf(() => defineEvent(`event E(${four})`))).toBeDefined();
    expect(defineEvent(`event E(${four}) anonymous`).anonymous).toBe(true);
  });
});

describe('schema/json-abi.parseJsonAbi', () => {
  it('keeps functions and events in declaration order and skips the rest', () => {
    const { functions, events } = parseJsonAbi(ERC20_ABI);
    expect(functions.map((f) => f.name)).toEqual(['transfer', 'balanceOf']);
    expect(events.map((e) => e.name)).toEqual(['Transfer']);
  });

  it('accepts human-readable declarations', () => {
    const { functions, events } = parseJsonAbi([
      'function transfer(address to, uint256 amount) returns (bool)',
      'event Transfer(address indexed from, address indexed to, uint256 value)',
    ]);
    expect(functions[0].selector).toBe('0xa9059cbb');
    expect(events[0].topic0).toBe('0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef');
  });

  it('uses the injected hasher', () => {
    const deps = { keccak256: () => new Uint8Array(32).fill(0x11) };
    const { functions } = parseJsonAbi(ERC20_ABI, deps);
    expect(functions.map((f) => f.selector)).toEqual(['0x11111111', '0x11111111']);
  });

  it('rejects a hasher that does not return 32 bytes', () => {
    const deps = { keccak256: () => new Uint8Array(20) };
    expect(schemaErrorOf(() => parseJsonAbi(ERC20_ABI, deps))).toBeDefined();
  });
});
