import { describe, it, expect } from 'vitest';
import { abiType, field } from '../descriptor';
import {
  abiValue,
  fromAbiValue,
  isAbiValueEqual,
  namedValues,
  toAbiValue,
  toAbiValues,
} from '../values';
import { isErrorOfType } from '../../types/errors';

const RECIPIENT = '0x52908400098527886E0F7030069857D2E4169EE7';

function encodingErrorOf(fn: () => unknown) {
  try {
    fn();
  } catch (e) {
    return isErrorOfType(e, 'ENCODING') ? e : undefined;
  }
  return undefined;
}

describe('codec/values.toAbiValue', () => {
  it('lifts integers from bigint and safe numbers', () => {
    expect(toAbiValue(abiType.uint(32), 7)).toEqual({ kind: 'uint', value: 7n });
    expect(toAbiValue(abiType.int(8), -3n)).toEqual({ kind: 'int', value: -3n });
  });

  it('rejects unsafe numbers and wrong shapes', () => {
    expect(encodingErrorOf(() => toAbiValue(abiType.uint(256), 2 ** 60))).toBeDefined();
    expect(encodingErrorOf(() => toAbiValue(abiType.uint(256), 1.5))).toBeDefined();
    expect(encodingErrorOf(() => toAbiValue(abiType.bool(), 'true'))).toBeDefined();
    expect(encodingErrorOf(() => toAbiValue(abiType.address(), '0x1234'))).toBeDefined();
    expect(encodingErrorOf(() => toAbiValue(abiType.bytes(), '0x123'))).toBeDefined();
    expect(encodingErrorOf(() => toAbiValue(abiType.string(), 5))).toBeDefined();
  });

  it('accepts Uint8Array for byte strings', () => {
    expect(toAbiValue(abiType.bytes(), new Uint8Array([0x68, 0x69]))).toEqual({
      kind: 'bytes',
      value: '0x6869',
    });
  });

  it('lifts tuples from positional arrays and named objects', () => {
    const t = abiType.tuple([field('to', abiType.address()), field('amount', abiType.uint(256))]);
    const fromArray = toAbiValue(t, [RECIPIENT, 5n]);
    const fromObject = toAbiValue(t, { amount: 5n, to: RECIPIENT });
    expect(fromArray).toEqual(fromObject);
    expect(fromObject).toEqual({
      kind: 'tuple',
      items: [
        { kind: 'address', value: RECIPIENT },
        { kind: 'uint', value: 5n },
      ],
    });
  });

  it('reports the path of a nested mismatch', () => {
    const t = abiType.array(abiType.tuple([field('ok', abiType.bool())]));
    const err = encodingErrorOf(() => toAbiValue(t, [{ ok: true }, { ok: 1 }]));
    expect(err?.envelope.context?.path).toBe('$[1].ok');
  });

  it('rejects a tuple array with the wrong member count', () => {
    const t = abiType.tuple([abiType.bool(), abiType.bool()]);
    expect(encodingErrorOf(() => toAbiValue(t, [true]))).toBeDefined();
  });

  it('checks cardinality in toAbiValues', () => {
    expect(encodingErrorOf(() => toAbiValues([abiType.bool()], [true, false]))).toBeDefined();
    expect(toAbiValues([abiType.bool()], [true])).toEqual([{ kind: 'bool', value: true }]);
  });
});

describe('codec/values.fromAbiValue / namedValues', () => {
  it('projects to plain JS', () => {
    const v = abiValue.tuple([abiValue.uint(7), abiValue.array([abiValue.string('a'), abiValue.string('b')])]);
    expect(fromAbiValue(v)).toEqual([7n, ['a', 'b']]);
  });

  it('keys unnamed fields by position', () => {
    const fields = [field('destination', abiType.uint(32)), field('', abiType.bool())];
    expect(namedValues(fields, [abiValue.uint(7), abiValue.bool(true)])).toEqual({
      destination: 7n,
      1: true,
    });
  });

  it('keeps reserved object keys as own properties', () => {
    const fields = [field('__proto__', abiType.uint(256)), field('constructor', abiType.uint(256))];
    const record = namedValues(fields, [abiValue.uint(1), abiValue.uint(2)]);
    expect(Object.keys(record)).toEqual(['__proto__', 'constructor']);
    expect(Object.getOwnPropertyDescriptor(record, '__proto__')?.value).toBe(1n);
    expect(record['constructor']).toBe(2n);
  });
});

describe('codec/values.isAbiValueEqual', () => {
  it('compares hex case-insensitively and strings exactly', () => {
    expect(isAbiValueEqual(abiValue.bytes('0xABCD'), abiValue.bytes('0xabcd'))).toBe(true);
    expect(isAbiValueEqual(abiValue.string('A'), abiValue.string('a'))).toBe(false);
  });

  it('distinguishes kinds and nested items', () => {
    expect(isAbiValueEqual(abiValue.uint(1), abiValue.int(1))).toBe(false);
    expect(isAbiValueEqual(abiValue.array([abiValue.bool(true)]), abiValue.tuple([abiValue.bool(true)]))).toBe(
      false,
    );
    expect(
      isAbiValueEqual(
        abiValue.array([abiValue.uint(1), abiValue.uint(2)]),
        abiValue.array([abiValue.uint(1), abiValue.uint(2)]),
      ),
    ).toBe(true);
  });
});
