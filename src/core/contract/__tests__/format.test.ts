import { describe, it, expect } from 'vitest';
import { formatAbiValue, formatDecodedCall, formatDecodedEvent } from '../format';
import { getMailboxCodec } from '../mailbox';
import { createContractCodec } from '../codec';
import { abiValue } from '../../codec/values';
import type { Hex } from '../../types/primitives';

const word = (hex: string) => hex.padStart(64, '0');
const RECIPIENT: Hex = `0x${word('1')}`;

describe('contract/format', () => {
  it('renders values', () => {
    expect(formatAbiValue(abiValue.bool(false))).toBe('false');
    expect(formatAbiValue(abiValue.int(-3))).toBe('-3');
    expect(formatAbiValue(abiValue.string('a "b"'))).toBe('"a \\"b\\""');
    expect(formatAbiValue(abiValue.array([abiValue.uint(1), abiValue.uint(2)]))).toBe('[1, 2]');
    expect(formatAbiValue(abiValue.tuple([abiValue.uint(1), abiValue.bytes('0xab')]))).toBe('(1, 0xab)');
  });

  it('renders a decoded call on one line', () => {
    const mailbox = getMailboxCodec();
    const call = mailbox.decodeCall(mailbox.encodeFunctionData('dispatch', [7, RECIPIENT, '0x6869']));
    expect(formatDecodedCall(call)).toBe(`dispatch(7, ${RECIPIENT}, 0x6869)`);
  });

  it('renders decoded events with field names and hashed markers', () => {
    const codec = createContractCodec(['event Labelled(string indexed label, uint8 n)']);
    const Labelled = codec.getEvent('Labelled');
    const event = codec.decodeLog({ topics: [Labelled.topic0, RECIPIENT], data: `0x${word('3')}` });
    expect(formatDecodedEvent(event)).toBe(`Labelled(label=keccak(${RECIPIENT}), n=3)`);
  });
});
