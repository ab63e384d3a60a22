import { describe, it, expect } from 'vitest';
import { AbiCoder, Interface, id } from 'ethers';

import { createEthersCodecDeps, fromEthersLog } from '../ethers';
import { parseTypeList } from '../../core/codec/descriptor';
import { abiValue, toAbiValues } from '../../core/codec/values';
import { encodeAbiParameters } from '../../core/codec/encoder';
import { decodeAbiParameters } from '../../core/codec/decoder';
import { defaultCodecDeps, hashSignature } from '../../core/codec/hash';
import { getMailboxCodec, MailboxABI } from '../../core/contract/mailbox';
import { createContractCodec } from '../../core/contract/codec';
import { isErrorOfType } from '../../core/types/errors';
import type { Hex } from '../../core/types/primitives';

const coder = AbiCoder.defaultAbiCoder();
const Mailbox = new Interface(MailboxABI);

const word = (hex: string) => hex.padStart(64, '0');
const SENDER = '0x52908400098527886E0F7030069857D2E4169EE7';
const RECIPIENT: Hex = `0x${word('beef')}`;

describe('adapters/ethers wire compatibility', () => {
  it('encodes the same bytes as AbiCoder', () => {
    const types = parseTypeList('uint32,bytes32,bytes,(string,int8)[2]');
    const inputs = [7, RECIPIENT, '0x6869', [['x', -1], ['', 127]]];
    expect(encodeAbiParameters(types, toAbiValues(types, inputs))).toBe(
      coder.encode(['uint32', 'bytes32', 'bytes', 'tuple(string,int8)[2]'], inputs),
    );
  });

  it('decodes what AbiCoder encodes', () => {
    const data = coder.encode(['bool', 'int256', 'address[]'], [true, -2n, [SENDER]]);
    if (!data.startsWith('0x')) throw new Error('unexpected encoding');
    expect(decodeAbiParameters(parseTypeList('bool,int256,address[]'), `0x${data.slice(2)}`, { strict: true })).toEqual([
      abiValue.bool(true),
      abiValue.int(-2n),
      abiValue.array([abiValue.address(SENDER)]),
    ]);
  });
});

describe('adapters/ethers Mailbox agreement', () => {
  const mailbox = getMailboxCodec();

  it('agrees on selectors and topic0', () => {
    expect(mailbox.getFunction('dispatch', 3).selector).toBe(
      Mailbox.getFunction('dispatch(uint32,bytes32,bytes)')?.selector,
    );
    for (const event of mailbox.events) {
      expect(event.topic0).toBe(id(event.signature));
    }
  });

  it('encodes and decodes calls like Interface', () => {
    const ours = mailbox.encodeFunctionData('dispatch', [7, RECIPIENT, '0x6869', '0x01']);
    expect(ours).toBe(Mailbox.encodeFunctionData('dispatch(uint32,bytes32,bytes,bytes)', [7, RECIPIENT, '0x6869', '0x01']));

    const theirs = Mailbox.encodeFunctionData('dispatch(uint32,bytes32,bytes,bytes,address)', [
      7,
      RECIPIENT,
      '0x',
      '0x',
      SENDER,
    ]);
    if (!theirs.startsWith('0x')) throw new Error('unexpected encoding');
    expect(mailbox.decodeCall(`0x${theirs.slice(2)}`).signature).toBe('dispatch(uint32,bytes32,bytes,bytes,address)');
  });

  it('parses our encoded logs', () => {
    const codec = createContractCodec(MailboxABI, { deps: createEthersCodecDeps() });
    const Dispatch = codec.getEvent('Dispatch');
    const topics = codec.eventTopics('Dispatch', [SENDER, 7, RECIPIENT]).filter((t): t is Hex => t !== null);
    const data: Hex = `0x${word('20')}${word('2')}${'6869'.padEnd(64, '0')}`;

    expect(topics[0]).toBe(Dispatch.topic0);
    const parsed = Mailbox.parseLog({ topics, data });
    expect(parsed?.name).toBe('Dispatch');
    expect(parsed?.args.toObject()).toEqual({ sender: SENDER, destination: 7n, recipient: RECIPIENT, message: '0x6869' });
  });
});

describe('adapters/ethers.fromEthersLog', () => {
  it('accepts hex topics and data', () => {
    expect(fromEthersLog({ topics: [RECIPIENT], data: '0x' })).toEqual({ topics: [RECIPIENT], data: '0x' });
  });

  it('rejects non-hex fields with DECODING', () => {
    let err: unknown;
    try {
      fromEthersLog({ topics: [RECIPIENT, 'zz'], data: '0x' });
    } catch (e) {
      err = e;
    }
    expect(isErrorOfType(err, 'DECODING') && err.envelope.context).toEqual({ path: 'topics[1]' });
  });
});

describe('adapters/ethers.createEthersCodecDeps', () => {
  it('hashes like the default hasher', () => {
    expect(hashSignature('Dispatch(address,uint32,bytes32,bytes)', createEthersCodecDeps())).toBe(
      hashSignature('Dispatch(address,uint32,bytes32,bytes)', defaultCodecDeps),
    );
  });
});
