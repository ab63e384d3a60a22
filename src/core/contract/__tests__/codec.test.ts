import { describe, it, expect, vi, afterEach } from 'vitest';
import { createContractCodec } from '../codec';
import { getMailboxCodec } from '../mailbox';
import { abiValue } from '../../codec/values';
import { isErrorOfType } from '../../types/errors';
import type { Hex } from '../../types/primitives';
import type { LogRecord } from '../../types/abi';

const word = (hex: string) => hex.padStart(64, '0');
const rightWord = (hex: string) => hex.padEnd(64, '0');

const SENDER = '0x52908400098527886E0F7030069857D2E4169EE7';
const RECIPIENT: Hex = `0x${word('beef')}`;

function errorOf(fn: () => unknown) {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('contract/mailbox.getMailboxCodec', () => {
  it('builds the registry once', () => {
    expect(getMailboxCodec()).toBe(getMailboxCodec());
  });

  it('registers every function and event in declaration order', () => {
    const mailbox = getMailboxCodec();
    expect(mailbox.name).toBe('Mailbox');
    expect(mailbox.functions).toHaveLength(26);
    expect(mailbox.events.map((e) => e.name)).toEqual([
      'DefaultHookSet',
      'DefaultIsmSet',
      'Dispatch',
      'DispatchId',
      'Initialized',
      'OwnershipTransferred',
      'Process',
      'ProcessId',
      'RequiredHookSet',
    ]);
    expect(mailbox.functions.filter((f) => f.name === 'dispatch').map((f) => f.signature)).toEqual([
      'dispatch(uint32,bytes32,bytes,bytes,address)',
      'dispatch(uint32,bytes32,bytes,bytes)',
      'dispatch(uint32,bytes32,bytes)',
    ]);
  });
});

describe('contract/codec overload resolution', () => {
  const mailbox = getMailboxCodec();

  it('resolves by signature, ignoring spacing and names', () => {
    expect(mailbox.getFunction('dispatch(uint32 d, bytes32, bytes)').signature).toBe('dispatch(uint32,bytes32,bytes)');
  });

  it('resolves by name and arity', () => {
    expect(mailbox.getFunction('dispatch', 4).signature).toBe('dispatch(uint32,bytes32,bytes,bytes)');
    expect(mailbox.getFunction('localDomain').stateMutability).toBe('view');
  });

  it('fails with SCHEMA on ambiguous or unknown names', () => {
    const ambiguous = errorOf(() => mailbox.getFunction('dispatch'));
    expect(isErrorOfType(ambiguous, 'SCHEMA') && ambiguous.envelope.context?.candidates).toEqual([
      'dispatch(uint32,bytes32,bytes,bytes,address)',
      'dispatch(uint32,bytes32,bytes,bytes)',
      'dispatch(uint32,bytes32,bytes)',
    ]);
    expect(isErrorOfType(errorOf(() => mailbox.getFunction('dispatch', 2)), 'SCHEMA')).toBe(true);
    expect(isErrorOfType(errorOf(() => mailbox.getFunction('send(uint256)')), 'SCHEMA')).toBe(true);
    expect(isErrorOfType(errorOf(() => mailbox.getEvent('Sent')), 'SCHEMA')).toBe(true);
  });
});

describe('contract/codec calls', () => {
  const mailbox = getMailboxCodec();

  it('encodes from plain arguments and routes the result back', () => {
    const data = mailbox.encodeFunctionData('dispatch', [7, RECIPIENT, '0x6869']);
    const schema = mailbox.getFunction('dispatch', 3);
    expect(data).toBe(`${schema.selector}${word('7')}${word('beef')}${word('60')}${word('2')}${rightWord('6869')}`);

    const call = mailbox.decodeCall(data);
    expect(call.schema).toBe(schema);
    expect(call.args).toEqual({ _destinationDomain: 7n, _recipientAddress: RECIPIENT, _messageBody: '0x6869' });
  });

  it('routes each dispatch overload to itself', () => {
    const four = mailbox.encodeFunctionData('dispatch', [7, RECIPIENT, '0x6869', '0x']);
    expect(mailbox.decodeCall(four).signature).toBe('dispatch(uint32,bytes32,bytes,bytes)');
    const five = mailbox.encodeFunctionData('dispatch', [7, RECIPIENT, '0x6869', '0x', SENDER]);
    expect(mailbox.decodeCall(five).args).toMatchObject({ hook: SENDER });
  });

  it('decodes return data by function name', () => {
    expect(mailbox.decodeFunctionResult('localDomain', `0x${word('7')}`)).toEqual([abiValue.uint(7)]);
  });

  it('reports unknown selectors through tryDecodeCall', () => {
    const res = mailbox.tryDecodeCall('0xdeadbeef');
    expect(!res.ok && res.error.type).toBe('NO_MATCHING_SCHEMA');
  });
});

describe('contract/codec events', () => {
  const mailbox = getMailboxCodec();
  const Dispatch = mailbox.getEvent('Dispatch');

  it('builds topic filters from plain arguments', () => {
    expect(mailbox.eventTopics('Dispatch', [null, 7])).toEqual([Dispatch.topic0, null, `0x${word('7')}`]);
    expect(mailbox.eventTopics('Dispatch(address,uint32,bytes32,bytes)')).toEqual([Dispatch.topic0]);
  });

  it('rejects more filter values than indexed fields', () => {
    const err = errorOf(() => mailbox.eventTopics('DispatchId', [RECIPIENT, RECIPIENT]));
    expect(isErrorOfType(err, 'ENCODING')).toBe(true);
  });

  it('decodes a Dispatch log with three indexed fields', () => {
    const log: LogRecord = {
      topics: [Dispatch.topic0, `0x${word(SENDER.slice(2).toLowerCase())}`, `0x${word('7')}`, RECIPIENT],
      data: `0x${word('20')}${word('2')}${rightWord('6869')}`,
    };
    const event = mailbox.decodeLog(log);
    expect(event.name).toBe('Dispatch');
    expect(event.args).toEqual({ sender: SENDER, destination: 7n, recipient: RECIPIENT, message: '0x6869' });
  });

  it('decodes a ProcessId log', () => {
    const ProcessId = mailbox.getEvent('ProcessId');
    const res = mailbox.tryDecodeLog({ topics: [ProcessId.topic0, RECIPIENT], data: '0x' });
    expect(res.ok && res.value.args).toEqual({ messageId: RECIPIENT });
  });
});

describe('contract/codec.createContractCodec', () => {
  it('skips anonymous events for routing and warns', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const codec = createContractCodec(['event Ping(uint8 n) anonymous', 'event Pong(uint8 n)'], { name: 'Pinger' });

    expect(warn).toHaveBeenCalledWith('[abi-mux] Pinger: anonymous event Ping(uint8) has no topic0, not routed.');
    expect(codec.events).toHaveLength(2);
    expect(codec.logs.schemas().map((e) => e.name)).toEqual(['Pong']);
  });

  it('decodes calls leniently when strict is off', () => {
    const codec = createContractCodec(['function ping(uint8 n)'], { strict: false });
    const data: Hex = `${codec.encodeFunctionData('ping', [1])}${word('0')}`;
    expect(codec.decodeCall(data).args).toEqual({ n: 1n });
  });
});
