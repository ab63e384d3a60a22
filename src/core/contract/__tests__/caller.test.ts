import { describe, it, expect } from 'vitest';
import { createContractCaller } from '../caller';
import { getMailboxCodec } from '../mailbox';
import { abiValue } from '../../codec/values';
import type { CallRequest, CallTransport } from '../../rpc/types';
import type { Hex } from '../../types/primitives';

const word = (hex: string) => hex.padStart(64, '0');

const MAILBOX = '0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed';

function recordingTransport(response: Hex) {
  const requests: CallRequest[] = [];
  const transport: CallTransport = async (req) => {
    requests.push(req);
    return response;
  };
  return { transport, requests };
}

describe('contract/caller.createContractCaller', () => {
  it('encodes the call, sends it and decodes the result', async () => {
    const { transport, requests } = recordingTransport(`0x${word('7')}`);
    const mailbox = createContractCaller({ codec: getMailboxCodec(), address: MAILBOX, transport });

    const out = await mailbox.read('localDomain');
    expect(requests).toEqual([{ to: MAILBOX, data: getMailboxCodec().getFunction('localDomain').selector }]);
    expect(out.values).toEqual([abiValue.uint(7)]);
    expect(out.result).toEqual({ 0: 7n });
  });

  it('resolves overloads by argument count', async () => {
    const { transport, requests } = recordingTransport(`0x${word('3e8')}`);
    const mailbox = createContractCaller({ codec: getMailboxCodec(), address: MAILBOX, transport });

    const out = await mailbox.read('quoteDispatch', [7, `0x${word('beef')}`, '0x6869']);
    expect(out.schema.signature).toBe('quoteDispatch(uint32,bytes32,bytes)');
    expect(out.result).toEqual({ fee: 1000n });
    expect(requests[0].data).toBe(mailbox.calldata('quoteDispatch', [7, `0x${word('beef')}`, '0x6869']));
  });

  it('wraps transport failures as TRANSPORT errors', async () => {
    const transport: CallTransport = async () => {
      throw new Error('connection refused');
    };
    const mailbox = createContractCaller({ codec: getMailboxCodec(), address: MAILBOX, transport });

    await expect(mailbox.read('nonce')).rejects.toMatchObject({
      envelope: {
        type: 'TRANSPORT',
        operation: 'contract.read',
        resource: 'transport',
        context: { signature: 'nonce()', address: MAILBOX },
        cause: { name: 'Error', message: 'connection refused' },
      },
    });
  });

  it('surfaces malformed return data as DECODING errors', async () => {
    const { transport } = recordingTransport('0x01');
    const mailbox = createContractCaller({ codec: getMailboxCodec(), address: MAILBOX, transport });
    await expect(mailbox.read('nonce')).rejects.toMatchObject({ envelope: { type: 'DECODING' } });
  });
});
