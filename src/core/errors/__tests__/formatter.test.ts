import { describe, it, expect } from 'vitest';
import { formatEnvelopePretty } from '../formatter';

describe('errors/formatter.formatEnvelopePretty', () => {
  it('formats a rich envelope with context, candidates and cause', () => {
    const pretty = formatEnvelopePretty({
      type: 'DECODING',
      message: 'No candidate decoded the log.',
      operation: 'events.decodeLog',
      resource: 'events',
      context: {
        topic0: '0x' + 'aa'.repeat(32),
        offset: 64,
        candidates: ['Transfer(address,address,uint256)', 'Transfer(address,uint256,uint256)'],
      },
      cause: { name: 'RangeError', code: 'E_OFFSET', message: 'offset out of bounds' },
    });

    expect(pretty.split('\n')).toEqual([
      '✖ AbiCodecError [DECODING]',
      '  Message   : No candidate decoded the log.',
      '',
      '  Operation : events.decodeLog',
      '  Resource  : events',
      `  Context   : topic0=0x${'aa'.repeat(32)}  •  offset=64`,
      '  Tried     : Transfer(address,address,uint256), Transfer(address,uint256,uint256)',
      '  Cause     : name=RangeError  code=E_OFFSET',
      '              message=offset out of bounds',
    ]);
  });

  it('handles a minimal envelope without optional fields', () => {
    const pretty = formatEnvelopePretty({
      type: 'NO_MATCHING_SCHEMA',
      message: 'Unknown selector.',
      operation: 'calls.decodeCall',
      resource: 'calls',
    });

    expect(pretty).toBe(
      [
        '✖ AbiCodecError [NO_MATCHING_SCHEMA]',
        '  Message   : Unknown selector.',
        '',
        '  Operation : calls.decodeCall',
        '  Resource  : calls',
      ].join('\n'),
    );
  });

  it('renders a non-object cause inline', () => {
    const pretty = formatEnvelopePretty({
      type: 'TRANSPORT',
      message: 'Call failed.',
      operation: 'contract.read',
      resource: 'transport',
      cause: 'socket hang up',
    });
    expect(pretty.split('\n').at(-1)).toBe('  Cause     : "socket hang up"');
  });
});
