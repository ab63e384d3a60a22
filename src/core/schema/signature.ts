// src/core/schema/signature.ts
//
// Human-readable declarations, e.g.
//   function dispatch(uint32 destinationDomain, bytes32 recipientAddress, bytes messageBody) payable returns (bytes32)
//   event Dispatch(address indexed sender, uint32 indexed destination, bytes32 indexed recipient, bytes message)
import type { JsonAbiItem, JsonAbiParameter } from '../types/abi';
import { OP_SCHEMA } from '../types/errors';
import { createError } from '../errors/factory';

const MODIFIERS = new Set(['pure', 'view', 'nonpayable', 'payable']);
const LOCATIONS = new Set(['memory', 'calldata', 'storage']);

function signatureError(text: string, reason: string) {
  return createError('SCHEMA', {
    resource: 'schema',
    operation: OP_SCHEMA.parseJsonAbi,
    message: `Cannot parse declaration "${text}": ${reason}.`,
    context: { signature: text },
  });
}

/** Index of the parenthesis closing the one opened at `open`, or -1. */
function closingParen(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    if (text[i] === '(') depth++;
    else if (text[i] === ')' && --depth === 0) return i;
  }
  return -1;
}

function splitParams(body: string, source: string): string[] {
  const out: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < body.length; i++) {
    if (body[i] === '(') depth++;
    else if (body[i] === ')') depth--;
    else if (body[i] === ',' && depth === 0) {
      out.push(body.slice(start, i));
      start = i + 1;
    }
  }
  if (depth !== 0) throw signatureError(source, 'unbalanced parentheses');
  out.push(body.slice(start));
  return out.map((p) => p.trim());
}

function parseParameter(text: string, source: string): JsonAbiParameter {
  let type: string;
  let rest: string;
  let components: JsonAbiParameter[] | undefined;

  if (text.startsWith('(') || text.startsWith('tuple(')) {
    const open = text.indexOf('(');
    const close = closingParen(text, open);
    if (close < 0) throw signatureError(source, 'unterminated tuple');
    components = parseParameterList(text.slice(open + 1, close), source);
    const suffix = /^(\[\d*\])*/.exec(text.slice(close + 1))?.[0] ?? '';
    type = `tuple${suffix}`;
    rest = text.slice(close + 1 + suffix.length);
  } else {
    const [head, ...tail] = text.split(/\s+/);
    type = head;
    rest = tail.join(' ');
  }

  const words = rest.split(/\s+/).filter((w) => w && !LOCATIONS.has(w));
  const indexed = words[0] === 'indexed';
  if (indexed) words.shift();
  if (words.length > 1) throw signatureError(source, `unexpected tokens "${words.join(' ')}"`);

  return {
    type,
    name: words[0] ?? '',
    ...(indexed ? { indexed } : {}),
    ...(components ? { components } : {}),
  };
}

function parseParameterList(body: string, source: string): JsonAbiParameter[] {
  if (!body.trim()) return [];
  return splitParams(body, source).map((p) => {
    if (!p) throw signatureError(source, 'empty parameter');
    return parseParameter(p, source);
  });
}

/**
 * Parses one human-readable `function` or `event` declaration into a JSON
 * ABI item. A bare `name(types)` is read as a nonpayable function.
 */
export function parseDeclaration(text: string): JsonAbiItem {
  const src = text.trim().replace(/;$/, '');
  const m = /^(?:(function|event)\s+)?([A-Za-z_$][A-Za-z0-9_$]*)\s*\(/.exec(src);
  if (!m) throw signatureError(text, 'expected "name(...)"');
  const [matched, keyword, name] = m;

  const open = matched.length - 1;
  const close = closingParen(src, open);
  if (close < 0) throw signatureError(text, 'unterminated parameter list');
  const inputs = parseParameterList(src.slice(open + 1, close), text);
  const tail = src.slice(close + 1).trim();

  if (keyword === 'event') {
    if (tail && tail !== 'anonymous') throw signatureError(text, `unexpected "${tail}"`);
    return { type: 'event', name, inputs, anonymous: tail === 'anonymous' };
  }

  let stateMutability = 'nonpayable';
  let outputs: JsonAbiParameter[] = [];
  let rest = tail;
  while (rest) {
    const word = /^\S+/.exec(rest)?.[0] ?? '';
    if (MODIFIERS.has(word)) {
      stateMutability = word;
      rest = rest.slice(word.length).trim();
    } else if (word === 'external' || word === 'public') {
      rest = rest.slice(word.length).trim();
    } else if (/^returns\s*\(/.test(rest)) {
      const o = rest.indexOf('(');
      const c = closingParen(rest, o);
      if (c < 0) throw signatureError(text, 'unterminated returns list');
      outputs = parseParameterList(rest.slice(o + 1, c), text);
      rest = rest.slice(c + 1).trim();
    } else {
      throw signatureError(text, `unexpected "${rest}"`);
    }
  }

  return { type: 'function', name, inputs, outputs, stateMutability };
}
