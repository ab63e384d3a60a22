// src/core/errors/formatter.ts

/* -------------------- Formatting helpers -------------------- */
import type { ErrorEnvelope } from '../types/errors';
import { isBigint, isNumber } from '../utils/hash';

function elideMiddle(s: string, max = 96): string {
  if (s.length <= max) return s;
  const keep = Math.max(10, Math.floor((max - 1) / 2));
  return `${s.slice(0, keep)}…${s.slice(-keep)}`;
}

function shortJSON(v: unknown, max = 240): string {
  try {
    const s = JSON.stringify(v, (_k: string, val: unknown): unknown =>
      isBigint(val) ? `${val.toString()}n` : val,
    );
    return s.length > max ? elideMiddle(s, max) : s;
  } catch {
    return String(v);
  }
}

function scalar(v: unknown, max: number): string {
  return typeof v === 'string' || isNumber(v) || isBigint(v) || typeof v === 'boolean'
    ? String(v)
    : shortJSON(v, max);
}

function kv(label: string, value: string): string {
  const width = 10;
  const pad = label.length >= width ? ' ' : ' '.repeat(width - label.length);
  return `${label + pad}: ${value}`;
}

// Keys surfaced on the one-line context summary, in display order.
const CONTEXT_KEYS = ['selector', 'topic0', 'signature', 'type', 'path', 'offset', 'length'];

function formatContextLine(ctx?: Record<string, unknown>): string | undefined {
  if (!ctx) return;
  const parts: string[] = [];
  for (const key of CONTEXT_KEYS) {
    const val = ctx[key];
    if (val === undefined) continue;
    parts.push(`${key}=${scalar(val, 96)}`);
  }
  return parts.length ? `  ${kv('Context', parts.join('  •  '))}` : undefined;
}

function formatCandidates(ctx?: Record<string, unknown>): string | undefined {
  const candidates = ctx?.['candidates'];
  if (!Array.isArray(candidates) || !candidates.length) return;
  return `  ${kv('Tried', candidates.map((c) => scalar(c, 120)).join(', '))}`;
}

function field(obj: object, key: string): unknown {
  return key in obj ? Reflect.get(obj, key) : undefined;
}

function formatCause(c?: unknown): string[] {
  if (!c) return [];
  const out: string[] = [];

  // Objects expose known fields; anything else is stringified.
  if (typeof c === 'object' && c !== null) {
    const obj = {
      name: field(c, 'name'),
      code: field(c, 'code'),
      message: field(c, 'message'),
      data: field(c, 'data'),
    };
    const head: string[] = [];
    if (obj.name !== undefined) head.push(`name=${scalar(obj.name, 120)}`);
    if (obj.code !== undefined) head.push(`code=${scalar(obj.code, 120)}`);
    if (head.length) out.push(`  ${kv('Cause', head.join('  '))}`);

    if (obj.message) {
      out.push(`              message=${elideMiddle(scalar(obj.message, 600), 600)}`);
    }
    if (obj.data) {
      out.push(`              data=${elideMiddle(shortJSON(obj.data, 200), 200)}`);
    }
  } else {
    out.push(`  ${kv('Cause', shortJSON(c, 200))}`);
  }

  return out;
}

export function formatEnvelopePretty(e: ErrorEnvelope): string {
  const lines: string[] = [];

  // Header
  lines.push(`✖ AbiCodecError [${e.type}]`);
  lines.push(`  ${kv('Message', e.message)}`);
  lines.push('');

  lines.push(`  ${kv('Operation', e.operation)}`);
  lines.push(`  ${kv('Resource', e.resource)}`);

  const ctxLine = formatContextLine(e.context);
  if (ctxLine) lines.push(ctxLine);

  const tried = formatCandidates(e.context);
  if (tried) lines.push(tried);

  const causeLines = formatCause(e.cause);
  if (causeLines.length) lines.push(...causeLines);

  return lines.join('\n');
}
