// src/core/schema/json-abi.ts
import type { EventSchema, FunctionSchema, JsonAbi } from '../types/abi';
import { defaultCodecDeps, type CodecDeps } from '../codec/hash';
import { defineFunction } from './function';
import { defineEvent } from './event';
import { parseDeclaration } from './signature';

export interface ParsedAbi {
  /** Declaration order is preserved: it decides overload resolution. */
  readonly functions: readonly FunctionSchema[];
  readonly events: readonly EventSchema[];
}

/**
 * Turns a static interface definition into schemas. Accepts JSON ABI items or
 * human-readable declarations; constructor, error, fallback and receive items
 * carry nothing routable and are skipped.
 */
export function parseJsonAbi(
  abi: JsonAbi | readonly string[],
  deps: CodecDeps = defaultCodecDeps,
): ParsedAbi {
  const functions: FunctionSchema[] = [];
  const events: EventSchema[] = [];

  for (const entry of abi) {
    const item = typeof entry === 'string' ? parseDeclaration(entry) : entry;
    if (item.type === 'function') functions.push(defineFunction(item, deps));
    else if (item.type === 'event') events.push(defineEvent(item, deps));
  }

  return Object.freeze({ functions: Object.freeze(functions), events: Object.freeze(events) });
}
