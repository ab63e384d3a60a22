// src/core/schema/event.ts
import type { EventField, EventSchema, JsonAbiItem } from '../types/abi';
import { OP_SCHEMA } from '../types/errors';
import { createError } from '../errors/factory';
import { formatSignature, parseAbiType } from '../codec/descriptor';
import { defaultCodecDeps, hashSignature, type CodecDeps } from '../codec/hash';
import { parseDeclaration } from './signature';

/** topic0 holds the signature hash, leaving three topics for indexed fields. */
const MAX_INDEXED = 3;

/**
 * Builds an immutable event schema from a JSON ABI item or a human-readable
 * declaration (`event Dispatch(address indexed sender, …, bytes message)`).
 */
export function defineEvent(def: JsonAbiItem | string, deps: CodecDeps = defaultCodecDeps): EventSchema {
  const item = typeof def === 'string' ? parseDeclaration(def) : def;
  if (item.type !== 'event' || !item.name) {
    throw createError('SCHEMA', {
      resource: 'schema',
      operation: OP_SCHEMA.defineEvent,
      message: `Expected a named event item, received "${item.type}".`,
      context: { type: item.type },
    });
  }

  const anonymous = item.anonymous ?? false;
  const inputs: EventField[] = (item.inputs ?? []).map((p) =>
    Object.freeze({
      name: p.name ?? '',
      type: parseAbiType(p.type, p.components),
      indexed: p.indexed ?? false,
    }),
  );

  const indexed = inputs.filter((f) => f.indexed).length;
  const limit = anonymous ? MAX_INDEXED + 1 : MAX_INDEXED;
  if (indexed > limit) {
    throw createError('SCHEMA', {
      resource: 'schema',
      operation: OP_SCHEMA.defineEvent,
      message: `Event ${item.name} declares ${indexed} indexed fields, at most ${limit} allowed.`,
      context: { signature: item.name },
    });
  }

  const signature = formatSignature(item.name, inputs);
  return Object.freeze({
    name: item.name,
    inputs: Object.freeze(inputs),
    anonymous,
    signature,
    topic0: hashSignature(signature, deps),
  });
}
