// src/core/dispatch/events.ts
import type {
  AbiType,
  AbiValue,
  DecodedEvent,
  DecodedEventField,
  EventSchema,
  LogRecord,
} from '../types/abi';
import type { Bytes32, Hex } from '../types/primitives';
import { OP_EVENTS, type AbiCodecError, type TryResult } from '../types/errors';
import { createError } from '../errors/factory';
import { createErrorHandlers } from '../errors/error-ops';
import { bytesToHex, hexEq, hexToBytes, isHash66, utf8ToBytes } from '../utils';
import { isValueType } from '../codec/descriptor';
import { encodeAbiParameters, encodeInPlace } from '../codec/encoder';
import { decodeAbiParameters, decodeTopicValue, type DecodeOptions } from '../codec/decoder';
import { abiValue, namedValues } from '../codec/values';
import { defaultCodecDeps, type CodecDeps } from '../codec/hash';
import { createSelectorTable } from './selector-table';

const { wrapAs, toResult } = createErrorHandlers('events');

const TOPIC_SIZE = 32;

// -----------------------------------------------------------------------------
// Topics
// -----------------------------------------------------------------------------

/**
 * Topic for one indexed argument. Value types sit in the topic as their
 * 32-byte word; bytes and strings as the hash of their raw content; arrays
 * and tuples as the hash of their in-place encoding.
 */
export function encodeTopic(
  type: AbiType,
  value: AbiValue,
  deps: CodecDeps = defaultCodecDeps,
): Bytes32 {
  return wrapAs('ENCODING', OP_EVENTS.encodeTopics, () => {
    if (isValueType(type)) return bytesToHex(encodeInPlace(type, value));
    if (type.kind === 'bytes' && value.kind === 'bytes') {
      return bytesToHex(deps.keccak256(hexToBytes(value.value)));
    }
    if (type.kind === 'string' && value.kind === 'string') {
      return bytesToHex(deps.keccak256(utf8ToBytes(value.value)));
    }
    return bytesToHex(deps.keccak256(encodeInPlace(type, value)));
  });
}

/**
 * Topic filter for `schema`: topic0 followed by one entry per indexed field,
 * `null` where the caller leaves the field unconstrained. Trailing wildcards
 * are dropped.
 */
export function encodeEventTopics(
  schema: EventSchema,
  indexedArgs: readonly (AbiValue | null | undefined)[] = [],
  deps: CodecDeps = defaultCodecDeps,
): (Hex | null)[] {
  const indexed = schema.inputs.filter((f) => f.indexed);
  if (indexedArgs.length > indexed.length) {
    throw createError('ENCODING', {
      resource: 'events',
      operation: OP_EVENTS.encodeTopics,
      message: `${schema.name} has ${indexed.length} indexed fields, received ${indexedArgs.length} values.`,
      context: { signature: schema.signature },
    });
  }

  const topics: (Hex | null)[] = schema.anonymous ? [] : [schema.topic0];
  indexed.forEach((f, i) => {
    const arg = indexedArgs[i];
    topics.push(arg ? encodeTopic(f.type, arg, deps) : null);
  });
  while (topics.length && topics[topics.length - 1] === null) topics.pop();
  return topics;
}

/** Builds the full log entry a contract would emit for `values` (all fields, declared order). */
export function encodeEventLog(
  schema: EventSchema,
  values: readonly AbiValue[],
  deps: CodecDeps = defaultCodecDeps,
): LogRecord {
  return wrapAs(
    'ENCODING',
    OP_EVENTS.encodeLog,
    () => {
      if (values.length !== schema.inputs.length) {
        throw createError('ENCODING', {
          resource: 'events',
          operation: OP_EVENTS.encodeLog,
          message: `${schema.name} has ${schema.inputs.length} fields, received ${values.length} values.`,
          context: { signature: schema.signature },
        });
      }
      const topics: Hex[] = schema.anonymous ? [] : [schema.topic0];
      const dataTypes: AbiType[] = [];
      const dataValues: AbiValue[] = [];
      schema.inputs.forEach((f, i) => {
        if (f.indexed) {
          topics.push(encodeTopic(f.type, values[i], deps));
        } else {
          dataTypes.push(f.type);
          dataValues.push(values[i]);
        }
      });
      return { topics, data: encodeAbiParameters(dataTypes, dataValues) };
    },
    { ctx: { signature: schema.signature } },
  );
}

// -----------------------------------------------------------------------------
// Decoding
// -----------------------------------------------------------------------------

function mismatch(schema: EventSchema, message: string, context: Record<string, unknown> = {}) {
  return createError('DECODING', {
    resource: 'events',
    operation: OP_EVENTS.decodeLog,
    message,
    context: { signature: schema.signature, topic0: schema.topic0, ...context },
  });
}

/** Decodes a log known to come from `schema`. */
export function decodeEventLog(
  schema: EventSchema,
  log: LogRecord,
  opts: DecodeOptions = {},
): DecodedEvent {
  return wrapAs(
    'DECODING',
    OP_EVENTS.decodeLog,
    () => {
      const indexedCount = schema.inputs.filter((f) => f.indexed).length;
      const skip = schema.anonymous ? 0 : 1;

      const topic0 = log.topics[0];
      if (!schema.anonymous && (topic0 === undefined || !hexEq(topic0, schema.topic0))) {
        throw mismatch(schema, `topic0 does not match ${schema.signature}.`);
      }
      if (log.topics.length !== skip + indexedCount) {
        throw mismatch(
          schema,
          `${schema.signature} expects ${skip + indexedCount} topics, log has ${log.topics.length}.`,
          { length: log.topics.length },
        );
      }

      const data = decodeAbiParameters(
        schema.inputs.filter((f) => !f.indexed).map((f) => f.type),
        log.data,
        opts,
      );

      let topicAt = skip;
      let dataAt = 0;
      const fields: DecodedEventField[] = schema.inputs.map((f) => {
        if (!f.indexed) {
          return { name: f.name, type: f.type, indexed: false, hashed: false, value: data[dataAt++] };
        }
        const topic = log.topics[topicAt++];
        if (!isHash66(topic)) {
          throw mismatch(schema, `Topic ${topicAt - 1} is not a 32-byte word.`, { offset: topicAt - 1 });
        }
        if (isValueType(f.type)) {
          return {
            name: f.name,
            type: f.type,
            indexed: true,
            hashed: false,
            value: decodeTopicValue(f.type, topic, opts),
          };
        }
        // reference types are only present as their hash
        return { name: f.name, type: f.type, indexed: true, hashed: true, value: abiValue.fixedBytes(topic) };
      });

      return {
        schema,
        name: schema.name,
        signature: schema.signature,
        topic0: schema.topic0,
        fields,
        args: namedValues(
          fields,
          fields.map((f) => f.value),
        ),
      };
    },
    { ctx: { signature: schema.signature } },
  );
}

// -----------------------------------------------------------------------------
// Demultiplexer
// -----------------------------------------------------------------------------

export interface EventDemultiplexerOptions extends DecodeOptions {
  /** Log every rejected candidate through console.debug. */
  debug?: boolean;
}

export interface EventDemultiplexer {
  /** Adds a schema under its topic0. Anonymous events cannot be routed and are rejected. */
  register(schema: EventSchema): Bytes32;
  schemas(): readonly EventSchema[];
  candidates(topic0: Hex): readonly EventSchema[];
  /** Throws `NO_MATCHING_SCHEMA` or `DECODING` on failure. */
  decodeLog(log: LogRecord): DecodedEvent;
  tryDecodeLog(log: LogRecord): TryResult<DecodedEvent>;
}

/**
 * Routes raw logs by topic0. Schemas sharing a topic0 are tried in
 * registration order and the first clean decode wins.
 */
export function createEventDemultiplexer(
  schemas: readonly EventSchema[] = [],
  opts: EventDemultiplexerOptions = {},
): EventDemultiplexer {
  const table = createSelectorTable<EventSchema>(TOPIC_SIZE, OP_EVENTS.register);
  const decodeOpts: DecodeOptions = { strict: opts.strict ?? false };

  function register(schema: EventSchema): Bytes32 {
    if (schema.anonymous) {
      throw createError('SCHEMA', {
        resource: 'events',
        operation: OP_EVENTS.register,
        message: `Anonymous event ${schema.name} has no topic0 to route by.`,
        context: { signature: schema.signature },
      });
    }
    return table.register(schema.topic0, schema);
  }
  schemas.forEach(register);

  function decodeLog(log: LogRecord): DecodedEvent {
    const topic0 = log.topics[0];
    if (topic0 === undefined) {
      throw createError('NO_MATCHING_SCHEMA', {
        resource: 'events',
        operation: OP_EVENTS.decodeLog,
        message: 'Log has no topics.',
      });
    }
    const candidates = table.lookup(topic0);
    if (!candidates) {
      throw createError('NO_MATCHING_SCHEMA', {
        resource: 'events',
        operation: OP_EVENTS.decodeLog,
        message: `Unknown event topic ${topic0}.`,
        context: { topic0 },
      });
    }

    let lastError: AbiCodecError | undefined;
    for (const schema of candidates) {
      const res = toResult('DECODING', OP_EVENTS.decodeLog, () => decodeEventLog(schema, log, decodeOpts));
      if (res.ok) return res.value;
      lastError = res.error;
      if (opts.debug) {
        console.debug(`[abi-mux] ${schema.signature} rejected for ${topic0}:`, res.error.envelope.message);
      }
    }

    throw createError('DECODING', {
      resource: 'events',
      operation: OP_EVENTS.decodeLog,
      message: `Log matched ${candidates.map((c) => c.signature).join(', ')} but its fields did not decode.`,
      context: { topic0, candidates: candidates.map((c) => c.signature) },
      cause: lastError?.envelope,
    });
  }

  return {
    register,
    schemas: () => table.entries(),
    candidates: (topic0) => table.lookup(topic0) ?? [],
    decodeLog,
    tryDecodeLog: (log) => toResult('DECODING', OP_EVENTS.tryDecodeLog, () => decodeLog(log)),
  };
}
