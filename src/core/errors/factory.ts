// src/core/errors/factory.ts
import { AbiCodecError, type ErrorEnvelope, type ErrorType } from '../types/errors';

/** Creates an AbiCodecError of the specified type, with the provided details. */
export function createError(type: ErrorType, input: Omit<ErrorEnvelope, 'type'>): AbiCodecError {
  return new AbiCodecError({ ...input, type });
}

/** Summary of a foreign failure, stored as an envelope's `cause`. */
export interface ShapedCause {
  name?: string;
  message?: string;
  code?: unknown;
  /** First 4 bytes of revert data, when the failure carried any. */
  data?: string;
}

const isRecord = (x: unknown): x is Record<string, unknown> => x !== null && typeof x === 'object';
const text = (x: unknown) => (typeof x === 'string' ? x : undefined);

// Revert data sits at `data` (viem, ethers), `data.data` (nested provider
// errors) or `error.data` (raw JSON-RPC responses).
function revertData(r: Record<string, unknown>): unknown {
  if (isRecord(r.data) && 'data' in r.data) return r.data.data;
  if (isRecord(r.error) && 'data' in r.error) return r.error.data;
  return r.data;
}

/**
 * Shapes what `createErrorHandlers` catches: codec failures (`Error`s from
 * hex, UTF-8 or bigint parsing) and transport rejections from viem, ethers or
 * a hand-written client.
 */
export function shapeCause(err: unknown): ShapedCause {
  if (typeof err === 'string') return { message: err };
  if (!isRecord(err)) return {};

  const data = revertData(err);
  return {
    name: text(err.name),
    message: text(err.message) ?? text(err.shortMessage),
    code: err.code,
    data: typeof data === 'string' && data.startsWith('0x') ? `${data.slice(0, 10)}…` : undefined,
  };
}
