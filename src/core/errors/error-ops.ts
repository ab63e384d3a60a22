// src/core/errors/error-ops.ts

import { createError, shapeCause } from './factory';
import {
  isAbiCodecError,
  type AbiCodecError,
  type TryResult,
  type ErrorEnvelope,
  type ErrorType,
  type Resource,
} from '../types/errors';

type Ctx = Record<string, unknown>;

type WrapOptions<TCtx extends Ctx = Ctx> = {
  /** Optional contextual data for debugging */
  ctx?: TCtx;
  /** Optional error message */
  message?: string | (() => string);
};

function resolveMessage(op: string, msg?: string | (() => string)) {
  if (!msg) return `Error during ${op}.`;
  return typeof msg === 'function' ? msg() : msg;
}

// Wraps an unknown error into an AbiCodecError of the given type, preserving context.
export function toAbiCodecError(
  type: ErrorType,
  base: Omit<ErrorEnvelope, 'type' | 'cause'>,
  err: unknown,
): AbiCodecError {
  if (isAbiCodecError(err)) return err;
  return createError(type, { ...base, cause: shapeCause(err) });
}

/**
 * Factory for resource-scoped error handlers.
 * Codec operations never suspend; only `wrapAsync` awaits, for the transport.
 *
 * Example:
 *   const { wrapAs, toResult } = createErrorHandlers('calls');
 */
export function createErrorHandlers(resource: Resource) {
  function run<T, TCtx extends Ctx = Ctx>(
    kind: ErrorType,
    operation: string,
    fn: () => T,
    opts?: WrapOptions<TCtx>,
  ): T {
    try {
      return fn();
    } catch (e) {
      // If already shaped, preserve it; else wrap with chosen kind.
      if (isAbiCodecError(e)) throw e;
      const message = resolveMessage(operation, opts?.message);
      throw toAbiCodecError(kind, { resource, operation, context: opts?.ctx ?? {}, message }, e);
    }
  }

  function wrapAs<T, TCtx extends Ctx = Ctx>(
    kind: ErrorType,
    operation: string,
    fn: () => T,
    opts?: WrapOptions<TCtx>,
  ): T {
    return run(kind, operation, fn, opts);
  }

  function toResult<T, TCtx extends Ctx = Ctx>(
    kind: ErrorType,
    operation: string,
    fn: () => T,
    opts?: WrapOptions<TCtx>,
  ): TryResult<T> {
    try {
      return { ok: true, value: run(kind, operation, fn, opts) };
    } catch (e) {
      // Ensure we always return a shaped error
      const shaped = toAbiCodecError(
        kind,
        {
          resource,
          operation,
          context: opts?.ctx ?? {},
          message: resolveMessage(operation, opts?.message),
        },
        e,
      );
      return { ok: false, error: shaped };
    }
  }

  /** Async flavor for the transport boundary, the only place that awaits. */
  async function wrapAsync<T, TCtx extends Ctx = Ctx>(
    kind: ErrorType,
    operation: string,
    fn: () => Promise<T>,
    opts?: WrapOptions<TCtx>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      if (isAbiCodecError(e)) throw e;
      const message = resolveMessage(operation, opts?.message);
      throw toAbiCodecError(kind, { resource, operation, context: opts?.ctx ?? {}, message }, e);
    }
  }

  return { wrapAs, toResult, wrapAsync };
}
