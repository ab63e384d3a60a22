// src/core/utils/lazy.ts

/**
 * Compute-once, cache-forever getter.
 *
 * The factory runs on first access and its result is returned by every later
 * call. A factory that throws caches nothing, so the next caller runs it again.
 * JavaScript runs this synchronously on one thread, so concurrent first access
 * cannot run the factory twice.
 *
 * @example
 * ```typescript
 * const getCodec = lazy(() => createContractCodec(abi));
 * getCodec() === getCodec(); // true
 * ```
 */
export function lazy<T>(factory: () => T): () => T {
  let state: { value: T } | undefined;

  return () => {
    if (!state) state = { value: factory() };
    return state.value;
  };
}
