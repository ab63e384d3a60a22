// src/core/dispatch/selector-table.ts
import type { Hex } from '../types/primitives';
import { createError } from '../errors/factory';
import { isHash } from '../utils';

export interface SelectorTable<T> {
  /** Selector width in bytes (4 for calls, 32 for topics). */
  readonly width: number;
  /** Number of registered entries. */
  readonly size: number;
  /** Adds `entry` under `selector`. Registering the same entry twice is a no-op. */
  register(selector: Hex, entry: T): Hex;
  /** Every entry under `selector` in registration order, or undefined. */
  lookup(selector: Hex): readonly T[] | undefined;
  /** All entries in registration order. */
  entries(): readonly T[];
}

/**
 * Maps a selector (4-byte call selector or 32-byte topic0) to every entry
 * registered under it. Entries sharing a selector are kept side by side in
 * registration order; nothing is ever overwritten.
 * `operation` names the owning registry in width errors.
 */
export function createSelectorTable<T>(width: number, operation: string): SelectorTable<T> {
  const bySelector = new Map<string, T[]>();
  const order: T[] = [];
  const isSelector = (x: unknown): x is Hex => isHash(x, 2 + width * 2);

  function register(selector: Hex, entry: T): Hex {
    if (!isSelector(selector)) {
      throw createError('SCHEMA', {
        resource: 'selectors',
        operation,
        message: `Selector must be ${width} bytes of 0x-hex, received "${selector}".`,
        context: { selector },
      });
    }
    const key = selector.toLowerCase();
    const bucket = bySelector.get(key);
    if (bucket?.includes(entry)) return selector;
    if (bucket) bucket.push(entry);
    else bySelector.set(key, [entry]);
    order.push(entry);
    return selector;
  }

  function lookup(selector: Hex): readonly T[] | undefined {
    return isSelector(selector) ? bySelector.get(selector.toLowerCase()) : undefined;
  }

  return {
    width,
    get size() {
      return order.length;
    },
    register,
    lookup,
    entries: () => order,
  };
}
