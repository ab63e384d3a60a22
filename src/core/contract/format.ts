// src/core/contract/format.ts
import type { AbiValue, DecodedCall, DecodedEvent } from '../types/abi';

export function formatAbiValue(value: AbiValue): string {
  switch (value.kind) {
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'uint':
    case 'int':
      return value.value.toString();
    case 'string':
      return JSON.stringify(value.value);
    case 'array':
      return `[${value.items.map(formatAbiValue).join(', ')}]`;
    case 'tuple':
      return `(${value.items.map(formatAbiValue).join(', ')})`;
    default:
      return value.value;
  }
}

/** `dispatch(7, 0x…01, 0x6869)` */
export function formatDecodedCall(call: DecodedCall): string {
  return `${call.name}(${call.values.map(formatAbiValue).join(', ')})`;
}

/**
 * `Dispatch(sender=0x…, destination=7, …)`. Hashed indexed fields are
 * rendered as `keccak(0x…)`.
 */
export function formatDecodedEvent(event: DecodedEvent): string {
  const fields = event.fields.map((f, i) => {
    const rendered = f.hashed ? `keccak(${formatAbiValue(f.value)})` : formatAbiValue(f.value);
    return `${f.name || i}=${rendered}`;
  });
  return `${event.name}(${fields.join(', ')})`;
}
