export * from './hash';
export * from './bytes';
export * from './addr';
export * from './lazy';

// Exhaustiveness helper for discriminated unions
export function assertNever(x: never): never {
  throw new Error('Unexpected variant: ' + String(x));
}
