// index.ts

export * from './core';

export * as abi from './core/internal/abi-registry';
