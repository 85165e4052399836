/**
 * ethbind
 * Typed Ethereum contract bindings: ABI codec, generated call surfaces,
 * a transaction pipeline and event streams
 */

export * from './core/index.js';
export * from './abi/index.js';
export * from './protocol/index.js';
