export * from './lib/cbor-error.js';
export * from './lib/decoder.js';
export * from './lib/encoder.js';
export * from './lib/float16.js';
export * from './lib/limits.js';
export * from './lib/schema.js';
export type * from './lib/visitor.js';
