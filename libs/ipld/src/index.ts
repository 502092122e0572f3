export * from './lib/cid.js';
export * from './lib/codec.js';
export * from './lib/format.js';
export * from './lib/ipld.js';
export * from './lib/ipld-error.js';
export * from './lib/ipld-visitor.js';
