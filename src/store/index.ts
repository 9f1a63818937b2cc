/**
 * Node store module exports.
 */

export * from './types.js';
export * from './ref.js';
export * from './DatsNode.js';
export * from './NodeStore.js';
