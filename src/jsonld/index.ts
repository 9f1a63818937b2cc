/**
 * JSON-LD module exports.
 */

export * from './types.js';
export * from './IdDeriver.js';
export * from './ContextBuilder.js';
export * from './GraphBuilder.js';
