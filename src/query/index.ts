/**
 * Query module exports.
 */

export * from './types.js';
export * from './QueryEngine.js';
export * from './datasetQueries.js';
export * from './format.js';
