/**
 * Triple index module.
 *
 * Reloads a serialized document as (subject, predicate, object) triples
 * for the query engine.
 */

export * from './types.js';
export * from './TripleIndex.js';
