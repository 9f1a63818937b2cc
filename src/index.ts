/**
 * dats-graph — Deduplicated DATS JSON-LD graphs and join queries over them.
 *
 * This is the main entry point for the library.
 */

// Errors and logging
export * from './core/errors.js';
export { logger, createLogger, setLogLevel } from './core/logger.js';
export type { LogLevelName } from './core/logger.js';

// Node store
export * from './store/index.js';

// JSON-LD serialization
export * from './jsonld/index.js';

// Triple index
export * from './index/index.js';

// Join queries
export * from './query/index.js';

// DATS construction helpers
export * from './dats/index.js';

// Configuration
export * from './config/index.js';

// Conversion runs
export { createConversion, initializeConversion } from './conversion.js';
export type { ConversionContext } from './conversion.js';
