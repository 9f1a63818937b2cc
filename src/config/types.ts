/**
 * Configuration types for dats-graph.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to conversion settings.
 */

import type { LogLevelName } from '../core/logger.js';
import { DEFAULT_UNORDERED_PROPERTIES } from '../store/NodeStore.js';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  graph: GraphConfig;
  logging: LoggingConfig;
}

/**
 * Graph construction and serialization settings.
 */
export interface GraphConfig {
  /** Whether back-links may be created (default: true); false yields an acyclic document */
  allowBackLinks: boolean;
  /** Base namespace for derived ids (default: '' → blank node ids) */
  namespace: string;
  /** Whether the root object carries an @context (default: true) */
  includeContext: boolean;
  /** Properties whose element order does not affect node identity */
  unorderedProperties: string[];
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Log level (default: 'info') */
  level: LogLevelName;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  graph: {
    allowBackLinks: true,
    namespace: '',
    includeContext: true,
    unorderedProperties: [...DEFAULT_UNORDERED_PROPERTIES],
  },
  logging: {
    level: 'info',
  },
};
