/**
 * Configuration loader for dats-graph.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { createLogger } from '../core/logger.js';
import type { AppConfig, GraphConfig, LoggingConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

const log = createLogger('config');

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
}

/**
 * Config as written in the file, before defaults are applied.
 */
export interface PartialAppConfig {
  graph?: Partial<GraphConfig>;
  logging?: Partial<LoggingConfig>;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/** A value that is a single placeholder and nothing else */
const WHOLE_VALUE_PATTERN = /^\$\{[A-Z_][A-Z0-9_]*(?::-[^}]*)?\}$/i;

const LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'];

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string): string {
  return value.replace(
    ENV_VAR_PATTERN,
    (_match: string, varName: string, defaultValue: string | undefined) => {
      const envValue = process.env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      log.warn(`Environment variable ${varName} is not set and has no default`);
      return '';
    }
  );
}

/**
 * Substitute a string value. A value made of one placeholder takes the
 * YAML type of its substitution, so `${FLAG:-false}` becomes a boolean.
 */
function substituteValue(value: string): unknown {
  const substituted = substituteEnvVars(value);
  if (!WHOLE_VALUE_PATTERN.test(value)) {
    return substituted;
  }
  const scalar: unknown = parseYaml(substituted);
  return typeof scalar === 'boolean' || typeof scalar === 'number' ? scalar : substituted;
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteValue(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate graph configuration.
 */
function validateGraphConfig(config: unknown, path = 'graph'): asserts config is Partial<GraphConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.allowBackLinks !== undefined && typeof config.allowBackLinks !== 'boolean') {
    throw new ConfigValidationError('allowBackLinks must be a boolean', `${path}.allowBackLinks`, config.allowBackLinks);
  }

  if (config.namespace !== undefined && typeof config.namespace !== 'string') {
    throw new ConfigValidationError('namespace must be a string', `${path}.namespace`, config.namespace);
  }

  if (config.includeContext !== undefined && typeof config.includeContext !== 'boolean') {
    throw new ConfigValidationError('includeContext must be a boolean', `${path}.includeContext`, config.includeContext);
  }

  const unordered = config.unorderedProperties;
  if (unordered !== undefined) {
    if (!Array.isArray(unordered)) {
      throw new ConfigValidationError('unorderedProperties must be an array', `${path}.unorderedProperties`, unordered);
    }
    unordered.forEach((name: unknown, index) => {
      if (typeof name !== 'string' || name.length === 0) {
        throw new ConfigValidationError('must be a non-empty string', `${path}.unorderedProperties[${index}]`, name);
      }
    });
  }
}

/**
 * Validate logging configuration.
 */
function validateLoggingConfig(config: unknown, path = 'logging'): asserts config is Partial<LoggingConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.level !== undefined && (typeof config.level !== 'string' || !LOG_LEVELS.includes(config.level))) {
    throw new ConfigValidationError('level must be one of: debug, info, warn, error', `${path}.level`, config.level);
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is PartialAppConfig {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  if (config.graph !== undefined) {
    validateGraphConfig(config.graph);
  }

  if (config.logging !== undefined) {
    validateLoggingConfig(config.logging);
  }
}

/**
 * A fresh copy of the default configuration.
 */
export function getDefaultConfig(): AppConfig {
  return {
    graph: {
      ...DEFAULT_CONFIG.graph,
      unorderedProperties: [...DEFAULT_CONFIG.graph.unorderedProperties],
    },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}

/**
 * Apply defaults to a partial configuration.
 */
export function applyDefaults(partial: PartialAppConfig): AppConfig {
  const defaults = getDefaultConfig();
  return {
    graph: { ...defaults.graph, ...partial.graph },
    logging: { ...defaults.logging, ...partial.logging },
  };
}

/**
 * Parse configuration from YAML text.
 *
 * @param content - YAML document
 * @returns Validated configuration with defaults applied
 */
export function parseConfig(content: string): AppConfig {
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return getDefaultConfig();
  }

  const substituted = substituteEnvVarsRecursive(parsed);

  validateConfig(substituted);
  return applyDefaults(substituted);
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    log.warn(`Config file not found at ${absolutePath}, using defaults`);
    return getDefaultConfig();
  }

  const content = await readFile(absolutePath, 'utf-8');
  return parseConfig(content);
}
