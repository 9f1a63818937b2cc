import type { ConsolaInstance } from 'consola';
import { createConsola, LogLevels } from 'consola';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

// Root instance for untagged output
export const logger: ConsolaInstance = createConsola({ level: LogLevels.info });

// withTag copies options, so tagged loggers are tracked to follow level changes
const tagged = new Map<string, ConsolaInstance>();

/**
 * Scoped logger with a [tag] prefix.
 */
export function createLogger(tag: string): ConsolaInstance {
  const existing = tagged.get(tag);
  if (existing) {
    return existing;
  }
  const child = logger.withTag(tag);
  tagged.set(tag, child);
  return child;
}

/**
 * Set the level of the root logger and every tagged logger.
 */
export function setLogLevel(level: LogLevelName): void {
  logger.level = LogLevels[level];
  for (const child of tagged.values()) {
    child.level = LogLevels[level];
  }
}
