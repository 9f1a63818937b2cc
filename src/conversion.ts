/**
 * Conversion context — wires one conversion run from configuration.
 *
 * A run owns its NodeStore. Callers build nodes through `store`, then
 * serialize the root with `build()`.
 */

import type { AppConfig } from './config/types.js';
import { getDefaultConfig, loadConfig, type LoadConfigOptions } from './config/loader.js';
import { createLogger, setLogLevel } from './core/logger.js';
import { createGraphBuilder } from './jsonld/GraphBuilder.js';
import type { BuildResult } from './jsonld/types.js';
import type { DatsNode } from './store/DatsNode.js';
import { NodeStore } from './store/NodeStore.js';
import type { NodeStoreOptions } from './store/types.js';

const log = createLogger('conversion');

/**
 * State of one conversion run.
 */
export interface ConversionContext {
  config: AppConfig;
  store: NodeStore;
  /** Serialize the graph reachable from `root` */
  build: (root: DatsNode) => BuildResult;
}

/**
 * Create a conversion run from a resolved configuration.
 */
export function createConversion(config: AppConfig = getDefaultConfig()): ConversionContext {
  setLogLevel(config.logging.level);

  const namespace = config.graph.namespace.trim();
  const storeOptions: NodeStoreOptions = {
    allowBackLinks: config.graph.allowBackLinks,
    unorderedProperties: config.graph.unorderedProperties,
  };
  if (namespace.length > 0) {
    storeOptions.namespace = namespace;
  }

  const store = new NodeStore(storeOptions);
  const builder = createGraphBuilder({
    includeContext: config.graph.includeContext,
    context: namespace.length > 0 ? { namespace } : {},
  });

  log.debug(`Conversion started (back-links ${config.graph.allowBackLinks ? 'enabled' : 'disabled'})`);

  return {
    config,
    store,
    build: root => {
      const result = builder.build(root);
      log.info(`Built document with ${result.fullEmissions} node(s) from ${store.size} canonical node(s)`);
      return result;
    },
  };
}

/**
 * Load configuration from disk and create a conversion run.
 */
export async function initializeConversion(options: LoadConfigOptions = {}): Promise<ConversionContext> {
  const config = await loadConfig(options);
  return createConversion(config);
}
