/**
 * GraphBuilder — Serialize a node graph to a JSON-LD document.
 *
 * The graph is walked depth-first from a root node. The first occurrence of
 * a node carries its full content; every later occurrence is emitted as a
 * reference ({ "@type", "@id" }). Full emissions carry the store identity
 * as @id, so a reloaded document keeps the ids the store assigned. A node
 * counts as emitted as soon as its emission starts, so cycles through
 * inline nodes terminate.
 */

import { GraphError, IdentityConflictError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { DatsNode } from '../store/DatsNode.js';
import type { PropertyValue } from '../store/types.js';
import { buildContext } from './ContextBuilder.js';
import type {
  BuildResult,
  GraphBuildOptions,
  JsonLdNodeObject,
  JsonLdValue,
} from './types.js';

const log = createLogger('graph-builder');

/**
 * Mutable state of one emission pass.
 */
interface EmissionState {
  seen: Set<string>;
  /** Targets of NodeRef values, checked for a full emission at the end */
  pendingRefs: Map<string, string>;
  fullEmissions: number;
  references: number;
}

/**
 * GraphBuilder — Serializes a graph of DatsNodes.
 */
export class GraphBuilder {
  private readonly includeContext: boolean;
  private readonly options: GraphBuildOptions;

  constructor(options: GraphBuildOptions = {}) {
    this.options = options;
    this.includeContext = options.includeContext ?? true;
  }

  /**
   * Serialize the graph reachable from `root`.
   */
  build(root: DatsNode): BuildResult {
    const state: EmissionState = {
      seen: new Set(),
      pendingRefs: new Map(),
      fullEmissions: 0,
      references: 0,
    };

    const body = this.emitNode(root, state);

    for (const [id, type] of state.pendingRefs) {
      if (!state.seen.has(id)) {
        throw new GraphError(
          'DANGLING_REFERENCE',
          `Reference to ${type} ${id} has no full emission in the document`
        );
      }
    }

    const document: JsonLdNodeObject = this.includeContext
      ? { '@context': buildContext(this.options.context), ...body }
      : body;

    log.debug(
      `Serialized ${state.fullEmissions} node(s) in full and ${state.references} as references`
    );

    return {
      document,
      fullEmissions: state.fullEmissions,
      references: state.references,
    };
  }

  private emitNode(node: DatsNode, state: EmissionState): JsonLdNodeObject {
    if (!node.id) {
      throw new IdentityConflictError(
        'IDENTITY_UNDERIVABLE',
        `Cannot serialize a ${node.type} node without an identity`,
        node.type
      );
    }

    if (state.seen.has(node.id)) {
      state.references++;
      return { '@type': node.type, '@id': node.id };
    }
    state.seen.add(node.id);
    state.fullEmissions++;

    const out: JsonLdNodeObject = { '@type': node.type, '@id': node.id };
    for (const [name, value] of node.entries()) {
      out[name] = this.emitValue(value, state);
    }
    return out;
  }

  private emitValue(value: PropertyValue, state: EmissionState): JsonLdValue {
    if (value === null || typeof value !== 'object') {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map(item => this.emitValue(item, state));
    }
    if (value instanceof DatsNode) {
      return this.emitNode(value, state);
    }
    state.references++;
    state.pendingRefs.set(value.id, value.type);
    return { '@type': value.type, '@id': value.id };
  }
}

/**
 * Create a new GraphBuilder instance.
 */
export function createGraphBuilder(options: GraphBuildOptions = {}): GraphBuilder {
  return new GraphBuilder(options);
}

/**
 * Serialize the graph reachable from `root` and return the document.
 */
export function buildDocument(root: DatsNode, options: GraphBuildOptions = {}): JsonLdNodeObject {
  return new GraphBuilder(options).build(root).document;
}

/**
 * Render a document as JSON text.
 */
export function serializeDocument(document: JsonLdNodeObject): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}
