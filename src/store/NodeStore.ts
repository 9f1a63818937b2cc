/**
 * NodeStore — canonical nodes for one conversion run.
 *
 * Every node is created through the store, which assigns its structural
 * identity and keeps at most one node per identity. The orchestrating
 * caller creates a store at the start of a run and drops it after the
 * document has been serialized.
 */

import { GraphError, IdentityConflictError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { deriveNodeId, fingerprintNode } from '../jsonld/IdDeriver.js';
import { assertPropertyName, DatsNode } from './DatsNode.js';
import { createNodeRef, type NodeRef } from './ref.js';
import type {
  NodeStoreOptions,
  NodeType,
  PropertyEntry,
  PropertyInput,
} from './types.js';

const log = createLogger('node-store');

/** Property holding a caller-supplied identity */
export const ID_PROPERTY = '@id';

/**
 * Properties whose element order does not change a node's identity.
 */
export const DEFAULT_UNORDERED_PROPERTIES: readonly string[] = [
  'members',
  'consentInformation',
  'relatedIdentifiers',
  'types',
  'characteristics',
];

export class NodeStore {
  readonly allowBackLinks: boolean;
  private readonly namespace: string | undefined;
  private readonly unordered: ReadonlySet<string>;
  private readonly byId = new Map<string, DatsNode>();
  private backLinkWarningLogged = false;

  constructor(options: NodeStoreOptions = {}) {
    this.allowBackLinks = options.allowBackLinks ?? true;
    this.namespace = options.namespace;
    this.unordered = new Set(options.unorderedProperties ?? DEFAULT_UNORDERED_PROPERTIES);
  }

  /**
   * Create a node, or return the canonical node with the same identity.
   *
   * An explicit @id takes precedence over the derived fingerprint; no other
   * @-prefixed name is accepted (RESERVED_PROPERTY). When the
   * identity is already known the existing node is returned and the new
   * properties are discarded; under an explicit @id the new content must
   * match the existing node.
   */
  create(type: NodeType, properties: PropertyInput = []): DatsNode {
    const entries = normalizeProperties(properties);
    const explicitId = takeExplicitId(type, entries);
    const content = entries.filter(([name]) => name !== ID_PROPERTY);
    for (const [name] of content) {
      assertPropertyName(type, name);
    }

    if (content.length === 0) {
      if (explicitId === undefined) {
        throw new IdentityConflictError(
          'IDENTITY_UNDERIVABLE',
          `Cannot derive an identity for a ${type} node without properties or @id`,
          type
        );
      }
      throw new IdentityConflictError(
        'EMPTY_NODE',
        `Node ${explicitId} of type ${type} has an @id but no properties`,
        type,
        explicitId
      );
    }

    const fingerprint = fingerprintNode(type, content, this.unordered);
    const id = explicitId ?? deriveNodeId(type, fingerprint, this.namespace);

    const existing = this.byId.get(id);
    if (existing) {
      const claimedExplicitly = explicitId !== undefined || existing.explicitId;
      if (claimedExplicitly && existing.fingerprint !== fingerprint) {
        throw new IdentityConflictError(
          'IDENTITY_CONFLICT',
          `Identifier ${id} is already used by a ${existing.type} node with different content`,
          type,
          id
        );
      }
      return existing;
    }

    const node = new DatsNode({
      type,
      id,
      explicitId: explicitId !== undefined,
      fingerprint,
      properties: content,
    });
    this.byId.set(id, node);
    return node;
  }

  /**
   * Reference to a canonical node of this store.
   */
  reference(node: DatsNode): NodeRef {
    this.assertCanonical(node);
    return createNodeRef({ id: node.id, type: node.type });
  }

  /**
   * Append a reference to `target` under `edgeLabel` of `node`.
   *
   * No-op returning false when back-links are disabled.
   */
  linkBack(node: DatsNode, edgeLabel: string, target: DatsNode): boolean {
    if (!this.allowBackLinks) {
      if (!this.backLinkWarningLogged) {
        log.warn('Back-links are disabled; not creating circular links');
        this.backLinkWarningLogged = true;
      }
      return false;
    }
    this.assertCanonical(node);
    node.append(edgeLabel, this.reference(target));
    return true;
  }

  get(id: string): DatsNode | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  get size(): number {
    return this.byId.size;
  }

  /**
   * All canonical nodes in creation order.
   */
  nodes(): DatsNode[] {
    return Array.from(this.byId.values());
  }

  private assertCanonical(node: DatsNode): void {
    if (this.byId.get(node.id) !== node) {
      throw new GraphError('UNKNOWN_NODE', `Node ${node.id} was not created by this store`);
    }
  }
}

/**
 * Create a store for one conversion run.
 */
export function createNodeStore(options: NodeStoreOptions = {}): NodeStore {
  return new NodeStore(options);
}

// A repeated name keeps its first position and its last value
function normalizeProperties(properties: PropertyInput): PropertyEntry[] {
  if (isEntryList(properties)) {
    const byName = new Map<string, PropertyEntry>();
    for (const entry of properties) {
      byName.set(entry[0], entry);
    }
    return Array.from(byName.values());
  }
  return Object.entries(properties);
}

function isEntryList(properties: PropertyInput): properties is readonly PropertyEntry[] {
  return Array.isArray(properties);
}

function takeExplicitId(type: NodeType, entries: readonly PropertyEntry[]): string | undefined {
  const idEntry = entries.find(([name]) => name === ID_PROPERTY);
  if (idEntry === undefined) {
    return undefined;
  }
  const value = idEntry[1];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new IdentityConflictError(
      'IDENTITY_UNDERIVABLE',
      `A ${type} node's @id must be a non-empty string`,
      type
    );
  }
  return value;
}
