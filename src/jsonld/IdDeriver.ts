/**
 * IdDeriver — Deterministic identity for graph nodes.
 *
 * A node without an explicit @id is identified by a fingerprint of its type
 * and content. Same content → same id, in any property order.
 *
 * Pattern: {namespace}{kind}/{hash} when a namespace is configured,
 * otherwise a blank node id _:{Type}-{hash}.
 */

import { createHash } from 'node:crypto';
import type { IdDerivationOptions } from './types.js';
import type { PropertyEntry, PropertyValue } from '../store/types.js';

/** Hex characters of the fingerprint kept in derived ids */
export const ID_HASH_LENGTH = 16;

/**
 * Canonical text of a property value.
 *
 * Nested nodes and references both encode as {"@ref": id}, so content that
 * embeds a node and content that references it fingerprint identically.
 * When `unordered` is set, the elements of a top-level list are sorted.
 */
export function canonicalValue(value: PropertyValue, unordered = false): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    const parts = value.map(item => canonicalValue(item));
    if (unordered) {
      parts.sort();
    }
    return `[${parts.join(',')}]`;
  }
  return JSON.stringify({ '@ref': value.id });
}

/**
 * Canonical text of a node's type and content. Property names are sorted.
 */
export function canonicalNode(
  type: string,
  properties: readonly PropertyEntry[],
  unorderedProperties: ReadonlySet<string> = new Set()
): string {
  const parts = [...properties]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, value]) => `${JSON.stringify(name)}:${canonicalValue(value, unorderedProperties.has(name))}`);
  return `{"@type":${JSON.stringify(type)},"properties":{${parts.join(',')}}}`;
}

/**
 * SHA-256 fingerprint (hex) of a node's type and content.
 */
export function fingerprintNode(
  type: string,
  properties: readonly PropertyEntry[],
  unorderedProperties?: ReadonlySet<string>
): string {
  return createHash('sha256')
    .update(canonicalNode(type, properties, unorderedProperties))
    .digest('hex');
}

/**
 * Derive a namespaced id: {namespace}{kind}/{recordId}.
 */
export function deriveId(options: IdDerivationOptions): string {
  const { namespace, kind, recordId } = options;

  if (!namespace || namespace.trim().length === 0) {
    throw new Error('namespace is required for @id derivation');
  }

  if (!kind || kind.trim().length === 0) {
    throw new Error('kind is required for @id derivation');
  }

  if (!recordId || recordId.trim().length === 0) {
    throw new Error('recordId is required for @id derivation');
  }

  const normalizedNamespace = namespace.endsWith('/')
    ? namespace
    : `${namespace}/`;

  // Lowercase, no spaces
  const normalizedKind = kind.toLowerCase().replace(/\s+/g, '-');

  return `${normalizedNamespace}${normalizedKind}/${recordId}`;
}

/**
 * Derive the id of a node from its fingerprint.
 */
export function deriveNodeId(type: string, fingerprint: string, namespace?: string): string {
  const hash = fingerprint.slice(0, ID_HASH_LENGTH);
  if (namespace !== undefined && namespace.trim().length > 0) {
    return deriveId({ namespace, kind: type, recordId: hash });
  }
  return `_:${type.replace(/[^a-zA-Z0-9]/g, '_')}-${hash}`;
}

/**
 * Blank node id for the n-th unidentified object of a loaded document.
 */
export function generateBlankNodeId(index: number): string {
  return `_:b${index}`;
}
