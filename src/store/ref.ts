/**
 * References stand in for a node's identity wherever a property value is
 * expected. They never carry content.
 */

export interface NodeRef {
  readonly kind: 'node-ref';
  /** Identity of the referenced node */
  readonly id: string;
  /** Type tag of the referenced node */
  readonly type: string;
}

export function createNodeRef(opts: { id: string; type: string }): NodeRef {
  return Object.freeze({ kind: 'node-ref', id: opts.id, type: opts.type });
}

export function isNodeRef(value: unknown): value is NodeRef {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'node-ref' &&
    'id' in value &&
    typeof value.id === 'string' &&
    'type' in value &&
    typeof value.type === 'string'
  );
}
