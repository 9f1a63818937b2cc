/**
 * DatsNode — a typed node with an ordered property list.
 *
 * Identity is fixed when the node is created by a NodeStore. Later
 * mutations (set, append) change content but never the identity. Property
 * names never start with @.
 */

import { GraphError, MissingPropertyError } from '../core/errors.js';
import type { NodeType, PropertyEntry, PropertyValue } from './types.js';

/**
 * Names starting with @ are JSON-LD keywords; the serializer writes them
 * from the node's own identity and type.
 */
function isReservedPropertyName(name: string): boolean {
  return name.startsWith('@');
}

export function assertPropertyName(nodeType: string, name: string): void {
  if (isReservedPropertyName(name)) {
    throw new GraphError(
      'RESERVED_PROPERTY',
      `Property name '${name}' of a ${nodeType} node is reserved`
    );
  }
}

export interface DatsNodeInit {
  type: NodeType;
  id: string;
  /** Whether the id came from an explicit @id property */
  explicitId: boolean;
  /** Fingerprint of the content the node was created with */
  fingerprint: string;
  properties: readonly PropertyEntry[];
}

export class DatsNode {
  readonly type: NodeType;
  readonly id: string;
  readonly explicitId: boolean;
  readonly fingerprint: string;
  private readonly properties = new Map<string, PropertyValue>();

  constructor(init: DatsNodeInit) {
    this.type = init.type;
    this.id = init.id;
    this.explicitId = init.explicitId;
    this.fingerprint = init.fingerprint;
    for (const [name, value] of init.properties) {
      assertPropertyName(this.type, name);
      this.properties.set(name, copyValue(value));
    }
  }

  /**
   * Get a property value. Throws if the property is absent.
   */
  get(name: string): PropertyValue {
    const value = this.properties.get(name);
    if (value === undefined) {
      throw new MissingPropertyError(this.id, name);
    }
    return value;
  }

  /**
   * Get a property value, or undefined when absent.
   */
  find(name: string): PropertyValue | undefined {
    return this.properties.get(name);
  }

  has(name: string): boolean {
    return this.properties.has(name);
  }

  /**
   * Get a list-valued property. Throws if absent or not a list.
   */
  getList(name: string): PropertyValue[] {
    const value = this.get(name);
    if (!Array.isArray(value)) {
      throw new GraphError('NOT_A_LIST', `Property '${name}' of node ${this.id} is not a list`);
    }
    return value;
  }

  /**
   * Set a property. New names go to the end of the property order,
   * existing names keep their position.
   */
  set(name: string, value: PropertyValue): this {
    assertPropertyName(this.type, name);
    this.properties.set(name, copyValue(value));
    return this;
  }

  /**
   * Append values to a list-valued property, creating it when absent.
   */
  append(name: string, ...values: PropertyValue[]): this {
    assertPropertyName(this.type, name);
    const current = this.properties.get(name);
    if (current === undefined) {
      this.properties.set(name, [...values]);
      return this;
    }
    if (!Array.isArray(current)) {
      throw new GraphError('NOT_A_LIST', `Property '${name}' of node ${this.id} is not a list`);
    }
    current.push(...values);
    return this;
  }

  get propertyNames(): string[] {
    return Array.from(this.properties.keys());
  }

  entries(): IterableIterator<[string, PropertyValue]> {
    return this.properties.entries();
  }
}

// Lists are copied so callers cannot change a node through an array they
// still hold. Nodes and refs are shared.
function copyValue(value: PropertyValue): PropertyValue {
  return Array.isArray(value) ? value.map(copyValue) : value;
}
