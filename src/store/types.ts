/**
 * Types for the node store.
 *
 * A node is a typed, ordered property list. Property values are scalars,
 * nested nodes, references to nodes, or ordered sequences of those.
 */

import type { DatsNode } from './DatsNode.js';
import type { NodeRef } from './ref.js';

/**
 * Node kinds used by DATS documents. Any other string is accepted as a type
 * tag; the union only drives completion and the helpers in `dats/`.
 */
export type DatsKind =
  | 'Dataset'
  | 'Study'
  | 'StudyGroup'
  | 'Material'
  | 'Dimension'
  | 'Identifier'
  | 'Annotation'
  | 'ConsentInfo'
  | 'RelatedIdentifier'
  | 'DataDistribution'
  | 'DataType'
  | 'Activity'
  | 'Person'
  | 'Organization';

export type NodeType = DatsKind | (string & {});

export type Scalar = string | number | boolean | null;

export type PropertyValue = Scalar | DatsNode | NodeRef | PropertyValue[];

export type PropertyEntry = readonly [name: string, value: PropertyValue];

/**
 * Properties as given by callers: ordered pairs, or a plain object whose
 * insertion order is kept.
 */
export type PropertyInput =
  | readonly PropertyEntry[]
  | { readonly [name: string]: PropertyValue };

/**
 * Options for a node store.
 */
export interface NodeStoreOptions {
  /** Whether linkBack() adds edges (default: true) */
  allowBackLinks?: boolean;
  /** Base namespace for derived ids; blank-node ids when absent */
  namespace?: string;
  /** Properties whose element order does not affect identity */
  unorderedProperties?: readonly string[];
}
