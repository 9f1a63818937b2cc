/**
 * Types for JSON-LD serialization.
 *
 * @id and @type are always derived from the node store, never authored
 * in the document by hand.
 */

/**
 * JSON-LD context definition.
 */
export interface JsonLdContext {
  /** Vocabulary prefix mappings */
  [key: string]: string | ContextTerm;
}

/**
 * Extended context term definition.
 */
export interface ContextTerm {
  /** IRI for the term */
  '@id': string;
  /** Type coercion */
  '@type'?: string;
  /** Container type (@list, @set, @language, etc.) */
  '@container'?: '@list' | '@set' | '@language' | '@index';
}

export type JsonLdScalar = string | number | boolean | null;

export type JsonLdValue = JsonLdScalar | JsonLdNodeObject | JsonLdValue[];

/**
 * A node object of a serialized document. A reference is a node object
 * carrying only @type and @id.
 */
export interface JsonLdNodeObject {
  '@context'?: JsonLdContext;
  '@id'?: string;
  '@type': string;
  [property: string]: JsonLdValue | JsonLdContext;
}

/**
 * Options for @context generation.
 */
export interface ContextOptions {
  /** Base namespace of derived ids, added as the `local` prefix */
  namespace?: string;
  /** Default vocabulary namespace */
  vocab?: string;
  /** Additional prefix mappings */
  prefixes?: Record<string, string>;
}

/**
 * Options for @id derivation.
 */
export interface IdDerivationOptions {
  /** Namespace prefix */
  namespace: string;
  /** Node kind (used in path) */
  kind: string;
  /** Local identifier */
  recordId: string;
}

/**
 * Options for serializing a node graph.
 */
export interface GraphBuildOptions {
  /** Whether to attach @context to the root object (default: true) */
  includeContext?: boolean;
  /** Context generation options */
  context?: ContextOptions;
}

/**
 * Result of serializing a node graph.
 */
export interface BuildResult {
  /** The serialized root object */
  document: JsonLdNodeObject;
  /** Number of nodes emitted with full content */
  fullEmissions: number;
  /** Number of occurrences emitted as references */
  references: number;
}
