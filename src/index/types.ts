/**
 * Types for the triple index.
 *
 * The index is a read-only snapshot of one serialized document, flattened
 * to (subject, predicate, object) triples.
 */

/** Predicate of the triples that declare a node's type */
export const TYPE_PREDICATE = '@type';

export type LiteralValue = string | number | boolean;

/**
 * Object of a triple: another node, or a literal.
 */
export type Term =
  | { readonly termType: 'node'; readonly id: string }
  | { readonly termType: 'literal'; readonly value: LiteralValue };

export interface Triple {
  /** Identity of the subject node */
  readonly subject: string;
  /** Property name */
  readonly predicate: string;
  readonly object: Term;
}

/**
 * Counts describing a loaded index.
 */
export interface IndexStats {
  tripleCount: number;
  subjectCount: number;
  types: string[];
}
