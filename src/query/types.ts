/**
 * Types for join queries.
 *
 * A query walks typed relationship steps from a start type, then projects
 * columns along short paths from the nodes it bound. Queries are plain data
 * and hold no state between runs.
 */

import type { LiteralValue } from '../index/types.js';

/**
 * First step: the nodes a query starts from.
 */
export interface StartStep {
  /** Declared type of the start nodes */
  type: string;
  /** Restrict to one node identity */
  id?: string;
  /** Column name of the start node (default: n0) */
  as?: string;
}

/**
 * One hop: follow `predicate`, keep objects of `type`.
 *
 * Without a type filter any object is kept, literals included.
 */
export interface JoinStep {
  predicate: string;
  type?: string;
  /** Column name of the reached node (default: n1, n2, ...) */
  as?: string;
}

export type PathStep = Omit<JoinStep, 'as'>;

/**
 * A column computed by walking `path` from an earlier column.
 */
export interface ColumnSpec {
  name: string;
  /** Name of the column the path starts from */
  from: string;
  path: PathStep[];
}

export interface EqualsFilter {
  column: string;
  equals: LiteralValue;
}

export interface JoinQuery {
  start: StartStep;
  steps?: JoinStep[];
  columns?: ColumnSpec[];
  where?: EqualsFilter[];
  /** Output columns (default: every step and column, in order) */
  select?: string[];
  /** Sort columns (default: the selected columns, in order) */
  orderBy?: string[];
}

/** A node column renders as the node's identity */
export type QueryValue = LiteralValue;

export type QueryRow = readonly QueryValue[];

export interface QueryResult {
  columns: string[];
  rows: QueryRow[];
}
