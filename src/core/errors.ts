/**
 * Error taxonomy for graph construction and loading.
 *
 * Structural errors abort the run. A malformed query is an error
 * (INVALID_QUERY); a query that matches nothing is not, and never surfaces
 * here.
 */

export type GraphErrorCode =
  | 'IDENTITY_CONFLICT'
  | 'IDENTITY_UNDERIVABLE'
  | 'EMPTY_NODE'
  | 'UNKNOWN_NODE'
  | 'NOT_A_LIST'
  | 'RESERVED_PROPERTY'
  | 'MISSING_PROPERTY'
  | 'DANGLING_REFERENCE'
  | 'MISSING_TYPE'
  | 'TYPE_MISMATCH'
  | 'INVALID_DOCUMENT'
  | 'INVALID_QUERY';

/**
 * Base class for all structural graph errors.
 */
export class GraphError extends Error {
  readonly code: GraphErrorCode;

  constructor(code: GraphErrorCode, message: string) {
    super(message);
    this.name = 'GraphError';
    this.code = code;
  }
}

/**
 * Two different contents claim one explicit identifier, or no identity
 * can be derived for a node.
 */
export class IdentityConflictError extends GraphError {
  constructor(
    code: 'IDENTITY_CONFLICT' | 'IDENTITY_UNDERIVABLE' | 'EMPTY_NODE',
    message: string,
    public readonly nodeType: string,
    public readonly nodeId?: string
  ) {
    super(code, message);
    this.name = 'IdentityConflictError';
  }
}

/**
 * A serialized document cannot be indexed.
 */
export class MalformedDocumentError extends GraphError {
  constructor(
    code: 'DANGLING_REFERENCE' | 'MISSING_TYPE' | 'TYPE_MISMATCH' | 'INVALID_DOCUMENT',
    message: string,
    public readonly path: string
  ) {
    super(code, `${message} (at ${path})`);
    this.name = 'MalformedDocumentError';
  }
}

export class MissingPropertyError extends GraphError {
  constructor(
    public readonly nodeId: string,
    public readonly property: string
  ) {
    super('MISSING_PROPERTY', `Node ${nodeId} has no property '${property}'`);
    this.name = 'MissingPropertyError';
  }
}

/**
 * Type guard for graph errors, optionally narrowed to one code.
 */
export function isGraphError(err: unknown, code?: GraphErrorCode): err is GraphError {
  return err instanceof GraphError && (code === undefined || err.code === code);
}
