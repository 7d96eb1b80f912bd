export type GraphErrorKind =
  | 'EndpointNotFound'
  | 'PortIndexOutOfRange'
  | 'RoleMismatch'
  | 'PortAlreadyConnected'
  | 'CrossGraphEdge'
  | 'MalformedDocumentEntity'
  | 'UnknownNodeType'
  | 'DuplicateId';

/**
 * Recoverable failure of a topology operation. The registry is left unchanged
 * whenever one of these is reported.
 */
export class GraphError extends Error {
  readonly kind: GraphErrorKind;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(kind: GraphErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'GraphError';
    this.kind = kind;
    this.details = details;
  }
}

/**
 * Thrown for programming defects: a caller broke the single-writer discipline
 * (double registration, unbalanced batches, rebuilding ports under live edges).
 * Never returned as a result.
 */
export class GraphMisuseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphMisuseError';
  }
}

export type GraphResult<T> = { ok: true; value: T } | { ok: false; error: GraphError };

export function ok<T>(value: T): GraphResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  kind: GraphErrorKind,
  message: string,
  details?: Record<string, unknown>,
): GraphResult<T> {
  return { ok: false, error: new GraphError(kind, message, details) };
}

/** Unwrap a result, throwing its error. Handy for callers that treat failure as fatal. */
export function unwrap<T>(result: GraphResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
