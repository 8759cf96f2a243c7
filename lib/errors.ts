export type QueryErrorKind =
  | 'Timeout'
  | 'RateLimited'
  | 'ServiceUnavailable'
  | 'MalformedResponse'
  | 'NetworkUnreachable';

const RETRYABLE: ReadonlySet<QueryErrorKind> = new Set(['Timeout', 'RateLimited', 'ServiceUnavailable']);

/**
 * Failure of a single CT-log lookup.
 * `retryAfterMs` is only set for rate limiting when the upstream sent `Retry-After`.
 */
export class QueryError extends Error {
  readonly kind: QueryErrorKind;
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(kind: QueryErrorKind, message: string, opts?: { status?: number; retryAfterMs?: number; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'QueryError';
    this.kind = kind;
    this.status = opts?.status;
    this.retryAfterMs = opts?.retryAfterMs;
  }

  get retryable(): boolean {
    return RETRYABLE.has(this.kind);
  }
}

/** Reading, writing or deleting a stored subdomain set failed. */
export class PersistenceError extends Error {
  readonly domain: string;
  readonly op: 'load' | 'save' | 'delete';

  constructor(op: 'load' | 'save' | 'delete', domain: string, message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'PersistenceError';
    this.op = op;
    this.domain = domain;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
