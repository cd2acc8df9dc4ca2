import type { ErrorResponse } from '../middleware/validation/errors';

type PgError = {
  code?: string;
  constraint?: string;
  detail?: string;
};

export type PgErrorMapping = {
  unique?: (err: PgError) => ErrorResponse | null;
  check?: (err: PgError) => ErrorResponse | null;
  notNull?: (err: PgError) => ErrorResponse | null;
};

function isPgError(err: unknown): err is PgError {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';
}

/**
 * Maps Postgres constraint errors to HTTP responses. Callers supply the
 * message bodies; unmapped codes return null.
 */
export function mapPgErrorToHttp(err: unknown, mapping: PgErrorMapping): ErrorResponse | null {
  if (!isPgError(err)) {
    return null;
  }
  switch (err.code) {
    case '23505':
      return mapping.unique?.(err) ?? null;
    case '23514':
      return mapping.check?.(err) ?? null;
    case '23502':
      return mapping.notNull?.(err) ?? null;
    default:
      return null;
  }
}
