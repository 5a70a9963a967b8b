import type { SearchFailure, SearchFailureKind } from '@/types/search';

/**
 * Errors raised by the search service. Both kinds end up as a single
 * `Failure` transaction; the kind is kept for logging and the status line.
 */
export abstract class SearchError extends Error {
  abstract readonly kind: SearchFailureKind;
}

export class TransportError extends SearchError {
  readonly kind = 'TransportError' as const;

  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'TransportError';
  }
}

export class DecodeError extends SearchError {
  readonly kind = 'DecodeError' as const;

  constructor(readonly field: string, detail: string) {
    super(`Malformed search response at "${field}": ${detail}`);
    this.name = 'DecodeError';
  }
}

export function toSearchFailure(err: unknown): SearchFailure {
  if (err instanceof SearchError) {
    return { kind: err.kind, message: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { kind: 'TransportError', message };
}
