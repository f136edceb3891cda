export type FetchErrorKind = 'network' | 'parse_failure' | 'invalid_source';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;

  constructor(kind: FetchErrorKind, url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
    this.kind = kind;
    this.url = url;
  }
}

/**
 * Raised by store implementations.
 * `conflict` marks a unique-constraint hit; for article inserts it is not a failure.
 */
export type StorageErrorKind = 'list_failure' | 'write_failure' | 'conflict';

export class StorageError extends Error {
  readonly kind: StorageErrorKind;

  constructor(kind: StorageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    this.kind = kind;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
