/**
 * Error taxonomy for the ingestion pipeline
 */

export class FetchError extends Error {
  readonly name = 'FetchError';

  constructor(
    message: string,
    readonly source: string,
    readonly transient: boolean,
    readonly status?: number
  ) {
    super(message);
  }
}

export class UnparseableReferenceFileError extends Error {
  readonly name = 'UnparseableReferenceFileError';

  constructor(readonly filePath: string, reason: string) {
    super(`Could not parse reference file ${filePath}: ${reason}`);
  }
}

export class ValidationRejectedError extends Error {
  readonly name = 'ValidationRejectedError';

  constructor(readonly reason: string) {
    super(`Record rejected: ${reason}`);
  }
}

export class PersistenceError extends Error {
  readonly name = 'PersistenceError';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
