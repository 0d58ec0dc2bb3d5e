export class RepositoryValidationError extends Error {
  readonly code = 'validation_failed' as const;

  constructor(message: string) {
    super(message);
    this.name = 'RepositoryValidationError';
  }
}

/**
 * A chunked bulk write stopped part-way. Chunks before `chunkIndex` are
 * durably committed and are not rolled back.
 */
export class BulkWriteError extends Error {
  readonly code = 'bulk_write_failed' as const;

  constructor(
    readonly chunkIndex: number,
    readonly committedSessionIds: string[],
    readonly failure: unknown,
  ) {
    super(
      `Bulk write failed at chunk ${chunkIndex}: ${failure instanceof Error ? failure.message : String(failure)}`,
    );
    this.name = 'BulkWriteError';
  }
}
