export class ArchiveClientError extends Error {
  readonly statusCode: number;
  readonly code: string | null;
  readonly details: unknown;

  constructor(
    message: string,
    options: { statusCode: number; code?: string | null; details?: unknown; cause?: unknown }
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ArchiveClientError';
    this.statusCode = options.statusCode;
    this.code = options.code ?? null;
    this.details = options.details;
  }
}

/** The download endpoint answered with something other than a single-file archive. */
export class ArchiveFormatError extends ArchiveClientError {
  constructor(message: string, options: { details?: unknown; cause?: unknown } = {}) {
    super(message, { statusCode: 0, code: 'INVALID_ARCHIVE', ...options });
    this.name = 'ArchiveFormatError';
  }
}
