/**
 * Fatal extraction errors
 *
 * Malformed rows and lines never raise; they are counted as noise. Only an
 * unreadable page or a cancelled run aborts extraction. SourceFileError is
 * raised before a run starts, when the input file is rejected.
 *
 * @module services/extraction/errors
 */

export type ExtractionErrorCode =
  | 'UNREADABLE_SOURCE'
  | 'EXTRACTION_ABORTED'
  | 'PATH_NOT_FOUND'
  | 'FILE_TOO_LARGE'
  | 'UNSUPPORTED_FILE_TYPE';

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: ExtractionErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

/**
 * A page (or the whole source) could not be read
 */
export class UnreadableSourceError extends ExtractionError {
  constructor(
    message: string,
    public readonly pageNumber: number | null,
    cause?: unknown
  ) {
    super(message, 'UNREADABLE_SOURCE', {
      pageNumber,
      ...(cause instanceof Error && { cause: cause.message }),
    });
    this.name = 'UnreadableSourceError';
  }
}

/**
 * The caller's AbortSignal fired between pages
 */
export class ExtractionAbortedError extends ExtractionError {
  constructor(public readonly pagesProcessed: number) {
    super(`Extraction aborted after ${pagesProcessed} page(s)`, 'EXTRACTION_ABORTED', {
      pagesProcessed,
    });
    this.name = 'ExtractionAbortedError';
  }
}

/**
 * The input file is missing, too large, or not a PDF
 */
export class SourceFileError extends ExtractionError {
  constructor(
    message: string,
    code: 'PATH_NOT_FOUND' | 'FILE_TOO_LARGE' | 'UNSUPPORTED_FILE_TYPE',
    public readonly filePath: string,
    details: Record<string, unknown> = {}
  ) {
    super(message, code, { path: filePath, ...details });
    this.name = 'SourceFileError';
  }
}
