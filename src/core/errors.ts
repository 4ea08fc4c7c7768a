export type ErrorCode =
  | 'CONFIGURATION'
  | 'DOCUMENT_READ'
  | 'DOCUMENT_WRITE'
  | 'DOCUMENT_REWRITE'
  | 'PATH_ESCAPE'
  | 'FILE_MOVE';

/**
 * Base class for every error the tool raises or records.
 */
export class LinkmendError extends Error {
  readonly code: ErrorCode;
  readonly document: string | null;

  constructor(code: ErrorCode, message: string, document: string | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.document = document;
  }
}

/**
 * Invalid rename mapping or config file. The only error that aborts a run,
 * and it is always raised before anything is written.
 */
export class ConfigurationError extends LinkmendError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, null, options);
  }
}

export class DocumentReadError extends LinkmendError {
  constructor(document: string, message: string, options?: { cause?: unknown }) {
    super('DOCUMENT_READ', message, document, options);
  }
}

export class DocumentWriteError extends LinkmendError {
  constructor(document: string, message: string, options?: { cause?: unknown }) {
    super('DOCUMENT_WRITE', message, document, options);
  }
}

/** Planned replacement spans no longer fit the document (stale or overlapping). */
export class DocumentRewriteError extends LinkmendError {
  constructor(document: string, message: string) {
    super('DOCUMENT_REWRITE', message, document);
  }
}

export class PathEscapeError extends LinkmendError {
  readonly target: string;

  constructor(document: string, target: string) {
    super('PATH_ESCAPE', `target escapes the root: ${target}`, document);
    this.target = target;
  }
}

export class FileMoveError extends LinkmendError {
  constructor(from: string, message: string, options?: { cause?: unknown }) {
    super('FILE_MOVE', message, from, options);
  }
}

/**
 * Flat, serialisable form of a recorded per-document failure.
 */
export interface ErrorRecord {
  code: ErrorCode;
  document: string | null;
  message: string;
  kind?: string;
}

export function toErrorRecord(error: LinkmendError, kind?: string): ErrorRecord {
  const record: ErrorRecord = { code: error.code, document: error.document, message: error.message };
  if (kind !== undefined) record.kind = kind;
  return record;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
