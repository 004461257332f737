import type { ManifestSummary } from './models/summary.js';

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class TraversalError extends Error {
  readonly reference: string;

  constructor(reference: string, message: string, cause?: unknown) {
    super(`Traversal failed for ${reference}: ${message}`);
    this.name = 'TraversalError';
    this.reference = reference;
    this.cause = cause;
  }
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class ManifestValidationError extends TraversalError {
  readonly issues: readonly ValidationIssue[];

  constructor(reference: string, issues: readonly ValidationIssue[]) {
    super(reference, `${issues.length} validation issue(s)`);
    this.name = 'ManifestValidationError';
    this.issues = issues;
  }
}

export class PageFetchError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(`Image fetch failed (${url}): ${message}`);
    this.name = 'PageFetchError';
    this.url = url;
    this.status = options?.status;
    this.cause = options?.cause;
  }
}

export class EngineError extends Error {
  readonly engine: string;
  readonly retryable: boolean;

  constructor(engine: string, message: string, options: { retryable: boolean; cause?: unknown }) {
    super(`${engine}: ${message}`);
    this.name = 'EngineError';
    this.engine = engine;
    this.retryable = options.retryable;
    this.cause = options.cause;
  }
}

export class OutputWriteError extends Error {
  readonly outputLocation: string;

  constructor(outputLocation: string, cause: unknown) {
    super(`Output write failed: ${outputLocation}: ${describeCause(cause)}`);
    this.name = 'OutputWriteError';
    this.outputLocation = outputLocation;
    this.cause = cause;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
    this.cause = cause;
  }
}

export class ManifestFailedError extends Error {
  readonly summary: ManifestSummary;

  constructor(summary: ManifestSummary, cause: unknown) {
    super(`Manifest failed: ${summary.manifestReference}: ${describeCause(cause)}`);
    this.name = 'ManifestFailedError';
    this.summary = summary;
    this.cause = cause;
  }
}

export class IdentityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IdentityError';
  }
}

export class WorkItemListError extends Error {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = 'WorkItemListError';
    this.line = line;
  }
}

export type FileSystemOperation = 'read' | 'write' | 'mkdir' | 'stat';

export class FileSystemError extends Error {
  readonly operation: FileSystemOperation;
  readonly path: string;

  constructor(operation: FileSystemOperation, filePath: string, cause?: unknown) {
    super(`File system ${operation} failed: ${filePath}`);
    this.name = 'FileSystemError';
    this.operation = operation;
    this.path = filePath;
    this.cause = cause;
  }
}

export type PageErrorKind = 'fetch' | 'engine' | 'unexpected';

export interface PageErrorDetail {
  readonly kind: PageErrorKind;
  readonly message: string;
  readonly retryable?: boolean;
}

export function formatPageError(error: unknown): PageErrorDetail {
  if (error instanceof PageFetchError) {
    return { kind: 'fetch', message: error.message };
  }
  if (error instanceof EngineError) {
    return { kind: 'engine', message: error.message, retryable: error.retryable };
  }
  return { kind: 'unexpected', message: describeCause(error) };
}

export function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
