export type ErrorCode =
  | 'REF_NOT_FOUND'
  | 'NOT_FOUND'
  | 'NO_UNIQUE_COMMITS'
  | 'DIFF_PARSE'
  | 'ENCODING'
  | 'RENDER_OVERFLOW'
  | 'CANCELLED'
  | 'COMMIT_FAILED'
  | 'CONFIGURATION'
  | 'REPOSITORY';

export abstract class DiffDocError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RefNotFoundError extends DiffDocError {
  readonly code = 'REF_NOT_FOUND';

  constructor(readonly ref: string, options?: { cause?: unknown }) {
    super(`Unknown or ambiguous ref: ${ref}`, options);
  }
}

export class NotFoundError extends DiffDocError {
  readonly code = 'NOT_FOUND';

  constructor(readonly hash: string) {
    super(`Commit not found: ${hash}`);
  }
}

export class NoUniqueCommitsError extends DiffDocError {
  readonly code = 'NO_UNIQUE_COMMITS';

  constructor(readonly target: string, readonly base: string, reason: string) {
    super(`No commits unique to ${target} relative to ${base}: ${reason}`);
  }
}

export class DiffParseError extends DiffDocError {
  readonly code = 'DIFF_PARSE';

  constructor(readonly path: string, detail: string, readonly lineNumber?: number) {
    super(`Could not parse diff for ${path}${lineNumber !== undefined ? ` (patch line ${lineNumber})` : ''}: ${detail}`);
  }
}

export class EncodingError extends DiffDocError {
  readonly code = 'ENCODING';

  constructor(readonly path: string, detail: string) {
    super(`${path} is not renderable text: ${detail}`);
  }
}

export class RenderOverflowError extends DiffDocError {
  readonly code = 'RENDER_OVERFLOW';

  constructor(readonly path: string, readonly hunkIndex: number, rowHeight: number, capacity: number) {
    super(`Hunk ${hunkIndex + 1} of ${path} has a row ${rowHeight} lines tall; a page holds ${capacity}`);
  }
}

export class CancelledError extends DiffDocError {
  readonly code = 'CANCELLED';

  constructor(readonly commit?: string, notStarted = 0) {
    super(
      commit
        ? `Processing of ${commit} was cancelled`
        : `Run cancelled${notStarted > 0 ? `; ${notStarted} commit(s) were not started` : ''}`,
    );
  }
}

export class CommitProcessingError extends DiffDocError {
  readonly code = 'COMMIT_FAILED';

  constructor(readonly commit: string, options?: { cause?: unknown }) {
    super(`Failed to process commit ${commit}: ${describeError(options?.cause)}`, options);
  }
}

export class ConfigurationError extends DiffDocError {
  readonly code = 'CONFIGURATION';
}

export class RepositoryError extends DiffDocError {
  readonly code = 'REPOSITORY';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
