import type { ParseFailureReason } from '../shared/types';

export type ErrorCategory = 'network' | 'parse' | 'filesystem';

export class ReaderError extends Error {
  readonly category: ErrorCategory;
  hint?: string;

  constructor(category: ErrorCategory, message: string, options?: { cause?: unknown; hint?: string }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.category = category;
    this.hint = options?.hint;
  }
}

export class NetworkError extends ReaderError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, options?: { status?: number; cause?: unknown; hint?: string }) {
    super('network', message, options);
    this.url = url;
    this.status = options?.status;
  }
}

export const PARSE_REASON_TEXT: Record<ParseFailureReason, string> = {
  no_structured_data: 'no structured data',
  no_body_container: 'no body container found',
  empty_body: 'empty body',
  empty_title: 'empty title',
  no_content: 'no content found',
};

export class ParseError extends ReaderError {
  readonly reason: ParseFailureReason;
  /** Why each extraction strategy declined, in the order they ran. */
  readonly attempts: ReadonlyArray<{ strategy: string; reason: ParseFailureReason }>;

  constructor(
    reason: ParseFailureReason,
    message: string = PARSE_REASON_TEXT[reason],
    attempts: ReadonlyArray<{ strategy: string; reason: ParseFailureReason }> = [],
  ) {
    super('parse', message);
    this.reason = reason;
    this.attempts = attempts;
  }
}

export class FilesystemError extends ReaderError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super('filesystem', message, options);
    this.path = path;
  }
}

export const isReaderError = (error: unknown): error is ReaderError => error instanceof ReaderError;

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** Bad command-line input; never reaches the pipeline. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** The run was interrupted before the named stage could start. */
export class CancelledError extends Error {
  readonly stage: string;

  constructor(stage: string) {
    super(`cancelled before ${stage}`);
    this.name = 'CancelledError';
    this.stage = stage;
  }
}
