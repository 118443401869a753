import type { Diagnostic } from './diagnostics.js';
import { formatDiagnostic } from './diagnostic-order.js';

export type ContentErrorCode =
  | 'CONTENT_BASE_MISSING'
  | 'CONTENT_LOAD_ABORTED'
  | 'CONTENT_LOAD_FAILED'
  | 'CONTENT_HANDLE_CLOSED'
  | 'CONTENT_INDEX_OUT_OF_RANGE'
  | 'CONTENT_CONFIG_INVALID';

export type ContentErrorContext = Readonly<Record<string, unknown>>;

function formatMessage(message: string, context?: ContentErrorContext): string {
  if (context === undefined) {
    return message;
  }

  return `${message} context=${JSON.stringify(context)}`;
}

export class ContentError extends Error {
  readonly code: ContentErrorCode;
  readonly context?: ContentErrorContext;

  constructor(code: ContentErrorCode, message: string, context?: ContentErrorContext) {
    super(formatMessage(message, context));
    this.name = 'ContentError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

/** Thrown when a load that has no previous snapshot to fall back on ends with fatal diagnostics. */
export class ContentLoadError extends ContentError {
  readonly diagnostics: readonly Diagnostic[];

  constructor(diagnostics: readonly Diagnostic[]) {
    const fatal = diagnostics.filter((diagnostic) => diagnostic.severity === 'error');
    const lines = fatal.slice(0, 10).map(formatDiagnostic);
    const more = fatal.length > lines.length ? `\n... and ${fatal.length - lines.length} more` : '';
    super('CONTENT_LOAD_FAILED', `Content load failed with ${fatal.length} fatal diagnostic(s):\n${lines.join('\n')}${more}`);
    this.name = 'ContentLoadError';
    this.diagnostics = diagnostics;
  }
}

export function contentLoadAbortedError(context?: ContentErrorContext): ContentError {
  return new ContentError('CONTENT_LOAD_ABORTED', 'Content load was superseded before it finished.', context);
}

export function isContentLoadAborted(error: unknown): boolean {
  return error instanceof ContentError && error.code === 'CONTENT_LOAD_ABORTED';
}

export function formatError(error: unknown): string {
  if (error instanceof Error && error.message.trim() !== '') {
    return error.message;
  }
  return String(error);
}
