import type { LexError, ParseErrorKind, ParseIssue, SourcePosition, Span } from './types.js';

/**
 * Error thrown by the tokenizer-driven parser. The span points into the
 * source given to the outermost parser.
 */
export class CssParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly span: Span;

  constructor(kind: ParseErrorKind, message: string, span: Span) {
    super(message);
    this.name = 'CssParseError';
    this.kind = kind;
    this.span = span;
  }

  static fromLexError(error: LexError): CssParseError {
    return new CssParseError('LexError', error.message, error.span);
  }
}

export function isCssParseError(error: unknown): error is CssParseError {
  return error instanceof CssParseError;
}

/**
 * Convert a source offset into a 1-based line and column
 */
export function offsetToPosition(source: string, offset: number): SourcePosition {
  const clamped = Math.max(0, Math.min(offset, source.length));
  let line = 1;
  let lineStart = 0;

  for (let i = 0; i < clamped; i++) {
    if (source[i] === '\n') {
      line++;
      lineStart = i + 1;
    }
  }

  return { line, column: clamped - lineStart + 1 };
}

/**
 * Describe a parse error as a positioned issue
 */
export function toParseIssue(error: CssParseError, source: string): ParseIssue {
  const { line, column } = offsetToPosition(source, error.span.start);
  return {
    kind: error.kind,
    message: error.message,
    span: { ...error.span },
    line,
    column,
  };
}
