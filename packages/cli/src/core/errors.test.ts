import { CssParseError, isCssParseError, offsetToPosition, toParseIssue } from './errors.js';

describe('CssParseError', () => {
  it('carries a kind and a span', () => {
    const error = new CssParseError('InvalidArity', 'rect() expects exactly 4 arguments, got 3', { start: 4, end: 14 });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('CssParseError');
    expect(error.kind).toBe('InvalidArity');
    expect(error.span).toEqual({ start: 4, end: 14 });
  });

  it('wraps a lex error', () => {
    const error = CssParseError.fromLexError({
      type: 'error',
      message: 'Unrecognized character U+0001',
      value: '\u0001',
      span: { start: 2, end: 3 },
    });
    expect(error.kind).toBe('LexError');
    expect(error.message).toBe('Unrecognized character U+0001');
    expect(error.span).toEqual({ start: 2, end: 3 });
  });
});

describe('isCssParseError', () => {
  it('recognizes parse errors only', () => {
    expect(isCssParseError(new CssParseError('LexError', 'x', { start: 0, end: 1 }))).toBe(true);
    expect(isCssParseError(new Error('x'))).toBe(false);
    expect(isCssParseError('x')).toBe(false);
  });
});

describe('offsetToPosition', () => {
  it('returns 1-based line and column', () => {
    expect(offsetToPosition('a\nbc', 0)).toEqual({ line: 1, column: 1 });
    expect(offsetToPosition('a\nbc', 3)).toEqual({ line: 2, column: 2 });
  });

  it('clamps offsets past the end', () => {
    expect(offsetToPosition('a\nbc', 99)).toEqual({ line: 2, column: 3 });
  });
});

describe('toParseIssue', () => {
  it('adds the position of the span start', () => {
    const error = new CssParseError('UnexpectedToken', 'boom', { start: 3, end: 4 });
    expect(toParseIssue(error, 'a\nbc')).toEqual({
      kind: 'UnexpectedToken',
      message: 'boom',
      span: { start: 3, end: 4 },
      line: 2,
      column: 2,
    });
  });
});
