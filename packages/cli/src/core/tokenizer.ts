import type { Lexeme, LexError, Token, TokenType } from './types.js';

interface TokenRule {
  type: TokenType;
  pattern: RegExp;
  /** Capture group holding the token value; the whole match when omitted */
  group?: number;
}

const NAME_START = String.raw`(?:[a-zA-Z_]|[^\x00-\x7F]|\\[^\n\r\f])`;
const NAME_CHAR = String.raw`(?:[a-zA-Z0-9_-]|[^\x00-\x7F]|\\[^\n\r\f])`;
const IDENT = `-?${NAME_START}${NAME_CHAR}*`;
const NUMBER = String.raw`[+-]?(?:\d+(?:\.\d+)?|\.\d+)`;

const sticky = (source: string, flags: string = ''): RegExp => new RegExp(source, `y${flags}`);

/**
 * Token patterns in priority order: the first pattern matching at the cursor wins.
 * Curly blocks are scanned separately (see findBlockEnd).
 */
const RULES: TokenRule[] = [
  { type: 'comment', pattern: sticky(String.raw`/\*[\s\S]*?\*/`) },
  { type: 'cdo', pattern: sticky('<!--') },
  { type: 'cdc', pattern: sticky('-->') },
  { type: 'unquoted-url', pattern: sticky(String.raw`url\([ \t\r\n\f]*([^"'()\s]+)[ \t\r\n\f]*\)`, 'i'), group: 1 },
  { type: 'bad-url', pattern: sticky(String.raw`url\([ \t\r\n\f]*\)`, 'i') },
  { type: 'quoted-string', pattern: sticky(String.raw`"((?:[^"\\\n\r\f]|\\[\s\S])*)"`), group: 1 },
  { type: 'quoted-string', pattern: sticky(String.raw`'((?:[^'\\\n\r\f]|\\[\s\S])*)'`), group: 1 },
  { type: 'bad-string', pattern: sticky(String.raw`(["'])(?:(?!\1)[^\\\n\r\f]|\\[\s\S])*`) },
  { type: 'important', pattern: sticky(String.raw`![ \t\r\n\f]*important\b`, 'i') },
  { type: 'percentage', pattern: sticky(`${NUMBER}%`) },
  { type: 'dimension', pattern: sticky(`${NUMBER}[a-zA-Z]+`) },
  { type: 'number', pattern: sticky(NUMBER) },
  { type: 'custom-property', pattern: sticky(`--${NAME_CHAR}*`) },
  { type: 'function', pattern: sticky(String.raw`(${IDENT})\(`), group: 1 },
  { type: 'ident', pattern: sticky(IDENT) },
  { type: 'at-keyword', pattern: sticky(`@(${IDENT})`), group: 1 },
  { type: 'hash', pattern: sticky(`#(${NAME_CHAR}+)`), group: 1 },
  { type: 'class-selector', pattern: sticky(String.raw`\.${IDENT}`) },
  { type: 'pseudo-class', pattern: sticky(`::?${IDENT}`) },
  { type: 'parenthesis-block', pattern: sticky(String.raw`\([^)]*\)`) },
  { type: 'square-bracket-block', pattern: sticky(String.raw`\[[^\]]*\]`) },
  { type: 'include-match', pattern: sticky('~=') },
  { type: 'dash-match', pattern: sticky(String.raw`\|=`) },
  { type: 'prefix-match', pattern: sticky(String.raw`\^=`) },
  { type: 'suffix-match', pattern: sticky(String.raw`\$=`) },
  { type: 'substring-match', pattern: sticky(String.raw`\*=`) },
  { type: 'colon', pattern: sticky(':') },
  { type: 'semicolon', pattern: sticky(';') },
  { type: 'comma', pattern: sticky(',') },
  { type: 'close-paren', pattern: sticky(String.raw`\)`) },
  { type: 'close-square', pattern: sticky(String.raw`\]`) },
  { type: 'close-curly', pattern: sticky(String.raw`\}`) },
  { type: 'delim', pattern: sticky(String.raw`[!-/:-@\[-\x60{-~]`) },
];

const WHITESPACE = new Set([' ', '\t', '\r', '\n', '\f']);

/**
 * Index just past the quoted string opening at `start`, or past the line
 * break that cuts it short
 */
function skipString(source: string, start: number): number {
  const quote = source[start];
  let i = start + 1;
  while (i < source.length) {
    const ch = source[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === quote || ch === '\n') {
      return i + 1;
    }
    i++;
  }
  return source.length;
}

/**
 * Find the end of the curly block opening at `start`.
 * Braces inside strings and comments are ignored. Returns -1 when unbalanced.
 */
export function findBlockEnd(source: string, start: number): number {
  let depth = 0;
  let i = start;

  while (i < source.length) {
    const ch = source[i];
    if (ch === '"' || ch === "'") {
      i = skipString(source, i);
      continue;
    }
    if (ch === '/' && source[i + 1] === '*') {
      const close = source.indexOf('*/', i + 2);
      if (close === -1) {
        return -1;
      }
      i = close + 2;
      continue;
    }
    if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return i + 1;
      }
    }
    i++;
  }

  return -1;
}

/**
 * Cursor over an immutable CSS buffer.
 *
 * `offset` is added to every span so that a tokenizer over a block's content
 * reports positions in the enclosing source.
 */
export class Tokenizer implements Iterable<Lexeme> {
  private position = 0;

  constructor(
    private readonly source: string,
    private readonly offset: number = 0
  ) {}

  /** Offset of the cursor in the enclosing source */
  get cursor(): number {
    return this.offset + this.position;
  }

  seek(cursor: number): void {
    this.position = Math.max(0, Math.min(cursor - this.offset, this.source.length));
  }

  /**
   * Read the next token. Returns null at end of input.
   */
  next(): Lexeme | null {
    this.skipWhitespace();
    if (this.position >= this.source.length) {
      return null;
    }

    const start = this.position;
    if (this.source.startsWith('/*', start) && this.source.indexOf('*/', start + 2) === -1) {
      return this.fail(start);
    }
    if (this.source[start] === '{') {
      const end = findBlockEnd(this.source, start);
      if (end !== -1) {
        return this.emit('curly-bracket-block', start, end, this.source.slice(start, end));
      }
    }

    for (const rule of RULES) {
      rule.pattern.lastIndex = start;
      const match = rule.pattern.exec(this.source);
      if (match) {
        const text = match[0];
        const value = rule.group === undefined ? text : (match[rule.group] ?? text);
        return this.emit(rule.type, start, start + text.length, value);
      }
    }

    return this.fail(start);
  }

  *[Symbol.iterator](): Iterator<Lexeme> {
    let lexeme = this.next();
    while (lexeme) {
      yield lexeme;
      lexeme = this.next();
    }
  }

  private skipWhitespace(): void {
    while (this.position < this.source.length && WHITESPACE.has(this.source[this.position] ?? '')) {
      this.position++;
    }
  }

  private emit(type: TokenType, start: number, end: number, value: string): Token {
    this.position = end;
    return {
      type,
      value,
      span: { start: this.offset + start, end: this.offset + end },
    };
  }

  private fail(start: number): LexError {
    if (this.source.startsWith('/*', start)) {
      this.position = this.source.length;
      return {
        type: 'error',
        message: 'Unterminated comment',
        value: this.source.slice(start),
        span: { start: this.offset + start, end: this.offset + this.source.length },
      };
    }

    const codePoint = this.source.codePointAt(start) ?? 0;
    const value = String.fromCodePoint(codePoint);
    this.position = start + value.length;
    return {
      type: 'error',
      message: `Unrecognized character U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}`,
      value,
      span: { start: this.offset + start, end: this.offset + this.position },
    };
  }
}

/**
 * Collect the whole token stream of a source, lex errors included
 */
export function tokenize(source: string): Lexeme[] {
  return [...new Tokenizer(source)];
}
