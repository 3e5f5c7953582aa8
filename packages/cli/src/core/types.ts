import type { Stylesheet } from './ast.js';

/**
 * Half-open range of UTF-16 code unit offsets into the source given to the outermost parser
 */
export interface Span {
  start: number;
  end: number;
}

/**
 * 1-based line and column of a source offset
 */
export interface SourcePosition {
  line: number;
  column: number;
}

/**
 * Lexical token kinds, in no particular order
 */
export type TokenType =
  | 'ident'
  | 'custom-property'
  | 'function'
  | 'at-keyword'
  | 'hash'
  | 'class-selector'
  | 'pseudo-class'
  | 'quoted-string'
  | 'unquoted-url'
  | 'bad-url'
  | 'bad-string'
  | 'number'
  | 'percentage'
  | 'dimension'
  | 'important'
  | 'parenthesis-block'
  | 'square-bracket-block'
  | 'curly-bracket-block'
  | 'comment'
  | 'colon'
  | 'semicolon'
  | 'comma'
  | 'include-match'
  | 'dash-match'
  | 'prefix-match'
  | 'suffix-match'
  | 'substring-match'
  | 'cdo'
  | 'cdc'
  | 'close-paren'
  | 'close-square'
  | 'close-curly'
  | 'delim';

export interface Token {
  type: TokenType;
  /** Token text with prefixes and quotes removed where the kind calls for it */
  value: string;
  span: Span;
}

/**
 * An unrecognized piece of input. The tokenizer keeps going after one.
 */
export interface LexError {
  type: 'error';
  message: string;
  value: string;
  span: Span;
}

export type Lexeme = Token | LexError;

export type ParseErrorKind =
  | 'LexError'
  | 'UnexpectedToken'
  | 'UnterminatedConstruct'
  | 'InvalidArity'
  | 'NumberFormat'
  | 'NestingTooDeep';

export type SelectorMode = 'folded' | 'structured';

/**
 * Receives parser diagnostics that do not stop the parse
 */
export interface ParserLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Options accepted by the parser
 */
export interface ParserOptions {
  /** Deepest block nesting accepted before failing with NestingTooDeep */
  maxDepth?: number;
  /** `folded` keeps selectors as simple selectors with spliced text */
  selectorMode?: SelectorMode;
  /** Build angle/time/frequency/resolution values instead of dimensions */
  typedUnits?: boolean;
  logger?: ParserLogger;
}

export const SILENT_LOGGER: ParserLogger = {
  debug: () => undefined,
};

export const DEFAULT_PARSER_OPTIONS: Required<ParserOptions> = {
  maxDepth: 64,
  selectorMode: 'folded',
  typedUnits: false,
  logger: SILENT_LOGGER,
};

/**
 * A parse or read failure attached to a file
 */
export interface ParseIssue {
  kind: ParseErrorKind | 'ReadError';
  message: string;
  span?: Span;
  line?: number;
  column?: number;
}

/**
 * Result of parsing one CSS source
 */
export interface ParseResult {
  file: string;
  /** `null` when the parse failed */
  stylesheet: Stylesheet | null;
  errors: ParseIssue[];
  durationMs: number;
}

/**
 * Counts over a parsed stylesheet, nested rules included
 */
export interface StylesheetStats {
  ruleSets: number;
  atRules: number;
  selectors: number;
  declarations: number;
  /** 0 for a flat stylesheet, 1 when any rule sits inside another rule's block */
  maxNestingDepth: number;
}

export interface FileReport {
  file: string;
  ok: boolean;
  stats: StylesheetStats;
  errors: ParseIssue[];
  durationMs: number;
}

export interface ReportTotals extends StylesheetStats {
  files: number;
  parsed: number;
  failed: number;
  durationMs: number;
}

/**
 * Outcome of parsing a set of files
 */
export interface Report {
  version: string;
  timestamp: string;
  totals: ReportTotals;
  files: FileReport[];
}

/**
 * Configuration read from a config file or the command line
 */
export interface CssAstConfig {
  include?: string[];
  exclude?: string[];
  maxDepth?: number;
  selectorMode?: SelectorMode;
  typedUnits?: boolean;
  /** Number of files allowed to fail before `check` fails */
  maxFailures?: number;
}

export const DEFAULT_CONFIG: Required<CssAstConfig> = {
  include: ['**/*.css'],
  exclude: ['**/node_modules/**', '**/dist/**', '**/vendor/**'],
  maxDepth: 64,
  selectorMode: 'folded',
  typedUnits: false,
  maxFailures: 0,
};

/**
 * Input for a batch parse - either a file path or CSS content
 */
export interface ParseInput {
  type: 'file' | 'content';
  path?: string;
  content?: string;
  filename?: string;
}
