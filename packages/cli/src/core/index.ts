// AST
export type {
  Stylesheet,
  Rule,
  RuleSet,
  AtRule,
  Selector,
  SimpleSelector,
  AttributeOperator,
  AttributeSelector,
  PseudoClassSelector,
  PseudoElementSelector,
  CombinatorKind,
  CombinatorSelector,
  Declaration,
  Value,
  ValueType,
  FunctionValue,
  ColorValue,
  CalcOperator,
  CalcTerm,
  AngleUnit,
  TimeUnit,
  FrequencyUnit,
  ResolutionUnit,
  GradientValue,
  Angle,
  LinearGradient,
  RadialGradient,
  ColorStop,
  Position,
} from './ast.js';

// Types
export type {
  Span,
  SourcePosition,
  TokenType,
  Token,
  LexError,
  Lexeme,
  ParseErrorKind,
  SelectorMode,
  ParserLogger,
  ParserOptions,
  ParseIssue,
  ParseResult,
  StylesheetStats,
  FileReport,
  ReportTotals,
  Report,
  CssAstConfig,
  ParseInput,
} from './types.js';

export { DEFAULT_CONFIG, DEFAULT_PARSER_OPTIONS, SILENT_LOGGER } from './types.js';

// Errors
export { CssParseError, isCssParseError, offsetToPosition, toParseIssue } from './errors.js';

// Tokenizer
export { Tokenizer, tokenize, findBlockEnd } from './tokenizer.js';

// Parser
export { Parser, parseStylesheet, parseCSS, parseCSSFile } from './parser.js';
export { buildStructuredSelectors } from './selectors.js';
export {
  ANGLE_UNITS,
  TIME_UNITS,
  FREQUENCY_UNITS,
  RESOLUTION_UNITS,
  classifyDimension,
  splitDimension,
} from './units.js';

// Stats
export { emptyStats, collectStats, toFileReport, calculateTotals } from './stats.js';

// Runner
export {
  REPORT_VERSION,
  mergeConfig,
  toParserOptions,
  findCSSFiles,
  parseFiles,
  parseInputs,
  parseDirectory,
  generateReport,
  checkReport,
  formatReportAsJSON,
} from './runner.js';
