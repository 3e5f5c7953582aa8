import * as fs from 'fs/promises';
import type {
  AtRule,
  CalcTerm,
  ColorValue,
  Declaration,
  Rule,
  RuleSet,
  Selector,
  SimpleSelector,
  Stylesheet,
  Value,
} from './ast.js';
import { CssParseError, isCssParseError, toParseIssue } from './errors.js';
import { buildStructuredSelectors } from './selectors.js';
import { Tokenizer } from './tokenizer.js';
import { classifyDimension, splitDimension } from './units.js';
import {
  DEFAULT_PARSER_OPTIONS,
  type Lexeme,
  type ParseResult,
  type ParserOptions,
  type Token,
  type TokenType,
} from './types.js';

/** Tokens that open a rule set at the top level and inside at-rule blocks */
const SELECTOR_START: ReadonlySet<string> = new Set<TokenType>([
  'ident',
  'class-selector',
  'hash',
  'pseudo-class',
  'square-bracket-block',
]);

/** Tokens that open a nested rule set inside a rule set's block */
const NESTED_RULE_START: ReadonlySet<string> = new Set<TokenType>([
  'class-selector',
  'hash',
  'pseudo-class',
  'parenthesis-block',
  'square-bracket-block',
]);

/** Tokens whose raw text is kept in an at-rule prelude */
const PRELUDE_TOKENS: ReadonlySet<string> = new Set<TokenType>([
  'ident',
  'number',
  'dimension',
  'percentage',
  'hash',
  'quoted-string',
  'unquoted-url',
  'parenthesis-block',
  'square-bracket-block',
]);

const CALC_OPERATORS: Record<string, CalcTerm> = {
  '+': { type: 'operator', operator: 'add' },
  '-': { type: 'operator', operator: 'subtract' },
  '*': { type: 'operator', operator: 'multiply' },
  '/': { type: 'operator', operator: 'divide' },
};

const COMBINATOR_DELIMS = new Set(['>', '+', '~']);

function isDelim(token: Lexeme | null, value: string): boolean {
  return token?.type === 'delim' && token.value === value;
}

function isSelectorStart(token: Lexeme): boolean {
  return SELECTOR_START.has(token.type) || isDelim(token, '*');
}

function describeToken(token: Lexeme | null): string {
  if (!token) return 'end of input';
  if (token.type === 'error') return `invalid input '${token.value}'`;
  return `${token.type} '${token.value}'`;
}

/**
 * Recursive-descent CSS parser.
 *
 * A block's content is parsed by a fresh parser over the block text, created
 * with the block's offset (so spans stay relative to the outer source) and a
 * depth one greater than its parent.
 */
export class Parser {
  private readonly tokenizer: Tokenizer;
  private readonly options: Required<ParserOptions>;
  private current: Lexeme | null;
  private previousEnd: number;
  private functionDepth = 0;

  constructor(
    private readonly source: string,
    options: ParserOptions = {},
    private readonly offset: number = 0,
    private readonly depth: number = 0
  ) {
    this.options = { ...DEFAULT_PARSER_OPTIONS, ...options };
    this.tokenizer = new Tokenizer(source, offset);
    this.current = this.tokenizer.next();
    this.previousEnd = offset;
  }

  /**
   * Parse every rule of the source. Tokens that cannot start a rule are skipped.
   */
  parseStylesheet(): Stylesheet {
    const rules: Rule[] = [];

    while (this.current) {
      const token = this.current;
      if (token.type === 'at-keyword') {
        this.advance();
        rules.push(this.parseAtRule(token));
      } else if (isSelectorStart(token)) {
        rules.push(this.parseRuleSet());
      } else {
        this.skip(token, 'top level');
      }
    }

    return { rules };
  }

  private advance(): void {
    if (this.current) {
      this.previousEnd = this.current.span.end;
    }
    this.current = this.tokenizer.next();
  }

  private skip(token: Lexeme, context: string): void {
    this.options.logger.debug(`Skipping ${describeToken(token)} at ${context}`, { span: token.span });
    this.advance();
  }

  private skipComments(): void {
    while (this.current?.type === 'comment') {
      this.advance();
    }
  }

  /** Next token after the current one, comments excluded, without moving the cursor */
  private peek(): Lexeme | null {
    const saved = this.tokenizer.cursor;
    let next = this.tokenizer.next();
    while (next?.type === 'comment') {
      next = this.tokenizer.next();
    }
    this.tokenizer.seek(saved);
    return next;
  }

  /** Whether `token` starts a declaration rather than a rule set inside an at-rule block */
  private startsDeclaration(token: Lexeme): boolean {
    if (token.type === 'custom-property') {
      return true;
    }
    if (token.type !== 'ident') {
      return false;
    }
    const next = this.peek();
    if (next?.type === 'colon') {
      return true;
    }
    if (next?.type !== 'pseudo-class' || next.value.startsWith('::')) {
      return false;
    }

    // `prop:value` and `a:hover {` lex alike; a rule set reaches its block before any `;`
    const saved = this.tokenizer.cursor;
    try {
      for (let ahead = this.tokenizer.next(); ahead; ahead = this.tokenizer.next()) {
        if (ahead.type === 'curly-bracket-block') {
          return false;
        }
        if (ahead.type === 'semicolon') {
          return true;
        }
      }
      return true;
    } finally {
      this.tokenizer.seek(saved);
    }
  }

  private get end(): number {
    return this.offset + this.source.length;
  }

  private slice(start: number, end: number): string {
    return this.source.slice(start - this.offset, end - this.offset);
  }

  /** Error for a missing construct, spanning from the previous token to the offending one */
  private expected(what: string, token: Lexeme | null): CssParseError {
    return new CssParseError('UnexpectedToken', `Expected ${what}, found ${describeToken(token)}`, {
      start: this.previousEnd,
      end: token ? token.span.end : this.end,
    });
  }

  private unexpectedIn(name: string, token: Lexeme): CssParseError {
    if (token.type === 'error') {
      return CssParseError.fromLexError(token);
    }
    return new CssParseError('UnexpectedToken', `Unexpected ${describeToken(token)} in ${name}()`, token.span);
  }

  private unterminated(fn: Token): CssParseError {
    return new CssParseError('UnterminatedConstruct', `Unterminated ${fn.value}() call`, {
      start: fn.span.start,
      end: this.end,
    });
  }

  /**
   * Create the parser for a curly block's content (outer braces removed, trimmed)
   */
  private openBlock(block: Token): Parser {
    if (this.depth >= this.options.maxDepth) {
      throw new CssParseError(
        'NestingTooDeep',
        `Blocks nested deeper than ${this.options.maxDepth} levels`,
        block.span
      );
    }

    const text = block.value;
    const inner = text.startsWith('{') && text.endsWith('}') ? text.slice(1, -1) : text;
    const leading = inner.length - inner.trimStart().length;
    return new Parser(inner.trim(), this.options, block.span.start + 1 + leading, this.depth + 1);
  }

  private parseSelectors(): SimpleSelector[] {
    const selectors: SimpleSelector[] = [];
    let pendingSeparator = true;

    while (this.current) {
      const token = this.current;
      switch (token.type) {
        case 'comment':
          break;
        case 'hash':
          selectors.push({ type: 'simple', id: token.value, classes: [] });
          pendingSeparator = false;
          break;
        case 'ident':
        case 'class-selector':
        case 'percentage':
          selectors.push({ type: 'simple', tag: token.value, classes: [] });
          pendingSeparator = false;
          break;
        case 'pseudo-class':
        case 'square-bracket-block':
        case 'parenthesis-block': {
          const previous = selectors[selectors.length - 1];
          if (!pendingSeparator && previous) {
            previous.classes.push(token.value);
          } else {
            selectors.push({ type: 'simple', tag: token.value, classes: [] });
          }
          pendingSeparator = false;
          break;
        }
        case 'comma':
          pendingSeparator = true;
          break;
        case 'delim':
          if (token.value === '*') {
            selectors.push({ type: 'simple', tag: '*', classes: [] });
            pendingSeparator = false;
            break;
          }
          if (COMBINATOR_DELIMS.has(token.value)) {
            this.foldCombinator(selectors, token.value);
            pendingSeparator = true;
            continue;
          }
          return selectors;
        default:
          return selectors;
      }
      this.advance();
    }

    return selectors;
  }

  /**
   * Splice `combinator` and the selector after it into the previous selector's tag
   */
  private foldCombinator(selectors: SimpleSelector[], combinator: string): void {
    this.advance();
    this.skipComments();

    const next = this.current;
    let text: string | undefined;
    if (next?.type === 'ident' || next?.type === 'class-selector') {
      text = next.value;
    } else if (next?.type === 'hash') {
      text = `#${next.value}`;
    } else if (isDelim(next, '*')) {
      text = '*';
    }
    if (text === undefined) {
      throw this.expected(`a selector after '${combinator}'`, next);
    }
    this.advance();

    const previous = selectors[selectors.length - 1];
    if (!previous) {
      selectors.push({ type: 'simple', tag: text, classes: [] });
    } else if (previous.tag === undefined) {
      previous.tag = text;
    } else {
      previous.tag = `${previous.tag} ${combinator} ${text}`;
    }
  }

  private parseRuleSet(): RuleSet {
    const selectorStart = this.current ? this.current.span.start : this.previousEnd;
    const folded = this.parseSelectors();

    const token = this.current;
    if (token?.type !== 'curly-bracket-block') {
      throw this.expected("'{' after selectors", token);
    }
    this.advance();

    let selectors: Selector[] = folded;
    if (this.options.selectorMode === 'structured') {
      const span = { start: selectorStart, end: token.span.start };
      selectors = buildStructuredSelectors(this.slice(span.start, span.end).trim(), span);
    }
    if (selectors.length === 0) {
      throw this.expected('a selector', token);
    }

    const block = this.openBlock(token);
    const declarations: Declaration[] = [];
    const nestedRules: Rule[] = [];

    while (block.current) {
      const inner = block.current;
      if (inner.type === 'ident' || inner.type === 'custom-property') {
        declarations.push(block.parseDeclaration(inner));
      } else if (inner.type === 'comment') {
        block.advance();
      } else if (NESTED_RULE_START.has(inner.type)) {
        nestedRules.push(block.parseRuleSet());
      } else {
        block.skip(inner, 'rule block');
      }
    }

    return { type: 'rule-set', selectors, declarations, nestedRules };
  }

  private parseDeclaration(property: Lexeme): Declaration {
    this.advance();
    this.skipComments();
    this.expectColon();

    const value = this.parseDeclarationValue();
    const terminator = this.current;
    if (terminator?.type !== 'semicolon') {
      throw this.expected("';' after value", terminator);
    }
    this.advance();

    return { property: property.value, value };
  }

  private expectColon(): void {
    const token = this.current;
    if (token?.type === 'colon') {
      this.advance();
      return;
    }
    if (token?.type === 'pseudo-class' && !token.value.startsWith('::')) {
      // `color:red` lexes as a pseudo-class; read again from just after the colon
      const afterColon = token.span.start + 1;
      this.tokenizer.seek(afterColon);
      this.previousEnd = afterColon;
      this.current = this.tokenizer.next();
      return;
    }
    throw this.expected("':' after property", token);
  }

  private toNumber(token: Token, text: string = token.value): number {
    const value = Number(text);
    if (text.trim() === '' || !Number.isFinite(value)) {
      throw new CssParseError('NumberFormat', `Invalid number '${token.value}'`, token.span);
    }
    return value;
  }

  private toDimension(token: Token): Value {
    const { number, unit } = splitDimension(token.value);
    const value = this.toNumber(token, number);
    return this.options.typedUnits ? classifyDimension(value, unit) : { type: 'dimension', value, unit };
  }

  private parseDeclarationValue(): Value[] {
    const values: Value[] = [];

    while (this.current) {
      const token = this.current;
      switch (token.type) {
        case 'semicolon':
          return values;
        case 'comment':
        case 'comma':
          break;
        case 'hash':
          values.push({ type: 'color', color: { type: 'hex', value: token.value } });
          break;
        case 'ident':
          values.push({ type: 'identifier', value: token.value });
          break;
        case 'number':
          values.push({ type: 'number', value: this.toNumber(token) });
          break;
        case 'dimension':
          values.push(this.toDimension(token));
          break;
        case 'percentage':
          values.push({ type: 'percentage', value: this.toNumber(token, token.value.slice(0, -1)) });
          break;
        case 'quoted-string':
          values.push({ type: 'string', value: token.value });
          break;
        case 'unquoted-url':
          values.push({ type: 'uri', value: token.value });
          break;
        case 'custom-property':
          values.push({ type: 'var', name: token.value });
          break;
        case 'important':
          values.push({ type: 'identifier', value: '!important' });
          break;
        case 'function':
          this.advance();
          values.push(this.parseFunction(token));
          continue;
        case 'delim':
          if (token.value !== '/') {
            return values;
          }
          values.push({ type: 'identifier', value: '/' });
          break;
        case 'bad-string':
          throw new CssParseError('LexError', 'Unterminated string', token.span);
        case 'bad-url':
          throw new CssParseError('LexError', 'Empty url()', token.span);
        case 'error':
          throw CssParseError.fromLexError(token);
        default:
          return values;
      }
      this.advance();
    }

    return values;
  }

  /**
   * Parse the arguments of a function whose name token was just consumed
   */
  private parseFunction(fn: Token): Value {
    if (this.functionDepth >= this.options.maxDepth) {
      throw new CssParseError(
        'NestingTooDeep',
        `Functions nested deeper than ${this.options.maxDepth} levels`,
        fn.span
      );
    }

    this.functionDepth++;
    try {
      return this.parseFunctionArguments(fn);
    } finally {
      this.functionDepth--;
    }
  }

  private parseFunctionArguments(fn: Token): Value {
    switch (fn.value.toLowerCase()) {
      case 'rgb':
      case 'rgba':
        return this.parseRgb(fn);
      case 'calc':
        return this.parseCalc(fn);
      case 'url':
        return this.parseUrl(fn);
      case 'rect': {
        const numbers = this.collectNumbers(fn);
        if (numbers.length !== 4) {
          throw this.invalidArity(fn, 'exactly 4', numbers.length);
        }
        return {
          type: 'function',
          name: 'rect',
          arguments: numbers.map((token) => ({ type: 'number', value: this.toNumber(token) })),
        };
      }
      default:
        return this.parseGenericFunction(fn);
    }
  }

  private invalidArity(fn: Token, expected: string, actual: number): CssParseError {
    return new CssParseError(
      'InvalidArity',
      `${fn.value}() expects ${expected} arguments, got ${actual}`,
      { start: fn.span.start, end: this.previousEnd }
    );
  }

  /**
   * Collect number tokens up to the closing parenthesis. Commas are optional.
   */
  private collectNumbers(fn: Token): Token[] {
    const numbers: Token[] = [];

    for (;;) {
      const token = this.current;
      if (!token) {
        throw this.unterminated(fn);
      }
      switch (token.type) {
        case 'number':
          numbers.push(token);
          break;
        case 'comma':
        case 'comment':
          break;
        case 'close-paren':
          this.advance();
          return numbers;
        default:
          throw this.unexpectedIn(fn.value, token);
      }
      this.advance();
    }
  }

  private parseRgb(fn: Token): Value {
    const numbers = this.collectNumbers(fn);
    const [red, green, blue, alpha] = numbers;
    if (!red || !green || !blue || numbers.length > 4) {
      throw this.invalidArity(fn, '3 or 4', numbers.length);
    }

    const r = this.toChannel(red);
    const g = this.toChannel(green);
    const b = this.toChannel(blue);
    let color: ColorValue = { type: 'rgb', r, g, b };

    if (alpha) {
      const a = this.toNumber(alpha);
      if (a < 0 || a > 1) {
        throw new CssParseError('NumberFormat', `Alpha value '${alpha.value}' is outside 0..1`, alpha.span);
      }
      color = { type: 'rgba', r, g, b, a };
    }

    return { type: 'color', color };
  }

  private toChannel(token: Token): number {
    const value = /^\d+$/.test(token.value) ? Number(token.value) : NaN;
    if (!(value >= 0 && value <= 255)) {
      throw new CssParseError('NumberFormat', `Invalid color channel '${token.value}'`, token.span);
    }
    return value;
  }

  private parseCalc(fn: Token): Value {
    const terms: CalcTerm[] = [];

    for (;;) {
      const token = this.current;
      if (!token) {
        throw this.unterminated(fn);
      }
      switch (token.type) {
        case 'number':
          terms.push({ type: 'number', value: this.toNumber(token) });
          break;
        case 'dimension': {
          const { number, unit } = splitDimension(token.value);
          terms.push({ type: 'number', value: this.toNumber(token, number), unit });
          break;
        }
        case 'percentage':
          terms.push({ type: 'number', value: this.toNumber(token, token.value.slice(0, -1)), unit: '%' });
          break;
        case 'delim': {
          const operator = CALC_OPERATORS[token.value];
          if (operator) {
            terms.push({ ...operator });
          } else if (token.value === '%') {
            // a lone `%` is kept as a zero placeholder
            terms.push({ type: 'number', value: 0, unit: '%' });
          } else {
            throw this.unexpectedIn(fn.value, token);
          }
          break;
        }
        case 'comment':
          break;
        case 'close-paren':
          this.advance();
          return { type: 'calc', terms };
        default:
          throw this.unexpectedIn(fn.value, token);
      }
      this.advance();
    }
  }

  private parseUrl(fn: Token): Value {
    let url = '';

    for (;;) {
      const token = this.current;
      if (!token) {
        throw this.unterminated(fn);
      }
      switch (token.type) {
        case 'unquoted-url':
        case 'quoted-string':
          url += token.value;
          break;
        case 'comment':
          break;
        case 'close-paren':
          this.advance();
          return { type: 'uri', value: url };
        default:
          throw this.unexpectedIn(fn.value, token);
      }
      this.advance();
    }
  }

  private parseGenericFunction(fn: Token): Value {
    const args: Value[] = [];

    for (;;) {
      const token = this.current;
      if (!token) {
        throw this.unterminated(fn);
      }
      if (token.type === 'close-paren') {
        this.advance();
        return { type: 'function', name: fn.value, arguments: args };
      }
      args.push(...this.parseDeclarationValue());
      if (this.current === token) {
        throw this.unexpectedIn(fn.value, token);
      }
    }
  }

  private parseAtRule(keyword: Token): AtRule {
    const name = keyword.value;
    const prelude: string[] = [];

    while (this.current) {
      const token = this.current;
      if (token.type === 'curly-bracket-block') {
        this.advance();
        return this.parseAtRuleBlock(name, prelude, token);
      }
      if (token.type === 'semicolon') {
        this.advance();
        return { type: 'at-rule', name, prelude };
      }
      if (PRELUDE_TOKENS.has(token.type)) {
        prelude.push(this.slice(token.span.start, token.span.end));
        this.advance();
      } else {
        this.skip(token, `@${name} prelude`);
      }
    }

    throw new CssParseError('UnterminatedConstruct', `Expected '{' or ';' to end @${name}`, {
      start: keyword.span.start,
      end: this.end,
    });
  }

  private parseAtRuleBlock(name: string, prelude: string[], token: Token): AtRule {
    const block = this.openBlock(token);
    const rules: Rule[] = [];
    const declarations: Declaration[] = [];

    while (block.current) {
      const inner = block.current;
      if (inner.type === 'at-keyword') {
        block.advance();
        rules.push(block.parseAtRule(inner));
      } else if (block.startsDeclaration(inner)) {
        declarations.push(block.parseDeclaration(inner));
      } else if (isSelectorStart(inner) || inner.type === 'percentage') {
        rules.push(block.parseRuleSet());
      } else {
        block.skip(inner, `@${name} block`);
      }
    }

    const atRule: AtRule = { type: 'at-rule', name, prelude, block: { rules } };
    if (declarations.length > 0) {
      atRule.declarations = declarations;
    }
    return atRule;
  }
}

/**
 * Parse CSS source into a stylesheet. Throws CssParseError on a grammar error.
 */
export function parseStylesheet(css: string, options: ParserOptions = {}): Stylesheet {
  return new Parser(css, options).parseStylesheet();
}

/**
 * Parse CSS content and report failures instead of throwing
 */
export function parseCSS(css: string, filename: string = 'input.css', options: ParserOptions = {}): ParseResult {
  const startedAt = performance.now();
  try {
    const stylesheet = parseStylesheet(css, options);
    return { file: filename, stylesheet, errors: [], durationMs: performance.now() - startedAt };
  } catch (error) {
    if (!isCssParseError(error)) {
      throw error;
    }
    return {
      file: filename,
      stylesheet: null,
      errors: [toParseIssue(error, css)],
      durationMs: performance.now() - startedAt,
    };
  }
}

/**
 * Parse CSS from a file path
 */
export async function parseCSSFile(filePath: string, options: ParserOptions = {}): Promise<ParseResult> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    /* istanbul ignore next - error type check */
    const message = error instanceof Error ? error.message : String(error);
    return {
      file: filePath,
      stylesheet: null,
      errors: [{ kind: 'ReadError', message: `Failed to read file: ${message}` }],
      durationMs: 0,
    };
  }
  return parseCSS(content, filePath, options);
}
