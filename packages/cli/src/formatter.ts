import pc from 'picocolors';
import {
  offsetToPosition,
  type CalcTerm,
  type ColorValue,
  type Declaration,
  type FileReport,
  type Lexeme,
  type ParseIssue,
  type Report,
  type Rule,
  type Selector,
  type Stylesheet,
  type Value,
} from './core/index.js';

const RULE_LINE = '───────────────────────────────────────────────────────────────';
const DOUBLE_LINE = '═══════════════════════════════════════════════════════════════';

const CALC_SYMBOLS = { add: '+', subtract: '-', multiply: '*', divide: '/' } as const;

const ATTRIBUTE_SYMBOLS = {
  equals: '=',
  includes: '~=',
  'dash-match': '|=',
  'prefix-match': '^=',
  'suffix-match': '$=',
  'substring-match': '*=',
} as const;

const COMBINATOR_SYMBOLS = {
  descendant: ' ',
  child: ' > ',
  'adjacent-sibling': ' + ',
  'general-sibling': ' ~ ',
} as const;

function formatColor(color: ColorValue): string {
  switch (color.type) {
    case 'hex':
      return `#${color.value}`;
    case 'rgb':
      return `rgb(${color.r}, ${color.g}, ${color.b})`;
    case 'rgba':
      return `rgba(${color.r}, ${color.g}, ${color.b}, ${color.a})`;
    case 'hsl':
      return `hsl(${color.h}, ${color.s}%, ${color.l}%)`;
    case 'hsla':
      return `hsla(${color.h}, ${color.s}%, ${color.l}%, ${color.a})`;
    case 'named':
      return color.name;
  }
}

function formatCalcTerm(term: CalcTerm): string {
  if (term.type === 'operator') {
    return CALC_SYMBOLS[term.operator];
  }
  return `${term.value}${term.unit ?? ''}`;
}

/**
 * Render a value back to CSS-like text
 */
export function formatValue(value: Value): string {
  switch (value.type) {
    case 'identifier':
      return value.value;
    case 'string':
      return JSON.stringify(value.value);
    case 'number':
      return String(value.value);
    case 'percentage':
      return `${value.value}%`;
    case 'dimension':
    case 'angle':
    case 'time':
    case 'frequency':
    case 'resolution':
      return `${value.value}${value.unit}`;
    case 'uri':
      return `url(${value.value})`;
    case 'function':
      return `${value.name}(${value.arguments.map(formatValue).join(' ')})`;
    case 'calc':
      return `calc(${value.terms.map(formatCalcTerm).join(' ')})`;
    case 'var':
      return value.name;
    case 'color':
      return formatColor(value.color);
    case 'gradient':
      return value.gradient.type;
  }
}

/**
 * Render a selector node
 */
export function formatSelector(selector: Selector): string {
  switch (selector.type) {
    case 'simple':
      return `${selector.tag ?? ''}${selector.id ? `#${selector.id}` : ''}${selector.classes.join('')}`;
    case 'attribute':
      return selector.operator
        ? `[${selector.attribute}${ATTRIBUTE_SYMBOLS[selector.operator]}${JSON.stringify(selector.value ?? '')}]`
        : `[${selector.attribute}]`;
    case 'pseudo-class':
      return `:${selector.name}${selector.argument ? `(${selector.argument})` : ''}`;
    case 'pseudo-element':
      return `::${selector.name}`;
    case 'combinator':
      return COMBINATOR_SYMBOLS[selector.kind];
  }
}

function formatDeclaration(declaration: Declaration): string {
  return `${pc.cyan(declaration.property)}: ${declaration.value.map(formatValue).join(' ')}`;
}

function formatRule(rule: Rule, indent: string, lines: string[]): void {
  if (rule.type === 'rule-set') {
    lines.push(`${indent}${pc.bold('rule')} ${rule.selectors.map(formatSelector).join(', ')}`);
    for (const declaration of rule.declarations) {
      lines.push(`${indent}  ${formatDeclaration(declaration)}`);
    }
    for (const nested of rule.nestedRules) {
      formatRule(nested, `${indent}  `, lines);
    }
    return;
  }

  const prelude = rule.prelude.length > 0 ? ` ${rule.prelude.join(' ')}` : '';
  lines.push(`${indent}${pc.magenta(`@${rule.name}`)}${prelude}`);
  for (const declaration of rule.declarations ?? []) {
    lines.push(`${indent}  ${formatDeclaration(declaration)}`);
  }
  for (const nested of rule.block?.rules ?? []) {
    formatRule(nested, `${indent}  `, lines);
  }
}

/**
 * Format a stylesheet as an indented outline, one rule or declaration per line
 */
export function formatOutline(stylesheet: Stylesheet): string {
  const lines: string[] = [];
  for (const rule of stylesheet.rules) {
    formatRule(rule, '', lines);
  }
  return lines.join('\n');
}

/**
 * Format a token stream, one token per line with its span
 */
export function formatTokens(lexemes: Lexeme[]): string {
  return lexemes
    .map((lexeme) => {
      const span = pc.dim(`${lexeme.span.start}..${lexeme.span.end}`);
      if (lexeme.type === 'error') {
        return `${span} ${pc.red('error')} ${lexeme.message}`;
      }
      return `${span} ${pc.cyan(lexeme.type)} ${JSON.stringify(lexeme.value)}`;
    })
    .join('\n');
}

/**
 * Format a parse issue, with the offending source line and a caret when the source is known
 */
export function formatParseIssue(issue: ParseIssue, file: string, source?: string): string {
  const location = issue.line !== undefined ? `:${issue.line}:${issue.column ?? 1}` : '';
  const lines = [`${pc.bold(`${file}${location}`)} ${pc.red(issue.kind)} ${issue.message}`];

  if (source !== undefined && issue.span) {
    const { line, column } = offsetToPosition(source, issue.span.start);
    const sourceLine = source.split('\n')[line - 1] ?? '';
    const width = Math.max(1, Math.min(issue.span.end - issue.span.start, sourceLine.length - column + 1));
    lines.push(`  ${sourceLine}`);
    lines.push(`  ${' '.repeat(column - 1)}${pc.red('^'.repeat(width))}`);
  }

  return lines.join('\n');
}

/**
 * Format a one-line summary of a file report
 */
export function formatFileReport(file: FileReport): string {
  if (!file.ok) {
    return `  ${pc.red('✗')} ${file.file}`;
  }
  const { ruleSets, atRules, declarations } = file.stats;
  return (
    `  ${pc.green('✓')} ${file.file}  ` +
    pc.dim(`${ruleSets} rules, ${atRules} at-rules, ${declarations} declarations, ${file.durationMs.toFixed(2)}ms`)
  );
}

/**
 * Format the complete report for console output
 */
export function formatReport(report: Report, options: { silent?: boolean } = {}): string {
  if (options.silent) {
    return '';
  }

  const { totals } = report;
  const lines: string[] = [];

  lines.push('');
  lines.push(pc.bold(DOUBLE_LINE));
  lines.push(pc.bold('                       CSS PARSE REPORT                        '));
  lines.push(pc.bold(DOUBLE_LINE));
  lines.push('');
  lines.push(
    `  ${pc.bold('Files:')} ${totals.files}   ${pc.green(`parsed ${totals.parsed}`)}   ` +
      (totals.failed > 0 ? pc.red(`failed ${totals.failed}`) : pc.dim('failed 0'))
  );
  lines.push(
    `  ${pc.bold('Rules:')} ${totals.ruleSets}   ${pc.bold('At-rules:')} ${totals.atRules}   ` +
      `${pc.bold('Selectors:')} ${totals.selectors}   ${pc.bold('Declarations:')} ${totals.declarations}`
  );
  lines.push(`  ${pc.bold('Deepest nesting:')} ${totals.maxNestingDepth}   ${pc.bold('Time:')} ${totals.durationMs.toFixed(2)}ms`);
  lines.push('');

  if (report.files.length > 0) {
    lines.push(pc.bold(RULE_LINE));
    lines.push(pc.bold('  FILES'));
    lines.push(pc.bold(RULE_LINE));
    lines.push('');
    for (const file of report.files) {
      lines.push(formatFileReport(file));
    }
    lines.push('');
  }

  const failures = report.files.filter((file) => file.errors.length > 0);
  if (failures.length > 0) {
    lines.push(pc.bold(RULE_LINE));
    lines.push(pc.bold('  ERRORS'));
    lines.push(pc.bold(RULE_LINE));
    lines.push('');
    for (const file of failures) {
      for (const issue of file.errors) {
        lines.push(`  ${formatParseIssue(issue, file.file)}`);
      }
    }
    lines.push('');
  }

  lines.push(pc.bold(DOUBLE_LINE));

  return lines.join('\n');
}

/**
 * Format check result
 */
export function formatCheckResult(passed: boolean, reasons: string[]): string {
  const lines: string[] = [''];

  if (passed) {
    lines.push(pc.green(pc.bold('✓ CSS parse check PASSED')));
  } else {
    lines.push(pc.red(pc.bold('✗ CSS parse check FAILED')));
    lines.push('');
    lines.push('  Reasons:');
    for (const reason of reasons) {
      lines.push(`    - ${reason}`);
    }
  }
  lines.push('');

  return lines.join('\n');
}
