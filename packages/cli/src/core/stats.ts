import type { Rule, Stylesheet } from './ast.js';
import type { FileReport, ParseResult, ReportTotals, StylesheetStats } from './types.js';

export function emptyStats(): StylesheetStats {
  return { ruleSets: 0, atRules: 0, selectors: 0, declarations: 0, maxNestingDepth: 0 };
}

function walkRules(rules: Rule[], depth: number, stats: StylesheetStats): void {
  for (const rule of rules) {
    stats.maxNestingDepth = Math.max(stats.maxNestingDepth, depth);

    switch (rule.type) {
      case 'rule-set':
        stats.ruleSets++;
        stats.selectors += rule.selectors.length;
        stats.declarations += rule.declarations.length;
        walkRules(rule.nestedRules, depth + 1, stats);
        break;
      case 'at-rule':
        stats.atRules++;
        stats.declarations += rule.declarations?.length ?? 0;
        if (rule.block) {
          walkRules(rule.block.rules, depth + 1, stats);
        }
        break;
    }
  }
}

/**
 * Count rule sets, at-rules, selectors and declarations, nested rules included.
 * Depth counts rule sets and at-rules enclosing a rule.
 */
export function collectStats(stylesheet: Stylesheet): StylesheetStats {
  const stats = emptyStats();
  walkRules(stylesheet.rules, 0, stats);
  return stats;
}

/**
 * Summarize a parse result as a file report
 */
export function toFileReport(result: ParseResult): FileReport {
  return {
    file: result.file,
    ok: result.stylesheet !== null && result.errors.length === 0,
    stats: result.stylesheet ? collectStats(result.stylesheet) : emptyStats(),
    errors: result.errors,
    durationMs: result.durationMs,
  };
}

/**
 * Add up file reports
 */
export function calculateTotals(files: FileReport[]): ReportTotals {
  const totals: ReportTotals = {
    ...emptyStats(),
    files: files.length,
    parsed: 0,
    failed: 0,
    durationMs: 0,
  };

  for (const file of files) {
    if (file.ok) {
      totals.parsed++;
    } else {
      totals.failed++;
    }
    totals.ruleSets += file.stats.ruleSets;
    totals.atRules += file.stats.atRules;
    totals.selectors += file.stats.selectors;
    totals.declarations += file.stats.declarations;
    totals.maxNestingDepth = Math.max(totals.maxNestingDepth, file.stats.maxNestingDepth);
    totals.durationMs += file.durationMs;
  }

  return totals;
}
