import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import type { CssAstConfig, ParseInput, ParseResult, ParserLogger, ParserOptions, Report } from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import { parseCSS, parseCSSFile } from './parser.js';
import { calculateTotals, toFileReport } from './stats.js';

export const REPORT_VERSION = '0.1.0';

/**
 * Merge user config with defaults
 */
export function mergeConfig(userConfig: CssAstConfig = {}): Required<CssAstConfig> {
  return {
    include: userConfig.include ?? DEFAULT_CONFIG.include,
    exclude: userConfig.exclude ?? DEFAULT_CONFIG.exclude,
    maxDepth: userConfig.maxDepth ?? DEFAULT_CONFIG.maxDepth,
    selectorMode: userConfig.selectorMode ?? DEFAULT_CONFIG.selectorMode,
    typedUnits: userConfig.typedUnits ?? DEFAULT_CONFIG.typedUnits,
    maxFailures: userConfig.maxFailures ?? DEFAULT_CONFIG.maxFailures,
  };
}

/**
 * Parser options for a config
 */
export function toParserOptions(config: CssAstConfig = {}, logger?: ParserLogger): ParserOptions {
  const merged = mergeConfig(config);
  return {
    maxDepth: merged.maxDepth,
    selectorMode: merged.selectorMode,
    typedUnits: merged.typedUnits,
    ...(logger ? { logger } : {}),
  };
}

/**
 * Find CSS files based on include/exclude patterns
 */
export async function findCSSFiles(
  basePath: string,
  config: Required<CssAstConfig>
): Promise<string[]> {
  const files: string[] = [];
  const absoluteBase = path.resolve(basePath);

  for (const pattern of config.include) {
    try {
      const matches = await glob(pattern, {
        cwd: absoluteBase,
        absolute: true,
        ignore: config.exclude,
        nodir: true,
      });
      files.push(...matches);
    } catch /* istanbul ignore next - glob rejects malformed patterns */ {
      const literalPath = path.join(absoluteBase, pattern);
      try {
        await fs.access(literalPath);
        files.push(literalPath);
      } catch {
        // not a file either, nothing to add
      }
    }
  }

  return [...new Set(files)].sort();
}

/**
 * Parse multiple CSS files
 */
export async function parseFiles(filePaths: string[], options: ParserOptions = {}): Promise<ParseResult[]> {
  const results: ParseResult[] = [];

  for (const filePath of filePaths) {
    results.push(await parseCSSFile(filePath, options));
  }

  return results;
}

/**
 * Parse files and inline content and build a report
 */
export async function parseInputs(
  inputs: ParseInput[],
  config: CssAstConfig = {},
  logger?: ParserLogger
): Promise<Report> {
  const options = toParserOptions(config, logger);
  const results: ParseResult[] = [];

  for (const input of inputs) {
    if (input.type === 'file' && input.path) {
      results.push(await parseCSSFile(input.path, options));
    } else if (input.type === 'content' && input.content !== undefined) {
      results.push(parseCSS(input.content, input.filename ?? 'input.css', options));
    }
  }

  return generateReport(results);
}

/**
 * Parse every CSS file under a directory
 */
export async function parseDirectory(
  dirPath: string,
  config: CssAstConfig = {},
  logger?: ParserLogger
): Promise<Report> {
  const mergedConfig = mergeConfig(config);
  const files = await findCSSFiles(dirPath, mergedConfig);
  const results = await parseFiles(files, toParserOptions(mergedConfig, logger));

  return generateReport(results);
}

/**
 * Generate the report from parse results
 */
export function generateReport(results: ParseResult[]): Report {
  const files = results.map((result) => toFileReport(result));

  return {
    version: REPORT_VERSION,
    timestamp: new Date().toISOString(),
    totals: calculateTotals(files),
    files,
  };
}

/**
 * Check a report against the configured failure budget
 */
export function checkReport(
  report: Report,
  config: CssAstConfig = {}
): { passed: boolean; reasons: string[] } {
  const mergedConfig = mergeConfig(config);
  const reasons: string[] = [];

  if (report.totals.files === 0) {
    reasons.push('No CSS files found');
  }

  if (report.totals.failed > mergedConfig.maxFailures) {
    reasons.push(
      `${report.totals.failed} file(s) failed to parse (maximum allowed: ${mergedConfig.maxFailures})`
    );
  }

  return {
    passed: reasons.length === 0,
    reasons,
  };
}

/**
 * Format report as JSON string
 */
export function formatReportAsJSON(report: Report): string {
  return JSON.stringify(report, null, 2);
}
