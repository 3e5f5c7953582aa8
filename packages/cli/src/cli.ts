#!/usr/bin/env node

import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  parseCSS,
  parseDirectory,
  checkReport,
  formatReportAsJSON,
  mergeConfig,
  toParserOptions,
  tokenize,
  type CssAstConfig,
} from './core/index.js';
import { formatCheckResult, formatOutline, formatParseIssue, formatReport, formatTokens } from './formatter.js';
import { findConfig, writeConfigFile } from './config.js';
import { createLogger } from './logger.js';

const VERSION = '0.1.0';

interface ParseCommandOptions {
  format: string;
  out?: string;
  structuredSelectors?: boolean;
  typedUnits?: boolean;
  maxDepth?: string;
  verbose?: boolean;
  config: boolean;
}

interface CheckCommandOptions {
  include?: string[];
  exclude?: string[];
  format: string;
  out?: string;
  maxFailures?: string;
  silent?: boolean;
  verbose?: boolean;
  config: boolean;
}

async function loadConfig(targetPath: string, useConfig: boolean): Promise<CssAstConfig> {
  if (!useConfig) {
    return {};
  }
  return (await findConfig(targetPath)) ?? {};
}

function parseCount(value: string, flag: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`${flag} must be a non-negative integer, got '${value}'`);
  }
  return count;
}

async function output(text: string, out: string | undefined): Promise<void> {
  if (out) {
    await fs.writeFile(out, text, 'utf-8');
    console.log(`Output written to ${out}`);
  } else {
    console.log(text);
  }
}

function fail(error: unknown): never {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
}

const program = new Command();

program
  .name('css-ast')
  .description('Parse CSS into a typed syntax tree')
  .version(VERSION);

// Parse command
program
  .command('parse')
  .description('Parse a CSS file and print its syntax tree')
  .argument('<file>', 'CSS file to parse')
  .option('-f, --format <type>', 'Output format: json or outline', 'json')
  .option('-o, --out <file>', 'Write output to file')
  .option('--structured-selectors', 'Build attribute, pseudo and combinator selector nodes')
  .option('--typed-units', 'Build angle, time, frequency and resolution values')
  .option('--max-depth <n>', 'Deepest block nesting accepted')
  .option('--verbose', 'Log skipped tokens to stderr')
  .option('--no-config', 'Ignore config files')
  .action(async (file: string, options: ParseCommandOptions) => {
    try {
      const filePath = path.resolve(file);
      const config = await loadConfig(path.dirname(filePath), options.config);

      if (options.structuredSelectors) {
        config.selectorMode = 'structured';
      }
      if (options.typedUnits) {
        config.typedUnits = true;
      }
      if (options.maxDepth !== undefined) {
        config.maxDepth = parseCount(options.maxDepth, '--max-depth');
      }

      const source = await fs.readFile(filePath, 'utf-8');
      const result = parseCSS(source, file, toParserOptions(config, createLogger({ verbose: options.verbose })));

      if (!result.stylesheet) {
        for (const issue of result.errors) {
          console.error(formatParseIssue(issue, file, source));
        }
        process.exit(1);
      }

      const text =
        options.format === 'outline'
          ? formatOutline(result.stylesheet)
          : JSON.stringify(result.stylesheet, null, 2);
      await output(text, options.out);
      console.error(`Parsed in ${result.durationMs.toFixed(3)}ms`);
    } catch (error) {
      fail(error);
    }
  });

// Tokens command
program
  .command('tokens')
  .description('Print the token stream of a CSS file')
  .argument('<file>', 'CSS file to tokenize')
  .action(async (file: string) => {
    try {
      const source = await fs.readFile(path.resolve(file), 'utf-8');
      console.log(formatTokens(tokenize(source)));
    } catch (error) {
      fail(error);
    }
  });

// Check command (for CI)
program
  .command('check')
  .description('Parse every CSS file under a path and fail when files do not parse (for CI)')
  .argument('[path]', 'Directory to check', '.')
  .option('-i, --include <patterns...>', 'Glob patterns to include')
  .option('-e, --exclude <patterns...>', 'Glob patterns to exclude')
  .option('-f, --format <type>', 'Output format: text or json', 'text')
  .option('-o, --out <file>', 'Write report to file')
  .option('--max-failures <count>', 'Number of files allowed to fail')
  .option('-s, --silent', 'Suppress console output (only exit code)')
  .option('--verbose', 'Log skipped tokens to stderr')
  .option('--no-config', 'Ignore config files')
  .action(async (inputPath: string, options: CheckCommandOptions) => {
    try {
      const targetPath = path.resolve(inputPath);
      const config = await loadConfig(targetPath, options.config);

      if (options.include) {
        config.include = options.include;
      }
      if (options.exclude) {
        config.exclude = options.exclude;
      }
      if (options.maxFailures !== undefined) {
        config.maxFailures = parseCount(options.maxFailures, '--max-failures');
      }

      const mergedConfig = mergeConfig(config);
      const report = await parseDirectory(targetPath, mergedConfig, createLogger({ verbose: options.verbose }));
      const { passed, reasons } = checkReport(report, mergedConfig);

      if (!options.silent) {
        if (options.format === 'json') {
          await output(formatReportAsJSON(report), options.out);
        } else {
          await output(formatReport(report), options.out);
          console.log(formatCheckResult(passed, reasons));
        }
      }

      process.exit(passed ? 0 : 1);
    } catch (error) {
      fail(error);
    }
  });

// Init command
program
  .command('init')
  .description('Generate a .cssastrc.json config file')
  .argument('[path]', 'Directory to create config in', '.')
  .action(async (inputPath: string) => {
    try {
      const targetPath = path.resolve(inputPath);
      const configPath = await writeConfigFile(targetPath);
      console.log(`Created config file: ${configPath}`);
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
