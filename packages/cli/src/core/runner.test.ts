import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  REPORT_VERSION,
  checkReport,
  findCSSFiles,
  formatReportAsJSON,
  generateReport,
  mergeConfig,
  parseDirectory,
  parseFiles,
  parseInputs,
  toParserOptions,
} from './runner.js';
import { parseCSS } from './parser.js';
import type { ParserLogger } from './types.js';

describe('mergeConfig', () => {
  it('returns default config when no user config provided', () => {
    expect(mergeConfig()).toEqual({
      include: ['**/*.css'],
      exclude: ['**/node_modules/**', '**/dist/**', '**/vendor/**'],
      maxDepth: 64,
      selectorMode: 'folded',
      typedUnits: false,
      maxFailures: 0,
    });
  });

  it('overrides given keys only', () => {
    const config = mergeConfig({ include: ['src/**/*.css'], maxFailures: 2 });
    expect(config.include).toEqual(['src/**/*.css']);
    expect(config.maxFailures).toBe(2);
    expect(config.maxDepth).toBe(64);
  });
});

describe('toParserOptions', () => {
  it('carries the parser settings of a config', () => {
    expect(toParserOptions({ maxDepth: 8, selectorMode: 'structured', typedUnits: true })).toEqual({
      maxDepth: 8,
      selectorMode: 'structured',
      typedUnits: true,
    });
  });

  it('passes the logger through', () => {
    const logger: ParserLogger = { debug: jest.fn() };
    expect(toParserOptions({}, logger).logger).toBe(logger);
  });
});

describe('generateReport', () => {
  it('builds totals from parse results', () => {
    const report = generateReport([
      parseCSS('a { color: red; }', 'a.css'),
      parseCSS('a { color red; }', 'b.css'),
    ]);

    expect(report.version).toBe(REPORT_VERSION);
    expect(Number.isNaN(Date.parse(report.timestamp))).toBe(false);
    expect(report.totals.files).toBe(2);
    expect(report.totals.parsed).toBe(1);
    expect(report.totals.failed).toBe(1);
    expect(report.totals.ruleSets).toBe(1);
    expect(report.files.map((file) => file.ok)).toEqual([true, false]);
    expect(report.files[1]?.errors[0]?.kind).toBe('UnexpectedToken');
  });
});

describe('checkReport', () => {
  it('passes when every file parsed', () => {
    const report = generateReport([parseCSS('a { color: red; }', 'a.css')]);
    expect(checkReport(report)).toEqual({ passed: true, reasons: [] });
  });

  it('fails when more files failed than allowed', () => {
    const report = generateReport([parseCSS('a { color red; }', 'a.css')]);
    expect(checkReport(report)).toEqual({
      passed: false,
      reasons: ['1 file(s) failed to parse (maximum allowed: 0)'],
    });
  });

  it('allows failures up to maxFailures', () => {
    const report = generateReport([parseCSS('a { color red; }', 'a.css')]);
    expect(checkReport(report, { maxFailures: 1 }).passed).toBe(true);
  });

  it('fails when no files were found', () => {
    expect(checkReport(generateReport([]))).toEqual({ passed: false, reasons: ['No CSS files found'] });
  });
});

describe('formatReportAsJSON', () => {
  it('formats the report as indented JSON', () => {
    const report = generateReport([]);
    const json = formatReportAsJSON(report);
    expect(JSON.parse(json)).toEqual(report);
    expect(json).toContain('\n  "version": "0.1.0"');
  });
});

describe('file-system operations', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'css-ast-runner-'));
    await fs.mkdir(path.join(tempDir, 'src'));
    await fs.mkdir(path.join(tempDir, 'node_modules'));
    await fs.writeFile(path.join(tempDir, 'src', 'a.css'), 'a { color: red; }');
    await fs.writeFile(path.join(tempDir, 'src', 'b.css'), 'b { color blue; }');
    await fs.writeFile(path.join(tempDir, 'src', 'notes.txt'), 'not css');
    await fs.writeFile(path.join(tempDir, 'node_modules', 'lib.css'), 'c { color: green; }');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('finds CSS files and skips excluded directories', async () => {
    const files = await findCSSFiles(tempDir, mergeConfig());
    expect(files.map((file) => path.relative(tempDir, file))).toEqual([
      path.join('src', 'a.css'),
      path.join('src', 'b.css'),
    ]);
  });

  it('parses files in order', async () => {
    const results = await parseFiles([path.join(tempDir, 'src', 'a.css'), path.join(tempDir, 'src', 'b.css')]);
    expect(results.map((result) => result.stylesheet !== null)).toEqual([true, false]);
  });

  it('parses a directory into a report', async () => {
    const report = await parseDirectory(tempDir);
    expect(report.totals.files).toBe(2);
    expect(report.totals.parsed).toBe(1);
    expect(report.totals.failed).toBe(1);
  });

  it('parses files and inline content together', async () => {
    const report = await parseInputs([
      { type: 'file', path: path.join(tempDir, 'src', 'a.css') },
      { type: 'content', content: '.x { margin: 0; }', filename: 'inline.css' },
      { type: 'content', content: '.y { margin: 0; }' },
    ]);
    expect(report.files.map((file) => path.basename(file.file))).toEqual(['a.css', 'inline.css', 'input.css']);
    expect(report.totals.parsed).toBe(3);
  });

  it('ignores inputs without a path or content', async () => {
    const report = await parseInputs([{ type: 'file' }, { type: 'content' }]);
    expect(report.totals.files).toBe(0);
  });
});
