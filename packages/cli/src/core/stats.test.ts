import { parseStylesheet } from './parser.js';
import { calculateTotals, collectStats, emptyStats, toFileReport } from './stats.js';

describe('collectStats', () => {
  it('returns zeros for an empty stylesheet', () => {
    expect(collectStats({ rules: [] })).toEqual(emptyStats());
  });

  it('counts rules, selectors and declarations', () => {
    const stylesheet = parseStylesheet('a, b { color: red; margin: 0; } #c { color: blue; }');
    expect(collectStats(stylesheet)).toEqual({
      ruleSets: 2,
      atRules: 0,
      selectors: 3,
      declarations: 3,
      maxNestingDepth: 0,
    });
  });

  it('counts nested rules and at-rule blocks', () => {
    const stylesheet = parseStylesheet(
      '@media print { .a { color: red; .b { color: blue; } } } @font-face { font-family: "X"; } @import url(x.css);'
    );
    expect(collectStats(stylesheet)).toEqual({
      ruleSets: 2,
      atRules: 3,
      selectors: 2,
      declarations: 3,
      maxNestingDepth: 2,
    });
  });
});

describe('toFileReport', () => {
  it('summarizes a successful parse', () => {
    const report = toFileReport({
      file: 'a.css',
      stylesheet: parseStylesheet('a { color: red; }'),
      errors: [],
      durationMs: 1.5,
    });
    expect(report).toEqual({
      file: 'a.css',
      ok: true,
      stats: { ruleSets: 1, atRules: 0, selectors: 1, declarations: 1, maxNestingDepth: 0 },
      errors: [],
      durationMs: 1.5,
    });
  });

  it('marks a failed parse', () => {
    const errors = [{ kind: 'ReadError' as const, message: 'Failed to read file: gone' }];
    const report = toFileReport({ file: 'b.css', stylesheet: null, errors, durationMs: 0 });
    expect(report.ok).toBe(false);
    expect(report.stats).toEqual(emptyStats());
    expect(report.errors).toBe(errors);
  });
});

describe('calculateTotals', () => {
  it('adds up file reports', () => {
    const ok = toFileReport({
      file: 'a.css',
      stylesheet: parseStylesheet('a { color: red; .b { color: blue; } }'),
      errors: [],
      durationMs: 2,
    });
    const failed = toFileReport({ file: 'b.css', stylesheet: null, errors: [], durationMs: 1 });

    expect(calculateTotals([ok, failed])).toEqual({
      files: 2,
      parsed: 1,
      failed: 1,
      ruleSets: 2,
      atRules: 0,
      selectors: 2,
      declarations: 2,
      maxNestingDepth: 1,
      durationMs: 3,
    });
  });
});
