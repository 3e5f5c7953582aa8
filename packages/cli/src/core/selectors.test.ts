import { buildStructuredSelectors } from './selectors.js';
import { CssParseError } from './errors.js';

const span = { start: 0, end: 10 };

describe('buildStructuredSelectors', () => {
  it('builds a compound selector from tag, id and classes', () => {
    expect(buildStructuredSelectors('div#main.a.b', span)).toEqual([
      { type: 'simple', tag: 'div', id: 'main', classes: ['a', 'b'] },
    ]);
  });

  it('separates descendant compounds with a combinator', () => {
    expect(buildStructuredSelectors('nav a', span)).toEqual([
      { type: 'simple', tag: 'nav', classes: [] },
      { type: 'combinator', kind: 'descendant' },
      { type: 'simple', tag: 'a', classes: [] },
    ]);
  });

  it('maps sibling combinators', () => {
    expect(buildStructuredSelectors('h1 + p ~ ul', span)).toEqual([
      { type: 'simple', tag: 'h1', classes: [] },
      { type: 'combinator', kind: 'adjacent-sibling' },
      { type: 'simple', tag: 'p', classes: [] },
      { type: 'combinator', kind: 'general-sibling' },
      { type: 'simple', tag: 'ul', classes: [] },
    ]);
  });

  it('keeps the argument of a functional pseudo-class', () => {
    expect(buildStructuredSelectors('li:not(.active)', span)).toEqual([
      { type: 'simple', tag: 'li', classes: [] },
      { type: 'pseudo-class', name: 'not', argument: '.active' },
    ]);
  });

  it('treats legacy single-colon pseudo-elements as pseudo-elements', () => {
    expect(buildStructuredSelectors('p:first-line', span)).toEqual([
      { type: 'simple', tag: 'p', classes: [] },
      { type: 'pseudo-element', name: 'first-line' },
    ]);
  });

  it('builds attribute selectors with and without a value', () => {
    expect(buildStructuredSelectors('[disabled], [lang|="en"]', span)).toEqual([
      { type: 'attribute', attribute: 'disabled' },
      { type: 'attribute', attribute: 'lang', operator: 'dash-match', value: 'en' },
    ]);
  });

  it('uses * and & as tags', () => {
    expect(buildStructuredSelectors('*, &', span)).toEqual([
      { type: 'simple', tag: '*', classes: [] },
      { type: 'simple', tag: '&', classes: [] },
    ]);
  });

  it('reports selector text it cannot parse', () => {
    expect(() => buildStructuredSelectors('[', span)).toThrow(CssParseError);
    try {
      buildStructuredSelectors('[', span);
    } catch (error) {
      expect(error).toBeInstanceOf(CssParseError);
      if (error instanceof CssParseError) {
        expect(error.kind).toBe('UnexpectedToken');
        expect(error.message.startsWith("Invalid selector '[': ")).toBe(true);
        expect(error.span).toEqual(span);
      }
    }
  });
});
