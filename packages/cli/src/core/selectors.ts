import selectorParser from 'postcss-selector-parser';
import type { AttributeOperator, CombinatorKind, Selector, SimpleSelector } from './ast.js';
import { CssParseError } from './errors.js';
import type { Span } from './types.js';

/** Pseudo-elements that may be written with a single colon */
const LEGACY_PSEUDO_ELEMENTS = ['before', 'after', 'first-line', 'first-letter'];

const ATTRIBUTE_OPERATORS: Record<string, AttributeOperator> = {
  '=': 'equals',
  '~=': 'includes',
  '|=': 'dash-match',
  '^=': 'prefix-match',
  '$=': 'suffix-match',
  '*=': 'substring-match',
};

const COMBINATORS: Record<string, CombinatorKind> = {
  ' ': 'descendant',
  '>': 'child',
  '+': 'adjacent-sibling',
  '~': 'general-sibling',
};

/**
 * Build selector nodes from the raw text of a selector list.
 *
 * Each compound becomes a simple selector (tag, id, classes) followed by its
 * attribute and pseudo parts; combinators sit between compounds. Selectors of
 * a list are appended one after the other.
 */
export function buildStructuredSelectors(text: string, span: Span): Selector[] {
  let root: selectorParser.Root;
  try {
    root = selectorParser().astSync(text);
  } catch (error) {
    /* istanbul ignore next - error type check */
    const message = error instanceof Error ? error.message : String(error);
    throw new CssParseError('UnexpectedToken', `Invalid selector '${text}': ${message}`, span);
  }

  const selectors: Selector[] = [];

  for (const complex of root.nodes) {
    let compound: SimpleSelector | null = null;
    let parts: Selector[] = [];

    const current = (): SimpleSelector => {
      compound = compound ?? { type: 'simple', classes: [] };
      return compound;
    };

    const flush = () => {
      if (compound) {
        selectors.push(compound);
      }
      selectors.push(...parts);
      compound = null;
      parts = [];
    };

    for (const node of complex.nodes) {
      switch (node.type) {
        case 'tag':
          current().tag = node.value;
          break;
        case 'universal':
          current().tag = '*';
          break;
        case 'nesting':
          current().tag = '&';
          break;
        case 'id':
          current().id = node.value;
          break;
        case 'class':
          current().classes.push(node.value);
          break;
        case 'attribute': {
          const operator = node.operator ? ATTRIBUTE_OPERATORS[node.operator] : undefined;
          parts.push({
            type: 'attribute',
            attribute: node.attribute,
            ...(operator ? { operator } : {}),
            ...(node.value !== undefined ? { value: node.value } : {}),
          });
          break;
        }
        case 'pseudo': {
          const name = node.value.replace(/^:+/, '');
          if (node.value.startsWith('::') || LEGACY_PSEUDO_ELEMENTS.includes(name)) {
            parts.push({ type: 'pseudo-element', name });
          } else {
            const argument = node.nodes.map((inner) => inner.toString().trim()).join(', ');
            parts.push({ type: 'pseudo-class', name, ...(argument ? { argument } : {}) });
          }
          break;
        }
        case 'combinator': {
          const kind = COMBINATORS[node.value.trim() || ' '];
          if (!kind) {
            throw new CssParseError('UnexpectedToken', `Unsupported combinator '${node.value}'`, span);
          }
          flush();
          selectors.push({ type: 'combinator', kind });
          break;
        }
        default:
          // comments and strings carry nothing selectable
          break;
      }
    }

    flush();
  }

  return selectors;
}
