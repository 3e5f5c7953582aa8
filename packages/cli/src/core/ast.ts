/**
 * Root of a parsed stylesheet. Rule order follows the source.
 */
export interface Stylesheet {
  rules: Rule[];
}

export type Rule = RuleSet | AtRule;

/**
 * A selector list with its declaration block
 */
export interface RuleSet {
  type: 'rule-set';
  selectors: Selector[];
  declarations: Declaration[];
  /** Rule sets written inside this rule's block */
  nestedRules: Rule[];
}

/**
 * An at-rule such as `@media`, `@keyframes` or `@import`
 */
export interface AtRule {
  type: 'at-rule';
  name: string;
  /** Raw text of each prelude token */
  prelude: string[];
  /** Missing for at-rules terminated by `;` */
  block?: Stylesheet;
  /** Declarations found directly in the block, e.g. inside `@font-face` */
  declarations?: Declaration[];
}

export type Selector =
  | SimpleSelector
  | AttributeSelector
  | PseudoClassSelector
  | PseudoElementSelector
  | CombinatorSelector;

/**
 * Tag, id and class parts of a compound selector.
 *
 * In the default folded mode the parser also stores pseudo-classes, attribute
 * captures and combinator chains here as raw text, e.g. a `tag` of
 * `"body > .container"` or `classes` of `["::before"]`.
 */
export interface SimpleSelector {
  type: 'simple';
  tag?: string;
  id?: string;
  classes: string[];
}

export type AttributeOperator =
  | 'equals'
  | 'includes'
  | 'dash-match'
  | 'prefix-match'
  | 'suffix-match'
  | 'substring-match';

export interface AttributeSelector {
  type: 'attribute';
  attribute: string;
  operator?: AttributeOperator;
  value?: string;
}

export interface PseudoClassSelector {
  type: 'pseudo-class';
  name: string;
  /** Text between the parentheses, e.g. `2n+1` for `:nth-child(2n+1)` */
  argument?: string;
}

export interface PseudoElementSelector {
  type: 'pseudo-element';
  name: string;
}

export type CombinatorKind = 'descendant' | 'child' | 'adjacent-sibling' | 'general-sibling';

export interface CombinatorSelector {
  type: 'combinator';
  kind: CombinatorKind;
  inner?: Selector;
}

export interface Declaration {
  property: string;
  /** Space-separated component values in source order */
  value: Value[];
}

export type Value =
  | { type: 'identifier'; value: string }
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'percentage'; value: number }
  | { type: 'dimension'; value: number; unit: string }
  | { type: 'uri'; value: string }
  | FunctionValue
  | { type: 'calc'; terms: CalcTerm[] }
  | { type: 'var'; name: string }
  | { type: 'color'; color: ColorValue }
  | { type: 'gradient'; gradient: GradientValue }
  | { type: 'angle'; value: number; unit: AngleUnit }
  | { type: 'time'; value: number; unit: TimeUnit }
  | { type: 'frequency'; value: number; unit: FrequencyUnit }
  | { type: 'resolution'; value: number; unit: ResolutionUnit };

export type ValueType = Value['type'];

export interface FunctionValue {
  type: 'function';
  name: string;
  arguments: Value[];
}

export type ColorValue =
  | { type: 'hex'; value: string }
  | { type: 'rgb'; r: number; g: number; b: number }
  | { type: 'rgba'; r: number; g: number; b: number; a: number }
  | { type: 'hsl'; h: number; s: number; l: number }
  | { type: 'hsla'; h: number; s: number; l: number; a: number }
  | { type: 'named'; name: string };

export type CalcOperator = 'add' | 'subtract' | 'multiply' | 'divide';

export type CalcTerm =
  | { type: 'number'; value: number; unit?: string }
  | { type: 'operator'; operator: CalcOperator };

export type AngleUnit = 'deg' | 'grad' | 'rad' | 'turn';
export type TimeUnit = 's' | 'ms';
export type FrequencyUnit = 'Hz' | 'kHz';
export type ResolutionUnit = 'dpi' | 'dpcm' | 'dppx';

export type GradientValue =
  | { type: 'linear-gradient'; gradient: LinearGradient }
  | { type: 'radial-gradient'; gradient: RadialGradient }
  | { type: 'repeating-linear-gradient'; gradient: LinearGradient }
  | { type: 'repeating-radial-gradient'; gradient: RadialGradient };

export interface Angle {
  value: number;
  unit: AngleUnit;
}

export interface LinearGradient {
  direction?: Angle;
  colorStops: ColorStop[];
}

export interface RadialGradient {
  shape?: string;
  size?: string;
  position?: Position;
  colorStops: ColorStop[];
}

export interface ColorStop {
  color: Value;
  position?: Value;
}

export interface Position {
  x?: Value;
  y?: Value;
}
