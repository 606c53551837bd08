/**
 * Rewrites the expressions produced by {@link EquationSystem.solve} into
 * shorter equivalent ones.
 *
 * Only the dialect described in `syntax.ts` is understood, which is all
 * the solver ever writes. Every rewrite preserves the language of the
 * expression.
 */
import {
  isAtomic,
  isQuantifier,
  quantifiedAtomEnd,
  quantifiedAtomStart,
  splitQuantifier,
} from './syntax.js';

export type ExpressionKind = 'disjunction' | 'concatenation';

type OptimizedParts = {
  kind: ExpressionKind;
  terms: string[];
};

/**
 * An expression is a disjunction iff it has a '|' outside of any group.
 */
export function classify(expr: string): ExpressionKind {
  let depth = 0;
  for (const c of expr) {
    if (c == '(') {
      depth++;
    } else if (c == ')') {
      depth--;
    } else if (c == '|' && depth == 0) {
      return 'disjunction';
    }
  }
  return 'concatenation';
}

/**
 * Split a disjunction into its alternatives, or a concatenation into its
 * quantified atoms.
 */
export function splitTerms(
  expr: string,
  kind: ExpressionKind = classify(expr)
): string[] {
  const terms: string[] = [];
  if (kind == 'disjunction') {
    let depth = 0;
    let start = 0;
    for (let i = 0; i < expr.length; i++) {
      if (expr[i] == '(') {
        depth++;
      } else if (expr[i] == ')') {
        depth--;
      } else if (expr[i] == '|' && depth == 0) {
        terms.push(expr.slice(start, i));
        start = i + 1;
      }
    }
    terms.push(expr.slice(start));
  } else {
    for (let i = 0; i < expr.length; ) {
      const end = quantifiedAtomEnd(expr, i);
      terms.push(expr.slice(i, end));
      i = end;
    }
  }
  return terms;
}

export type Affixes = {
  prefix: string;
  suffix: string;
  /**
   * What is left of each term between prefix and suffix, leaving out the
   * terms that had nothing left
   */
  centers: string[];
  /**
   * Whether some term consisted of just the prefix and suffix
   */
  hasEmptyCenter: boolean;
};

function shortest(terms: readonly string[]): string {
  return terms.reduce((min, t) => (t.length < min.length ? t : min));
}

/**
 * Find the longest prefix and suffix, made of whole quantified atoms, that
 * all of the alternatives share.
 *
 * e.g. `abcd|aefd|aghd` has prefix `a`, suffix `d` and centers `bc`, `ef`
 * and `gh`.
 */
export function extractCommonAffixes(terms: readonly string[]): Affixes {
  const minimal = shortest(terms);

  let prefixLength = 0;
  while (prefixLength < minimal.length) {
    const end = quantifiedAtomEnd(minimal, prefixLength);
    const prefix = minimal.slice(0, end);
    // a shared prefix may not cut a quantifier off of its atom in another term
    if (terms.every((t) => t.startsWith(prefix) && !isQuantifier(t[end]))) {
      prefixLength = end;
    } else {
      break;
    }
  }

  let suffixLength = 0;
  while (prefixLength + suffixLength < minimal.length) {
    const start = quantifiedAtomStart(minimal, minimal.length - suffixLength);
    const suffix = minimal.slice(start);
    if (start >= prefixLength && terms.every((t) => t.endsWith(suffix))) {
      suffixLength = suffix.length;
    } else {
      break;
    }
  }

  const centers: string[] = [];
  let hasEmptyCenter = false;
  for (const term of terms) {
    if (term.length == prefixLength + suffixLength) {
      hasEmptyCenter = true;
    } else {
      centers.push(term.slice(prefixLength, term.length - suffixLength));
    }
  }
  return {
    prefix: minimal.slice(0, prefixLength),
    suffix: minimal.slice(minimal.length - suffixLength),
    centers,
    hasEmptyCenter,
  };
}

/**
 * Whether the term can be seen to match the empty word at a glance: an
 * atom quantified with * or ?.
 *
 * This misses terms like `a*b*`. That's fine, it only means an extra ? is
 * added somewhere.
 */
export function definitelyMatchesEmpty(term: string): boolean {
  const { base, quantifier } = splitQuantifier(term);
  return (quantifier == '*' || quantifier == '?') && isAtomic(base);
}

/**
 * Make the given term also match the empty word with as little extra
 * syntax as possible.
 */
export function allowEmpty(term: string): string {
  if (isAtomic(term)) {
    return term + '?';
  }
  const { base, quantifier } = splitQuantifier(term);
  if (quantifier == '+' && isAtomic(base)) {
    return base + '*';
  }
  return `(${term})?`;
}

/**
 * Pull the common prefix and suffix out of the alternatives of a
 * disjunction: `abcd|aefd|aghd` becomes `a(bc|ef|gh)d` and `ab|acb`
 * becomes `ac?b`.
 */
function factorDisjunction(terms: string[]): string[] {
  const { prefix, suffix, centers, hasEmptyCenter } =
    extractCommonAffixes(terms);
  if (prefix.length == 0 && suffix.length == 0) {
    return terms;
  }

  if (
    hasEmptyCenter &&
    centers.length > 0 &&
    !centers.some(definitelyMatchesEmpty)
  ) {
    // only one alternative needs to match the empty word. The shortest one
    // is the cheapest to change.
    centers.sort((a, b) => a.length - b.length);
    const [modify] = centers.splice(0, 1);
    centers.push(allowEmpty(modify));
  }

  let centerPart = centers.join('|');
  if (centers.length > 1) {
    centerPart = `(${centerPart})`;
  }
  // the center may now sit next to a prefix or suffix atom it can merge with
  const factored = splitTerms(prefix + centerPart + suffix, 'concatenation');
  return [reduceQuantifiedTerms(factored).join('')];
}

/**
 * Merge two adjacent quantified atoms into one if they share the same
 * atom, e.g. `R R*` becomes `R+`.
 *
 * @returns the merged term or null if they can't be merged
 */
function mergeQuantified(left: string, right: string): string | null {
  const l = splitQuantifier(left);
  const r = splitQuantifier(right);
  if (l.base !== r.base || !isAtomic(l.base)) {
    return null;
  }
  const base = l.base;
  if (l.quantifier === r.quantifier) {
    // R* R* is R*, but R R, R+ R+ and R? R? all say something more
    return l.quantifier == '*' ? left : null;
  }
  if (l.quantifier === null || r.quantifier === null) {
    // R R* and R* R are R+. R R+ and R R? stay
    const other = l.quantifier ?? r.quantifier;
    return other == '*' ? base + '+' : null;
  }
  // two different quantifiers out of *, + and ?. The result is whichever of
  // them matches more, with + winning over * because it also requires one R
  const both = new Set([l.quantifier, r.quantifier]);
  return both.has('+') ? base + '+' : base + '*';
}

/**
 * Combine runs of the same atom in a concatenation:
 * `a a*` → `a+`, `a* a*` → `a*`, `a+ a*` → `a+`.
 */
export function reduceQuantifiedTerms(terms: readonly string[]): string[] {
  const reduced: string[] = [];
  for (const term of terms) {
    if (reduced.length == 0) {
      reduced.push(term);
      continue;
    }
    const merged = mergeQuantified(reduced[reduced.length - 1], term);
    if (merged === null) {
      reduced.push(term);
    } else {
      reduced[reduced.length - 1] = merged;
    }
  }
  return reduced;
}

function recombine({ kind, terms }: OptimizedParts): string {
  return terms.join(kind == 'disjunction' ? '|' : '');
}

/**
 * Optimize the contents of a group term like `(ab|ac)*` and drop the
 * parentheses if they aren't needed anymore.
 */
function optimizeGroup(term: string): string {
  const { base, quantifier } = splitQuantifier(term);
  const inner = optimizeParts(base.slice(1, -1));
  const optimized = recombine(inner);
  const q = quantifier ?? '';

  if (isAtomic(optimized)) {
    return optimized + q;
  }
  // a disjunction with several alternatives would bind weaker than the
  // surrounding concatenation
  const isBareDisjunction =
    inner.kind == 'disjunction' && inner.terms.length > 1;
  if (quantifier !== null || isBareDisjunction) {
    return `(${optimized})${q}`;
  }
  return optimized;
}

function optimizeParts(expr: string): OptimizedParts {
  const kind = classify(expr);
  let terms = splitTerms(expr, kind);

  if (kind == 'disjunction') {
    terms = factorDisjunction(terms.map(optimizeOnce));
  } else {
    // a group that lost its parentheses contributes its atoms one by one
    terms = terms.flatMap((t) =>
      t.startsWith('(') ? splitTerms(optimizeGroup(t), 'concatenation') : [t]
    );
    if (terms.length > 1) {
      terms = reduceQuantifiedTerms(terms);
    }
  }
  return { kind, terms };
}

function optimizeOnce(expr: string): string {
  return recombine(optimizeParts(expr));
}

/**
 * Size of an expression for comparing rewrites: characters other than
 * parentheses first, then the total length.
 */
function size(expr: string): [number, number] {
  let parens = 0;
  for (const c of expr) {
    if (c == '(' || c == ')') {
      parens++;
    }
  }
  return [expr.length - parens, expr.length];
}

function isSmaller(a: string, b: string): boolean {
  const [aChars, aLength] = size(a);
  const [bChars, bLength] = size(b);
  return aChars < bChars || (aChars == bChars && aLength < bLength);
}

/**
 * Rewrite an expression into a shorter equivalent one.
 *
 * Rewrites are repeated as long as they make the expression smaller, so
 * optimizing the result again returns it unchanged.
 */
export function optimizeExpression(expr: string): string {
  let current = expr;
  for (;;) {
    const next = optimizeOnce(current);
    if (!isSmaller(next, current)) {
      return current;
    }
    current = next;
  }
}
