/**
 * Helpers for the small regular expression dialect produced by the
 * equation solver: literals, [...] classes, (...) groups, | and the
 * postfix quantifiers *, + and ?.
 *
 * Classes never contain brackets and literals are never operators, so a
 * class always closes at the next ']' and only parentheses nest.
 */
import { RegexSyntaxError } from './errors.js';

export type Quantifier = '*' | '+' | '?';

export const OPERATORS = '()[]|*+?';

/**
 * Characters that can't be used as alphabet symbols. On top of the
 * operators this includes everything a RegExp engine would read as
 * something other than a literal, including '-' which forms ranges
 * inside of character classes.
 */
export const RESERVED_CHARS = OPERATORS + '\\.^${}-';

export function isQuantifier(c: string | undefined): c is Quantifier {
  return c === '*' || c === '+' || c === '?';
}

/**
 * Whether the expression R can take a quantifier without being wrapped,
 * i.e. whether (R)Q is equivalent to RQ. That's the case for a single
 * literal and for a single group or class spanning the whole expression.
 */
export function isAtomic(expr: string): boolean {
  if (expr.length == 0) {
    return false;
  }
  if (expr.length == 1) {
    return !OPERATORS.includes(expr);
  }

  let depth = 0;
  for (let i = 0; i < expr.length; i++) {
    switch (expr[i]) {
      case '(':
      case '[':
        depth++;
        break;
      case ')':
      case ']':
        depth--;
        break;
    }
    // the top level pair closed early, or the first char didn't open one
    if (depth == 0 && i != expr.length - 1) {
      return false;
    }
  }
  return depth == 0;
}

/**
 * Wrap the expression in a group unless it is already atomic.
 */
export function atom(expr: string): string {
  return isAtomic(expr) ? expr : `(${expr})`;
}

/**
 * Find the end (exclusive) of the unquantified atom starting at `start`.
 */
export function atomEnd(expr: string, start: number): number {
  switch (expr[start]) {
    case '[': {
      const close = expr.indexOf(']', start);
      if (close == -1) {
        throw new RegexSyntaxError(expr, start, 'unclosed class');
      }
      return close + 1;
    }
    case '(': {
      let depth = 0;
      for (let i = start; i < expr.length; i++) {
        if (expr[i] == '(') {
          depth++;
        } else if (expr[i] == ')') {
          depth--;
          if (depth == 0) {
            return i + 1;
          }
        }
      }
      throw new RegexSyntaxError(expr, start, 'unclosed group');
    }
    case undefined:
      throw new RegexSyntaxError(expr, start, 'expected an atom');
    default:
      return start + 1;
  }
}

/**
 * Find the end (exclusive) of the atom starting at `start` together
 * with the quantifier that follows it, if there is one.
 */
export function quantifiedAtomEnd(expr: string, start: number): number {
  const end = atomEnd(expr, start);
  return isQuantifier(expr[end]) ? end + 1 : end;
}

/**
 * Find the start of the quantified atom that ends right before `end`.
 */
export function quantifiedAtomStart(expr: string, end: number): number {
  let i = end - 1;
  if (isQuantifier(expr[i])) {
    i--;
  }
  switch (expr[i]) {
    case ']': {
      const open = expr.lastIndexOf('[', i);
      if (open == -1) {
        throw new RegexSyntaxError(expr, i, 'unopened class');
      }
      return open;
    }
    case ')': {
      let depth = 0;
      for (; i >= 0; i--) {
        if (expr[i] == ')') {
          depth++;
        } else if (expr[i] == '(') {
          depth--;
          if (depth == 0) {
            return i;
          }
        }
      }
      throw new RegexSyntaxError(expr, end - 1, 'unopened group');
    }
    case undefined:
      throw new RegexSyntaxError(expr, end, 'expected an atom');
    default:
      return i;
  }
}

/**
 * Split a quantified atom like `(ab)*` into its base `(ab)` and quantifier.
 */
export function splitQuantifier(term: string): {
  base: string;
  quantifier: Quantifier | null;
} {
  const last = term[term.length - 1];
  if (term.length > 1 && isQuantifier(last)) {
    return { base: term.slice(0, -1), quantifier: last };
  }
  return { base: term, quantifier: null };
}
