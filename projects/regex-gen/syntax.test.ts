import { RegexSyntaxError } from './errors.js';
import {
  atom,
  atomEnd,
  isAtomic,
  isQuantifier,
  quantifiedAtomEnd,
  quantifiedAtomStart,
  splitQuantifier,
} from './syntax.js';

describe('isAtomic', () => {
  const cases: [string, boolean][] = [
    ['a', true],
    ['[ab]', true],
    ['(a|b)', true],
    ['((a)b)', true],
    ['', false],
    ['*', false],
    ['|', false],
    ['ab', false],
    ['a*', false],
    ['(a)*', false],
    ['(a)(b)', false],
    ['[ab]c', false],
  ];
  test.each(cases)('isAtomic(%p) is %p', (expr, expected) => {
    expect(isAtomic(expr)).toBe(expected);
  });
});

test('atom() only wraps what needs wrapping', () => {
  expect(atom('a')).toBe('a');
  expect(atom('[01]')).toBe('[01]');
  expect(atom('0*1')).toBe('(0*1)');
});

test('isQuantifier', () => {
  expect(['*', '+', '?', 'a', '(', undefined].map(isQuantifier)).toEqual([
    true,
    true,
    true,
    false,
    false,
    false,
  ]);
});

describe('atoms', () => {
  test('atomEnd', () => {
    expect(atomEnd('a[bc]d', 0)).toBe(1);
    expect(atomEnd('a[bc]d', 1)).toBe(5);
    expect(atomEnd('(a(b))c', 0)).toBe(6);
  });
  test('quantifiedAtomEnd', () => {
    expect(quantifiedAtomEnd('(ab)*c', 0)).toBe(5);
    expect(quantifiedAtomEnd('(ab)*c', 5)).toBe(6);
  });
  test('quantifiedAtomStart', () => {
    expect(quantifiedAtomStart('x(ab)*', 6)).toBe(1);
    expect(quantifiedAtomStart('a[bc]', 5)).toBe(1);
    expect(quantifiedAtomStart('ab+', 3)).toBe(1);
    expect(quantifiedAtomStart('(a(b))', 6)).toBe(0);
  });
  test('unbalanced input', () => {
    expect(() => atomEnd('(ab', 0)).toThrow(RegexSyntaxError);
    expect(() => atomEnd('[ab', 0)).toThrow('unclosed class');
    expect(() => quantifiedAtomStart('ab)', 3)).toThrow('unopened group');
  });
});

test('splitQuantifier', () => {
  expect(splitQuantifier('(ab)*')).toEqual({ base: '(ab)', quantifier: '*' });
  expect(splitQuantifier('[01]+')).toEqual({ base: '[01]', quantifier: '+' });
  expect(splitQuantifier('a')).toEqual({ base: 'a', quantifier: null });
});
