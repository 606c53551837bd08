import path from 'path';
import {
  loadDFADescription,
  parseDFADescription,
} from './dfa-description.js';

const fixture = (name: string) => path.join(__dirname, 'fixtures', name);

test('parses a description', () => {
  const result = parseDFADescription(
    JSON.stringify({
      alphabet: 'ab',
      states: [
        { transitions: { a: 1 } },
        { accepting: true, transitions: { b: 1 } },
      ],
    })
  );
  const dfa = result._unsafeUnwrap();
  expect(dfa.numStates).toBe(2);
  expect(dfa.accepts('abbb')).toBe(true);
  expect(dfa.accepts('ba')).toBe(false);
  expect(dfa.isComplete()).toBe(false);
});

describe('reports invalid descriptions', () => {
  const cases: [string, unknown][] = [
    ['DFADescriptionError at <root>: expected an object', []],
    ['DFADescriptionError at alphabet: expected a string', { states: [] }],
    [
      'DFADescriptionError at states: expected a non-empty array',
      { alphabet: 'a', states: [] },
    ],
    [
      'DFADescriptionError at states[0].accepting: expected a boolean',
      { alphabet: 'a', states: [{ accepting: 1, transitions: {} }] },
    ],
    [
      'DFADescriptionError at states[1].transitions: expected an object',
      { alphabet: 'a', states: [{ transitions: {} }, {}] },
    ],
    [
      'DFADescriptionError at states[0].transitions.a: expected a state index',
      { alphabet: 'a', states: [{ transitions: { a: '0' } }] },
    ],
    [
      'DFADescriptionError at states[0].transitions.c: "c" is not in the alphabet',
      { alphabet: 'ab', states: [{ transitions: { c: 0 } }] },
    ],
    [
      'DFADescriptionError at states[0].transitions.a: IndexError: toState 4 is not valid. Must be < 1',
      { alphabet: 'a', states: [{ transitions: { a: 4 } }] },
    ],
    [
      'DFADescriptionError at alphabet: AlphabetError for "a|": "|" is a reserved character',
      { alphabet: 'a|', states: [{ transitions: {} }] },
    ],
  ];
  test.each(cases)('%s', (message, description) => {
    const result = parseDFADescription(JSON.stringify(description));
    expect(result._unsafeUnwrapErr().message).toBe(message);
  });

  test('invalid json', () => {
    const result = parseDFADescription('{"alphabet": ');
    expect(result._unsafeUnwrapErr().message).toMatch(
      /^DFADescriptionError at <root>: invalid JSON: /
    );
  });
});

test('loadDFADescription()', async () => {
  const dfa = (await loadDFADescription(fixture('parity.json')))._unsafeUnwrap();
  expect(dfa.numStates).toBe(2);
  expect(dfa.accepts('0110')).toBe(true);

  const invalid = await loadDFADescription(fixture('unknown-symbol.json'));
  expect(invalid._unsafeUnwrapErr().path).toBe('states[0].transitions.c');
});

test('loadDFADescription() reports a missing file', async () => {
  const missing = fixture('missing.json');
  const error = (await loadDFADescription(missing))._unsafeUnwrapErr();
  expect(error.path).toBe('');
  expect(error.message).toBe(
    `DFADescriptionError at <root>: cannot read file: ENOENT: no such file or directory, open '${missing}'`
  );
});
