import path from 'path';
import {
  convertCommand,
  divisibleCommand,
  reportError,
  type Output,
} from './commands.js';

class CollectOutput implements Output {
  lines: string[] = [];
  errors: string[] = [];
  write(line: string) {
    this.lines.push(line);
  }
  error(line: string) {
    this.errors.push(line);
  }
}

const parityFile = path.join(
  __dirname,
  '..',
  'automata',
  'fixtures',
  'parity.json'
);

let out: CollectOutput;
beforeEach(() => {
  out = new CollectOutput();
});

describe('divisible', () => {
  test('prints the expression', () => {
    const result = divisibleCommand(
      { base: 2, divisor: 1, raw: false, verbose: false },
      out
    );
    expect(result._unsafeUnwrap()).toBe('[01]*');
    expect(out.lines).toEqual(['[01]*']);
  });

  test('reports an invalid base', () => {
    const result = divisibleCommand(
      { base: 1, divisor: 3, raw: false, verbose: false },
      out
    );
    reportError(result._unsafeUnwrapErr(), out);
    expect(out.lines).toEqual([]);
    expect(out.errors).toEqual(['Invalid base 1. Allowed values are [2..36]']);
  });
});

describe('convert', () => {
  test('prints the raw solution', async () => {
    const result = await convertCommand(
      { file: parityFile, raw: true, verbose: false },
      out
    );
    expect(result.isOk()).toBe(true);
    expect(out.lines).toEqual(['(0*10*1)*0*']);
  });

  test('prints the table and both expressions when verbose', async () => {
    await convertCommand({ file: parityFile, raw: false, verbose: true }, out);
    expect(out.lines).toEqual([
      'transition table:',
      '      δ     0     1\n  >*s0:  >*s0    s1\n    s1:    s1  >*s0\n',
      'solution: (0*10*1)*0*',
      'optimized: (0*10*1)*0*',
    ]);
  });

  test('reports a file that does not exist', async () => {
    const missing = path.join(__dirname, 'missing.json');
    const result = await convertCommand(
      { file: missing, raw: false, verbose: false },
      out
    );
    reportError(result._unsafeUnwrapErr(), out);
    expect(out.lines).toEqual([]);
    expect(out.errors).toEqual([
      `DFADescriptionError at <root>: cannot read file: ENOENT: no such file or directory, open '${missing}'`,
    ]);
  });
});
