import { err, ok, Result } from 'neverthrow';
import type { ConstDFA } from '../automata/dfa.js';
import { loadDFADescription } from '../automata/dfa-description.js';
import { divisibilityDFA } from '../automata/divisibility.js';
import { AutomatonError } from '../automata/errors.js';
import { convertDFA, type ConversionError } from '../regex-gen/convert.js';
import { colors } from '../utils/debug.js';

export type OutputOptions = {
  raw: boolean;
  verbose: boolean;
};

/**
 * Where command output goes. The cli writes to stdout/stderr, tests collect
 * lines.
 */
export interface Output {
  write(line: string): void;
  error(line: string): void;
}

export const consoleOutput: Output = {
  write: (line) => console.log(line),
  error: (line) => console.error(line),
};

export type CommandError = ConversionError;

function printConversion(
  dfa: ConstDFA,
  opts: OutputOptions,
  out: Output
): Result<string, CommandError> {
  if (opts.verbose) {
    out.write(colors.bold('transition table:'));
    out.write(dfa.toDebugStr());
  }
  return convertDFA(dfa, { optimize: !opts.raw }).map(
    ({ raw, expression }) => {
      if (opts.verbose && !opts.raw) {
        out.write(`${colors.bold('solution:')} ${raw}`);
        out.write(`${colors.bold('optimized:')} ${colors.green(expression)}`);
      } else {
        out.write(expression);
      }
      return expression;
    }
  );
}

function buildDivisibilityDFA(
  base: number,
  divisor: number
): Result<ConstDFA, AutomatonError> {
  try {
    return ok(divisibilityDFA(base, divisor));
  } catch (e) {
    if (e instanceof AutomatonError) {
      return err(e);
    }
    throw e;
  }
}

/**
 * Print the expression matching the numbers in `base` divisible by `divisor`
 */
export function divisibleCommand(
  args: OutputOptions & { base: number; divisor: number },
  out: Output = consoleOutput
): Result<string, CommandError> {
  return buildDivisibilityDFA(args.base, args.divisor).andThen((dfa) =>
    printConversion(dfa, args, out)
  );
}

/**
 * Print the expression for the automaton described in the given json file
 */
export async function convertCommand(
  args: OutputOptions & { file: string },
  out: Output = consoleOutput
): Promise<Result<string, CommandError>> {
  const dfa = await loadDFADescription(args.file);
  return dfa.andThen((d) => printConversion(d, args, out));
}

export function reportError(e: CommandError, out: Output = consoleOutput) {
  out.error(colors.red(e.message));
}
