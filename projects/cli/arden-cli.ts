#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import type { Result } from 'neverthrow';
import { logger, useColors } from '../utils/debug.js';
import {
  convertCommand,
  divisibleCommand,
  reportError,
  type CommandError,
} from './commands.js';

function options<T>(yargs: yargs.Argv<T>) {
  return yargs
    .option('raw', {
      type: 'boolean',
      description: 'Print the solution of the equation system unoptimized',
      default: false,
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      description:
        'Print the transition table and the unoptimized solution, and log every elimination step',
      default: false,
    })
    .option('color', {
      type: 'boolean',
      description: 'Use colors in the output',
      default: false,
    });
}

function setup(args: { verbose: boolean; color: boolean }) {
  useColors(args.color);
  logger.enableConsole(args.verbose);
}

function finish(result: Result<string, CommandError>) {
  if (result.isErr()) {
    reportError(result.error);
    process.exitCode = 1;
  }
}

const parser = yargs(hideBin(process.argv))
  .scriptName('arden')
  .command({
    command: 'divisible <base> <divisor>',
    describe:
      'print an expression matching the numbers in <base> that are divisible by <divisor>',
    builder: (yargs) =>
      options(yargs)
        .positional('base', {
          describe: 'base of the numbers, between 2 and 36',
          type: 'number',
          demandOption: true,
        })
        .positional('divisor', {
          describe: 'the divisor, at least 1',
          type: 'number',
          demandOption: true,
        }),
    handler: (args) => {
      setup(args);
      finish(divisibleCommand(args));
    },
  })
  .command({
    command: 'convert <file>',
    describe: 'print an expression for the automaton described in a json file',
    builder: (yargs) =>
      options(yargs).positional('file', {
        describe: 'json file describing the automaton',
        type: 'string',
        demandOption: true,
      }),
    handler: async (args) => {
      setup(args);
      finish(await convertCommand(args));
    },
  })
  .demandCommand(1)
  .strict();

(async () => {
  await parser.parseAsync();
})().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
