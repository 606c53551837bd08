import fs from 'fs';
import os from 'os';
import path from 'path';
import { colors, log, logger, useColors } from './debug.js';

describe('logger', () => {
  test('capture() collects the lines logged inside', () => {
    const logs: string[] = [];
    const result = logger.capture(() => {
      log('eliminated', 3);
      log('done');
      return 5;
    }, logs);
    expect(result).toBe(5);
    expect(logs).toEqual(['eliminated 3', 'done']);
  });

  test('capture() unsubscribes when the function throws', () => {
    const logs: string[] = [];
    expect(() =>
      logger.capture(() => {
        throw new Error('boom');
      }, logs)
    ).toThrow('boom');
    log('after');
    expect(logs).toEqual([]);
  });

  test('subscribe() returns an unsubscribe function', () => {
    const seen: unknown[][] = [];
    const unsubscribe = logger.subscribe((...args) => seen.push(args));
    log('x', 1);
    unsubscribe();
    log('y');
    expect(seen).toEqual([['x', 1]]);
  });

  describe('DEBUG_FILE', () => {
    const env = { ...process.env };
    afterEach(() => {
      process.env = env;
    });

    test('writes log lines to the file', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'arden-'));
      const file = path.join(dir, 'debug.log');
      process.env = { ...env, DEBUG_FILE: file };
      delete process.env.DEBUG;
      log('first', 1);
      log('second');
      expect(fs.readFileSync(file, 'utf8')).toBe('first 1\nsecond\n');
    });
  });
});

test('colors', () => {
  expect(colors.red('x')).toBe('x');
  useColors();
  expect(colors.red('x')).toBe('\u001b[31mx\u001b[0m');
  expect(colors.bold('y')).toBe('\u001b[1my\u001b[0m');
  useColors(false);
  expect(colors.green('z')).toBe('z');
});
