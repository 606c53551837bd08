import fs from 'fs';

/**
 * Something that has a debug str
 */
export interface IHaveDebugStr {
  toDebugStr(): string;
}

export function log(...args: unknown[]) {
  logger.log(...args);
}

type Listener = (...args: unknown[]) => void;

class Logger {
  static readonly instance = new Logger();
  private listeners: Set<Listener> = new Set();
  private debugFile: number | undefined = undefined;
  private forceConsole = false;

  private constructor() {}

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Print log lines to the console even when DEBUG is not set.
   * Used by the cli's --verbose flag.
   */
  enableConsole(enabled = true) {
    this.forceConsole = enabled;
  }

  log(...args: unknown[]) {
    for (const listener of this.listeners) {
      listener(...args);
    }
    if (this.forceConsole || process.env.DEBUG) {
      console.log(...args);
    } else if (process.env.DEBUG_FILE) {
      if (this.debugFile === undefined) {
        this.debugFile = fs.openSync(process.env.DEBUG_FILE, 'w');
      }
      fs.writeSync(this.debugFile, args.join(' ') + '\n');
    }
  }

  capture<R>(insideFunc: () => R, logs: string[]): R {
    const unsub = this.subscribe((...args: unknown[]) =>
      logs.push(args.join(' '))
    );
    try {
      return insideFunc();
    } finally {
      unsub();
    }
  }
}
export const logger = Logger.instance;

let shouldUseColors = false;
export function useColors(enabled = true) {
  shouldUseColors = enabled;
}

const ColorCodes = {
  red: '\u001b[31m',
  green: '\u001b[32m',
  reset: '\u001b[0m',
  bold: '\u001b[1m',
};
type ColorFuncs = {
  [Property in keyof typeof ColorCodes]: (s: string) => string;
};

function colorFunc(color: keyof typeof ColorCodes) {
  return (s: string): string =>
    shouldUseColors ? ColorCodes[color] + s + ColorCodes.reset : s;
}

const colors: ColorFuncs = {
  red: colorFunc('red'),
  green: colorFunc('green'),
  reset: colorFunc('reset'),
  bold: colorFunc('bold'),
};
export { colors };
