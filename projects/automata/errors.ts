export class AutomatonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Thrown when building or querying a DFA with an invalid state or symbol.
 */
export class DFAError extends AutomatonError {}

/**
 * Thrown for alphabets that can't be written into a regular expression
 * literally: duplicate characters, regex operators, or no characters at all.
 */
export class AlphabetError extends AutomatonError {
  readonly alphabet: string;
  constructor(alphabet: string, message: string) {
    super(`AlphabetError for "${alphabet}": ${message}`);
    this.alphabet = alphabet;
  }
}

export class DFADescriptionError extends AutomatonError {
  readonly path: string;
  constructor(path: string, message: string) {
    super(`DFADescriptionError at ${path || '<root>'}: ${message}`);
    this.path = path;
  }
}
