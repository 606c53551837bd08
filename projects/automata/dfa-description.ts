import { readFile } from 'fs/promises';
import { err, ok, Result } from 'neverthrow';
import { DFA } from './dfa.js';
import { AutomatonError, DFADescriptionError } from './errors.js';

/**
 * JSON shape of an automaton on disk:
 *
 * ```json
 * {
 *   "alphabet": "01",
 *   "states": [
 *     { "accepting": true, "transitions": { "0": 0, "1": 1 } },
 *     { "transitions": { "0": 1, "1": 0 } }
 *   ]
 * }
 * ```
 *
 * State 0 is the start state.
 */
export type DFADescription = {
  alphabet: string;
  states: StateDescription[];
};

export type StateDescription = {
  accepting?: boolean;
  transitions: { [symbol: string]: number };
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkState(
  value: unknown,
  index: number
): Result<StateDescription, DFADescriptionError> {
  const path = `states[${index}]`;
  if (!isRecord(value)) {
    return err(new DFADescriptionError(path, 'expected an object'));
  }
  const { accepting, transitions } = value;
  if (accepting !== undefined && typeof accepting !== 'boolean') {
    return err(
      new DFADescriptionError(`${path}.accepting`, 'expected a boolean')
    );
  }
  if (!isRecord(transitions)) {
    return err(
      new DFADescriptionError(`${path}.transitions`, 'expected an object')
    );
  }
  const checked: { [symbol: string]: number } = {};
  for (const [symbol, target] of Object.entries(transitions)) {
    if (typeof target !== 'number') {
      return err(
        new DFADescriptionError(
          `${path}.transitions.${symbol}`,
          'expected a state index'
        )
      );
    }
    checked[symbol] = target;
  }
  return ok({ accepting, transitions: checked });
}

/**
 * Check that the given value has the shape of a {@link DFADescription}.
 */
export function checkDescription(
  value: unknown
): Result<DFADescription, DFADescriptionError> {
  if (!isRecord(value)) {
    return err(new DFADescriptionError('', 'expected an object'));
  }
  const { alphabet, states } = value;
  if (typeof alphabet !== 'string') {
    return err(new DFADescriptionError('alphabet', 'expected a string'));
  }
  if (!Array.isArray(states) || states.length == 0) {
    return err(
      new DFADescriptionError('states', 'expected a non-empty array')
    );
  }
  const checkedStates: StateDescription[] = [];
  for (const [index, state] of states.entries()) {
    const checked = checkState(state, index);
    if (checked.isErr()) {
      return err(checked.error);
    }
    checkedStates.push(checked.value);
  }
  return ok({ alphabet, states: checkedStates });
}

/**
 * Build a DFA from a checked description.
 */
export function buildDFA(
  description: DFADescription
): Result<DFA, DFADescriptionError> {
  let dfa: DFA;
  try {
    dfa = new DFA(description.alphabet);
    for (const state of description.states) {
      dfa.addState(state.accepting ?? false);
    }
  } catch (e) {
    return err(wrapError('alphabet', e));
  }

  for (const [si, state] of description.states.entries()) {
    for (const [symbol, target] of Object.entries(state.transitions)) {
      const path = `states[${si}].transitions.${symbol}`;
      const alphaIndex = dfa.getAlphabetIndex(symbol);
      if (symbol.length != 1 || alphaIndex == -1) {
        return err(
          new DFADescriptionError(path, `"${symbol}" is not in the alphabet`)
        );
      }
      try {
        dfa.addEdge(si, target, alphaIndex);
      } catch (e) {
        return err(wrapError(path, e));
      }
    }
  }
  return ok(dfa);
}

function wrapError(path: string, e: unknown): DFADescriptionError {
  if (e instanceof AutomatonError) {
    return new DFADescriptionError(path, e.message);
  }
  throw e;
}

/**
 * Parse the JSON text of a {@link DFADescription} into a DFA.
 */
export function parseDFADescription(
  json: string
): Result<DFA, DFADescriptionError> {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (e) {
    if (e instanceof SyntaxError) {
      return err(new DFADescriptionError('', `invalid JSON: ${e.message}`));
    }
    throw e;
  }
  return checkDescription(value).andThen(buildDFA);
}

export async function loadDFADescription(
  path: string
): Promise<Result<DFA, DFADescriptionError>> {
  let json: string;
  try {
    json = await readFile(path, { encoding: 'utf8' });
  } catch (e) {
    if (e instanceof Error && 'code' in e) {
      return err(
        new DFADescriptionError('', `cannot read file: ${e.message}`)
      );
    }
    throw e;
  }
  return parseDFADescription(json);
}
