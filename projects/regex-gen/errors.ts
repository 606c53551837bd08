import type { UnknownId } from './term.js';

/**
 * Base class for failures while turning an automaton into an expression.
 *
 * None of these are recoverable: they mean an internal invariant of the
 * solver or the optimizer broke.
 */
export class RegexGenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class EliminationError extends RegexGenError {
  readonly equationId: UnknownId;
  readonly leftover: (UnknownId | null)[];

  constructor(equationId: UnknownId, leftover: (UnknownId | null)[]) {
    const unknowns = leftover
      .map((ref) => (ref === null ? '<accept>' : `X${ref}`))
      .join(', ');
    super(
      `EliminationError in equation ${equationId}: expected a single closed term, found [${unknowns}]`
    );
    this.equationId = equationId;
    this.leftover = leftover;
  }
}

export class EquationPhaseError extends RegexGenError {
  readonly equationId: UnknownId;
  constructor(equationId: UnknownId, operation: string) {
    super(
      `EquationPhaseError: ${operation}() called on equation ${equationId} before its terms were merged`
    );
    this.equationId = equationId;
  }
}

export class EquationSystemStateError extends RegexGenError {}

export class RegexSyntaxError extends RegexGenError {
  readonly expression: string;
  readonly offset: number;
  constructor(expression: string, offset: number, message: string) {
    super(`RegexSyntaxError at offset ${offset} of "${expression}": ${message}`);
    this.expression = expression;
    this.offset = offset;
  }
}
