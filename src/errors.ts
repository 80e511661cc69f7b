import type { Operator } from './query/types.js';

export class InvalidOperandCountError extends Error {
  override readonly name = 'InvalidOperandCountError';

  constructor(
    readonly operator: Operator,
    readonly count: number,
    message?: string,
  ) {
    super(
      message ??
        `Operator "${operator}" ${operator === 'in' ? 'requires at least 1 operand' : 'requires exactly 1 operand'}, got ${count}`,
    );
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DuplicateScopeNameError extends Error {
  override readonly name = 'DuplicateScopeNameError';

  constructor(
    readonly model: string,
    readonly scope: string,
  ) {
    super(`Scope "${scope}" is already registered on model "${model}"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownScopeError extends Error {
  override readonly name = 'UnknownScopeError';

  constructor(
    readonly model: string,
    readonly scope: string,
  ) {
    super(`Model "${model}" has no scope named "${scope}"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ArityMismatchError extends Error {
  override readonly name = 'ArityMismatchError';

  constructor(
    readonly model: string,
    readonly scope: string,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`Scope "${model}.${scope}" expects ${expected} argument(s), got ${actual}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownFieldError extends Error {
  override readonly name = 'UnknownFieldError';

  constructor(
    readonly model: string,
    readonly field: string,
  ) {
    super(`Model "${model}" has no field named "${field}"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownRelationError extends Error {
  override readonly name = 'UnknownRelationError';

  constructor(
    readonly model: string,
    readonly relation: string,
  ) {
    super(`Model "${model}" has no relation named "${relation}"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RecordNotFoundError extends Error {
  override readonly name = 'RecordNotFoundError';

  constructor(
    readonly model: string,
    readonly id: unknown,
  ) {
    super(`Couldn't find ${model} with id=${String(id)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ExecutorError extends Error {
  override readonly name = 'ExecutorError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
