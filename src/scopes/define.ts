import { ArityMismatchError } from '../errors.js';
import type { Arity, ScopeDefinition, ScopeOptions } from './types.js';

const SCOPE_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]{0,127}$/;

/**
 * Validates scope options and returns a frozen ScopeDefinition.
 * The body is stored as-is and is not called here.
 */
export function defineScope(name: string, options: ScopeOptions): ScopeDefinition {
  if (!name || name.trim() === '') {
    throw new Error('defineScope: name must be a non-empty string');
  }
  if (!SCOPE_NAME_PATTERN.test(name)) {
    throw new Error(`defineScope: name "${name}" must match /^[a-zA-Z_][a-zA-Z0-9_]{0,127}$/`);
  }
  if (typeof options.body !== 'function') {
    throw new Error(`defineScope: "${name}" must have a body function`);
  }
  const arity = options.arity ?? 'zero';
  if (typeof arity === 'object' && (!Number.isInteger(arity.fixed) || arity.fixed < 0)) {
    throw new Error(`defineScope: "${name}" fixed arity must be a non-negative integer`);
  }

  const definition: ScopeDefinition = {
    name,
    arity: typeof arity === 'object' ? Object.freeze({ fixed: arity.fixed }) : arity,
    evaluation: options.evaluation ?? 'eager',
    body: options.body,
    ...(options.description !== undefined ? { description: options.description } : {}),
  };
  return Object.freeze(definition);
}

/** Number of arguments a fixed or zero arity demands; null for variadic. */
export function expectedArgumentCount(arity: Arity): number | null {
  if (arity === 'variadic') return null;
  if (arity === 'zero') return 0;
  return arity.fixed;
}

/**
 * Throws ArityMismatchError when `actual` does not fit the definition.
 */
export function checkArity(model: string, definition: ScopeDefinition, actual: number): void {
  const expected = expectedArgumentCount(definition.arity);
  if (expected !== null && expected !== actual) {
    throw new ArityMismatchError(model, definition.name, expected, actual);
  }
}
