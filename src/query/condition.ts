import { InvalidOperandCountError } from '../errors.js';
import type { Condition, FilterNode, Operator, Value } from './types.js';

/** Value accepted by hash conditions and dynamic finders: an array means `in`. */
export type FieldValue = Value | readonly Value[];

/**
 * Builds a frozen Condition after checking the operand count against the
 * operator: `in` takes one or more operands, every other operator exactly one.
 */
export function createCondition(
  field: string,
  operator: Operator,
  operands: readonly Value[],
): Condition {
  if (field.trim() === '') {
    throw new Error('createCondition: field must be a non-empty string');
  }
  const valid = operator === 'in' ? operands.length >= 1 : operands.length === 1;
  if (!valid) {
    throw new InvalidOperandCountError(operator, operands.length);
  }
  const condition: Condition = {
    kind: 'condition',
    field,
    operator,
    operands: Object.freeze([...operands]),
  };
  return Object.freeze(condition);
}

/**
 * Fluent step holding a field name and awaiting the comparison.
 *
 * @example
 * where('created_at').gt(twoWeeksAgo)
 */
export class FieldSelector {
  constructor(private readonly _field: string) {}

  eq(value: Value): Condition {
    return createCondition(this._field, 'eq', [value]);
  }

  ne(value: Value): Condition {
    return createCondition(this._field, 'ne', [value]);
  }

  gt(value: Value): Condition {
    return createCondition(this._field, 'gt', [value]);
  }

  gte(value: Value): Condition {
    return createCondition(this._field, 'gte', [value]);
  }

  lt(value: Value): Condition {
    return createCondition(this._field, 'lt', [value]);
  }

  lte(value: Value): Condition {
    return createCondition(this._field, 'lte', [value]);
  }

  in(...values: Value[]): Condition {
    return createCondition(this._field, 'in', values);
  }

  like(pattern: string): Condition {
    return createCondition(this._field, 'like', [pattern]);
  }
}

export function where(field: string): FieldSelector {
  return new FieldSelector(field);
}

/** Groups filters so that any one of them matching is enough. */
export function anyOf(...filters: FilterNode[]): FilterNode {
  if (filters.length === 0) {
    throw new Error('anyOf: at least one filter is required');
  }
  const group: FilterNode = { kind: 'or', filters: Object.freeze([...filters]) };
  return Object.freeze(group);
}

export function allOf(...filters: FilterNode[]): FilterNode {
  if (filters.length === 0) {
    throw new Error('allOf: at least one filter is required');
  }
  const group: FilterNode = { kind: 'and', filters: Object.freeze([...filters]) };
  return Object.freeze(group);
}

/** Equality (or `in`, for arrays) condition on one field. */
export function fieldCondition(field: string, value: FieldValue): Condition {
  if (isValueList(value)) {
    return createCondition(field, 'in', value);
  }
  return createCondition(field, 'eq', [value]);
}

/**
 * Turns `{ gender: 'male', age: [20, 30] }` into one condition per key,
 * in key order.
 */
export function conditionsFromHash(hash: Readonly<Record<string, FieldValue>>): Condition[] {
  return Object.entries(hash).map(([field, value]) => fieldCondition(field, value));
}

function isValueList(value: FieldValue): value is readonly Value[] {
  return Array.isArray(value);
}
