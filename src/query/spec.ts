import type { OrderTerm, PartialSpec, QuerySpec } from './types.js';

export function asc(field: string): OrderTerm {
  return { field, direction: 'asc' };
}

export function desc(field: string): OrderTerm {
  return { field, direction: 'desc' };
}

export function emptySpec(): QuerySpec {
  return {
    conditions: [],
    order: null,
    limit: null,
    offset: null,
    includes: [],
    joins: [],
    groupBy: null,
    select: null,
    readOnly: null,
    lock: null,
  };
}

function union(existing: readonly string[], added: readonly string[] | undefined): readonly string[] {
  if (added === undefined || added.length === 0) return existing;
  const merged = [...existing];
  for (const name of added) {
    if (!merged.includes(name)) merged.push(name);
  }
  return merged;
}

/**
 * Folds one PartialSpec into an accumulated QuerySpec and returns a new spec.
 *
 * - scalars (order, limit, offset, groupBy, select, readOnly, lock): last writer wins
 * - includes / joins: union, first-seen order
 * - conditions: appended, never deduplicated
 */
export function mergeSpec(acc: QuerySpec, partial: PartialSpec): QuerySpec {
  return {
    conditions:
      partial.conditions !== undefined && partial.conditions.length > 0
        ? [...acc.conditions, ...partial.conditions]
        : acc.conditions,
    order: partial.order !== undefined ? [...partial.order] : acc.order,
    limit: partial.limit ?? acc.limit,
    offset: partial.offset ?? acc.offset,
    includes: union(acc.includes, partial.includes),
    joins: union(acc.joins, partial.joins),
    groupBy: partial.groupBy ?? acc.groupBy,
    select: partial.select !== undefined ? [...partial.select] : acc.select,
    readOnly: partial.readOnly ?? acc.readOnly,
    lock: partial.lock ?? acc.lock,
  };
}

/** Sets the limit only when no scope in the chain has set one. */
export function withDefaultLimit(spec: QuerySpec, limit: number): QuerySpec {
  if (spec.limit !== null) return spec;
  return { ...spec, limit };
}

/**
 * Flips every order term, or orders by the primary key descending when the
 * spec has no order of its own.
 */
export function reverseOrder(spec: QuerySpec, primaryKey: string): QuerySpec {
  const order: OrderTerm[] =
    spec.order === null || spec.order.length === 0
      ? [{ field: primaryKey, direction: 'desc' }]
      : spec.order.map((term): OrderTerm => ({
          field: term.field,
          direction: term.direction === 'asc' ? 'desc' : 'asc',
        }));
  return { ...spec, order };
}
