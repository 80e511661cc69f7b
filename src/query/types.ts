export type Value = string | number | boolean | bigint | Date | null;

export type Operator = 'eq' | 'ne' | 'gt' | 'gte' | 'lt' | 'lte' | 'in' | 'like';

export interface Condition {
  readonly kind: 'condition';
  readonly field: string;
  readonly operator: Operator;
  readonly operands: readonly Value[];
}

export type FilterNode =
  | Condition
  | { readonly kind: 'and'; readonly filters: readonly FilterNode[] }
  | { readonly kind: 'or';  readonly filters: readonly FilterNode[] };

export type SortDirection = 'asc' | 'desc';

export interface OrderTerm {
  readonly field: string;
  readonly direction: SortDirection;
}

/**
 * Fragment of a query produced by one scope body or inline finder option.
 * Absent keys leave the accumulated value untouched when merged.
 */
export interface PartialSpec {
  readonly conditions?: readonly FilterNode[];
  readonly order?: readonly OrderTerm[];
  readonly limit?: number;
  readonly offset?: number;
  readonly includes?: readonly string[];
  readonly joins?: readonly string[];
  readonly groupBy?: string;
  readonly select?: readonly string[];
  readonly readOnly?: boolean;
  readonly lock?: boolean;
}

/**
 * Fully merged query handed to an executor.
 * Unset scalars are null; includes and joins are duplicate-free.
 */
export interface QuerySpec {
  readonly conditions: readonly FilterNode[];
  readonly order: readonly OrderTerm[] | null;
  readonly limit: number | null;
  readonly offset: number | null;
  readonly includes: readonly string[];
  readonly joins: readonly string[];
  readonly groupBy: string | null;
  readonly select: readonly string[] | null;
  readonly readOnly: boolean | null;
  readonly lock: boolean | null;
}
