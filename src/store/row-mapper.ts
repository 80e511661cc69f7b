import type { Row } from '../types.js';

export type CountRow = {
  count: string; // pg returns COUNT(*) (bigint) as string by default
};

export type AggregateRow = {
  value: string | number | null; // NUMERIC comes back as string, float8 as number
};

export type ExistsRow = {
  present: boolean;
};

export function mapCount(row: CountRow | undefined): number {
  return row === undefined ? 0 : Number(row.count);
}

export function mapAggregate(row: AggregateRow | undefined): number | null {
  if (row === undefined || row.value === null) return null;
  return typeof row.value === 'number' ? row.value : Number(row.value);
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !(value instanceof Date);
}

/**
 * Freezes each row in place when the QuerySpec sets readOnly, together with
 * the rows attached under the included relation names.
 */
export function freezeRows(rows: Row[], readOnly: boolean | null, includes: readonly string[] = []): Row[] {
  if (readOnly !== true) return rows;
  for (const row of rows) {
    for (const name of includes) {
      const attached = row[name];
      if (Array.isArray(attached)) {
        for (const child of attached) {
          if (isRow(child)) Object.freeze(child);
        }
        Object.freeze(attached);
      } else if (isRow(attached)) {
        Object.freeze(attached);
      }
    }
    Object.freeze(row);
  }
  return rows;
}
