import { UnknownRelationError } from '../errors.js';
import type { ModelDescriptor, Row } from '../types.js';

/** Fetches every row of `table` whose `keyColumn` is one of `keys`. */
export type RelatedLoader = (table: string, keyColumn: string, keys: unknown[]) => Promise<Row[]>;

function distinctKeys(rows: readonly Row[], column: string): unknown[] {
  const seen = new Map<string, unknown>();
  for (const row of rows) {
    const value = row[column];
    if (value !== null && value !== undefined) seen.set(String(value), value);
  }
  return [...seen.values()];
}

function groupByKey(rows: readonly Row[], column: string): Map<string, Row[]> {
  const groups = new Map<string, Row[]>();
  for (const row of rows) {
    const key = String(row[column]);
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, [row]);
    } else {
      group.push(row);
    }
  }
  return groups;
}

/**
 * Eager-loads each included relation with one query per relation and
 * attaches the result to the parent rows under the relation name:
 * an array for hasMany, a row or null for hasOne and belongsTo.
 */
export async function attachIncludes(
  model: ModelDescriptor,
  rows: Row[],
  includes: readonly string[],
  load: RelatedLoader,
): Promise<Row[]> {
  if (rows.length === 0) return rows;

  for (const name of includes) {
    const relation = model.relations[name];
    if (relation === undefined) {
      throw new UnknownRelationError(model.name, name);
    }

    const parentColumn =
      relation.kind === 'belongsTo' ? relation.foreignKey : (relation.localKey ?? model.primaryKey);
    const relatedColumn =
      relation.kind === 'belongsTo' ? (relation.ownerKey ?? 'id') : relation.foreignKey;

    const keys = distinctKeys(rows, parentColumn);
    const related = keys.length > 0 ? await load(relation.table, relatedColumn, keys) : [];
    const grouped = groupByKey(related, relatedColumn);

    for (const row of rows) {
      const value = row[parentColumn];
      const matches =
        value === null || value === undefined ? [] : (grouped.get(String(value)) ?? []);
      // copied per parent: one related row can match several parents
      const own = matches.map((match) => ({ ...match }));
      row[name] = relation.kind === 'hasMany' ? own : (own[0] ?? null);
    }
  }
  return rows;
}
