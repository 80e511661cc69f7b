import type { AggregateFunction, Executor, ModelDescriptor, QueryRequest, Row } from '../types.js';
import type { Condition, FilterNode, QuerySpec } from '../query/types.js';
import { UnknownRelationError } from '../errors.js';
import { attachIncludes } from './eager-load.js';
import { freezeRows } from './row-mapper.js';

export interface InMemoryExecutorConfig {
  /** Rows per table name. Rows are copied on read; the arrays are not cloned. */
  tables?: Record<string, Row[]>;
}

function normalize(value: unknown): unknown {
  return value instanceof Date ? value.getTime() : value;
}

function isNumeric(value: unknown): value is number | bigint {
  return typeof value === 'number' || typeof value === 'bigint';
}

/** Ascending comparison with nulls first. */
export function compareValues(a: unknown, b: unknown): number {
  const x = normalize(a);
  const y = normalize(b);
  if (x === y) return 0;
  if (x === null || x === undefined) return -1;
  if (y === null || y === undefined) return 1;
  if (isNumeric(x) && isNumeric(y)) {
    return x < y ? -1 : x > y ? 1 : 0;
  }
  if (typeof x === 'boolean' && typeof y === 'boolean') {
    return Number(x) - Number(y);
  }
  const left = String(x);
  const right = String(y);
  return left < right ? -1 : left > right ? 1 : 0;
}

function likePattern(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map((ch) => {
      if (ch === '%') return '.*';
      if (ch === '_') return '.';
      return ch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`, 's');
}

function isAbsent(value: unknown): boolean {
  return value === null || value === undefined;
}

/**
 * Executor that evaluates QuerySpecs against rows held in process. Joins
 * act as an existence filter on the related table (one result row per
 * parent row); a lock is accepted and ignored. A grouped chain without a
 * select returns only the grouped column, as the compiled SQL does.
 */
export class InMemoryExecutor implements Executor {
  private readonly tables: Map<string, Row[]>;

  constructor(config: InMemoryExecutorConfig = {}) {
    this.tables = new Map(Object.entries(config.tables ?? {}));
  }

  insert(table: string, ...rows: Row[]): void {
    const existing = this.tables.get(table);
    if (existing === undefined) {
      this.tables.set(table, [...rows]);
    } else {
      existing.push(...rows);
    }
  }

  async all(request: QueryRequest): Promise<Row[]> {
    const { model, spec } = request;
    const rows = this.evaluate(model, spec).map((row) => this.project(model, spec, row));
    await attachIncludes(model, rows, spec.includes, async (table, keyColumn, keys) => {
      return this.rowsOf(table)
        .filter((row) => keys.some((key) => compareValues(row[keyColumn], key) === 0))
        .map((row) => ({ ...row }));
    });
    return freezeRows(rows, spec.readOnly, spec.includes);
  }

  async first(request: QueryRequest): Promise<Row | null> {
    const rows = await this.all(request);
    return rows[0] ?? null;
  }

  async count(request: QueryRequest): Promise<number> {
    return this.evaluate(request.model, request.spec).length;
  }

  async exists(request: QueryRequest): Promise<boolean> {
    return this.evaluate(request.model, request.spec).length > 0;
  }

  async aggregate(request: QueryRequest, fn: AggregateFunction, field: string): Promise<number | null> {
    const { model, spec } = request;
    if (spec.groupBy !== null) {
      throw new Error('InMemoryExecutor.aggregate: grouped aggregates are not supported');
    }
    const values = this.evaluate(model, spec)
      .map((row) => this.read(model, row, field))
      .filter((value) => !isAbsent(value))
      .map((value) => Number(normalize(value)));

    if (values.length === 0) return null;
    switch (fn) {
      case 'sum':
        return values.reduce((total, v) => total + v, 0);
      case 'avg':
        return values.reduce((total, v) => total + v, 0) / values.length;
      case 'min':
        return values.reduce((lowest, v) => (v < lowest ? v : lowest));
      case 'max':
        return values.reduce((highest, v) => (v > highest ? v : highest));
    }
  }

  /**
   * WHERE, joins, GROUP BY, ORDER BY, OFFSET and LIMIT, in SQL's order.
   * Returns the stored row objects; callers copy before handing them out.
   */
  private evaluate(model: ModelDescriptor, spec: QuerySpec): Row[] {
    let rows = this.rowsOf(model.table).filter(
      (row) =>
        spec.conditions.every((node) => this.matches(model, row, node)) &&
        spec.joins.every((name) => this.hasRelated(model, row, name)),
    );

    if (spec.groupBy !== null) {
      const groupBy = spec.groupBy;
      const seen = new Set<unknown>();
      rows = rows.filter((row) => {
        const key = normalize(this.read(model, row, groupBy));
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      });
    }

    if (spec.order !== null && spec.order.length > 0) {
      const order = spec.order;
      rows = [...rows].sort((a, b) => {
        for (const term of order) {
          const result = compareValues(this.read(model, a, term.field), this.read(model, b, term.field));
          if (result !== 0) return term.direction === 'asc' ? result : -result;
        }
        return 0;
      });
    }

    const start = spec.offset ?? 0;
    const end = spec.limit === null ? undefined : start + spec.limit;
    return rows.slice(start, end);
  }

  private matches(model: ModelDescriptor, row: Row, node: FilterNode): boolean {
    if (node.kind === 'and') return node.filters.every((f) => this.matches(model, row, f));
    if (node.kind === 'or') return node.filters.some((f) => this.matches(model, row, f));
    return this.matchesCondition(this.read(model, row, node.field), node);
  }

  private matchesCondition(value: unknown, condition: Condition): boolean {
    const operand = condition.operands[0] ?? null;
    switch (condition.operator) {
      case 'eq':
        return operand === null ? isAbsent(value) : !isAbsent(value) && compareValues(value, operand) === 0;
      case 'ne':
        return operand === null ? !isAbsent(value) : !isAbsent(value) && compareValues(value, operand) !== 0;
      case 'gt':
        return !isAbsent(value) && operand !== null && compareValues(value, operand) > 0;
      case 'gte':
        return !isAbsent(value) && operand !== null && compareValues(value, operand) >= 0;
      case 'lt':
        return !isAbsent(value) && operand !== null && compareValues(value, operand) < 0;
      case 'lte':
        return !isAbsent(value) && operand !== null && compareValues(value, operand) <= 0;
      case 'in':
        return (
          !isAbsent(value) &&
          condition.operands.some((candidate) => candidate !== null && compareValues(value, candidate) === 0)
        );
      case 'like':
        return typeof value === 'string' && typeof operand === 'string' && likePattern(operand).test(value);
    }
  }

  private hasRelated(model: ModelDescriptor, row: Row, name: string): boolean {
    const relation = model.relations[name];
    if (relation === undefined) {
      throw new UnknownRelationError(model.name, name);
    }
    const [parentColumn, relatedColumn]: [string, string] =
      relation.kind === 'belongsTo'
        ? [relation.foreignKey, relation.ownerKey ?? 'id']
        : [relation.localKey ?? model.primaryKey, relation.foreignKey];
    const key = row[parentColumn];
    if (isAbsent(key)) return false;
    return this.rowsOf(relation.table).some((related) => compareValues(related[relatedColumn], key) === 0);
  }

  private project(model: ModelDescriptor, spec: QuerySpec, row: Row): Row {
    if (spec.select === null || spec.select.length === 0) {
      if (spec.groupBy === null) return { ...row };
      return { [this.column(spec.groupBy)]: this.read(model, row, spec.groupBy) };
    }
    const projected: Row = {};
    for (const field of spec.select) {
      if (field === '*' || field === `${model.table}.*`) {
        Object.assign(projected, row);
        continue;
      }
      projected[this.column(field)] = this.read(model, row, field);
    }
    return projected;
  }

  private column(field: string): string {
    return field.includes('.') ? field.slice(field.lastIndexOf('.') + 1) : field;
  }

  private read(model: ModelDescriptor, row: Row, field: string): unknown {
    const dot = field.indexOf('.');
    if (dot === -1) return row[field];
    const table = field.slice(0, dot);
    if (table !== model.table) {
      throw new Error(`InMemoryExecutor: cannot evaluate "${field}" outside table "${model.table}"`);
    }
    return row[field.slice(dot + 1)];
  }

  private rowsOf(table: string): Row[] {
    return this.tables.get(table) ?? [];
  }
}
