import { UnknownRelationError } from '../errors.js';
import type { AggregateFunction, ModelDescriptor } from '../types.js';
import type { Condition, FilterNode, QuerySpec } from '../query/types.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

interface CompileContext {
  params: unknown[];
  counter: { n: number };
  /** Qualifies bare column names with the model table once joins are in play. */
  qualify: (field: string) => string;
}

const IDENTIFIER_PART = /^[A-Za-z_][A-Za-z0-9_]*$/;

const COMPARISON_SQL = {
  eq: '=',
  ne: '<>',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
  like: 'LIKE',
} as const;

const AGGREGATE_SQL: Record<AggregateFunction, string> = {
  sum: 'SUM',
  avg: 'AVG',
  min: 'MIN',
  max: 'MAX',
};

/**
 * Double-quotes an identifier, part by part for dotted names. A trailing `*`
 * is allowed so `*` and `posts.*` can be selected.
 */
export function quoteIdentifier(name: string): string {
  const parts = name.split('.');
  return parts
    .map((part, i) => {
      if (part === '*' && i === parts.length - 1) return part;
      if (!IDENTIFIER_PART.test(part)) {
        throw new Error(`quoteIdentifier: unsafe identifier "${name}"`);
      }
      return `"${part}"`;
    })
    .join('.');
}

function createContext(model: ModelDescriptor, spec: QuerySpec, paramOffset: number): CompileContext {
  const joined = spec.joins.length > 0;
  return {
    params: [],
    counter: { n: paramOffset },
    qualify: (field) =>
      joined && !field.includes('.')
        ? quoteIdentifier(`${model.table}.${field}`)
        : quoteIdentifier(field),
  };
}

function bind(value: unknown, ctx: CompileContext): string {
  ctx.params.push(value);
  ctx.counter.n += 1;
  return `$${ctx.counter.n}`;
}

function compileCondition(condition: Condition, ctx: CompileContext): string {
  const column = ctx.qualify(condition.field);

  if (condition.operator === 'in') {
    const refs = condition.operands.map((operand) => bind(operand, ctx));
    return `${column} IN (${refs.join(', ')})`;
  }

  const operand = condition.operands[0] ?? null;
  if (operand === null && condition.operator === 'eq') return `${column} IS NULL`;
  if (operand === null && condition.operator === 'ne') return `${column} IS NOT NULL`;

  return `${column} ${COMPARISON_SQL[condition.operator]} ${bind(operand, ctx)}`;
}

function compileFilterNode(node: FilterNode, ctx: CompileContext): string {
  if (node.kind === 'condition') {
    return compileCondition(node, ctx);
  }
  const parts = node.filters.map((f) => compileFilterNode(f, ctx));
  return `(${parts.join(node.kind === 'and' ? ' AND ' : ' OR ')})`;
}

function compileJoin(model: ModelDescriptor, name: string): string {
  const relation = model.relations[name];
  if (relation === undefined) {
    throw new UnknownRelationError(model.name, name);
  }
  const related = quoteIdentifier(relation.table);
  if (relation.kind === 'belongsTo') {
    const ownerKey = quoteIdentifier(`${relation.table}.${relation.ownerKey ?? 'id'}`);
    const foreignKey = quoteIdentifier(`${model.table}.${relation.foreignKey}`);
    return `INNER JOIN ${related} ON ${ownerKey} = ${foreignKey}`;
  }
  const foreignKey = quoteIdentifier(`${relation.table}.${relation.foreignKey}`);
  const localKey = quoteIdentifier(`${model.table}.${relation.localKey ?? model.primaryKey}`);
  return `INNER JOIN ${related} ON ${foreignKey} = ${localKey}`;
}

/**
 * FROM, JOIN and WHERE lines shared by every query shape.
 */
function compileSource(model: ModelDescriptor, spec: QuerySpec, ctx: CompileContext): string[] {
  const lines = [`FROM ${quoteIdentifier(model.table)}`];
  for (const name of spec.joins) {
    lines.push(compileJoin(model, name));
  }
  if (spec.conditions.length > 0) {
    const parts = spec.conditions.map((node) => compileFilterNode(node, ctx));
    lines.push(`WHERE ${parts.join(' AND ')}`);
  }
  return lines;
}

interface TailOptions {
  order: boolean;
  lock: boolean;
}

/** Nulls sort low in both directions, matching InMemoryExecutor. */
function compileTail(spec: QuerySpec, ctx: CompileContext, options: TailOptions): string[] {
  const lines: string[] = [];
  if (spec.groupBy !== null) {
    lines.push(`GROUP BY ${ctx.qualify(spec.groupBy)}`);
  }
  if (options.order && spec.order !== null && spec.order.length > 0) {
    const terms = spec.order.map(
      (term) => `${ctx.qualify(term.field)} ${term.direction === 'asc' ? 'ASC NULLS FIRST' : 'DESC NULLS LAST'}`,
    );
    lines.push(`ORDER BY ${terms.join(', ')}`);
  }
  if (spec.limit !== null) {
    lines.push(`LIMIT ${bind(spec.limit, ctx)}`);
  }
  if (spec.offset !== null) {
    lines.push(`OFFSET ${bind(spec.offset, ctx)}`);
  }
  if (options.lock && spec.lock === true) {
    lines.push('FOR UPDATE');
  }
  return lines;
}

function selectList(model: ModelDescriptor, spec: QuerySpec, ctx: CompileContext): string {
  if (spec.select !== null && spec.select.length > 0) {
    return spec.select.map((field) => ctx.qualify(field)).join(', ');
  }
  if (spec.groupBy !== null) {
    return ctx.qualify(spec.groupBy);
  }
  return spec.joins.length > 0 ? `${quoteIdentifier(model.table)}.*` : '*';
}

function needsSubquery(spec: QuerySpec): boolean {
  return spec.limit !== null || spec.offset !== null || spec.groupBy !== null;
}

/**
 * Compiles a QuerySpec into a row-returning SELECT.
 *
 * @param paramOffset - number of parameters that precede this query in the caller's param list.
 */
export function compileSelectQuery(
  model: ModelDescriptor,
  spec: QuerySpec,
  paramOffset: number = 0,
): CompiledQuery {
  const ctx = createContext(model, spec, paramOffset);
  const columns = selectList(model, spec, ctx);
  const sql = [
    `SELECT ${columns}`,
    ...compileSource(model, spec, ctx),
    ...compileTail(spec, ctx, { order: true, lock: true }),
  ].join('\n');
  return { sql, params: ctx.params };
}

/**
 * Compiles a QuerySpec into SELECT COUNT(*). Limit, offset and grouping are
 * honoured by counting the rows of a subquery; with grouping that is the
 * number of groups.
 */
export function compileCountQuery(model: ModelDescriptor, spec: QuerySpec): CompiledQuery {
  const ctx = createContext(model, spec, 0);
  const source = compileSource(model, spec, ctx);

  if (!needsSubquery(spec)) {
    const sql = ['SELECT COUNT(*) AS count', ...source].join('\n');
    return { sql, params: ctx.params };
  }

  const inner = ['SELECT 1', ...source, ...compileTail(spec, ctx, { order: false, lock: false })];
  const sql = ['SELECT COUNT(*) AS count', `FROM (${inner.join(' ')}) AS counted`].join('\n');
  return { sql, params: ctx.params };
}

export function compileExistsQuery(model: ModelDescriptor, spec: QuerySpec): CompiledQuery {
  const ctx = createContext(model, spec, 0);
  const inner = [
    'SELECT 1',
    ...compileSource(model, spec, ctx),
    ...compileTail(spec, ctx, { order: false, lock: false }),
  ];
  return { sql: `SELECT EXISTS (${inner.join(' ')}) AS present`, params: ctx.params };
}

/**
 * Compiles SUM/AVG/MIN/MAX over one column. With a limit or offset the
 * aggregate runs over an ordered subquery so "the top N" means what the
 * order says.
 */
export function compileAggregateQuery(
  model: ModelDescriptor,
  spec: QuerySpec,
  fn: AggregateFunction,
  field: string,
): CompiledQuery {
  if (spec.groupBy !== null) {
    throw new Error('compileAggregateQuery: grouped aggregates are not supported');
  }
  const ctx = createContext(model, spec, 0);
  const column = ctx.qualify(field);
  const source = compileSource(model, spec, ctx);

  if (!needsSubquery(spec)) {
    const sql = [`SELECT ${AGGREGATE_SQL[fn]}(${column}) AS value`, ...source].join('\n');
    return { sql, params: ctx.params };
  }

  const inner = [
    `SELECT ${column} AS value`,
    ...source,
    ...compileTail(spec, ctx, { order: true, lock: false }),
  ];
  const sql = [
    `SELECT ${AGGREGATE_SQL[fn]}(aggregated.value) AS value`,
    `FROM (${inner.join(' ')}) AS aggregated`,
  ].join('\n');
  return { sql, params: ctx.params };
}

/**
 * Loads the related rows for a set of parent keys in one query.
 */
export function compileIncludeQuery(table: string, keyColumn: string, keys: unknown[]): CompiledQuery {
  const sql = [
    'SELECT *',
    `FROM ${quoteIdentifier(table)}`,
    `WHERE ${quoteIdentifier(keyColumn)} = ANY($1)`,
  ].join('\n');
  return { sql, params: [keys] };
}
