import pg from 'pg';
import type { AggregateFunction, Executor, QueryRequest, Row } from '../types.js';
import { ExecutorError } from '../errors.js';
import {
  compileAggregateQuery,
  compileCountQuery,
  compileExistsQuery,
  compileIncludeQuery,
  compileSelectQuery,
  type CompiledQuery,
} from './compiler.js';
import { attachIncludes } from './eager-load.js';
import { freezeRows, mapAggregate, mapCount, type AggregateRow, type CountRow, type ExistsRow } from './row-mapper.js';

export interface PostgresExecutorConfig {
  pool: pg.Pool;
  /** Sees every statement before it is sent. */
  onQuery?: (sql: string, params: unknown[]) => void;
  onError?: (error: unknown, sql: string) => void;
}

/**
 * Executor backed by node-postgres. Compiles each resolved QuerySpec to
 * parameterised SQL and runs it on the pool; driver failures surface as
 * ExecutorError with the driver error as `cause`.
 */
export class PostgresExecutor implements Executor {
  private readonly pool: pg.Pool;
  private readonly onQuery: ((sql: string, params: unknown[]) => void) | undefined;
  private readonly onError: (error: unknown, sql: string) => void;

  constructor(config: PostgresExecutorConfig) {
    this.pool = config.pool;
    this.onQuery = config.onQuery;
    this.onError = config.onError ?? ((err, sql) => {
      console.error(`[query-scopes] query failed: ${sql.split('\n')[0] ?? sql}`, err);
    });
  }

  async all(request: QueryRequest): Promise<Row[]> {
    const rows = await this.run<Row>(compileSelectQuery(request.model, request.spec));
    await attachIncludes(request.model, rows, request.spec.includes, (table, keyColumn, keys) =>
      this.run<Row>(compileIncludeQuery(table, keyColumn, keys)),
    );
    return freezeRows(rows, request.spec.readOnly, request.spec.includes);
  }

  async first(request: QueryRequest): Promise<Row | null> {
    const rows = await this.all(request);
    return rows[0] ?? null;
  }

  async count(request: QueryRequest): Promise<number> {
    const rows = await this.run<CountRow>(compileCountQuery(request.model, request.spec));
    return mapCount(rows[0]);
  }

  async exists(request: QueryRequest): Promise<boolean> {
    const rows = await this.run<ExistsRow>(compileExistsQuery(request.model, request.spec));
    return rows[0]?.present === true;
  }

  async aggregate(request: QueryRequest, fn: AggregateFunction, field: string): Promise<number | null> {
    const compiled = compileAggregateQuery(request.model, request.spec, fn, field);
    const rows = await this.run<AggregateRow>(compiled);
    return mapAggregate(rows[0]);
  }

  private async run<R extends pg.QueryResultRow>({ sql, params }: CompiledQuery): Promise<R[]> {
    this.onQuery?.(sql, params);
    let result: pg.QueryResult<R>;
    try {
      result = await this.pool.query<R>(sql, params);
    } catch (err) {
      this.onError(err, sql);
      throw new ExecutorError(`Failed to execute query: ${String(err)}`, err);
    }
    return result.rows;
  }
}
