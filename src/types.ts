import type { QuerySpec } from './query/types.js';

export type Row = Record<string, unknown>;

export type RelationDefinition =
  | { kind: 'hasMany'; table: string; foreignKey: string; localKey?: string }
  | { kind: 'hasOne';  table: string; foreignKey: string; localKey?: string }
  | { kind: 'belongsTo'; table: string; foreignKey: string; ownerKey?: string };

/** What an executor needs to know about the model a spec was resolved for. */
export interface ModelDescriptor {
  readonly name: string;
  readonly table: string;
  readonly primaryKey: string;
  readonly relations: Readonly<Record<string, RelationDefinition>>;
}

export interface QueryRequest {
  model: ModelDescriptor;
  spec: QuerySpec;
}

export type AggregateFunction = 'sum' | 'avg' | 'min' | 'max';

/**
 * Data-access collaborator. Each method is the result-shape hint for the
 * resolved spec; errors it raises reach the caller unchanged.
 */
export interface Executor {
  all(request: QueryRequest): Promise<Row[]>;
  first(request: QueryRequest): Promise<Row | null>;
  count(request: QueryRequest): Promise<number>;
  exists(request: QueryRequest): Promise<boolean>;
  aggregate(request: QueryRequest, fn: AggregateFunction, field: string): Promise<number | null>;
}
