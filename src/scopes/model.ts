import { DuplicateScopeNameError, UnknownFieldError } from '../errors.js';
import { fieldCondition, type FieldValue } from '../query/condition.js';
import type { Condition, FilterNode, OrderTerm, QuerySpec, Value } from '../query/types.js';
import type { Executor, ModelDescriptor, RelationDefinition, Row } from '../types.js';
import { ScopeChain } from './chain.js';
import { defineScope } from './define.js';
import type { ScopeArgument, ScopeDefinition, ScopeHost, ScopeOptions } from './types.js';

export interface ModelConfig {
  /** Model name used in error messages, e.g. "Person". */
  name: string;
  table: string;
  /** Columns that dynamic finders (findBy / findAllBy) accept. */
  fields: readonly string[];
  primaryKey?: string;
  relations?: Record<string, RelationDefinition>;
  executor?: Executor;
  /** Source of `context.now` for scope bodies. Defaults to the wall clock. */
  clock?: () => Date;
  onResolve?: (modelName: string, spec: QuerySpec) => void;
}

interface ResolvedModelConfig {
  primaryKey: string;
  relations: Readonly<Record<string, RelationDefinition>>;
  executor: Executor | null;
  clock: () => Date;
  onResolve?: (modelName: string, spec: QuerySpec) => void;
}

type ConditionConstructor = (value: FieldValue) => Condition;

/**
 * A queryable model: known fields, relations and a write-once registry of
 * named scopes. Every finder starts a fresh ScopeChain; the model itself
 * holds no per-query state.
 */
export class Model implements ScopeHost {
  readonly descriptor: ModelDescriptor;
  private readonly resolved: ResolvedModelConfig;
  private readonly scopes: Map<string, ScopeDefinition> = new Map();
  private readonly finders: Map<string, ConditionConstructor> = new Map();

  constructor(config: ModelConfig) {
    if (!config.name || config.name.trim() === '') {
      throw new Error('Model: name must be a non-empty string');
    }
    if (!config.table || config.table.trim() === '') {
      throw new Error(`Model: "${config.name}" must have a table name`);
    }
    this.resolved = {
      primaryKey: config.primaryKey ?? 'id',
      relations: Object.freeze({ ...(config.relations ?? {}) }),
      executor: config.executor ?? null,
      clock: config.clock ?? (() => new Date()),
      ...(config.onResolve !== undefined ? { onResolve: config.onResolve } : {}),
    };
    this.descriptor = Object.freeze({
      name: config.name,
      table: config.table,
      primaryKey: this.resolved.primaryKey,
      relations: this.resolved.relations,
    });

    for (const field of new Set([this.resolved.primaryKey, ...config.fields])) {
      this.finders.set(field, (value) => fieldCondition(field, value));
    }
  }

  get name(): string {
    return this.descriptor.name;
  }

  get executor(): Executor | null {
    return this.resolved.executor;
  }

  /**
   * Register a named scope. Registration never calls the body.
   * Throws DuplicateScopeNameError when the name is taken.
   */
  register(name: string, options: ScopeOptions): ScopeDefinition {
    if (this.scopes.has(name)) {
      throw new DuplicateScopeNameError(this.descriptor.name, name);
    }
    const definition = defineScope(name, options);
    this.scopes.set(name, definition);
    return definition;
  }

  getScope(name: string): ScopeDefinition | undefined {
    return this.scopes.get(name);
  }

  hasScope(name: string): boolean {
    return this.scopes.has(name);
  }

  scopeNames(): string[] {
    return [...this.scopes.keys()];
  }

  hasRelation(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.descriptor.relations, name);
  }

  fieldNames(): string[] {
    return [...this.finders.keys()];
  }

  /** Equality condition on a declared field; UnknownFieldError otherwise. */
  conditionFor(field: string, value: FieldValue): Condition {
    const construct = this.finders.get(field);
    if (construct === undefined) {
      throw new UnknownFieldError(this.descriptor.name, field);
    }
    return construct(value);
  }

  now(): Date {
    return this.resolved.clock();
  }

  notifyResolved(spec: QuerySpec): void {
    this.resolved.onResolve?.(this.descriptor.name, spec);
  }

  /** Empty chain: the root every finder starts from. */
  scoped(): ScopeChain {
    return new ScopeChain(this);
  }

  invoke(name: string, ...args: ScopeArgument[]): ScopeChain {
    return this.scoped().invoke(name, ...args);
  }

  where(...filters: FilterNode[]): ScopeChain {
    return this.scoped().where(...filters);
  }

  match(hash: Readonly<Record<string, FieldValue>>): ScopeChain {
    return this.scoped().match(hash);
  }

  order(...terms: OrderTerm[]): ScopeChain {
    return this.scoped().order(...terms);
  }

  limit(n: number): ScopeChain {
    return this.scoped().limit(n);
  }

  offset(n: number): ScopeChain {
    return this.scoped().offset(n);
  }

  includes(...relations: string[]): ScopeChain {
    return this.scoped().includes(...relations);
  }

  joins(...relations: string[]): ScopeChain {
    return this.scoped().joins(...relations);
  }

  group(field: string): ScopeChain {
    return this.scoped().group(field);
  }

  select(...fields: string[]): ScopeChain {
    return this.scoped().select(...fields);
  }

  readOnly(flag: boolean = true): ScopeChain {
    return this.scoped().readOnly(flag);
  }

  lock(flag: boolean = true): ScopeChain {
    return this.scoped().lock(flag);
  }

  all(): Promise<Row[]> {
    return this.scoped().all();
  }

  first(): Promise<Row | null> {
    return this.scoped().first();
  }

  last(): Promise<Row | null> {
    return this.scoped().last();
  }

  count(): Promise<number> {
    return this.scoped().count();
  }

  exists(): Promise<boolean> {
    return this.scoped().exists();
  }

  sum(field: string): Promise<number | null> {
    return this.scoped().sum(field);
  }

  average(field: string): Promise<number | null> {
    return this.scoped().average(field);
  }

  minimum(field: string): Promise<number | null> {
    return this.scoped().minimum(field);
  }

  maximum(field: string): Promise<number | null> {
    return this.scoped().maximum(field);
  }

  find(id: Value): Promise<Row> {
    return this.scoped().find(id);
  }

  findBy(field: string, value: FieldValue): Promise<Row | null> {
    return this.scoped().findBy(field, value);
  }

  findAllBy(field: string, value: FieldValue): Promise<Row[]> {
    return this.scoped().findAllBy(field, value);
  }
}

export function defineModel(config: ModelConfig): Model {
  return new Model(config);
}
