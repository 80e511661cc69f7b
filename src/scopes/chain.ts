import { RecordNotFoundError, UnknownRelationError, UnknownScopeError } from '../errors.js';
import { conditionsFromHash, type FieldValue } from '../query/condition.js';
import { emptySpec, mergeSpec, reverseOrder, withDefaultLimit } from '../query/spec.js';
import type { FilterNode, OrderTerm, PartialSpec, QuerySpec, Value } from '../query/types.js';
import type { AggregateFunction, Executor, QueryRequest, Row } from '../types.js';
import { checkArity } from './define.js';
import type { ScopeArgument, ScopeContext, ScopeDefinition, ScopeHost } from './types.js';

export type Invocation =
  | { readonly kind: 'scope'; readonly definition: ScopeDefinition; readonly args: readonly ScopeArgument[] }
  | { readonly kind: 'inline'; readonly partial: PartialSpec };

function checkCount(method: string, n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`ScopeChain.${method}: expected a non-negative integer, got ${n}`);
  }
}

/**
 * Immutable sequence of scope invocations bound to one model. Every chaining
 * call returns a new ScopeChain, so a base chain can root any number of
 * independent extensions. Nothing is evaluated until resolve() or a terminal
 * operation runs.
 */
export class ScopeChain {
  constructor(
    private readonly _host: ScopeHost,
    readonly invocations: readonly Invocation[] = [],
  ) {}

  /** Append a named scope with its bound arguments. */
  invoke(name: string, ...args: ScopeArgument[]): ScopeChain {
    const definition = this._host.getScope(name);
    if (definition === undefined) {
      throw new UnknownScopeError(this._host.descriptor.name, name);
    }
    checkArity(this._host.descriptor.name, definition, args.length);
    return this._append({ kind: 'scope', definition, args: Object.freeze([...args]) });
  }

  where(...filters: FilterNode[]): ScopeChain {
    return this._append({ kind: 'inline', partial: { conditions: filters } });
  }

  /** Hash conditions: one equality (or `in`) condition per key. */
  match(hash: Readonly<Record<string, FieldValue>>): ScopeChain {
    return this.where(...conditionsFromHash(hash));
  }

  order(...terms: OrderTerm[]): ScopeChain {
    return this._append({ kind: 'inline', partial: { order: terms } });
  }

  limit(n: number): ScopeChain {
    checkCount('limit', n);
    return this._append({ kind: 'inline', partial: { limit: n } });
  }

  offset(n: number): ScopeChain {
    checkCount('offset', n);
    return this._append({ kind: 'inline', partial: { offset: n } });
  }

  includes(...relations: string[]): ScopeChain {
    this._checkRelations(relations);
    return this._append({ kind: 'inline', partial: { includes: relations } });
  }

  joins(...relations: string[]): ScopeChain {
    this._checkRelations(relations);
    return this._append({ kind: 'inline', partial: { joins: relations } });
  }

  group(field: string): ScopeChain {
    return this._append({ kind: 'inline', partial: { groupBy: field } });
  }

  select(...fields: string[]): ScopeChain {
    return this._append({ kind: 'inline', partial: { select: fields } });
  }

  readOnly(flag: boolean = true): ScopeChain {
    return this._append({ kind: 'inline', partial: { readOnly: flag } });
  }

  lock(flag: boolean = true): ScopeChain {
    return this._append({ kind: 'inline', partial: { lock: flag } });
  }

  /**
   * Folds every invocation, in chain order, into one QuerySpec. Scope bodies
   * run now, against the clock reading taken here; errors they throw
   * propagate unchanged. A limit or offset returned by a body is checked
   * like the inline one.
   */
  resolve(): QuerySpec {
    const now = this._host.now().getTime();
    let spec = emptySpec();
    for (const invocation of this.invocations) {
      const partial =
        invocation.kind === 'scope'
          ? invocation.definition.body(invocation.args, this._context(now))
          : invocation.partial;
      if (partial.limit !== undefined) checkCount('limit', partial.limit);
      if (partial.offset !== undefined) checkCount('offset', partial.offset);
      spec = mergeSpec(spec, partial);
    }
    this._host.notifyResolved(spec);
    return spec;
  }

  // ---------------------------------------------------------------------------
  // Terminal operations
  // ---------------------------------------------------------------------------

  async all(): Promise<Row[]> {
    const executor = this._executor();
    return executor.all(this._request(this.resolve()));
  }

  /** First matching row; limit 1 unless the chain already set a limit. */
  async first(): Promise<Row | null> {
    const executor = this._executor();
    return executor.first(this._request(withDefaultLimit(this.resolve(), 1)));
  }

  /** Last matching row under the reversed order (primary key when unordered). */
  async last(): Promise<Row | null> {
    const executor = this._executor();
    const spec = reverseOrder(this.resolve(), this._host.descriptor.primaryKey);
    return executor.first(this._request(withDefaultLimit(spec, 1)));
  }

  async count(): Promise<number> {
    const executor = this._executor();
    return executor.count(this._request(this.resolve()));
  }

  async exists(): Promise<boolean> {
    const executor = this._executor();
    return executor.exists(this._request(this.resolve()));
  }

  sum(field: string): Promise<number | null> {
    return this._aggregate('sum', field);
  }

  average(field: string): Promise<number | null> {
    return this._aggregate('avg', field);
  }

  minimum(field: string): Promise<number | null> {
    return this._aggregate('min', field);
  }

  maximum(field: string): Promise<number | null> {
    return this._aggregate('max', field);
  }

  /** Row with the given primary key; throws RecordNotFoundError when absent. */
  async find(id: Value): Promise<Row> {
    const { name, primaryKey } = this._host.descriptor;
    const row = await this.where(this._host.conditionFor(primaryKey, id)).first();
    if (row === null) {
      throw new RecordNotFoundError(name, id);
    }
    return row;
  }

  findBy(field: string, value: FieldValue): Promise<Row | null> {
    return this.where(this._host.conditionFor(field, value)).first();
  }

  findAllBy(field: string, value: FieldValue): Promise<Row[]> {
    return this.where(this._host.conditionFor(field, value)).all();
  }

  // ---------------------------------------------------------------------------

  private _append(invocation: Invocation): ScopeChain {
    return new ScopeChain(this._host, [...this.invocations, invocation]);
  }

  private _checkRelations(relations: readonly string[]): void {
    for (const relation of relations) {
      if (!this._host.hasRelation(relation)) {
        throw new UnknownRelationError(this._host.descriptor.name, relation);
      }
    }
  }

  /** A fresh Date per body. */
  private _context(now: number): ScopeContext {
    return { now: new Date(now) };
  }

  private _executor(): Executor {
    const executor = this._host.executor;
    if (executor === null) {
      throw new Error(`Model "${this._host.descriptor.name}" has no executor configured`);
    }
    return executor;
  }

  private _request(spec: QuerySpec): QueryRequest {
    return { model: this._host.descriptor, spec };
  }

  private async _aggregate(fn: AggregateFunction, field: string): Promise<number | null> {
    const executor = this._executor();
    return executor.aggregate(this._request(this.resolve()), fn, field);
  }
}
