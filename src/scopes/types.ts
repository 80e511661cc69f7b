import type { Condition, PartialSpec, QuerySpec, Value } from '../query/types.js';
import type { FieldValue } from '../query/condition.js';
import type { Executor, ModelDescriptor } from '../types.js';

export type Arity = 'zero' | 'variadic' | { readonly fixed: number };

/**
 * Documentation marker only. Every body is invoked afresh on each
 * resolution, whatever its evaluation mode.
 */
export type EvaluationMode = 'eager' | 'lazy';

export type ScopeArgument = Value | readonly Value[];

export interface ScopeContext {
  /** Clock reading taken once when the chain is resolved. */
  readonly now: Date;
}

export type ScopeBody = (args: readonly ScopeArgument[], context: ScopeContext) => PartialSpec;

export interface ScopeDefinition {
  readonly name: string;
  readonly arity: Arity;
  readonly evaluation: EvaluationMode;
  readonly body: ScopeBody;
  readonly description?: string;
}

export interface ScopeOptions {
  arity?: Arity;
  evaluation?: EvaluationMode;
  body: ScopeBody;
  description?: string;
}

/**
 * The parts of a model a ScopeChain reads. Kept separate from the Model class
 * so chains and models do not import each other.
 */
export interface ScopeHost {
  readonly descriptor: ModelDescriptor;
  readonly executor: Executor | null;
  getScope(name: string): ScopeDefinition | undefined;
  hasRelation(name: string): boolean;
  conditionFor(field: string, value: FieldValue): Condition;
  now(): Date;
  notifyResolved(spec: QuerySpec): void;
}
