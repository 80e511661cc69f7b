export { Model, defineModel } from './scopes/model.js';
export type { ModelConfig } from './scopes/model.js';
export { ScopeChain } from './scopes/chain.js';
export type { Invocation } from './scopes/chain.js';
export type {
  Arity,
  EvaluationMode,
  ScopeArgument,
  ScopeBody,
  ScopeContext,
  ScopeDefinition,
  ScopeOptions,
} from './scopes/types.js';
export { where, anyOf, allOf, createCondition, conditionsFromHash } from './query/condition.js';
export type { FieldValue } from './query/condition.js';
export { asc, desc, emptySpec, mergeSpec } from './query/spec.js';
export type {
  Value,
  Operator,
  Condition,
  FilterNode,
  OrderTerm,
  SortDirection,
  PartialSpec,
  QuerySpec,
} from './query/types.js';
export type {
  Row,
  RelationDefinition,
  ModelDescriptor,
  QueryRequest,
  AggregateFunction,
  Executor,
} from './types.js';
export { PostgresExecutor } from './store/postgres-executor.js';
export type { PostgresExecutorConfig } from './store/postgres-executor.js';
export { InMemoryExecutor } from './store/memory-executor.js';
export type { InMemoryExecutorConfig } from './store/memory-executor.js';
export {
  InvalidOperandCountError,
  DuplicateScopeNameError,
  UnknownScopeError,
  ArityMismatchError,
  UnknownFieldError,
  UnknownRelationError,
  RecordNotFoundError,
  ExecutorError,
} from './errors.js';
