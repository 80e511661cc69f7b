import { Model, type ModelConfig } from '../../src/scopes/model.js';
import { where } from '../../src/query/condition.js';
import { desc } from '../../src/query/spec.js';
import type { Row } from '../../src/types.js';

export const TWO_WEEKS_MS = 14 * 24 * 60 * 60 * 1000;

export const NOW = new Date('2024-06-15T00:00:00.000Z');

/**
 * Person model with the scopes used across the suite:
 * males, active (eager, zero-arity), recent (lazy, variadic),
 * olderThan (fixed 1), top (fixed 1, limit), newest (order), withPosts (includes).
 */
export function definePeople(overrides: Partial<ModelConfig> = {}): Model {
  const Person = new Model({
    name: 'Person',
    table: 'people',
    fields: ['name', 'gender', 'active', 'age', 'created_at', 'company_id'],
    relations: {
      posts: { kind: 'hasMany', table: 'posts', foreignKey: 'person_id' },
      company: { kind: 'belongsTo', table: 'companies', foreignKey: 'company_id' },
    },
    clock: () => NOW,
    ...overrides,
  });

  Person.register('males', {
    body: () => ({ conditions: [where('gender').eq('male')] }),
  });
  Person.register('active', {
    body: () => ({ conditions: [where('active').eq(true)] }),
  });
  Person.register('recent', {
    arity: 'variadic',
    evaluation: 'lazy',
    body: (args, { now }) => {
      const first = args[0];
      const since = first instanceof Date ? first : new Date(now.getTime() - TWO_WEEKS_MS);
      return { conditions: [where('created_at').gt(since)] };
    },
  });
  Person.register('olderThan', {
    arity: { fixed: 1 },
    body: ([age]) => {
      if (typeof age !== 'number') {
        throw new TypeError(`olderThan: expected a number, got ${String(age)}`);
      }
      return { conditions: [where('age').gt(age)] };
    },
  });
  Person.register('top', {
    arity: { fixed: 1 },
    body: ([n]) => ({ limit: typeof n === 'number' ? n : 10 }),
  });
  Person.register('newest', {
    body: () => ({ order: [desc('created_at')] }),
  });
  Person.register('withPosts', {
    body: () => ({ includes: ['posts'] }),
  });

  return Person;
}

export function peopleRows(): Row[] {
  return [
    { id: 1, name: 'Ada', gender: 'female', active: true, age: 36, created_at: new Date('2024-06-10T00:00:00.000Z'), company_id: 1 },
    { id: 2, name: 'Alan', gender: 'male', active: true, age: 41, created_at: new Date('2024-05-01T00:00:00.000Z'), company_id: 1 },
    { id: 3, name: 'Grace', gender: 'female', active: false, age: 85, created_at: new Date('2024-06-12T00:00:00.000Z'), company_id: 2 },
    { id: 4, name: 'Linus', gender: 'male', active: false, age: 28, created_at: new Date('2024-06-14T00:00:00.000Z'), company_id: null },
    { id: 5, name: 'Ken', gender: 'male', active: true, age: null, created_at: new Date('2024-06-13T00:00:00.000Z'), company_id: 2 },
  ];
}

export function postRows(): Row[] {
  return [
    { id: 10, person_id: 1, title: 'Notes' },
    { id: 11, person_id: 1, title: 'Engines' },
    { id: 12, person_id: 4, title: 'Kernels' },
  ];
}

export function companyRows(): Row[] {
  return [
    { id: 1, name: 'Analytical' },
    { id: 2, name: 'Bell' },
  ];
}
