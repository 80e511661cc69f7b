import { describe, it, expect, vi } from 'vitest';
import { Model, defineModel } from '../../src/scopes/model.js';
import { defineScope, expectedArgumentCount } from '../../src/scopes/define.js';
import { DuplicateScopeNameError } from '../../src/errors.js';
import type { PartialSpec } from '../../src/query/types.js';

function makeModel(): Model {
  return defineModel({ name: 'Person', table: 'people', fields: ['name'] });
}

describe('defineScope', () => {
  it('applies defaults: zero arity, eager evaluation', () => {
    const body = (): PartialSpec => ({});
    const def = defineScope('males', { body });
    expect(def).toEqual({ name: 'males', arity: 'zero', evaluation: 'eager', body });
  });

  it('keeps description only when given', () => {
    const def = defineScope('males', { body: () => ({}), description: 'Men only' });
    expect(def.description).toBe('Men only');
    expect('description' in defineScope('active', { body: () => ({}) })).toBe(false);
  });

  it('freezes the definition', () => {
    const def = defineScope('top', { arity: { fixed: 1 }, body: () => ({}) });
    expect(Object.isFrozen(def)).toBe(true);
    expect(Object.isFrozen(def.arity)).toBe(true);
  });

  it('rejects empty and malformed names', () => {
    expect(() => defineScope('', { body: () => ({}) })).toThrow('name must be a non-empty string');
    expect(() => defineScope('with space', { body: () => ({}) })).toThrow('must match');
    expect(() => defineScope('1st', { body: () => ({}) })).toThrow('must match');
  });

  it('rejects a negative or fractional fixed arity', () => {
    expect(() => defineScope('x', { arity: { fixed: -1 }, body: () => ({}) })).toThrow(
      'fixed arity must be a non-negative integer',
    );
    expect(() => defineScope('x', { arity: { fixed: 1.5 }, body: () => ({}) })).toThrow(
      'fixed arity must be a non-negative integer',
    );
  });
});

describe('expectedArgumentCount', () => {
  it('maps each arity', () => {
    expect(expectedArgumentCount('zero')).toBe(0);
    expect(expectedArgumentCount('variadic')).toBeNull();
    expect(expectedArgumentCount({ fixed: 2 })).toBe(2);
  });
});

describe('Model.register', () => {
  it('registers and looks up scopes by name', () => {
    const Person = makeModel();
    const def = Person.register('males', { body: () => ({}) });
    expect(Person.getScope('males')).toBe(def);
    expect(Person.hasScope('males')).toBe(true);
    expect(Person.hasScope('females')).toBe(false);
    expect(Person.scopeNames()).toEqual(['males']);
  });

  it('throws DuplicateScopeNameError for a second registration', () => {
    const Person = makeModel();
    Person.register('males', { body: () => ({}) });
    expect(() => Person.register('males', { body: () => ({}) })).toThrow(DuplicateScopeNameError);
  });

  it('the first definition survives a rejected duplicate', () => {
    const Person = makeModel();
    const first = Person.register('males', { body: () => ({}) });
    expect(() => Person.register('males', { arity: 'variadic', body: () => ({}) })).toThrow();
    expect(Person.getScope('males')).toBe(first);
  });

  it('same scope name on two models is fine', () => {
    const Person = makeModel();
    const Company = defineModel({ name: 'Company', table: 'companies', fields: [] });
    Person.register('active', { body: () => ({}) });
    expect(() => Company.register('active', { body: () => ({}) })).not.toThrow();
  });

  it('never calls the body at registration', () => {
    const body = vi.fn((): PartialSpec => ({ limit: 1 }));
    const Person = makeModel();
    Person.register('lazy', { evaluation: 'lazy', arity: 'variadic', body });
    Person.register('eager', { body });
    expect(body).not.toHaveBeenCalled();
  });
});

describe('Model configuration', () => {
  it('defaults the primary key to id and adds it to the finder fields', () => {
    const Person = makeModel();
    expect(Person.descriptor.primaryKey).toBe('id');
    expect(Person.fieldNames()).toEqual(['id', 'name']);
  });

  it('honours a custom primary key', () => {
    const Person = defineModel({ name: 'Person', table: 'people', fields: ['name'], primaryKey: 'uuid' });
    expect(Person.descriptor.primaryKey).toBe('uuid');
    expect(Person.fieldNames()).toEqual(['uuid', 'name']);
  });

  it('rejects a missing name or table', () => {
    expect(() => defineModel({ name: '', table: 'people', fields: [] })).toThrow('name must be a non-empty string');
    expect(() => defineModel({ name: 'Person', table: ' ', fields: [] })).toThrow('must have a table name');
  });

  it('has no executor unless one is configured', () => {
    expect(makeModel().executor).toBeNull();
  });
});
