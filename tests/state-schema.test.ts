/**
 * State schema helpers
 * Registry defaults, reducer merges and validation at every merge
 */

import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';
import { InvariantViolationError } from '../src/errors';
import {
  StateRegistry,
  createInitialState,
  mergeState,
  parseState,
} from '../src/schema/state-schema';

const registry = new StateRegistry();

const messages = registry.registerField(z.array(z.string()), {
  reducer: { fn: (prev, next) => [...prev, ...next] },
  default: () => [],
});

const State = z.object({
  name: z.string().default(''),
  age: z.number().int().min(0).optional(),
  messages,
  answers: registry.registerField(z.record(z.string()), {
    reducer: { fn: (prev, next) => ({ ...prev, ...next }) },
    default: () => ({}),
  }),
});

describe('StateRegistry', () => {
  it('should report reducers and defaults per field schema', () => {
    expect(registry.hasReducer(messages)).toBe(true);
    expect(registry.getDefault(messages)).toEqual([]);
    expect(registry.hasReducer(z.string())).toBe(false);
    expect(registry.getDefault(z.string())).toBeUndefined();
  });
});

describe('createInitialState', () => {
  it('should apply registry and Zod defaults', () => {
    expect(createInitialState(State, registry)).toEqual({
      name: '',
      messages: [],
      answers: {},
    });
  });

  it('should keep overrides', () => {
    const state = createInitialState(State, registry, { name: 'Alice', messages: ['hi'] });

    expect(state.name).toBe('Alice');
    expect(state.messages).toEqual(['hi']);
  });

  it('should reject overrides that break the schema', () => {
    expect(() => createInitialState(State, registry, { age: -1 })).toThrow(
      InvariantViolationError
    );
  });
});

describe('mergeState', () => {
  const initial = createInitialState(State, registry, { messages: ['one'] });

  it('should run reducers and replace plain fields', () => {
    const merged = mergeState(State, registry, initial, {
      name: 'Bob',
      messages: ['two'],
      answers: { 'Who?': 'gym members' },
    });
    const again = mergeState(State, registry, merged, {
      answers: { 'When?': 'Friday' },
    });

    expect(again).toEqual({
      name: 'Bob',
      messages: ['one', 'two'],
      answers: { 'Who?': 'gym members', 'When?': 'Friday' },
    });
  });

  it('should skip undefined values', () => {
    const merged = mergeState(State, registry, { ...initial, name: 'Carol' }, { name: undefined });
    expect(merged.name).toBe('Carol');
  });

  it('should leave the current state untouched', () => {
    mergeState(State, registry, initial, { messages: ['two'] });
    expect(initial.messages).toEqual(['one']);
  });

  it('should throw with the failing paths', () => {
    expect(() => mergeState(State, registry, initial, { age: 1.5 })).toThrow(
      'State failed validation: age: Expected integer, received float'
    );
  });
});

describe('parseState', () => {
  it('should return parsed data with defaults filled', () => {
    expect(parseState(State, { messages: [], answers: {} })).toEqual({
      name: '',
      messages: [],
      answers: {},
    });
  });
});
