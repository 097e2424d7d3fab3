/**
 * State schema helpers for strongly-typed workflow state using Zod
 * Supports plain Zod fields and reducer-enabled fields via a registry
 */

import { z } from 'zod';
import { InvariantViolationError } from '../errors';

/**
 * Reducer configuration for a field
 */
export type ReducerConfig<T> = {
  /** Reducer function that merges previous and new values */
  fn(prevValue: T, newValue: T): T;
};

/**
 * Field configuration with optional reducer and default value
 */
export type FieldConfig<T> = {
  reducer?: ReducerConfig<T>;
  default?: () => T;
};

/**
 * Registry for field reducers and defaults
 * Stores metadata for how fields should be merged
 */
export class StateRegistry {
  private readonly fieldConfigs = new WeakMap<
    z.ZodTypeAny,
    FieldConfig<unknown>
  >();

  /**
   * Register a field configuration (reducer and/or default)
   * Returns the schema so it can be used inline in a `z.object` shape
   */
  registerField<T extends z.ZodTypeAny>(
    schema: T,
    config: FieldConfig<z.infer<T>>
  ): T {
    this.fieldConfigs.set(schema, config);
    return schema;
  }

  /**
   * Get field configuration for a schema
   */
  getConfig(schema: z.ZodTypeAny): FieldConfig<unknown> | undefined {
    return this.fieldConfigs.get(schema);
  }

  /**
   * Check if a schema has a reducer
   */
  hasReducer(schema: z.ZodTypeAny): boolean {
    return !!this.getConfig(schema)?.reducer;
  }

  /**
   * Get the default value for a schema if configured
   */
  getDefault(schema: z.ZodTypeAny): unknown {
    return this.getConfig(schema)?.default?.();
  }
}

/**
 * State schema type - a Zod object schema
 */
export type StateSchema = z.AnyZodObject;

/**
 * Infer the TypeScript type from a Zod state schema
 */
export type InferState<S extends StateSchema> = z.infer<S>;

/**
 * Partial update a node returns; merged into the state by `mergeState`
 */
export type StateUpdate<S extends StateSchema> = Partial<InferState<S>>;

/**
 * Parse a candidate state against its schema.
 * A state that fails validation breaks an engine invariant.
 */
export function parseState<S extends StateSchema>(
  schema: S,
  candidate: unknown
): InferState<S> {
  const result = schema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvariantViolationError(`State failed validation: ${issues}`);
  }
  return result.data;
}

/**
 * Create initial state from a Zod schema
 * Applies registry defaults for fields missing from `overrides`, then lets
 * Zod fill its own `.default()` values and validate the result
 */
export function createInitialState<S extends StateSchema>(
  schema: S,
  registry: StateRegistry | undefined,
  overrides: StateUpdate<S> = {}
): InferState<S> {
  const initialState: Record<string, unknown> = { ...overrides };
  const shape: z.ZodRawShape = schema.shape;

  if (registry) {
    for (const [key, fieldSchema] of Object.entries(shape)) {
      if (initialState[key] !== undefined) continue;
      const defaultValue = registry.getDefault(fieldSchema);
      if (defaultValue !== undefined) {
        initialState[key] = defaultValue;
      }
    }
  }

  return parseState(schema, initialState);
}

/**
 * Merge state updates using the schema's registry reducers
 * If a field has a reducer, apply it; otherwise replace the value.
 * `undefined` entries in `updates` leave the field untouched.
 */
export function mergeState<S extends StateSchema>(
  schema: S,
  registry: StateRegistry | undefined,
  currentState: InferState<S>,
  updates: StateUpdate<S>
): InferState<S> {
  const mergedState: Record<string, unknown> = { ...currentState };
  const shape: z.ZodRawShape = schema.shape;

  for (const [key, newValue] of Object.entries(updates)) {
    if (newValue === undefined) continue;

    const fieldSchema = shape[key];
    const config = fieldSchema ? registry?.getConfig(fieldSchema) : undefined;

    if (config?.reducer) {
      let prevValue = mergedState[key];
      if (prevValue === undefined && config.default) {
        prevValue = config.default();
      }
      mergedState[key] = config.reducer.fn(prevValue, newValue);
    } else {
      mergedState[key] = newValue;
    }
  }

  return parseState(schema, mergedState);
}
