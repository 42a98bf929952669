import type { z } from 'zod';
import { StateUpdateError } from './errors';

export type StateRecord = Record<string, unknown>;

/** How a field combines an incoming value with the one already on the thread. */
export type FieldPolicy = 'append' | 'overwrite';

/**
 * One policy per field. The mapped type makes a field without a declared
 * policy a compile error.
 */
export type MergePolicy<S> = { readonly [K in keyof S]-?: FieldPolicy };

/**
 * Partial update produced by a stage (or by the caller as input).
 *
 *  - missing / `undefined` key: field left untouched
 *  - `null`: field removed (overwrite fields only)
 *  - value: appended or written according to the field's policy
 */
export type StateUpdate<S> = { [K in keyof S]?: S[K] | null };

export interface StateDefinition<S extends StateRecord> {
  schema: z.ZodType<S, z.ZodTypeDef, unknown>;
  policy: MergePolicy<S>;
  /** State of a thread that has never been checkpointed */
  initial: () => S;
}

/**
 * Merge `update` into `state` according to the definition's policy and
 * validate the result. Never mutates its inputs.
 *
 * @throws StateUpdateError on an undeclared field, a non-array value for an
 *   append field, an attempt to clear an append field, or a merged state the
 *   schema rejects.
 */
export function mergeState<S extends StateRecord>(definition: StateDefinition<S>, state: S, update: StateUpdate<S>): S {
  const next: StateRecord = { ...state };

  for (const key in update) {
    const value = update[key];
    if (value === undefined) continue;

    const policy: FieldPolicy | undefined = definition.policy[key];

    if (policy === 'append') {
      if (!Array.isArray(value)) {
        throw new StateUpdateError(`Field [${key}] is append-only and takes an array, received ${value === null ? 'null' : typeof value}`);
      }
      const prior = next[key];
      next[key] = Array.isArray(prior) ? [...prior, ...value] : [...value];
    } else if (policy === 'overwrite') {
      if (value === null) {
        delete next[key];
      } else {
        next[key] = value;
      }
    } else {
      throw new StateUpdateError(`Field [${key}] has no declared merge policy`);
    }
  }

  return validateState(definition, next);
}

/** Apply several updates in order; each intermediate state is validated. */
export function mergeAll<S extends StateRecord>(definition: StateDefinition<S>, state: S, updates: ReadonlyArray<StateUpdate<S> | undefined>): S {
  return updates.reduce<S>((acc, update) => (update ? mergeState(definition, acc, update) : acc), state);
}

export function validateState<S extends StateRecord>(definition: StateDefinition<S>, candidate: unknown): S {
  const result = definition.schema.safeParse(candidate);
  if (!result.success) {
    throw new StateUpdateError(`State failed validation: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`).join('; ');
}
