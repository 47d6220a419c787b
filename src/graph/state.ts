/**
 * State contract: how updates fold into state, how state is duplicated,
 * and how checkpointed state is validated on the way back in.
 */

import type { ZodType } from 'zod';

/** Merge an incoming update into the current state (reducer pattern) */
export type StateMerge<S> = (current: S, update: Partial<S>) => S;

export interface StateSchema<S> {
    merge: StateMerge<S>;
    /** Used for fan-out inputs and checkpoint isolation (default: structuredClone) */
    clone?: (state: S) => S;
    /** Validates state restored from a checkpoint */
    schema?: ZodType<S>;
}

/** Resolved schema, every hook present */
export interface ResolvedStateSchema<S> {
    merge: StateMerge<S>;
    clone: (state: S) => S;
    validate: (state: S) => S;
}

/** Shallow last-writer-wins merge */
export function shallowMerge<S extends object>(current: S, update: Partial<S>): S {
    return { ...current, ...update };
}

export function resolveStateSchema<S extends object>(schema: Partial<StateSchema<S>> = {}): ResolvedStateSchema<S> {
    const zodSchema = schema.schema;
    return {
        merge: schema.merge ?? shallowMerge,
        clone: schema.clone ?? (state => structuredClone(state)),
        validate: zodSchema ? state => zodSchema.parse(state) : state => state,
    };
}

// ============================================================================
// Per-field reducers
// ============================================================================

/** Combine a field's current value with an incoming one */
export type FieldReducer<T> = (current: T, incoming: T) => T;

export type FieldReducers<S> = { [K in keyof S]?: FieldReducer<S[K]> };

/**
 * Build a merge from per-field reducers. Fields without a reducer are replaced.
 *
 * @example
 * ```typescript
 * const merge = reducers<ResearchState>({
 *     notes: appendReducer(),
 *     visits: sumReducer,
 * });
 * ```
 */
export function reducers<S extends object>(fields: FieldReducers<S>): StateMerge<S> {
    return (current, update) => {
        const next = { ...current };
        for (const key in update) {
            if (!Object.prototype.hasOwnProperty.call(update, key)) continue;
            const incoming: S[typeof key] | undefined = update[key];
            if (incoming === undefined) continue;
            const reducer = fields[key];
            next[key] = reducer ? reducer(current[key], incoming) : incoming;
        }
        return next;
    };
}

/** Concatenate arrays; a missing current value counts as empty */
export function appendReducer<T>(): FieldReducer<T[]> {
    return (current, incoming) => [...(current ?? []), ...incoming];
}

export const sumReducer: FieldReducer<number> = (current, incoming) => (current ?? 0) + incoming;

export function replaceReducer<T>(): FieldReducer<T> {
    return (_current, incoming) => incoming;
}

/** Set union that keeps first-seen order */
export function unionReducer<T>(): FieldReducer<T[]> {
    return (current, incoming) => Array.from(new Set([...(current ?? []), ...incoming]));
}
