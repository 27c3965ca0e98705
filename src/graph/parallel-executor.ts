/**
 * Fork-join execution for parallel edges.
 *
 * Every branch starts from the same pre-branch state. The first failure
 * rejects the whole group and aborts the shared signal; results of the other
 * branches are discarded.
 */

import type { MergeFunction } from './types';

/**
 * One branch of a fan-out.
 */
export interface ParallelBranch<S> {
    /** Branch name (the target node's name) */
    name: string;
    /** Runs the branch; `signal` aborts when a sibling fails */
    execute: (state: S, signal: AbortSignal) => Promise<S>;
}

/**
 * Result of parallel execution.
 */
export interface ParallelResult<S> {
    /** Merged state */
    state: S;
    /** Per-branch results in declaration order */
    results: S[];
}

/**
 * Default reducer: the last declared branch wins.
 */
export function lastResultReducer<S>(originalState: S, results: S[]): S {
    return results.length > 0 ? results[results.length - 1] : originalState;
}

/**
 * Execute branches concurrently with fail-fast behavior.
 *
 * @param state - Input handed to every branch
 * @param branches - Branches in declaration order
 * @param merger - Combines `(state, results)`; defaults to {@link lastResultReducer}
 *
 * @throws The first branch error, unmodified
 */
export async function executeParallel<S>(
    state: S,
    branches: readonly ParallelBranch<S>[],
    merger: MergeFunction<S> = lastResultReducer,
): Promise<ParallelResult<S>> {
    if (branches.length === 0) {
        return { state, results: [] };
    }

    const groupAbort = new AbortController();

    const results = await Promise.all(branches.map(async (branch) => {
        try {
            return await branch.execute(state, groupAbort.signal);
        } catch (error) {
            groupAbort.abort(); // Trigger fail-fast
            throw error;
        }
    }));

    return {
        state: await merger(state, results),
        results,
    };
}
