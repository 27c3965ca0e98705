/**
 * Graph engine types.
 */

import type { Logger, LogLevel } from '../lib/logger';
import type { Tracer } from '../lib/tracer';

/** Reserved name that terminates traversal */
export const END = '__end__';

/** Reserved name used as the entry marker in diagrams */
export const START = '__start__';

/** Values accepted by sync-or-async callbacks */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Execution context handed to every node call.
 * `path` is the path before this node ran.
 */
export interface NodeContext {
    /** Name of the executing node */
    readonly node: string;
    /** Loop-guard counter of the current step (1-based) */
    readonly iteration: number;
    /** Frozen copy of the path so far */
    readonly path: readonly string[];
    /** Set only for fan-out branches; aborted once a sibling branch fails */
    readonly signal?: AbortSignal;
}

/** User node function: returns a complete next state, never mutates its input */
export type NodeFunction<S> = (state: S, context: NodeContext) => MaybePromise<S>;

/** Picks the next node name (or END) from the state */
export type RouterFunction<S> = (state: S) => MaybePromise<string>;

/** Named predicate of a conditional router */
export type RoutePredicate<S> = (state: S) => boolean;

/** Merges fan-out results; `results` follows the declaration order of targets */
export type MergeFunction<S> = (originalState: S, results: S[]) => MaybePromise<S>;

/** Registered node. Functions are normalised to the async contract at registration */
export interface GraphNode<S> {
    readonly name: string;
    readonly description?: string;
    readonly execute: (state: S, context: NodeContext) => Promise<S>;
}

export interface DirectEdge {
    readonly kind: 'direct';
    readonly from: string;
    readonly to: string;
}

export interface ConditionalEdge<S> {
    readonly kind: 'conditional';
    readonly from: string;
    readonly router: (state: S) => Promise<string>;
    readonly description?: string;
}

/** Named-predicate sugar over a conditional edge */
export interface RouterEdge<S> {
    readonly kind: 'router';
    readonly from: string;
    /** Declaration order is evaluation order */
    readonly routes: ReadonlyArray<readonly [string, RoutePredicate<S>]>;
    readonly defaultRoute: string;
}

export interface ParallelEdge<S> {
    readonly kind: 'parallel';
    readonly from: string;
    readonly targets: readonly string[];
    readonly merger?: MergeFunction<S>;
    /** Where traversal continues after the join */
    readonly join: string;
}

export type GraphEdge<S> =
    | DirectEdge
    | ConditionalEdge<S>
    | RouterEdge<S>
    | ParallelEdge<S>;

export type EdgeKind = GraphEdge<unknown>['kind'];

/** Run metadata */
export interface ExecutionMetadata extends Record<string, unknown> {
    /** Steps consumed from the loop-guard budget */
    iterations: number;
    entryPoint: string;
}

/** Outcome of one `invoke()` call */
export interface ExecutionResult<S> {
    finalState: S;
    /** Executed node names in order, repeats included */
    path: string[];
    metadata: ExecutionMetadata;
}

/** Event yielded by `CompiledGraph.stream()` */
export type GraphStepEvent<S> =
    | { type: 'node'; node: string; iteration: number; state: S }
    | { type: 'parallel'; from: string; branches: string[]; state: S };

/** Invoke options */
export interface InvokeOptions {
    /** Overrides the graph's loop-guard budget for this call */
    maxIterations?: number;
}

/** Graph builder options */
export interface StateGraphOptions {
    /** Name used in logs, spans and `toString()` (default: 'StateGraph') */
    name?: string;
    /** Loop guard (default: 100) */
    maxIterations?: number;
    /** Default: silent */
    logger?: Logger;
    /** Default: 'info' */
    logLevel?: LogLevel;
    /** Default: the global tracer at compile time */
    tracer?: Tracer;
}
