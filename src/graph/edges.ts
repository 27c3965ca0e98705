/**
 * Edge constructors and routing helpers.
 */

import { END } from './types';
import type {
    ConditionalEdge,
    DirectEdge,
    GraphEdge,
    MergeFunction,
    ParallelEdge,
    RoutePredicate,
    RouterEdge,
    RouterFunction,
} from './types';

/** Route table accepted by `addConditionalRouter` */
export type RouteTable<S> =
    | Record<string, RoutePredicate<S>>
    | ReadonlyMap<string, RoutePredicate<S>>;

function isRouteMap<S>(routes: RouteTable<S>): routes is ReadonlyMap<string, RoutePredicate<S>> {
    return routes instanceof Map;
}

export function directEdge(from: string, to: string): DirectEdge {
    return Object.freeze({ kind: 'direct', from, to });
}

export function conditionalEdge<S>(
    from: string,
    router: RouterFunction<S>,
    description?: string,
): ConditionalEdge<S> {
    return Object.freeze({
        kind: 'conditional',
        from,
        router: async (state: S) => router(state),
        description,
    });
}

export function routerEdge<S>(
    from: string,
    routes: RouteTable<S>,
    defaultRoute: string = END,
): RouterEdge<S> {
    const entries = isRouteMap(routes)
        ? Array.from(routes.entries())
        : Object.entries(routes);

    return Object.freeze({
        kind: 'router',
        from,
        routes: Object.freeze(entries.map(([name, predicate]) => Object.freeze([name, predicate] as const))),
        defaultRoute,
    });
}

export function parallelEdge<S>(
    from: string,
    targets: readonly string[],
    merger?: MergeFunction<S>,
    join: string = END,
): ParallelEdge<S> {
    return Object.freeze({
        kind: 'parallel',
        from,
        targets: Object.freeze([...targets]),
        merger,
        join,
    });
}

/**
 * First route whose predicate holds, else the default route.
 */
export function selectRoute<S>(edge: RouterEdge<S>, state: S): string {
    for (const [name, predicate] of edge.routes) {
        if (predicate(state)) {
            return name;
        }
    }
    return edge.defaultRoute;
}

/**
 * Resolve a single-target edge against the state. Parallel edges are resolved
 * by the engine's fork-join step instead.
 */
export async function resolveNext<S>(
    edge: DirectEdge | ConditionalEdge<S> | RouterEdge<S>,
    state: S,
): Promise<string> {
    switch (edge.kind) {
        case 'direct':
            return edge.to;
        case 'conditional':
            return edge.router(state);
        case 'router':
            return selectRoute(edge, state);
    }
}

/**
 * Targets known without evaluating any state. Conditional edges have none.
 * For parallel edges the join comes last.
 */
export function staticTargets<S>(edge: GraphEdge<S>): string[] {
    switch (edge.kind) {
        case 'direct':
            return [edge.to];
        case 'conditional':
            return [];
        case 'router':
            return [...edge.routes.map(([name]) => name), edge.defaultRoute];
        case 'parallel':
            return [...edge.targets, edge.join];
    }
}

export function describeEdge<S>(edge: GraphEdge<S>): string {
    switch (edge.kind) {
        case 'direct':
            return `DirectEdge(${edge.from} -> ${edge.to})`;
        case 'conditional':
            return `ConditionalEdge(${edge.from} -> ?)${edge.description ? `: ${edge.description}` : ''}`;
        case 'router':
            return `ConditionalRouter(${edge.from} -> {${edge.routes.map(([name]) => name).join(', ')}})`;
        case 'parallel':
            return `ParallelEdge(${edge.from} -> ${edge.targets.join(', ')})`;
    }
}
