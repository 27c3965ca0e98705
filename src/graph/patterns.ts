/**
 * Fluent builder and ready-made topologies on top of StateGraph.
 */

import { GraphConstructionError } from '../lib/errors';
import type { CompiledGraph } from './compiled-graph';
import type { RouteTable } from './edges';
import { StateGraph } from './state-graph';
import { END } from './types';
import type { MergeFunction, NodeFunction, RoutePredicate, StateGraphOptions } from './types';

/** A named node function, as taken by the pattern helpers */
export type NamedNode<S> = readonly [name: string, fn: NodeFunction<S>];

/**
 * Fluent builder with a more expressive vocabulary.
 *
 * @example
 * ```typescript
 * const app = new GraphBuilder<Doc>()
 *     .withNode('draft', draft)
 *     .withNode('review', review)
 *     .connect('draft', 'review')
 *     .routeIf({ from: 'review', condition: (d) => d.approved, then: END, otherwise: 'draft' })
 *     .startFrom('draft')
 *     .build();
 * ```
 */
export class GraphBuilder<S> {
    private readonly graph: StateGraph<S>;

    constructor(options: StateGraphOptions = {}) {
        this.graph = new StateGraph<S>(options);
    }

    withNode(name: string, fn: NodeFunction<S>, description?: string): this {
        this.graph.addNode(name, fn, description);
        return this;
    }

    connect(from: string, to: string): this {
        this.graph.addEdge(from, to);
        return this;
    }

    /** Two-way branch on a single condition */
    routeIf(route: {
        from: string;
        condition: RoutePredicate<S>;
        then: string;
        otherwise: string;
    }): this {
        this.graph.addConditionalRouter(route.from, new Map([[route.then, route.condition]]), route.otherwise);
        return this;
    }

    routeWhen(route: { from: string; routes: RouteTable<S>; defaultRoute?: string }): this {
        this.graph.addConditionalRouter(route.from, route.routes, route.defaultRoute ?? END);
        return this;
    }

    parallel(fanOut: {
        from: string;
        to: readonly string[];
        merger?: MergeFunction<S>;
        join?: string;
    }): this {
        this.graph.addParallelEdge(fanOut.from, fanOut.to, fanOut.merger, fanOut.join ?? END);
        return this;
    }

    startFrom(name: string): this {
        this.graph.setEntryPoint(name);
        return this;
    }

    /** The underlying builder, for diagrams or further edits */
    get stateGraph(): StateGraph<S> {
        return this.graph;
    }

    build(): CompiledGraph<S> {
        return this.graph.compile();
    }
}

function requireNodes<S>(pattern: string, nodes: readonly NamedNode<S>[]): void {
    if (nodes.length === 0) {
        throw new GraphConstructionError(`${pattern} pattern needs at least one node`);
    }
}

function chain<S>(graph: StateGraph<S>, nodes: readonly NamedNode<S>[]): void {
    for (const [name, fn] of nodes) {
        graph.addNode(name, fn);
    }
    for (let i = 0; i < nodes.length - 1; i++) {
        graph.addEdge(nodes[i][0], nodes[i + 1][0]);
    }
}

/**
 * Topology templates.
 */
export const GraphPatterns = {
    /**
     * A -> B -> C -> END
     */
    linear<S>(nodes: readonly NamedNode<S>[], options?: StateGraphOptions): CompiledGraph<S> {
        requireNodes('Linear', nodes);
        const graph = new StateGraph<S>(options);
        chain(graph, nodes);
        graph.addEdge(nodes[nodes.length - 1][0], END);
        return graph.setEntryPoint(nodes[0][0]).compile();
    },

    /**
     * A -> B -> C, then back to `entryNode` while `shouldContinue` holds.
     * The condition is checked after the last node, so the body runs at
     * least once.
     */
    loop<S>(config: {
        entryNode: string;
        nodes: readonly NamedNode<S>[];
        shouldContinue: RoutePredicate<S>;
        options?: StateGraphOptions;
    }): CompiledGraph<S> {
        requireNodes('Loop', config.nodes);
        const graph = new StateGraph<S>(config.options);
        chain(graph, config.nodes);
        graph.addConditionalRouter(
            config.nodes[config.nodes.length - 1][0],
            new Map([[config.entryNode, config.shouldContinue]]),
            END,
        );
        return graph.setEntryPoint(config.entryNode).compile();
    },

    /**
     * Run `tryFunction` until `isSuccess` holds, at most `maxRetries + 1` times.
     *
     * Attempts are unrolled into distinct nodes (`tryNode`, `tryNode:retry-1`,
     * ...) so the attempt count lives in the topology rather than in state;
     * `path` shows how many attempts ran. The last attempt ends the run
     * whatever its outcome.
     */
    retry<S>(config: {
        tryNode: string;
        tryFunction: NodeFunction<S>;
        isSuccess: RoutePredicate<S>;
        maxRetries?: number;
        options?: StateGraphOptions;
    }): CompiledGraph<S> {
        const maxRetries = config.maxRetries ?? 3;
        if (!Number.isInteger(maxRetries) || maxRetries < 0) {
            throw new GraphConstructionError('maxRetries must be a non-negative integer');
        }

        const attempts = Array.from({ length: maxRetries + 1 }, (_, i) =>
            i === 0 ? config.tryNode : `${config.tryNode}:retry-${i}`);

        const graph = new StateGraph<S>(config.options);
        for (const name of attempts) {
            graph.addNode(name, config.tryFunction);
        }
        attempts.forEach((name, i) => {
            const next = attempts[i + 1];
            if (next === undefined) {
                graph.addEdge(name, END);
            } else {
                graph.addConditionalRouter(name, new Map([[END, config.isSuccess]]), next);
            }
        });

        return graph.setEntryPoint(config.tryNode).compile();
    },

    /**
     * split -> (mappers in parallel) -> merge -> END
     *
     * `combine` merges the mapper results before the merge node runs
     * (default: the last mapper's result).
     */
    mapReduce<S>(config: {
        splitNode: string;
        splitFunction: NodeFunction<S>;
        mappers: readonly NamedNode<S>[];
        mergeNode: string;
        mergeFunction: NodeFunction<S>;
        combine?: MergeFunction<S>;
        options?: StateGraphOptions;
    }): CompiledGraph<S> {
        requireNodes('Map-reduce', config.mappers);
        const graph = new StateGraph<S>(config.options)
            .addNode(config.splitNode, config.splitFunction);
        for (const [name, fn] of config.mappers) {
            graph.addNode(name, fn);
        }
        graph
            .addNode(config.mergeNode, config.mergeFunction)
            .addParallelEdge(
                config.splitNode,
                config.mappers.map(([name]) => name),
                config.combine,
                config.mergeNode,
            )
            .addEdge(config.mergeNode, END);

        return graph.setEntryPoint(config.splitNode).compile();
    },
};
