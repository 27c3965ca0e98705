/**
 * StateGraph - builder for state-machine workflows.
 *
 * Nodes and edges are validated as they are registered; `compile()` freezes a
 * snapshot into a {@link CompiledGraph}, the only form that executes.
 *
 * @example
 * ```typescript
 * interface Counter { value: number }
 *
 * const app = new StateGraph<Counter>()
 *     .addNode('inc', (s) => ({ value: s.value + 1 }))
 *     .addConditionalEdge('inc', (s) => (s.value < 5 ? 'inc' : END))
 *     .setEntryPoint('inc')
 *     .compile();
 *
 * const { finalState, path } = await app.invoke({ value: 0 });
 * ```
 */

import { GraphConstructionError, GraphNotConfiguredError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { createFilteredLogger, noopLogger } from '../lib/logger';
import { getGlobalTracer } from '../lib/tracer';
import type { Tracer } from '../lib/tracer';
import { CompiledGraph } from './compiled-graph';
import { renderMermaid } from './diagram';
import { conditionalEdge, directEdge, parallelEdge, routerEdge, staticTargets } from './edges';
import type { RouteTable } from './edges';
import { formatValidationErrors, StateGraphOptionsSchema, toValidationErrors } from './schema';
import { END, START } from './types';
import type {
    ExecutionResult,
    GraphEdge,
    GraphNode,
    InvokeOptions,
    MergeFunction,
    NodeContext,
    NodeFunction,
    RouterFunction,
    StateGraphOptions,
} from './types';

export class StateGraph<S> {
    readonly name: string;
    readonly maxIterations: number;

    private readonly nodes = new Map<string, GraphNode<S>>();
    private readonly edges = new Map<string, GraphEdge<S>>();
    private entryPoint: string | null = null;
    private readonly logger: Logger;
    private readonly tracer: Tracer | undefined;

    constructor(options: StateGraphOptions = {}) {
        const parsed = StateGraphOptionsSchema.safeParse({
            name: options.name,
            maxIterations: options.maxIterations,
            logLevel: options.logLevel,
        });
        if (!parsed.success) {
            throw new GraphConstructionError(
                `Invalid graph options: ${formatValidationErrors(toValidationErrors(parsed.error))}`,
            );
        }

        this.name = parsed.data.name;
        this.maxIterations = parsed.data.maxIterations;
        this.logger = createFilteredLogger(options.logger ?? noopLogger, parsed.data.logLevel);
        this.tracer = options.tracer;
    }

    /**
     * Register a node. Sync and async functions are both accepted.
     *
     * @throws GraphConstructionError on an empty, reserved or duplicate name
     */
    addNode(name: string, fn: NodeFunction<S>, description?: string): this {
        if (!name) {
            throw new GraphConstructionError('Node name must be a non-empty string');
        }
        if (name === END || name === START) {
            throw new GraphConstructionError(`Node name "${name}" is reserved`, name);
        }
        if (this.nodes.has(name)) {
            throw new GraphConstructionError(`Node "${name}" already exists`, name);
        }

        this.nodes.set(name, Object.freeze({
            name,
            description,
            execute: async (state: S, context: NodeContext) => fn(state, context),
        }));

        return this;
    }

    /**
     * Add a direct edge. `to` may be END.
     */
    addEdge(from: string, to: string): this {
        return this.register(directEdge(from, to));
    }

    /**
     * Add a conditional edge. The router must return a registered node or END;
     * that is checked every time it runs.
     */
    addConditionalEdge(from: string, router: RouterFunction<S>, description?: string): this {
        return this.register(conditionalEdge(from, router, description));
    }

    /**
     * Add a router with named routes. Predicates run in declaration order and
     * the first match wins; with no match `defaultRoute` is taken.
     * Route names are node names (or END).
     */
    addConditionalRouter(from: string, routes: RouteTable<S>, defaultRoute: string = END): this {
        return this.register(routerEdge(from, routes, defaultRoute));
    }

    /**
     * Add a fan-out edge. Every target runs one step from the same state;
     * `merger` combines the results (default: the last target's result) and
     * traversal continues at `join` (default: END).
     */
    addParallelEdge(
        from: string,
        targets: readonly string[],
        merger?: MergeFunction<S>,
        join: string = END,
    ): this {
        if (targets.length === 0) {
            throw new GraphConstructionError(`Parallel edge from "${from}" needs at least one target`, from);
        }
        if (new Set(targets).size !== targets.length) {
            throw new GraphConstructionError(`Parallel edge from "${from}" lists a target twice`, from);
        }
        for (const target of targets) {
            this.validateNode(target);
        }
        return this.register(parallelEdge(from, targets, merger, join));
    }

    /**
     * Set the first node to execute.
     */
    setEntryPoint(name: string): this {
        this.validateNode(name);
        this.entryPoint = name;
        return this;
    }

    /**
     * Freeze the current topology into an executable graph.
     *
     * @throws GraphNotConfiguredError when no entry point is set
     */
    compile(): CompiledGraph<S> {
        if (this.entryPoint === null) {
            throw new GraphNotConfiguredError();
        }

        this.logger.debug('Compiling graph', {
            graph: this.name,
            nodes: this.nodes.size,
            edges: this.edges.size,
            entryPoint: this.entryPoint,
        });

        return new CompiledGraph<S>({
            name: this.name,
            nodes: this.nodes,
            edges: this.edges,
            entryPoint: this.entryPoint,
            maxIterations: this.maxIterations,
            logger: this.logger,
            tracer: this.tracer ?? getGlobalTracer(),
        });
    }

    /**
     * Compile and run in one call.
     */
    async invoke(initialState: S, options?: InvokeOptions): Promise<ExecutionResult<S>> {
        return this.compile().invoke(initialState, options);
    }

    toDiagram(): string {
        return renderMermaid({
            entryPoint: this.entryPoint,
            nodes: this.nodes.values(),
            edges: this.edges.values(),
        });
    }

    toString(): string {
        return `${this.name}(nodes: ${this.nodes.size}, edges: ${this.edges.size}, entry: ${this.entryPoint ?? 'none'})`;
    }

    private register(edge: GraphEdge<S>): this {
        this.validateNode(edge.from);
        if (this.edges.has(edge.from)) {
            throw new GraphConstructionError(`Node "${edge.from}" already has an outgoing edge`, edge.from);
        }
        for (const target of staticTargets(edge)) {
            this.validateNode(target, true);
        }

        this.edges.set(edge.from, edge);
        return this;
    }

    private validateNode(name: string, allowEnd = false): void {
        if (name === END && allowEnd) return;
        if (!this.nodes.has(name)) {
            throw new GraphConstructionError(`Node "${name}" does not exist`, name);
        }
    }
}
