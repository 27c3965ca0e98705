/**
 * CompiledGraph - the frozen, executable form of a StateGraph.
 *
 * Holds immutable copies of the node and edge tables. Each `invoke()` keeps
 * its own state, path and iteration counter, so one compiled graph can serve
 * concurrent calls.
 */

import { GraphError, InvalidRouteError, MaxIterationsExceededError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { withLogContext } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import { resolveNext } from './edges';
import { renderMermaid } from './diagram';
import { executeParallel } from './parallel-executor';
import type { ParallelBranch } from './parallel-executor';
import { formatValidationErrors, InvokeOptionsSchema, toValidationErrors } from './schema';
import { END } from './types';
import type {
    ExecutionResult,
    GraphEdge,
    GraphNode,
    GraphStepEvent,
    InvokeOptions,
    NodeContext,
    ParallelEdge,
} from './types';

/** Everything a compiled graph is made of */
export interface CompiledGraphConfig<S> {
    name: string;
    nodes: ReadonlyMap<string, GraphNode<S>>;
    edges: ReadonlyMap<string, GraphEdge<S>>;
    entryPoint: string;
    maxIterations: number;
    logger: Logger;
    tracer: Tracer;
}

export class CompiledGraph<S> {
    readonly name: string;
    readonly entryPoint: string;
    readonly maxIterations: number;

    private readonly nodes: ReadonlyMap<string, GraphNode<S>>;
    private readonly edges: ReadonlyMap<string, GraphEdge<S>>;
    private readonly logger: Logger;
    private readonly tracer: Tracer;

    constructor(config: CompiledGraphConfig<S>) {
        this.name = config.name;
        this.entryPoint = config.entryPoint;
        this.maxIterations = config.maxIterations;
        this.nodes = new Map(config.nodes);
        this.edges = new Map(config.edges);
        this.logger = withLogContext(config.logger, { graph: config.name });
        this.tracer = config.tracer;
        Object.freeze(this);
    }

    /** Registered node names in registration order */
    get nodeNames(): string[] {
        return Array.from(this.nodes.keys());
    }

    hasNode(name: string): boolean {
        return this.nodes.has(name);
    }

    getNode(name: string): GraphNode<S> | undefined {
        return this.nodes.get(name);
    }

    getEdge(from: string): GraphEdge<S> | undefined {
        return this.edges.get(from);
    }

    /**
     * Run the graph from the entry point until END, or until a node without an
     * outgoing edge has run.
     *
     * @throws MaxIterationsExceededError when the loop guard trips
     * @throws InvalidRouteError when a router names an unknown node
     * @throws Any error raised by a node, router or merger, unmodified
     */
    async invoke(initialState: S, options: InvokeOptions = {}): Promise<ExecutionResult<S>> {
        const maxIterations = this.resolveMaxIterations(options);

        return this.tracer.withSpan('graph.invoke', async (span) => {
            const steps = this.run(initialState, maxIterations);
            for (;;) {
                const step = await steps.next();
                if (step.done) {
                    span.setAttributes({
                        'graph.iterations': step.value.metadata.iterations,
                        'graph.path_length': step.value.path.length,
                    });
                    return step.value;
                }
            }
        }, {
            'graph.name': this.name,
            'graph.entry_point': this.entryPoint,
            'graph.max_iterations': maxIterations,
        });
    }

    /**
     * Same traversal as `invoke()`, yielding an event after every node and
     * after every fan-out. The generator's return value is the final result.
     * Invalid options reject the first `next()`, as `invoke()` rejects.
     */
    async *stream(initialState: S, options: InvokeOptions = {}): AsyncGenerator<GraphStepEvent<S>, ExecutionResult<S>> {
        const maxIterations = this.resolveMaxIterations(options);
        return yield* this.run(initialState, maxIterations);
    }

    toDiagram(): string {
        return renderMermaid({
            entryPoint: this.entryPoint,
            nodes: this.nodes.values(),
            edges: this.edges.values(),
        });
    }

    toString(): string {
        return `${this.name}(nodes: ${this.nodes.size}, edges: ${this.edges.size}, entry: ${this.entryPoint})`;
    }

    private resolveMaxIterations(options: InvokeOptions): number {
        const parsed = InvokeOptionsSchema.safeParse(options);
        if (!parsed.success) {
            throw new GraphError(`Invalid invoke options: ${formatValidationErrors(toValidationErrors(parsed.error))}`);
        }
        return parsed.data.maxIterations ?? this.maxIterations;
    }

    private async *run(
        initialState: S,
        maxIterations: number,
    ): AsyncGenerator<GraphStepEvent<S>, ExecutionResult<S>> {
        const startTime = Date.now();
        const path: string[] = [];
        let state = initialState;
        let currentNode = this.entryPoint;
        let iteration = 0;

        try {
            while (currentNode !== END) {
                iteration++;
                if (iteration > maxIterations) {
                    throw new MaxIterationsExceededError(maxIterations);
                }

                const node = this.requireNode(currentNode);
                state = await this.executeNode(node, state, {
                    node: node.name,
                    iteration,
                    path: Object.freeze([...path]),
                });
                path.push(node.name);
                yield { type: 'node', node: node.name, iteration, state };

                const edge = this.edges.get(node.name);
                if (!edge) {
                    break; // No outgoing edge: implicit END
                }

                if (edge.kind === 'parallel') {
                    state = await this.fanOut(edge, state, iteration, path);
                    path.push(...edge.targets);
                    yield { type: 'parallel', from: edge.from, branches: [...edge.targets], state };
                    currentNode = edge.join;
                } else {
                    currentNode = await resolveNext(edge, state);
                    if (currentNode !== END && !this.nodes.has(currentNode)) {
                        throw new InvalidRouteError(edge.from, currentNode);
                    }
                }
            }
        } catch (error) {
            this.logger.error('Graph run failed', {
                iteration,
                node: currentNode,
                error: error instanceof Error ? error.message : String(error),
            });
            throw error;
        }

        this.logger.info('Graph run completed', {
            iterations: iteration,
            pathLength: path.length,
            durationMs: Date.now() - startTime,
        });

        return {
            finalState: state,
            path,
            metadata: {
                iterations: iteration,
                entryPoint: this.entryPoint,
            },
        };
    }

    private requireNode(name: string): GraphNode<S> {
        const node = this.nodes.get(name);
        if (!node) {
            throw new GraphError(`Node not found: ${name}`);
        }
        return node;
    }

    private executeNode(node: GraphNode<S>, state: S, context: NodeContext): Promise<S> {
        this.logger.debug('Executing node', { node: node.name, iteration: context.iteration });
        return this.tracer.withSpan(
            'graph.node',
            () => node.execute(state, context),
            { 'graph.node': node.name, 'graph.iteration': context.iteration },
        );
    }

    private async fanOut(
        edge: ParallelEdge<S>,
        state: S,
        iteration: number,
        path: readonly string[],
    ): Promise<S> {
        const before = Object.freeze([...path]);
        const branches: ParallelBranch<S>[] = edge.targets.map(target => {
            const node = this.requireNode(target);
            return {
                name: target,
                execute: (branchState, signal) => this.executeNode(node, branchState, {
                    node: target,
                    iteration,
                    path: before,
                    signal,
                }),
            };
        });

        this.logger.debug('Fanning out', { from: edge.from, branches: edge.targets.length });
        const result = await executeParallel(state, branches, edge.merger);
        return result.state;
    }
}
