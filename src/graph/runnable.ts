/**
 * Runnable adapter - lets a compiled graph take part in generic pipelines.
 */

import { GraphError } from '../lib/errors';
import type { CompiledGraph } from './compiled-graph';
import type { ExecutionResult, InvokeOptions, MaybePromise, NodeFunction } from './types';

/**
 * A composable execution unit.
 */
export interface Runnable<I, O> {
    /** Single input, single output */
    invoke(input: I): Promise<O>;
    /** Single input, stream of outputs */
    stream(input: I): AsyncIterable<O>;
    /** Stream of inputs, single output */
    collect(input: AsyncIterable<I>): Promise<O>;
    /** Stream of inputs, stream of outputs */
    transform(input: AsyncIterable<I>): AsyncIterable<O>;
    /** One invoke per input, one after another */
    batch(inputs: readonly I[]): Promise<O[]>;
    /** One invoke per input, all at once; output order follows input order */
    batchParallel(inputs: readonly I[]): Promise<O[]>;
    /** Feed this runnable's output into `next` */
    pipe<O2>(next: Runnable<O, O2>): Runnable<I, O2>;
}

/**
 * Shared behaviour: streaming yields the single invoke result; `collect`
 * invokes on the first input; `transform` and batches are built from `invoke`.
 */
export abstract class BaseRunnable<I, O> implements Runnable<I, O> {
    abstract invoke(input: I): Promise<O>;

    async *stream(input: I): AsyncGenerator<O> {
        yield await this.invoke(input);
    }

    /**
     * @throws GraphError when the input stream ends before yielding anything
     */
    async collect(input: AsyncIterable<I>): Promise<O> {
        for await (const item of input) {
            return this.invoke(item);
        }
        throw new GraphError('collect() received an empty input stream');
    }

    async *transform(input: AsyncIterable<I>): AsyncGenerator<O> {
        for await (const item of input) {
            yield await this.invoke(item);
        }
    }

    async batch(inputs: readonly I[]): Promise<O[]> {
        const results: O[] = [];
        for (const input of inputs) {
            results.push(await this.invoke(input));
        }
        return results;
    }

    batchParallel(inputs: readonly I[]): Promise<O[]> {
        return Promise.all(inputs.map(input => this.invoke(input)));
    }

    pipe<O2>(next: Runnable<O, O2>): Runnable<I, O2> {
        return new PipeRunnable(this, next);
    }
}

/**
 * `first` then `second`.
 */
export class PipeRunnable<I, M, O> extends BaseRunnable<I, O> {
    constructor(
        private readonly first: Runnable<I, M>,
        private readonly second: Runnable<M, O>,
    ) {
        super();
    }

    async invoke(input: I): Promise<O> {
        const intermediate = await this.first.invoke(input);
        return this.second.invoke(intermediate);
    }

    async *stream(input: I): AsyncGenerator<O> {
        yield* this.second.transform(this.first.stream(input));
    }

    async collect(input: AsyncIterable<I>): Promise<O> {
        const intermediate = await this.first.collect(input);
        return this.second.invoke(intermediate);
    }

    async *transform(input: AsyncIterable<I>): AsyncGenerator<O> {
        yield* this.second.transform(this.first.transform(input));
    }
}

/**
 * Runnable wrapper around a plain function.
 */
export class LambdaRunnable<I, O> extends BaseRunnable<I, O> {
    constructor(private readonly fn: (input: I) => MaybePromise<O>) {
        super();
    }

    async invoke(input: I): Promise<O> {
        return this.fn(input);
    }
}

/**
 * Runnable wrapper around a compiled graph. Streaming emits exactly one
 * {@link ExecutionResult}.
 */
export class GraphRunnable<S> extends BaseRunnable<S, ExecutionResult<S>> {
    constructor(
        readonly graph: CompiledGraph<S>,
        private readonly options: InvokeOptions = {},
    ) {
        super();
    }

    invoke(input: S): Promise<ExecutionResult<S>> {
        return this.graph.invoke(input, this.options);
    }
}

export function toRunnable<S>(graph: CompiledGraph<S>, options?: InvokeOptions): GraphRunnable<S> {
    return new GraphRunnable(graph, options);
}

export function lambda<I, O>(fn: (input: I) => MaybePromise<O>): LambdaRunnable<I, O> {
    return new LambdaRunnable(fn);
}

/**
 * Use a runnable as a graph node: read its input from the state, write its
 * output back into a new state.
 *
 * @example
 * ```typescript
 * graph.addNode('measure', runnableAsNode(lambda((s: string) => s.length), {
 *     getInput: (state: Doc) => state.text,
 *     setOutput: (state, length) => ({ ...state, length }),
 * }));
 * ```
 */
export function runnableAsNode<S, I, O>(
    runnable: Runnable<I, O>,
    mapping: {
        getInput: (state: S) => I;
        setOutput: (state: S, output: O) => S;
    },
): NodeFunction<S> {
    return async (state) => {
        const output = await runnable.invoke(mapping.getInput(state));
        return mapping.setOutput(state, output);
    };
}
