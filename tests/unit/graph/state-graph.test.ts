import { describe, it, expect } from 'vitest';
import {
    StateGraph,
    END,
    START,
} from '../../../src/graph';
import {
    GraphConstructionError,
    GraphNotConfiguredError,
} from '../../../src/lib/errors';

interface Counter {
    value: number;
}

const inc = (s: Counter): Counter => ({ value: s.value + 1 });

describe('StateGraph builder', () => {
    describe('addNode', () => {
        it('should reject a duplicate node name and keep the first registration', async () => {
            const graph = new StateGraph<Counter>()
                .addNode('A', inc);

            expect(() => graph.addNode('A', (s) => ({ value: s.value * 100 })))
                .toThrow(GraphConstructionError);

            const result = await graph.setEntryPoint('A').invoke({ value: 1 });
            expect(result.finalState.value).toBe(2);
        });

        it('should carry the offending name on the error', () => {
            const graph = new StateGraph<Counter>().addNode('A', inc);

            let caught: unknown;
            try {
                graph.addNode('A', inc);
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(GraphConstructionError);
            expect(caught).toMatchObject({ nodeName: 'A', message: 'Node "A" already exists' });
        });

        it('should reject reserved and empty names', () => {
            const graph = new StateGraph<Counter>();

            expect(() => graph.addNode(END, inc)).toThrow(GraphConstructionError);
            expect(() => graph.addNode(START, inc)).toThrow(GraphConstructionError);
            expect(() => graph.addNode('', inc)).toThrow(GraphConstructionError);
        });

        it('should support fluent chaining', () => {
            const graph = new StateGraph<Counter>();
            expect(graph.addNode('A', inc)).toBe(graph);
        });
    });

    describe('edges', () => {
        it('should reject an edge to an unknown node', () => {
            const graph = new StateGraph<Counter>().addNode('A', inc);

            expect(() => graph.addEdge('A', 'B')).toThrow(GraphConstructionError);
        });

        it('should reject an edge from an unknown node', () => {
            const graph = new StateGraph<Counter>().addNode('A', inc);

            expect(() => graph.addEdge('B', 'A')).toThrow('Node "B" does not exist');
            expect(() => graph.addConditionalEdge('B', () => END)).toThrow(GraphConstructionError);
        });

        it('should accept END as a direct target', () => {
            const graph = new StateGraph<Counter>().addNode('A', inc);

            expect(() => graph.addEdge('A', END)).not.toThrow();
        });

        it('should reject a second edge from the same source', () => {
            const graph = new StateGraph<Counter>()
                .addNode('A', inc)
                .addNode('B', inc)
                .addEdge('A', 'B');

            expect(() => graph.addEdge('A', END)).toThrow('Node "A" already has an outgoing edge');
            expect(() => graph.addConditionalEdge('A', () => 'B')).toThrow(GraphConstructionError);
        });

        it('should validate router route names and the default route', () => {
            const graph = new StateGraph<Counter>()
                .addNode('A', inc)
                .addNode('B', inc);

            expect(() => graph.addConditionalRouter('A', { missing: () => true }))
                .toThrow('Node "missing" does not exist');
            expect(() => graph.addConditionalRouter('A', { B: () => true }, 'nowhere'))
                .toThrow(GraphConstructionError);
            expect(() => graph.addConditionalRouter('A', { B: () => true })).not.toThrow();
        });

        it('should validate parallel targets', () => {
            const graph = new StateGraph<Counter>()
                .addNode('A', inc)
                .addNode('B', inc)
                .addNode('C', inc);

            expect(() => graph.addParallelEdge('A', [])).toThrow(GraphConstructionError);
            expect(() => graph.addParallelEdge('A', ['B', 'B'])).toThrow(GraphConstructionError);
            expect(() => graph.addParallelEdge('A', ['B', END])).toThrow(GraphConstructionError);
            expect(() => graph.addParallelEdge('A', ['B', 'X'])).toThrow(GraphConstructionError);
            expect(() => graph.addParallelEdge('A', ['B', 'C'], undefined, 'X')).toThrow(GraphConstructionError);
            expect(() => graph.addParallelEdge('A', ['B', 'C'])).not.toThrow();
        });
    });

    describe('entry point', () => {
        it('should reject an unknown entry point', () => {
            const graph = new StateGraph<Counter>().addNode('A', inc);

            expect(() => graph.setEntryPoint('B')).toThrow(GraphConstructionError);
        });

        it('should reject invoke without an entry point', async () => {
            const graph = new StateGraph<Counter>().addNode('A', inc);

            await expect(graph.invoke({ value: 0 })).rejects.toThrow(GraphNotConfiguredError);
        });

        it('should reject compile without an entry point', () => {
            const graph = new StateGraph<Counter>().addNode('A', inc);

            expect(() => graph.compile()).toThrow(GraphNotConfiguredError);
        });
    });

    describe('options', () => {
        it('should default maxIterations to 100', () => {
            expect(new StateGraph<Counter>().maxIterations).toBe(100);
        });

        it('should reject non-positive or fractional maxIterations', () => {
            expect(() => new StateGraph<Counter>({ maxIterations: 0 })).toThrow(GraphConstructionError);
            expect(() => new StateGraph<Counter>({ maxIterations: -3 })).toThrow(GraphConstructionError);
            expect(() => new StateGraph<Counter>({ maxIterations: 1.5 })).toThrow(GraphConstructionError);
        });

        it('should name the invalid option in the message', () => {
            expect(() => new StateGraph<Counter>({ maxIterations: 0 }))
                .toThrow(/^Invalid graph options: maxIterations: /);
        });
    });

    describe('compile', () => {
        it('should not see changes made to the builder afterwards', async () => {
            const graph = new StateGraph<Counter>()
                .addNode('A', inc)
                .setEntryPoint('A');
            const app = graph.compile();

            graph.addNode('B', (s) => ({ value: s.value * 10 })).addEdge('A', 'B');

            const result = await app.invoke({ value: 1 });
            expect(result.finalState.value).toBe(2);
            expect(result.path).toEqual(['A']);
            expect(app.nodeNames).toEqual(['A']);
        });

        it('should expose a summary', () => {
            const graph = new StateGraph<Counter>({ name: 'Counter' })
                .addNode('A', inc)
                .addNode('B', inc)
                .addEdge('A', 'B')
                .setEntryPoint('A');

            expect(graph.toString()).toBe('Counter(nodes: 2, edges: 1, entry: A)');
            expect(graph.compile().toString()).toBe('Counter(nodes: 2, edges: 1, entry: A)');
            expect(new StateGraph<Counter>().toString()).toBe('StateGraph(nodes: 0, edges: 0, entry: none)');
        });
    });
});
