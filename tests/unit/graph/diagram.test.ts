import { describe, it, expect } from 'vitest';
import { StateGraph, END, diagramId } from '../../../src/graph';

interface Doc {
    text: string;
    approved: boolean;
}

const same = (d: Doc): Doc => d;

describe('Mermaid diagrams', () => {
    it('should render every edge kind', () => {
        const graph = new StateGraph<Doc>()
            .addNode('draft', same, 'Write "first" pass')
            .addNode('review', same)
            .addNode('publish', same)
            .addNode('notify-a', same)
            .addNode('notify-b', same)
            .addEdge('draft', 'review')
            .addConditionalRouter('review', { publish: (d) => d.approved }, 'draft')
            .addParallelEdge('publish', ['notify-a', 'notify-b'])
            .setEntryPoint('draft');

        expect(graph.toDiagram().split('\n')).toEqual([
            'graph TD',
            '    __start__((start))',
            '    __start__ --> draft',
            '    draft["draft<br/>Write #quot;first#quot; pass"]',
            '    review["review"]',
            '    publish["publish"]',
            '    notify_a["notify-a"]',
            '    notify_b["notify-b"]',
            '    draft --> review',
            '    review --> review__route{"route"}',
            '    review__route --> publish',
            '    review__route -->|default| draft',
            '    publish -.-> notify_a',
            '    publish -.-> notify_b',
            '    notify_a ==> __end__',
            '    notify_b ==> __end__',
            '    __end__((end))',
        ]);
    });

    it('should label conditional edges with their description', () => {
        const graph = new StateGraph<Doc>()
            .addNode('A', same)
            .addNode('B', same)
            .addConditionalEdge('A', (d) => (d.approved ? END : 'B'), 'approved?')
            .addConditionalEdge('B', () => END)
            .setEntryPoint('A');

        const lines = graph.toDiagram().split('\n');

        expect(lines).toContain('    A --> A__route{"approved?"}');
        expect(lines).toContain('    B --> B__route{"?"}');
    });

    it('should omit the entry arrow when no entry point is set', () => {
        const graph = new StateGraph<Doc>().addNode('A', same);

        expect(graph.toDiagram()).toBe([
            'graph TD',
            '    __start__((start))',
            '    A["A"]',
            '    __end__((end))',
        ].join('\n'));
    });

    it('should render the same text for the builder and the compiled graph', () => {
        const graph = new StateGraph<Doc>()
            .addNode('A', same)
            .addEdge('A', END)
            .setEntryPoint('A');

        expect(graph.compile().toDiagram()).toBe(graph.toDiagram());
    });

    it('should keep ids distinct when names sanitize to the same id', () => {
        const graph = new StateGraph<Doc>()
            .addNode('a-b', same)
            .addNode('a_b', same)
            .addEdge('a-b', 'a_b')
            .setEntryPoint('a-b');

        expect(graph.toDiagram().split('\n')).toEqual([
            'graph TD',
            '    __start__((start))',
            '    __start__ --> a_b',
            '    a_b["a-b"]',
            '    a_b_2["a_b"]',
            '    a_b --> a_b_2',
            '    __end__((end))',
        ]);
    });

    it('should not let a decision diamond reuse a node id', () => {
        const graph = new StateGraph<Doc>()
            .addNode('x', same)
            .addNode('x__route', same)
            .addConditionalRouter('x', { x__route: (d) => d.approved })
            .setEntryPoint('x');

        expect(graph.toDiagram().split('\n')).toEqual([
            'graph TD',
            '    __start__((start))',
            '    __start__ --> x',
            '    x["x"]',
            '    x__route["x__route"]',
            '    x --> x__route_2{"route"}',
            '    x__route_2 --> x__route',
            '    x__route_2 -->|default| __end__',
            '    __end__((end))',
        ]);
    });

    it('should map names onto mermaid ids', () => {
        expect(diagramId('fetch data')).toBe('fetch_data');
        expect(diagramId('step:retry-1')).toBe('step_retry_1');
        expect(diagramId(END)).toBe('__end__');
    });
});
