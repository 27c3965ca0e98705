/**
 * Mermaid flowchart rendering of a graph topology.
 * Read-only: nothing here is called during execution.
 */

import { END, START } from './types';
import type { GraphEdge, GraphNode } from './types';

/** What the renderer reads */
export interface DiagramSource<S> {
    entryPoint: string | null;
    nodes: Iterable<GraphNode<S>>;
    edges: Iterable<GraphEdge<S>>;
}

const START_ID = START;
const END_ID = END;

/** Mermaid ids only allow word characters */
export function diagramId(name: string): string {
    if (name === END) return END_ID;
    return name.replace(/[^A-Za-z0-9_]/g, '_');
}

function label(text: string): string {
    return `"${text.replace(/"/g, '#quot;')}"`;
}

/**
 * Hands out Mermaid ids. Names that sanitize to an id already in use get a
 * numeric suffix, so distinct nodes never share a box.
 */
class IdAllocator {
    private readonly taken = new Set<string>([START_ID, END_ID]);
    private readonly byName = new Map<string, string>();

    allocate(base: string): string {
        let id = base;
        for (let n = 2; this.taken.has(id); n++) {
            id = `${base}_${n}`;
        }
        this.taken.add(id);
        return id;
    }

    register(name: string): string {
        const id = this.allocate(diagramId(name));
        this.byName.set(name, id);
        return id;
    }

    idOf(name: string): string {
        return this.byName.get(name) ?? diagramId(name);
    }
}

function edgeLines<S>(edge: GraphEdge<S>, ids: IdAllocator): string[] {
    const from = ids.idOf(edge.from);

    switch (edge.kind) {
        case 'direct':
            return [`${from} --> ${ids.idOf(edge.to)}`];
        case 'conditional': {
            const decision = ids.allocate(`${from}__route`);
            return [`${from} --> ${decision}{${label(edge.description ?? '?')}}`];
        }
        case 'router': {
            const decision = ids.allocate(`${from}__route`);
            return [
                `${from} --> ${decision}{${label('route')}}`,
                ...edge.routes.map(([name]) => `${decision} --> ${ids.idOf(name)}`),
                `${decision} -->|default| ${ids.idOf(edge.defaultRoute)}`,
            ];
        }
        case 'parallel':
            return [
                ...edge.targets.map(target => `${from} -.-> ${ids.idOf(target)}`),
                ...edge.targets.map(target => `${ids.idOf(target)} ==> ${ids.idOf(edge.join)}`),
            ];
    }
}

/**
 * Render a `graph TD` flowchart: entry marker, one line per node, the edge
 * lines, then the terminal marker.
 */
export function renderMermaid<S>(source: DiagramSource<S>): string {
    const ids = new IdAllocator();
    const nodeLines: string[] = [];

    for (const node of source.nodes) {
        const text = node.description ? `${node.name}<br/>${node.description}` : node.name;
        nodeLines.push(`${ids.register(node.name)}[${label(text)}]`);
    }

    const lines: string[] = ['graph TD', `${START_ID}((start))`];
    if (source.entryPoint !== null) {
        lines.push(`${START_ID} --> ${ids.idOf(source.entryPoint)}`);
    }
    lines.push(...nodeLines);

    for (const edge of source.edges) {
        lines.push(...edgeLines(edge, ids));
    }

    lines.push(`${END_ID}((end))`);

    return lines
        .map((line, index) => (index === 0 ? line : `    ${line}`))
        .join('\n');
}
