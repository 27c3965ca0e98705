import { describe, it, expect } from 'vitest';
import { MapState, StateGraph } from '../../../src/graph';

const isNumber = (value: unknown): value is number => typeof value === 'number';

describe('MapState', () => {
    it('should never change on set', () => {
        const state = new MapState({ count: 0 });
        const next = state.set('count', 1);

        expect(state.get('count')).toBe(0);
        expect(next.get('count')).toBe(1);
        expect(next).not.toBe(state);
    });

    it('should not alias the constructor input', () => {
        const source: Record<string, unknown> = { a: 1 };
        const state = new MapState(source);
        source.a = 2;

        expect(state.get('a')).toBe(1);
    });

    it('should narrow values through a guard', () => {
        const state = new MapState({ count: 3, name: 'three' });

        expect(state.get('count', isNumber)).toBe(3);
        expect(state.get('name', isNumber)).toBeUndefined();
        expect(state.get('missing', isNumber)).toBeUndefined();
    });

    it('should distinguish a missing key from an undefined value', () => {
        const state = new MapState({ present: undefined });

        expect(state.has('present')).toBe(true);
        expect(state.has('absent')).toBe(false);
    });

    it('should merge, remove and list keys', () => {
        const state = new MapState({ a: 1 })
            .setAll({ b: 2, c: 3 })
            .remove('a');

        expect(state.keys()).toEqual(['b', 'c']);
        expect(state.size).toBe(2);
        expect(state.toJSON()).toEqual({ b: 2, c: 3 });
    });

    it('should hand out copies from toJSON', () => {
        const state = new MapState({ a: 1 });
        const json = state.toJSON();
        json.a = 99;

        expect(state.get('a')).toBe(1);
    });

    it('should compare shallowly', () => {
        const shared = { nested: true };

        expect(new MapState({ a: 1, b: shared }).equals(new MapState({ b: shared, a: 1 }))).toBe(true);
        expect(new MapState({ a: 1 }).equals(new MapState({ a: 2 }))).toBe(false);
        expect(new MapState({ a: 1 }).equals(new MapState({ a: 1, b: 2 }))).toBe(false);
        expect(new MapState({ b: { nested: true } }).equals(new MapState({ b: { nested: true } }))).toBe(false);
    });

    it('should render as JSON', () => {
        expect(new MapState({ a: 1, b: 'x' }).toString()).toBe('MapState({"a":1,"b":"x"})');
    });

    it('should work as graph state', async () => {
        const app = new StateGraph<MapState>()
            .addNode('count', (s) => s.set('count', (s.get('count', isNumber) ?? 0) + 1))
            .addConditionalEdge('count', (s) => ((s.get('count', isNumber) ?? 0) < 3 ? 'count' : 'done'))
            .addNode('done', (s) => s.set('done', true))
            .setEntryPoint('count')
            .compile();

        const initial = new MapState();
        const result = await app.invoke(initial);

        expect(result.finalState.toJSON()).toEqual({ count: 3, done: true });
        expect(result.path).toEqual(['count', 'count', 'count', 'done']);
        expect(initial.size).toBe(0);
    });
});
