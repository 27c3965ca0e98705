/**
 * Immutable key/value state for quick prototyping.
 *
 * Typed workflows usually define their own state type and produce updated
 * copies with object spread; `MapState` covers the untyped case and is the
 * state the JSON checkpoint format understands.
 *
 * @example
 * ```typescript
 * const state = new MapState({ count: 0 });
 * const next = state.set('count', 1);
 * state.get('count'); // 0
 * next.get('count');  // 1
 * ```
 */
export class MapState {
    private readonly data: Readonly<Record<string, unknown>>;

    constructor(data: Record<string, unknown> = {}) {
        this.data = Object.freeze({ ...data });
    }

    /**
     * Read a value. With a type guard the value is narrowed, and a value that
     * fails the guard reads as undefined.
     */
    get(key: string): unknown;
    get<T>(key: string, guard: (value: unknown) => value is T): T | undefined;
    get<T>(key: string, guard?: (value: unknown) => value is T): unknown {
        const value = this.data[key];
        if (guard && !guard(value)) {
            return undefined;
        }
        return value;
    }

    has(key: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.data, key);
    }

    set(key: string, value: unknown): MapState {
        return new MapState({ ...this.data, [key]: value });
    }

    setAll(updates: Record<string, unknown>): MapState {
        return new MapState({ ...this.data, ...updates });
    }

    remove(key: string): MapState {
        const next: Record<string, unknown> = { ...this.data };
        delete next[key];
        return new MapState(next);
    }

    get size(): number {
        return Object.keys(this.data).length;
    }

    keys(): string[] {
        return Object.keys(this.data);
    }

    /** Shallow copy of the underlying record */
    toJSON(): Record<string, unknown> {
        return { ...this.data };
    }

    /** Shallow equality: same keys, `Object.is` on every value */
    equals(other: MapState): boolean {
        const keys = this.keys();
        if (keys.length !== other.size) return false;
        return keys.every(key => other.has(key) && Object.is(this.data[key], other.get(key)));
    }

    toString(): string {
        return `MapState(${JSON.stringify(this.data)})`;
    }
}
