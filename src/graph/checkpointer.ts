/**
 * Checkpoints - caller-driven snapshots of graph progress.
 *
 * The engine never saves or resumes on its own. A node (or the caller) builds
 * a checkpoint, persists it through a {@link CheckpointStore}, and later
 * resumes by compiling a graph whose entry point is `currentNode` and invoking
 * it with the checkpoint's `state`.
 */

import { CheckpointFormatError } from '../lib/errors';
import { formatValidationErrors, JsonCheckpointSchema, toValidationErrors } from './schema';
import type { JsonCheckpoint } from './schema';
import { MapState } from './state';
import type { NodeContext } from './types';

/**
 * Immutable snapshot of a run.
 */
export interface Checkpoint<S> {
    readonly state: S;
    /** Node to resume from */
    readonly currentNode: string;
    /** Path taken so far */
    readonly path: readonly string[];
    /** Loop-guard counter when the checkpoint was taken */
    readonly iteration: number;
    readonly timestamp?: Date;
    readonly metadata: Readonly<Record<string, unknown>>;
}

/** Fields accepted by {@link createCheckpoint} */
export interface CheckpointInit<S> {
    state: S;
    currentNode: string;
    path: readonly string[];
    iteration: number;
    timestamp?: Date;
    metadata?: Record<string, unknown>;
}

/**
 * Build a frozen checkpoint. `path` and `metadata` are copied.
 */
export function createCheckpoint<S>(init: CheckpointInit<S>): Checkpoint<S> {
    return Object.freeze({
        state: init.state,
        currentNode: init.currentNode,
        path: Object.freeze([...init.path]),
        iteration: init.iteration,
        timestamp: init.timestamp,
        metadata: Object.freeze({ ...init.metadata }),
    });
}

/**
 * Build a checkpoint stamped with the current time.
 */
export function checkpointNow<S>(init: Omit<CheckpointInit<S>, 'timestamp'>): Checkpoint<S> {
    return createCheckpoint({ ...init, timestamp: new Date() });
}

/**
 * Build a checkpoint from inside a node body.
 *
 * @param resumeAt - Node to resume from (default: the executing node)
 */
export function checkpointFromContext<S>(
    state: S,
    context: NodeContext,
    options: { resumeAt?: string; metadata?: Record<string, unknown> } = {},
): Checkpoint<S> {
    return checkpointNow({
        state,
        currentNode: options.resumeAt ?? context.node,
        path: context.path,
        iteration: context.iteration,
        metadata: options.metadata,
    });
}

/**
 * Storage contract for checkpoints, keyed by caller-chosen ids.
 */
export interface CheckpointStore<S> {
    /** Save a checkpoint, replacing any previous one with the same id */
    save(id: string, checkpoint: Checkpoint<S>): Promise<void>;

    /** Load a checkpoint, or null if the id is unknown */
    load(id: string): Promise<Checkpoint<S> | null>;

    /** Delete a checkpoint; unknown ids are ignored */
    delete(id: string): Promise<void>;

    /** All stored ids */
    list(): Promise<string[]>;

    /** Remove every checkpoint */
    clear(): Promise<void>;
}

/**
 * In-memory store.
 * Suitable for testing and short-lived sessions.
 */
export class MemoryCheckpointStore<S> implements CheckpointStore<S> {
    private readonly checkpoints = new Map<string, Checkpoint<S>>();

    async save(id: string, checkpoint: Checkpoint<S>): Promise<void> {
        this.checkpoints.set(id, checkpoint);
    }

    async load(id: string): Promise<Checkpoint<S> | null> {
        return this.checkpoints.get(id) ?? null;
    }

    async delete(id: string): Promise<void> {
        this.checkpoints.delete(id);
    }

    async list(): Promise<string[]> {
        return Array.from(this.checkpoints.keys());
    }

    async clear(): Promise<void> {
        this.checkpoints.clear();
    }

    /** Number of stored checkpoints */
    get count(): number {
        return this.checkpoints.size;
    }
}

// ============================================================================
// JSON format (MapState only)
// ============================================================================

/**
 * Convert a MapState checkpoint to its JSON-safe record.
 */
export function toJsonCheckpoint(checkpoint: Checkpoint<MapState>): JsonCheckpoint {
    return {
        state: checkpoint.state.toJSON(),
        current_node: checkpoint.currentNode,
        path: [...checkpoint.path],
        iteration: checkpoint.iteration,
        ...(checkpoint.timestamp ? { timestamp: checkpoint.timestamp.toISOString() } : {}),
        metadata: { ...checkpoint.metadata },
    };
}

/**
 * Serialize a MapState checkpoint to a JSON string.
 */
export function serializeCheckpoint(checkpoint: Checkpoint<MapState>): string {
    return JSON.stringify(toJsonCheckpoint(checkpoint));
}

/**
 * Parse and validate a JSON checkpoint.
 *
 * @throws CheckpointFormatError on malformed JSON or a payload of the wrong shape
 */
export function deserializeCheckpoint(json: string): Checkpoint<MapState> {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new CheckpointFormatError(`Checkpoint is not valid JSON: ${reason}`);
    }

    const parsed = JsonCheckpointSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = toValidationErrors(parsed.error);
        throw new CheckpointFormatError(`Invalid checkpoint: ${formatValidationErrors(issues)}`, issues);
    }

    const data = parsed.data;
    return createCheckpoint({
        state: new MapState(data.state),
        currentNode: data.current_node,
        path: data.path,
        iteration: data.iteration,
        timestamp: data.timestamp ? new Date(data.timestamp) : undefined,
        metadata: data.metadata,
    });
}
