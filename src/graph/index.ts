/**
 * Graph engine public exports.
 */

export { StateGraph } from './state-graph';
export { CompiledGraph } from './compiled-graph';
export type { CompiledGraphConfig } from './compiled-graph';
export { END, START } from './types';
export type {
    NodeContext,
    NodeFunction,
    RouterFunction,
    RoutePredicate,
    MergeFunction,
    MaybePromise,
    GraphNode,
    GraphEdge,
    DirectEdge,
    ConditionalEdge,
    RouterEdge,
    ParallelEdge,
    EdgeKind,
    ExecutionResult,
    ExecutionMetadata,
    GraphStepEvent,
    InvokeOptions,
    StateGraphOptions,
} from './types';

// Edges
export {
    directEdge,
    conditionalEdge,
    routerEdge,
    parallelEdge,
    selectRoute,
    resolveNext,
    staticTargets,
    describeEdge,
} from './edges';
export type { RouteTable } from './edges';

// State
export { MapState } from './state';

// Parallel execution
export { executeParallel, lastResultReducer } from './parallel-executor';
export type { ParallelBranch, ParallelResult } from './parallel-executor';

// Checkpoints
export {
    MemoryCheckpointStore,
    createCheckpoint,
    checkpointNow,
    checkpointFromContext,
    toJsonCheckpoint,
    serializeCheckpoint,
    deserializeCheckpoint,
} from './checkpointer';
export type { Checkpoint, CheckpointInit, CheckpointStore } from './checkpointer';

// Options and formats
export {
    StateGraphOptionsSchema,
    InvokeOptionsSchema,
    JsonCheckpointSchema,
    DEFAULT_MAX_ITERATIONS,
} from './schema';
export type { JsonCheckpoint, ResolvedGraphOptions } from './schema';

// Diagnostics
export { renderMermaid, diagramId } from './diagram';
export type { DiagramSource } from './diagram';

// Builder sugar
export { GraphBuilder, GraphPatterns } from './patterns';
export type { NamedNode } from './patterns';

// Runnable adapter
export {
    BaseRunnable,
    PipeRunnable,
    LambdaRunnable,
    GraphRunnable,
    toRunnable,
    lambda,
    runnableAsNode,
} from './runnable';
export type { Runnable } from './runnable';
