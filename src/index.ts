// Graph engine
export * from './graph';

// Logging
export { consoleLogger, noopLogger, createFilteredLogger, withLogContext, LOG_LEVELS } from './lib/logger';
export type { Logger, LogLevel } from './lib/logger';

// Tracing
export {
    NoopTracer,
    ConsoleTracer,
    DEFAULT_TRACER_CONFIG,
    redactAttributes,
    setGlobalTracer,
    getGlobalTracer,
} from './lib/tracer';
export type { Span, SpanAttributes, Tracer, TracerConfig } from './lib/tracer';

// Error types
export {
    GraphError,
    GraphConstructionError,
    GraphNotConfiguredError,
    MaxIterationsExceededError,
    InvalidRouteError,
    CheckpointFormatError,
} from './lib/errors';
export type { ValidationErrorItem } from './lib/errors';
