/**
 * Tracer abstraction for graph runs.
 * Spans wrap a whole `invoke()` and each node execution; the default tracer
 * records nothing.
 */

export type SpanAttributes = Record<string, string | number | boolean>;

/** Span interface */
export interface Span {
    /** Set a single attribute */
    setAttribute(key: string, value: string | number | boolean): void;
    /** Set multiple attributes */
    setAttributes(attributes: SpanAttributes): void;
    /** Record an error */
    recordException(error: Error): void;
    /** Add an event */
    addEvent(name: string, attributes?: SpanAttributes): void;
    /** End the span */
    end(): void;
}

/** Tracer configuration */
export interface TracerConfig {
    /** Maximum length of a serialized attribute value (default: 100) */
    maxAttributeLength?: number;
    /** Attribute keys to mask (substring match, case insensitive) */
    sensitiveKeys?: string[];
}

/** Tracer interface */
export interface Tracer {
    /** Start a new span */
    startSpan(name: string, attributes?: SpanAttributes): Span;
    /** Execute a function within a span; the span ends when `fn` settles */
    withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, attributes?: SpanAttributes): Promise<T>;
    /** Get the tracer config */
    getConfig(): TracerConfig;
}

export const DEFAULT_TRACER_CONFIG: Required<TracerConfig> = {
    maxAttributeLength: 100,
    sensitiveKeys: ['password', 'apiKey', 'token', 'secret', 'authorization'],
};

/**
 * Normalize attribute values to primitives and mask sensitive keys.
 * Objects are JSON encoded and cut to `maxAttributeLength`.
 */
export function redactAttributes(
    attributes: Record<string, unknown>,
    config: TracerConfig = DEFAULT_TRACER_CONFIG
): SpanAttributes {
    const sensitiveKeys = config.sensitiveKeys ?? DEFAULT_TRACER_CONFIG.sensitiveKeys;
    const maxLength = config.maxAttributeLength ?? DEFAULT_TRACER_CONFIG.maxAttributeLength;
    const result: SpanAttributes = {};

    for (const [key, value] of Object.entries(attributes)) {
        const lowerKey = key.toLowerCase();
        const isSensitive = sensitiveKeys.some(sk => lowerKey.includes(sk.toLowerCase()));

        if (isSensitive) {
            result[key] = '[REDACTED]';
        } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            result[key] = value;
        } else if (typeof value === 'object' && value !== null) {
            result[key] = (JSON.stringify(value) ?? '').substring(0, maxLength);
        } else {
            result[key] = String(value);
        }
    }

    return result;
}

class NoopSpan implements Span {
    setAttribute(_key: string, _value: string | number | boolean): void { }
    setAttributes(_attributes: SpanAttributes): void { }
    recordException(_error: Error): void { }
    addEvent(_name: string, _attributes?: SpanAttributes): void { }
    end(): void { }
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * No-op tracer (default when no tracing configured).
 */
export class NoopTracer implements Tracer {
    private readonly config: Required<TracerConfig>;

    constructor(config: TracerConfig = {}) {
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(_name: string, _attributes?: SpanAttributes): Span {
        return new NoopSpan();
    }

    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, attributes?: SpanAttributes): Promise<T> {
        const span = this.startSpan(name, attributes);
        try {
            return await fn(span);
        } finally {
            span.end();
        }
    }

    getConfig(): TracerConfig {
        return this.config;
    }
}

/**
 * Console tracer for development/debugging.
 * Logs span lifecycle to the console.
 */
export class ConsoleTracer implements Tracer {
    private readonly config: Required<TracerConfig>;

    constructor(config: TracerConfig = {}) {
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(name: string, attributes?: SpanAttributes): Span {
        const startTime = Date.now();
        console.log(`[TRACE] START: ${name}`, attributes ? redactAttributes(attributes, this.config) : '');

        return {
            setAttribute: (key: string, value: string | number | boolean) => {
                console.log(`[TRACE] ATTR: ${name}.${key} =`, value);
            },
            setAttributes: (attrs: SpanAttributes) => {
                console.log(`[TRACE] ATTRS: ${name}`, redactAttributes(attrs, this.config));
            },
            recordException: (error: Error) => {
                console.error(`[TRACE] ERROR: ${name}`, error.message);
            },
            addEvent: (eventName: string, eventAttrs?: SpanAttributes) => {
                console.log(`[TRACE] EVENT: ${name}.${eventName}`, eventAttrs || '');
            },
            end: () => {
                const duration = Date.now() - startTime;
                console.log(`[TRACE] END: ${name} (${duration}ms)`);
            },
        };
    }

    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, attributes?: SpanAttributes): Promise<T> {
        const span = this.startSpan(name, attributes);
        try {
            return await fn(span);
        } catch (error) {
            span.recordException(toError(error));
            throw error;
        } finally {
            span.end();
        }
    }

    getConfig(): TracerConfig {
        return this.config;
    }
}

let globalTracer: Tracer = new NoopTracer();

export function setGlobalTracer(tracer: Tracer): void {
    globalTracer = tracer;
}

export function getGlobalTracer(): Tracer {
    return globalTracer;
}
