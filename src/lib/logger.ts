/**
 * Logger contract used by the engine.
 * Callers can plug in their own logger (pino, winston, console).
 */
export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Default logger (silent)
 */
export const noopLogger: Logger = {
    debug: () => { },
    info: () => { },
    warn: () => { },
    error: () => { },
};

/**
 * Console logger for development/debugging
 */
export const consoleLogger: Logger = {
    debug: (msg, meta) => console.debug(`[graphloom:DEBUG] ${msg}`, meta ?? ''),
    info: (msg, meta) => console.info(`[graphloom:INFO] ${msg}`, meta ?? ''),
    warn: (msg, meta) => console.warn(`[graphloom:WARN] ${msg}`, meta ?? ''),
    error: (msg, meta) => console.error(`[graphloom:ERROR] ${msg}`, meta ?? ''),
};

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

type LogMethod = Exclude<LogLevel, 'silent'>;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

/**
 * Creates a logger that only forwards messages at or above `level`.
 */
export function createFilteredLogger(baseLogger: Logger, level: LogLevel): Logger {
    const minPriority = LOG_LEVEL_PRIORITY[level];
    const gate = (method: LogMethod) =>
        (msg: string, meta?: Record<string, unknown>) => {
            if (LOG_LEVEL_PRIORITY[method] >= minPriority) {
                baseLogger[method](msg, meta);
            }
        };

    return {
        debug: gate('debug'),
        info: gate('info'),
        warn: gate('warn'),
        error: gate('error'),
    };
}

/**
 * Bind fixed fields (graph name, run id) to every entry written through the
 * returned logger. Per-call meta wins on key collisions.
 */
export function withLogContext(baseLogger: Logger, context: Record<string, unknown>): Logger {
    const bind = (method: LogMethod) =>
        (msg: string, meta?: Record<string, unknown>) => {
            baseLogger[method](msg, { ...context, ...meta });
        };

    return {
        debug: bind('debug'),
        info: bind('info'),
        warn: bind('warn'),
        error: bind('error'),
    };
}
