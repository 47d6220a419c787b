/**
 * Logger interface for engine observability.
 * Plug in pino, winston or console; the engine is silent by default.
 */
export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
}

/** Log levels for filtering */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type LogMethod = Exclude<LogLevel, 'silent'>;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

/**
 * Default no-op logger (silent)
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
    debug: (msg, meta) => console.debug(`[graphloom:debug] ${msg}`, meta ?? ''),
    info: (msg, meta) => console.info(`[graphloom:info] ${msg}`, meta ?? ''),
    warn: (msg, meta) => console.warn(`[graphloom:warn] ${msg}`, meta ?? ''),
    error: (msg, meta) => console.error(`[graphloom:error] ${msg}`, meta ?? ''),
};

function buildLogger(write: (method: LogMethod, msg: string, meta?: Record<string, unknown>) => void): Logger {
    return {
        debug: (msg, meta) => write('debug', msg, meta),
        info: (msg, meta) => write('info', msg, meta),
        warn: (msg, meta) => write('warn', msg, meta),
        error: (msg, meta) => write('error', msg, meta),
    };
}

/**
 * Creates a filtered logger that only logs messages at or above the specified level
 */
export function createFilteredLogger(baseLogger: Logger, level: LogLevel): Logger {
    const minPriority = LOG_LEVEL_PRIORITY[level];

    return buildLogger((method, msg, meta) => {
        if (LOG_LEVEL_PRIORITY[method] >= minPriority) {
            baseLogger[method](msg, meta);
        }
    });
}

/**
 * Bind fixed fields (graph name, thread id) onto every entry.
 * Per-call meta wins over bound fields.
 */
export function withLogContext(baseLogger: Logger, context: Record<string, unknown>): Logger {
    return buildLogger((method, msg, meta) => {
        baseLogger[method](msg, { ...context, ...meta });
    });
}
