/**
 * Logger interface for trimming observability.
 * Users can provide their own logger (e.g., pino, winston, console).
 */
export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
}

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
    debug: (msg, meta) => console.debug(`[ContextBudget:DEBUG] ${msg}`, meta ?? ''),
    info: (msg, meta) => console.info(`[ContextBudget:INFO] ${msg}`, meta ?? ''),
    warn: (msg, meta) => console.warn(`[ContextBudget:WARN] ${msg}`, meta ?? ''),
    error: (msg, meta) => console.error(`[ContextBudget:ERROR] ${msg}`, meta ?? ''),
};

/**
 * Log levels for filtering
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

type LogMethod = Exclude<LogLevel, 'silent'>;

/**
 * Creates a filtered logger that only logs messages at or above the specified level
 */
export function createFilteredLogger(baseLogger: Logger, level: LogLevel): Logger {
    const minPriority = LOG_LEVEL_PRIORITY[level];
    const gate = (method: LogMethod) => (msg: string, meta?: Record<string, unknown>) => {
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
