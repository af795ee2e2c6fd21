/**
 * Console logger
 *
 * One line per event: `[timestamp] [LEVEL] [module] message {context}`.
 * info/debug go to stdout, warn/error to stderr. Under NODE_ENV=test only
 * errors are printed unless LOG_LEVEL says otherwise.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
}

const LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && value in LEVELS;
}

function initialLevel(): LogLevel {
    const fromEnv = process.env['LOG_LEVEL'];
    if (isLogLevel(fromEnv)) {
        return fromEnv;
    }
    return process.env['NODE_ENV'] === 'test' ? 'error' : 'info';
}

let currentLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

export function formatLine(
    level: LogLevel,
    module: string,
    message: string,
    context?: LogContext,
    now: Date = new Date()
): string {
    const contextStr = context && Object.keys(context).length > 0 ? ` ${safeStringify(context)}` : '';
    return `[${now.toISOString()}] [${level.toUpperCase().padEnd(5)}] [${module}] ${message}${contextStr}`;
}

function safeStringify(context: LogContext): string {
    try {
        return JSON.stringify(context, (_key, value: unknown) =>
            value instanceof Error ? { name: value.name, message: value.message } : value
        );
    } catch {
        return '[unserializable context]';
    }
}

function write(level: LogLevel, module: string, message: string, context?: LogContext): void {
    if (LEVELS[level] < LEVELS[currentLevel]) {
        return;
    }
    const line = formatLine(level, module, message, context);
    if (level === 'warn' || level === 'error') {
        console.error(line);
    } else {
        console.log(line);
    }
}

/**
 * Creates a logger tagged with a module name.
 */
export function createLogger(module: string): Logger {
    return {
        debug: (message, context) => write('debug', module, message, context),
        info: (message, context) => write('info', module, message, context),
        warn: (message, context) => write('warn', module, message, context),
        error: (message, context) => write('error', module, message, context),
    };
}
