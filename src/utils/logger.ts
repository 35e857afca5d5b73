export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogContext = Record<string, unknown>;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_WEIGHT;

const serializeError = (error: unknown) => {
    if (error instanceof Error) {
        return { name: error.name, message: error.message, stack: error.stack };
    }
    return { message: String(error) };
};

/**
 * Structured JSON logger.
 * One line per entry; errors go to stderr, everything else to stdout.
 */
export class Logger {
    private level: LogLevel;

    constructor(level: string = process.env.LOG_LEVEL || 'info') {
        this.level = isLogLevel(level) ? level : 'info';
    }

    setLevel(level: LogLevel) {
        this.level = level;
    }

    debug(message: string, context: LogContext = {}) {
        this.write('debug', message, context);
    }

    info(message: string, context: LogContext = {}) {
        this.write('info', message, context);
    }

    warn(message: string, context: LogContext = {}, error?: unknown) {
        this.write('warn', message, context, error);
    }

    error(message: string, context: LogContext = {}, error?: unknown) {
        this.write('error', message, context, error);
    }

    private write(level: LogLevel, message: string, context: LogContext, error?: unknown) {
        if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level]) {
            return;
        }

        const entry = {
            timestamp: new Date().toISOString(),
            level,
            message,
            ...context,
            ...(error !== undefined && { error: serializeError(error) }),
        };

        const line = JSON.stringify(entry);
        if (level === 'error') {
            console.error(line);
        } else {
            console.log(line);
        }
    }
}

export const logger = new Logger();
