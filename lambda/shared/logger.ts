/**
 * @format
 * Logger: structured console logger for Lambda handlers
 *
 * Emits one JSON line per entry so CloudWatch Logs Insights can filter
 * on `level`, `service` and any extra fields. The Lambda runtime ships
 * every console line to the function's log group.
 *
 * The level is determined by:
 *   1. LOG_LEVEL env var (explicit override)
 *   2. Fallback: info
 */

// =============================================================================
// Log Levels
// =============================================================================

export enum LogLevel {
    ERROR = 0,
    WARN = 1,
    INFO = 2,
    DEBUG = 3,
}

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
    error: LogLevel.ERROR,
    warn: LogLevel.WARN,
    info: LogLevel.INFO,
    debug: LogLevel.DEBUG,
};

function resolveLogLevel(): LogLevel {
    const explicit = process.env.LOG_LEVEL?.toLowerCase();
    if (explicit && explicit in LOG_LEVEL_MAP) {
        return LOG_LEVEL_MAP[explicit];
    }
    return LogLevel.INFO;
}

export type LogFields = Record<string, unknown>;

/**
 * Convert thrown values into something JSON.stringify keeps
 * (Error own properties are non-enumerable).
 */
function serialiseError(error: unknown): LogFields {
    if (error instanceof Error) {
        return { name: error.name, message: error.message, stack: error.stack };
    }
    return { message: String(error) };
}

// =============================================================================
// Logger
// =============================================================================

export class Logger {
    private readonly level: LogLevel;

    constructor(
        private readonly service: string,
        private readonly context: LogFields = {},
        level?: LogLevel,
    ) {
        this.level = level ?? resolveLogLevel();
    }

    /** Child logger that stamps every entry with extra fields */
    child(fields: LogFields): Logger {
        return new Logger(this.service, { ...this.context, ...fields }, this.level);
    }

    error(message: string, fields: LogFields = {}): void {
        this.write(LogLevel.ERROR, 'ERROR', message, fields);
    }

    warn(message: string, fields: LogFields = {}): void {
        this.write(LogLevel.WARN, 'WARN', message, fields);
    }

    info(message: string, fields: LogFields = {}): void {
        this.write(LogLevel.INFO, 'INFO', message, fields);
    }

    debug(message: string, fields: LogFields = {}): void {
        this.write(LogLevel.DEBUG, 'DEBUG', message, fields);
    }

    private write(level: LogLevel, label: string, message: string, fields: LogFields): void {
        if (level > this.level) return;

        const { error, ...rest } = fields;
        const entry = JSON.stringify({
            timestamp: new Date().toISOString(),
            level: label,
            service: this.service,
            message,
            ...this.context,
            ...rest,
            ...(error !== undefined && { error: serialiseError(error) }),
        });

        if (level === LogLevel.ERROR) {
            console.error(entry);
        } else if (level === LogLevel.WARN) {
            console.warn(entry);
        } else {
            console.log(entry);
        }
    }
}

export function createLogger(service: string, context: LogFields = {}): Logger {
    return new Logger(service, context);
}
