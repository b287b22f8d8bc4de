import { getCheckerConfiguration, type LogLevel } from '../configuration/settings';

/**
 * Anything with a `write(string)` method: a stream, or a collector in tests.
 */
export interface LogSink {
    write(chunk: string): unknown;
}

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    off: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4
};

/**
 * Lightweight colored logger for the update checker
 * Writes to stderr with ANSI colors
 */
class CheckerLogger implements Logger {
    private static instance: CheckerLogger;
    private sink: LogSink = process.stderr;
    private level: LogLevel;

    private constructor() {
        this.level = getCheckerConfiguration().logLevel;
    }

    public static getInstance(): CheckerLogger {
        if (!CheckerLogger.instance) {
            CheckerLogger.instance = new CheckerLogger();
        }
        return CheckerLogger.instance;
    }

    public setSink(sink: LogSink): void {
        this.sink = sink;
    }

    public setLevel(level: LogLevel): void {
        this.level = level;
    }

    public getLevel(): LogLevel {
        return this.level;
    }

    private formatMessage(level: string, message: string, color: string): string {
        const timestamp = new Date().toISOString().substring(11, 23);
        return `\u001b[${color}m[${timestamp}] [${level}]\u001b[0m ${message}`;
    }

    private emit(level: Exclude<LogLevel, 'off'>, line: string): void {
        if (LEVEL_RANK[this.level] >= LEVEL_RANK[level]) {
            this.sink.write(`${line}\n`);
        }
    }

    public info(message: string): void {
        this.emit('info', this.formatMessage('INFO ', message, '32')); // Green
    }

    public warn(message: string): void {
        this.emit('warn', this.formatMessage('WARN ', message, '33')); // Yellow
    }

    public error(message: string): void {
        this.emit('error', this.formatMessage('ERROR', message, '31')); // Red
    }

    public debug(message: string): void {
        this.emit('debug', this.formatMessage('DEBUG', message, '36')); // Cyan
    }
}

// Export singleton instance
export const logger = CheckerLogger.getInstance();
