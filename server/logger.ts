/**
 * logger.ts - Component-scoped console logging
 *
 * Every class takes a Logger in its constructor instead of calling
 * console directly.
 *
 * Output format:
 *   [INFO] 2024-01-01T00:00:00.000Z [server:rooms] Alice joined
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
    debug(message: string, context?: Record<string, unknown>): void;
    info(message: string, context?: Record<string, unknown>): void;
    warn(message: string, context?: Record<string, unknown>): void;
    error(message: string, context?: Record<string, unknown>): void;
    child(component: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

export type LoggerOptions = {
    component: string;
    level?: LogLevel;
};

class ConsoleLogger implements Logger {
    constructor(
        private readonly component: string,
        private readonly level: LogLevel
    ) {}

    debug(message: string, context?: Record<string, unknown>): void {
        this.write('debug', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.write('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.write('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.write('error', message, context);
    }

    child(component: string): Logger {
        return new ConsoleLogger(`${this.component}:${component}`, this.level);
    }

    private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

        const line = `[${level.toUpperCase()}] ${new Date().toISOString()} [${this.component}] ${message}`;
        const args: unknown[] = context ? [line, context] : [line];

        switch (level) {
            case 'debug':
                console.debug(...args);
                break;
            case 'info':
                console.log(...args);
                break;
            case 'warn':
                console.warn(...args);
                break;
            case 'error':
                console.error(...args);
                break;
        }
    }
}

export function createLogger(options: LoggerOptions): Logger {
    return new ConsoleLogger(options.component, options.level ?? 'info');
}

/**
 * Logger that discards everything. Used by tests.
 */
export function createNoOpLogger(): Logger {
    return {
        debug: () => {},
        info: () => {},
        warn: () => {},
        error: () => {},
        child: () => createNoOpLogger()
    };
}
