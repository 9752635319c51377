export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'none';

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    none: LogLevel.NONE
};

function isLogLevelName(name: string): name is LogLevelName {
    return Object.prototype.hasOwnProperty.call(LEVEL_BY_NAME, name);
}

export function parseLogLevel(name: string | undefined): LogLevel | undefined {
    if (!name) return undefined;
    const key = name.toLowerCase();
    return isLogLevelName(key) ? LEVEL_BY_NAME[key] : undefined;
}

class Logger {
    private level: LogLevel = LogLevel.INFO;

    constructor() {
        // Quiet under test runs unless a test raises it explicitly
        this.level = process.env.NODE_ENV === 'test' ? LogLevel.NONE : LogLevel.INFO;
    }

    setLevel(level: LogLevel) {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    debug(message: string, ...args: unknown[]) {
        if (this.level <= LogLevel.DEBUG) {
            console.debug(`[DEBUG] ${message}`, ...args);
        }
    }

    info(message: string, ...args: unknown[]) {
        if (this.level <= LogLevel.INFO) {
            console.log(`[INFO] ${message}`, ...args);
        }
    }

    warn(message: string, ...args: unknown[]) {
        if (this.level <= LogLevel.WARN) {
            console.warn(`[WARN] ${message}`, ...args);
        }
    }

    error(message: string, ...args: unknown[]) {
        if (this.level <= LogLevel.ERROR) {
            console.error(`[ERROR] ${message}`, ...args);
        }
    }

    /**
     * Returns a logger that prefixes every message with `[component]`.
     */
    child(component: string): ComponentLogger {
        return {
            debug: (message, ...args) => this.debug(`[${component}] ${message}`, ...args),
            info: (message, ...args) => this.info(`[${component}] ${message}`, ...args),
            warn: (message, ...args) => this.warn(`[${component}] ${message}`, ...args),
            error: (message, ...args) => this.error(`[${component}] ${message}`, ...args)
        };
    }
}

export interface ComponentLogger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

export const logger = new Logger();
