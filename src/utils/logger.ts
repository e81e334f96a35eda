export enum LogLevel {
    ERROR = 0,
    WARN = 1,
    INFO = 2,
    DEBUG = 3,
}

interface LogMessage {
    level: LogLevel;
    message: string;
    data?: unknown;
    timestamp: Date;
}

/**
 * Resolve a level name such as "debug" or "WARN" to a LogLevel
 */
export function parseLogLevel(name: string): LogLevel | null {
    switch (name.trim().toUpperCase()) {
        case 'ERROR': return LogLevel.ERROR;
        case 'WARN':
        case 'WARNING': return LogLevel.WARN;
        case 'INFO': return LogLevel.INFO;
        case 'DEBUG': return LogLevel.DEBUG;
        default: return null;
    }
}

class Logger {
    private static instance: Logger;
    private logLevel: LogLevel = LogLevel.INFO;
    private isProductionBuild: boolean;

    private constructor() {
        this.isProductionBuild = process.env.NODE_ENV === 'production';

        const envLevel = process.env.RECIPE_SEARCH_LOG_LEVEL;
        const parsed = envLevel ? parseLogLevel(envLevel) : null;
        if (parsed !== null) {
            this.logLevel = parsed;
        }
    }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public setLogLevel(level: LogLevel): void {
        this.logLevel = level;
    }

    public getLogLevel(): LogLevel {
        return this.logLevel;
    }

    public error(message: string, data?: unknown): void {
        this.log(LogLevel.ERROR, message, data);
    }

    public warn(message: string, data?: unknown): void {
        this.log(LogLevel.WARN, message, data);
    }

    public info(message: string, data?: unknown): void {
        this.log(LogLevel.INFO, message, data);
    }

    public debug(message: string, data?: unknown): void {
        this.log(LogLevel.DEBUG, message, data);
    }

    private log(level: LogLevel, message: string, data?: unknown): void {
        // In production, only log errors and warnings
        if (this.isProductionBuild && level > LogLevel.WARN) {
            return;
        }

        if (level > this.logLevel) {
            return;
        }

        this.output({
            level,
            message,
            data,
            timestamp: new Date(),
        });
    }

    private output(logMessage: LogMessage): void {
        const prefix = `[recipe-search] [${LogLevel[logMessage.level]}] ${logMessage.timestamp.toISOString()}`;
        const fullMessage = `${prefix} ${logMessage.message}`;
        const hasData = logMessage.data !== undefined;

        switch (logMessage.level) {
            case LogLevel.ERROR:
                if (hasData) {
                    console.error(fullMessage, logMessage.data);
                } else {
                    console.error(fullMessage);
                }
                break;
            case LogLevel.WARN:
                if (hasData) {
                    console.warn(fullMessage, logMessage.data);
                } else {
                    console.warn(fullMessage);
                }
                break;
            case LogLevel.INFO:
            case LogLevel.DEBUG:
                if (hasData) {
                    console.log(fullMessage, logMessage.data);
                } else {
                    console.log(fullMessage);
                }
                break;
        }
    }
}

// Export singleton instance
export const logger = Logger.getInstance();
