import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { LogLevel, type LoggerConfig, type LogMetadata } from '@I/logger.interfaces';

const LEVEL_NAMES: Record<string, LogLevel> = {
    error: LogLevel.ERROR,
    warn: LogLevel.WARN,
    info: LogLevel.INFO,
    debug: LogLevel.DEBUG,
    trace: LogLevel.TRACE,
};

/**
 * Maps a level name such as "debug" to its LogLevel, falling back to INFO
 */
export function parseLogLevel(name: string | undefined): LogLevel {
    if (!name) return LogLevel.INFO;
    return LEVEL_NAMES[name.trim().toLowerCase()] ?? LogLevel.INFO;
}

/**
 * Simple file-based logger for the depcompat server
 */
export class Logger {
    private config: LoggerConfig;
    private logFilePath: string;

    constructor(config: Partial<LoggerConfig> = {}) {
        this.config = {
            level: LogLevel.INFO,
            enableFileLogging: true,
            logDirectory: '../../logs',
            logFileName: `depcompat-${new Date().toISOString().replace(/[:.]/g, '-')}.log`,
            maxFileSize: 10 * 1024 * 1024, // 10MB
            maxFiles: 5,
            enableConsoleLogging: true,
            ...config,
        };

        if (!path.isAbsolute(this.config.logDirectory)) {
            const __dirname = path.dirname(fileURLToPath(import.meta.url));
            this.config.logDirectory = path.join(__dirname, this.config.logDirectory);
        }
        this.logFilePath = path.join(this.config.logDirectory, this.config.logFileName);
        this.ensureLogDirectory();
    }

    private ensureLogDirectory(): void {
        if (this.config.enableFileLogging && !fs.existsSync(this.config.logDirectory)) {
            fs.mkdirSync(this.config.logDirectory, { recursive: true });
        }
    }

    /**
     * Rotate the log file once it grows past maxFileSize
     */
    private checkAndRotateLog(): void {
        if (!fs.existsSync(this.logFilePath)) return;

        const stats = fs.statSync(this.logFilePath);
        if (stats.size <= this.config.maxFileSize) return;

        const extension = path.extname(this.config.logFileName);
        const baseName = path.basename(this.config.logFileName, extension);
        const rotated = (i: number) => path.join(this.config.logDirectory, `${baseName}.${i}${extension}`);

        const oldest = rotated(this.config.maxFiles - 1);
        if (fs.existsSync(oldest)) {
            fs.unlinkSync(oldest);
        }
        for (let i = this.config.maxFiles - 2; i >= 1; i--) {
            if (fs.existsSync(rotated(i))) {
                fs.renameSync(rotated(i), rotated(i + 1));
            }
        }
        fs.renameSync(this.logFilePath, rotated(1));
    }

    private formatLogEntry(level: string, message: string, context?: string, metadata?: LogMetadata): string {
        const timestamp = new Date().toISOString();
        const contextStr = context ? ` [${context}]` : '';
        const metadataStr = metadata ? ` ${JSON.stringify(metadata)}` : '';

        return `${timestamp} [${level}]${contextStr} ${message}${metadataStr}`;
    }

    private writeToFile(logEntry: string): void {
        if (!this.config.enableFileLogging) return;

        try {
            this.checkAndRotateLog();
            fs.appendFileSync(this.logFilePath, logEntry + '\n', 'utf8');
        } catch (error) {
            // stdout belongs to the MCP transport, stderr is the only fallback
            console.error('Failed to write to log file:', error);
        }
    }

    private writeToConsole(level: LogLevel, message: string, context?: string, metadata?: LogMetadata): void {
        if (!this.config.enableConsoleLogging) return;

        const contextStr = context ? ` [${context}]` : '';
        const metadataStr = metadata ? ` ${JSON.stringify(metadata)}` : '';
        const fullMessage = `${message}${contextStr}${metadataStr}`;

        switch (level) {
            case LogLevel.ERROR:
                console.error(fullMessage);
                break;
            case LogLevel.WARN:
                console.warn(fullMessage);
                break;
            case LogLevel.DEBUG:
            case LogLevel.TRACE:
                console.debug(fullMessage);
                break;
            default:
                console.log(fullMessage);
        }
    }

    private log(level: LogLevel, message: string, context?: string, metadata?: LogMetadata): void {
        if (level > this.config.level) return;

        const logEntry = this.formatLogEntry(LogLevel[level], message, context, metadata);

        this.writeToFile(logEntry);
        this.writeToConsole(level, message, context, metadata);
    }

    error(message: string, context?: string, metadata?: LogMetadata): void {
        this.log(LogLevel.ERROR, message, context, metadata);
    }

    warn(message: string, context?: string, metadata?: LogMetadata): void {
        this.log(LogLevel.WARN, message, context, metadata);
    }

    info(message: string, context?: string, metadata?: LogMetadata): void {
        this.log(LogLevel.INFO, message, context, metadata);
    }

    debug(message: string, context?: string, metadata?: LogMetadata): void {
        this.log(LogLevel.DEBUG, message, context, metadata);
    }

    trace(message: string, context?: string, metadata?: LogMetadata): void {
        this.log(LogLevel.TRACE, message, context, metadata);
    }

    /**
     * Create a child logger with a specific context
     */
    child(context: string): ChildLogger {
        return new ChildLogger(this, context);
    }

    getLogFilePath(): string {
        return this.logFilePath;
    }
}

/**
 * Child logger that automatically includes context
 */
export class ChildLogger {
    constructor(
        private parent: Logger,
        private context: string,
    ) {}

    error(message: string, metadata?: LogMetadata): void {
        this.parent.error(message, this.context, metadata);
    }

    warn(message: string, metadata?: LogMetadata): void {
        this.parent.warn(message, this.context, metadata);
    }

    info(message: string, metadata?: LogMetadata): void {
        this.parent.info(message, this.context, metadata);
    }

    debug(message: string, metadata?: LogMetadata): void {
        this.parent.debug(message, this.context, metadata);
    }

    trace(message: string, metadata?: LogMetadata): void {
        this.parent.trace(message, this.context, metadata);
    }

    child(subContext: string): ChildLogger {
        return new ChildLogger(this.parent, `${this.context}:${subContext}`);
    }
}

let defaultLogger: Logger | null = null;

/**
 * Get or create the default logger instance
 */
export function getLogger(config?: Partial<LoggerConfig>): Logger {
    if (!defaultLogger) {
        defaultLogger = new Logger(config);
    }
    return defaultLogger;
}

/**
 * Replace the default logger with one built from the given configuration
 */
export function initializeLogger(config: Partial<LoggerConfig>): Logger {
    defaultLogger = new Logger(config);
    return defaultLogger;
}
