import * as fs from 'fs';
import * as path from 'path';
import { DiagnosticEvent, DiagnosticLevel, DiagnosticSink, LoggerConfig, LogLevel } from '../interfaces/logger.interfaces.js';

export { LogLevel } from '../interfaces/logger.interfaces.js';
export type { LoggerConfig } from '../interfaces/logger.interfaces.js';

type Metadata = Record<string, unknown>;

const LEVEL_NAMES: Record<DiagnosticLevel, LogLevel> = {
    error: LogLevel.ERROR,
    warn: LogLevel.WARN,
    info: LogLevel.INFO,
    debug: LogLevel.DEBUG,
    trace: LogLevel.TRACE,
};

/**
 * Parse a level name such as `debug` or `WARN`
 */
export function parseLogLevel(value: string): LogLevel | undefined {
    const key = value.trim().toLowerCase();
    return isDiagnosticLevel(key) ? LEVEL_NAMES[key] : undefined;
}

function isDiagnosticLevel(value: string): value is DiagnosticLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_NAMES, value);
}

function defaultLogFileName(): string {
    const stamp = new Date().toISOString().replace(/\..+$/, '').replace(/[:T]/g, '-');
    return `winget-updates-${stamp}.log`;
}

/**
 * File and console logger. Console output goes to stderr so that it never
 * mixes with MCP traffic on stdout.
 */
export class Logger implements DiagnosticSink {
    private readonly config: Required<LoggerConfig>;
    private logFilePath: string;

    constructor(config: Partial<LoggerConfig> = {}) {
        this.config = {
            level: config.level ?? LogLevel.INFO,
            enableFileLogging: config.enableFileLogging ?? false,
            logDirectory: path.resolve(config.logDirectory ?? './logs'),
            logFileName: config.logFileName ?? defaultLogFileName(),
            maxFileSize: config.maxFileSize ?? 10 * 1024 * 1024, // 10MB
            maxFiles: config.maxFiles ?? 5,
            enableConsoleLogging: config.enableConsoleLogging ?? true,
        };

        this.logFilePath = path.join(this.config.logDirectory, this.config.logFileName);
        this.ensureLogDirectory();
    }

    private ensureLogDirectory(): void {
        if (this.config.enableFileLogging && !fs.existsSync(this.config.logDirectory)) {
            fs.mkdirSync(this.config.logDirectory, { recursive: true });
        }
    }

    /**
     * Rotate when the current file has grown past maxFileSize
     */
    private checkAndRotateLog(): void {
        if (!fs.existsSync(this.logFilePath)) return;

        const stats = fs.statSync(this.logFilePath);
        if (stats.size > this.config.maxFileSize) {
            this.rotateLogFile();
        }
    }

    private rotateLogFile(): void {
        const extension = path.extname(this.config.logFileName);
        const baseName = path.basename(this.config.logFileName, extension);

        for (let i = this.config.maxFiles - 1; i >= 1; i--) {
            const oldFile = path.join(this.config.logDirectory, `${baseName}.${i}${extension}`);
            const newFile = path.join(this.config.logDirectory, `${baseName}.${i + 1}${extension}`);

            if (fs.existsSync(oldFile)) {
                if (i === this.config.maxFiles - 1) {
                    // Delete the oldest file
                    fs.unlinkSync(oldFile);
                } else {
                    fs.renameSync(oldFile, newFile);
                }
            }
        }

        fs.renameSync(this.logFilePath, path.join(this.config.logDirectory, `${baseName}.1${extension}`));
    }

    private formatLogEntry(level: string, message: string, context?: string, metadata?: Metadata): string {
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
            // File logging is best effort; stderr still gets the failure
            console.error('Failed to write to log file:', error);
        }
    }

    private writeToConsole(logEntry: string): void {
        if (!this.config.enableConsoleLogging) return;
        console.error(logEntry);
    }

    private log(level: LogLevel, levelName: string, message: string, context?: string, metadata?: Metadata): void {
        if (level > this.config.level) return;

        const logEntry = this.formatLogEntry(levelName, message, context, metadata);

        this.writeToFile(logEntry);
        this.writeToConsole(logEntry);
    }

    error(message: string, context?: string, metadata?: Metadata): void {
        this.log(LogLevel.ERROR, 'ERROR', message, context, metadata);
    }

    warn(message: string, context?: string, metadata?: Metadata): void {
        this.log(LogLevel.WARN, 'WARN', message, context, metadata);
    }

    info(message: string, context?: string, metadata?: Metadata): void {
        this.log(LogLevel.INFO, 'INFO', message, context, metadata);
    }

    debug(message: string, context?: string, metadata?: Metadata): void {
        this.log(LogLevel.DEBUG, 'DEBUG', message, context, metadata);
    }

    trace(message: string, context?: string, metadata?: Metadata): void {
        this.log(LogLevel.TRACE, 'TRACE', message, context, metadata);
    }

    record(event: DiagnosticEvent, context?: string): void {
        this.log(LEVEL_NAMES[event.level], event.level.toUpperCase(), event.message, context, event.metadata);
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
export class ChildLogger implements DiagnosticSink {
    constructor(
        private parent: Logger,
        private context: string
    ) {}

    error(message: string, metadata?: Metadata): void {
        this.parent.error(message, this.context, metadata);
    }

    warn(message: string, metadata?: Metadata): void {
        this.parent.warn(message, this.context, metadata);
    }

    info(message: string, metadata?: Metadata): void {
        this.parent.info(message, this.context, metadata);
    }

    debug(message: string, metadata?: Metadata): void {
        this.parent.debug(message, this.context, metadata);
    }

    trace(message: string, metadata?: Metadata): void {
        this.parent.trace(message, this.context, metadata);
    }

    record(event: DiagnosticEvent): void {
        this.parent.record(event, this.context);
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
 * Replace the default logger, typically once at startup
 */
export function initializeLogger(config: Partial<LoggerConfig>): Logger {
    defaultLogger = new Logger(config);
    return defaultLogger;
}

export function createLogger(config?: Partial<LoggerConfig>): Logger {
    return new Logger(config);
}
