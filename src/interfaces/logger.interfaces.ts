export interface LoggerConfig {
    level: LogLevel;
    enableFileLogging: boolean;
    logDirectory: string;
    logFileName?: string;
    maxFileSize?: number; // in bytes
    maxFiles?: number;
    enableConsoleLogging: boolean;
}

export enum LogLevel {
    ERROR = 0,
    WARN = 1,
    INFO = 2,
    DEBUG = 3,
    TRACE = 4,
}

export type DiagnosticLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface DiagnosticEvent {
    level: DiagnosticLevel;
    message: string;
    metadata?: Record<string, unknown>;
}

/**
 * Receives diagnostics from the parser and the orchestrator. Loggers implement
 * it; tests pass a recording sink.
 */
export interface DiagnosticSink {
    record(event: DiagnosticEvent): void;
}
