/**
 * Logger Types and Interfaces
 *
 * Core abstractions for the multi-transport logger.
 */

/**
 * Log levels in order of severity
 * Following Winston convention: error < warn < info < debug < silly
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silly';

/**
 * Component identifiers for structured logging
 */
export enum MsaLogComponent {
    CLIENT = 'client',
    TRANSPORT = 'transport',
    TRACING = 'tracing',
    ENVELOPE = 'envelope',
    REPORTER = 'reporter',
}

/**
 * Structured log entry
 * All logs are converted to this format before being sent to transports
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    /** ISO timestamp */
    timestamp: string;
    component: MsaLogComponent;
    /** Orchestrator process instance the task runs under, when known */
    taskId: string;
    context?: Record<string, unknown> | undefined;
}

export type Logger = {
    debug(message: string, context?: Record<string, unknown>): void;

    /**
     * Most verbose level, for full payload dumps
     */
    silly(message: string, context?: Record<string, unknown>): void;

    info(message: string, context?: Record<string, unknown>): void;

    warn(message: string, context?: Record<string, unknown>): void;

    error(message: string, context?: Record<string, unknown>): void;

    /**
     * Track exception with stack trace
     */
    trackException(error: Error, context?: Record<string, unknown>): void;

    /**
     * Create a child logger with a different component
     * Shares transports, taskId and level with its parent
     */
    createChild(component: MsaLogComponent): Logger;

    /**
     * Set the log level for this logger and every logger sharing its level
     */
    setLevel(level: LogLevel): void;

    getLevel(): LogLevel;

    /**
     * Close transports; shared with children, so destroying a child closes the parent's too
     */
    destroy(): Promise<void>;
};

export type LoggerTransport = {
    write(entry: LogEntry): void;

    /** Release file handles or connections held by the transport */
    destroy?(): void | Promise<void>;
};
