/**
 * MSA Logger
 *
 * Multi-transport logger with structured, component-tagged entries.
 * Context objects are redacted before they reach any transport.
 */

import { redactSensitiveData } from '../utils/redactor.js';
import type { Logger, LoggerTransport, LogEntry, LogLevel, MsaLogComponent } from './types.js';

export interface MsaLoggerConfig {
    level: LogLevel;
    component: MsaLogComponent;
    taskId: string;
    transports: LoggerTransport[];
}

// Shared between a logger and its children so setLevel() reaches all of them
interface LevelRef {
    value: LogLevel;
}

export class MsaLogger implements Logger {
    private levelRef: LevelRef;
    private component: MsaLogComponent;
    private taskId: string;
    private transports: LoggerTransport[];

    // Lower number = more severe
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    constructor(config: MsaLoggerConfig, levelRef?: LevelRef) {
        this.levelRef = levelRef ?? { value: config.level };
        this.component = config.component;
        this.taskId = config.taskId;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log('debug', message, context);
    }

    silly(message: string, context?: Record<string, unknown>): void {
        this.log('silly', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.log('error', message, context);
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
            errorType: error.constructor.name,
        });
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            taskId: this.taskId,
            context: context ? this.redactContext(context) : undefined,
        };

        for (const transport of this.transports) {
            try {
                transport.write(entry);
            } catch (error) {
                // Don't let transport errors break logging
                console.error('Logger transport error:', error);
            }
        }
    }

    private redactContext(context: Record<string, unknown>): Record<string, unknown> {
        const redacted = redactSensitiveData(context);
        return typeof redacted === 'object' && redacted !== null && !Array.isArray(redacted)
            ? Object.fromEntries(Object.entries(redacted))
            : {};
    }

    private shouldLog(level: LogLevel): boolean {
        return MsaLogger.LEVELS[level] <= MsaLogger.LEVELS[this.levelRef.value];
    }

    createChild(component: MsaLogComponent): MsaLogger {
        return new MsaLogger(
            {
                level: this.levelRef.value,
                component,
                taskId: this.taskId,
                transports: this.transports,
            },
            this.levelRef
        );
    }

    setLevel(level: LogLevel): void {
        this.levelRef.value = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.value;
    }

    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }
}
