/**
 * Logger factory
 *
 * Builds loggers from validated configuration.
 */

import { MsaRuntimeError } from '../errors/MsaRuntimeError.js';
import { MsaLogger } from './msa-logger.js';
import { LOG_LEVELS, LogLevelSchema, LoggerConfigSchema } from './schemas.js';
import type { LoggerConfigInput, LoggerTransportConfig } from './schemas.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { SilentTransport } from './transports/silent-transport.js';
import { LoggerError } from './errors.js';
import { MsaLogComponent } from './types.js';
import type { Logger, LoggerTransport } from './types.js';

export function createTransport(config: LoggerTransportConfig): LoggerTransport {
    switch (config.type) {
        case 'silent':
            return new SilentTransport();

        case 'console':
            return new ConsoleTransport({ colorize: config.colorize });

        case 'file':
            try {
                return new FileTransport({ path: config.path, maxSize: config.maxSize });
            } catch (error) {
                throw LoggerError.transportInitializationFailed(
                    'file',
                    error instanceof Error ? error.message : String(error)
                );
            }

        default: {
            const unknownType: never = config;
            throw LoggerError.unknownTransportType(String(unknownType));
        }
    }
}

export interface CreateLoggerOptions {
    config?: LoggerConfigInput | undefined;
    component?: MsaLogComponent;
    taskId?: string | undefined;
}

/**
 * Create a logger from (unvalidated) logger configuration.
 * Defaults to an info-level console logger for the client component.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
    const config = LoggerConfigSchema.parse(options.config ?? {});
    return new MsaLogger({
        level: config.level,
        component: options.component ?? MsaLogComponent.CLIENT,
        taskId: options.taskId ?? String(process.pid),
        transports: config.transports.map(createTransport),
    });
}

/**
 * Logger settings taken from the environment: MSA_LOG_LEVEL, when set
 */
export function loggerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfigInput {
    const level = env.MSA_LOG_LEVEL;
    if (!level) {
        return {};
    }
    const result = LogLevelSchema.safeParse(level);
    if (!result.success) {
        throw LoggerError.invalidLogLevel(level, LOG_LEVELS);
    }
    return { level: result.data };
}

let defaultLogger: Logger | null = null;

/**
 * Process-wide fallback logger used when callers do not pass their own.
 * Built on first use from the environment (see {@link loggerConfigFromEnv}); an invalid
 * MSA_LOG_LEVEL is reported as a warning and the default level is used.
 */
export function getDefaultLogger(): Logger {
    if (!defaultLogger) {
        let config: LoggerConfigInput = {};
        let invalidLevel: MsaRuntimeError | undefined;
        try {
            config = loggerConfigFromEnv();
        } catch (error) {
            if (!(error instanceof MsaRuntimeError)) {
                throw error;
            }
            invalidLevel = error;
        }
        defaultLogger = createLogger({ config });
        if (invalidLevel) {
            defaultLogger.warn(`${invalidLevel.message}; using '${defaultLogger.getLevel()}'`, {
                code: invalidLevel.code,
            });
        }
    }
    return defaultLogger;
}

/**
 * Close the fallback logger; the next getDefaultLogger() call reads the environment again
 */
export async function resetDefaultLogger(): Promise<void> {
    const logger = defaultLogger;
    defaultLogger = null;
    await logger?.destroy();
}

/**
 * Log a message against an orchestrator process instance.
 * Always returns true once the message has been handed to the logger.
 */
export function logToProcess(processId: string, message: string, logger?: Logger): boolean {
    (logger ?? getDefaultLogger()).info(message, { processId });
    return true;
}
