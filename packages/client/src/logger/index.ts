export { MsaLogger } from './msa-logger.js';
export type { MsaLoggerConfig } from './msa-logger.js';
export { MsaLogComponent } from './types.js';
export type { Logger, LoggerTransport, LogEntry, LogLevel } from './types.js';
export { LoggerConfigSchema, LoggerTransportSchema, LogLevelSchema, LOG_LEVELS } from './schemas.js';
export type { LoggerConfig, LoggerConfigInput, LoggerTransportConfig } from './schemas.js';
export {
    createLogger,
    createTransport,
    getDefaultLogger,
    resetDefaultLogger,
    loggerConfigFromEnv,
    logToProcess,
} from './factory.js';
export type { CreateLoggerOptions } from './factory.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { FileTransport } from './transports/file-transport.js';
export { SilentTransport } from './transports/silent-transport.js';
export { LoggerError } from './errors.js';
export { LoggerErrorCode } from './error-codes.js';
