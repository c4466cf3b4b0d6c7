import { MsaRuntimeError } from '../errors/MsaRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ConfigErrorCode } from './error-codes.js';

/**
 * Configuration error factory
 */
export class ConfigError {
    static fileNotFound(configPath: string): MsaRuntimeError {
        return new MsaRuntimeError(
            ConfigErrorCode.FILE_NOT_FOUND,
            ErrorScope.CONFIG,
            ErrorType.NOT_FOUND,
            `Configuration file not found: ${configPath}`,
            { configPath },
            'Check the path, or drop the file option to configure through MSA_* variables only'
        );
    }

    static fileReadError(configPath: string, reason: string): MsaRuntimeError {
        return new MsaRuntimeError(
            ConfigErrorCode.FILE_READ_ERROR,
            ErrorScope.CONFIG,
            ErrorType.SYSTEM,
            `Failed to read configuration file ${configPath}: ${reason}`,
            { configPath, reason }
        );
    }

    static parseError(configPath: string, reason: string): MsaRuntimeError {
        return new MsaRuntimeError(
            ConfigErrorCode.PARSE_ERROR,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Failed to parse configuration file ${configPath}: ${reason}`,
            { configPath, reason }
        );
    }
}
