import { MsaRuntimeError } from '../errors/MsaRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { TaskContextErrorCode } from './error-codes.js';

/**
 * Task context error factory
 */
export class TaskContextError {
    static missingToken(): MsaRuntimeError {
        return new MsaRuntimeError(
            TaskContextErrorCode.MISSING_TOKEN,
            ErrorScope.CONTEXT,
            ErrorType.USER,
            'Task context has no TOKEN; cannot authenticate against the MSA API',
            { key: 'TOKEN' },
            'Provide the token through MSA_TOKEN or the task context file'
        );
    }

    static missingValue(key: string): MsaRuntimeError {
        return new MsaRuntimeError(
            TaskContextErrorCode.MISSING_VALUE,
            ErrorScope.CONTEXT,
            ErrorType.NOT_FOUND,
            `Task context has no value for '${key}'`,
            { key }
        );
    }

    static fileNotFound(filePath: string): MsaRuntimeError {
        return new MsaRuntimeError(
            TaskContextErrorCode.FILE_NOT_FOUND,
            ErrorScope.CONTEXT,
            ErrorType.NOT_FOUND,
            `Task context file not found: ${filePath}`,
            { filePath }
        );
    }

    static fileParseError(filePath: string, reason: string): MsaRuntimeError {
        return new MsaRuntimeError(
            TaskContextErrorCode.FILE_PARSE_ERROR,
            ErrorScope.CONTEXT,
            ErrorType.USER,
            `Task context file ${filePath} is not a JSON object: ${reason}`,
            { filePath, reason }
        );
    }
}
