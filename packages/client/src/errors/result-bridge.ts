import type { Result } from '../utils/result.js';
import { MsaValidationError } from './MsaValidationError.js';
import type { Logger } from '../logger/types.js';

/**
 * Bridge function to convert Result pattern to validation exceptions
 * Used at public API boundaries for validation flows
 *
 * @example
 * ```typescript
 * const config = ensureOk(parseClientConfig(raw)); // Throws MsaValidationError on issues
 * ```
 */
export function ensureOk<T, C>(result: Result<T, C>, logger?: Logger): T {
    if (result.ok) {
        return result.data;
    }

    logger?.error(
        `ensureOk: found validation errors, throwing MsaValidationError: ${result.issues.map((i) => i.message).join('; ')}`
    );
    throw new MsaValidationError(result.issues);
}
