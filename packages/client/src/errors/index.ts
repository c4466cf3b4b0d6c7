export { ErrorScope, ErrorType } from './types.js';
export type { Issue, Severity, MsaErrorCode } from './types.js';
export { MsaRuntimeError } from './MsaRuntimeError.js';
export { MsaValidationError } from './MsaValidationError.js';
export { ensureOk } from './result-bridge.js';
