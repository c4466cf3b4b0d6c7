export { TaskContext, ContextKeys, requireToken } from './task-context.js';
export { TaskContextError } from './errors.js';
export { TaskContextErrorCode } from './error-codes.js';
