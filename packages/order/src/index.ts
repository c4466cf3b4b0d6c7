export { OrderClient } from './order-client.js';
export type { OrderCommand, ApplyMode } from './order-client.js';
export { OrderError } from './errors.js';
export { OrderErrorCode } from './error-codes.js';
