export {
    ensureTrace,
    renderTraceHeaders,
    formatTraceparent,
    isValidTraceIds,
} from './trace-context.js';
export type { TraceIds, TraceHeaders } from './trace-context.js';
