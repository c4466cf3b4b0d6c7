import { TraceFlags, isValidSpanId, isValidTraceId } from '@opentelemetry/api';
import { RandomIdGenerator } from '@opentelemetry/sdk-trace-base';
import type { IdGenerator } from '@opentelemetry/sdk-trace-base';
import { ContextKeys } from '../context/task-context.js';
import type { TaskContext } from '../context/task-context.js';
import type { Logger } from '../logger/types.js';

export interface TraceIds {
    /** 32 lowercase hex chars */
    traceId: string;
    /** 16 lowercase hex chars */
    spanId: string;
}

export type TraceHeaders = {
    traceparent: string;
    'X-B3-TraceId': string;
    'X-B3-SpanId': string;
};

const TRACEPARENT_VERSION = '00';

// Correlation ids only: Math.random based generation is enough
const defaultIdGenerator: IdGenerator = new RandomIdGenerator();

function formatFlags(flags: TraceFlags): string {
    return flags.toString(16).padStart(2, '0');
}

export function formatTraceparent(ids: TraceIds): string {
    return [TRACEPARENT_VERSION, ids.traceId, ids.spanId, formatFlags(TraceFlags.SAMPLED)].join(
        '-'
    );
}

/**
 * Trace ids of the task, created on first use.
 *
 * The pair is written back into the task context so every later call of the same
 * task run carries it; an existing trace id is never replaced.
 */
export function ensureTrace(
    context: TaskContext,
    logger?: Logger,
    idGenerator: IdGenerator = defaultIdGenerator
): TraceIds {
    // Presence decides, whatever the stored type: ids from a JSON context file may be numbers
    if (context.has(ContextKeys.TRACE_ID)) {
        const traceId = String(context.get(ContextKeys.TRACE_ID));
        if (!context.has(ContextKeys.SPAN_ID)) {
            // Trace id handed over without a span id: pin one for the rest of the task
            context.set(ContextKeys.SPAN_ID, idGenerator.generateSpanId());
        }
        return { traceId, spanId: String(context.get(ContextKeys.SPAN_ID)) };
    }

    const ids: TraceIds = {
        traceId: idGenerator.generateTraceId(),
        spanId: idGenerator.generateSpanId(),
    };
    context.set(ContextKeys.TRACE_ID, ids.traceId);
    context.set(ContextKeys.SPAN_ID, ids.spanId);
    logger?.info(`Creating traceId: ${formatTraceparent(ids)}`);
    return ids;
}

/**
 * W3C traceparent header plus the older B3 headers still read by some collectors
 */
export function renderTraceHeaders(ids: TraceIds): TraceHeaders {
    return {
        traceparent: formatTraceparent(ids),
        'X-B3-TraceId': ids.traceId,
        'X-B3-SpanId': ids.spanId,
    };
}

export function isValidTraceIds(ids: TraceIds): boolean {
    return isValidTraceId(ids.traceId) && isValidSpanId(ids.spanId);
}
