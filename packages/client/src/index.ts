/**
 * MSA client SDK
 * Authenticated, traced calls against the MSA REST API and the task result protocol
 */

// Transport
export {
    MsaHttpClient,
    MsaResponse,
    TransportError,
    TransportErrorCode,
} from './transport/index.js';
export type {
    HttpMethod,
    FetchFunction,
    RequestOptions,
    GetOptions,
    QueryParams,
    QueryValue,
    MsaHttpClientOptions,
} from './transport/index.js';

// Task context and tracing
export {
    TaskContext,
    ContextKeys,
    requireToken,
    TaskContextError,
    TaskContextErrorCode,
} from './context/index.js';
export {
    ensureTrace,
    renderTraceHeaders,
    formatTraceparent,
    isValidTraceIds,
} from './tracing/index.js';
export type { TraceIds, TraceHeaders } from './tracing/index.js';

// Envelope and task reporting
export {
    WoStatus,
    WO_STATUSES,
    ResponseEnvelopeSchema,
    JsonObjectSchema,
    encodeEnvelope,
    decodeEnvelope,
    buildEnvelope,
    sanitizeParams,
} from './envelope/index.js';
export type { ResponseEnvelope, JsonObject, JsonValue, EncodeOptions } from './envelope/index.js';
export { reportSuccess, reportFailure, runTask } from './reporter/index.js';
export type {
    TaskOutcome,
    ReportOptions,
    OutputStream,
    TaskFunction,
    RunTaskOptions,
} from './reporter/index.js';

// Configuration
export {
    ClientConfigSchema,
    loadClientConfig,
    parseClientConfig,
    resolveClientConfig,
    resolveBaseUrl,
    ConfigError,
    ConfigErrorCode,
} from './config/index.js';
export type { ClientConfig, ClientConfigInput, LoadClientConfigOptions } from './config/index.js';

// Logging
export {
    MsaLogger,
    MsaLogComponent,
    createLogger,
    getDefaultLogger,
    resetDefaultLogger,
    loggerConfigFromEnv,
    logToProcess,
    LoggerConfigSchema,
} from './logger/index.js';
export type { Logger, LogLevel, LogEntry, LoggerTransport, LoggerConfig } from './logger/index.js';

// Errors
export {
    ErrorScope,
    ErrorType,
    MsaRuntimeError,
    MsaValidationError,
    ensureOk,
} from './errors/index.js';
export type { Issue, MsaErrorCode } from './errors/index.js';
export { ok, fail, hasErrors, splitIssues, zodToIssues } from './utils/result.js';
export type { Result } from './utils/result.js';
