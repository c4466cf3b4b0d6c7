export { MsaHttpClient } from './http-client.js';
export { MsaResponse, extractErrorMessage } from './response.js';
export { TransportError } from './errors.js';
export { TransportErrorCode } from './error-codes.js';
export type {
    HttpMethod,
    FetchFunction,
    RequestOptions,
    GetOptions,
    QueryParams,
    QueryValue,
    MsaHttpClientOptions,
} from './types.js';
