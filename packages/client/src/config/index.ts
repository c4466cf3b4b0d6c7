export {
    ClientConfigSchema,
    resolveBaseUrl,
    DEFAULT_HOST,
    DEFAULT_PORT,
    DEFAULT_BASE_PATH,
    DEFAULT_POST_TIMEOUT_MS,
} from './schemas.js';
export type { ClientConfig, ClientConfigInput } from './schemas.js';
export {
    loadClientConfig,
    parseClientConfig,
    resolveClientConfig,
    configFromEnv,
} from './loader.js';
export type { LoadClientConfigOptions } from './loader.js';
export { ConfigError } from './errors.js';
export { ConfigErrorCode } from './error-codes.js';
