import { z } from 'zod';
import { LoggerConfigSchema } from '../logger/schemas.js';

export const DEFAULT_HOST = 'localhost';
export const DEFAULT_PORT = 8480;
export const DEFAULT_BASE_PATH = '/ubi-api-rest';
export const DEFAULT_POST_TIMEOUT_MS = 60_000;

/**
 * Client configuration: where the MSA API lives and how long calls may take
 */
export const ClientConfigSchema = z
    .object({
        host: z.string().min(1).default(DEFAULT_HOST).describe('MSA API host name'),
        port: z
            .number()
            .int()
            .min(1)
            .max(65535)
            .default(DEFAULT_PORT)
            .describe('MSA API port'),
        basePath: z
            .string()
            .startsWith('/')
            .default(DEFAULT_BASE_PATH)
            .describe('Path prefix of the REST API'),
        postTimeoutMs: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_POST_TIMEOUT_MS)
            .describe('Timeout of POST calls that do not pass their own'),
        timeoutMs: z
            .number()
            .int()
            .positive()
            .optional()
            .describe('Timeout of GET/PUT/DELETE calls; unset means no client-side limit'),
        logger: LoggerConfigSchema.default({}),
    })
    .strict()
    .describe('MSA client configuration');

export type ClientConfig = z.output<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

/**
 * Base URL every request path is appended to
 */
export function resolveBaseUrl(config: Pick<ClientConfig, 'host' | 'port' | 'basePath'>): string {
    return `http://${config.host}:${config.port}${config.basePath}`;
}
