import { promises as fs } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { ClientConfigSchema } from './schemas.js';
import type { ClientConfig } from './schemas.js';
import { ConfigError } from './errors.js';
import { ensureOk } from '../errors/result-bridge.js';
import { ErrorScope } from '../errors/types.js';
import { ok, fail, zodToIssues } from '../utils/result.js';
import type { Result } from '../utils/result.js';

/**
 * Validate raw configuration against the client schema
 */
export function parseClientConfig(raw: unknown): Result<ClientConfig> {
    const result = ClientConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        return fail(zodToIssues(result.error, 'error', ErrorScope.CONFIG));
    }
    return ok(result.data);
}

/**
 * Validated configuration, throwing MsaValidationError on invalid input
 */
export function resolveClientConfig(raw?: unknown): ClientConfig {
    return ensureOk(parseClientConfig(raw));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Overrides read from MSA_* environment variables.
 * Numeric values are converted here so the schema reports bad numbers.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};
    if (env.MSA_HOST) overrides.host = env.MSA_HOST;
    if (env.MSA_PORT) overrides.port = Number(env.MSA_PORT);
    if (env.MSA_BASE_PATH) overrides.basePath = env.MSA_BASE_PATH;
    if (env.MSA_TIMEOUT_MS) overrides.timeoutMs = Number(env.MSA_TIMEOUT_MS);
    if (env.MSA_POST_TIMEOUT_MS) overrides.postTimeoutMs = Number(env.MSA_POST_TIMEOUT_MS);
    if (env.MSA_LOG_LEVEL) overrides.logger = { level: env.MSA_LOG_LEVEL };
    return overrides;
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
    const absolutePath = path.resolve(configPath);

    try {
        await fs.access(absolutePath);
    } catch {
        throw ConfigError.fileNotFound(absolutePath);
    }

    let fileContent: string;
    try {
        fileContent = await fs.readFile(absolutePath, 'utf-8');
    } catch (error) {
        throw ConfigError.fileReadError(
            absolutePath,
            error instanceof Error ? error.message : String(error)
        );
    }

    let parsed: unknown;
    try {
        parsed = parseYaml(fileContent);
    } catch (error) {
        throw ConfigError.parseError(
            absolutePath,
            error instanceof Error ? error.message : String(error)
        );
    }

    // An empty file parses to null
    if (parsed === null || parsed === undefined) {
        return {};
    }
    if (!isPlainObject(parsed)) {
        throw ConfigError.parseError(absolutePath, 'top-level value must be a mapping');
    }
    return parsed;
}

export interface LoadClientConfigOptions {
    /** Optional YAML configuration file */
    file?: string | undefined;
    env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Load client configuration: YAML file first, then MSA_* environment overrides.
 *
 * @throws {MsaRuntimeError} when the file is missing, unreadable or not YAML
 * @throws {MsaValidationError} when the merged values fail validation
 */
export async function loadClientConfig(
    options: LoadClientConfigOptions = {}
): Promise<ClientConfig> {
    const fromFile = options.file ? await readConfigFile(options.file) : {};
    const fromEnv = configFromEnv(options.env ?? process.env);

    const merged: Record<string, unknown> = { ...fromFile, ...fromEnv };
    if (isPlainObject(fromEnv.logger) && isPlainObject(fromFile.logger)) {
        merged.logger = { ...fromFile.logger, ...fromEnv.logger };
    }

    return resolveClientConfig(merged);
}
