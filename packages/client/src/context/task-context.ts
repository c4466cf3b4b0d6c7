import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { TaskContextError } from './errors.js';

/** Well-known task context keys shared with the orchestrator */
export const ContextKeys = {
    TOKEN: 'TOKEN',
    TRACE_ID: 'TRACEID',
    SPAN_ID: 'SPANID',
    PROCESS_ID: 'PROCESSINSTANCEID',
} as const;

// Environment variable -> context key
const ENV_MAPPING: Record<string, string> = {
    MSA_TOKEN: ContextKeys.TOKEN,
    MSA_TRACE_ID: ContextKeys.TRACE_ID,
    MSA_SPAN_ID: ContextKeys.SPAN_ID,
    MSA_PROCESS_ID: ContextKeys.PROCESS_ID,
};

const ContextFileSchema = z.record(z.unknown());

/**
 * Key/value store shared by everything running for one task.
 *
 * Holds the bearer token and, once the first call has been made, the trace ids.
 * Created once per task run and passed explicitly to clients.
 */
export class TaskContext {
    private values: Map<string, unknown>;

    constructor(initial: Record<string, unknown> = {}) {
        this.values = new Map(Object.entries(initial));
    }

    static fromEnv(env: NodeJS.ProcessEnv = process.env): TaskContext {
        const context = new TaskContext();
        for (const [envName, key] of Object.entries(ENV_MAPPING)) {
            const value = env[envName];
            if (value !== undefined && value !== '') {
                context.set(key, value);
            }
        }
        return context;
    }

    /**
     * Load a context from a JSON object file, as written by the orchestrator
     * @throws {MsaRuntimeError} when the file is missing or not a JSON object
     */
    static fromFile(filePath: string): TaskContext {
        const absolutePath = path.resolve(filePath);
        let raw: string;
        try {
            raw = readFileSync(absolutePath, 'utf-8');
        } catch {
            throw TaskContextError.fileNotFound(absolutePath);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            throw TaskContextError.fileParseError(
                absolutePath,
                error instanceof Error ? error.message : String(error)
            );
        }

        const result = ContextFileSchema.safeParse(parsed);
        if (!result.success) {
            throw TaskContextError.fileParseError(absolutePath, 'expected an object');
        }
        return new TaskContext(result.data);
    }

    has(key: string): boolean {
        return this.values.has(key);
    }

    get(key: string): unknown {
        return this.values.get(key);
    }

    /**
     * String value of a key, or undefined when absent or not a string
     */
    getString(key: string): string | undefined {
        const value = this.values.get(key);
        return typeof value === 'string' ? value : undefined;
    }

    require(key: string): string {
        const value = this.getString(key);
        if (value === undefined) {
            throw TaskContextError.missingValue(key);
        }
        return value;
    }

    set(key: string, value: unknown): void {
        this.values.set(key, value);
    }

    delete(key: string): boolean {
        return this.values.delete(key);
    }

    toJSON(): Record<string, unknown> {
        return Object.fromEntries(this.values);
    }
}

/**
 * Bearer token of the task
 * @throws {MsaRuntimeError} with MISSING_TOKEN when absent or empty
 */
export function requireToken(context: TaskContext): string {
    const token = context.getString(ContextKeys.TOKEN);
    if (!token) {
        throw TaskContextError.missingToken();
    }
    return token;
}
