/**
 * Utility to redact sensitive information from log context.
 * - Redacts by field name (e.g., TOKEN, authorization, password)
 * - Redacts by value pattern (Bearer tokens)
 * - Handles nested structures and circular references
 */

// Sensitive field names, compared case-insensitively
const SENSITIVE_FIELDS = [
    'token',
    'apikey',
    'api_key',
    'access_token',
    'refresh_token',
    'authorization',
    'password',
    'secret',
];

const SENSITIVE_PATTERNS: RegExp[] = [/\bBearer\s+[A-Za-z0-9\-_.=]+/gi];

export const REDACTED = '[REDACTED]';
const REDACTED_CIRCULAR = '[REDACTED_CIRCULAR]';

export function isSensitiveField(key: string): boolean {
    return SENSITIVE_FIELDS.includes(key.toLowerCase());
}

/**
 * Redacts sensitive data from an object, array, or string.
 * Returns a new structure; the input is left untouched.
 */
export function redactSensitiveData(input: unknown, seen = new WeakSet<object>()): unknown {
    if (typeof input === 'string') {
        let result = input;
        for (const pattern of SENSITIVE_PATTERNS) {
            result = result.replace(pattern, `Bearer ${REDACTED}`);
        }
        return result;
    }
    if (Array.isArray(input)) {
        if (seen.has(input)) return REDACTED_CIRCULAR;
        seen.add(input);
        return input.map((item) => redactSensitiveData(item, seen));
    }
    if (input && typeof input === 'object') {
        if (seen.has(input)) return REDACTED_CIRCULAR;
        seen.add(input);
        const result: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(input)) {
            result[key] = isSensitiveField(key) ? REDACTED : redactSensitiveData(value, seen);
        }
        return result;
    }
    return input;
}
