import { describe, test, expect } from 'vitest';
import { z } from 'zod';
import { zodToIssues, ok, fail, hasErrors, splitIssues } from './result.js';
import { ErrorScope, ErrorType } from '../errors/index.js';
import type { Issue } from '../errors/index.js';

const makeIssue = (
    code: string,
    severity: 'error' | 'warning',
    message = `Test ${severity}`
): Issue => ({
    code,
    message,
    severity,
    scope: ErrorScope.CONFIG,
    type: ErrorType.USER,
    context: {},
});

describe('zodToIssues', () => {
    test('should convert basic Zod validation error', () => {
        const schema = z.object({ host: z.string(), port: z.number() });

        const result = schema.safeParse({ host: 'localhost', port: 'invalid' });
        expect(result.success).toBe(false);

        if (!result.success) {
            const issues = zodToIssues(result.error);
            expect(issues).toHaveLength(1);
            expect(issues[0]).toMatchObject({
                code: 'schema_validation',
                message: 'Expected number, received string',
                path: ['port'],
                severity: 'error',
                scope: ErrorScope.CONFIG,
                type: ErrorType.USER,
            });
        }
    });

    test('should respect severity and scope parameters', () => {
        const result = z.string().safeParse(123);

        if (!result.success) {
            const issues = zodToIssues(result.error, 'warning', ErrorScope.ENVELOPE);
            expect(issues[0]?.severity).toBe('warning');
            expect(issues[0]?.scope).toBe(ErrorScope.ENVELOPE);
        }
    });

    test('should flatten union errors', () => {
        const schema = z.union([z.string(), z.number()]);
        const result = schema.safeParse(true);

        expect(result.success).toBe(false);
        if (!result.success) {
            const issues = zodToIssues(result.error);
            expect(issues).toHaveLength(2);
            expect(issues.map((i) => i.message)).toEqual([
                'Expected string, received boolean',
                'Expected number, received boolean',
            ]);
        }
    });
});

describe('Result helper functions', () => {
    test('ok should create successful result', () => {
        const result = ok({ value: 42 });
        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.data).toEqual({ value: 42 });
        }
        expect(result.issues).toEqual([]);
    });

    test('fail should create failed result', () => {
        const result = fail([makeIssue('test_error', 'error')]);
        expect(result.ok).toBe(false);
        expect(result.issues).toHaveLength(1);
    });

    test('hasErrors should ignore warnings', () => {
        expect(hasErrors([makeIssue('test_error', 'error')])).toBe(true);
        expect(hasErrors([makeIssue('test_warning', 'warning')])).toBe(false);
        expect(hasErrors([])).toBe(false);
    });

    test('splitIssues should separate errors from warnings', () => {
        const { errors, warnings } = splitIssues([
            makeIssue('e1', 'error'),
            makeIssue('w1', 'warning'),
            makeIssue('e2', 'error'),
        ]);
        expect(errors.map((i) => i.code)).toEqual(['e1', 'e2']);
        expect(warnings.map((i) => i.code)).toEqual(['w1']);
    });
});
