import type { Issue } from './types.js';

function formatIssue(issue: Issue): string {
    return issue.path?.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Thrown when a Result carries error issues at a public API boundary
 */
export class MsaValidationError extends Error {
    readonly issues: Issue[];

    constructor(issues: Issue[]) {
        const errors = issues.filter((i) => i.severity === 'error');
        super(errors.length > 0 ? errors.map(formatIssue).join('; ') : 'Validation failed');
        this.name = 'MsaValidationError';
        this.issues = issues;
    }

    get errors(): Issue[] {
        return this.issues.filter((i) => i.severity === 'error');
    }

    get warnings(): Issue[] {
        return this.issues.filter((i) => i.severity === 'warning');
    }
}
