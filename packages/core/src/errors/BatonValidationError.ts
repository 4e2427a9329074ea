import type { ZodError } from 'zod';
import { BatonBaseError } from './BatonBaseError.js';
import { ErrorScope, ErrorType } from './types.js';
import type { Issue } from './types.js';

/**
 * Validation error carrying every issue found, not only the first one
 */
export class BatonValidationError extends BatonBaseError {
    constructor(public readonly issues: Issue[]) {
        super(BatonValidationError.summarize(issues));
    }

    get errors(): Issue[] {
        return this.issues.filter((i) => i.severity === 'error');
    }

    get warnings(): Issue[] {
        return this.issues.filter((i) => i.severity === 'warning');
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            issues: this.issues,
            traceId: this.traceId,
        };
    }

    private static summarize(issues: Issue[]): string {
        const errors = issues.filter((i) => i.severity === 'error');
        const first = errors[0] ?? issues[0];
        if (!first) {
            return 'Validation failed';
        }
        const where = first.path && first.path.length > 0 ? ` (${first.path.join('.')})` : '';
        const more = errors.length > 1 ? ` and ${errors.length - 1} more error(s)` : '';
        return `${first.message}${where}${more}`;
    }
}

/**
 * Convert a ZodError into structured issues
 */
export function zodToIssues(
    err: ZodError,
    scope: ErrorScope | string = ErrorScope.CONFIG,
    severity: 'error' | 'warning' = 'error'
): Issue[] {
    return err.issues.map((issue) => ({
        code: 'schema_validation',
        message: issue.message,
        scope,
        type: ErrorType.USER,
        severity,
        path: issue.path,
        context: { zodCode: issue.code },
    }));
}
