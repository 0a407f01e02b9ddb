// src/core/errors/ErrorContext.ts

import assert from 'assert';

/**
 * Positional metadata attached to Parse errors.
 */
export interface ErrorContext {
    readonly path?: string;     // File or resource being parsed
    readonly line?: number;     // 1-based
    readonly column?: number;   // 1-based
}

export function hasLocation(context: ErrorContext): boolean {
    return context.path !== undefined || context.line !== undefined || context.column !== undefined;
}

export function assertValidContext(context: ErrorContext): void {
    assert.ok(hasLocation(context), 'ErrorContext must set at least one of path, line or column');
    for (const field of ['line', 'column'] as const) {
        const value = context[field];
        assert.ok(
            value === undefined || (Number.isInteger(value) && value > 0),
            `ErrorContext.${field} must be a positive integer, got ${value}`
        );
    }
}

/**
 * Formats the set fields as `path:line:column`, skipping absent ones.
 */
export function formatLocation(context: ErrorContext): string {
    return [context.path, context.line, context.column]
        .filter(part => part !== undefined)
        .join(':');
}
