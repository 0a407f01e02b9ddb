// src/core/errors/payloads.ts

import { types } from 'util';
import { ZodError } from 'zod';
import { NumberFormatError } from '../parsing/parseInteger';
import { ErrorKind } from './ErrorKind';
import { definePayloadType, PayloadType } from './PayloadType';

export type IoFailure = NodeJS.ErrnoException;

// Errors raised inside Node's own modules may come from another realm
function isErrorLike(value: unknown): value is Error {
    return value instanceof Error || types.isNativeError(value);
}

function isIoFailure(value: unknown): value is IoFailure {
    return isErrorLike(value) &&
        'code' in value && typeof value.code === 'string' &&
        'syscall' in value && typeof value.syscall === 'string';
}

function describeZodError(error: ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Best-effort text for a thrown value of unknown shape. Never empty.
 */
export function describeUnknown(value: unknown): string {
    if (isErrorLike(value)) {
        return value.message.trim().length > 0 ? value.message : value.name || 'Error';
    }
    switch (typeof value) {
        case 'string':
            return value.trim().length > 0 ? value : 'empty error string';
        case 'number':
        case 'boolean':
        case 'bigint':
            return `thrown ${typeof value}: ${String(value)}`;
        case 'symbol':
            return `thrown ${value.toString()}`;
        case 'undefined':
            return 'thrown undefined';
        case 'function':
            return `thrown function ${value.name || '(anonymous)'}`;
    }
    if (typeof value !== 'object' || value === null) {
        return 'thrown null';
    }
    return `thrown ${value.constructor?.name ?? 'object'}`;
}

/**
 * Built-in payload types. `fromExternal` tries Io, NumberFormat, Syntax and
 * Validation in that order and falls back to Unknown.
 */
export const PayloadTypes = {
    Io: definePayloadType<IoFailure>({
        name: 'io',
        kind: ErrorKind.Io,
        is: isIoFailure,
        describe: error => error.message,
    }),

    NumberFormat: definePayloadType<NumberFormatError>({
        name: 'number-format',
        kind: ErrorKind.Parse,
        is: (value): value is NumberFormatError => value instanceof NumberFormatError,
        describe: error => error.message,
        locate: error => ({ column: error.column }),
    }),

    Syntax: definePayloadType<SyntaxError>({
        name: 'syntax',
        kind: ErrorKind.Parse,
        is: (value): value is SyntaxError =>
            value instanceof SyntaxError || (types.isNativeError(value) && value.name === 'SyntaxError'),
        describe: error => error.message,
    }),

    Validation: definePayloadType<ZodError>({
        name: 'validation',
        kind: ErrorKind.Validation,
        is: (value): value is ZodError => value instanceof ZodError,
        describe: describeZodError,
    }),

    Unknown: definePayloadType<unknown>({
        name: 'unknown',
        kind: ErrorKind.Custom,
        is: (value): value is unknown => true,
        describe: describeUnknown,
    }),

    // Boxed by nodes built directly with a message and no explicit payload
    Message: definePayloadType<string>({
        name: 'message',
        is: (value): value is string => typeof value === 'string',
        describe: message => message,
    }),
} as const;

const DETECTION_ORDER: readonly PayloadType<unknown>[] = [
    PayloadTypes.Io,
    PayloadTypes.NumberFormat,
    PayloadTypes.Syntax,
    PayloadTypes.Validation,
];

export function detectPayloadType(value: unknown): PayloadType<unknown> {
    return DETECTION_ORDER.find(type => type.is(value)) ?? PayloadTypes.Unknown;
}
