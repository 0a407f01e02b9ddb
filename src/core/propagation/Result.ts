// src/core/propagation/Result.ts

import { ErrorValue } from '../errors/ErrorValue';

export interface Ok<T> {
    readonly ok: true;
    readonly value: T;
}

export interface Err {
    readonly ok: false;
    readonly error: ErrorValue;
}

/**
 * Outcome of every fallible operation: a value or an ErrorValue.
 */
export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
    return { ok: true, value };
}

export function err(error: ErrorValue): Err {
    return { ok: false, error };
}

export function isOk<T>(result: Result<T>): result is Ok<T> {
    return result.ok;
}

export function isErr<T>(result: Result<T>): result is Err {
    return !result.ok;
}

export function map<T, U>(result: Result<T>, fn: (value: T) => U): Result<U> {
    return result.ok ? ok(fn(result.value)) : result;
}

export function andThen<T, U>(result: Result<T>, fn: (value: T) => Result<U>): Result<U> {
    return result.ok ? fn(result.value) : result;
}
