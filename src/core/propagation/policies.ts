// src/core/propagation/policies.ts

import assert from 'assert';
import { ErrorKind } from '../errors/ErrorKind';
import { ErrorValue, ErrorValueOptions } from '../errors/ErrorValue';
import { PayloadType } from '../errors/PayloadType';
import { Logger } from '../logging/Logger';
import { err, ok, Result } from './Result';

/**
 * Runs a throwing collaborator and absorbs whatever it throws.
 */
export function tryCatch<T>(fn: () => T, type?: PayloadType<unknown>): Result<T> {
    try {
        return ok(fn());
    } catch (error) {
        return err(ErrorValue.fromExternal(error, type));
    }
}

export async function tryCatchAsync<T>(fn: () => Promise<T>, type?: PayloadType<unknown>): Promise<Result<T>> {
    try {
        return ok(await fn());
    } catch (error) {
        return err(ErrorValue.fromExternal(error, type));
    }
}

/**
 * Policy 1: the layer adds nothing, hand the same result object up.
 */
export function passThrough<T>(result: Result<T>): Result<T> {
    return result;
}

/**
 * Policy 2: attach this layer's context to a failure. Successes are untouched.
 */
export function wrapErr<T>(result: Result<T>, kind: ErrorKind, message: string, options?: ErrorValueOptions): Result<T> {
    return result.ok ? result : err(result.error.wrap(kind, message, options));
}

/**
 * Policy 3: let `handler` substitute a result for an anticipated failure.
 * Returning undefined declines, and the original failure propagates.
 */
export function recover<T>(result: Result<T>, handler: (error: ErrorValue) => Result<T> | undefined): Result<T> {
    if (result.ok) {
        return result;
    }
    return handler(result.error) ?? result;
}

/**
 * The only sanctioned way to drop an error.
 */
export function ignore(error: ErrorValue, reason: string): void {
    assert.ok(reason.trim().length > 0, 'ignore() requires a reason');
    Logger.debug('Propagation', `Ignoring error: ${reason}\n${error.render()}`);
}

/**
 * Returns the value or throws the failure wrapped with `message`.
 */
export function expectValue<T>(result: Result<T>, message: string): T {
    if (result.ok) {
        return result.value;
    }
    throw result.error.wrap(ErrorKind.Custom, message);
}

export function unwrap<T>(result: Result<T>): T {
    return expectValue(result, 'called unwrap on a failed result');
}

/**
 * Exception form of policy 2: whatever `fn` throws is converted, wrapped
 * and rethrown.
 */
export function rethrowWithContext<T>(fn: () => T, kind: ErrorKind, message: string, options?: ErrorValueOptions): T {
    try {
        return fn();
    } catch (error) {
        throw ErrorValue.fromExternal(error).wrap(kind, message, options);
    }
}
