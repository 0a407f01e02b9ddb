// src/core/errors/PayloadType.ts

import { v4 as uuidv4 } from 'uuid';
import { ErrorContext } from './ErrorContext';
import { ErrorKind } from './ErrorKind';

/**
 * Identity token for a concrete error shape. Boxing a value under a
 * payload type is what lets `ErrorValue.downcast` hand it back typed.
 */
export interface PayloadType<T> {
    readonly id: string;
    readonly name: string;
    readonly kind: ErrorKind;
    is(value: unknown): value is T;
    describe(value: T): string;
    locate?(value: T): ErrorContext | undefined;
}

export interface PayloadTypeOptions<T> {
    name: string;
    /** Kind used when a raw value is absorbed by `ErrorValue.fromExternal`. Defaults to Custom. */
    kind?: ErrorKind;
    is(value: unknown): value is T;
    describe(value: T): string;
    locate?(value: T): ErrorContext | undefined;
}

export interface Payload<T> {
    readonly type: PayloadType<T>;
    readonly value: T;
}

/**
 * Defines a new payload type. Every call mints a fresh id, so two
 * definitions never match each other even under the same name.
 */
export function definePayloadType<T>(options: PayloadTypeOptions<T>): PayloadType<T> {
    return Object.freeze({
        id: uuidv4(),
        name: options.name,
        kind: options.kind ?? ErrorKind.Custom,
        is: options.is,
        describe: options.describe,
        locate: options.locate,
    });
}

export function payloadOf<T>(type: PayloadType<T>, value: T): Payload<T> {
    return Object.freeze({ type, value });
}
