// src/core/errors/errorFactory.ts

import { ErrorContext } from './ErrorContext';
import { ErrorKind } from './ErrorKind';
import { ErrorValue } from './ErrorValue';
import { payloadOf, PayloadType } from './PayloadType';
import { IoFailure, PayloadTypes } from './payloads';

/**
 * Shorthands for terminal errors of each kind.
 */
export class ErrorFactory {
    static io(message: string, failure?: IoFailure): ErrorValue {
        return ErrorValue.create(ErrorKind.Io, message, {
            payload: failure ? payloadOf(PayloadTypes.Io, failure) : undefined,
        });
    }

    static parse(message: string, context?: ErrorContext): ErrorValue {
        return ErrorValue.create(ErrorKind.Parse, message, { context });
    }

    static validation(message: string): ErrorValue {
        return ErrorValue.create(ErrorKind.Validation, message);
    }

    /**
     * Boxes an application-defined value. The message defaults to the
     * type's own description of it.
     */
    static custom<T>(type: PayloadType<T>, value: T, message?: string): ErrorValue {
        return ErrorValue.create(ErrorKind.Custom, message ?? type.describe(value), {
            payload: payloadOf(type, value),
        });
    }
}
