// src/core/errors/ErrorKind.ts

/**
 * Closed set of error kinds. Application-specific shapes live under
 * `Custom`, told apart by their payload type.
 */
export enum ErrorKind {
    Io = 'Io',
    Parse = 'Parse',
    Validation = 'Validation',
    Custom = 'Custom',
}
