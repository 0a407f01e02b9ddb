export { ErrorKind } from './ErrorKind';
export { ErrorContext, formatLocation } from './ErrorContext';
export { definePayloadType, payloadOf, Payload, PayloadType, PayloadTypeOptions } from './PayloadType';
export { PayloadTypes, IoFailure, describeUnknown } from './payloads';
export { Backtrace } from './Backtrace';
export { configureBacktraceCapture, isBacktraceCaptureEnabled } from './backtraceFlag';
export { ErrorValue, ErrorValueJSON, ErrorValueOptions, isErrorValue } from './ErrorValue';
export { ErrorFactory } from './errorFactory';
