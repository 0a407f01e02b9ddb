// src/core/errors/ErrorValue.ts

import assert from 'assert';
import { CONFIG } from '../../config/config';
import { Backtrace } from './Backtrace';
import { isBacktraceCaptureEnabled } from './backtraceFlag';
import { assertValidContext, ErrorContext, formatLocation } from './ErrorContext';
import { ErrorKind } from './ErrorKind';
import { Payload, payloadOf, PayloadType } from './PayloadType';
import { detectPayloadType, PayloadTypes } from './payloads';

export interface ErrorValueOptions {
    /** Positional metadata; only accepted on Parse errors. */
    context?: ErrorContext;
    /** Concrete value to box. Defaults to the message under `PayloadTypes.Message`. */
    payload?: Payload<unknown>;
}

export interface ErrorValueJSON {
    name: string;
    kind: ErrorKind;
    message: string;
    payloadType: { id: string; name: string };
    context?: ErrorContext;
    backtrace?: readonly string[];
    cause?: ErrorValueJSON;
}

interface ErrorValueInit {
    kind: ErrorKind;
    message: string;
    context?: ErrorContext;
    payload: Payload<unknown>;
    cause?: ErrorValue;
    backtrace?: Backtrace;
}

/**
 * Immutable, type-erased error node. Each node optionally owns exactly one
 * cause, so a chain runs from the outermost context down to the root cause.
 * New information is added by wrapping, never by mutation.
 */
export class ErrorValue extends Error {
    public readonly kind: ErrorKind;
    public readonly context?: ErrorContext;
    public readonly payload: Payload<unknown>;
    public readonly backtrace?: Backtrace;
    private readonly causeNode?: ErrorValue;

    private constructor(init: ErrorValueInit) {
        assert.ok(init.message.trim().length > 0, 'ErrorValue message must not be empty');
        if (init.context !== undefined) {
            assert.ok(init.kind === ErrorKind.Parse, `Context is only allowed on Parse errors, got ${init.kind}`);
            assertValidContext(init.context);
        }

        // Backtrace is the only capture path; keep the engine from recording `stack`
        const stackTraceLimit = Error.stackTraceLimit;
        if (!isBacktraceCaptureEnabled()) {
            Error.stackTraceLimit = 0;
        }
        super(init.message, init.cause ? { cause: init.cause } : undefined);
        Error.stackTraceLimit = stackTraceLimit;

        this.name = 'ErrorValue';
        this.kind = init.kind;
        this.context = init.context ? Object.freeze({ ...init.context }) : undefined;
        this.payload = init.payload;
        this.backtrace = init.backtrace;
        this.causeNode = init.cause;

        Object.freeze(this);
    }

    /**
     * Builds a terminal node with no cause.
     */
    public static create(kind: ErrorKind, message: string, options: ErrorValueOptions = {}): ErrorValue {
        return new ErrorValue({
            kind,
            message,
            context: options.context,
            payload: options.payload ?? payloadOf(PayloadTypes.Message, message),
            backtrace: Backtrace.captureIfEnabled(ErrorValue.create),
        });
    }

    /**
     * Builds a node that owns `cause`. The cause is left untouched and its
     * backtrace, which points at the origin, is carried over.
     */
    public static wrap(cause: ErrorValue, kind: ErrorKind, message: string, options: ErrorValueOptions = {}): ErrorValue {
        return new ErrorValue({
            kind,
            message,
            context: options.context,
            payload: options.payload ?? payloadOf(PayloadTypes.Message, message),
            cause,
            backtrace: cause.backtrace,
        });
    }

    /**
     * Converts an error thrown or returned by an external collaborator.
     * Without an explicit type the built-in payload types are tried in order.
     * An ErrorValue is returned as-is.
     */
    public static fromExternal<T>(payload: unknown, type?: PayloadType<T>): ErrorValue {
        if (payload instanceof ErrorValue) {
            return payload;
        }

        const resolved: PayloadType<unknown> = type ?? detectPayloadType(payload);
        if (!resolved.is(payload)) {
            assert.fail(`Value does not match payload type '${resolved.name}'`);
        }

        const described = resolved.describe(payload);
        const located = resolved.kind === ErrorKind.Parse && resolved.locate
            ? resolved.locate(payload)
            : undefined;

        return new ErrorValue({
            kind: resolved.kind,
            message: described.trim().length > 0 ? described : resolved.name,
            context: located,
            payload: payloadOf(resolved, payload),
            backtrace: Backtrace.captureIfEnabled(ErrorValue.fromExternal),
        });
    }

    /**
     * Instance form of `ErrorValue.wrap`: this node becomes the cause.
     */
    public wrap(kind: ErrorKind, message: string, options: ErrorValueOptions = {}): ErrorValue {
        return ErrorValue.wrap(this, kind, message, options);
    }

    public get payloadTypeId(): string {
        return this.payload.type.id;
    }

    /** Immediate cause, or undefined for a terminal node. */
    public source(): ErrorValue | undefined {
        return this.causeNode;
    }

    /**
     * Recovers the boxed value if this node (and only this node) carries
     * a payload of the given type.
     */
    public downcast<T>(type: PayloadType<T>): T | undefined {
        if (this.payload.type.id !== type.id) {
            return undefined;
        }
        const value = this.payload.value;
        return type.is(value) ? value : undefined;
    }

    public *chain(): IterableIterator<ErrorValue> {
        let node: ErrorValue | undefined = this;
        while (node !== undefined) {
            yield node;
            node = node.causeNode;
        }
    }

    public rootCause(): ErrorValue {
        let root: ErrorValue = this;
        for (const node of this.chain()) {
            root = node;
        }
        return root;
    }

    /**
     * One line per link, outermost first, followed by the innermost captured
     * backtrace when there is one.
     */
    public render(): string {
        const { INDENT, CAUSE_PREFIX, BACKTRACE_HEADER } = CONFIG.RENDER;
        const lines: string[] = [];
        let backtrace: Backtrace | undefined;

        let depth = 0;
        for (const node of this.chain()) {
            lines.push(depth === 0 ? node.describeLink() : `${INDENT.repeat(depth)}${CAUSE_PREFIX}${node.describeLink()}`);
            backtrace = node.backtrace ?? backtrace;
            depth++;
        }

        if (backtrace) {
            lines.push(BACKTRACE_HEADER);
            for (const frame of backtrace.frames) {
                lines.push(`${INDENT}${frame}`);
            }
        }

        return lines.join('\n');
    }

    public toJSON(): ErrorValueJSON {
        return {
            name: this.name,
            kind: this.kind,
            message: this.message,
            payloadType: { id: this.payload.type.id, name: this.payload.type.name },
            context: this.context,
            backtrace: this.backtrace?.frames,
            cause: this.causeNode?.toJSON(),
        };
    }

    /**
     * Detailed string representation for internal logging.
     */
    public toDebugString(): string {
        return JSON.stringify(this.toJSON(), null, 2);
    }

    private describeLink(): string {
        const message = this.message.replace(/\s*\r?\n\s*/g, ' ');
        const location = this.context ? ` (at ${formatLocation(this.context)})` : '';
        return `[${this.kind}] ${message}${location}`;
    }
}

export function isErrorValue(value: unknown): value is ErrorValue {
    return value instanceof ErrorValue;
}
