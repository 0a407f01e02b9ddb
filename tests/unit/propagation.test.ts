// tests/unit/propagation.test.ts

import { ErrorFactory, ErrorKind, ErrorValue, PayloadTypes } from '../../src/core/errors';
import {
    andThen,
    err,
    expectValue,
    ignore,
    isErr,
    isOk,
    map,
    ok,
    passThrough,
    recover,
    Result,
    rethrowWithContext,
    tryCatch,
    tryCatchAsync,
    unwrap,
    wrapErr,
} from '../../src/core/propagation';
import { captureThrown, ioFailure } from '../helpers';

function failureOf<T>(result: Result<T>): ErrorValue {
    if (result.ok) throw new Error('Expected a failure');
    return result.error;
}

describe('Propagation protocol', () => {
    describe('Result', () => {
        it('should tell successes from failures', () => {
            const success: Result<number> = ok(1);
            const failure: Result<number> = err(ErrorFactory.validation('bad input'));

            expect(isOk(success)).toBe(true);
            expect(isErr(success)).toBe(false);
            expect(isOk(failure)).toBe(false);
            expect(isErr(failure)).toBe(true);
        });

        it('should map and chain successes only', () => {
            const failure = err(ErrorFactory.validation('bad input'));

            expect(map(ok(2), value => value * 3)).toEqual(ok(6));
            expect(andThen(ok(2), value => ok(`${value}!`))).toEqual(ok('2!'));
            expect(map(failure, () => 'unused')).toBe(failure);
            expect(andThen(failure, () => ok('unused'))).toBe(failure);
        });
    });

    describe('tryCatch', () => {
        it('should return the value when nothing is thrown', () => {
            expect(tryCatch(() => 42)).toEqual(ok(42));
        });

        it('should absorb a thrown external error', () => {
            const failure = ioFailure('permission denied', 'EACCES');
            const error = failureOf(tryCatch(() => { throw failure; }));

            expect(error.kind).toBe(ErrorKind.Io);
            expect(error.downcast(PayloadTypes.Io)).toBe(failure);
        });

        it('should absorb async rejections and synchronous throws alike', async () => {
            const rejected = await tryCatchAsync(async () => { throw new SyntaxError('unexpected end'); });
            const thrown = await tryCatchAsync((): Promise<number> => { throw new SyntaxError('unexpected token'); });

            expect(failureOf(rejected).kind).toBe(ErrorKind.Parse);
            expect(failureOf(thrown).message).toBe('unexpected token');
            expect(await tryCatchAsync(async () => 'done')).toEqual(ok('done'));
        });
    });

    describe('passThrough', () => {
        it('should return the very same result', () => {
            const failure = err(ErrorFactory.validation('bad input'));

            expect(passThrough(failure)).toBe(failure);
        });
    });

    describe('wrapErr', () => {
        it('should wrap a failure and keep the original as its cause', () => {
            const original = ErrorFactory.io('disk unavailable');
            const wrapped = failureOf(wrapErr(err(original), ErrorKind.Custom, 'while saving report'));

            expect(wrapped.kind).toBe(ErrorKind.Custom);
            expect(wrapped.message).toBe('while saving report');
            expect(wrapped.source()).toBe(original);
        });

        it('should leave a success untouched', () => {
            const success = ok('saved');

            expect(wrapErr(success, ErrorKind.Custom, 'while saving report')).toBe(success);
        });

        it('should forward a context to Parse wraps', () => {
            const wrapped = failureOf(wrapErr(
                err(ErrorFactory.validation('bad input')),
                ErrorKind.Parse,
                'while reading rows',
                { context: { path: 'rows.csv', line: 4 } }
            ));

            expect(wrapped.context).toEqual({ path: 'rows.csv', line: 4 });
        });
    });

    describe('recover', () => {
        const notFound = (): Result<string> => err(ErrorValue.fromExternal(ioFailure('no such file')));

        it('should substitute a value for an anticipated failure', () => {
            const result = recover(notFound(), error =>
                error.downcast(PayloadTypes.Io)?.code === 'ENOENT' ? ok('default') : undefined
            );

            expect(result).toEqual(ok('default'));
        });

        it('should let the failure propagate when the handler declines', () => {
            const failure = notFound();

            expect(recover(failure, () => undefined)).toBe(failure);
        });

        it('should replace a failure with a different one', () => {
            const replacement = ErrorFactory.validation('config path is required');
            const result = recover(notFound(), () => err(replacement));

            expect(failureOf(result)).toBe(replacement);
        });

        it('should not call the handler on success', () => {
            const handler = jest.fn(() => ok('other'));

            expect(recover(ok('value'), handler)).toEqual(ok('value'));
            expect(handler).not.toHaveBeenCalled();
        });
    });

    describe('ignore', () => {
        let consoleSpy: jest.SpyInstance;

        beforeEach(() => {
            consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        });

        afterEach(() => {
            consoleSpy.mockRestore();
        });

        it('should require a reason', () => {
            const error = ErrorFactory.validation('bad input');

            expect(() => ignore(error, '  ')).toThrow('ignore() requires a reason');
        });

        it('should log at debug level only', () => {
            ignore(ErrorFactory.validation('bad input'), 'optional field');

            expect(consoleSpy).not.toHaveBeenCalled();
        });

        it('should log the whole rendered chain at debug level', async () => {
            process.env.LOG_LEVEL = 'debug';
            jest.resetModules();
            try {
                const errors = await import('../../src/core/errors');
                const propagation = await import('../../src/core/propagation');
                const error = errors.ErrorFactory.io('disk gone').wrap(errors.ErrorKind.Custom, 'save failed');

                propagation.ignore(error, 'best effort');

                expect(consoleSpy).toHaveBeenCalledTimes(1);
                expect(consoleSpy.mock.calls[0][0]).toMatch(
                    /\[DEBUG\] \[Propagation\] Ignoring error: best effort\n\[Custom\] save failed\n {2}caused by: \[Io\] disk gone$/
                );
            } finally {
                process.env.LOG_LEVEL = 'warn';
            }
        });
    });

    describe('expectValue and unwrap', () => {
        it('should return the value of a success', () => {
            expect(expectValue(ok(5), 'vector empty')).toBe(5);
            expect(unwrap(ok('x'))).toBe('x');
        });

        it('should throw the failure wrapped with the message', () => {
            const original = ErrorFactory.validation('vector is empty');
            const thrown = captureThrown(() => expectValue(err(original), 'expected an element'));

            expect(thrown).toBeInstanceOf(ErrorValue);
            if (!(thrown instanceof ErrorValue)) return;
            expect(thrown.kind).toBe(ErrorKind.Custom);
            expect(thrown.message).toBe('expected an element');
            expect(thrown.source()).toBe(original);
        });

        it('should use a fixed message for unwrap', () => {
            expect(() => unwrap(err(ErrorFactory.validation('bad input')))).toThrow('called unwrap on a failed result');
        });
    });

    describe('rethrowWithContext', () => {
        it('should return the value when nothing is thrown', () => {
            expect(rethrowWithContext(() => 'ok', ErrorKind.Custom, 'unused')).toBe('ok');
        });

        it('should convert and wrap the thrown error before rethrowing', () => {
            const thrown = captureThrown(() =>
                rethrowWithContext(() => JSON.parse('{"a":'), ErrorKind.Parse, 'while reading header', {
                    context: { path: 'header.json' },
                })
            );

            expect(thrown).toBeInstanceOf(ErrorValue);
            if (!(thrown instanceof ErrorValue)) return;
            expect(thrown.render().split('\n')[0]).toBe('[Parse] while reading header (at header.json)');
            expect(thrown.rootCause().downcast(PayloadTypes.Syntax)).toBeInstanceOf(SyntaxError);
        });

        it('should wrap a thrown ErrorValue without converting it again', () => {
            const original = ErrorFactory.validation('bad input');
            const thrown = captureThrown(() =>
                rethrowWithContext(() => { throw original; }, ErrorKind.Custom, 'while importing')
            );

            expect(thrown).toBeInstanceOf(ErrorValue);
            if (!(thrown instanceof ErrorValue)) return;
            expect(thrown.source()).toBe(original);
        });
    });
});
