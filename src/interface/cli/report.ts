// src/interface/cli/report.ts

import { ErrorValue } from '../../core/errors/ErrorValue';
import { Logger } from '../../core/logging/Logger';
import { tryCatchAsync } from '../../core/propagation/policies';
import { Result } from '../../core/propagation/Result';

export interface TextSink {
    write(chunk: string): boolean;
}

/**
 * Renders an error that reached the top level and marks the process as failed.
 */
export function report(error: ErrorValue, sink: TextSink = process.stderr): void {
    Logger.debug('Report', `Unhandled ${error.kind} error reached the top level`);
    sink.write(`${error.render()}\n`);
    process.exitCode = 1;
}

/**
 * Entry-point wrapper: a failure result or anything thrown is reported.
 */
export async function runMain(
    main: () => Result<void> | Promise<Result<void>>,
    sink: TextSink = process.stderr
): Promise<void> {
    const outcome = await tryCatchAsync(async () => main());
    if (!outcome.ok) {
        report(outcome.error, sink);
    } else if (!outcome.value.ok) {
        report(outcome.value.error, sink);
    }
}
