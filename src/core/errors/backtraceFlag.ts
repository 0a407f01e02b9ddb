// src/core/errors/backtraceFlag.ts

import assert from 'assert';
import { ENV } from '../../config/env';

// Process-wide; resolved once, then only read.
let captureEnabled: boolean | undefined;

/**
 * Sets the capture flag explicitly. Must run at startup, before anything
 * has read the flag, and at most once.
 */
export function configureBacktraceCapture(enabled: boolean): void {
    assert.ok(captureEnabled === undefined, 'Backtrace capture flag is already set');
    captureEnabled = enabled;
}

export function isBacktraceCaptureEnabled(): boolean {
    if (captureEnabled === undefined) {
        captureEnabled = ENV.FAULTLINE_BACKTRACE;
    }
    return captureEnabled;
}
