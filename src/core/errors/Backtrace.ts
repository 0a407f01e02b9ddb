// src/core/errors/Backtrace.ts

import { CONFIG } from '../../config/config';
import { isBacktraceCaptureEnabled } from './backtraceFlag';

interface StackHolder {
    stack?: string;
}

/**
 * Call-stack snapshot. The stack is recorded eagerly but only formatted
 * and split into frames on first access.
 */
export class Backtrace {
    private readonly holder: StackHolder;
    private cachedFrames?: readonly string[];

    private constructor(holder: StackHolder) {
        this.holder = holder;
    }

    /**
     * Records the current stack, omitting `skip` and every frame above it.
     */
    public static capture(skip?: Function): Backtrace {
        const holder: StackHolder = {};
        Error.captureStackTrace(holder, skip);
        return new Backtrace(holder);
    }

    /**
     * Captures only when the process-wide flag is on.
     */
    public static captureIfEnabled(skip?: Function): Backtrace | undefined {
        return isBacktraceCaptureEnabled() ? Backtrace.capture(skip) : undefined;
    }

    public get frames(): readonly string[] {
        if (this.cachedFrames === undefined) {
            this.cachedFrames = Object.freeze(
                (this.holder.stack ?? '')
                    .split('\n')
                    .map(line => line.trim())
                    .filter(line => line.startsWith('at '))
                    .slice(0, CONFIG.RENDER.MAX_FRAMES)
            );
        }
        return this.cachedFrames;
    }
}
