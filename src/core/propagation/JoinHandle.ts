// src/core/propagation/JoinHandle.ts

import assert from 'assert';
import { tryCatchAsync } from './policies';
import { err, ok, Result } from './Result';

/**
 * Handle to a task started with `spawn`. Its outcome, failure included,
 * is handed to exactly one joiner.
 */
export class JoinHandle<T> {
    private readonly settled: Promise<Result<T>>;
    private joined: boolean = false;

    constructor(task: () => Promise<T>) {
        // tryCatchAsync never rejects, so the task cannot surface as an unhandled rejection
        this.settled = tryCatchAsync(task);
    }

    public isJoined(): boolean {
        return this.joined;
    }

    public join(): Promise<Result<T>> {
        assert.ok(!this.joined, 'JoinHandle has already been joined');
        this.joined = true;
        return this.settled;
    }
}

export function spawn<T>(task: () => Promise<T>): JoinHandle<T> {
    return new JoinHandle(task);
}

/**
 * Joins every handle; the first failure in handle order wins.
 */
export async function joinAll<T>(handles: readonly JoinHandle<T>[]): Promise<Result<T[]>> {
    const results = await Promise.all(handles.map(handle => handle.join()));
    const values: T[] = [];
    for (const result of results) {
        if (!result.ok) {
            return err(result.error);
        }
        values.push(result.value);
    }
    return ok(values);
}
