// tests/helpers.ts

/**
 * Builds the shape Node's fs functions throw, without touching the disk.
 */
export function ioFailure(message: string, code: string = 'ENOENT', syscall: string = 'open'): NodeJS.ErrnoException {
    return Object.assign(new Error(message), { code, syscall, errno: -2, path: 'app.json' });
}

export function captureThrown(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected function to throw');
}
