// src/core/parsing/parseInteger.ts

/**
 * Thrown by `parseInteger` when the text is not a base-10 integer.
 */
export class NumberFormatError extends Error {
    public readonly input: string;
    public readonly column: number;   // 1-based, within the trimmed input

    constructor(message: string, input: string, column: number) {
        super(message);
        this.name = 'NumberFormatError';
        this.input = input;
        this.column = column;
    }
}

/**
 * Strict integer parsing: optional sign, digits only, surrounding
 * whitespace ignored, result must be a safe integer.
 */
export function parseInteger(text: string): number {
    const input = text.trim();
    if (input.length === 0) {
        throw new NumberFormatError('cannot parse integer from empty string', text, 1);
    }

    // Code points, so columns and quoted characters match what the user typed
    const chars = Array.from(input);
    const start = chars[0] === '+' || chars[0] === '-' ? 1 : 0;
    if (start === chars.length) {
        throw new NumberFormatError(`invalid integer '${input}'`, text, 1);
    }

    for (let i = start; i < chars.length; i++) {
        const ch = chars[i];
        if (ch < '0' || ch > '9') {
            throw new NumberFormatError(`invalid digit '${ch}' in '${input}'`, text, i + 1);
        }
    }

    const value = Number(input);
    if (!Number.isSafeInteger(value)) {
        throw new NumberFormatError(`integer '${input}' is out of range`, text, 1);
    }
    return value === 0 ? 0 : value;
}
