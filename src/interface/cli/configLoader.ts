// src/interface/cli/configLoader.ts

import fs from 'fs';
import { z } from 'zod';
import { CONFIG } from '../../config/config';
import { ErrorFactory } from '../../core/errors/errorFactory';
import { ErrorKind } from '../../core/errors/ErrorKind';
import { ErrorValue } from '../../core/errors/ErrorValue';
import { PayloadTypes } from '../../core/errors/payloads';
import { Logger } from '../../core/logging/Logger';
import { parseInteger } from '../../core/parsing/parseInteger';
import { passThrough, recover, tryCatch, wrapErr } from '../../core/propagation/policies';
import { andThen, err, map, ok, Result } from '../../core/propagation/Result';

const AppConfigSchema = z.object({
    name: z.string().min(1),
    port: z.number().int().min(CONFIG.DEMO.MIN_PORT).max(CONFIG.DEMO.MAX_PORT),
    retries: z.number().int().min(0).default(3),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_APP_CONFIG: AppConfig = Object.freeze({
    name: 'faultline-demo',
    port: 8080,
    retries: 3,
});

function isMissingFile(error: ErrorValue): boolean {
    return error.downcast(PayloadTypes.Io)?.code === 'ENOENT';
}

function readConfigText(filePath: string): Result<string> {
    return passThrough(tryCatch(() => fs.readFileSync(filePath, 'utf8')));
}

function validateConfig(raw: unknown): Result<AppConfig> {
    const parsed = AppConfigSchema.safeParse(raw);
    return parsed.success ? ok(parsed.data) : err(ErrorValue.fromExternal(parsed.error));
}

export function parseConfig(text: string, filePath: string): Result<AppConfig> {
    const json = wrapErr(
        tryCatch((): unknown => JSON.parse(text)),
        ErrorKind.Parse,
        `while parsing ${filePath}`,
        { context: { path: filePath } }
    );
    return andThen(json, raw =>
        wrapErr(validateConfig(raw), ErrorKind.Validation, `invalid configuration in ${filePath}`)
    );
}

/**
 * Loads and validates a JSON config file. A missing file falls back to
 * `DEFAULT_APP_CONFIG`; every other failure propagates.
 */
export function loadConfig(filePath: string): Result<AppConfig> {
    const loaded = andThen(readConfigText(filePath), text => parseConfig(text, filePath));
    return recover(loaded, error => {
        if (!isMissingFile(error)) {
            return undefined;
        }
        Logger.info('ConfigLoader', `No config at ${filePath}, using defaults`);
        return ok(DEFAULT_APP_CONFIG);
    });
}

/**
 * Replaces the configured port with a command-line override.
 */
export function applyPortOverride(config: AppConfig, text: string): Result<AppConfig> {
    const port = wrapErr(tryCatch(() => parseInteger(text)), ErrorKind.Validation, 'invalid --port override');
    const inRange = andThen(port, value =>
        value >= CONFIG.DEMO.MIN_PORT && value <= CONFIG.DEMO.MAX_PORT
            ? ok(value)
            : err(ErrorFactory.validation(`port ${value} is outside ${CONFIG.DEMO.MIN_PORT}-${CONFIG.DEMO.MAX_PORT}`))
    );
    return map(inRange, value => ({ ...config, port: value }));
}
