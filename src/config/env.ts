// src/config/env.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from project root, not process.cwd()
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

/**
 * Environment Variable Schema
 * Read once at startup; nothing mutates the parsed result afterwards.
 */
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Overrides the level derived from NODE_ENV
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

    // Backtrace capture for newly constructed terminal errors
    FAULTLINE_BACKTRACE: z.enum(['0', '1', 'true', 'false', 'full'])
        .default('0')
        .transform(value => value !== '0' && value !== 'false'),
});

export type Env = z.infer<typeof envSchema>;

export const ENV: Env = envSchema.parse(process.env);
