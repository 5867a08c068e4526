/**
 * config.ts - Environment configuration
 *
 * Parsed once at startup. Invalid values fail fast with the offending
 * variable named in the error.
 */

import { z } from 'zod';

const configSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    HOST: z.string().min(1).default('0.0.0.0'),
    DATA_DIR: z.string().min(1).default('./data'),
    PERSISTENCE: z.enum(['file', 'memory']).default('file'),
    SAVE_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    SAVE_RETRY_BASE_MS: z.coerce.number().int().min(0).default(500),
    ROOM_IDLE_TTL_MS: z.coerce.number().int().min(0).default(30 * 60 * 1000),
    EVICTION_INTERVAL_MS: z.coerce.number().int().min(1000).default(60 * 1000),
    CORS_ORIGIN: z.string().min(1).default('*'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

export type ServerConfig = {
    port: number;
    host: string;
    dataDir: string;
    persistence: 'file' | 'memory';
    saveMaxAttempts: number;
    saveRetryBaseMs: number;
    /** 0 disables idle eviction */
    roomIdleTtlMs: number;
    evictionIntervalMs: number;
    corsOrigin: string;
    logLevel: 'debug' | 'info' | 'warn' | 'error';
};

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
    // Empty strings count as unset
    const defined: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value !== '') {
            defined[key] = value;
        }
    }

    const result = configSchema.safeParse(defined);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }

    const parsed = result.data;
    return {
        port: parsed.PORT,
        host: parsed.HOST,
        dataDir: parsed.DATA_DIR,
        persistence: parsed.PERSISTENCE,
        saveMaxAttempts: parsed.SAVE_MAX_ATTEMPTS,
        saveRetryBaseMs: parsed.SAVE_RETRY_BASE_MS,
        roomIdleTtlMs: parsed.ROOM_IDLE_TTL_MS,
        evictionIntervalMs: parsed.EVICTION_INTERVAL_MS,
        corsOrigin: parsed.CORS_ORIGIN,
        logLevel: parsed.LOG_LEVEL
    };
}
