import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import logger from '../utils/logger';
import { formatValidationErrors } from '../utils/validators';

export const DEFAULT_ALLOWED_ORIGINS = [
    'http://localhost:3000',
    'http://localhost:5173',
    'http://localhost:4173',
];

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
    OPENAI_API_KEY: z.string().trim().min(1, 'OPENAI_API_KEY is required'),
    OPENAI_MODEL: z.string().trim().min(1).default('gpt-4o-mini-2024-07-18'),
    OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
    OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
    REDIS_HOST: z.string().default('localhost'),
    REDIS_PORT: z.coerce.number().int().positive().default(6379),
    REDIS_PASSWORD: z.string().optional(),
    ALLOWED_ORIGINS: z.string().optional(),
    PORT: z.coerce.number().int().positive().default(8002),
    TRUST_PROXY: booleanFlag,
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    SKIP_STARTUP_PROBE: booleanFlag,
});

export interface AppConfig {
    openai: {
        apiKey: string;
        model: string;
        baseUrl: string;
        timeoutMs: number;
    };
    redis: {
        host: string;
        port: number;
        password?: string;
    };
    allowedOrigins: string[];
    port: number;
    trustProxy: boolean;
    logLevel: string;
    skipStartupProbe: boolean;
}

export function parseOrigins(raw: string | undefined): string[] {
    if (!raw) {
        return DEFAULT_ALLOWED_ORIGINS;
    }
    const origins = raw
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0);
    return origins.length > 0 ? origins : DEFAULT_ALLOWED_ORIGINS;
}

/**
 * Builds the typed configuration from an environment map.
 * Throws with every offending variable listed when the environment is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        throw new Error(`Invalid configuration: ${formatValidationErrors(result.error).join('; ')}`);
    }
    const parsed = result.data;

    return {
        openai: {
            apiKey: parsed.OPENAI_API_KEY,
            model: parsed.OPENAI_MODEL,
            baseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ''),
            timeoutMs: parsed.OPENAI_TIMEOUT_MS,
        },
        redis: {
            host: parsed.REDIS_HOST,
            port: parsed.REDIS_PORT,
            password: parsed.REDIS_PASSWORD || undefined,
        },
        allowedOrigins: parseOrigins(parsed.ALLOWED_ORIGINS),
        port: parsed.PORT,
        trustProxy: parsed.TRUST_PROXY,
        logLevel: parsed.LOG_LEVEL,
        skipStartupProbe: parsed.SKIP_STARTUP_PROBE,
    };
}

// Try the working directory first, then the repository root when started from apps/api
export function loadDotenv(): void {
    const envPaths = [
        path.resolve(process.cwd(), '.env'),
        path.resolve(process.cwd(), '../../.env'),
    ];
    for (const envPath of envPaths) {
        const result = dotenv.config({ path: envPath });
        if (result.error === undefined) {
            logger.info('[STARTUP] Loaded .env', { path: envPath });
            return;
        }
    }
    logger.warn('[STARTUP] Could not find .env file, using process environment', { paths: envPaths });
}
