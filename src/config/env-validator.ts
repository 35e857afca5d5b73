import path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger';

const optionalSecret = z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : undefined));

export const envSchema = z
    .object({
        PORT: z.coerce.number().int().min(1).max(65535).default(4000),
        NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
        LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
        DATA_DIR: z.string().min(1).default('data'),
        GEMINI_API_KEY: optionalSecret,
        GEMINI_MODEL: z.string().min(1).default('gemini-1.5-flash'),
        AI_TIMEOUT_MS: z.coerce.number().int().min(500).max(60000).default(8000),
        MIN_CREDITS: z.coerce.number().int().min(0).default(12),
        MAX_CREDITS: z.coerce.number().int().min(1).default(18),
        MAX_COURSES_PER_SEMESTER: z.coerce.number().int().min(1).default(5),
        RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(300),
    })
    .refine((env) => env.MIN_CREDITS <= env.MAX_CREDITS, {
        message: 'MIN_CREDITS must not exceed MAX_CREDITS',
        path: ['MIN_CREDITS'],
    });

export interface AppConfig {
    port: number;
    nodeEnv: 'development' | 'production' | 'test';
    logLevel: 'debug' | 'info' | 'warn' | 'error';
    dataDir: string;
    ai: {
        apiKey?: string;
        model: string;
        timeoutMs: number;
    };
    schedule: {
        minCredits: number;
        maxCredits: number;
        maxCoursesPerSemester: number;
    };
    rateLimitMax: number;
}

/**
 * Parses the process environment into typed configuration.
 * Throws ZodError on invalid values; a missing GEMINI_API_KEY is not an error.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.parse(env);

    return {
        port: parsed.PORT,
        nodeEnv: parsed.NODE_ENV,
        logLevel: parsed.LOG_LEVEL,
        dataDir: path.resolve(process.cwd(), parsed.DATA_DIR),
        ai: {
            apiKey: parsed.GEMINI_API_KEY,
            model: parsed.GEMINI_MODEL,
            timeoutMs: parsed.AI_TIMEOUT_MS,
        },
        schedule: {
            minCredits: parsed.MIN_CREDITS,
            maxCredits: parsed.MAX_CREDITS,
            maxCoursesPerSemester: parsed.MAX_COURSES_PER_SEMESTER,
        },
        rateLimitMax: parsed.RATE_LIMIT_MAX,
    };
}

export function validateEnv(): AppConfig {
    const result = envSchema.safeParse(process.env);

    if (!result.success) {
        logger.error('Invalid environment configuration - aborting startup', {
            issues: result.error.issues.map((issue) => `${issue.path.join('.')} : ${issue.message}`),
        });
        process.exit(1);
    }

    return loadConfig(process.env);
}
