/**
 * Centralized Environment Configuration
 *
 * Validates the environment variables the CLI reads, with Zod.
 * Parsing is lazy so that library users never trip over an unrelated
 * variable.
 *
 * @example
 * ```typescript
 * import { getEnv } from './config/env.js';
 * const { LOG_LEVEL, AWS_PROFILE } = getEnv();
 * ```
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

const booleanString = z
    .enum(['true', 'false'])
    .transform(value => value === 'true');

/**
 * Environment variable schema with validation
 */
export const envSchema = z.object({
    /**
     * Log level for the logger
     * @default 'info'
     */
    LOG_LEVEL: z
        .enum(['debug', 'info', 'warn', 'error'])
        .default('info')
        .describe('Log level: debug, info, warn, error'),

    /**
     * Human-readable log output through pino-pretty.
     * Unset means: pretty when stderr is a TTY.
     */
    LOG_PRETTY: booleanString
        .optional()
        .describe('Force pretty (true) or JSON (false) log output'),

    /** Named profile from ~/.aws/config */
    AWS_PROFILE: z
        .string()
        .optional()
        .describe('AWS profile used for S3 access and link signing'),

    AWS_REGION: z
        .string()
        .optional()
        .describe('AWS region of the S3 client'),

    /** MinIO, LocalStack or another S3-compatible endpoint */
    S3_ENDPOINT_URL: z
        .string()
        .url()
        .optional()
        .describe('Custom S3 endpoint URL'),

    S3_FORCE_PATH_STYLE: booleanString
        .default('false')
        .describe('Use path-style S3 addressing'),

    PDFTOPPM_PATH: z
        .string()
        .min(1)
        .optional()
        .describe('Path to the pdftoppm executable'),
});

/**
 * Validated environment type
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse environment variables with validation
 * @throws ConfigurationError listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const result = envSchema.safeParse(source);

    if (!result.success) {
        const errors = result.error.issues
            .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Environment validation failed:\n${errors}`);
    }

    return result.data;
}

let cachedEnv: Env | undefined;

/**
 * Validated environment variables, parsed on first use
 */
export function getEnv(): Env {
    if (!cachedEnv) {
        cachedEnv = parseEnv();
    }
    return cachedEnv;
}

