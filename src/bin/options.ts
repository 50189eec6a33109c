import { z } from 'zod';
import type { PipelineConfig } from '../types/config.types.js';
import { OnErrorEnum, SpanPolicyEnum } from '../types/enums.js';
import type { StorageClientOptions } from '../services/storage.client.js';
import type { Env } from '../config/env.js';
import { ConfigurationError } from '../errors/index.js';
import { OUTPUT_DEFAULTS } from '../config/constants.js';

const positiveInt = z.coerce.number().int().positive();

/**
 * Raw commander options, keyed as commander names them
 */
export const cliOptionsSchema = z.object({
    output_dir: z.string().min(1).default(OUTPUT_DEFAULTS.OUTPUT_DIR),
    template_path: z.string().min(1).optional(),
    on_error: z.enum([OnErrorEnum.ABORT, OnErrorEnum.CONTINUE]).default(OnErrorEnum.CONTINUE),
    span_policy: z.enum([SpanPolicyEnum.CLAMP, SpanPolicyEnum.REJECT]).default(SpanPolicyEnum.CLAMP),
    concurrency: positiveInt.optional(),
    task_timeout_ms: positiveInt.optional(),
    link_ttl_seconds: positiveInt.optional(),
    profile: z.string().min(1).optional(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

/**
 * Validate commander output
 * @throws ConfigurationError naming each bad flag
 */
export function parseCliOptions(raw: Record<string, unknown>): CliOptions {
    const result = cliOptionsSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `--${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid options: ${issues}`);
    }
    return result.data;
}

/**
 * Merge CLI flags over the environment into a pipeline config.
 * Flags win over environment variables.
 */
export function toPipelineConfig(options: CliOptions, env: Env, prettyLogs: boolean): PipelineConfig {
    return {
        outputDir: options.output_dir,
        batchConfig: {
            onError: options.on_error,
            ...(options.concurrency !== undefined ? { concurrency: options.concurrency } : {}),
            ...(options.task_timeout_ms !== undefined ? { taskTimeoutMs: options.task_timeout_ms } : {}),
        },
        spanConfig: {
            policy: options.span_policy,
        },
        rasterConfig: env.PDFTOPPM_PATH ? { pdftoppmPath: env.PDFTOPPM_PATH } : {},
        linkConfig: options.link_ttl_seconds !== undefined
            ? { ttlSeconds: options.link_ttl_seconds }
            : {},
        logging: {
            level: env.LOG_LEVEL,
            structured: !(env.LOG_PRETTY ?? prettyLogs),
        },
    };
}

/**
 * S3 client settings from flags and environment
 */
export function toStorageOptions(options: CliOptions, env: Env): StorageClientOptions {
    return {
        profile: options.profile ?? env.AWS_PROFILE,
        region: env.AWS_REGION,
        endpoint: env.S3_ENDPOINT_URL,
        forcePathStyle: env.S3_FORCE_PATH_STYLE,
    };
}
