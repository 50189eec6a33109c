import { availableParallelism } from 'os';
import { z } from 'zod';
import { OnErrorEnum, SpanPolicyEnum } from './enums.js';
import type { OnErrorEnumType, SpanPolicyEnumType } from './enums.js';
import { PRESIGN_DEFAULTS, RASTER_DEFAULTS, RETRIEVAL_DEFAULTS } from '../config/constants.js';

/**
 * Batch execution configuration
 */
export interface BatchConfig {
    /** Maximum records processed at once (default: available parallelism) */
    concurrency: number;
    /** Failure policy (default: 'continue') */
    onError: OnErrorEnumType;
    /** Per-record time budget in milliseconds, unset for none */
    taskTimeoutMs?: number;
}

/**
 * Span handling configuration
 */
export interface SpanConfig {
    /** Out-of-range offset policy (default: 'clamp') */
    policy: SpanPolicyEnumType;
}

/**
 * Page rasterization configuration
 */
export interface RasterConfig {
    /** Longest side of the page image in pixels (default: 2048) */
    targetLongestDim: number;
    /** WebP quality 1-100 (default: 80) */
    webpQuality: number;
    /** pdftoppm executable (default: 'pdftoppm' on PATH) */
    pdftoppmPath: string;
}

/**
 * Presigned link configuration
 */
export interface LinkConfig {
    /** Link expiry in seconds, strictly below 7 days (default: 604700) */
    ttlSeconds: number;
}

/**
 * Retry configuration for remote retrieval
 */
export interface RetrievalConfig {
    /** Maximum retry attempts (default: 3) */
    maxRetries: number;
    /** Initial retry delay in milliseconds (default: 500) */
    retryDelayMs: number;
    /** Backoff multiplier for exponential retry (default: 2) */
    backoffMultiplier: number;
}

/**
 * Logging configuration
 */
export interface LogConfig {
    /** Log level */
    level: 'debug' | 'info' | 'warn' | 'error';
    /** Enable structured JSON logging (default: true) */
    structured: boolean;
    /** Custom logger function */
    customLogger?: (level: string, message: string, meta?: Record<string, unknown>) => void;
}

/**
 * Main pipeline configuration
 */
export interface PipelineConfig {
    /** Directory the HTML previews are written to */
    outputDir: string;
    batchConfig?: Partial<BatchConfig>;
    spanConfig?: Partial<SpanConfig>;
    rasterConfig?: Partial<RasterConfig>;
    linkConfig?: Partial<LinkConfig>;
    retrievalConfig?: Partial<RetrievalConfig>;
    logging?: Partial<LogConfig>;
}

/**
 * Internal resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
    outputDir: string;
    batchConfig: BatchConfig;
    spanConfig: SpanConfig;
    rasterConfig: RasterConfig;
    linkConfig: LinkConfig;
    retrievalConfig: RetrievalConfig;
    logging: LogConfig;
}

/**
 * Default configuration values
 */
export const DEFAULT_BATCH_CONFIG: BatchConfig = {
    concurrency: availableParallelism(),
    onError: OnErrorEnum.CONTINUE,
};

export const DEFAULT_SPAN_CONFIG: SpanConfig = {
    policy: SpanPolicyEnum.CLAMP,
};

export const DEFAULT_RASTER_CONFIG: RasterConfig = {
    targetLongestDim: RASTER_DEFAULTS.TARGET_LONGEST_DIM,
    webpQuality: RASTER_DEFAULTS.WEBP_QUALITY,
    pdftoppmPath: RASTER_DEFAULTS.PDFTOPPM_BINARY,
};

export const DEFAULT_LINK_CONFIG: LinkConfig = {
    ttlSeconds: PRESIGN_DEFAULTS.TTL_SECONDS,
};

export const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
    maxRetries: RETRIEVAL_DEFAULTS.MAX_RETRIES,
    retryDelayMs: RETRIEVAL_DEFAULTS.RETRY_DELAY_MS,
    backoffMultiplier: RETRIEVAL_DEFAULTS.BACKOFF_MULTIPLIER,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
    level: 'info',
    structured: true,
};

/**
 * Zod schema for config validation
 */
export const configSchema = z.object({
    outputDir: z.string().min(1, 'Output directory is required'),
    batchConfig: z
        .object({
            concurrency: z.number().int().min(1).max(256).optional(),
            onError: z.enum([OnErrorEnum.ABORT, OnErrorEnum.CONTINUE]).optional(),
            taskTimeoutMs: z.number().int().min(1000).optional(),
        })
        .optional(),
    spanConfig: z
        .object({
            policy: z.enum([SpanPolicyEnum.CLAMP, SpanPolicyEnum.REJECT]).optional(),
        })
        .optional(),
    rasterConfig: z
        .object({
            targetLongestDim: z.number().int().min(64).max(10000).optional(),
            webpQuality: z.number().int().min(1).max(100).optional(),
            pdftoppmPath: z.string().min(1).optional(),
        })
        .optional(),
    linkConfig: z
        .object({
            ttlSeconds: z
                .number()
                .int()
                .min(1)
                .lt(PRESIGN_DEFAULTS.MAX_TTL_SECONDS, 'Link TTL must stay below the 7 day S3 maximum')
                .optional(),
        })
        .optional(),
    retrievalConfig: z
        .object({
            maxRetries: z.number().int().min(0).max(10).optional(),
            retryDelayMs: z.number().int().min(10).max(60000).optional(),
            backoffMultiplier: z.number().min(1).max(5).optional(),
        })
        .optional(),
    logging: z
        .object({
            level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
            structured: z.boolean().optional(),
        })
        .optional(),
});
