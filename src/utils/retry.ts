import type { RetrievalConfig } from '../types/config.types.js';
import { RETRIEVAL_DEFAULTS } from '../config/constants.js';

export interface RetryOptions {
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
    retryableErrors?: readonly string[];
    signal?: AbortSignal;
    onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Retry options for remote retrieval
 */
export function getRetryOptions(retrievalConfig: RetrievalConfig): RetryOptions {
    return {
        maxRetries: retrievalConfig.maxRetries,
        initialDelayMs: retrievalConfig.retryDelayMs,
        maxDelayMs: RETRIEVAL_DEFAULTS.MAX_DELAY_MS,
        backoffMultiplier: retrievalConfig.backoffMultiplier,
        retryableErrors: RETRIEVAL_DEFAULTS.RETRYABLE_ERRORS,
    };
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: Error, retryableErrors: readonly string[] = []): boolean {
    if (error.name === 'AbortError') {
        return false;
    }

    const errorString = error.message + (error.name || '');
    const errorCode = 'code' in error && typeof error.code === 'string' ? error.code : '';

    return retryableErrors.some(pattern =>
        errorString.includes(pattern) || errorCode === pattern
    );
}

/**
 * Calculate delay with exponential backoff
 */
export function calculateBackoffDelay(
    attempt: number,
    initialDelayMs: number,
    backoffMultiplier: number,
    maxDelayMs: number
): number {
    const delay = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
    // +/-10% jitter
    const jitter = delay * 0.1 * (Math.random() * 2 - 1);
    return Math.min(delay + jitter, maxDelayMs);
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions
): Promise<T> {
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= options.maxRetries + 1; attempt++) {
        try {
            return await fn();
        } catch (error) {
            lastError = error instanceof Error ? error : new Error(String(error));

            if (attempt > options.maxRetries || options.signal?.aborted) {
                break;
            }

            if (!isRetryableError(lastError, options.retryableErrors)) {
                throw lastError;
            }

            const delayMs = calculateBackoffDelay(
                attempt,
                options.initialDelayMs,
                options.backoffMultiplier,
                options.maxDelayMs
            );

            options.onRetry?.(attempt, lastError, delayMs);

            await sleep(delayMs);
        }
    }

    throw lastError;
}
