/**
 * System constants for docpreview
 * Centralizes magic numbers for maintainability
 */

// ============================================
// Presigned links
// ============================================

export const PRESIGN_DEFAULTS = {
    /**
     * Longest expiry S3 accepts for a SigV4 presigned URL (7 days)
     */
    MAX_TTL_SECONDS: 7 * 24 * 3600,

    /**
     * Default expiry, kept under the maximum
     */
    TTL_SECONDS: 7 * 24 * 3600 - 100,
} as const;

// ============================================
// Rasterization
// ============================================

export const RASTER_DEFAULTS = {
    /**
     * Longest side of the rendered page image, in pixels
     */
    TARGET_LONGEST_DIM: 2048,

    /**
     * WebP encoder quality (1-100)
     */
    WEBP_QUALITY: 80,

    /**
     * poppler-utils binary used to rasterize a page
     */
    PDFTOPPM_BINARY: 'pdftoppm',
} as const;

// ============================================
// Output
// ============================================

export const OUTPUT_DEFAULTS = {
    OUTPUT_DIR: 'dolma_previews',
    TEMPLATE_FILE: 'viewer_template.html',
    EXTENSION: '.html',
} as const;

// ============================================
// Batch
// ============================================

export const BATCH_DEFAULTS = {
    /**
     * Records read ahead of the pool, as a multiple of its concurrency
     */
    QUEUE_DEPTH_FACTOR: 2,
} as const;

// ============================================
// Retrieval
// ============================================

export const RETRIEVAL_DEFAULTS = {
    MAX_RETRIES: 3,
    RETRY_DELAY_MS: 500,
    MAX_DELAY_MS: 10000,
    BACKOFF_MULTIPLIER: 2,
    /**
     * Error fragments treated as transient when fetching from S3
     */
    RETRYABLE_ERRORS: ['503', 'SlowDown', 'ServiceUnavailable', 'ECONNRESET', 'ETIMEDOUT', 'TIMEOUT'],
} as const;
