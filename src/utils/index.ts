export { createLogger } from './logger.js';
export type { Logger, LogMeta } from './logger.js';

export {
    withRetry,
    sleep,
    isRetryableError,
    calculateBackoffDelay,
    getRetryOptions,
} from './retry.js';
export type { RetryOptions } from './retry.js';

export { PreviewEventEmitter, createEventEmitter } from './events.js';
export type { PreviewEvents } from './events.js';

export { spawnAsync } from './spawn.js';
export type { SpawnResult } from './spawn.js';

export { isRemotePath, parseS3Path, sanitizeSourceFile, outputPathFor } from './paths.js';

export { runWithTimeout } from './timeout.js';
