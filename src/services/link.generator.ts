import type { IStorageClient } from '../types/storage.types.js';
import type { LinkConfig } from '../types/config.types.js';
import { PRESIGN_DEFAULTS } from '../config/constants.js';
import { isRemotePath, parseS3Path } from '../utils/paths.js';

/**
 * Deep link back to a record's source PDF.
 * Only `s3://` sources get one; local paths have no link.
 */
export class LinkGenerator {
    private readonly ttlSeconds: number;

    constructor(
        private readonly storage: IStorageClient,
        config: LinkConfig
    ) {
        this.ttlSeconds = Math.min(config.ttlSeconds, PRESIGN_DEFAULTS.MAX_TTL_SECONDS - 1);
    }

    getTtlSeconds(): number {
        return this.ttlSeconds;
    }

    async linkFor(sourceFile: string): Promise<string | null> {
        if (!isRemotePath(sourceFile)) {
            return null;
        }
        const { bucket, key } = parseS3Path(sourceFile);
        return this.storage.presign(bucket, key, this.ttlSeconds);
    }
}
