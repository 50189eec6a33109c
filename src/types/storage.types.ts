import type { Readable } from 'stream';

/**
 * Bucket and key of an object-storage path
 */
export interface ObjectLocation {
    bucket: string;
    key: string;
}

/**
 * Storage Client Interface
 *
 * Reads local paths and `s3://bucket/key` objects alike, and mints
 * time-limited links for remote objects. One instance is shared by
 * every record task.
 */
export interface IStorageClient {
    /**
     * Read the full content of a local file or remote object
     * @throws RetrievalError when the resource is missing or unreadable
     */
    getObjectBytes(path: string, signal?: AbortSignal): Promise<Buffer>;

    /**
     * Open a local file or remote object as a byte stream
     */
    openObjectStream(path: string, signal?: AbortSignal): Promise<Readable>;

    /**
     * Create a presigned GET link
     * @returns The URL, or null when credentials are missing or incomplete
     */
    presign(bucket: string, key: string, ttlSeconds: number): Promise<string | null>;
}
