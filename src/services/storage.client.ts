import * as fs from 'fs/promises';
import { createReadStream } from 'fs';
import { Readable } from 'stream';
import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { S3ClientConfig } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { IStorageClient } from '../types/storage.types.js';
import type { RetrievalConfig } from '../types/config.types.js';
import { PreviewError, RetrievalError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { getRetryOptions, withRetry } from '../utils/retry.js';
import { isRemotePath, parseS3Path } from '../utils/paths.js';

/**
 * Connection settings for the S3 client
 */
export interface StorageClientOptions {
    /** Named profile from the shared AWS config files */
    profile?: string;
    region?: string;
    /** S3-compatible endpoint (MinIO, LocalStack, ...) */
    endpoint?: string;
    /** Path-style addressing, required by most S3-compatible services */
    forcePathStyle?: boolean;
}

const CREDENTIAL_ERROR_NAMES = new Set(['CredentialsProviderError', 'CredentialsError']);

/**
 * Whether an SDK error comes from missing or incomplete credentials
 */
export function isCredentialError(error: unknown): boolean {
    if (!(error instanceof Error)) {
        return false;
    }
    return CREDENTIAL_ERROR_NAMES.has(error.name)
        || error.message.includes('Could not load credentials')
        || error.message.includes('Resolved credential object is not valid');
}

/**
 * Storage client over local files and S3 objects
 *
 * One instance is built at startup and shared by every record task.
 * The client holds no per-request state.
 */
export class S3StorageClient implements IStorageClient {
    constructor(
        private readonly s3: S3Client,
        private readonly retrievalConfig: RetrievalConfig,
        private readonly logger: Logger
    ) { }

    static create(
        options: StorageClientOptions,
        retrievalConfig: RetrievalConfig,
        logger: Logger
    ): S3StorageClient {
        const clientConfig: S3ClientConfig = {
            ...(options.profile ? { profile: options.profile } : {}),
            ...(options.region ? { region: options.region } : {}),
            ...(options.endpoint ? { endpoint: options.endpoint } : {}),
            forcePathStyle: options.forcePathStyle ?? false,
        };
        return new S3StorageClient(new S3Client(clientConfig), retrievalConfig, logger);
    }

    async getObjectBytes(path: string, signal?: AbortSignal): Promise<Buffer> {
        if (!isRemotePath(path)) {
            try {
                return await fs.readFile(path, { signal });
            } catch (error) {
                throw this.toRetrievalError(error, path);
            }
        }

        const { bucket, key } = parseS3Path(path);

        try {
            return await withRetry(
                async () => {
                    const response = await this.s3.send(
                        new GetObjectCommand({ Bucket: bucket, Key: key }),
                        { abortSignal: signal }
                    );
                    if (!response.Body) {
                        throw new RetrievalError(`Object has no body: ${path}`, { path });
                    }
                    return Buffer.from(await response.Body.transformToByteArray());
                },
                {
                    ...getRetryOptions(this.retrievalConfig),
                    signal,
                    onRetry: (attempt, error, delayMs) => {
                        this.logger.warn('Retrying object download', {
                            path,
                            attempt,
                            delayMs: Math.round(delayMs),
                            error: error.message,
                        });
                    },
                }
            );
        } catch (error) {
            throw this.toRetrievalError(error, path);
        }
    }

    async openObjectStream(path: string, signal?: AbortSignal): Promise<Readable> {
        if (!isRemotePath(path)) {
            try {
                await fs.access(path);
            } catch (error) {
                throw this.toRetrievalError(error, path);
            }
            return createReadStream(path, { signal });
        }

        const { bucket, key } = parseS3Path(path);

        try {
            const response = await this.s3.send(
                new GetObjectCommand({ Bucket: bucket, Key: key }),
                { abortSignal: signal }
            );
            const body = response.Body;
            if (!body) {
                throw new RetrievalError(`Object has no body: ${path}`, { path });
            }
            if (body instanceof Readable) {
                return body;
            }
            return Readable.from([Buffer.from(await body.transformToByteArray())]);
        } catch (error) {
            throw this.toRetrievalError(error, path);
        }
    }

    async presign(bucket: string, key: string, ttlSeconds: number): Promise<string | null> {
        try {
            return await getSignedUrl(
                this.s3,
                new GetObjectCommand({ Bucket: bucket, Key: key }),
                { expiresIn: ttlSeconds }
            );
        } catch (error) {
            if (isCredentialError(error)) {
                this.logger.warn('AWS credentials not found or incomplete, omitting link', {
                    bucket,
                    key,
                });
                return null;
            }
            throw error;
        }
    }

    private toRetrievalError(error: unknown, path: string): PreviewError {
        if (error instanceof PreviewError) {
            return error;
        }
        const cause = error instanceof Error ? error : new Error(String(error));
        return new RetrievalError(
            `Failed to retrieve ${path}: ${cause.message}`,
            { path, originalError: cause.name },
            { cause, operation: 'getObject' }
        );
    }
}
