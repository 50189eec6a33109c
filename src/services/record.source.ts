import { createInterface } from 'readline';
import { createGunzip } from 'zlib';
import type { Readable } from 'stream';
import type { IStorageClient } from '../types/storage.types.js';
import { PreviewRecordSchema, type PreviewRecord } from '../types/record.types.js';
import { MalformedRecordError } from '../errors/index.js';

/**
 * Reads JSONL input from a local path or `s3://` object.
 * Inputs ending in `.gz` are decompressed on the fly.
 */
export class RecordSource {
    constructor(private readonly storage: IStorageClient) { }

    /**
     * Lazily yield trimmed lines, blank lines included
     */
    async *lines(path: string, signal?: AbortSignal): AsyncGenerator<string> {
        const raw = await this.storage.openObjectStream(path, signal);
        const input = path.endsWith('.gz') ? gunzip(raw) : raw;
        const reader = createInterface({ input, crlfDelay: Infinity });

        try {
            for await (const line of reader) {
                yield line.trim();
            }
        } finally {
            reader.close();
            input.destroy();
            raw.destroy();
        }
    }
}

function gunzip(source: Readable): Readable {
    const decompressed = createGunzip();
    source.on('error', (error) => decompressed.destroy(error));
    return source.pipe(decompressed);
}

/**
 * Parse and validate one JSONL line
 * @param lineNumber - 1-based position in the input, kept on the error
 * @throws MalformedRecordError on invalid JSON or a missing required field
 */
export function parseRecordLine(line: string, lineNumber: number): PreviewRecord {
    let data: unknown;
    try {
        data = JSON.parse(line);
    } catch (error) {
        throw new MalformedRecordError(
            `Line ${lineNumber} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
            { lineNumber }
        );
    }

    const result = PreviewRecordSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new MalformedRecordError(`Line ${lineNumber} is not a valid record: ${issues}`, {
            lineNumber,
            issues: result.error.issues.length,
        });
    }

    return result.data;
}
