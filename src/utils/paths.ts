import * as path from 'path';
import type { ObjectLocation } from '../types/storage.types.js';
import { OUTPUT_DEFAULTS } from '../config/constants.js';

const S3_PATTERN = /^s3:\/\/([^/]+)\/(.+)$/;
const SCHEME_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;

/**
 * Whether a path points at object storage
 */
export function isRemotePath(p: string): boolean {
    return p.startsWith('s3://');
}

/**
 * Split `s3://bucket/key` into its parts
 * @throws Error when the path is not a well-formed S3 object path
 */
export function parseS3Path(p: string): ObjectLocation {
    const match = S3_PATTERN.exec(p);
    if (!match) {
        throw new Error(`Not an S3 object path: ${p}`);
    }
    return { bucket: match[1], key: match[2] };
}

/**
 * Filesystem-safe name for a Source-File path
 *
 * Drops a leading `scheme://`, then turns `/`, `\` and `.` into `_`.
 * Paths that differ only in those characters share a name
 * (`s3://b/k.pdf` and `s3://b/k/pdf` both give `b_k_pdf`).
 */
export function sanitizeSourceFile(sourceFile: string): string {
    return sourceFile.replace(SCHEME_PATTERN, '').replace(/[/\\.]/g, '_');
}

/**
 * Output path of the preview for a Source-File
 */
export function outputPathFor(outputDir: string, sourceFile: string): string {
    return path.join(outputDir, `${sanitizeSourceFile(sourceFile)}${OUTPUT_DEFAULTS.EXTENSION}`);
}
