import * as fs from 'fs/promises';
import * as path from 'path';
import { PDFDocument } from 'pdf-lib';
import type { LocalPdf } from '../types/render.types.js';
import { RasterizationError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * PDF document metadata
 */
export interface PDFMetadata {
    fileSize: number;
    pageCount: number;
}

/**
 * PDF processing service
 */
export class PDFProcessor {
    private readonly logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger;
    }

    /**
     * Read the page count from PDF bytes
     * @throws RasterizationError when the bytes are not a readable PDF
     */
    async inspect(buffer: Buffer): Promise<PDFMetadata> {
        let document: PDFDocument;
        try {
            document = await PDFDocument.load(buffer, {
                ignoreEncryption: true,
                updateMetadata: false,
            });
        } catch (error) {
            const cause = error instanceof Error ? error : new Error(String(error));
            throw new RasterizationError(
                `Unreadable PDF: ${cause.message}`,
                { fileSize: buffer.length },
                { cause, operation: 'inspect' }
            );
        }

        return {
            fileSize: buffer.length,
            pageCount: document.getPageCount(),
        };
    }

    /**
     * Write PDF bytes into a task-owned directory and describe the copy.
     * The caller removes `workDir` when the task ends.
     */
    async createLocalCopy(buffer: Buffer, workDir: string): Promise<LocalPdf> {
        const metadata = await this.inspect(buffer);
        const pdfPath = path.join(workDir, 'source.pdf');
        await fs.writeFile(pdfPath, buffer);

        this.logger.debug('PDF copied locally', {
            path: pdfPath,
            fileSize: metadata.fileSize,
            pageCount: metadata.pageCount,
        });

        return { path: pdfPath, pageCount: metadata.pageCount };
    }
}
