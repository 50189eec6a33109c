import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import sharp from 'sharp';
import type { IPageRasterizer, LocalPdf } from '../types/render.types.js';
import type { RasterConfig } from '../types/config.types.js';
import { PageOutOfRangeError, RasterizationError, wrapError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { spawnAsync } from '../utils/spawn.js';

/**
 * Renders single PDF pages to base64 WebP.
 *
 * `pdftoppm` draws the page as PNG, scaled so its longest side is
 * `targetLongestDim` pixels; sharp re-encodes it as WebP.
 *
 * ## System Requirements
 * - poppler-utils (`apt-get install poppler-utils` / `brew install poppler`)
 */
export class PdftoppmRasterizer implements IPageRasterizer {
    constructor(
        private readonly config: RasterConfig,
        private readonly logger: Logger
    ) { }

    async renderPage(pdf: LocalPdf, pageNumber: number, signal?: AbortSignal): Promise<string> {
        if (!Number.isInteger(pageNumber) || pageNumber < 1 || pageNumber > pdf.pageCount) {
            throw new PageOutOfRangeError(pageNumber, pdf.pageCount);
        }

        const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docpreview-page-'));
        const outputPrefix = path.join(workDir, 'page');

        try {
            const result = await spawnAsync(
                this.config.pdftoppmPath,
                [
                    '-png',
                    '-f', String(pageNumber),
                    '-l', String(pageNumber),
                    '-scale-to', String(this.config.targetLongestDim),
                    '-singlefile',
                    pdf.path,
                    outputPrefix,
                ],
                { signal }
            );

            if (result.code !== 0) {
                throw new RasterizationError(
                    `pdftoppm failed on page ${pageNumber}: ${result.stderr.trim() || 'Unknown error'}`,
                    { pageNumber, exitCode: result.code }
                );
            }

            const png = await fs.readFile(`${outputPrefix}.png`);
            const webp = await sharp(png).webp({ quality: this.config.webpQuality }).toBuffer();

            this.logger.debug('Page rasterized', {
                pageNumber,
                pngBytes: png.length,
                webpBytes: webp.length,
            });

            return webp.toString('base64');
        } catch (error) {
            throw wrapError(error, RasterizationError, 'renderPage');
        } finally {
            await fs.rm(workDir, { recursive: true, force: true });
        }
    }
}
