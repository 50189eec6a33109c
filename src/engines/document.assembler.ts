import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { PreviewRecord, ResolvedSpan } from '../types/record.types.js';
import type { IPageRasterizer, IPreviewTemplate, ITextRenderer, RenderedPage } from '../types/render.types.js';
import type { IStorageClient } from '../types/storage.types.js';
import type { AssembledDocument } from '../types/pipeline.types.js';
import { OutputWriteError } from '../errors/index.js';
import type { PDFProcessor } from '../services/pdf.processor.js';
import type { SpanResolver } from '../services/span.resolver.js';
import type { LinkGenerator } from '../services/link.generator.js';
import type { Logger } from '../utils/logger.js';
import { outputPathFor } from '../utils/paths.js';

/**
 * Dependencies for DocumentAssembler
 */
export interface DocumentAssemblerDependencies {
    outputDir: string;
    storage: IStorageClient;
    pdfProcessor: PDFProcessor;
    spanResolver: SpanResolver;
    textRenderer: ITextRenderer;
    rasterizer: IPageRasterizer;
    linkGenerator: LinkGenerator;
    template: IPreviewTemplate;
    logger: Logger;
}

/**
 * Builds the preview file for one record.
 *
 * The source PDF is fetched once into a private temp directory and every
 * span is rasterized from that copy, in span order. The directory is
 * removed on every exit path. The output file is written through a
 * temp file and a rename, so a failed record leaves no partial HTML.
 */
export class DocumentAssembler {
    private readonly deps: DocumentAssemblerDependencies;

    constructor(deps: DocumentAssemblerDependencies) {
        this.deps = deps;
    }

    async assemble(record: PreviewRecord, signal?: AbortSignal): Promise<AssembledDocument> {
        const { logger } = this.deps;
        const sourceFile = record.metadata['Source-File'];
        const spans = this.deps.spanResolver.resolve(record);

        logger.debug('Assembling record', {
            recordId: record.id,
            sourceFile,
            spanCount: spans.length,
        });

        const pages = spans.length > 0
            ? await this.renderPages(sourceFile, spans, signal)
            : [];

        const link = await this.deps.linkGenerator.linkFor(sourceFile);
        const html = this.deps.template.render({ id: record.id, pages, link });

        signal?.throwIfAborted();

        const outputPath = outputPathFor(this.deps.outputDir, sourceFile);
        await this.writeOutput(outputPath, html, signal);

        logger.info('Preview written', {
            recordId: record.id,
            outputPath,
            pageCount: pages.length,
        });

        return {
            id: record.id,
            sourceFile,
            outputPath,
            pageCount: pages.length,
            link,
        };
    }

    private async renderPages(
        sourceFile: string,
        spans: ResolvedSpan[],
        signal?: AbortSignal
    ): Promise<RenderedPage[]> {
        const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docpreview-'));

        try {
            const bytes = await this.deps.storage.getObjectBytes(sourceFile, signal);
            const pdf = await this.deps.pdfProcessor.createLocalCopy(bytes, workDir);
            const pages: RenderedPage[] = [];

            for (const span of spans) {
                signal?.throwIfAborted();
                const text = this.deps.textRenderer.toHtml(span.text);
                const image = await this.deps.rasterizer.renderPage(pdf, span.pageNumber, signal);
                pages.push({ pageNum: span.pageNumber, text, image });
            }

            return pages;
        } finally {
            await fs.rm(workDir, { recursive: true, force: true });
        }
    }

    private async writeOutput(outputPath: string, html: string, signal?: AbortSignal): Promise<void> {
        const tempPath = `${outputPath}.${process.pid}.${Math.random().toString(36).substring(2, 10)}.tmp`;

        try {
            await fs.writeFile(tempPath, html, 'utf-8');
            signal?.throwIfAborted();
            await fs.rename(tempPath, outputPath);
        } catch (error) {
            await fs.rm(tempPath, { force: true });
            if (signal?.aborted && error === signal.reason) {
                throw error;
            }
            const cause = error instanceof Error ? error : new Error(String(error));
            throw new OutputWriteError(
                `Failed to write ${outputPath}: ${cause.message}`,
                { outputPath },
                { cause, operation: 'writeOutput' }
            );
        }
    }
}
