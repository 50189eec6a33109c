import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DocumentAssembler } from '../../src/engines/document.assembler.js';
import { PDFProcessor } from '../../src/services/pdf.processor.js';
import { SpanResolver } from '../../src/services/span.resolver.js';
import { MarkdownTextRenderer } from '../../src/services/text.renderer.js';
import { LinkGenerator } from '../../src/services/link.generator.js';
import { DEFAULT_LINK_CONFIG } from '../../src/types/config.types.js';
import type { SpanPolicyEnumType } from '../../src/types/enums.js';
import type { IPreviewTemplate } from '../../src/types/render.types.js';
import { OutputWriteError, PageOutOfRangeError, RetrievalError } from '../../src/errors/index.js';
import {
    TEST_SOURCE_FILE,
    createMockLogger,
    createMockRasterizer,
    createMockRecord,
    createMockStorage,
    createTestPdf,
    createTestTemplate,
    mockLink,
    type MockRasterizer,
    type MockStorageClient,
} from '../mocks/index.js';

describe('DocumentAssembler', () => {
    let outputDir: string;
    let storage: MockStorageClient;
    let rasterizer: MockRasterizer;

    const createAssembler = (
        overrides: { outputDir?: string; policy?: SpanPolicyEnumType; template?: IPreviewTemplate } = {}
    ): DocumentAssembler => {
        const logger = createMockLogger();
        return new DocumentAssembler({
            outputDir: overrides.outputDir ?? outputDir,
            storage,
            pdfProcessor: new PDFProcessor(logger),
            spanResolver: new SpanResolver({ policy: overrides.policy ?? 'clamp' }),
            textRenderer: new MarkdownTextRenderer(),
            rasterizer,
            linkGenerator: new LinkGenerator(storage, DEFAULT_LINK_CONFIG),
            template: overrides.template ?? createTestTemplate(),
            logger,
        });
    };

    beforeEach(async () => {
        outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docpreview-out-'));
        storage = createMockStorage({
            [TEST_SOURCE_FILE]: await createTestPdf(2),
            '/data/local.pdf': await createTestPdf(1),
        });
        rasterizer = createMockRasterizer();
    });

    afterEach(async () => {
        await fs.rm(outputDir, { recursive: true, force: true });
    });

    it('should write a preview with one page per span', async () => {
        const record = createMockRecord({
            text: 'Hello World!!X',
            attributes: { pdf_page_numbers: [[0, 5, 1], [6, 14, 2]] },
        });

        const document = await createAssembler().assemble(record);

        const link = mockLink('test-bucket', 'docs/a.pdf', 604700);
        expect(document).toEqual({
            id: 'doc-1',
            sourceFile: TEST_SOURCE_FILE,
            outputPath: path.join(outputDir, 'test-bucket_docs_a_pdf.html'),
            pageCount: 2,
            link,
        });
        expect(await fs.readFile(document.outputPath, 'utf-8')).toBe(
            `doc-1|[1:img-1:<p>Hello</p>\n][2:img-2:<p>World!!X</p>\n]|${link}`
        );
    });

    it('should keep span order in the output', async () => {
        const record = createMockRecord({
            text: 'abcdef',
            attributes: { pdf_page_numbers: [[3, 6, 2], [0, 3, 1]] },
        });

        const document = await createAssembler().assemble(record);
        const html = await fs.readFile(document.outputPath, 'utf-8');

        expect(html.indexOf('[2:img-2:<p>def</p>')).toBeLessThan(html.indexOf('[1:img-1:<p>abc</p>'));
        expect(rasterizer.renderPage.mock.calls.map(call => call[1])).toEqual([2, 1]);
    });

    it('should fetch the PDF once per record', async () => {
        const record = createMockRecord({
            attributes: { pdf_page_numbers: [[0, 1, 1], [1, 2, 1], [2, 3, 2]] },
        });

        await createAssembler().assemble(record);

        expect(storage.getObjectBytes).toHaveBeenCalledTimes(1);
        expect(rasterizer.renderPage).toHaveBeenCalledTimes(3);
    });

    it('should render a record without spans and skip the PDF', async () => {
        const record = createMockRecord({ attributes: { pdf_page_numbers: [] } });

        const document = await createAssembler().assemble(record);

        expect(document.pageCount).toBe(0);
        expect(storage.getObjectBytes).not.toHaveBeenCalled();
        expect(await fs.readFile(document.outputPath, 'utf-8')).toBe(
            `doc-1||${mockLink('test-bucket', 'docs/a.pdf', 604700)}`
        );
    });

    it('should leave out the link for local sources', async () => {
        const record = createMockRecord({ metadata: { 'Source-File': '/data/local.pdf' } });

        const document = await createAssembler().assemble(record);

        expect(document.link).toBeNull();
        expect(document.outputPath).toBe(path.join(outputDir, '_data_local_pdf.html'));
        expect(storage.presign).not.toHaveBeenCalled();
        expect(await fs.readFile(document.outputPath, 'utf-8')).toBe('doc-1|[1:img-1:<p>Hello</p>\n]|');
    });

    it('should still render every page when credentials are missing', async () => {
        storage.presign.mockResolvedValue(null);
        const record = createMockRecord({ attributes: { pdf_page_numbers: [[0, 5, 1], [6, 14, 2]] } });

        const document = await createAssembler().assemble(record);

        expect(document.link).toBeNull();
        expect(document.pageCount).toBe(2);
        expect(rasterizer.renderPage).toHaveBeenCalledTimes(2);
    });

    it('should escape record text in the output', async () => {
        const record = createMockRecord({
            text: '<script>x</script>',
            attributes: { pdf_page_numbers: [[0, 18, 1]] },
        });

        const document = await createAssembler().assemble(record);
        const html = await fs.readFile(document.outputPath, 'utf-8');

        expect(html).toContain('[1:img-1:<p>&lt;script&gt;x&lt;/script&gt;</p>\n]');
    });

    it('should remove the temp PDF directory after rendering', async () => {
        await createAssembler().assemble(createMockRecord());

        const pdfPath = rasterizer.renderPage.mock.calls[0][0].path;
        await expect(fs.access(path.dirname(pdfPath))).rejects.toThrow();
    });

    describe('failures', () => {
        it('should write nothing when a page is out of range', async () => {
            const record = createMockRecord({ attributes: { pdf_page_numbers: [[0, 5, 1], [5, 10, 7]] } });

            await expect(createAssembler().assemble(record)).rejects.toThrow(PageOutOfRangeError);
            expect(await fs.readdir(outputDir)).toEqual([]);

            const pdfPath = rasterizer.renderPage.mock.calls[0][0].path;
            await expect(fs.access(path.dirname(pdfPath))).rejects.toThrow();
        });

        it('should fail on a missing source PDF', async () => {
            const record = createMockRecord({ metadata: { 'Source-File': 's3://test-bucket/missing.pdf' } });

            await expect(createAssembler().assemble(record)).rejects.toThrow(RetrievalError);
            expect(await fs.readdir(outputDir)).toEqual([]);
        });

        it('should fail under the reject policy for a span past the text', async () => {
            const record = createMockRecord({ text: 'short', attributes: { pdf_page_numbers: [[0, 50, 1]] } });

            await expect(createAssembler({ policy: 'reject' }).assemble(record)).rejects.toThrow('Span 0 ends at 50');
            expect(storage.getObjectBytes).not.toHaveBeenCalled();
        });

        it('should raise OutputWriteError when the directory is missing', async () => {
            const assembler = createAssembler({ outputDir: path.join(outputDir, 'not', 'there') });

            await expect(assembler.assemble(createMockRecord())).rejects.toThrow(OutputWriteError);
            expect(await fs.readdir(outputDir)).toEqual([]);
        });

        it('should stop when the signal is already aborted', async () => {
            const controller = new AbortController();
            controller.abort(new Error('stopped'));

            await expect(createAssembler().assemble(createMockRecord(), controller.signal)).rejects.toThrow('stopped');
            expect(rasterizer.renderPage).not.toHaveBeenCalled();
            expect(await fs.readdir(outputDir)).toEqual([]);
        });

        it('should drop the temp file when aborted during the write', async () => {
            const controller = new AbortController();
            const template: IPreviewTemplate = {
                render: (context) => {
                    queueMicrotask(() => controller.abort(new Error('timed out')));
                    return context.id;
                },
            };

            await expect(createAssembler({ template }).assemble(createMockRecord(), controller.signal))
                .rejects.toThrow('timed out');
            expect(await fs.readdir(outputDir)).toEqual([]);
        });
    });

    it('should overwrite an existing preview with identical bytes', async () => {
        const assembler = createAssembler();
        const first = await assembler.assemble(createMockRecord());
        const before = await fs.readFile(first.outputPath);

        const second = await assembler.assemble(createMockRecord());

        expect(second.outputPath).toBe(first.outputPath);
        expect(await fs.readFile(second.outputPath)).toEqual(before);
        expect(await fs.readdir(outputDir)).toEqual(['test-bucket_docs_a_pdf.html']);
    });
});
