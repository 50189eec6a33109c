/**
 * One rendered page of a preview
 */
export interface RenderedPage {
    /** Source PDF page number (1-based) */
    pageNum: number;
    /** Sanitized HTML fragment for the span */
    text: string;
    /** Base64-encoded WebP image of the page */
    image: string;
}

/**
 * Local copy of a source PDF, valid for one record task
 */
export interface LocalPdf {
    /** Absolute path to the temporary PDF file */
    path: string;
    /** Number of pages in the document */
    pageCount: number;
}

/**
 * Page Rasterizer Interface
 *
 * Turns one page of a local PDF into an embeddable image.
 *
 * @example
 * ```typescript
 * const image = await rasterizer.renderPage({ path: '/tmp/a.pdf', pageCount: 3 }, 2);
 * html += `<img src="data:image/webp;base64,${image}">`;
 * ```
 */
export interface IPageRasterizer {
    /**
     * Render one page
     * @param pdf - Local PDF copy
     * @param pageNumber - 1-based page number
     * @param signal - Aborts the underlying renderer process
     * @returns Base64-encoded WebP image
     * @throws PageOutOfRangeError when pageNumber is outside 1..pdf.pageCount
     */
    renderPage(pdf: LocalPdf, pageNumber: number, signal?: AbortSignal): Promise<string>;
}

/**
 * Text Renderer Interface
 * Converts a raw text slice into an HTML fragment that is safe to embed
 */
export interface ITextRenderer {
    toHtml(text: string): string;
}

/**
 * Values handed to the output template
 */
export interface PreviewContext {
    id: string;
    pages: RenderedPage[];
    link: string | null;
}

/**
 * Compiled output template, shared read-only across tasks
 */
export interface IPreviewTemplate {
    render(context: PreviewContext): string;
}
