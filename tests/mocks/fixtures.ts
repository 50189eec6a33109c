/**
 * Test Fixtures
 *
 * Factory functions for creating test data.
 */

import { PDFDocument } from 'pdf-lib';
import type { PreviewRecord } from '../../src/types/record.types.js';
import type { ResolvedConfig } from '../../src/types/config.types.js';
import {
    DEFAULT_LINK_CONFIG,
    DEFAULT_RASTER_CONFIG,
    DEFAULT_RETRIEVAL_CONFIG,
} from '../../src/types/config.types.js';
import { OnErrorEnum, SpanPolicyEnum } from '../../src/types/enums.js';
import { NunjucksPreviewTemplate } from '../../src/services/template.renderer.js';

// ========================================
// RECORD FIXTURES
// ========================================

export const TEST_SOURCE_FILE = 's3://test-bucket/docs/a.pdf';

export function createMockRecord(overrides: Partial<PreviewRecord> = {}): PreviewRecord {
    return {
        id: 'doc-1',
        text: 'Hello World!!X',
        attributes: {
            pdf_page_numbers: [[0, 5, 1]],
        },
        metadata: {
            'Source-File': TEST_SOURCE_FILE,
        },
        ...overrides,
    };
}

/**
 * Serialize values as JSONL, one per line
 */
export function toJsonl(lines: unknown[]): string {
    return lines.map(line => (typeof line === 'string' ? line : JSON.stringify(line))).join('\n') + '\n';
}

// ========================================
// PDF FIXTURES
// ========================================

/**
 * Real PDF bytes with blank pages
 */
export async function createTestPdf(pageCount: number): Promise<Buffer> {
    const document = await PDFDocument.create();
    for (let i = 0; i < pageCount; i++) {
        document.addPage([200, 200]);
    }
    return Buffer.from(await document.save());
}

// ========================================
// TEMPLATE FIXTURES
// ========================================

/**
 * Compact template: `id|[page:image:text]...|link`
 */
export const TEST_TEMPLATE_SOURCE =
    '{{ id }}|{% for page in pages %}[{{ page.pageNum }}:{{ page.image }}:{{ page.text | safe }}]{% endfor %}|{{ link }}';

export function createTestTemplate(): NunjucksPreviewTemplate {
    return NunjucksPreviewTemplate.fromString(TEST_TEMPLATE_SOURCE, 'test-template');
}

// ========================================
// CONFIG FIXTURES
// ========================================

export function createMockResolvedConfig(
    outputDir: string,
    overrides: Partial<Omit<ResolvedConfig, 'outputDir'>> = {}
): ResolvedConfig {
    return {
        outputDir,
        batchConfig: {
            concurrency: 2,
            onError: OnErrorEnum.CONTINUE,
        },
        spanConfig: {
            policy: SpanPolicyEnum.CLAMP,
        },
        rasterConfig: { ...DEFAULT_RASTER_CONFIG },
        linkConfig: { ...DEFAULT_LINK_CONFIG },
        retrievalConfig: { ...DEFAULT_RETRIEVAL_CONFIG, retryDelayMs: 10 },
        logging: {
            level: 'error',
            structured: true,
        },
        ...overrides,
    };
}
