export { S3StorageClient, isCredentialError, type StorageClientOptions } from './storage.client.js';
export { RecordSource, parseRecordLine } from './record.source.js';
export { SpanResolver } from './span.resolver.js';
export { MarkdownTextRenderer } from './text.renderer.js';
export { PDFProcessor, type PDFMetadata } from './pdf.processor.js';
export { PdftoppmRasterizer } from './page.rasterizer.js';
export { LinkGenerator } from './link.generator.js';
export { NunjucksPreviewTemplate } from './template.renderer.js';
