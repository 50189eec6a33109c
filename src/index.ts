/**
 * docpreview: HTML previews of annotated PDF text
 *
 * @packageDocumentation
 */

// Main class and factory
export { PreviewPipeline, type PreviewPipelineDependencies } from './preview-pipeline.js';
export {
    PreviewPipelineFactory,
    createPreviewPipeline,
    type PreviewPipelineOptions,
} from './preview-pipeline.factory.js';

// Engines
export { DocumentAssembler, type DocumentAssemblerDependencies } from './engines/document.assembler.js';
export { PipelineEngine, type PipelineEngineDependencies } from './engines/pipeline.engine.js';

// Services
export {
    S3StorageClient,
    isCredentialError,
    RecordSource,
    parseRecordLine,
    SpanResolver,
    MarkdownTextRenderer,
    PDFProcessor,
    PdftoppmRasterizer,
    LinkGenerator,
    NunjucksPreviewTemplate,
    type StorageClientOptions,
    type PDFMetadata,
} from './services/index.js';

export type {
    PipelineConfig,
    ResolvedConfig,
    // Config subtypes
    BatchConfig,
    SpanConfig,
    RasterConfig,
    LinkConfig,
    RetrievalConfig,
    LogConfig,
} from './types/config.types.js';

export type { PreviewRecord, ResolvedSpan } from './types/record.types.js';

export type {
    RenderedPage,
    LocalPdf,
    PreviewContext,
    IPageRasterizer,
    ITextRenderer,
    IPreviewTemplate,
} from './types/render.types.js';

export type { IStorageClient, ObjectLocation } from './types/storage.types.js';

export type {
    AssembledDocument,
    RecordResult,
    RecordSuccess,
    RecordFailure,
    BatchReport,
    BatchProgress,
    RunOptions,
} from './types/pipeline.types.js';

// Enums
export {
    OnErrorEnum,
    SpanPolicyEnum,
    RecordStatusEnum,
    PipelineStateEnum,
} from './types/enums.js';

export type {
    OnErrorEnumType,
    SpanPolicyEnumType,
    RecordStatusEnumType,
    PipelineStateEnumType,
} from './types/enums.js';

// Schemas
export { PreviewRecordSchema, SpanSchema } from './types/record.types.js';
export { configSchema } from './types/config.types.js';

// Errors
export {
    PreviewError,
    ConfigurationError,
    MalformedRecordError,
    SpanRangeError,
    RetrievalError,
    PageOutOfRangeError,
    RasterizationError,
    TemplateError,
    OutputWriteError,
    TaskTimeoutError,
    summarizeError,
    wrapError,
    generateCorrelationId,
    type ErrorSummary,
} from './errors/index.js';

// Events
export { PreviewEventEmitter, type PreviewEvents } from './utils/events.js';

// Utilities
export { createLogger, type Logger, type LogMeta } from './utils/logger.js';
export { sanitizeSourceFile, outputPathFor, parseS3Path, isRemotePath } from './utils/paths.js';

// Constants
export { PRESIGN_DEFAULTS, RASTER_DEFAULTS, OUTPUT_DEFAULTS } from './config/constants.js';
