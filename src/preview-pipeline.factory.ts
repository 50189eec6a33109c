import { PreviewPipeline } from './preview-pipeline.js';
import type { PipelineConfig, ResolvedConfig } from './types/config.types.js';
import {
    configSchema,
    DEFAULT_BATCH_CONFIG,
    DEFAULT_LINK_CONFIG,
    DEFAULT_LOG_CONFIG,
    DEFAULT_RASTER_CONFIG,
    DEFAULT_RETRIEVAL_CONFIG,
    DEFAULT_SPAN_CONFIG,
} from './types/config.types.js';
import type { IPageRasterizer, IPreviewTemplate, ITextRenderer } from './types/render.types.js';
import type { IStorageClient } from './types/storage.types.js';
import { ConfigurationError } from './errors/index.js';
import { createEventEmitter, createLogger } from './utils/index.js';
import {
    LinkGenerator,
    MarkdownTextRenderer,
    PDFProcessor,
    PdftoppmRasterizer,
    RecordSource,
    S3StorageClient,
    SpanResolver,
    type StorageClientOptions,
} from './services/index.js';
import { DocumentAssembler } from './engines/document.assembler.js';
import { PipelineEngine } from './engines/pipeline.engine.js';

/**
 * Collaborators supplied by the caller.
 *
 * The template is compiled once by the caller. The storage client is
 * built from `storageOptions` unless one is passed in.
 */
export interface PreviewPipelineOptions {
    template: IPreviewTemplate;
    storage?: IStorageClient;
    storageOptions?: StorageClientOptions;
    rasterizer?: IPageRasterizer;
    textRenderer?: ITextRenderer;
}

/**
 * Factory for creating PreviewPipeline instances with all dependencies wired
 */
export class PreviewPipelineFactory {
    /**
     * @throws ConfigurationError when the configuration is invalid
     */
    static create(userConfig: PipelineConfig, options: PreviewPipelineOptions): PreviewPipeline {
        const config = PreviewPipelineFactory.resolveConfig(userConfig);
        const logger = createLogger(config.logging);
        const events = createEventEmitter();

        // Shared across every record task
        const storage = options.storage
            ?? S3StorageClient.create(options.storageOptions ?? {}, config.retrievalConfig, logger);

        const assembler = new DocumentAssembler({
            outputDir: config.outputDir,
            storage,
            pdfProcessor: new PDFProcessor(logger),
            spanResolver: new SpanResolver(config.spanConfig),
            textRenderer: options.textRenderer ?? new MarkdownTextRenderer(),
            rasterizer: options.rasterizer ?? new PdftoppmRasterizer(config.rasterConfig, logger),
            linkGenerator: new LinkGenerator(storage, config.linkConfig),
            template: options.template,
            logger,
        });

        const engine = new PipelineEngine({
            config,
            source: new RecordSource(storage),
            assembler,
            events,
            logger,
        });

        return new PreviewPipeline(config, { engine, events });
    }

    /**
     * Validate user config and apply defaults
     */
    static resolveConfig(userConfig: PipelineConfig): ResolvedConfig {
        const validation = configSchema.safeParse(userConfig);
        if (!validation.success) {
            const issues = validation.error.issues
                .map(issue => `${issue.path.join('.')}: ${issue.message}`)
                .join('; ');
            throw new ConfigurationError(`Invalid configuration: ${issues}`, {
                errors: validation.error.issues.length,
            });
        }

        return {
            outputDir: userConfig.outputDir,
            batchConfig: {
                ...DEFAULT_BATCH_CONFIG,
                ...userConfig.batchConfig,
            },
            spanConfig: {
                ...DEFAULT_SPAN_CONFIG,
                ...userConfig.spanConfig,
            },
            rasterConfig: {
                ...DEFAULT_RASTER_CONFIG,
                ...userConfig.rasterConfig,
            },
            linkConfig: {
                ...DEFAULT_LINK_CONFIG,
                ...userConfig.linkConfig,
            },
            retrievalConfig: {
                ...DEFAULT_RETRIEVAL_CONFIG,
                ...userConfig.retrievalConfig,
            },
            logging: {
                ...DEFAULT_LOG_CONFIG,
                ...userConfig.logging,
                level: userConfig.logging?.level || DEFAULT_LOG_CONFIG.level,
            },
        };
    }
}

/**
 * Create a new PreviewPipeline instance
 *
 * @example
 * ```typescript
 * const pipeline = createPreviewPipeline(
 *   { outputDir: 'dolma_previews', batchConfig: { onError: 'abort' } },
 *   { template, storageOptions: { profile: 'default' } }
 * );
 * ```
 */
export function createPreviewPipeline(
    config: PipelineConfig,
    options: PreviewPipelineOptions
): PreviewPipeline {
    return PreviewPipelineFactory.create(config, options);
}
