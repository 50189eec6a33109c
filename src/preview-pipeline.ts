import type { ResolvedConfig } from './types/config.types.js';
import type { BatchReport, RunOptions } from './types/pipeline.types.js';
import type { PipelineEngine } from './engines/pipeline.engine.js';
import type { PreviewEventEmitter, PreviewEvents } from './utils/events.js';

/**
 * Dependencies for PreviewPipeline (injected by factory)
 */
export interface PreviewPipelineDependencies {
    engine: PipelineEngine;
    events: PreviewEventEmitter;
}

/**
 * Preview pipeline facade
 *
 * @example
 * ```typescript
 * import { createPreviewPipeline, NunjucksPreviewTemplate } from 'docpreview';
 *
 * const template = await NunjucksPreviewTemplate.load('./viewer.html');
 * const pipeline = createPreviewPipeline({ outputDir: './previews' }, { template });
 *
 * pipeline.on('record:failed', (result) => console.error(result.error.message));
 * const report = await pipeline.run('s3://my-bucket/annotations.jsonl');
 * ```
 */
export class PreviewPipeline {
    private readonly config: ResolvedConfig;
    private readonly engine: PipelineEngine;
    private readonly events: PreviewEventEmitter;

    constructor(config: ResolvedConfig, deps: PreviewPipelineDependencies) {
        this.config = config;
        this.engine = deps.engine;
        this.events = deps.events;
    }

    /**
     * Get resolved configuration
     */
    getConfig(): ResolvedConfig {
        return this.config;
    }

    /**
     * Render a preview for every record of a JSONL input.
     * Never rejects because of a single record; see `BatchReport.results`.
     */
    async run(inputPath: string, options?: RunOptions): Promise<BatchReport> {
        return this.engine.run(inputPath, options);
    }

    on<K extends keyof PreviewEvents>(event: K, listener: (data: PreviewEvents[K]) => void): this {
        this.events.on(event, listener);
        return this;
    }

    off<K extends keyof PreviewEvents>(event: K, listener: (data: PreviewEvents[K]) => void): this {
        this.events.off(event, listener);
        return this;
    }
}
