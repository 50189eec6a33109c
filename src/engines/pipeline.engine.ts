import * as fs from 'fs/promises';
import pLimit from 'p-limit';
import type { ResolvedConfig } from '../types/config.types.js';
import type {
    BatchProgress,
    BatchReport,
    RecordResult,
    RunOptions,
} from '../types/pipeline.types.js';
import {
    OnErrorEnum,
    PipelineStateEnum,
    RecordStatusEnum,
    type PipelineStateEnumType,
} from '../types/enums.js';
import {
    OutputWriteError,
    clearCorrelationId,
    generateCorrelationId,
    setCorrelationId,
    summarizeError,
} from '../errors/index.js';
import type { DocumentAssembler } from './document.assembler.js';
import { parseRecordLine, type RecordSource } from '../services/record.source.js';
import type { PreviewEventEmitter } from '../utils/events.js';
import type { Logger } from '../utils/logger.js';
import { runWithTimeout } from '../utils/timeout.js';
import { BATCH_DEFAULTS } from '../config/constants.js';

/**
 * Dependencies for PipelineEngine
 */
export interface PipelineEngineDependencies {
    config: ResolvedConfig;
    source: RecordSource;
    assembler: DocumentAssembler;
    events: PreviewEventEmitter;
    logger: Logger;
}

/**
 * Pipeline driver
 *
 * Reads the input lazily and hands each non-blank line to a bounded pool.
 * Reading pauses while the pool holds `concurrency * QUEUE_DEPTH_FACTOR`
 * unsettled records. Every task settles into a RecordResult; nothing a
 * record does can reject the run. Results are collected in completion order.
 *
 * With `onError: 'abort'`, the first failure stops further reading and any
 * queued record is skipped; tasks already running finish.
 *
 * If the input fails mid-read, dispatched records are drained before the
 * read error is rethrown.
 */
export class PipelineEngine {
    private readonly config: ResolvedConfig;
    private readonly source: RecordSource;
    private readonly assembler: DocumentAssembler;
    private readonly events: PreviewEventEmitter;
    private readonly logger: Logger;
    private state: PipelineStateEnumType = PipelineStateEnum.INIT;

    constructor(deps: PipelineEngineDependencies) {
        this.config = deps.config;
        this.source = deps.source;
        this.assembler = deps.assembler;
        this.events = deps.events;
        this.logger = deps.logger;
    }

    getState(): PipelineStateEnumType {
        return this.state;
    }

    /**
     * Render every record of a JSONL input
     */
    async run(inputPath: string, options: RunOptions = {}): Promise<BatchReport> {
        const startTime = Date.now();
        const runId = generateCorrelationId();
        setCorrelationId(runId);

        const { batchConfig, outputDir } = this.config;

        try {
            await this.ensureOutputDir(outputDir);

            this.logger.info('Starting batch', {
                inputPath,
                outputDir,
                concurrency: batchConfig.concurrency,
                onError: batchConfig.onError,
            });

            const limit = pLimit(batchConfig.concurrency);
            const results: RecordResult[] = [];
            const pending: Promise<void>[] = [];
            const progress: BatchProgress = { completed: 0, dispatched: 0, succeeded: 0, failed: 0 };
            let skipped = 0;
            let aborted = false;

            const settle = (result: RecordResult): void => {
                results.push(result);
                progress.completed++;

                if (result.status === RecordStatusEnum.DONE) {
                    progress.succeeded++;
                    this.events.emit('record:complete', { ...result, progress: { ...progress } });
                } else {
                    progress.failed++;
                    this.events.emit('record:failed', { ...result, progress: { ...progress } });

                    if (batchConfig.onError === OnErrorEnum.ABORT && !aborted) {
                        aborted = true;
                        this.logger.warn('Aborting batch after record failure', {
                            lineNumber: result.lineNumber,
                            recordId: result.id,
                        });
                    }
                }

                options.onProgress?.({ ...progress }, result);
            };

            this.state = PipelineStateEnum.DISPATCHING;
            const maxInFlight = batchConfig.concurrency * BATCH_DEFAULTS.QUEUE_DEPTH_FACTOR;
            const inFlight = new Set<Promise<void>>();
            let lineNumber = 0;

            try {
                for await (const line of this.source.lines(inputPath)) {
                    lineNumber++;
                    if (aborted) {
                        break;
                    }
                    if (!line) {
                        continue;
                    }

                    progress.dispatched++;
                    const currentLine = lineNumber;

                    const task: Promise<void> = limit(async () => {
                        if (aborted) {
                            skipped++;
                            return;
                        }
                        settle(await this.processLine(line, currentLine));
                    }).finally(() => inFlight.delete(task));

                    pending.push(task);
                    inFlight.add(task);

                    while (inFlight.size >= maxInFlight) {
                        await Promise.race(inFlight);
                    }
                }
            } catch (error) {
                await Promise.allSettled(pending);
                this.state = PipelineStateEnum.DRAINED;

                this.logger.error('Input read failed', {
                    inputPath,
                    lineNumber,
                    dispatched: progress.dispatched,
                    completed: progress.completed,
                    error: summarizeError(error).message,
                });
                throw error;
            }

            await Promise.all(pending);
            this.state = PipelineStateEnum.DRAINED;

            const report: BatchReport = {
                runId,
                total: progress.dispatched,
                succeeded: progress.succeeded,
                failed: progress.failed,
                skipped,
                aborted,
                durationMs: Date.now() - startTime,
                results,
            };

            this.logger.info('Batch completed', {
                total: report.total,
                succeeded: report.succeeded,
                failed: report.failed,
                skipped: report.skipped,
                aborted: report.aborted,
                durationMs: report.durationMs,
            });

            this.events.emit('batch:complete', report);
            return report;
        } finally {
            clearCorrelationId();
        }
    }

    /**
     * One record task; failures become a FAILED result
     */
    private async processLine(line: string, lineNumber: number): Promise<RecordResult> {
        let id: string | undefined;

        try {
            const record = parseRecordLine(line, lineNumber);
            id = record.id;
            this.events.emit('record:start', { lineNumber, id: record.id });

            const document = await runWithTimeout(
                (signal) => this.assembler.assemble(record, signal),
                this.config.batchConfig.taskTimeoutMs
            );

            return {
                status: RecordStatusEnum.DONE,
                lineNumber,
                id: document.id,
                outputPath: document.outputPath,
                pageCount: document.pageCount,
            };
        } catch (error) {
            const summary = summarizeError(error);

            this.logger.error('Record failed', {
                recordId: id,
                lineNumber,
                code: summary.code,
                error: summary.message,
            });

            return {
                status: RecordStatusEnum.FAILED,
                lineNumber,
                id,
                error: summary,
            };
        }
    }

    private async ensureOutputDir(outputDir: string): Promise<void> {
        try {
            await fs.mkdir(outputDir, { recursive: true });
        } catch (error) {
            const cause = error instanceof Error ? error : new Error(String(error));
            throw new OutputWriteError(
                `Cannot create output directory ${outputDir}: ${cause.message}`,
                { outputDir },
                { cause, operation: 'ensureOutputDir' }
            );
        }
    }
}
