import type { ErrorSummary } from '../errors/index.js';
import type { RecordStatusEnum } from './enums.js';

/**
 * Output of the Document Assembler for one record
 */
export interface AssembledDocument {
    id: string;
    sourceFile: string;
    outputPath: string;
    pageCount: number;
    link: string | null;
}

export interface RecordSuccess {
    status: typeof RecordStatusEnum.DONE;
    lineNumber: number;
    id: string;
    outputPath: string;
    pageCount: number;
}

export interface RecordFailure {
    status: typeof RecordStatusEnum.FAILED;
    lineNumber: number;
    /** Missing when the line could not be parsed */
    id?: string;
    error: ErrorSummary;
}

/**
 * Settled result of one record task
 */
export type RecordResult = RecordSuccess | RecordFailure;

/**
 * Summary of one pipeline run
 */
export interface BatchReport {
    runId: string;
    /** Records dispatched (non-blank lines read) */
    total: number;
    succeeded: number;
    failed: number;
    /** Records dropped from the queue after an abort */
    skipped: number;
    aborted: boolean;
    durationMs: number;
    /** Results in completion order */
    results: RecordResult[];
}

/**
 * Progress snapshot emitted as each task settles
 */
export interface BatchProgress {
    completed: number;
    dispatched: number;
    succeeded: number;
    failed: number;
}

/**
 * Options for a single pipeline run
 */
export interface RunOptions {
    /** Called after each record settles, in completion order */
    onProgress?: (progress: BatchProgress, result: RecordResult) => void;
}
