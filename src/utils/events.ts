import { EventEmitter } from 'events';
import type { BatchProgress, BatchReport, RecordFailure, RecordSuccess } from '../types/pipeline.types.js';

/**
 * Event types emitted by the pipeline driver
 */
export interface PreviewEvents {
    'record:start': { lineNumber: number; id: string };
    'record:complete': RecordSuccess & { progress: BatchProgress };
    'record:failed': RecordFailure & { progress: BatchProgress };
    'batch:complete': BatchReport;
}

/**
 * Type-safe event emitter for the pipeline
 */
export class PreviewEventEmitter extends EventEmitter {
    emit<K extends keyof PreviewEvents>(
        event: K,
        data: PreviewEvents[K]
    ): boolean {
        return super.emit(event, data);
    }

    on<K extends keyof PreviewEvents>(
        event: K,
        listener: (data: PreviewEvents[K]) => void
    ): this {
        return super.on(event, listener);
    }

    once<K extends keyof PreviewEvents>(
        event: K,
        listener: (data: PreviewEvents[K]) => void
    ): this {
        return super.once(event, listener);
    }

    off<K extends keyof PreviewEvents>(
        event: K,
        listener: (data: PreviewEvents[K]) => void
    ): this {
        return super.off(event, listener);
    }
}

/**
 * Create a new event emitter instance
 */
export function createEventEmitter(): PreviewEventEmitter {
    return new PreviewEventEmitter();
}
