/**
 * Error context for correlation and tracing
 */
export interface ErrorContext {
    /** Unique correlation ID for the run that raised the error */
    correlationId?: string;
    /** Timestamp when error occurred */
    timestamp?: Date;
    /** Original cause of the error */
    cause?: Error;
    /** Operation that was being performed */
    operation?: string;
}

/**
 * Generate a unique correlation ID
 */
export function generateCorrelationId(): string {
    return `dprv_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Current run's correlation ID, set by the pipeline driver
 */
let currentCorrelationId: string | undefined;

export function setCorrelationId(id: string): void {
    currentCorrelationId = id;
}

export function getCorrelationId(): string {
    return currentCorrelationId ?? generateCorrelationId();
}

export function clearCorrelationId(): void {
    currentCorrelationId = undefined;
}

/**
 * Base error class for docpreview
 * All errors extend this class for consistent handling
 */
export class PreviewError extends Error {
    public readonly code: string;
    public readonly details?: Record<string, unknown>;
    public readonly correlationId: string;
    public readonly timestamp: Date;
    public readonly cause?: Error;
    public readonly operation?: string;

    constructor(
        message: string,
        code: string,
        details?: Record<string, unknown>,
        context?: ErrorContext
    ) {
        super(message);
        this.name = 'PreviewError';
        this.code = code;
        this.details = details;
        this.correlationId = context?.correlationId ?? getCorrelationId();
        this.timestamp = context?.timestamp ?? new Date();
        this.cause = context?.cause;
        this.operation = context?.operation;
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            correlationId: this.correlationId,
            timestamp: this.timestamp.toISOString(),
            operation: this.operation,
            cause: this.cause ? {
                name: this.cause.name,
                message: this.cause.message,
            } : undefined,
        };
    }
}

/**
 * Wrap an unknown error into a PreviewError
 */
export function wrapError(
    error: unknown,
    ErrorClass: new (message: string, details?: Record<string, unknown>, context?: ErrorContext) => PreviewError,
    operation?: string
): PreviewError {
    if (error instanceof PreviewError) {
        return error;
    }

    const originalError = error instanceof Error ? error : new Error(String(error));
    return new ErrorClass(
        originalError.message,
        { originalError: originalError.name },
        { cause: originalError, operation }
    );
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends PreviewError {
    constructor(message: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'CONFIGURATION_ERROR', details, context);
        this.name = 'ConfigurationError';
    }
}

/**
 * A JSONL line that is not valid JSON or misses a required field
 */
export class MalformedRecordError extends PreviewError {
    public readonly lineNumber?: number;

    constructor(message: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'MALFORMED_RECORD', details, context);
        this.name = 'MalformedRecordError';
        this.lineNumber = typeof details?.lineNumber === 'number' ? details.lineNumber : undefined;
    }
}

/**
 * Span offsets outside the record text, raised under the `reject` span policy
 */
export class SpanRangeError extends PreviewError {
    public readonly spanIndex: number;

    constructor(message: string, spanIndex: number, details?: Record<string, unknown>) {
        super(message, 'SPAN_RANGE_ERROR', { spanIndex, ...details });
        this.name = 'SpanRangeError';
        this.spanIndex = spanIndex;
    }
}

/**
 * Source PDF or input resource could not be fetched
 */
export class RetrievalError extends PreviewError {
    public readonly path?: string;

    constructor(message: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'RETRIEVAL_ERROR', details, context);
        this.name = 'RetrievalError';
        this.path = typeof details?.path === 'string' ? details.path : undefined;
    }
}

/**
 * Page number outside 1..pageCount of the source PDF
 */
export class PageOutOfRangeError extends PreviewError {
    public readonly pageNumber: number;
    public readonly pageCount: number;

    constructor(pageNumber: number, pageCount: number) {
        super(
            `Page ${pageNumber} is out of range (document has ${pageCount} pages)`,
            'PAGE_OUT_OF_RANGE',
            { pageNumber, pageCount }
        );
        this.name = 'PageOutOfRangeError';
        this.pageNumber = pageNumber;
        this.pageCount = pageCount;
    }
}

/**
 * PDF rasterization errors (corrupt PDF, renderer failure)
 */
export class RasterizationError extends PreviewError {
    constructor(message: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'RASTERIZATION_ERROR', details, context);
        this.name = 'RasterizationError';
    }
}

/**
 * Template compile or render errors
 */
export class TemplateError extends PreviewError {
    constructor(message: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'TEMPLATE_ERROR', details, context);
        this.name = 'TemplateError';
    }
}

/**
 * Output file could not be written
 */
export class OutputWriteError extends PreviewError {
    constructor(message: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'OUTPUT_WRITE_ERROR', details, context);
        this.name = 'OutputWriteError';
    }
}

/**
 * Record task exceeded its time budget
 */
export class TaskTimeoutError extends PreviewError {
    public readonly timeoutMs: number;

    constructor(timeoutMs: number, details?: Record<string, unknown>) {
        super(`Task timed out after ${timeoutMs}ms`, 'TASK_TIMEOUT', { timeoutMs, ...details });
        this.name = 'TaskTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Serializable error summary kept in batch reports
 */
export interface ErrorSummary {
    name: string;
    code: string;
    message: string;
}

export function summarizeError(error: unknown): ErrorSummary {
    if (error instanceof PreviewError) {
        return { name: error.name, code: error.code, message: error.message };
    }
    if (error instanceof Error) {
        return { name: error.name, code: 'UNKNOWN_ERROR', message: error.message };
    }
    return { name: 'Error', code: 'UNKNOWN_ERROR', message: String(error) };
}
