/**
 * Batch failure policy
 * ABORT stops dispatching after the first failed record,
 * CONTINUE runs every record and reports failures at the end
 */
export const OnErrorEnum = {
    ABORT: 'abort',
    CONTINUE: 'continue',
} as const;

export type OnErrorEnumType = (typeof OnErrorEnum)[keyof typeof OnErrorEnum];

/**
 * Handling of span offsets that fall outside the record text
 */
export const SpanPolicyEnum = {
    CLAMP: 'clamp',
    REJECT: 'reject',
} as const;

export type SpanPolicyEnumType = (typeof SpanPolicyEnum)[keyof typeof SpanPolicyEnum];

/**
 * Per-record task status
 */
export const RecordStatusEnum = {
    DONE: 'DONE',
    FAILED: 'FAILED',
} as const;

export type RecordStatusEnumType = (typeof RecordStatusEnum)[keyof typeof RecordStatusEnum];

/**
 * Pipeline driver lifecycle
 */
export const PipelineStateEnum = {
    INIT: 'INIT',
    DISPATCHING: 'DISPATCHING',
    DRAINED: 'DRAINED',
} as const;

export type PipelineStateEnumType = (typeof PipelineStateEnum)[keyof typeof PipelineStateEnum];
