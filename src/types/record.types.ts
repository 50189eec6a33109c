import { z } from 'zod';

/**
 * (startIndex, endIndex, pageNumber)
 * Offsets count code points into the record text; pageNumber is 1-based.
 */
export const SpanSchema = z.tuple([
    z.number().int().nonnegative(),
    z.number().int().nonnegative(),
    z.number().int(),
]);

export type Span = z.infer<typeof SpanSchema>;

/**
 * One JSONL input line
 */
export const PreviewRecordSchema = z
    .object({
        id: z.string(),
        text: z.string().default(''),
        attributes: z
            .object({
                pdf_page_numbers: z.array(SpanSchema).optional(),
            })
            .passthrough()
            .optional(),
        metadata: z
            .object({
                'Source-File': z.string().min(1),
            })
            .passthrough(),
    })
    .passthrough();

export type PreviewRecord = z.infer<typeof PreviewRecordSchema>;

/**
 * Span with its text slice already cut
 */
export interface ResolvedSpan {
    startIndex: number;
    endIndex: number;
    pageNumber: number;
    text: string;
}
