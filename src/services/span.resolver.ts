import type { SpanConfig } from '../types/config.types.js';
import type { PreviewRecord, ResolvedSpan } from '../types/record.types.js';
import { SpanPolicyEnum } from '../types/enums.js';
import { SpanRangeError } from '../errors/index.js';

/**
 * Maps a record's `pdf_page_numbers` onto text slices.
 *
 * Spans keep their listed order; nothing is sorted or deduplicated.
 * Offsets are code-point indices, so astral characters count once.
 */
export class SpanResolver {
    constructor(private readonly config: SpanConfig) { }

    resolve(record: PreviewRecord): ResolvedSpan[] {
        const spans = record.attributes?.pdf_page_numbers ?? [];
        if (spans.length === 0) {
            return [];
        }

        const codePoints = Array.from(record.text);

        return spans.map(([startIndex, endIndex, pageNumber], index) => {
            if (this.config.policy === SpanPolicyEnum.REJECT) {
                this.assertInRange(record.id, index, startIndex, endIndex, codePoints.length);
            }

            return {
                startIndex,
                endIndex,
                pageNumber,
                text: codePoints.slice(startIndex, endIndex).join(''),
            };
        });
    }

    private assertInRange(
        recordId: string,
        spanIndex: number,
        startIndex: number,
        endIndex: number,
        textLength: number
    ): void {
        if (startIndex > endIndex) {
            throw new SpanRangeError(
                `Span ${spanIndex} starts after it ends (${startIndex} > ${endIndex})`,
                spanIndex,
                { recordId, startIndex, endIndex }
            );
        }
        if (endIndex > textLength) {
            throw new SpanRangeError(
                `Span ${spanIndex} ends at ${endIndex}, past the text length ${textLength}`,
                spanIndex,
                { recordId, startIndex, endIndex, textLength }
            );
        }
    }
}
