import type { ChatMessage, TrimMetrics } from '../lib/types';
import type { TokenCounter } from '../lib/token-counter';

/** Decimal places kept in `compress_ratio` */
export const COMPRESS_RATIO_PRECISION = 3;

export function roundTo(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

export interface TrimMetricsInput {
    /** Every message handed to trim, system messages included */
    inputMessages: readonly ChatMessage[];
    /** Kept system messages followed by the selected conversation */
    outputMessages: readonly ChatMessage[];
    counter: TokenCounter;
}

/**
 * Compression statistics for one trim.
 * `semantic_retention` is left null for an external scorer to fill.
 */
export function computeTrimMetrics({ inputMessages, outputMessages, counter }: TrimMetricsInput): TrimMetrics {
    const inputTokens = counter.countMessages(inputMessages);
    const outputTokens = counter.countMessages(outputMessages);

    return {
        input_tokens: inputTokens,
        output_tokens: outputTokens,
        compress_ratio: roundTo(outputTokens / Math.max(1, inputTokens), COMPRESS_RATIO_PRECISION),
        token_counter: counter.describe(),
        semantic_retention: null,
    };
}
