/**
 * Semantic retention scoring.
 *
 * Compares an embedding of the conversation before trimming with one of the
 * trimmed result. The embedder is injected; this module never builds a
 * provider client itself.
 *
 * @example
 * ```typescript
 * const scorer = createSemanticRetentionScorer({
 *     embedder: async (text) => (await client.embeddings.create({ model, input: text })).data[0].embedding,
 * });
 * const scored = await withSemanticRetention(result, history, scorer);
 * ```
 */

import type { ChatMessage, TrimResult } from '../lib/types';
import type { Logger } from '../lib/logger';
import { noopLogger } from '../lib/logger';
import { contentToText } from '../lib/content';
import { roundTo } from '../trim/metrics';

/** Text → embedding vector */
export type Embedder = (text: string) => Promise<readonly number[]> | readonly number[];

export interface SemanticRetentionScorer {
    /** Cosine similarity of the before/after embeddings, or null when unavailable */
    score(before: readonly ChatMessage[], after: readonly ChatMessage[]): Promise<number | null>;
}

export interface SemanticRetentionOptions {
    /** Leave undefined to disable scoring */
    embedder?: Embedder;
    logger?: Logger;
}

/** Decimal places kept in the score */
const SCORE_PRECISION = 3;

function norm(vector: readonly number[]): number {
    return Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
}

/**
 * Cosine similarity rounded to three decimals.
 * Null for empty or zero-length vectors.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number | null {
    if (a.length === 0 || b.length === 0) {
        return null;
    }
    const denominator = norm(a) * norm(b);
    if (denominator === 0) {
        return null;
    }

    let dot = 0;
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
        dot += a[i] * b[i];
    }
    return roundTo(dot / denominator, SCORE_PRECISION);
}

/**
 * Join non-empty message contents with newlines.
 */
export function aggregateContent(messages: readonly ChatMessage[]): string {
    return messages
        .map((message) => contentToText(message.content))
        .filter((text) => text.length > 0)
        .join('\n');
}

export function createSemanticRetentionScorer(options: SemanticRetentionOptions = {}): SemanticRetentionScorer {
    const { embedder } = options;
    const logger = options.logger ?? noopLogger;

    return {
        async score(before, after) {
            if (!embedder) {
                return null;
            }

            const beforeText = aggregateContent(before);
            const afterText = aggregateContent(after);
            if (!beforeText || !afterText) {
                return null;
            }

            try {
                const [beforeVector, afterVector] = await Promise.all([
                    embedder(beforeText),
                    embedder(afterText),
                ]);
                return cosineSimilarity(beforeVector, afterVector);
            } catch (error) {
                logger.warn('Semantic retention scoring failed', {
                    error: error instanceof Error ? error.message : String(error),
                });
                return null;
            }
        },
    };
}

/**
 * Copy of `result` whose metrics carry a retention score.
 * A score already present is kept as is.
 */
export async function withSemanticRetention<M extends ChatMessage>(
    result: TrimResult<M>,
    before: readonly ChatMessage[],
    scorer: SemanticRetentionScorer,
): Promise<TrimResult<M>> {
    if (result.metrics.semantic_retention !== null) {
        return result;
    }
    const score = await scorer.score(before, result.messages);
    return {
        messages: result.messages,
        metrics: { ...result.metrics, semantic_retention: score },
    };
}
