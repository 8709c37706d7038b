import type { ChatMessage, TrimMetrics, TrimResult } from '../lib/types';
import type { Logger } from '../lib/logger';
import { trim } from '../trim/trim';
import type { TrimOptions } from '../trim/trim';

/**
 * Structured per-request record of one trim.
 */
export interface TrimLogRecord {
    event: 'context.trim';
    model: string;
    token_in: number;
    token_out: number;
    compress_ratio: number;
    semantic_retention: number | null;
    latency_ms: number;
    token_counter_mode: TrimMetrics['token_counter']['mode'];
    token_counter_encoding?: string;
    kept_messages: number;
    dropped_messages: number;
}

export interface TrimLogInput {
    model: string;
    /** Message count before trimming */
    inputCount: number;
    result: TrimResult;
    latencyMs: number;
}

/** Latency precision in the log record (milliseconds, 3 decimals) */
const LATENCY_FACTOR = 1000;

export function buildTrimLogRecord({ model, inputCount, result, latencyMs }: TrimLogInput): TrimLogRecord {
    const { metrics } = result;
    const record: TrimLogRecord = {
        event: 'context.trim',
        model,
        token_in: metrics.input_tokens,
        token_out: metrics.output_tokens,
        compress_ratio: metrics.compress_ratio,
        semantic_retention: metrics.semantic_retention,
        latency_ms: Math.round(latencyMs * LATENCY_FACTOR) / LATENCY_FACTOR,
        token_counter_mode: metrics.token_counter.mode,
        kept_messages: result.messages.length,
        dropped_messages: Math.max(0, inputCount - result.messages.length),
    };
    if (metrics.token_counter.encoding !== undefined) {
        record.token_counter_encoding = metrics.token_counter.encoding;
    }
    return record;
}

/**
 * Write the record at info level.
 */
export function logTrimRecord(logger: Logger, record: TrimLogRecord): void {
    const { event, ...meta } = record;
    logger.info(event, { ...meta });
}

export interface TimedTrim<M extends ChatMessage> {
    result: TrimResult<M>;
    latencyMs: number;
}

/**
 * `trim` plus wall-clock latency, for the request log.
 */
export function timedTrim<M extends ChatMessage>(messages: readonly M[], options: TrimOptions): TimedTrim<M> {
    const startedAt = performance.now();
    const result = trim(messages, options);
    return { result, latencyMs: performance.now() - startedAt };
}
