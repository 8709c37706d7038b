// Shared types for context trimming

/**
 * A chat message. `role` is an open string: `'system'` and `'user'` carry
 * special meaning, any other role can be pinned through `priorityRoles`.
 */
export interface ChatMessage {
    role: string;
    content: string;
}

/** Well-known roles */
export const SYSTEM_ROLE = 'system';
export const USER_ROLE = 'user';

/**
 * A user message plus every following non-user message, up to the next user
 * message. A conversation that opens with non-user messages yields a leading
 * turn without a user message.
 */
export interface Turn<M extends ChatMessage = ChatMessage> {
    /** Positions of the turn's messages in the grouped conversation */
    indices: number[];
    messages: M[];
}

/** How token costs were computed */
export type TokenCounterMode = 'tiktoken' | 'heuristic';

export interface TokenCounterInfo {
    mode: TokenCounterMode;
    /** Encoding name, when one was resolved for the model */
    encoding?: string;
}

/**
 * Compression metrics for a single trim.
 * Field names are the wire names used by logs and dashboards.
 */
export interface TrimMetrics {
    input_tokens: number;
    output_tokens: number;
    /** round(output_tokens / max(1, input_tokens), 3) */
    compress_ratio: number;
    token_counter: TokenCounterInfo;
    /** Filled in by a retention scorer; always null straight out of `trim` */
    semantic_retention: number | null;
}

export interface TrimResult<M extends ChatMessage = ChatMessage> {
    /** Order-preserving subsequence of the input */
    messages: M[];
    metrics: TrimMetrics;
}
