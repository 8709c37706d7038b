/**
 * Token counter for context budgeting.
 *
 * Resolution order for a model:
 * 1. Prefix table (`MODEL_PREFIX_ENCODINGS`)
 * 2. Exact model lookup in the registry
 * 3. Heuristic counting (no encoding name)
 *
 * A resolved name the registry cannot load gets a synthesized byte-level
 * encoding registered in its place, so counting never depends on assets.
 * Nothing in here throws: failures only lower precision.
 */

import type { ChatMessage, TokenCounterInfo } from './types';
import type { Encoder, EncodingRegistry } from './encoding-registry';
import { createByteLevelEncoding, defaultEncodingRegistry } from './encoding-registry';
import type { Logger } from './logger';
import { noopLogger } from './logger';
import { contentToText } from './content';

/** Model family prefixes, checked in order against the lower-cased model */
export const MODEL_PREFIX_ENCODINGS: ReadonlyArray<readonly [prefix: string, encoding: string]> = [
    ['gpt-5', 'o200k_base'],
    ['gpt-4o', 'o200k_base'],
    ['gpt-4', 'cl100k_base'],
    ['gpt-3.5', 'cl100k_base'],
];

/** Characters per token for heuristic counting */
export const HEURISTIC_CHARS_PER_TOKEN = 4;

/**
 * Coarse offline estimate: one token per four characters, never below one.
 * Characters are counted by code point.
 */
export function heuristicTokenCount(text: string): number {
    let chars = 0;
    for (const _char of text) {
        chars++;
    }
    return Math.max(1, Math.floor(chars / HEURISTIC_CHARS_PER_TOKEN));
}

/**
 * Resolve the encoding name for a model, or undefined when nothing matches.
 */
export function resolveEncodingName(model: string, registry: EncodingRegistry): string | undefined {
    const normalized = model.toLowerCase();
    for (const [prefix, encoding] of MODEL_PREFIX_ENCODINGS) {
        if (normalized.startsWith(prefix)) {
            return encoding;
        }
    }

    try {
        return registry.encodingNameForModel(model);
    } catch {
        return undefined;
    }
}

export interface TokenCounterOptions {
    /** Tokenizer registry (default: shared tiktoken registry) */
    registry?: EncodingRegistry;
    logger?: Logger;
}

export class TokenCounter {
    readonly model: string;
    private readonly encodingName: string | undefined;
    private readonly encoder: Encoder | undefined;
    private readonly logger: Logger;

    constructor(model: string, options: TokenCounterOptions = {}) {
        const registry = options.registry ?? defaultEncodingRegistry;
        this.model = model;
        this.logger = options.logger ?? noopLogger;
        this.encodingName = resolveEncodingName(model, registry);
        this.encoder = this.encodingName === undefined
            ? undefined
            : loadEncoder(this.encodingName, registry, this.logger);
    }

    /**
     * Token cost of `text`.
     */
    count(text: string): number {
        if (this.encoder) {
            try {
                // Special-token markers in chat text are costed as plain text
                return this.encoder.encode(text, [], []).length;
            } catch (error) {
                this.logger.debug('Encoding failed, using heuristic count', {
                    model: this.model,
                    error: describeError(error),
                });
            }
        }
        return heuristicTokenCount(text);
    }

    /** Token cost of a message's content, coerced to text */
    countMessage(message: Pick<ChatMessage, 'content'>): number {
        return this.count(contentToText(message.content));
    }

    countMessages(messages: readonly Pick<ChatMessage, 'content'>[]): number {
        return messages.reduce((sum, message) => sum + this.countMessage(message), 0);
    }

    describe(): TokenCounterInfo {
        const info: TokenCounterInfo = {
            mode: this.encoder ? 'tiktoken' : 'heuristic',
        };
        if (this.encodingName !== undefined) {
            info.encoding = this.encodingName;
        }
        return info;
    }
}

function loadEncoder(name: string, registry: EncodingRegistry, logger: Logger): Encoder | undefined {
    try {
        const encoder = registry.resolve(name);
        if (encoder) {
            return encoder;
        }
    } catch (error) {
        logger.debug('Encoding lookup failed', { encoding: name, error: describeError(error) });
    }

    try {
        const fallback = createByteLevelEncoding();
        registry.register(name, fallback);
        logger.debug('Registered byte-level fallback encoding', { encoding: name });
        return fallback;
    } catch (error) {
        logger.debug('Encoding unavailable, using heuristic count', { encoding: name, error: describeError(error) });
        return undefined;
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

const counterCache = new WeakMap<EncodingRegistry, Map<string, TokenCounter>>();

/**
 * Counter for `model`, cached per registry.
 * Resolution is a pure function of the model string, so sharing is safe.
 */
export function getTokenCounter(
    model: string,
    registry: EncodingRegistry = defaultEncodingRegistry,
): TokenCounter {
    let counters = counterCache.get(registry);
    if (!counters) {
        counters = new Map();
        counterCache.set(registry, counters);
    }

    let counter = counters.get(model);
    if (!counter) {
        counter = new TokenCounter(model, { registry });
        counters.set(model, counter);
    }
    return counter;
}
