/**
 * Tokenizer registry backed by @dqbd/tiktoken.
 *
 * The registry is an explicit object rather than module state so callers (and
 * tests) can inject their own. `resolve` signals an unknown or unloadable
 * encoding by returning undefined; it never throws.
 *
 * @example
 * ```typescript
 * const registry = new TiktokenRegistry();
 * const encoder = registry.resolve('cl100k_base');
 * encoder?.encode('hello world').length; // 2
 * registry.clear();
 * ```
 */

import { get_encoding, Tiktoken } from '@dqbd/tiktoken';
import type { TiktokenEncoding } from '@dqbd/tiktoken';
import modelEncodings from './model-encodings.json';
import type { Logger } from './logger';
import { noopLogger } from './logger';

/**
 * Minimal encoder surface used for counting.
 * `Tiktoken` instances satisfy it structurally.
 */
export interface Encoder {
    encode(
        text: string,
        allowedSpecial?: 'all' | string[],
        disallowedSpecial?: 'all' | string[],
    ): ArrayLike<number>;
    /** Release native memory, when the encoder holds any */
    free?(): void;
}

export interface EncodingRegistry {
    /** Look up an encoding by name. Returns undefined when it cannot be provided. */
    resolve(name: string): Encoder | undefined;
    /** Make an encoder available under `name` for later lookups. */
    register(name: string, encoder: Encoder): void;
    /** Encoding name for an exact model string, if the model is known. */
    encodingNameForModel(model: string): string | undefined;
}

/** Encodings compiled into the tiktoken WASM bundle */
export const BUNDLED_ENCODINGS: readonly TiktokenEncoding[] = [
    'gpt2',
    'r50k_base',
    'p50k_base',
    'p50k_edit',
    'cl100k_base',
    'o200k_base',
];

/** Terminal special token appended to synthesized encodings */
export const END_OF_TEXT = '<|endoftext|>';

/** Split pattern for synthesized encodings: every character on its own */
const BYTE_LEVEL_PATTERN = '(?s:.)';

const MODEL_ENCODINGS: ReadonlyMap<string, string> = new Map(Object.entries(modelEncodings));

export function isBundledEncoding(name: string): name is TiktokenEncoding {
    return BUNDLED_ENCODINGS.some((encoding) => encoding === name);
}

/**
 * Build a deterministic byte-level encoding: one token per byte value 0-255
 * plus `<|endoftext|>` at rank 256. Needs no downloaded assets, so counting
 * stays reproducible offline.
 */
export function createByteLevelEncoding(): Tiktoken {
    const ranks: string[] = [];
    for (let byte = 0; byte < 256; byte++) {
        ranks.push(`${Buffer.from([byte]).toString('base64')} ${byte}`);
    }
    return new Tiktoken(ranks.join('\n'), { [END_OF_TEXT]: ranks.length }, BYTE_LEVEL_PATTERN);
}

export interface TiktokenRegistryOptions {
    logger?: Logger;
}

/**
 * Registry over the bundled tiktoken encodings.
 * Loaded encoders are cached per name; `clear()` frees their WASM memory.
 */
export class TiktokenRegistry implements EncodingRegistry {
    private readonly encoders = new Map<string, Encoder>();
    private readonly logger: Logger;

    constructor(options: TiktokenRegistryOptions = {}) {
        this.logger = options.logger ?? noopLogger;
    }

    resolve(name: string): Encoder | undefined {
        const cached = this.encoders.get(name);
        if (cached) {
            return cached;
        }

        if (!isBundledEncoding(name)) {
            this.logger.debug('Encoding not bundled', { encoding: name });
            return undefined;
        }

        try {
            const encoder = get_encoding(name);
            this.encoders.set(name, encoder);
            return encoder;
        } catch (error) {
            this.logger.debug('Failed to load encoding', {
                encoding: name,
                error: error instanceof Error ? error.message : String(error),
            });
            return undefined;
        }
    }

    register(name: string, encoder: Encoder): void {
        this.encoders.set(name, encoder);
    }

    encodingNameForModel(model: string): string | undefined {
        return MODEL_ENCODINGS.get(model);
    }

    /** Names with a loaded or registered encoder */
    loaded(): string[] {
        return [...this.encoders.keys()];
    }

    /**
     * Free every cached encoder.
     * Counters still holding one must not be used afterwards.
     */
    clear(): void {
        for (const encoder of this.encoders.values()) {
            encoder.free?.();
        }
        this.encoders.clear();
    }
}

/** Shared registry used when callers do not inject one */
export const defaultEncodingRegistry = new TiktokenRegistry();
