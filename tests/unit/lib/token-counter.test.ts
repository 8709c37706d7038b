import { describe, it, expect, vi } from 'vitest';
import {
    TokenCounter,
    getTokenCounter,
    heuristicTokenCount,
    resolveEncodingName,
    MODEL_PREFIX_ENCODINGS,
} from '../../../src/lib/token-counter';
import type { Logger } from '../../../src/lib/logger';
import { FakeEncodingRegistry, wordEncoder } from '../../mocks/encoding-registry';

function createLogger(): Logger {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('TokenCounter', () => {
    describe('heuristicTokenCount', () => {
        it('should count four characters per token', () => {
            expect(heuristicTokenCount('abcdefgh')).toBe(2);
            expect(heuristicTokenCount('abcdefg')).toBe(1);
            expect(heuristicTokenCount('x'.repeat(200))).toBe(50);
        });

        it('should never return zero', () => {
            expect(heuristicTokenCount('')).toBe(1);
            expect(heuristicTokenCount('ab')).toBe(1);
        });

        it('should count code points rather than UTF-16 units', () => {
            // 8 UTF-16 units, 4 code points
            expect(heuristicTokenCount('😀😀😀😀')).toBe(1);
        });
    });

    describe('resolveEncodingName', () => {
        const registry = new FakeEncodingRegistry({ models: { 'o1-mini': 'o200k_base' } });

        it('should match model family prefixes case-insensitively', () => {
            expect(resolveEncodingName('gpt-5-main', registry)).toBe('o200k_base');
            expect(resolveEncodingName('GPT-4o-mini', registry)).toBe('o200k_base');
            expect(resolveEncodingName('gpt-4-turbo', registry)).toBe('cl100k_base');
            expect(resolveEncodingName('gpt-3.5-turbo', registry)).toBe('cl100k_base');
        });

        it('should prefer gpt-4o over the shorter gpt-4 prefix', () => {
            const order = MODEL_PREFIX_ENCODINGS.map(([prefix]) => prefix);
            expect(order.indexOf('gpt-4o')).toBeLessThan(order.indexOf('gpt-4'));
        });

        it('should fall back to the registry for exact model names', () => {
            expect(resolveEncodingName('o1-mini', registry)).toBe('o200k_base');
            expect(resolveEncodingName('legacy-model', registry)).toBeUndefined();
        });
    });

    describe('with an injected registry', () => {
        it('should count with the resolved encoder', () => {
            const registry = new FakeEncodingRegistry({
                encoders: { words: wordEncoder },
                models: { 'word-model': 'words' },
            });
            const counter = new TokenCounter('word-model', { registry });

            expect(counter.count('one two  three')).toBe(3);
            expect(counter.describe()).toEqual({ mode: 'tiktoken', encoding: 'words' });
        });

        it('should synthesize and register a byte-level encoding when loading fails', () => {
            const registry = new FakeEncodingRegistry();
            const counter = new TokenCounter('gpt-4o', { registry });

            expect(registry.registered).toEqual(['o200k_base']);
            expect(counter.describe()).toEqual({ mode: 'tiktoken', encoding: 'o200k_base' });
            expect(counter.count('abc')).toBe(3);
            // Two UTF-8 bytes
            expect(counter.count('é')).toBe(2);
        });

        it('should reuse a registered fallback on the next lookup', () => {
            const registry = new FakeEncodingRegistry();
            new TokenCounter('gpt-4', { registry });
            new TokenCounter('gpt-4-turbo', { registry });

            expect(registry.registered).toEqual(['cl100k_base']);
        });

        it('should survive a registry that throws', () => {
            const logger = createLogger();
            const registry = new FakeEncodingRegistry({ failResolve: true });
            const counter = new TokenCounter('gpt-4o', { registry, logger });

            expect(counter.count('abcd')).toBe(4);
            expect(counter.describe().mode).toBe('tiktoken');
            expect(logger.debug).toHaveBeenCalledWith('Encoding lookup failed', {
                encoding: 'o200k_base',
                error: 'registry offline: o200k_base',
            });
        });

        it('should use the heuristic when the encoder throws', () => {
            const registry = new FakeEncodingRegistry({
                encoders: {
                    broken: {
                        encode: () => {
                            throw new Error('boom');
                        },
                    },
                },
                models: { 'broken-model': 'broken' },
            });
            const counter = new TokenCounter('broken-model', { registry });

            expect(counter.count('x'.repeat(40))).toBe(10);
        });
    });

    describe('with the default registry', () => {
        it('should use the real encoding for known families', () => {
            const counter = new TokenCounter('gpt-4o');

            expect(counter.describe()).toEqual({ mode: 'tiktoken', encoding: 'o200k_base' });
            expect(counter.count('hello world')).toBe(2);
        });

        it('should cost special-token markers as plain text', () => {
            const counter = new TokenCounter('gpt-4');
            expect(() => counter.count('before <|endoftext|> after')).not.toThrow();
            expect(counter.count('before <|endoftext|> after')).toBeGreaterThan(1);
        });

        it('should fall back to heuristic counting for unknown models', () => {
            const counter = new TokenCounter('legacy-model');

            expect(counter.describe()).toEqual({ mode: 'heuristic' });
            expect(counter.count('x'.repeat(200))).toBe(50);
        });

        it('should never throw and stay deterministic for unknown models', () => {
            expect(() => new TokenCounter('totally-unknown-model-v9')).not.toThrow();

            const text = 'The same text, counted twice.';
            const first = new TokenCounter('totally-unknown-model-v9').count(text);
            const second = new TokenCounter('totally-unknown-model-v9').count(text);
            expect(first).toBe(second);
        });
    });

    describe('countMessage', () => {
        it('should coerce non-string content', () => {
            const counter = new TokenCounter('legacy-model', { registry: new FakeEncodingRegistry() });
            const restored: { role: string; content: string }[] = JSON.parse(
                '[{"role":"user","content":null},{"role":"user","content":{"k":"v"}}]',
            );

            expect(counter.countMessage(restored[0])).toBe(1);
            // '{"k":"v"}' is 9 characters
            expect(counter.countMessage(restored[1])).toBe(2);
            expect(counter.countMessages(restored)).toBe(3);
        });
    });

    describe('getTokenCounter', () => {
        it('should cache counters per registry and model', () => {
            const registry = new FakeEncodingRegistry();
            const other = new FakeEncodingRegistry();

            const counter = getTokenCounter('legacy-model', registry);
            expect(getTokenCounter('legacy-model', registry)).toBe(counter);
            expect(getTokenCounter('legacy-model', other)).not.toBe(counter);
            expect(getTokenCounter('another-model', registry)).not.toBe(counter);
        });
    });
});
