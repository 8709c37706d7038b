import { describe, it, expect, vi } from 'vitest';
import {
    TiktokenRegistry,
    createByteLevelEncoding,
    isBundledEncoding,
    END_OF_TEXT,
} from '../../../src/lib/encoding-registry';
import { wordEncoder } from '../../mocks/encoding-registry';

describe('EncodingRegistry', () => {
    describe('TiktokenRegistry', () => {
        it('should load and cache bundled encodings', () => {
            const registry = new TiktokenRegistry();
            const encoder = registry.resolve('cl100k_base');

            expect(encoder).toBeDefined();
            expect(registry.resolve('cl100k_base')).toBe(encoder);
            expect(registry.loaded()).toEqual(['cl100k_base']);
            registry.clear();
        });

        it('should signal unknown encodings without throwing', () => {
            const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
            const registry = new TiktokenRegistry({ logger });

            expect(registry.resolve('not_an_encoding')).toBeUndefined();
            expect(logger.debug).toHaveBeenCalledWith('Encoding not bundled', { encoding: 'not_an_encoding' });
        });

        it('should serve registered encoders', () => {
            const registry = new TiktokenRegistry();
            registry.register('words', wordEncoder);

            expect(registry.resolve('words')).toBe(wordEncoder);
        });

        it('should map exact model names to encodings', () => {
            const registry = new TiktokenRegistry();

            expect(registry.encodingNameForModel('text-davinci-003')).toBe('p50k_base');
            expect(registry.encodingNameForModel('text-embedding-3-small')).toBe('cl100k_base');
            expect(registry.encodingNameForModel('legacy-model')).toBeUndefined();
        });

        it('should forget everything on clear', () => {
            const registry = new TiktokenRegistry();
            registry.resolve('gpt2');
            registry.register('words', wordEncoder);

            registry.clear();

            expect(registry.loaded()).toEqual([]);
        });
    });

    describe('isBundledEncoding', () => {
        it('should recognise bundled names only', () => {
            expect(isBundledEncoding('o200k_base')).toBe(true);
            expect(isBundledEncoding('p50k_edit')).toBe(true);
            expect(isBundledEncoding('o200k')).toBe(false);
        });
    });

    describe('createByteLevelEncoding', () => {
        it('should emit one token per UTF-8 byte', () => {
            const encoding = createByteLevelEncoding();
            try {
                expect(encoding.encode('hello', [], []).length).toBe(5);
                // 'ü' and '日' take 2 and 3 bytes
                expect(encoding.encode('ü日', [], []).length).toBe(5);
                expect(encoding.encode('', [], []).length).toBe(0);
            } finally {
                encoding.free();
            }
        });

        it('should reserve a terminal special token', () => {
            const encoding = createByteLevelEncoding();
            try {
                expect(Array.from(encoding.encode(END_OF_TEXT, 'all', []))).toEqual([256]);
                expect(encoding.encode(END_OF_TEXT, [], []).length).toBe(END_OF_TEXT.length);
            } finally {
                encoding.free();
            }
        });

        it('should be deterministic', () => {
            const first = createByteLevelEncoding();
            const second = createByteLevelEncoding();
            try {
                expect(Array.from(first.encode('same input', [], []))).toEqual(Array.from(second.encode('same input', [], [])));
            } finally {
                first.free();
                second.free();
            }
        });
    });
});
