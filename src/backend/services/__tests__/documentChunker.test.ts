/**
 * Document Chunker Tests
 *
 * Sliding-window chunking: window positions, overlap bookkeeping, page
 * attribution and configuration checks.
 */

import * as fc from 'fast-check';
import { InvalidChunkConfigError } from '../../errors';
import { PageBoundary } from '../../../shared/types';
import {
    DocumentChunker,
    chunk,
    chunkId,
    createDocumentChunker,
    pageForOffset,
    validateChunkConfig,
} from '../documentChunker';

describe('chunk', () => {
    it('should slide a window of chunkSize by chunkSize - overlap', () => {
        const chunks = chunk('abcdefghij', 4, 1);

        expect(chunks.map((c) => c.text)).toEqual(['abcd', 'defg', 'ghij']);
        expect(chunks.map((c) => [c.startOffset, c.endOffset])).toEqual([
            [0, 4],
            [3, 7],
            [6, 10],
        ]);
        expect(chunks.map((c) => c.overlap)).toEqual([0, 1, 1]);
        expect(chunks.map((c) => c.sequenceIndex)).toEqual([0, 1, 2]);
    });

    it('should produce adjacent windows without overlap', () => {
        const chunks = chunk('abcdefghij', 5, 0);
        expect(chunks.map((c) => c.text)).toEqual(['abcde', 'fghij']);
    });

    it('should keep a short final chunk', () => {
        const chunks = chunk('abcdefg', 5, 0);
        expect(chunks.map((c) => c.text)).toEqual(['abcde', 'fg']);
    });

    it('should return one chunk for text shorter than the window', () => {
        const chunks = chunk('abc', 10, 2);
        expect(chunks).toHaveLength(1);
        expect(chunks[0]).toEqual({ sequenceIndex: 0, text: 'abc', startOffset: 0, endOffset: 3, overlap: 0 });
    });

    it('should return no chunks for empty text', () => {
        expect(chunk('', 10, 2)).toEqual([]);
    });

    it('should keep whitespace-only text as a chunk', () => {
        expect(chunk(' \n\t ', 10, 2)).toEqual([
            { sequenceIndex: 0, text: ' \n\t ', startOffset: 0, endOffset: 4, overlap: 0 },
        ]);
    });

    it('should attribute each chunk to the page its first character is on', () => {
        const pages: PageBoundary[] = [
            { pageNumber: 1, startOffset: 0, endOffset: 4 },
            { pageNumber: 2, startOffset: 6, endOffset: 10 },
        ];
        const chunks = chunk('aaaa\n\nbbbb', 4, 0, pages);

        expect(chunks.map((c) => c.text)).toEqual(['aaaa', '\n\nbb', 'bb']);
        expect(chunks.map((c) => c.pageNumber)).toEqual([1, 1, 2]);
    });

    it('should leave pageNumber unset without page boundaries', () => {
        const [first] = chunk('some text', 4, 0);
        expect(first).not.toHaveProperty('pageNumber');
    });

    it.each([
        [10, 10],
        [10, 12],
        [0, 0],
        [10, -1],
        [10.5, 1],
    ])('should reject chunkSize=%p overlap=%p', (size, overlap) => {
        expect(() => chunk('text', size, overlap)).toThrow(InvalidChunkConfigError);
    });

    /**
     * Dropping each chunk's overlap and concatenating gives back the text.
     */
    it('should cover the text exactly once after removing overlaps', () => {
        const text = fc.string({ minLength: 1, maxLength: 300 });

        fc.assert(
            fc.property(text, fc.integer({ min: 1, max: 50 }), fc.integer({ min: 0, max: 49 }), (input, size, rawOverlap) => {
                const overlap = rawOverlap % size;
                const chunks = chunk(input, size, overlap);

                const rebuilt = chunks.map((c, i) => (i === 0 ? c.text : c.text.slice(c.overlap))).join('');
                expect(rebuilt).toBe(input);

                for (const c of chunks) {
                    expect(c.text).toBe(input.slice(c.startOffset, c.endOffset));
                    expect(c.text.length).toBeLessThanOrEqual(size);
                }
                expect(chunks[chunks.length - 1]?.endOffset).toBe(input.length);
            }),
            { numRuns: 100 }
        );
    });

    it('should be deterministic', () => {
        const text = 'The quick brown fox jumps over the lazy dog. '.repeat(10);
        expect(chunk(text, 37, 9)).toEqual(chunk(text, 37, 9));
    });
});

describe('pageForOffset', () => {
    const pages: PageBoundary[] = [
        { pageNumber: 1, startOffset: 0, endOffset: 5 },
        { pageNumber: 2, startOffset: 7, endOffset: 12 },
    ];

    it('should pick the last page starting at or before the offset', () => {
        expect(pageForOffset(pages, 0)).toBe(1);
        expect(pageForOffset(pages, 6)).toBe(1);
        expect(pageForOffset(pages, 7)).toBe(2);
        expect(pageForOffset(pages, 11)).toBe(2);
    });

    it('should return undefined without pages', () => {
        expect(pageForOffset([], 3)).toBeUndefined();
    });
});

describe('validateChunkConfig', () => {
    it('should accept overlap smaller than the chunk size', () => {
        expect(() => validateChunkConfig(1000, 200)).not.toThrow();
        expect(() => validateChunkConfig(1, 0)).not.toThrow();
    });

    it('should report both values', () => {
        try {
            validateChunkConfig(5, 5);
            throw new Error('expected validation to fail');
        } catch (error) {
            expect(error).toBeInstanceOf(InvalidChunkConfigError);
            expect(error).toMatchObject({ code: 'INVALID_CHUNK_CONFIG', details: { chunkSize: 5, overlap: 5 } });
        }
    });
});

describe('DocumentChunker', () => {
    it('should tie chunks to their document', () => {
        const chunker = createDocumentChunker({ chunkSize: 5, overlap: 0 });
        const chunks = chunker.chunkDocument('doc1', 'abcdefgh');

        expect(chunks.map((c) => c.id)).toEqual(['doc1:0', 'doc1:1']);
        expect(chunks.every((c) => c.documentId === 'doc1')).toBe(true);
    });

    it('should validate its configuration up front', () => {
        expect(() => new DocumentChunker({ chunkSize: 100, overlap: 100 })).toThrow(InvalidChunkConfigError);
    });

    it('should fall back to the default configuration', () => {
        expect(new DocumentChunker().getConfig()).toEqual({ chunkSize: 1000, overlap: 200 });
    });

    it('should build chunk ids from document id and sequence index', () => {
        expect(chunkId('abc', 7)).toBe('abc:7');
    });
});
