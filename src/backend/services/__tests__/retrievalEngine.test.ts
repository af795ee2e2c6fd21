/**
 * Retrieval Engine Tests
 *
 * Query text construction, context assembly under a character budget and
 * the retrieve path against a real index with keyword embeddings.
 */

import * as fc from 'fast-check';
import { OllamaError, OllamaErrorCode } from '../../clients/ollamaClient';
import { InvalidQueryError, RetrievalError } from '../../errors';
import { ChatMessage, SearchResult } from '../../../shared/types';
import { RetryPolicy } from '../../utils/retryPolicy';
import { EmbeddingGateway } from '../embeddingGateway';
import { RetrievalEngine, assembleContext, buildQueryText, hasAnaphora } from '../retrievalEngine';
import { VectorIndex } from '../vectorStore';
import { INSTANT_RETRY_RUNTIME, KEYWORDS, KeywordEmbeddingProvider, entryInput } from './helpers';

function message(role: ChatMessage['role'], text: string): ChatMessage {
    return { id: `${role}-${text.length}`, role, text, timestamp: new Date('2026-01-01T00:00:00Z') };
}

function hit(documentId: string, sequenceIndex: number, text: string, score: number, rank: number): SearchResult {
    const { chunkId, metadata } = entryInput(documentId, sequenceIndex, [], text);
    return { entry: { chunkId, ...metadata }, score, rank };
}

describe('hasAnaphora', () => {
    it('should spot words that refer back', () => {
        expect(hasAnaphora('How much does it cost?')).toBe(true);
        expect(hasAnaphora('And what about THOSE?')).toBe(true);
    });

    it('should ignore self-contained questions', () => {
        expect(hasAnaphora('What is the capital of France?')).toBe(false);
    });
});

describe('buildQueryText', () => {
    const history = [message('user', 'Tell me about volcanoes'), message('assistant', 'They erupt lava.')];

    it('should prefix the latest turns in always mode', () => {
        expect(buildQueryText('How hot is lava?', history, 'always', 1)).toBe(
            'assistant: They erupt lava.\nHow hot is lava?'
        );
    });

    it('should never prefix in never mode', () => {
        expect(buildQueryText('How hot is it?', history, 'never', 4)).toBe('How hot is it?');
    });

    it('should prefix only referring questions in anaphora mode', () => {
        expect(buildQueryText('How hot is it?', history, 'anaphora', 4)).toBe(
            'user: Tell me about volcanoes\nassistant: They erupt lava.\nHow hot is it?'
        );
        expect(buildQueryText('How hot is lava?', history, 'anaphora', 4)).toBe('How hot is lava?');
    });

    it('should use the question alone without history or turns', () => {
        expect(buildQueryText('How hot is it?', [], 'always', 4)).toBe('How hot is it?');
        expect(buildQueryText('How hot is it?', history, 'always', 0)).toBe('How hot is it?');
    });
});

describe('assembleContext', () => {
    const candidates = [hit('d1', 0, 'alpha', 0.9, 1), hit('d2', 3, 'beta', 0.8, 2)];

    it('should tag blocks with markers and separate them with a blank line', () => {
        const assembled = assembleContext(candidates, 19);

        expect(assembled.context).toBe('[1] alpha\n\n[2] beta');
        expect(assembled.used).toHaveLength(2);
        expect(assembled.dropped).toBe(0);
        expect(assembled.citations.get('[2]')).toEqual({
            marker: '[2]',
            chunkId: 'd2:3',
            documentId: 'd2',
            sequenceIndex: 3,
            filename: 'd2.txt',
            excerpt: 'beta',
            score: 0.8,
        });
    });

    it('should stop at the first block that does not fit', () => {
        const assembled = assembleContext(candidates, 18);

        expect(assembled.context).toBe('[1] alpha');
        expect(Array.from(assembled.citations.keys())).toEqual(['[1]']);
        expect(assembled.dropped).toBe(1);
    });

    it('should not skip ahead to a smaller block', () => {
        const assembled = assembleContext([hit('d1', 0, 'x'.repeat(20), 0.9, 1), hit('d1', 1, 'y', 0.8, 2)], 10);

        expect(assembled.context).toBe('');
        expect(assembled.used).toEqual([]);
        expect(assembled.dropped).toBe(2);
    });

    /**
     * The context fits the budget and is made of a prefix of the ranked
     * candidates, whatever their lengths.
     */
    it('should never exceed the budget', () => {
        fc.assert(
            fc.property(
                fc.array(fc.integer({ min: 0, max: 120 }), { maxLength: 12 }),
                fc.integer({ min: 1, max: 600 }),
                (lengths, budget) => {
                    const ranked = lengths.map((length, i) => hit('d1', i, 'w'.repeat(length), 0.9, i + 1));

                    const assembled = assembleContext(ranked, budget);

                    expect(assembled.context.length).toBeLessThanOrEqual(budget);
                    expect(assembled.used).toEqual(ranked.slice(0, assembled.used.length));
                    expect(assembled.dropped).toBe(ranked.length - assembled.used.length);
                    expect(assembled.citations.size).toBe(assembled.used.length);
                }
            ),
            { numRuns: 200 }
        );
    });

    it('should shorten long excerpts', () => {
        const assembled = assembleContext([hit('d1', 0, 'z'.repeat(250), 0.9, 1)], 1000);
        const excerpt = assembled.citations.get('[1]')?.excerpt ?? '';

        expect(excerpt).toHaveLength(200);
        expect(excerpt.endsWith('...')).toBe(true);
    });

    it('should keep the page number of paged chunks', () => {
        const paged = hit('d1', 0, 'alpha', 0.9, 1);
        paged.entry.pageNumber = 4;

        expect(assembleContext([paged], 100).citations.get('[1]')?.pageNumber).toBe(4);
    });

    it('should reject a budget below one character', () => {
        expect(() => assembleContext(candidates, 0)).toThrow(InvalidQueryError);
    });
});

describe('RetrievalEngine', () => {
    let provider: KeywordEmbeddingProvider;
    let index: VectorIndex;
    let engine: RetrievalEngine;

    beforeEach(async () => {
        provider = new KeywordEmbeddingProvider();
        index = new VectorIndex({ dimension: KEYWORDS.length });
        const gateway = new EmbeddingGateway(
            provider,
            new RetryPolicy({ maxAttempts: 1 }, undefined, INSTANT_RETRY_RUNTIME),
            { dimension: KEYWORDS.length }
        );
        engine = new RetrievalEngine(gateway, index, {
            topK: 2,
            scoreThreshold: 0.2,
            historyMode: 'anaphora',
            historyTurns: 2,
        });

        const passages = ['apples in orchards', 'volcano eruption and lava', 'satellite orbit'];
        await index.insertMany(passages.map((text, i) => entryInput('doc', i, provider.vectorFor(text), text)));
    });

    it('should return the passages above the threshold', async () => {
        const outcome = await engine.retrieve({ question: 'When does a volcano erupt into lava?' });

        expect(outcome.status).toBe('found');
        if (outcome.status === 'found') {
            expect(outcome.candidates.map((c) => c.entry.chunkId)).toEqual(['doc:1']);
            expect(outcome.candidates[0]?.score).toBeCloseTo(2 / Math.sqrt(6), 10);
        }
    });

    it('should report not found when nothing reaches the threshold', async () => {
        const outcome = await engine.retrieve({ question: 'Who won the football match?' });
        expect(outcome).toEqual({ status: 'not_found', queryText: 'Who won the football match?' });
    });

    it('should let a referring question borrow keywords from history', async () => {
        const outcome = await engine.retrieve({
            question: 'Where is it?',
            history: [message('user', 'Tell me about the satellite')],
        });

        expect(outcome.queryText).toBe('user: Tell me about the satellite\nWhere is it?');
        expect(outcome.status).toBe('found');
    });

    it('should validate k before embedding anything', async () => {
        await expect(engine.retrieve({ question: 'lava', k: 0 })).rejects.toBeInstanceOf(InvalidQueryError);
        expect(provider.calls).toEqual([]);
    });

    it('should wrap embedding failures in a RetrievalError', async () => {
        provider.failWith = new OllamaError('overloaded', OllamaErrorCode.SERVER_ERROR, 503);

        const result = engine.retrieve({ question: 'lava' });
        await expect(result).rejects.toBeInstanceOf(RetrievalError);
        await expect(result).rejects.toMatchObject({
            category: 'upstream',
            message: 'Retrieval failed: Embedding failed: overloaded',
        });
    });

    it('should assemble with the configured budget by default', async () => {
        const outcome = await engine.retrieve({ question: 'volcano' });
        const candidates = outcome.status === 'found' ? outcome.candidates : [];

        expect(engine.assembleContext(candidates).context).toBe('[1] volcano eruption and lava');
    });
});
