/**
 * Vector Index Tests
 *
 * Ranking, thresholds, tie-breaking, document-level replacement and
 * deletion, and the on-disk format.
 */

import * as fc from 'fast-check';
import * as fs from 'fs';
import * as path from 'path';
import { DimensionMismatchError, InvalidQueryError } from '../../errors';
import { VectorIndex, cosineSimilarity, createVectorIndex } from '../vectorStore';
import { entryInput, makeTempDir, removeDir } from './helpers';

describe('cosineSimilarity', () => {
    it('should be 1 for vectors pointing the same way', () => {
        expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    });

    it('should be 0 for perpendicular vectors', () => {
        expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    });

    it('should be -1 for opposite vectors', () => {
        expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    });

    it('should be 0 when a vector has no magnitude', () => {
        expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });

    it('should reject vectors of different lengths', () => {
        expect(() => cosineSimilarity([1, 2, 3], [1, 2])).toThrow(DimensionMismatchError);
    });
});

describe('VectorIndex', () => {
    let index: VectorIndex;

    beforeEach(() => {
        index = createVectorIndex({ dimension: 3 });
    });

    describe('search', () => {
        beforeEach(async () => {
            await index.insertMany([
                entryInput('a', 0, [1, 0, 0]),
                entryInput('b', 0, [1, 1, 0]),
                entryInput('c', 0, [0, 1, 0]),
            ]);
        });

        it('should rank hits by descending cosine similarity', async () => {
            const results = await index.search([1, 0, 0], 2);

            expect(results.map((r) => r.entry.chunkId)).toEqual(['a:0', 'b:0']);
            expect(results.map((r) => r.rank)).toEqual([1, 2]);
            expect(results[0]?.score).toBe(1);
            expect(results[1]?.score).toBeCloseTo(Math.SQRT1_2, 10);
        });

        it('should return fewer than k hits when the index is smaller', async () => {
            const results = await index.search([1, 0, 0], 10);
            expect(results).toHaveLength(3);
        });

        it('should treat the threshold as inclusive', async () => {
            const atZero = await index.search([1, 0, 0], 10, 0);
            expect(atZero.map((r) => r.entry.chunkId)).toEqual(['a:0', 'b:0', 'c:0']);

            const high = await index.search([1, 0, 0], 10, 0.8);
            expect(high.map((r) => r.entry.chunkId)).toEqual(['a:0']);
        });

        it('should carry entry metadata', async () => {
            const [hit] = await index.search([0, 1, 0], 1);
            expect(hit?.entry).toEqual({
                chunkId: 'c:0',
                documentId: 'c',
                sequenceIndex: 0,
                filename: 'c.txt',
                text: 'chunk 0 of c',
                startOffset: 0,
                endOffset: 12,
            });
        });

        it('should reject a k that is not a positive integer', async () => {
            await expect(index.search([1, 0, 0], 0)).rejects.toBeInstanceOf(InvalidQueryError);
            await expect(index.search([1, 0, 0], 1.5)).rejects.toBeInstanceOf(InvalidQueryError);
        });

        it('should reject a query vector of the wrong dimension', async () => {
            await expect(index.search([1, 0], 1)).rejects.toBeInstanceOf(DimensionMismatchError);
        });

        it('should score every entry 0 for a zero query vector', async () => {
            const results = await index.search([0, 0, 0], 10);
            expect(results.map((r) => r.score)).toEqual([0, 0, 0]);
        });
    });

    it('should return nothing from an empty index', async () => {
        expect(await index.search([1, 0, 0], 5)).toEqual([]);
    });

    it('should break score ties by documentId, then sequenceIndex', async () => {
        await index.insertMany([
            entryInput('b', 0, [0, 0, 1]),
            entryInput('a', 1, [0, 0, 1]),
            entryInput('a', 0, [0, 0, 1]),
        ]);

        const results = await index.search([0, 0, 1], 3);
        expect(results.map((r) => r.entry.chunkId)).toEqual(['a:0', 'a:1', 'b:0']);
    });

    it('should reject entries of the wrong dimension without storing anything', async () => {
        await expect(
            index.insertMany([entryInput('a', 0, [1, 0, 0]), entryInput('a', 1, [1, 0])])
        ).rejects.toBeInstanceOf(DimensionMismatchError);

        expect((await index.stats()).chunkCount).toBe(0);
    });

    it('should replace an entry inserted again under the same chunk id', async () => {
        await index.insert('a:0', [1, 0, 0], entryInput('a', 0, [1, 0, 0]).metadata);
        await index.insert('a:0', [0, 1, 0], entryInput('a', 0, [0, 1, 0], 'updated').metadata);

        const results = await index.search([0, 1, 0], 5);
        expect(results).toHaveLength(1);
        expect(results[0]?.entry.text).toBe('updated');
        expect(results[0]?.score).toBe(1);
    });

    describe('replaceDocument', () => {
        it('should swap all entries of a document at once', async () => {
            await index.insertMany([
                entryInput('doc', 0, [1, 0, 0]),
                entryInput('doc', 1, [0, 1, 0]),
                entryInput('doc', 2, [0, 0, 1]),
                entryInput('other', 0, [1, 1, 1]),
            ]);

            const result = await index.replaceDocument('doc', [entryInput('doc', 0, [1, 1, 0])]);

            expect(result).toEqual({ removed: 3, added: 1 });
            expect((await index.entriesFor('doc')).map((e) => e.chunkId)).toEqual(['doc:0']);
            expect((await index.entriesFor('other')).map((e) => e.chunkId)).toEqual(['other:0']);
        });

        it('should refuse entries of another document', async () => {
            await index.insert('doc:0', [1, 0, 0], entryInput('doc', 0, [1, 0, 0]).metadata);

            await expect(index.replaceDocument('doc', [entryInput('other', 0, [1, 0, 0])])).rejects.toThrow(
                'does not belong to document doc'
            );
            expect(await index.hasDocument('doc')).toBe(true);
        });
    });

    describe('deleteByDocument', () => {
        it('should remove every entry of the document and report how many', async () => {
            await index.insertMany([
                entryInput('doc', 0, [1, 0, 0]),
                entryInput('doc', 1, [0, 1, 0]),
                entryInput('keep', 0, [0, 0, 1]),
            ]);

            expect(await index.deleteByDocument('doc')).toBe(2);
            expect(await index.deleteByDocument('doc')).toBe(0);
            expect(await index.hasDocument('doc')).toBe(false);
            expect(await index.documentIds()).toEqual(['keep']);

            const results = await index.search([1, 0, 0], 10);
            expect(results.map((r) => r.entry.documentId)).toEqual(['keep']);
        });

        /**
         * After a delete, no query and no k brings back the deleted chunks.
         */
        it('should leave no trace of a deleted document in any search', async () => {
            const component = fc.double({ min: -1, max: 1, noNaN: true });
            const vector = fc.array(component, { minLength: 3, maxLength: 3 });
            const documents = fc.array(fc.array(vector, { minLength: 1, maxLength: 4 }), { minLength: 1, maxLength: 4 });

            await fc.assert(
                fc.asyncProperty(
                    documents,
                    fc.nat(),
                    vector,
                    fc.integer({ min: 1, max: 20 }),
                    async (vectorsPerDocument, pick, query, k) => {
                        const scratch = createVectorIndex({ dimension: 3 });
                        await scratch.insertMany(
                            vectorsPerDocument.flatMap((vectors, d) =>
                                vectors.map((values, seq) => entryInput(`doc${d}`, seq, values))
                            )
                        );
                        const victim = `doc${pick % vectorsPerDocument.length}`;

                        await scratch.deleteByDocument(victim);

                        const hits = await scratch.search(query, k);
                        expect(hits.filter((hit) => hit.entry.documentId === victim)).toEqual([]);
                        expect(await scratch.entriesFor(victim)).toEqual([]);
                    }
                ),
                { numRuns: 100 }
            );
        });
    });

    it('should report stats', async () => {
        await index.insertMany([entryInput('a', 0, [1, 0, 0]), entryInput('b', 0, [0, 1, 0])]);

        expect(await index.stats()).toEqual({ documentCount: 2, chunkCount: 2, indexSize: 48, dimension: 3 });

        await index.clear();
        expect(await index.stats()).toEqual({ documentCount: 0, chunkCount: 0, indexSize: 0, dimension: 3 });
    });

    it('should reject a non-positive dimension', () => {
        expect(() => new VectorIndex({ dimension: 0 })).toThrow('positive integer');
    });
});

describe('VectorIndex persistence', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir('vector-index');
    });

    afterEach(() => {
        removeDir(dir);
    });

    async function persistedIndex(): Promise<VectorIndex> {
        const index = createVectorIndex({ dimension: 3, directory: dir });
        const paged = entryInput('b', 0, [0, -1, 0.5]);
        paged.metadata.pageNumber = 2;
        await index.insertMany([entryInput('a', 0, [0.1, 0.2, 0.3]), entryInput('a', 1, [1, 0, 0]), paged]);
        await index.persist();
        return index;
    }

    it('should write the three index files', async () => {
        await persistedIndex();

        expect(fs.readdirSync(dir).sort()).toEqual(['manifest.json', 'metadata.json', 'vectors.bin']);
        expect(fs.statSync(path.join(dir, 'vectors.bin')).size).toBe(3 * 3 * 8);

        const manifest: unknown = JSON.parse(fs.readFileSync(path.join(dir, 'manifest.json'), 'utf-8'));
        expect(manifest).toMatchObject({ formatVersion: 1, dimension: 3, metric: 'cosine', entryCount: 3 });
    });

    it('should load exactly what was persisted', async () => {
        const original = await persistedIndex();

        const restored = createVectorIndex({ dimension: 3, directory: dir });
        const report = await restored.load();

        expect(report).toEqual({ status: 'loaded', entryCount: 3 });
        expect(await restored.search([0.1, 0.2, 0.3], 3)).toEqual(await original.search([0.1, 0.2, 0.3], 3));
        expect((await restored.entriesFor('b'))[0]?.pageNumber).toBe(2);
    });

    it('should report a missing index', async () => {
        const index = createVectorIndex({ dimension: 3, directory: path.join(dir, 'nothing-here') });
        expect(await index.load()).toEqual({ status: 'missing', entryCount: 0 });
    });

    it('should refuse an index of another dimension', async () => {
        await persistedIndex();

        const index = createVectorIndex({ dimension: 4, directory: dir });
        const report = await index.load();

        expect(report.status).toBe('incompatible');
        expect(report.reason).toBe('Stored dimension 3, configured 4');
        expect((await index.stats()).chunkCount).toBe(0);
    });

    it('should refuse an index of another format version', async () => {
        await persistedIndex();
        const manifestPath = path.join(dir, 'manifest.json');
        const manifest = fs.readFileSync(manifestPath, 'utf-8');
        fs.writeFileSync(manifestPath, manifest.replace('"formatVersion": 1', '"formatVersion": 99'));

        const report = await createVectorIndex({ dimension: 3, directory: dir }).load();
        expect(report.status).toBe('incompatible');
    });

    it('should detect a truncated vectors file', async () => {
        await persistedIndex();
        const vectorsPath = path.join(dir, 'vectors.bin');
        fs.writeFileSync(vectorsPath, fs.readFileSync(vectorsPath).subarray(0, 40));

        const index = createVectorIndex({ dimension: 3, directory: dir });
        const report = await index.load();

        expect(report).toEqual({ status: 'corrupt', entryCount: 0, reason: 'vectors.bin has 40 bytes, expected 72' });
        expect((await index.stats()).chunkCount).toBe(0);
    });

    it('should detect an unreadable manifest', async () => {
        fs.writeFileSync(path.join(dir, 'manifest.json'), '{ not json');

        const report = await createVectorIndex({ dimension: 3, directory: dir }).load();
        expect(report.status).toBe('corrupt');
    });

    it('should report a manifest that cannot be read as corrupt', async () => {
        fs.mkdirSync(path.join(dir, 'manifest.json'));

        const index = createVectorIndex({ dimension: 3, directory: dir });
        const report = await index.load();

        expect(report.status).toBe('corrupt');
        expect(report.entryCount).toBe(0);
        expect(report.reason).toMatch(/^Unreadable manifest: /);
        expect((await index.stats()).chunkCount).toBe(0);
    });

    it('should report a vectors file that cannot be read as corrupt', async () => {
        await persistedIndex();
        const vectorsPath = path.join(dir, 'vectors.bin');
        fs.rmSync(vectorsPath);
        fs.mkdirSync(vectorsPath);

        const report = await createVectorIndex({ dimension: 3, directory: dir }).load();
        expect(report).toMatchObject({ status: 'corrupt', entryCount: 0 });
    });

    it('should detect metadata that disagrees with the manifest', async () => {
        await persistedIndex();
        fs.writeFileSync(path.join(dir, 'metadata.json'), '[]');

        const report = await createVectorIndex({ dimension: 3, directory: dir }).load();
        expect(report).toEqual({ status: 'corrupt', entryCount: 0, reason: 'metadata.json has 0 entries, expected 3' });
    });

    it('should serialize concurrent persists', async () => {
        const index = await persistedIndex();
        await index.deleteByDocument('a');

        await Promise.all([index.persist(), index.persist()]);

        const restored = createVectorIndex({ dimension: 3, directory: dir });
        expect(await restored.load()).toEqual({ status: 'loaded', entryCount: 1 });
    });

    it('should require a directory to persist', async () => {
        await expect(createVectorIndex({ dimension: 3 }).persist()).rejects.toThrow('no storage directory');
    });
});
