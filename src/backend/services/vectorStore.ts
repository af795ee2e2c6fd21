/**
 * Vector Index
 *
 * Exact (brute-force) similarity index over chunk embeddings, with the
 * chunk metadata needed to cite a hit kept beside each vector.
 *
 * Scoring: cosine similarity, higher = more similar. Results come back in
 * descending score order; ties go to the lower documentId, then the lower
 * sequenceIndex. A score threshold is a minimum: hits scoring below it are
 * dropped.
 *
 * Every operation runs under one ReadWriteLock: searches share it, inserts
 * and deletes take it exclusively. Mutations build new maps and swap them
 * in, so a failing mutation leaves the index untouched.
 *
 * On disk the index is a directory of three files:
 * - vectors.bin: entryCount x dimension float64 values, little endian
 * - metadata.json: entry metadata, in the same order as the vectors
 * - manifest.json: format version, dimension, metric, entry count
 * The manifest is written last, so a crash mid-write shows up as a
 * manifest that doesn't match the other files.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DimensionMismatchError, InvalidQueryError } from '../errors';
import { IndexEntry, IndexEntryInput, IndexStats, SearchResult } from '../../shared/types';
import { isMissingFileError } from '../utils/fsErrors';
import { ReadWriteLock } from '../utils/readWriteLock';

export const INDEX_FORMAT_VERSION = 1;
export const INDEX_METRIC = 'cosine';

const VECTORS_FILE = 'vectors.bin';
const METADATA_FILE = 'metadata.json';
const MANIFEST_FILE = 'manifest.json';
const BYTES_PER_VALUE = 8;

const manifestSchema = z.object({
  formatVersion: z.number().int(),
  dimension: z.number().int().positive(),
  metric: z.string(),
  entryCount: z.number().int().nonnegative(),
  persistedAt: z.string(),
});

export type IndexManifest = z.infer<typeof manifestSchema>;

const entrySchema = z.object({
  chunkId: z.string().min(1),
  documentId: z.string().min(1),
  sequenceIndex: z.number().int().nonnegative(),
  filename: z.string(),
  text: z.string(),
  startOffset: z.number().int().nonnegative(),
  endOffset: z.number().int().nonnegative(),
  pageNumber: z.number().int().positive().optional(),
});

const metadataSchema = z.array(entrySchema);

/**
 * Outcome of loading a persisted index. Anything but `loaded` leaves the
 * index empty.
 */
export interface LoadReport {
  status: 'loaded' | 'missing' | 'corrupt' | 'incompatible';
  entryCount: number;
  reason?: string;
}

export interface VectorIndexConfig {
  dimension: number;
  /** Directory for persist/load; without it the index is memory-only */
  directory?: string;
}

/**
 * Calculate cosine similarity between two vectors.
 *
 * - 1.0 = identical direction (most similar)
 * - 0.0 = perpendicular (unrelated), also used when either vector is zero
 * - -1.0 = opposite direction
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    magnitudeA += aVal * aVal;
    magnitudeB += bVal * bVal;
  }

  const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);
  if (magnitude === 0) {
    return 0;
  }
  return dotProduct / magnitude;
}

/**
 * Ordering of search hits: score descending, then documentId, then sequenceIndex.
 */
export function compareHits(
  a: { entry: IndexEntry; score: number },
  b: { entry: IndexEntry; score: number }
): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.entry.documentId !== b.entry.documentId) {
    return a.entry.documentId < b.entry.documentId ? -1 : 1;
  }
  return a.entry.sequenceIndex - b.entry.sequenceIndex;
}

interface StoredVector {
  entry: IndexEntry;
  vector: Float64Array;
  norm: number;
}

interface IndexState {
  entries: Map<string, StoredVector>;
  byDocument: Map<string, Set<string>>;
}

function emptyState(): IndexState {
  return { entries: new Map(), byDocument: new Map() };
}

function norm(vector: Float64Array): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

function toStoredVector(entry: IndexEntry, values: ArrayLike<number>): StoredVector {
  const vector = Float64Array.from(values);
  return { entry, vector, norm: norm(vector) };
}

function addToState(state: IndexState, stored: StoredVector): void {
  const previous = state.entries.get(stored.entry.chunkId);
  if (previous) {
    removeFromDocument(state, previous.entry);
  }
  state.entries.set(stored.entry.chunkId, stored);

  let chunkIds = state.byDocument.get(stored.entry.documentId);
  if (!chunkIds) {
    chunkIds = new Set();
    state.byDocument.set(stored.entry.documentId, chunkIds);
  }
  chunkIds.add(stored.entry.chunkId);
}

function removeFromDocument(state: IndexState, entry: IndexEntry): void {
  const chunkIds = state.byDocument.get(entry.documentId);
  if (!chunkIds) {
    return;
  }
  chunkIds.delete(entry.chunkId);
  if (chunkIds.size === 0) {
    state.byDocument.delete(entry.documentId);
  }
}

function copyState(state: IndexState): IndexState {
  const byDocument = new Map<string, Set<string>>();
  for (const [documentId, chunkIds] of state.byDocument) {
    byDocument.set(documentId, new Set(chunkIds));
  }
  return { entries: new Map(state.entries), byDocument };
}

/**
 * In-memory vector index with optional on-disk persistence.
 */
export class VectorIndex {
  private state: IndexState = emptyState();
  private readonly lock = new ReadWriteLock();
  private persistQueue: Promise<void> = Promise.resolve();

  constructor(private readonly config: VectorIndexConfig) {
    if (!Number.isInteger(config.dimension) || config.dimension < 1) {
      throw new Error(`Index dimension must be a positive integer, got ${config.dimension}`);
    }
  }

  get dimension(): number {
    return this.config.dimension;
  }

  /**
   * Add a single entry. An existing entry with the same chunk id is replaced.
   */
  async insert(chunkId: string, vector: number[], metadata: IndexEntryInput['metadata']): Promise<void> {
    await this.insertMany([{ chunkId, vector, metadata }]);
  }

  /**
   * Add several entries; either all of them land or none does.
   */
  async insertMany(inputs: IndexEntryInput[]): Promise<void> {
    const prepared = inputs.map((input) => this.prepare(input));
    await this.lock.withWrite(() => {
      const next = copyState(this.state);
      for (const stored of prepared) {
        addToState(next, stored);
      }
      this.state = next;
    });
  }

  /**
   * Swap all entries of a document for a new set in one step. Searches see
   * either the old entries or the new ones, never a mix.
   */
  async replaceDocument(documentId: string, inputs: IndexEntryInput[]): Promise<{ removed: number; added: number }> {
    const prepared = inputs.map((input) => this.prepare(input));
    const foreign = prepared.find((stored) => stored.entry.documentId !== documentId);
    if (foreign) {
      throw new Error(`Entry ${foreign.entry.chunkId} does not belong to document ${documentId}`);
    }

    return this.lock.withWrite(() => {
      const next = copyState(this.state);
      const removed = this.removeDocument(next, documentId);
      for (const stored of prepared) {
        addToState(next, stored);
      }
      this.state = next;
      return { removed, added: prepared.length };
    });
  }

  /**
   * Top-k entries most similar to the query vector, best first.
   *
   * @param scoreThreshold - minimum score a hit must reach
   */
  async search(queryVector: number[], k: number, scoreThreshold?: number): Promise<SearchResult[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidQueryError(`k must be a positive integer, got ${k}`, { k });
    }
    if (queryVector.length !== this.config.dimension) {
      throw new DimensionMismatchError(this.config.dimension, queryVector.length);
    }

    return this.lock.withRead(() => {
      if (this.state.entries.size === 0) {
        return [];
      }

      const query = Float64Array.from(queryVector);
      const queryNorm = norm(query);
      const hits: { entry: IndexEntry; score: number }[] = [];

      for (const stored of this.state.entries.values()) {
        const score = this.score(query, queryNorm, stored);
        if (scoreThreshold === undefined || score >= scoreThreshold) {
          hits.push({ entry: stored.entry, score });
        }
      }

      hits.sort(compareHits);
      return hits.slice(0, k).map((hit, index) => ({ ...hit, rank: index + 1 }));
    });
  }

  /**
   * Delete every entry of a document.
   * @returns number of entries removed
   */
  async deleteByDocument(documentId: string): Promise<number> {
    return this.lock.withWrite(() => {
      if (!this.state.byDocument.has(documentId)) {
        return 0;
      }
      const next = copyState(this.state);
      const removed = this.removeDocument(next, documentId);
      this.state = next;
      return removed;
    });
  }

  async hasDocument(documentId: string): Promise<boolean> {
    return this.lock.withRead(() => this.state.byDocument.has(documentId));
  }

  async documentIds(): Promise<string[]> {
    return this.lock.withRead(() => Array.from(this.state.byDocument.keys()).sort());
  }

  /**
   * Entries of a document in sequence order.
   */
  async entriesFor(documentId: string): Promise<IndexEntry[]> {
    return this.lock.withRead(() => {
      const chunkIds = this.state.byDocument.get(documentId) ?? new Set<string>();
      const entries: IndexEntry[] = [];
      for (const chunkId of chunkIds) {
        const stored = this.state.entries.get(chunkId);
        if (stored) {
          entries.push(stored.entry);
        }
      }
      return entries.sort((a, b) => a.sequenceIndex - b.sequenceIndex);
    });
  }

  async stats(): Promise<IndexStats> {
    return this.lock.withRead(() => ({
      documentCount: this.state.byDocument.size,
      chunkCount: this.state.entries.size,
      indexSize: this.state.entries.size * this.config.dimension * BYTES_PER_VALUE,
      dimension: this.config.dimension,
    }));
  }

  async clear(): Promise<void> {
    await this.lock.withWrite(() => {
      this.state = emptyState();
    });
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  /**
   * Writes the current contents to the configured directory.
   * Concurrent calls are written one after another, in call order.
   */
  async persist(): Promise<void> {
    const directory = this.requireDirectory();

    const pending = await this.lock.withRead(() => {
      const snapshot = Array.from(this.state.entries.values());
      const write = this.persistQueue.then(() => this.writeSnapshot(directory, snapshot));
      // Failures reach the caller through `write`; the queue itself moves on
      this.persistQueue = write.catch(() => undefined);
      return { write };
    });
    await pending.write;
  }

  /**
   * Replaces the contents with what is stored in the configured directory.
   * A missing, corrupt, unreadable or incompatible store leaves the index
   * empty; the report says which. Only a missing storage directory setting
   * throws.
   */
  async load(): Promise<LoadReport> {
    const directory = this.requireDirectory();

    return this.lock.withWrite(async (): Promise<LoadReport> => {
      this.state = emptyState();

      let manifestText: string;
      try {
        manifestText = await fs.promises.readFile(path.join(directory, MANIFEST_FILE), 'utf-8');
      } catch (error) {
        if (isMissingFileError(error)) {
          return { status: 'missing', entryCount: 0 };
        }
        return this.corrupt(`Unreadable manifest: ${errorMessage(error)}`);
      }

      let manifest: IndexManifest;
      try {
        manifest = manifestSchema.parse(JSON.parse(manifestText));
      } catch (error) {
        return this.corrupt(`Unreadable manifest: ${errorMessage(error)}`);
      }

      if (manifest.formatVersion !== INDEX_FORMAT_VERSION || manifest.metric !== INDEX_METRIC) {
        return {
          status: 'incompatible',
          entryCount: 0,
          reason: `Stored format ${manifest.formatVersion}/${manifest.metric}, expected ${INDEX_FORMAT_VERSION}/${INDEX_METRIC}`,
        };
      }
      if (manifest.dimension !== this.config.dimension) {
        return {
          status: 'incompatible',
          entryCount: 0,
          reason: `Stored dimension ${manifest.dimension}, configured ${this.config.dimension}`,
        };
      }

      try {
        this.state = await this.readState(directory, manifest);
      } catch (error) {
        return this.corrupt(errorMessage(error));
      }
      return { status: 'loaded', entryCount: this.state.entries.size };
    });
  }

  private corrupt(reason: string): LoadReport {
    this.state = emptyState();
    return { status: 'corrupt', entryCount: 0, reason };
  }

  private async readState(directory: string, manifest: IndexManifest): Promise<IndexState> {
    const vectors = await fs.promises.readFile(path.join(directory, VECTORS_FILE));
    const expectedBytes = manifest.entryCount * manifest.dimension * BYTES_PER_VALUE;
    if (vectors.length !== expectedBytes) {
      throw new Error(`${VECTORS_FILE} has ${vectors.length} bytes, expected ${expectedBytes}`);
    }

    const metadataText = await fs.promises.readFile(path.join(directory, METADATA_FILE), 'utf-8');
    const entries = metadataSchema.parse(JSON.parse(metadataText));
    if (entries.length !== manifest.entryCount) {
      throw new Error(`${METADATA_FILE} has ${entries.length} entries, expected ${manifest.entryCount}`);
    }

    const state = emptyState();
    entries.forEach((entry, position) => {
      const values = new Float64Array(manifest.dimension);
      const base = position * manifest.dimension * BYTES_PER_VALUE;
      for (let i = 0; i < manifest.dimension; i++) {
        const value = vectors.readDoubleLE(base + i * BYTES_PER_VALUE);
        if (!Number.isFinite(value)) {
          throw new Error(`Non-finite value in vector of ${entry.chunkId}`);
        }
        values[i] = value;
      }
      addToState(state, { entry, vector: values, norm: norm(values) });
    });
    return state;
  }

  private async writeSnapshot(directory: string, snapshot: StoredVector[]): Promise<void> {
    await fs.promises.mkdir(directory, { recursive: true });

    const dimension = this.config.dimension;
    const vectors = Buffer.alloc(snapshot.length * dimension * BYTES_PER_VALUE);
    snapshot.forEach((stored, position) => {
      stored.vector.forEach((value, i) => {
        vectors.writeDoubleLE(value, (position * dimension + i) * BYTES_PER_VALUE);
      });
    });

    const manifest: IndexManifest = {
      formatVersion: INDEX_FORMAT_VERSION,
      dimension,
      metric: INDEX_METRIC,
      entryCount: snapshot.length,
      persistedAt: new Date().toISOString(),
    };

    // Write to temp files first, then rename; manifest goes last
    await writeAtomic(path.join(directory, VECTORS_FILE), vectors);
    await writeAtomic(
      path.join(directory, METADATA_FILE),
      JSON.stringify(snapshot.map((stored) => stored.entry))
    );
    await writeAtomic(path.join(directory, MANIFEST_FILE), JSON.stringify(manifest, null, 2));
  }

  private requireDirectory(): string {
    if (!this.config.directory) {
      throw new Error('Vector index has no storage directory configured');
    }
    return this.config.directory;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private prepare(input: IndexEntryInput): StoredVector {
    if (input.vector.length !== this.config.dimension) {
      throw new DimensionMismatchError(this.config.dimension, input.vector.length);
    }
    return toStoredVector({ chunkId: input.chunkId, ...input.metadata }, input.vector);
  }

  private removeDocument(state: IndexState, documentId: string): number {
    const chunkIds = state.byDocument.get(documentId);
    if (!chunkIds) {
      return 0;
    }
    let removed = 0;
    for (const chunkId of chunkIds) {
      if (state.entries.delete(chunkId)) {
        removed++;
      }
    }
    state.byDocument.delete(documentId);
    return removed;
  }

  private score(query: Float64Array, queryNorm: number, stored: StoredVector): number {
    const magnitude = queryNorm * stored.norm;
    if (magnitude === 0) {
      return 0;
    }
    let dotProduct = 0;
    for (let i = 0; i < query.length; i++) {
      dotProduct += (query[i] ?? 0) * (stored.vector[i] ?? 0);
    }
    return dotProduct / magnitude;
  }
}

async function writeAtomic(filePath: string, data: string | Buffer): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fs.promises.writeFile(tempPath, data);
  await fs.promises.rename(tempPath, filePath);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Factory function to create a vector index.
 */
export function createVectorIndex(config: VectorIndexConfig): VectorIndex {
  return new VectorIndex(config);
}
