/**
 * Document Chunker Service
 *
 * Splits extracted text into overlapping windows for embedding and retrieval.
 *
 * This is a "sliding window" approach:
 * 1. Start at position 0
 * 2. Take chunkSize characters
 * 3. Move forward by (chunkSize - overlap) characters
 * 4. Repeat until a window reaches the end of the text
 *
 * Windows are cut on character positions only, so offsets map straight back
 * into the extracted text and the same input always yields the same chunks.
 * The last chunk may be shorter than chunkSize and is always kept.
 */

import { InvalidChunkConfigError } from '../errors';
import { Chunk, ChunkCandidate, PageBoundary } from '../../shared/types';

/**
 * Configuration for the chunking process.
 */
export interface ChunkingConfig {
  /** Window size in characters */
  chunkSize: number;
  /** Characters shared by consecutive windows */
  overlap: number;
}

/**
 * Default chunking configuration.
 * 1000 chars is roughly 200-250 tokens, a comfortable fit for embedding models.
 */
export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: 1000,
  overlap: 200,
};

/**
 * Throws InvalidChunkConfigError unless both values are integers with
 * 0 <= overlap < chunkSize.
 */
export function validateChunkConfig(chunkSize: number, overlap: number): void {
  const valid =
    Number.isInteger(chunkSize) && Number.isInteger(overlap) && overlap >= 0 && overlap < chunkSize;
  if (!valid) {
    throw new InvalidChunkConfigError(chunkSize, overlap);
  }
}

/**
 * Page holding the given offset: the last page starting at or before it.
 */
export function pageForOffset(pages: PageBoundary[], offset: number): number | undefined {
  let pageNumber: number | undefined;
  for (const page of pages) {
    if (page.startOffset > offset) {
      break;
    }
    pageNumber = page.pageNumber;
  }
  return pageNumber;
}

/**
 * Splits text into overlapping chunks.
 *
 * Only empty text yields no chunks; whitespace is kept like any other
 * text, so the chunks always reconstruct the input.
 */
export function chunk(
  text: string,
  chunkSize: number,
  overlap: number,
  pages: PageBoundary[] = []
): ChunkCandidate[] {
  validateChunkConfig(chunkSize, overlap);

  if (text.length === 0) {
    return [];
  }

  const step = chunkSize - overlap;
  const chunks: ChunkCandidate[] = [];
  let start = 0;

  for (;;) {
    const end = Math.min(start + chunkSize, text.length);
    const candidate: ChunkCandidate = {
      sequenceIndex: chunks.length,
      text: text.slice(start, end),
      startOffset: start,
      endOffset: end,
      overlap: chunks.length === 0 ? 0 : overlap,
    };
    const pageNumber = pageForOffset(pages, start);
    if (pageNumber !== undefined) {
      candidate.pageNumber = pageNumber;
    }
    chunks.push(candidate);

    if (end >= text.length) {
      break;
    }
    start += step;
  }

  return chunks;
}

/**
 * Chunk id as stored in the index.
 */
export function chunkId(documentId: string, sequenceIndex: number): string {
  return `${documentId}:${sequenceIndex}`;
}

/**
 * Document Chunker bound to a chunking configuration.
 * Ties the produced chunks to their owning document.
 */
export class DocumentChunker {
  private readonly config: ChunkingConfig;

  constructor(config: Partial<ChunkingConfig> = {}) {
    this.config = { ...DEFAULT_CHUNKING_CONFIG, ...config };
    validateChunkConfig(this.config.chunkSize, this.config.overlap);
  }

  getConfig(): ChunkingConfig {
    return { ...this.config };
  }

  chunkDocument(documentId: string, text: string, pages: PageBoundary[] = []): Chunk[] {
    return chunk(text, this.config.chunkSize, this.config.overlap, pages).map((candidate) => ({
      ...candidate,
      id: chunkId(documentId, candidate.sequenceIndex),
      documentId,
    }));
  }
}

/**
 * Factory function to create a DocumentChunker.
 */
export function createDocumentChunker(config?: Partial<ChunkingConfig>): DocumentChunker {
  return new DocumentChunker(config);
}
