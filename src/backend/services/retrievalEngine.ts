/**
 * Retrieval Engine
 *
 * The "retrieve" and "augment" halves of RAG:
 * 1. Build the query text, optionally prefixed with recent conversation turns
 * 2. Embed it through the embedding gateway
 * 3. Search the vector index (the index applies the score threshold)
 * 4. Assemble the surviving chunks into a context that fits a character budget
 *
 * Context blocks look like "[n] <chunk text>" and are separated by a blank
 * line. The citation map ties each marker back to its chunk so the answer
 * synthesizer can resolve what the model cites.
 */

import { describeError, InvalidQueryError, RetrievalError } from '../errors';
import { HistoryMode } from '../config';
import { ChatMessage, Citation, CitationMap, SearchResult } from '../../shared/types';
import { createLogger } from '../utils/logger';
import { EmbeddingGateway } from './embeddingGateway';
import { VectorIndex } from './vectorStore';

const log = createLogger('retrieval');

export interface RetrievalConfig {
  /** Number of chunks to retrieve when the request doesn't say */
  topK: number;
  /** Minimum similarity score a chunk needs */
  scoreThreshold: number;
  /** Default context size in characters */
  contextBudgetChars: number;
  /** When to prefix the question with conversation turns */
  historyMode: HistoryMode;
  /** How many of the latest turns to use */
  historyTurns: number;
}

export const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
  topK: 5,
  scoreThreshold: 0.35,
  contextBudgetChars: 4000,
  historyMode: 'anaphora',
  historyTurns: 4,
};

export interface RetrieveRequest {
  question: string;
  k?: number;
  scoreThreshold?: number;
  history?: ChatMessage[];
  signal?: AbortSignal;
}

export type RetrievalOutcome =
  | { status: 'found'; candidates: SearchResult[]; queryText: string }
  | { status: 'not_found'; queryText: string };

export interface AssembledContext {
  context: string;
  citations: CitationMap;
  /** Candidates that made it into the context, in rank order */
  used: SearchResult[];
  /** Candidates left out because the budget ran out */
  dropped: number;
}

const CONTEXT_SEPARATOR = '\n\n';
const EXCERPT_LENGTH = 200;

/**
 * Words that point back at something said earlier in the conversation.
 */
const REFERRING_WORDS = new Set([
  'it',
  'its',
  'they',
  'them',
  'their',
  'theirs',
  'this',
  'that',
  'these',
  'those',
  'he',
  'him',
  'his',
  'she',
  'her',
  'there',
  'former',
  'latter',
  'above',
  'same',
]);

/**
 * Whether the question refers back to earlier turns.
 */
export function hasAnaphora(question: string): boolean {
  const words = question.toLowerCase().match(/[a-z]+/g) ?? [];
  return words.some((word) => REFERRING_WORDS.has(word));
}

/**
 * Text that gets embedded for the search. With history it reads
 * "role: text" lines, oldest first, followed by the question.
 */
export function buildQueryText(
  question: string,
  history: ChatMessage[],
  mode: HistoryMode,
  turns: number
): string {
  const useHistory = mode === 'always' || (mode === 'anaphora' && hasAnaphora(question));
  if (!useHistory || turns <= 0 || history.length === 0) {
    return question;
  }

  const lines = history.slice(-turns).map((message) => `${message.role}: ${message.text}`);
  return [...lines, question].join('\n');
}

function truncateExcerpt(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 3) + '...';
}

/**
 * Packs ranked candidates into a context of at most budgetChars characters.
 * Stops at the first block that doesn't fit; chunks are never cut.
 */
export function assembleContext(candidates: SearchResult[], budgetChars: number): AssembledContext {
  if (!Number.isInteger(budgetChars) || budgetChars < 1) {
    throw new InvalidQueryError(`Context budget must be a positive integer, got ${budgetChars}`, {
      contextBudget: budgetChars,
    });
  }

  const citations: CitationMap = new Map();
  const used: SearchResult[] = [];
  let context = '';

  for (const candidate of candidates) {
    const marker = `[${used.length + 1}]`;
    const block = `${marker} ${candidate.entry.text}`;
    const next = context.length === 0 ? block : `${context}${CONTEXT_SEPARATOR}${block}`;
    if (next.length > budgetChars) {
      break;
    }

    context = next;
    used.push(candidate);

    const citation: Citation = {
      marker,
      chunkId: candidate.entry.chunkId,
      documentId: candidate.entry.documentId,
      sequenceIndex: candidate.entry.sequenceIndex,
      filename: candidate.entry.filename,
      excerpt: truncateExcerpt(candidate.entry.text, EXCERPT_LENGTH),
      score: candidate.score,
    };
    if (candidate.entry.pageNumber !== undefined) {
      citation.pageNumber = candidate.entry.pageNumber;
    }
    citations.set(marker, citation);
  }

  return { context, citations, used, dropped: candidates.length - used.length };
}

export class RetrievalEngine {
  private readonly config: RetrievalConfig;

  constructor(
    private readonly embeddings: EmbeddingGateway,
    private readonly index: VectorIndex,
    config: Partial<RetrievalConfig> = {}
  ) {
    this.config = { ...DEFAULT_RETRIEVAL_CONFIG, ...config };
  }

  getConfig(): RetrievalConfig {
    return { ...this.config };
  }

  /**
   * Finds the chunks most relevant to the question.
   * Embedding or search failures surface as RetrievalError; an invalid k
   * stays an InvalidQueryError.
   */
  async retrieve(request: RetrieveRequest): Promise<RetrievalOutcome> {
    const k = request.k ?? this.config.topK;
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidQueryError(`k must be a positive integer, got ${k}`, { k });
    }
    const scoreThreshold = request.scoreThreshold ?? this.config.scoreThreshold;

    const queryText = buildQueryText(
      request.question,
      request.history ?? [],
      this.config.historyMode,
      this.config.historyTurns
    );

    let candidates: SearchResult[];
    try {
      const queryVector = await this.embeddings.embedOne(queryText, { signal: request.signal });
      candidates = await this.index.search(queryVector, k, scoreThreshold);
    } catch (error) {
      if (error instanceof InvalidQueryError) {
        throw error;
      }
      throw new RetrievalError(`Retrieval failed: ${describeError(error).message}`, error);
    }

    log.debug('Retrieved candidates', {
      k,
      scoreThreshold,
      candidates: candidates.length,
      augmented: queryText !== request.question,
    });

    if (candidates.length === 0) {
      return { status: 'not_found', queryText };
    }
    return { status: 'found', candidates, queryText };
  }

  /**
   * Context assembly with the configured budget as default.
   */
  assembleContext(candidates: SearchResult[], budgetChars: number = this.config.contextBudgetChars): AssembledContext {
    return assembleContext(candidates, budgetChars);
  }
}
