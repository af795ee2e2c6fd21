/**
 * Shared type definitions for the document Q&A service
 *
 * These types define the contract between the core pipeline and the HTTP
 * layer. They're organized by domain:
 * - Documents: Ingested content and its processing status
 * - Chunks & Index: Units of retrieval and their index entries
 * - Retrieval & Answers: Search results, citations, answers
 * - Sessions: Conversation history
 * - API: Request/response shapes
 */

// ============================================================================
// Document Types
// ============================================================================

/**
 * Supported document formats.
 * Each format requires a specific extractor.
 */
export type DocumentFormat = 'text' | 'markdown' | 'pdf' | 'docx';

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ['text', 'markdown', 'pdf', 'docx'];

/**
 * Processing status for ingested documents.
 * - pending: Registered but not yet picked up
 * - processing: Extraction, chunking or embedding in progress
 * - ready: Indexed and searchable
 * - failed: Processing failed, see `error`
 */
export type ProcessingStatus = 'pending' | 'processing' | 'ready' | 'failed';

/**
 * A document in the corpus. The record holds metadata only; the text
 * lives in the vector index as chunks.
 */
export interface DocumentRecord {
    id: string;
    filename: string;
    format: DocumentFormat;
    uploadedAt: Date;
    sizeBytes: number;
    status: ProcessingStatus;
    chunkCount: number;
    encoding?: string;
    pageCount?: number;
    indexedAt?: Date;
    error?: DocumentError;
}

export interface DocumentError {
    code: string;
    message: string;
}

/**
 * Document record format for JSON persistence.
 * Dates are stored as ISO strings.
 */
export interface StoredDocumentRecord {
    id: string;
    filename: string;
    format: DocumentFormat;
    uploadedAt: string; // ISO date
    sizeBytes: number;
    status: ProcessingStatus;
    chunkCount: number;
    encoding?: string;
    pageCount?: number;
    indexedAt?: string; // ISO date
    error?: DocumentError;
}

// ============================================================================
// Extraction & Chunk Types
// ============================================================================

/**
 * Character range of one page in the extracted text.
 * `endOffset` is exclusive.
 */
export interface PageBoundary {
    pageNumber: number;
    startOffset: number;
    endOffset: number;
}

export interface ExtractedText {
    text: string;
    pages: PageBoundary[];
    /** Detected source encoding for text formats */
    encoding?: string;
}

/**
 * A chunk produced by the chunker, before it is tied to a document.
 */
export interface ChunkCandidate {
    sequenceIndex: number;
    text: string;
    startOffset: number;
    /** Exclusive */
    endOffset: number;
    pageNumber?: number;
    /** Leading characters shared with the previous chunk (0 for the first) */
    overlap: number;
}

/**
 * A chunk owned by a document. Identity is (documentId, sequenceIndex).
 */
export interface Chunk extends ChunkCandidate {
    id: string;
    documentId: string;
}

// ============================================================================
// Vector Index Types
// ============================================================================

/**
 * Metadata the index keeps beside each vector, enough to cite the chunk
 * without going back to the document.
 */
export interface IndexEntryMetadata {
    documentId: string;
    sequenceIndex: number;
    filename: string;
    text: string;
    startOffset: number;
    endOffset: number;
    pageNumber?: number;
}

export interface IndexEntry extends IndexEntryMetadata {
    chunkId: string;
}

/**
 * Input for inserting an entry into the index.
 */
export interface IndexEntryInput {
    chunkId: string;
    vector: number[];
    metadata: IndexEntryMetadata;
}

/**
 * Result of a similarity search.
 * Score is cosine similarity: higher = more similar.
 */
export interface SearchResult {
    entry: IndexEntry;
    score: number;
    /** 1-based position in the result list */
    rank: number;
}

export interface IndexStats {
    documentCount: number;
    chunkCount: number;
    indexSize: number;
    dimension: number;
}

// ============================================================================
// Retrieval & Answer Types
// ============================================================================

/**
 * Maps a context reference marker back to the chunk it tags.
 */
export interface Citation {
    /** Reference marker as it appears in the context, e.g. "[2]" */
    marker: string;
    chunkId: string;
    documentId: string;
    sequenceIndex: number;
    filename: string;
    excerpt: string;
    score: number;
    pageNumber?: number;
}

export type CitationMap = Map<string, Citation>;

/**
 * A sentence of a generated answer together with the chunks it cites.
 */
export interface AnswerSpan {
    text: string;
    start: number;
    end: number;
    chunkIds: string[];
}

export interface AnswerResult {
    text: string;
    sources: Citation[];
    spans: AnswerSpan[];
    confidence: number;
}

// ============================================================================
// Session Types
// ============================================================================

export type MessageRole = 'user' | 'assistant';

/**
 * A single turn in a conversation.
 */
export interface ChatMessage {
    id: string;
    role: MessageRole;
    text: string;
    timestamp: Date;
}

/**
 * A bounded conversation used to contextualize follow-up questions.
 */
export interface Session {
    id: string;
    messages: ChatMessage[];
    createdAt: Date;
    lastActivityAt: Date;
}

/**
 * Session format for JSON persistence.
 */
export interface StoredSession {
    id: string;
    createdAt: string; // ISO date
    lastActivityAt: string; // ISO date
    messages: StoredMessage[];
}

export interface StoredMessage {
    id: string;
    role: MessageRole;
    text: string;
    timestamp: string; // ISO date
}

/**
 * A session as listed by GET /api/sessions, without its messages.
 */
export interface SessionSummary {
    id: string;
    createdAt: Date;
    lastActivityAt: Date;
    messageCount: number;
}

// ============================================================================
// Generation Types
// ============================================================================

/**
 * Options for a call to an external capability.
 */
export interface CallOptions {
    signal?: AbortSignal;
}

/**
 * A generation capability answers either with the whole text at once or
 * with fragments that must be joined in order.
 */
export type GenerationOutput = string | AsyncIterable<string>;

// ============================================================================
// API Types
// ============================================================================

export interface IngestResponse {
    documentId: string;
    status: ProcessingStatus;
    /** True when the same content was already ingested or in flight */
    deduplicated: boolean;
}

export type QueryStatus = 'answered' | 'not_found';

export interface QueryResponse {
    status: QueryStatus;
    answer: string;
    sources: Citation[];
    spans: AnswerSpan[];
    confidence: number;
    sessionId: string;
}

export type DeleteOutcome = 'ok' | 'not_found';

/**
 * Events of a streamed answer, in order: start, sources (once retrieval
 * is done), any number of fragments, then done or error.
 */
export type QueryStreamEvent =
    | { type: 'start'; sessionId: string }
    | { type: 'sources'; sources: Citation[] }
    | { type: 'fragment'; text: string }
    | { type: 'done'; response: QueryResponse }
    | { type: 'error'; error: ErrorResponse };

/**
 * The answer to one question of a batch asked against a fetched document.
 */
export interface BatchAnswer {
    question: string;
    status: QueryStatus | 'failed';
    answer: string;
    sources: Citation[];
    confidence: number;
    error?: DocumentError;
}

export interface UrlQueryResponse {
    documentId: string;
    filename: string;
    answers: BatchAnswer[];
}

export interface StatsResponse extends IndexStats {
    documentsByStatus: Record<ProcessingStatus, number>;
}

/**
 * Response body for GET /api/health
 */
export interface HealthResponse {
    status: 'ok' | 'error';
    ollama: boolean;
}

/**
 * Error body returned by every endpoint on failure.
 */
export interface ErrorResponse {
    error: string;
    code: string;
    category: ErrorCategory;
    retryable: boolean;
    details?: Record<string, unknown>;
}

export type ErrorCategory = 'validation' | 'not_found' | 'upstream' | 'internal';
