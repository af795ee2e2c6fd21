/**
 * Backend services
 *
 * Core pipeline components:
 * - DocumentParser: Extracts text (and page boundaries) from uploads
 * - DocumentChunker: Splits text into overlapping windows
 * - EmbeddingGateway: Batched, retried embedding calls
 * - VectorIndex: Cosine-similarity index with on-disk persistence
 * - RetrievalEngine: Query embedding, search and context assembly
 * - AnswerSynthesizer: Prompting, generation and citation mapping
 * - SessionManager: Bounded conversation history
 * - DocumentStorage: Registry of documents and their status
 * - RAGEngine: Facade tying the pipeline together
 */

export {
    validateQuery,
    parseRequest,
    queryRequestSchema,
    uploadFieldsSchema,
    historyQuerySchema,
    urlQueryRequestSchema,
    MAX_QUESTION_LENGTH,
    MAX_BATCH_QUESTIONS,
    MAX_K,
    MAX_CONTEXT_BUDGET,
} from './queryProcessor';

export type { ValidationResult, QueryRequest, UploadFields, HistoryQuery, UrlQueryRequest } from './queryProcessor';

export { SessionManager, createSessionManager, DEFAULT_SESSION_CONFIG } from './sessionManager';

export type { SessionManagerConfig } from './sessionManager';

export {
    PlainTextExtractor,
    MarkdownExtractor,
    PdfExtractor,
    DocxExtractor,
    assemblePages,
    decodeText,
    getExtractor,
    extract,
    isDocumentFormat,
    detectDocumentFormat,
    formatForContentType,
    FORMAT_EXTENSIONS,
} from './documentParser';

export type { DocumentExtractor } from './documentParser';

export {
    DocumentChunker,
    createDocumentChunker,
    chunk,
    chunkId,
    pageForOffset,
    validateChunkConfig,
    DEFAULT_CHUNKING_CONFIG,
} from './documentChunker';

export type { ChunkingConfig } from './documentChunker';

export { EmbeddingGateway, DEFAULT_EMBEDDING_CONFIG } from './embeddingGateway';

export type { EmbeddingGatewayConfig } from './embeddingGateway';

export {
    VectorIndex,
    createVectorIndex,
    cosineSimilarity,
    compareHits,
    INDEX_FORMAT_VERSION,
    INDEX_METRIC,
} from './vectorStore';

export type { VectorIndexConfig, LoadReport, IndexManifest } from './vectorStore';

export {
    RetrievalEngine,
    assembleContext,
    buildQueryText,
    hasAnaphora,
    DEFAULT_RETRIEVAL_CONFIG,
} from './retrievalEngine';

export type { RetrievalConfig, RetrieveRequest, RetrievalOutcome, AssembledContext } from './retrievalEngine';

export {
    AnswerSynthesizer,
    buildPrompt,
    buildSpans,
    calculateConfidence,
    collectOutput,
    extractMarkers,
    selectSources,
    DEFAULT_ANSWER_CONFIG,
} from './answerSynthesizer';

export type { AnswerRequest, AnswerSynthesizerConfig } from './answerSynthesizer';

export { RAGEngine, createRAGEngine, contentHash, NOT_FOUND_ANSWER } from './ragEngine';

export type { RAGEngineOptions, QueryRequestInput, QueryProgressEvent, UrlQueryInput } from './ragEngine';

export { DocumentStorage, createDocumentStorage } from './documentStorage';

export type { DocumentStorageConfig, DocumentStatusUpdate, IDocumentStorage } from './documentStorage';
