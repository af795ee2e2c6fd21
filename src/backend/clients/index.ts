/**
 * External service clients
 *
 * Wrappers for external service communication:
 * - OllamaClient: embeddings and answer generation via a local Ollama instance
 * - HttpDocumentFetcher: downloads documents addressed by URL
 */

export {
    OllamaClient,
    createOllamaClient,
    OllamaError,
    OllamaErrorCode,
    isTransientOllamaError,
    DEFAULT_OLLAMA_CONFIG,
    type OllamaClientConfig,
} from './ollamaClient';

export { isTransientProviderError } from './failures';

export type { EmbeddingProvider, GenerationProvider, GenerationOptions } from './types';

export {
    HttpDocumentFetcher,
    createDocumentFetcher,
    filenameFromUrl,
    parseDocumentUrl,
    DEFAULT_FETCHER_CONFIG,
    type DocumentFetcher,
    type FetchedDocument,
    type HttpDocumentFetcherConfig,
} from './documentFetcher';
