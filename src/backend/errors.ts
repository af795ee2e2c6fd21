/**
 * Error taxonomy
 *
 * Every failure the core raises is an AppError subclass. The category
 * decides what the caller sees:
 * - validation: the request was wrong, retrying it unchanged won't help
 * - not_found: the referenced document or session doesn't exist
 * - upstream: the embedding or generation capability failed
 * - internal: a bug or an unexpected condition
 *
 * Upstream errors carry a `transient` flag so callers can decide whether a
 * retry makes sense.
 */

import { ErrorCategory, ErrorResponse } from '../shared/types';

export interface AppErrorOptions {
    details?: Record<string, unknown>;
    cause?: unknown;
}

/**
 * Base class for all errors raised by the core.
 */
export class AppError extends Error {
    public readonly details: Record<string, unknown>;

    constructor(
        message: string,
        public readonly code: string,
        public readonly category: ErrorCategory,
        options: AppErrorOptions = {}
    ) {
        super(message, { cause: options.cause });
        this.name = 'AppError';
        this.details = options.details ?? {};
    }

    /**
     * Whether repeating the same call could succeed.
     */
    get retryable(): boolean {
        return false;
    }
}

// ============================================================================
// Ingestion errors
// ============================================================================

export class UnsupportedFormatError extends AppError {
    constructor(format: string) {
        super(`Unsupported document format: ${format}`, 'UNSUPPORTED_FORMAT', 'validation', {
            details: { format },
        });
        this.name = 'UnsupportedFormatError';
    }
}

export class CorruptDocumentError extends AppError {
    constructor(message: string, options: AppErrorOptions = {}) {
        super(message, 'CORRUPT_DOCUMENT', 'validation', options);
        this.name = 'CorruptDocumentError';
    }
}

export class DocumentTooLargeError extends AppError {
    constructor(sizeBytes: number, maxBytes: number) {
        super(`Document is larger than ${maxBytes} bytes`, 'DOCUMENT_TOO_LARGE', 'validation', {
            details: { sizeBytes, maxBytes },
        });
        this.name = 'DocumentTooLargeError';
    }
}

/**
 * Codes of ingestion failures caused by an external capability.
 */
const UPSTREAM_INGESTION_FAILURES: ReadonlySet<string> = new Set(['EMBEDDING_FAILED', 'DOCUMENT_FETCH_FAILED']);

/**
 * A document that had to be ingested before answering ended up failed.
 */
export class IngestionFailedError extends AppError {
    constructor(documentId: string, failure: { code: string; message: string }) {
        super(
            `Document ${documentId} could not be ingested: ${failure.message}`,
            'INGESTION_FAILED',
            UPSTREAM_INGESTION_FAILURES.has(failure.code) ? 'upstream' : 'validation',
            { details: { documentId, reason: failure.code } }
        );
        this.name = 'IngestionFailedError';
    }
}

export class InvalidChunkConfigError extends AppError {
    constructor(chunkSize: number, overlap: number) {
        super(
            `Invalid chunk configuration: chunkSize=${chunkSize}, overlap=${overlap} (need integers with 0 <= overlap < chunkSize)`,
            'INVALID_CHUNK_CONFIG',
            'validation',
            { details: { chunkSize, overlap } }
        );
        this.name = 'InvalidChunkConfigError';
    }
}

// ============================================================================
// Index and query errors
// ============================================================================

export class DimensionMismatchError extends AppError {
    constructor(expected: number, actual: number) {
        super(
            `Vector dimension mismatch: expected ${expected}, got ${actual}`,
            'DIMENSION_MISMATCH',
            'internal',
            { details: { expected, actual } }
        );
        this.name = 'DimensionMismatchError';
    }
}

export class InvalidQueryError extends AppError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, 'INVALID_QUERY', 'validation', { details });
        this.name = 'InvalidQueryError';
    }
}

export class RequestValidationError extends AppError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, 'INVALID_REQUEST', 'validation', { details });
        this.name = 'RequestValidationError';
    }
}

// ============================================================================
// Upstream errors
// ============================================================================

/**
 * Base for failures of an external capability.
 */
export class UpstreamError extends AppError {
    constructor(
        message: string,
        code: string,
        public readonly transient: boolean,
        options: AppErrorOptions = {}
    ) {
        super(message, code, 'upstream', options);
        this.name = 'UpstreamError';
    }

    override get retryable(): boolean {
        return this.transient;
    }
}

export class EmbeddingError extends UpstreamError {
    constructor(message: string, transient: boolean, options: AppErrorOptions = {}) {
        super(message, 'EMBEDDING_FAILED', transient, options);
        this.name = 'EmbeddingError';
    }
}

export class DocumentFetchError extends UpstreamError {
    constructor(message: string, transient: boolean, options: AppErrorOptions = {}) {
        super(message, 'DOCUMENT_FETCH_FAILED', transient, options);
        this.name = 'DocumentFetchError';
    }
}

export class AnswerGenerationError extends UpstreamError {
    constructor(message: string, transient: boolean, options: AppErrorOptions = {}) {
        super(message, 'ANSWER_GENERATION_FAILED', transient, options);
        this.name = 'AnswerGenerationError';
    }
}

/**
 * Raised when query embedding or index search fails.
 * Takes its category and retryability from the underlying cause.
 */
export class RetrievalError extends AppError {
    constructor(message: string, cause: unknown) {
        super(
            message,
            'RETRIEVAL_FAILED',
            cause instanceof UpstreamError ? 'upstream' : 'internal',
            { cause }
        );
        this.name = 'RetrievalError';
    }

    override get retryable(): boolean {
        return this.cause instanceof AppError && this.cause.retryable;
    }
}

// ============================================================================
// Not-found errors
// ============================================================================

export class SessionNotFoundError extends AppError {
    constructor(sessionId: string) {
        super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND', 'not_found', {
            details: { sessionId },
        });
        this.name = 'SessionNotFoundError';
    }
}

export class DocumentNotFoundError extends AppError {
    constructor(documentId: string) {
        super(`Document not found: ${documentId}`, 'DOCUMENT_NOT_FOUND', 'not_found', {
            details: { documentId },
        });
        this.name = 'DocumentNotFoundError';
    }
}

/**
 * The stored original bytes a document would be processed again from are gone.
 */
export class SourceUnavailableError extends AppError {
    constructor(documentId: string) {
        super(`Original content of document ${documentId} is not stored`, 'SOURCE_UNAVAILABLE', 'not_found', {
            details: { documentId },
        });
        this.name = 'SourceUnavailableError';
    }
}

// ============================================================================
// Mapping
// ============================================================================

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
    validation: 400,
    not_found: 404,
    upstream: 502,
    internal: 500,
};

/**
 * HTTP status for an error. Transient upstream failures answer 503 so
 * clients know a retry may help.
 */
export function httpStatusFor(error: unknown): number {
    if (!(error instanceof AppError)) {
        return 500;
    }
    if (error.category === 'upstream' && error.retryable) {
        return 503;
    }
    return STATUS_BY_CATEGORY[error.category];
}

/**
 * Converts any thrown value into the public error body.
 * Messages of unknown errors are not leaked.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
    if (error instanceof AppError) {
        const response: ErrorResponse = {
            error: error.message,
            code: error.code,
            category: error.category,
            retryable: error.retryable,
        };
        if (Object.keys(error.details).length > 0) {
            response.details = error.details;
        }
        return response;
    }

    return {
        error: 'Internal server error',
        code: 'INTERNAL_ERROR',
        category: 'internal',
        retryable: false,
    };
}

/**
 * Short description of any thrown value, for logs and status records.
 */
export function describeError(error: unknown): { code: string; message: string } {
    if (error instanceof AppError) {
        return { code: error.code, message: error.message };
    }
    if (error instanceof Error) {
        return { code: 'INTERNAL_ERROR', message: error.message };
    }
    return { code: 'INTERNAL_ERROR', message: String(error) };
}
