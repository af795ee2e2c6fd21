/**
 * Ollama Client
 *
 * Wrapper for communicating with an Ollama instance, which provides both
 * external capabilities the core depends on: embeddings and answer
 * generation. This follows the Adapter pattern: the rest of the code only
 * sees the EmbeddingProvider and GenerationProvider interfaces.
 *
 * Ollama API endpoints used:
 * - GET /api/tags - List available models (used for health check)
 * - POST /api/embed - Batch embeddings
 * - POST /api/generate - Text generation (streamed as NDJSON or whole)
 *
 * Every call carries a timeout and honours the caller's AbortSignal.
 * Retries are not done here; the gateways wrap these calls in the shared
 * retry policy and use isTransientOllamaError to decide.
 */

import { CallOptions, GenerationOutput } from '../../shared/types';
import { CallScope } from './callScope';
import { EmbeddingProvider, GenerationOptions, GenerationProvider } from './types';

/**
 * Configuration for the Ollama client.
 */
export interface OllamaClientConfig {
    /** Base URL for Ollama API (default: http://localhost:11434) */
    baseUrl: string;
    /** Default model for text generation */
    chatModel: string;
    /** Model used for embeddings */
    embeddingModel: string;
    /** Per-request timeout in milliseconds, covering the whole streamed body */
    timeoutMs: number;
    /** Default sampling temperature */
    temperature: number;
    /** Stream generation output as fragments */
    stream: boolean;
}

export const DEFAULT_OLLAMA_CONFIG: OllamaClientConfig = {
    baseUrl: 'http://localhost:11434',
    chatModel: 'llama3.1',
    embeddingModel: 'nomic-embed-text',
    timeoutMs: 30000,
    temperature: 0.2,
    stream: true,
};

/**
 * Error codes for different failure scenarios.
 */
export enum OllamaErrorCode {
    /** Ollama service is not running or unreachable */
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    /** Request took too long */
    TIMEOUT = 'TIMEOUT',
    /** The caller aborted the request */
    CANCELLED = 'CANCELLED',
    /** HTTP 429 */
    RATE_LIMITED = 'RATE_LIMITED',
    /** HTTP 401/403 */
    AUTHENTICATION = 'AUTHENTICATION',
    /** HTTP 400 */
    BAD_REQUEST = 'BAD_REQUEST',
    /** Requested model is not available */
    MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
    /** HTTP 5xx */
    SERVER_ERROR = 'SERVER_ERROR',
    /** Ollama answered with something we can't use */
    API_ERROR = 'API_ERROR',
    /** Unexpected error during communication */
    UNKNOWN = 'UNKNOWN',
}

/**
 * Custom error class for Ollama-specific errors.
 * This allows callers to distinguish Ollama errors from other errors.
 */
export class OllamaError extends Error {
    constructor(
        message: string,
        public readonly code: OllamaErrorCode,
        public readonly status?: number,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'OllamaError';
    }
}

const TRANSIENT_CODES: ReadonlySet<OllamaErrorCode> = new Set([
    OllamaErrorCode.CONNECTION_REFUSED,
    OllamaErrorCode.TIMEOUT,
    OllamaErrorCode.RATE_LIMITED,
    OllamaErrorCode.SERVER_ERROR,
]);

/**
 * Whether a failed call is worth retrying.
 */
export function isTransientOllamaError(error: unknown): boolean {
    return error instanceof OllamaError && TRANSIENT_CODES.has(error.code);
}

/**
 * Response shape from Ollama's /api/embed endpoint.
 * We only define the fields we actually use.
 */
interface OllamaEmbedResponse {
    embeddings: number[][];
}

/**
 * One line of a /api/generate response (the whole body when not streaming).
 */
interface OllamaGenerateChunk {
    response: string;
    done: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function isEmbedResponse(value: unknown): value is OllamaEmbedResponse {
    return (
        isRecord(value) &&
        Array.isArray(value['embeddings']) &&
        value['embeddings'].every(
            (vector: unknown) => Array.isArray(vector) && vector.every((n: unknown) => typeof n === 'number')
        )
    );
}

function isGenerateChunk(value: unknown): value is OllamaGenerateChunk {
    return isRecord(value) && typeof value['response'] === 'string';
}

function isAbortError(error: unknown): boolean {
    return isRecord(error) && error['name'] === 'AbortError';
}

/**
 * Ollama Client Implementation
 */
export class OllamaClient implements EmbeddingProvider, GenerationProvider {
    private readonly config: OllamaClientConfig;

    constructor(config: Partial<OllamaClientConfig> = {}) {
        this.config = { ...DEFAULT_OLLAMA_CONFIG, ...config };
    }

    /**
     * Check if Ollama is available and responding.
     *
     * Used by the /api/health endpoint. /api/tags is lightweight and confirms
     * Ollama is running and can respond to requests.
     */
    async isAvailable(): Promise<boolean> {
        const scope = new CallScope(5000);
        try {
            const response = await fetch(`${this.config.baseUrl}/api/tags`, {
                method: 'GET',
                signal: scope.signal,
            });
            return response.ok;
        } catch {
            // Any error means Ollama is not available
            return false;
        } finally {
            scope.dispose();
        }
    }

    /**
     * Embed a batch of texts with a single request.
     */
    async embed(texts: string[], options: CallOptions = {}): Promise<number[][]> {
        const model = this.config.embeddingModel;
        const scope = new CallScope(this.config.timeoutMs, options.signal);

        try {
            const response = await fetch(`${this.config.baseUrl}/api/embed`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify({ model, input: texts }),
                signal: scope.signal,
            });

            if (!response.ok) {
                await this.handleErrorResponse(response, model);
            }

            const data: unknown = await response.json();
            if (!isEmbedResponse(data)) {
                throw new OllamaError('Embedding response has no embeddings array', OllamaErrorCode.API_ERROR);
            }
            return data.embeddings;
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate embeddings', scope);
        } finally {
            scope.dispose();
        }
    }

    /**
     * Generate a completion for the prompt.
     *
     * With streaming enabled the returned iterable yields fragments as Ollama
     * produces them; the timeout keeps running until the stream ends.
     */
    async generate(prompt: string, options: GenerationOptions = {}): Promise<GenerationOutput> {
        const model = options.model ?? this.config.chatModel;
        const scope = new CallScope(this.config.timeoutMs, options.signal);
        const stream = this.config.stream;

        try {
            const response = await fetch(`${this.config.baseUrl}/api/generate`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify({
                    model,
                    prompt,
                    stream,
                    options: {
                        temperature: options.temperature ?? this.config.temperature,
                        num_predict: options.maxTokens ?? 1024,
                    },
                }),
                signal: scope.signal,
            });

            if (!response.ok) {
                await this.handleErrorResponse(response, model);
            }

            if (!stream) {
                const data: unknown = await response.json();
                if (!isGenerateChunk(data)) {
                    throw new OllamaError('Generation response has no text', OllamaErrorCode.API_ERROR);
                }
                scope.dispose();
                return data.response;
            }

            return this.readGenerateStream(response, scope);
        } catch (error) {
            scope.dispose();
            throw this.wrapError(error, 'Failed to generate completion', scope);
        }
    }

    /**
     * Reads the NDJSON stream of /api/generate, yielding each text fragment.
     */
    private async *readGenerateStream(response: Response, scope: CallScope): AsyncGenerator<string> {
        const body = response.body;
        if (!body) {
            scope.dispose();
            throw new OllamaError('Generation response has no body', OllamaErrorCode.API_ERROR);
        }

        const reader = body.getReader();
        const decoder = new TextDecoder();
        let buffered = '';

        try {
            for (;;) {
                const { done, value } = await reader.read();
                if (done) {
                    break;
                }
                buffered += decoder.decode(value, { stream: true });

                let newline = buffered.indexOf('\n');
                while (newline !== -1) {
                    const fragment = this.parseStreamLine(buffered.slice(0, newline));
                    buffered = buffered.slice(newline + 1);
                    if (fragment) {
                        yield fragment;
                    }
                    newline = buffered.indexOf('\n');
                }
            }

            buffered += decoder.decode();
            const last = this.parseStreamLine(buffered);
            if (last) {
                yield last;
            }
        } catch (error) {
            throw this.wrapError(error, 'Generation stream failed', scope);
        } finally {
            scope.dispose();
            reader.releaseLock();
        }
    }

    private parseStreamLine(line: string): string {
        const trimmed = line.trim();
        if (!trimmed) {
            return '';
        }

        let data: unknown;
        try {
            data = JSON.parse(trimmed);
        } catch (error) {
            throw new OllamaError('Malformed line in generation stream', OllamaErrorCode.API_ERROR, undefined, error);
        }

        if (isRecord(data) && typeof data['error'] === 'string') {
            throw new OllamaError(`Ollama stream error: ${data['error']}`, OllamaErrorCode.API_ERROR);
        }
        return isGenerateChunk(data) ? data.response : '';
    }

    /**
     * Handle non-OK HTTP responses from Ollama.
     */
    private async handleErrorResponse(response: Response, model: string): Promise<never> {
        let errorMessage: string;

        try {
            const errorBody: unknown = await response.json();
            errorMessage =
                isRecord(errorBody) && typeof errorBody['error'] === 'string'
                    ? errorBody['error']
                    : `HTTP ${response.status}`;
        } catch {
            errorMessage = `HTTP ${response.status}: ${response.statusText}`;
        }

        const status = response.status;
        if (status === 404 || errorMessage.includes('not found')) {
            throw new OllamaError(
                `Model "${model}" not found. Please run: ollama pull ${model}`,
                OllamaErrorCode.MODEL_NOT_FOUND,
                status
            );
        }
        if (status === 429) {
            throw new OllamaError(`Rate limited: ${errorMessage}`, OllamaErrorCode.RATE_LIMITED, status);
        }
        if (status === 401 || status === 403) {
            throw new OllamaError(`Not authorized: ${errorMessage}`, OllamaErrorCode.AUTHENTICATION, status);
        }
        if (status === 400) {
            throw new OllamaError(`Bad request: ${errorMessage}`, OllamaErrorCode.BAD_REQUEST, status);
        }
        if (status >= 500) {
            throw new OllamaError(`Ollama server error: ${errorMessage}`, OllamaErrorCode.SERVER_ERROR, status);
        }

        throw new OllamaError(`Ollama API error: ${errorMessage}`, OllamaErrorCode.API_ERROR, status);
    }

    /**
     * Wrap errors in OllamaError for consistent error handling.
     */
    private wrapError(error: unknown, context: string, scope: CallScope): OllamaError {
        if (error instanceof OllamaError) {
            return error;
        }

        if (isAbortError(error) || scope.signal.aborted) {
            if (scope.timedOut && !scope.cancelled) {
                return new OllamaError(
                    `Request timed out after ${scope.timeoutMs}ms`,
                    OllamaErrorCode.TIMEOUT,
                    undefined,
                    error
                );
            }
            return new OllamaError(`${context}: request cancelled`, OllamaErrorCode.CANCELLED, undefined, error);
        }

        // Connection errors (Ollama not running)
        if (error instanceof TypeError && error.message.includes('fetch')) {
            return new OllamaError(
                'Cannot connect to Ollama. Please ensure Ollama is running (ollama serve)',
                OllamaErrorCode.CONNECTION_REFUSED,
                undefined,
                error
            );
        }

        const message = error instanceof Error ? error.message : String(error);
        return new OllamaError(`${context}: ${message}`, OllamaErrorCode.UNKNOWN, undefined, error);
    }
}

/**
 * Factory function to create an Ollama client.
 */
export function createOllamaClient(config?: Partial<OllamaClientConfig>): OllamaClient {
    return new OllamaClient(config);
}
