/**
 * Embedding Gateway
 *
 * The only path from the core to the embedding capability. Splits the input
 * into batches, retries transient failures through the shared retry policy,
 * and checks every returned vector before anything reaches the index.
 *
 * Any failure fails the whole call with an EmbeddingError; partial results
 * are never returned.
 */

import { EmbeddingProvider } from '../clients/types';
import { isTransientProviderError } from '../clients/failures';
import { EmbeddingError } from '../errors';
import { CallOptions } from '../../shared/types';
import { createLogger } from '../utils/logger';
import { RetryAbortedError, RetryPolicy } from '../utils/retryPolicy';

const log = createLogger('embeddings');

export interface EmbeddingGatewayConfig {
    /** Length every vector must have */
    dimension: number;
    /** Maximum number of texts per provider call */
    batchSize: number;
}

export const DEFAULT_EMBEDDING_CONFIG: EmbeddingGatewayConfig = {
    dimension: 768,
    batchSize: 50,
};

export class EmbeddingGateway {
    private readonly config: EmbeddingGatewayConfig;
    private readonly retryPolicy: RetryPolicy;

    constructor(
        private readonly provider: EmbeddingProvider,
        retryPolicy: RetryPolicy,
        config: Partial<EmbeddingGatewayConfig> = {}
    ) {
        this.config = { ...DEFAULT_EMBEDDING_CONFIG, ...config };
        if (!Number.isInteger(this.config.batchSize) || this.config.batchSize < 1) {
            throw new Error(`batchSize must be a positive integer, got ${this.config.batchSize}`);
        }
        this.retryPolicy = retryPolicy.withPredicate(isTransientProviderError);
    }

    get dimension(): number {
        return this.config.dimension;
    }

    /**
     * Embeds texts in order; the result has one vector per input text.
     */
    async embed(texts: string[], options: CallOptions = {}): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        const vectors: number[][] = [];
        for (let offset = 0; offset < texts.length; offset += this.config.batchSize) {
            const batch = texts.slice(offset, offset + this.config.batchSize);
            const batchVectors = await this.embedBatch(batch, offset, options);
            vectors.push(...batchVectors);
        }
        return vectors;
    }

    /**
     * Embeds a single text.
     */
    async embedOne(text: string, options: CallOptions = {}): Promise<number[]> {
        const [vector] = await this.embed([text], options);
        if (!vector) {
            throw new EmbeddingError('Embedding provider returned no vector', false);
        }
        return vector;
    }

    private async embedBatch(batch: string[], offset: number, options: CallOptions): Promise<number[][]> {
        let vectors: number[][];
        try {
            vectors = await this.retryPolicy.execute(
                () => this.provider.embed(batch, { signal: options.signal }),
                {
                    signal: options.signal,
                    onRetry: ({ attempt, delayMs, error }) => {
                        log.warn('Embedding batch failed, retrying', {
                            attempt,
                            delayMs,
                            batchStart: offset,
                            batchSize: batch.length,
                            error,
                        });
                    },
                }
            );
        } catch (error) {
            throw this.wrapError(error);
        }

        if (vectors.length !== batch.length) {
            throw new EmbeddingError(
                `Embedding provider returned ${vectors.length} vectors for ${batch.length} texts`,
                false,
                { details: { expected: batch.length, actual: vectors.length } }
            );
        }
        vectors.forEach((vector, index) => this.validateVector(vector, offset + index));
        return vectors;
    }

    private validateVector(vector: number[], position: number): void {
        if (vector.length !== this.config.dimension) {
            throw new EmbeddingError(
                `Embedding ${position} has dimension ${vector.length}, expected ${this.config.dimension}`,
                false,
                { details: { position, expected: this.config.dimension, actual: vector.length } }
            );
        }
        if (!vector.every((value) => Number.isFinite(value))) {
            throw new EmbeddingError(`Embedding ${position} contains non-finite values`, false, {
                details: { position },
            });
        }
    }

    private wrapError(error: unknown): EmbeddingError {
        if (error instanceof EmbeddingError) {
            return error;
        }
        if (error instanceof RetryAbortedError) {
            return new EmbeddingError('Embedding cancelled', false, { cause: error });
        }
        const message = error instanceof Error ? error.message : String(error);
        return new EmbeddingError(`Embedding failed: ${message}`, isTransientProviderError(error), {
            cause: error,
        });
    }
}
