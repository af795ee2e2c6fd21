import { CallOptions, GenerationOutput } from '../../shared/types';

/**
 * External embedding capability: one vector per input text, same order.
 */
export interface EmbeddingProvider {
    embed(texts: string[], options?: CallOptions): Promise<number[][]>;
}

export interface GenerationOptions extends CallOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
}

/**
 * External generation capability. May answer with the full text or with
 * an ordered stream of fragments.
 */
export interface GenerationProvider {
    generate(prompt: string, options?: GenerationOptions): Promise<GenerationOutput>;
}
