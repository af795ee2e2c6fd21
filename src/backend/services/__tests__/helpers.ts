/**
 * Test doubles shared by the service and server tests.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DocumentFetcher, FetchedDocument } from '../../clients/documentFetcher';
import { EmbeddingProvider, GenerationOptions, GenerationProvider } from '../../clients/types';
import { AppConfig, loadConfig } from '../../config';
import { CallOptions, GenerationOutput, IndexEntryInput } from '../../../shared/types';
import { RetryRuntime } from '../../utils/retryPolicy';

/**
 * Retry runtime that never waits.
 */
export const INSTANT_RETRY_RUNTIME: RetryRuntime = {
    sleep: async () => undefined,
    now: () => 0,
    random: () => 0,
};

export function makeTempDir(prefix: string): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export const KEYWORDS = ['apples', 'orchards', 'harvest', 'volcano', 'eruption', 'lava', 'satellite', 'orbit'];

/**
 * Embeds text as keyword counts over a fixed vocabulary. Texts sharing
 * keywords get a positive cosine similarity, unrelated texts score 0.
 */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
    readonly calls: string[][] = [];
    /** Thrown by the next call when set */
    failWith: unknown = undefined;

    constructor(private readonly vocabulary: string[] = KEYWORDS) {}

    async embed(texts: string[], _options?: CallOptions): Promise<number[][]> {
        this.calls.push([...texts]);
        if (this.failWith !== undefined) {
            const error = this.failWith;
            this.failWith = undefined;
            throw error;
        }
        return texts.map((text) => this.vectorFor(text));
    }

    vectorFor(text: string): number[] {
        const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
        return this.vocabulary.map((keyword) => words.filter((word) => word === keyword).length);
    }
}

export type ScriptedReply = (prompt: string, attempt: number) => GenerationOutput | Promise<GenerationOutput>;

/**
 * Generation provider answering from a script and recording every prompt.
 */
export class ScriptedGenerationProvider implements GenerationProvider {
    readonly prompts: string[] = [];
    readonly options: (GenerationOptions | undefined)[] = [];

    constructor(private reply: ScriptedReply = () => 'No answer.') {}

    setReply(reply: ScriptedReply): void {
        this.reply = reply;
    }

    async generate(prompt: string, options?: GenerationOptions): Promise<GenerationOutput> {
        this.prompts.push(prompt);
        this.options.push(options);
        return this.reply(prompt, this.prompts.length);
    }
}

/**
 * Fetcher handing out a fixed document and recording the URLs asked for.
 */
export class StaticDocumentFetcher implements DocumentFetcher {
    readonly urls: string[] = [];

    constructor(private readonly document: FetchedDocument) {}

    async fetch(url: string, _options?: CallOptions): Promise<FetchedDocument> {
        this.urls.push(url);
        return this.document;
    }
}

export async function* fragments(...parts: string[]): AsyncGenerator<string> {
    for (const part of parts) {
        yield part;
    }
}

/**
 * Config for engine tests: small chunks, the keyword vocabulary as
 * embedding space and retries without delay.
 */
export function testConfig(dataDir: string, env: Record<string, string> = {}): AppConfig {
    return loadConfig({
        DATA_DIR: dataDir,
        EMBEDDING_DIMENSION: String(KEYWORDS.length),
        CHUNK_SIZE: '40',
        CHUNK_OVERLAP: '0',
        SCORE_THRESHOLD: '0.2',
        RETRY_MAX_ATTEMPTS: '3',
        RETRY_BASE_DELAY_MS: '1',
        RETRY_MAX_DELAY_MS: '1',
        ...env,
    });
}

/**
 * Three 40-character passages about unrelated topics.
 */
export const NATURE_TEXT =
    'Apples grow in orchards before harvest. ' +
    'A volcano eruption sends lava far away. ' +
    'The satellite reached orbit after launch';

export function entryInput(
    documentId: string,
    sequenceIndex: number,
    vector: number[],
    text: string = `chunk ${sequenceIndex} of ${documentId}`
): IndexEntryInput {
    return {
        chunkId: `${documentId}:${sequenceIndex}`,
        vector,
        metadata: {
            documentId,
            sequenceIndex,
            filename: `${documentId}.txt`,
            text,
            startOffset: sequenceIndex * 10,
            endOffset: sequenceIndex * 10 + text.length,
        },
    };
}
