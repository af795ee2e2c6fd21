/**
 * Application configuration
 *
 * Read once from the environment (a .env file is loaded by the entry point)
 * and validated with zod. Everything downstream receives plain typed
 * objects; no module reads process.env on its own.
 */

import * as path from 'path';
import { z } from 'zod';
import { LogLevel } from '../utils/logger';

const booleanString = z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true');

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3001),
    HOST: z.string().default('0.0.0.0'),
    DATA_DIR: z.string().default('./data'),
    CORS_ORIGIN: z.string().default('*'),
    MAX_FILE_SIZE: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
    OLLAMA_CHAT_MODEL: z.string().min(1).default('llama3.1'),
    OLLAMA_EMBEDDING_MODEL: z.string().min(1).default('nomic-embed-text'),
    EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(768),
    EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(50),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),

    RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(4),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
    RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(8000),
    RETRY_MAX_ELAPSED_MS: z.coerce.number().int().positive().default(30000),
    RETRY_JITTER: z.coerce.number().min(0).max(1).default(0.2),

    CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),

    TOP_K: z.coerce.number().int().positive().default(5),
    SCORE_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.35),
    CONTEXT_BUDGET_CHARS: z.coerce.number().int().positive().default(4000),
    HISTORY_MODE: z.enum(['always', 'never', 'anaphora']).default('anaphora'),
    HISTORY_TURNS: z.coerce.number().int().nonnegative().default(4),
    ANSWER_WITHOUT_CONTEXT: booleanString,

    SESSION_MAX_MESSAGES: z.coerce.number().int().positive().default(20),
    SESSION_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
    PERSIST_ON_WRITE: z
        .enum(['true', 'false'])
        .default('true')
        .transform((value) => value === 'true'),
});

export type HistoryMode = 'always' | 'never' | 'anaphora';

export interface AppConfig {
    server: {
        port: number;
        host: string;
        corsOrigin: string;
        maxFileSize: number;
    };
    logLevel: LogLevel;
    dataDir: string;
    ollama: {
        baseUrl: string;
        chatModel: string;
        embeddingModel: string;
        timeoutMs: number;
        temperature: number;
    };
    embedding: {
        dimension: number;
        batchSize: number;
    };
    /** Downloads of documents addressed by URL */
    urlFetch: {
        timeoutMs: number;
        maxBytes: number;
    };
    retry: {
        maxAttempts: number;
        baseDelayMs: number;
        maxDelayMs: number;
        maxElapsedMs: number;
        jitter: number;
    };
    chunking: {
        chunkSize: number;
        overlap: number;
    };
    retrieval: {
        topK: number;
        scoreThreshold: number;
        contextBudgetChars: number;
        historyMode: HistoryMode;
        historyTurns: number;
        answerWithoutContext: boolean;
    };
    sessions: {
        maxMessages: number;
        idleTimeoutMs: number;
    };
    persistOnWrite: boolean;
}

/**
 * Builds the application config from an environment map.
 * Throws with every offending variable listed when validation fails.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        const problems = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${problems}`);
    }
    const parsed = result.data;

    if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
        throw new Error(
            `Invalid configuration: CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE})`
        );
    }
    if (parsed.RETRY_MAX_DELAY_MS < parsed.RETRY_BASE_DELAY_MS) {
        throw new Error('Invalid configuration: RETRY_MAX_DELAY_MS must be at least RETRY_BASE_DELAY_MS');
    }

    return {
        server: {
            port: parsed.PORT,
            host: parsed.HOST,
            corsOrigin: parsed.CORS_ORIGIN,
            maxFileSize: parsed.MAX_FILE_SIZE,
        },
        logLevel: parsed.LOG_LEVEL,
        dataDir: path.resolve(parsed.DATA_DIR),
        ollama: {
            baseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ''),
            chatModel: parsed.OLLAMA_CHAT_MODEL,
            embeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
            timeoutMs: parsed.REQUEST_TIMEOUT_MS,
            temperature: parsed.GENERATION_TEMPERATURE,
        },
        embedding: {
            dimension: parsed.EMBEDDING_DIMENSION,
            batchSize: parsed.EMBEDDING_BATCH_SIZE,
        },
        urlFetch: {
            timeoutMs: parsed.FETCH_TIMEOUT_MS,
            maxBytes: parsed.MAX_FILE_SIZE,
        },
        retry: {
            maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
            baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
            maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
            maxElapsedMs: parsed.RETRY_MAX_ELAPSED_MS,
            jitter: parsed.RETRY_JITTER,
        },
        chunking: {
            chunkSize: parsed.CHUNK_SIZE,
            overlap: parsed.CHUNK_OVERLAP,
        },
        retrieval: {
            topK: parsed.TOP_K,
            scoreThreshold: parsed.SCORE_THRESHOLD,
            contextBudgetChars: parsed.CONTEXT_BUDGET_CHARS,
            historyMode: parsed.HISTORY_MODE,
            historyTurns: parsed.HISTORY_TURNS,
            answerWithoutContext: parsed.ANSWER_WITHOUT_CONTEXT,
        },
        sessions: {
            maxMessages: parsed.SESSION_MAX_MESSAGES,
            idleTimeoutMs: parsed.SESSION_IDLE_TIMEOUT_MS,
        },
        persistOnWrite: parsed.PERSIST_ON_WRITE,
    };
}

/**
 * Locations of persisted state under the data directory.
 */
export function resolveDataPaths(dataDir: string): {
    indexDir: string;
    documentsDir: string;
    sessionsFile: string;
} {
    return {
        indexDir: path.join(dataDir, 'index'),
        documentsDir: path.join(dataDir, 'documents'),
        sessionsFile: path.join(dataDir, 'sessions.json'),
    };
}
