/**
 * Backend module entry point
 *
 * The backend is organized into:
 * - server/: Express app configuration and route handlers
 * - services/: The pipeline (extraction, chunking, embeddings, index,
 *   retrieval, answers, sessions) and the RAGEngine facade
 * - clients/: External capability clients (OllamaClient)
 * - config/: Environment-driven configuration
 *
 * When run directly, this file loads .env, builds the engine and starts the
 * server. When imported, it exports the factory functions.
 */

import 'dotenv/config';
import { createOllamaClient } from './clients';
import { loadConfig } from './config';
import { createApp, startServer } from './server';
import { createRAGEngine } from './services';
import { createLogger, setLogLevel } from './utils/logger';

export { createApp, startServer, DEFAULT_SERVER_CONFIG } from './server';

export type { ServerConfig } from './server';

export * from './services';

export * from './clients';

export * from './errors';

export { loadConfig, resolveDataPaths } from './config';

export type { AppConfig, HistoryMode } from './config';

const log = createLogger('main');

/**
 * Wires config, Ollama client, engine and HTTP server together and installs
 * signal handlers for a clean shutdown.
 */
export async function main(): Promise<void> {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const ollama = createOllamaClient(config.ollama);
    const engine = createRAGEngine({
        config,
        embeddingProvider: ollama,
        generationProvider: ollama,
    });
    await engine.init();

    const app = createApp(engine, {
        corsOrigin: config.server.corsOrigin,
        maxFileSize: config.server.maxFileSize,
        healthCheck: () => ollama.isAvailable(),
    });
    const server = await startServer(app, config.server.port, config.server.host);

    let stopping = false;
    const stop = (signal: string): void => {
        if (stopping) {
            return;
        }
        stopping = true;
        log.info('Shutting down', { signal });

        server.close();
        engine
            .shutdown()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                log.error('Shutdown failed', { error });
                process.exit(1);
            });
    };
    process.on('SIGINT', () => stop('SIGINT'));
    process.on('SIGTERM', () => stop('SIGTERM'));
}

// Start the server only when run directly, not when imported
if (require.main === module) {
    main().catch((error: unknown) => {
        log.error('Failed to start server', { error });
        process.exit(1);
    });
}
