/**
 * Express Server Configuration and Routes
 *
 * This is the HTTP layer of the document Q&A service.
 * It exposes REST endpoints for:
 * - Health checks (Ollama connectivity)
 * - Document management (ingest, status, listing, deletion)
 * - Questions (retrieval + grounded answers), also as a server-sent event
 *   stream and as a batch against a document fetched by URL
 * - Sessions (list, history, deletion)
 * - Index statistics
 *
 * Routes only validate input and delegate to the RAG engine; every error
 * ends up in the error middleware, which maps it to a status code and the
 * common error body.
 */

import * as http from 'http';
import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import {
    DocumentNotFoundError,
    RequestValidationError,
    SessionNotFoundError,
    httpStatusFor,
    toErrorResponse,
} from '../errors';
import { HealthResponse, QueryStreamEvent } from '../../shared/types';
import {
    QueryRequest,
    RAGEngine,
    historyQuerySchema,
    parseRequest,
    queryRequestSchema,
    uploadFieldsSchema,
    urlQueryRequestSchema,
} from '../services';
import { createLogger } from '../utils/logger';

const log = createLogger('http');

/**
 * Server configuration options.
 */
export interface ServerConfig {
    /** CORS origin (default: allow all) */
    corsOrigin: string;
    /** Upload size limit in bytes */
    maxFileSize: number;
    /** Reports whether the model backend is reachable */
    healthCheck?: () => Promise<boolean>;
}

/**
 * Default server configuration.
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = {
    corsOrigin: '*',
    maxFileSize: 10 * 1024 * 1024,
};

/**
 * Creates and configures the Express application around an engine.
 * Creating the app doesn't start listening, so tests can mount it freely.
 */
export function createApp(engine: RAGEngine, config: Partial<ServerConfig> = {}): Express {
    const mergedConfig: ServerConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
    const app = express();

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: mergedConfig.corsOrigin,
            methods: ['GET', 'POST', 'DELETE'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    app.use(express.json({ limit: '1mb' }));

    // Uploads are kept in memory; the engine hashes and parses the buffer
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: {
            fileSize: mergedConfig.maxFileSize,
        },
    });

    app.use((req: Request, res: Response, next: NextFunction) => {
        const startedAt = Date.now();
        res.on('finish', () => {
            log.debug(`${req.method} ${req.path}`, {
                status: res.statusCode,
                durationMs: Date.now() - startedAt,
            });
        });
        next();
    });

    // =========================================================================
    // Health Endpoint
    // =========================================================================

    /**
     * GET /api/health
     *
     * 503 when the model backend can't be reached, so load balancers and
     * clients know the service isn't fully functional.
     */
    app.get('/api/health', async (_req: Request, res: Response) => {
        let ollamaAvailable = true;
        if (mergedConfig.healthCheck) {
            try {
                ollamaAvailable = await mergedConfig.healthCheck();
            } catch (error) {
                log.warn('Health check failed', { error });
                ollamaAvailable = false;
            }
        }

        const response: HealthResponse = {
            status: ollamaAvailable ? 'ok' : 'error',
            ollama: ollamaAvailable,
        };
        res.status(ollamaAvailable ? 200 : 503).json(response);
    });

    // =========================================================================
    // Document Endpoints
    // =========================================================================

    /**
     * POST /api/documents
     *
     * Accepts a multipart upload (`file`, optional `format`) and starts the
     * ingestion in the background. Clients poll GET /api/documents/:id.
     */
    app.post('/api/documents', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
        try {
            const file = req.file;
            if (!file) {
                throw new RequestValidationError('No file uploaded. Send the document in the "file" field.', {
                    issues: [{ field: 'file', message: 'Required' }],
                });
            }

            const fields = parseRequest(uploadFieldsSchema, req.body ?? {});
            const result = await engine.ingest(file.buffer, file.originalname, fields.format);

            res.status(202).json(result);
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /api/documents
     *
     * All documents with their status, newest upload first.
     */
    app.get('/api/documents', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const documents = await engine.listDocuments();
            res.json({ documents });
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /api/documents/:id
     */
    app.get('/api/documents/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const document = await engine.status(req.params.id ?? '');
            res.json({ document });
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /api/documents/:id/chunks
     *
     * The indexed passages of a document, in order.
     */
    app.get('/api/documents/:id/chunks', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const documentId = req.params.id ?? '';
            const chunks = await engine.documentChunks(documentId);
            res.json({ documentId, chunks });
        } catch (error) {
            next(error);
        }
    });

    /**
     * DELETE /api/documents/:id
     *
     * Removes the document's chunks from the index and its record.
     */
    app.delete('/api/documents/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const id = req.params.id ?? '';
            const outcome = await engine.delete(id);

            if (outcome === 'not_found') {
                throw new DocumentNotFoundError(id);
            }

            res.json({ success: true });
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/documents/:id/reprocess
     *
     * Runs the pipeline again from the stored upload, in the background.
     */
    app.post('/api/documents/:id/reprocess', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const result = await engine.reprocess(req.params.id ?? '');
            res.status(202).json(result);
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Query Endpoints
    // =========================================================================

    /**
     * POST /api/query
     *
     * Answers a question from the indexed documents. A client that hangs
     * up cancels the in-flight embedding and generation calls.
     */
    app.post('/api/query', async (req: Request, res: Response, next: NextFunction) => {
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) {
                controller.abort();
            }
        });

        try {
            const body = parseRequest(queryRequestSchema, req.body);
            const result = await engine.query({ ...body, signal: controller.signal });
            res.json(result);
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/query/stream
     *
     * Same as POST /api/query, answered as server-sent events: `start`,
     * `sources`, one `fragment` per piece of generated text, then `done`
     * with the full response, or `error`. An invalid body is still a plain
     * 400 response.
     */
    app.post('/api/query/stream', async (req: Request, res: Response, next: NextFunction) => {
        let body: QueryRequest;
        try {
            body = parseRequest(queryRequestSchema, req.body);
        } catch (error) {
            next(error);
            return;
        }

        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) {
                controller.abort();
            }
        });

        res.status(200);
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.flushHeaders();

        const send = (event: QueryStreamEvent): void => {
            if (!res.writableEnded) {
                res.write(`data: ${JSON.stringify(event)}\n\n`);
            }
        };

        try {
            const response = await engine.query({ ...body, signal: controller.signal, onProgress: send });
            send({ type: 'done', response });
        } catch (error) {
            log.warn('Streamed query failed', { error });
            send({ type: 'error', error: toErrorResponse(error) });
        }
        res.end();
    });

    /**
     * POST /api/url-query
     *
     * Fetches the document at `url`, indexes it and answers every question
     * in turn. A failed question is reported in its own entry.
     */
    app.post('/api/url-query', async (req: Request, res: Response, next: NextFunction) => {
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) {
                controller.abort();
            }
        });

        try {
            const body = parseRequest(urlQueryRequestSchema, req.body);
            const result = await engine.answerFromUrl({ ...body, signal: controller.signal });
            res.json(result);
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Session Endpoints
    // =========================================================================

    /**
     * GET /api/sessions
     *
     * Every session, most recently active first.
     */
    app.get('/api/sessions', (_req: Request, res: Response) => {
        res.json({ sessions: engine.listSessions() });
    });

    /**
     * DELETE /api/sessions/:id
     */
    app.delete('/api/sessions/:id', (req: Request, res: Response, next: NextFunction) => {
        try {
            const sessionId = req.params.id ?? '';
            if (engine.deleteSession(sessionId) === 'not_found') {
                throw new SessionNotFoundError(sessionId);
            }
            res.json({ success: true });
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /api/sessions/:id/history?limit=
     *
     * Latest messages of a session, oldest first.
     */
    app.get('/api/sessions/:id/history', (req: Request, res: Response, next: NextFunction) => {
        try {
            const sessionId = req.params.id ?? '';
            const { limit } = parseRequest(historyQuerySchema, req.query);
            const messages = engine.sessionHistory(sessionId, limit);
            res.json({ sessionId, messages });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Stats Endpoint
    // =========================================================================

    app.get('/api/stats', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await engine.stats());
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Error Handling Middleware
    // =========================================================================

    /**
     * Global error handler. Upload and body-parser failures are turned into
     * validation errors; everything else is mapped by its category.
     */
    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        const error = normalizeError(err);
        const status = httpStatusFor(error);

        if (status >= 500) {
            log.error('Request failed', { method: req.method, path: req.path, status, error });
        } else {
            log.debug('Request rejected', { method: req.method, path: req.path, status, error });
        }

        if (res.headersSent) {
            return;
        }
        res.status(status).json(toErrorResponse(error));
    });

    return app;
}

function normalizeError(err: unknown): unknown {
    if (err instanceof multer.MulterError) {
        return new RequestValidationError(`Upload rejected: ${err.message}`, { reason: err.code });
    }
    if (err instanceof SyntaxError && 'body' in err) {
        return new RequestValidationError('Malformed JSON body');
    }
    return err;
}

/**
 * Starts listening.
 *
 * @returns the underlying HTTP server, once it is accepting connections
 */
export function startServer(app: Express, port: number, host: string = '0.0.0.0'): Promise<http.Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, host, () => {
            server.off('error', reject);
            log.info(`Document Q&A server running on ${host}:${port}`);
            log.info(`Health check: http://localhost:${port}/api/health`);
            resolve(server);
        });
        server.once('error', reject);
    });
}
