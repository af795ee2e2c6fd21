/**
 * RAG Engine Service
 *
 * The Q&A service facade. Owns every collaborator of the pipeline and is
 * handed explicitly to the HTTP layer; nothing in the core is a module-level
 * singleton.
 *
 * Lifecycle:
 * - init(): load the persisted index and session snapshot, reconcile the
 *   document registry with the index, start the idle-session sweep
 * - shutdown(): stop the sweep, let running ingestions finish, persist
 *
 * Write path: bytes -> extract -> chunk -> embed -> replaceDocument.
 * Read path: question (+ session history) -> retrieve -> assemble context ->
 * answer -> append the turn to the session.
 *
 * At most one task (an ingestion, a reprocess or a delete) runs per
 * document id. A task claims the id synchronously, before its first await,
 * so a second caller either joins it (same-content ingestion) or waits for
 * it to settle.
 */

import * as crypto from 'crypto';
import { DocumentFetcher, HttpDocumentFetcher } from '../clients/documentFetcher';
import { EmbeddingProvider, GenerationProvider } from '../clients/types';
import { AppConfig, resolveDataPaths } from '../config';
import {
  DocumentNotFoundError,
  EmbeddingError,
  IngestionFailedError,
  InvalidQueryError,
  SourceUnavailableError,
  UnsupportedFormatError,
  describeError,
} from '../errors';
import {
  BatchAnswer,
  ChatMessage,
  DeleteOutcome,
  DocumentFormat,
  DocumentRecord,
  IndexEntry,
  IndexEntryInput,
  IngestResponse,
  ProcessingStatus,
  QueryResponse,
  QueryStreamEvent,
  SessionSummary,
  StatsResponse,
  UrlQueryResponse,
} from '../../shared/types';
import { createLogger } from '../utils/logger';
import { RetryPolicy, RetryRuntime } from '../utils/retryPolicy';
import { AnswerSynthesizer } from './answerSynthesizer';
import { DocumentChunker } from './documentChunker';
import {
  FORMAT_EXTENSIONS,
  detectDocumentFormat,
  extract,
  formatForContentType,
  isDocumentFormat,
} from './documentParser';
import { DocumentStorage } from './documentStorage';
import { EmbeddingGateway } from './embeddingGateway';
import { validateQuery } from './queryProcessor';
import { AssembledContext, RetrievalEngine } from './retrievalEngine';
import { SessionManager } from './sessionManager';
import { VectorIndex } from './vectorStore';

const log = createLogger('engine');

export const NOT_FOUND_ANSWER =
  "I couldn't find anything in the document collection that answers this question.";

/**
 * Answer of a batch question whose model reply came back empty.
 */
export const EMPTY_BATCH_ANSWER = 'I could not find sufficient information to answer this question.';

const SESSION_SWEEP_INTERVAL_MS = 60 * 1000;

export interface RAGEngineOptions {
  config: AppConfig;
  embeddingProvider: EmbeddingProvider;
  generationProvider: GenerationProvider;
  /** Clock and sleep used by the retry policy (tests) */
  retryRuntime?: RetryRuntime;
  /** Clock used by the session store (tests) */
  now?: () => Date;
  /** Downloads documents for answerFromUrl; HTTP by default */
  documentFetcher?: DocumentFetcher;
}

/**
 * Progress of a query before its final response: the session, the
 * passages the answer will be grounded on, then the answer text as it is
 * generated.
 */
export type QueryProgressEvent = Extract<QueryStreamEvent, { type: 'start' | 'sources' | 'fragment' }>;

export interface QueryRequestInput {
  question: string;
  k?: number;
  contextBudget?: number;
  sessionId?: string;
  signal?: AbortSignal;
  onProgress?: (event: QueryProgressEvent) => void;
}

export interface UrlQueryInput {
  url: string;
  questions: string[];
  signal?: AbortSignal;
}

/**
 * What an ingestion works on, settled once the record is in place.
 */
interface IngestionPlan {
  alreadyReady: boolean;
  filename: string;
  format: DocumentFormat;
  bytes: Buffer;
}

interface IngestionTask {
  kind: 'ingest';
  progress: { status: ProcessingStatus };
  registered: Promise<IngestionPlan>;
  /** Settles (never rejects) once the task is over and its slot is free */
  done: Promise<void>;
}

interface ExclusiveTask {
  kind: 'exclusive';
  done: Promise<void>;
}

type DocumentTask = IngestionTask | ExclusiveTask;

interface GroundedAnswer {
  response: Omit<QueryResponse, 'sessionId'>;
  dropped: number;
}

/**
 * Document id: first 32 hex characters of the SHA-256 of the content.
 * The same bytes always map to the same id.
 */
export function contentHash(bytes: Buffer): string {
  return crypto.createHash('sha256').update(bytes).digest('hex').slice(0, 32);
}

export class RAGEngine {
  private readonly config: AppConfig;
  private readonly index: VectorIndex;
  private readonly documents: DocumentStorage;
  private readonly sessions: SessionManager;
  private readonly chunker: DocumentChunker;
  private readonly embeddings: EmbeddingGateway;
  private readonly retrieval: RetrievalEngine;
  private readonly answers: AnswerSynthesizer;
  private readonly fetcher: DocumentFetcher;
  private readonly inFlight = new Map<string, DocumentTask>();
  private sweepTimer: NodeJS.Timeout | undefined;
  private initialized = false;

  constructor(options: RAGEngineOptions) {
    const { config } = options;
    const paths = resolveDataPaths(config.dataDir);
    this.config = config;

    const retryPolicy = new RetryPolicy(config.retry, undefined, options.retryRuntime);

    this.index = new VectorIndex({ dimension: config.embedding.dimension, directory: paths.indexDir });
    this.documents = new DocumentStorage({ storagePath: paths.documentsDir });
    this.sessions = new SessionManager({
      maxMessages: config.sessions.maxMessages,
      idleTimeoutMs: config.sessions.idleTimeoutMs,
      snapshotPath: paths.sessionsFile,
      ...(options.now ? { now: options.now } : {}),
    });
    this.chunker = new DocumentChunker(config.chunking);
    this.embeddings = new EmbeddingGateway(options.embeddingProvider, retryPolicy, config.embedding);
    this.retrieval = new RetrievalEngine(this.embeddings, this.index, config.retrieval);
    this.answers = new AnswerSynthesizer(options.generationProvider, retryPolicy, {
      historyTurns: config.retrieval.historyTurns,
      temperature: config.ollama.temperature,
    });
    this.fetcher = options.documentFetcher ?? new HttpDocumentFetcher(config.urlFetch);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Loads persisted state. A persisted index that can't be used is logged
   * and replaced by an empty one; it can be rebuilt by re-ingesting.
   */
  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }

    const report = await this.index.load();
    if (report.status === 'loaded') {
      log.info('Vector index loaded', { entries: report.entryCount });
    } else if (report.status === 'missing') {
      log.info('No persisted vector index, starting empty');
    } else {
      log.warn('Persisted vector index could not be used, starting empty', {
        status: report.status,
        reason: report.reason,
      });
    }

    const sessionCount = await this.sessions.load();
    log.info('Sessions loaded', { sessions: sessionCount });

    await this.reconcileDocuments();

    this.sweepTimer = setInterval(() => {
      this.expireIdleSessions();
    }, SESSION_SWEEP_INTERVAL_MS);
    this.sweepTimer.unref();

    this.initialized = true;
  }

  /**
   * Waits for running ingestions, then writes the index and sessions to disk.
   */
  async shutdown(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }

    await Promise.all(Array.from(this.inFlight.values()).map((task) => task.done));
    await this.index.persist();
    await this.sessions.persist();

    this.initialized = false;
    log.info('Engine shut down');
  }

  /**
   * Documents left mid-pipeline by an earlier run, or marked ready while
   * their chunks are missing from the index, are marked failed so they can
   * be ingested again. Chunks whose document has no record are dropped.
   */
  private async reconcileDocuments(): Promise<void> {
    const records = await this.documents.list();
    const known = new Set(records.map((record) => record.id));
    let orphaned = 0;
    for (const documentId of await this.index.documentIds()) {
      if (!known.has(documentId)) {
        orphaned += await this.index.deleteByDocument(documentId);
      }
    }
    if (orphaned > 0) {
      log.warn('Dropped chunks of unknown documents', { chunks: orphaned });
      await this.index.persist();
    }

    for (const record of records) {
      if (record.status === 'pending' || record.status === 'processing') {
        await this.documents.updateStatus(record.id, 'failed', {
          error: { code: 'INTERRUPTED', message: 'Ingestion was interrupted by a restart' },
        });
      } else if (record.status === 'ready' && record.chunkCount > 0 && !(await this.index.hasDocument(record.id))) {
        await this.documents.updateStatus(record.id, 'failed', {
          error: { code: 'INDEX_MISSING', message: 'Indexed chunks were lost; ingest the document again' },
        });
      }
    }
  }

  // ==========================================================================
  // Ingestion
  // ==========================================================================


  /**
   * Accepts a document and starts its ingestion in the background.
   *
   * Concurrent calls for the same content share one ingestion; content that
   * is already indexed is not ingested again. A delete of the same content
   * that is running is waited out first.
   */
  async ingest(bytes: Buffer, filename: string, format?: string): Promise<IngestResponse> {
    const resolvedFormat = this.resolveFormat(filename, format);
    const documentId = contentHash(bytes);

    let running = this.inFlight.get(documentId);
    while (running?.kind === 'exclusive') {
      await running.done;
      running = this.inFlight.get(documentId);
    }
    if (running?.kind === 'ingest') {
      await running.registered;
      return { documentId, status: running.progress.status, deduplicated: true };
    }

    const task = this.startIngestion(documentId, () =>
      this.register(documentId, filename, resolvedFormat, bytes)
    );
    const plan = await task.registered;
    return {
      documentId,
      status: plan.alreadyReady ? 'ready' : task.progress.status,
      deduplicated: plan.alreadyReady,
    };
  }

  /**
   * Runs the ingestion pipeline again from the stored original bytes, for
   * instance after the chunking settings changed. The previous chunks stay
   * searchable until the new ones replace them.
   *
   * @throws DocumentNotFoundError
   * @throws SourceUnavailableError when the original bytes are not stored
   */
  async reprocess(documentId: string): Promise<IngestResponse> {
    let running = this.inFlight.get(documentId);
    while (running) {
      await running.done;
      running = this.inFlight.get(documentId);
    }

    const task = this.startIngestion(documentId, () => this.prepareReprocess(documentId));
    await task.registered;
    return { documentId, status: task.progress.status, deduplicated: false };
  }

  /**
   * Resolves when the running task of a document (if any) has settled.
   */
  async waitForIngestion(documentId: string): Promise<void> {
    await this.inFlight.get(documentId)?.done;
  }

  private resolveFormat(filename: string, format?: string): DocumentFormat {
    if (format !== undefined) {
      if (!isDocumentFormat(format)) {
        throw new UnsupportedFormatError(format);
      }
      return format;
    }
    const detected = detectDocumentFormat(filename);
    if (!detected) {
      throw new UnsupportedFormatError(filename.includes('.') ? `.${filename.split('.').pop()}` : filename);
    }
    return detected;
  }

  /**
   * Claims the document id for an ingestion. Must be called without an
   * await between the check that the id is free and this call.
   */
  private startIngestion(documentId: string, prepare: () => Promise<IngestionPlan>): IngestionTask {
    const progress: { status: ProcessingStatus } = { status: 'pending' };
    const registered = prepare();
    const done = registered
      .then(
        (plan) => {
          if (plan.alreadyReady) {
            progress.status = 'ready';
            return undefined;
          }
          return this.runPipeline(documentId, plan, progress);
        },
        // Registration errors reach the caller through `registered`
        () => undefined
      )
      .finally(() => {
        this.release(documentId, task);
      });
    const task: IngestionTask = { kind: 'ingest', progress, registered, done };
    this.inFlight.set(documentId, task);
    return task;
  }

  /**
   * Runs `work` as the only task of the document, after any running one.
   */
  private async runExclusive<T>(documentId: string, work: () => Promise<T>): Promise<T> {
    let running = this.inFlight.get(documentId);
    while (running) {
      await running.done;
      running = this.inFlight.get(documentId);
    }

    const result = work();
    const task: ExclusiveTask = {
      kind: 'exclusive',
      done: result
        .then(
          () => undefined,
          () => undefined
        )
        .finally(() => {
          this.release(documentId, task);
        }),
    };
    this.inFlight.set(documentId, task);
    return result;
  }

  private release(documentId: string, task: DocumentTask): void {
    if (this.inFlight.get(documentId) === task) {
      this.inFlight.delete(documentId);
    }
  }

  private async register(
    documentId: string,
    filename: string,
    format: DocumentFormat,
    bytes: Buffer
  ): Promise<IngestionPlan> {
    const plan: IngestionPlan = { alreadyReady: false, filename, format, bytes };

    const existing = await this.documents.get(documentId);
    if (existing && existing.status === 'ready') {
      log.debug('Document already indexed', { documentId });
      return { ...plan, alreadyReady: true };
    }

    const record: DocumentRecord = {
      id: documentId,
      filename,
      format,
      uploadedAt: new Date(),
      sizeBytes: bytes.length,
      status: 'pending',
      chunkCount: 0,
    };
    await this.documents.save(record);
    await this.documents.saveSource(documentId, bytes);
    return plan;
  }

  private async prepareReprocess(documentId: string): Promise<IngestionPlan> {
    const record = await this.documents.get(documentId);
    if (!record) {
      throw new DocumentNotFoundError(documentId);
    }
    const bytes = await this.documents.readSource(documentId);
    if (!bytes) {
      throw new SourceUnavailableError(documentId);
    }

    await this.documents.updateStatus(documentId, 'pending', { chunkCount: 0 });
    log.info('Reprocessing document', { documentId, filename: record.filename });
    return { alreadyReady: false, filename: record.filename, format: record.format, bytes };
  }

  /**
   * extract -> chunk -> embed -> index. Never rejects: a failure marks the
   * document failed and leaves nothing of it in the index.
   */
  private async runPipeline(
    documentId: string,
    plan: IngestionPlan,
    progress: { status: ProcessingStatus }
  ): Promise<void> {
    const { filename, format, bytes } = plan;
    try {
      progress.status = 'processing';
      await this.documents.updateStatus(documentId, 'processing');

      const extracted = await extract(bytes, format);
      const chunks = this.chunker.chunkDocument(documentId, extracted.text, extracted.pages);
      const vectors = await this.embeddings.embed(chunks.map((chunk) => chunk.text));

      const entries: IndexEntryInput[] = chunks.map((chunk, i) => {
        const vector = vectors[i];
        if (!vector) {
          throw new EmbeddingError(`No embedding for chunk ${chunk.id}`, false);
        }
        return {
          chunkId: chunk.id,
          vector,
          metadata: {
            documentId,
            sequenceIndex: chunk.sequenceIndex,
            filename,
            text: chunk.text,
            startOffset: chunk.startOffset,
            endOffset: chunk.endOffset,
            ...(chunk.pageNumber !== undefined ? { pageNumber: chunk.pageNumber } : {}),
          },
        };
      });

      await this.index.replaceDocument(documentId, entries);
      if (this.config.persistOnWrite) {
        await this.index.persist();
      }

      await this.documents.updateStatus(documentId, 'ready', {
        chunkCount: chunks.length,
        pageCount: extracted.pages.length,
        ...(extracted.encoding !== undefined ? { encoding: extracted.encoding } : {}),
      });
      progress.status = 'ready';
      log.info('Document indexed', { documentId, filename, chunks: chunks.length });
    } catch (error) {
      progress.status = 'failed';
      const described = describeError(error);
      log.error('Ingestion failed', { documentId, filename, code: described.code, error: described.message });
      await this.recordFailure(documentId, described);
    }
  }

  private async recordFailure(documentId: string, failure: { code: string; message: string }): Promise<void> {
    try {
      const removed = await this.index.deleteByDocument(documentId);
      if (removed > 0 && this.config.persistOnWrite) {
        await this.index.persist();
      }
      await this.documents.updateStatus(documentId, 'failed', { error: failure });
    } catch (error) {
      log.error('Could not record ingestion failure', { documentId, error });
    }
  }

  // ==========================================================================
  // Documents
  // ==========================================================================

  /**
   * @throws DocumentNotFoundError
   */
  async status(documentId: string): Promise<DocumentRecord> {
    const record = await this.documents.get(documentId);
    if (!record) {
      throw new DocumentNotFoundError(documentId);
    }
    return record;
  }

  async listDocuments(): Promise<DocumentRecord[]> {
    return this.documents.list();
  }

  /**
   * Indexed chunks of a document in sequence order; empty until it is ready.
   *
   * @throws DocumentNotFoundError
   */
  async documentChunks(documentId: string): Promise<IndexEntry[]> {
    await this.status(documentId);
    return this.index.entriesFor(documentId);
  }

  /**
   * Removes a document's chunks from the index (in one step), then its
   * record. Holds the document id throughout, so an ingestion of the same
   * content runs either entirely before or entirely after.
   */
  async delete(documentId: string): Promise<DeleteOutcome> {
    return this.runExclusive(documentId, () => this.removeDocument(documentId));
  }

  private async removeDocument(documentId: string): Promise<DeleteOutcome> {
    const record = await this.documents.get(documentId);
    const removed = await this.index.deleteByDocument(documentId);
    if (!record && removed === 0) {
      return 'not_found';
    }

    if (removed > 0 && this.config.persistOnWrite) {
      await this.index.persist();
    }
    await this.documents.delete(documentId);

    log.info('Document deleted', { documentId, chunks: removed });
    return 'ok';
  }

  // ==========================================================================
  // Query
  // ==========================================================================

  /**
   * Answers a question from the indexed documents.
   * Without any passage to ground on, a fixed "not found" answer is returned
   * instead of asking the model (unless answerWithoutContext is set).
   */
  async query(request: QueryRequestInput): Promise<QueryResponse> {
    const budget = this.checkQuestion(request.question, request.contextBudget);

    const session = this.sessions.getOrCreate(request.sessionId);
    request.onProgress?.({ type: 'start', sessionId: session.id });
    const turns = this.config.retrieval.historyTurns;
    const history: ChatMessage[] = turns > 0 ? this.sessions.history(session.id, turns) : [];

    const { response, dropped } = await this.answerQuestion({
      question: request.question,
      k: request.k,
      budget,
      history,
      signal: request.signal,
      onProgress: request.onProgress,
    });

    // The idle sweep may have removed the session while the answer was generated
    this.sessions.getOrCreate(session.id);
    this.sessions.append(session.id, 'user', request.question);
    this.sessions.append(session.id, 'assistant', response.answer);

    log.debug('Query answered', {
      sessionId: session.id,
      status: response.status,
      sources: response.sources.length,
      dropped,
    });
    return { ...response, sessionId: session.id };
  }

  /**
   * Fetches a document by URL, ingests it (or reuses it when the content is
   * already indexed) and answers each question in turn, without a session.
   * A question that fails is reported in its own entry; the others are
   * still answered.
   *
   * @throws IngestionFailedError when the document can't be indexed
   */
  async answerFromUrl(input: UrlQueryInput): Promise<UrlQueryResponse> {
    if (input.questions.length === 0) {
      throw new InvalidQueryError('At least one question is required');
    }
    for (const question of input.questions) {
      this.checkQuestion(question);
    }

    const fetched = await this.fetcher.fetch(input.url, { signal: input.signal });
    const named = this.nameFetchedDocument(fetched.filename, fetched.contentType);
    const { documentId } = await this.ingest(fetched.bytes, named.filename, named.format);
    await this.waitForIngestion(documentId);

    const record = await this.status(documentId);
    if (record.status !== 'ready') {
      throw new IngestionFailedError(documentId, record.error ?? { code: 'UNKNOWN', message: 'Processing failed' });
    }

    const answers: BatchAnswer[] = [];
    for (const question of input.questions) {
      answers.push(await this.answerBatchQuestion(question, input.signal));
    }

    log.info('Batch questions answered', {
      documentId,
      questions: answers.length,
      failed: answers.filter((answer) => answer.status === 'failed').length,
    });
    return { documentId, filename: record.filename, answers };
  }

  /**
   * @returns the context budget to use
   */
  private checkQuestion(question: string, contextBudget?: number): number {
    const validation = validateQuery(question);
    if (!validation.valid) {
      throw new InvalidQueryError(validation.error ?? 'Invalid question');
    }
    const budget = contextBudget ?? this.config.retrieval.contextBudgetChars;
    if (!Number.isInteger(budget) || budget < 1) {
      throw new InvalidQueryError(`Context budget must be a positive integer, got ${budget}`, {
        contextBudget: budget,
      });
    }
    return budget;
  }

  private async answerQuestion(input: {
    question: string;
    k?: number;
    budget: number;
    history: ChatMessage[];
    signal?: AbortSignal;
    onProgress?: (event: QueryProgressEvent) => void;
  }): Promise<GroundedAnswer> {
    const retrieval = await this.retrieval.retrieve({
      question: input.question,
      k: input.k,
      history: input.history,
      signal: input.signal,
    });

    const context: AssembledContext =
      retrieval.status === 'found'
        ? this.retrieval.assembleContext(retrieval.candidates, input.budget)
        : { context: '', citations: new Map(), used: [], dropped: 0 };
    const grounded = context.used.length > 0;

    const onProgress = input.onProgress;
    onProgress?.({ type: 'sources', sources: Array.from(context.citations.values()) });

    if (!grounded && !this.config.retrieval.answerWithoutContext) {
      return {
        response: { status: 'not_found', answer: NOT_FOUND_ANSWER, sources: [], spans: [], confidence: 0 },
        dropped: context.dropped,
      };
    }

    const answer = await this.answers.answer({
      question: input.question,
      context,
      history: input.history,
      signal: input.signal,
      onFragment: onProgress ? (text) => onProgress({ type: 'fragment', text }) : undefined,
    });
    return {
      response: {
        status: grounded ? 'answered' : 'not_found',
        answer: answer.text,
        sources: answer.sources,
        spans: answer.spans,
        confidence: answer.confidence,
      },
      dropped: context.dropped,
    };
  }

  private async answerBatchQuestion(question: string, signal?: AbortSignal): Promise<BatchAnswer> {
    try {
      const { response } = await this.answerQuestion({
        question,
        budget: this.config.retrieval.contextBudgetChars,
        history: [],
        signal,
      });
      return {
        question,
        status: response.status,
        answer: response.answer.length > 0 ? response.answer : EMPTY_BATCH_ANSWER,
        sources: response.sources,
        confidence: response.confidence,
      };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const failure = describeError(error);
      log.warn('Batch question failed', { code: failure.code, error: failure.message });
      return { question, status: 'failed', answer: '', sources: [], confidence: 0, error: failure };
    }
  }

  /**
   * A fetched document keeps its name when the extension gives the format;
   * otherwise the format comes from the media type and its extension is
   * appended.
   */
  private nameFetchedDocument(filename: string, contentType?: string): { filename: string; format: DocumentFormat } {
    const byName = detectDocumentFormat(filename);
    if (byName) {
      return { filename, format: byName };
    }
    const byType = formatForContentType(contentType);
    if (!byType) {
      throw new UnsupportedFormatError(contentType ?? filename);
    }
    return { filename: `${filename}.${FORMAT_EXTENSIONS[byType]}`, format: byType };
  }

  // ==========================================================================
  // Sessions
  // ==========================================================================

  /**
   * The latest messages of a session, oldest first.
   *
   * @throws SessionNotFoundError
   */
  sessionHistory(sessionId: string, limit?: number): ChatMessage[] {
    return this.sessions.history(sessionId, limit);
  }

  /**
   * All sessions, most recently active first.
   */
  listSessions(): SessionSummary[] {
    return this.sessions.list().map((session) => ({
      id: session.id,
      createdAt: session.createdAt,
      lastActivityAt: session.lastActivityAt,
      messageCount: session.messages.length,
    }));
  }

  deleteSession(sessionId: string): DeleteOutcome {
    return this.sessions.delete(sessionId) ? 'ok' : 'not_found';
  }

  /**
   * Removes sessions idle for longer than the configured timeout. Runs on
   * a timer after init().
   *
   * @returns ids of the removed sessions
   */
  expireIdleSessions(): string[] {
    return this.sessions.expireIdle();
  }

  // ==========================================================================
  // Stats
  // ==========================================================================

  async stats(): Promise<StatsResponse> {
    const indexStats = await this.index.stats();
    const documentsByStatus: Record<ProcessingStatus, number> = {
      pending: 0,
      processing: 0,
      ready: 0,
      failed: 0,
    };
    for (const record of await this.documents.list()) {
      documentsByStatus[record.status]++;
    }
    return { ...indexStats, documentsByStatus };
  }
}

/**
 * Factory function to create a RAG engine.
 */
export function createRAGEngine(options: RAGEngineOptions): RAGEngine {
  return new RAGEngine(options);
}
