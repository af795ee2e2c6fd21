/**
 * Document Storage Service
 *
 * Registry of ingested documents and their processing status.
 * Each record is a JSON file named after the document id. The uploaded
 * bytes are kept beside it (`<id>.source`) so a document can be processed
 * again; its text lives in the vector index as chunks.
 *
 * Key responsibilities:
 * - Save a record when a document is accepted
 * - Retrieve records by ID
 * - List all records
 * - Keep the original bytes of each document
 * - Delete records together with their bytes
 * - Track status (pending, processing, ready, failed) and the error of a
 *   failed ingestion
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DocumentNotFoundError } from '../errors';
import {
    DocumentError,
    DocumentRecord,
    ProcessingStatus,
    StoredDocumentRecord,
} from '../../shared/types';
import { isMissingFileError } from '../utils/fsErrors';
import { createLogger } from '../utils/logger';

const log = createLogger('documents');

/**
 * Configuration for document storage.
 */
export interface DocumentStorageConfig {
    /** Directory path where document records are stored */
    storagePath: string;
}

/**
 * Default storage path for document records.
 */
const DEFAULT_STORAGE_PATH = path.join(process.cwd(), 'data', 'documents');

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

const SOURCE_EXTENSION = 'source';

const storedDocumentSchema = z.object({
    id: z.string().regex(SAFE_ID),
    filename: z.string(),
    format: z.enum(['text', 'markdown', 'pdf', 'docx']),
    uploadedAt: z.string(),
    sizeBytes: z.number().int().nonnegative(),
    status: z.enum(['pending', 'processing', 'ready', 'failed']),
    chunkCount: z.number().int().nonnegative(),
    encoding: z.string().optional(),
    pageCount: z.number().int().nonnegative().optional(),
    indexedAt: z.string().optional(),
    error: z.object({ code: z.string(), message: z.string() }).optional(),
});

/**
 * Fields that change while a document is processed.
 */
export interface DocumentStatusUpdate {
    chunkCount?: number;
    encoding?: string;
    pageCount?: number;
    error?: DocumentError;
}

/**
 * Interface for document storage operations.
 */
export interface IDocumentStorage {
    save(record: DocumentRecord): Promise<void>;
    get(id: string): Promise<DocumentRecord | null>;
    list(): Promise<DocumentRecord[]>;
    delete(id: string): Promise<boolean>;
    saveSource(id: string, bytes: Buffer): Promise<void>;
    readSource(id: string): Promise<Buffer | null>;
    updateStatus(id: string, status: ProcessingStatus, update?: DocumentStatusUpdate): Promise<DocumentRecord>;
}

/**
 * Document Storage implementation.
 */
export class DocumentStorage implements IDocumentStorage {
    private storagePath: string;

    constructor(config?: Partial<DocumentStorageConfig>) {
        this.storagePath = config?.storagePath || DEFAULT_STORAGE_PATH;
        this.ensureStorageDirectory();
    }

    /**
     * Ensures the storage directory exists.
     */
    private ensureStorageDirectory(): void {
        if (!fs.existsSync(this.storagePath)) {
            fs.mkdirSync(this.storagePath, { recursive: true });
        }
    }

    /**
     * Gets the file path for a document by ID.
     * Ids that could escape the storage directory have no path.
     */
    private getDocumentFilePath(documentId: string, extension = 'json'): string | undefined {
        if (!SAFE_ID.test(documentId)) {
            return undefined;
        }
        return path.join(this.storagePath, `${documentId}.${extension}`);
    }

    /**
     * Saves (or overwrites) a document record.
     */
    async save(record: DocumentRecord): Promise<void> {
        const filePath = this.getDocumentFilePath(record.id);
        if (!filePath) {
            throw new Error(`Invalid document id: ${record.id}`);
        }

        // Write to a temp file first, then rename for atomicity
        const tempPath = `${filePath}.tmp`;
        await fs.promises.writeFile(tempPath, JSON.stringify(this.serializeDocument(record), null, 2));
        await fs.promises.rename(tempPath, filePath);
    }

    /**
     * Retrieves a document record by ID.
     *
     * @returns The record if found, null otherwise
     */
    async get(id: string): Promise<DocumentRecord | null> {
        const filePath = this.getDocumentFilePath(id);
        if (!filePath || !fs.existsSync(filePath)) {
            return null;
        }

        try {
            const fileContent = await fs.promises.readFile(filePath, 'utf-8');
            const stored = storedDocumentSchema.parse(JSON.parse(fileContent));
            return this.deserializeDocument(stored);
        } catch (error) {
            // A damaged record shouldn't take the listing down with it
            log.error('Error reading document record', { documentId: id, error });
            return null;
        }
    }

    /**
     * Lists all document records, newest upload first.
     */
    async list(): Promise<DocumentRecord[]> {
        if (!fs.existsSync(this.storagePath)) {
            return [];
        }

        const files = await fs.promises.readdir(this.storagePath);
        const documents: DocumentRecord[] = [];

        for (const file of files) {
            if (file.endsWith('.json')) {
                const document = await this.get(file.slice(0, -'.json'.length));
                if (document) {
                    documents.push(document);
                }
            }
        }

        documents.sort((a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime());
        return documents;
    }

    /**
     * Deletes a document record and its stored bytes.
     *
     * @returns true if deleted, false if not found
     */
    async delete(id: string): Promise<boolean> {
        const filePath = this.getDocumentFilePath(id);
        const sourcePath = this.getDocumentFilePath(id, SOURCE_EXTENSION);
        if (!filePath || !sourcePath || !fs.existsSync(filePath)) {
            return false;
        }

        await fs.promises.rm(sourcePath, { force: true });
        await fs.promises.unlink(filePath);
        return true;
    }

    /**
     * Stores the original bytes of a document.
     */
    async saveSource(id: string, bytes: Buffer): Promise<void> {
        const sourcePath = this.getDocumentFilePath(id, SOURCE_EXTENSION);
        if (!sourcePath) {
            throw new Error(`Invalid document id: ${id}`);
        }

        const tempPath = `${sourcePath}.tmp`;
        await fs.promises.writeFile(tempPath, bytes);
        await fs.promises.rename(tempPath, sourcePath);
    }

    /**
     * The original bytes of a document, or null when none are stored.
     */
    async readSource(id: string): Promise<Buffer | null> {
        const sourcePath = this.getDocumentFilePath(id, SOURCE_EXTENSION);
        if (!sourcePath) {
            return null;
        }

        try {
            return await fs.promises.readFile(sourcePath);
        } catch (error) {
            if (isMissingFileError(error)) {
                return null;
            }
            throw error;
        }
    }

    /**
     * Moves a document to a new status. Reaching `ready` stamps indexedAt;
     * leaving `failed` clears the recorded error.
     */
    async updateStatus(
        id: string,
        status: ProcessingStatus,
        update: DocumentStatusUpdate = {}
    ): Promise<DocumentRecord> {
        const document = await this.get(id);
        if (!document) {
            throw new DocumentNotFoundError(id);
        }

        document.status = status;
        if (update.chunkCount !== undefined) {
            document.chunkCount = update.chunkCount;
        }
        if (update.encoding !== undefined) {
            document.encoding = update.encoding;
        }
        if (update.pageCount !== undefined) {
            document.pageCount = update.pageCount;
        }

        if (status === 'ready') {
            document.indexedAt = new Date();
        }
        if (status === 'failed') {
            document.error = update.error ?? { code: 'UNKNOWN', message: 'Processing failed' };
        } else {
            delete document.error;
        }

        await this.save(document);
        return document;
    }

    /**
     * Serializes a DocumentRecord (dates as ISO strings).
     */
    private serializeDocument(document: DocumentRecord): StoredDocumentRecord {
        return {
            id: document.id,
            filename: document.filename,
            format: document.format,
            uploadedAt: document.uploadedAt.toISOString(),
            sizeBytes: document.sizeBytes,
            status: document.status,
            chunkCount: document.chunkCount,
            encoding: document.encoding,
            pageCount: document.pageCount,
            indexedAt: document.indexedAt?.toISOString(),
            error: document.error,
        };
    }

    private deserializeDocument(stored: StoredDocumentRecord): DocumentRecord {
        const record: DocumentRecord = {
            id: stored.id,
            filename: stored.filename,
            format: stored.format,
            uploadedAt: new Date(stored.uploadedAt),
            sizeBytes: stored.sizeBytes,
            status: stored.status,
            chunkCount: stored.chunkCount,
        };
        if (stored.encoding !== undefined) {
            record.encoding = stored.encoding;
        }
        if (stored.pageCount !== undefined) {
            record.pageCount = stored.pageCount;
        }
        if (stored.indexedAt !== undefined) {
            record.indexedAt = new Date(stored.indexedAt);
        }
        if (stored.error !== undefined) {
            record.error = stored.error;
        }
        return record;
    }
}

/**
 * Factory function to create a DocumentStorage instance.
 */
export function createDocumentStorage(config?: Partial<DocumentStorageConfig>): DocumentStorage {
    return new DocumentStorage(config);
}
