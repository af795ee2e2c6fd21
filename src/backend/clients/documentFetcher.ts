/**
 * Document Fetcher
 *
 * Downloads a document over http(s) for batch questions asked against a
 * URL. Only the transport lives here: the caller decides the format from
 * the filename and content type returned.
 *
 * The whole download (headers and body) runs under one timeout, and the
 * body is read incrementally so an oversized document is rejected without
 * being held in memory.
 */

import * as path from 'path';
import { AppError, DocumentFetchError, DocumentTooLargeError, RequestValidationError } from '../errors';
import { CallOptions } from '../../shared/types';
import { CallScope } from './callScope';

export interface FetchedDocument {
    bytes: Buffer;
    /** Last segment of the URL path, possibly without an extension */
    filename: string;
    /** Media type without parameters, when the server sent one */
    contentType?: string;
}

/**
 * Source of documents addressed by URL.
 */
export interface DocumentFetcher {
    fetch(url: string, options?: CallOptions): Promise<FetchedDocument>;
}

export interface HttpDocumentFetcherConfig {
    timeoutMs: number;
    maxBytes: number;
}

export const DEFAULT_FETCHER_CONFIG: HttpDocumentFetcherConfig = {
    timeoutMs: 30000,
    maxBytes: 10 * 1024 * 1024,
};

const FALLBACK_FILENAME = 'document';

/**
 * Filename for a document URL: the decoded last path segment.
 */
export function filenameFromUrl(url: URL): string {
    const segment = path.posix.basename(url.pathname);
    if (!segment) {
        return FALLBACK_FILENAME;
    }
    try {
        return decodeURIComponent(segment);
    } catch {
        // Malformed escape; keep the raw segment
        return segment;
    }
}

/**
 * Parses and checks a document URL. Only http and https are fetched.
 */
export function parseDocumentUrl(value: string): URL {
    let url: URL;
    try {
        url = new URL(value);
    } catch {
        throw new RequestValidationError(`Invalid document URL: ${value}`, { url: value });
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new RequestValidationError(`Unsupported URL scheme: ${url.protocol}`, { url: value });
    }
    return url;
}

export class HttpDocumentFetcher implements DocumentFetcher {
    private readonly config: HttpDocumentFetcherConfig;

    constructor(config: Partial<HttpDocumentFetcherConfig> = {}) {
        this.config = { ...DEFAULT_FETCHER_CONFIG, ...config };
    }

    async fetch(value: string, options: CallOptions = {}): Promise<FetchedDocument> {
        const url = parseDocumentUrl(value);
        const scope = new CallScope(this.config.timeoutMs, options.signal);

        try {
            const response = await fetch(url, { method: 'GET', redirect: 'follow', signal: scope.signal });
            if (!response.ok) {
                throw new DocumentFetchError(
                    `Download failed: HTTP ${response.status}`,
                    response.status === 429 || response.status >= 500,
                    { details: { url: value, status: response.status } }
                );
            }

            const declaredLength = Number(response.headers.get('content-length') ?? 0);
            if (declaredLength > this.config.maxBytes) {
                throw new DocumentTooLargeError(declaredLength, this.config.maxBytes);
            }

            const bytes = await this.readBody(response);
            const contentType = response.headers.get('content-type')?.split(';')[0]?.trim().toLowerCase();

            return {
                bytes,
                filename: filenameFromUrl(url),
                ...(contentType ? { contentType } : {}),
            };
        } catch (error) {
            throw this.wrapError(error, value, scope);
        } finally {
            scope.dispose();
        }
    }

    private async readBody(response: Response): Promise<Buffer> {
        const body = response.body;
        if (!body) {
            return Buffer.alloc(0);
        }

        const reader = body.getReader();
        const parts: Buffer[] = [];
        let total = 0;
        try {
            for (;;) {
                const { done, value } = await reader.read();
                if (done) {
                    break;
                }
                total += value.length;
                if (total > this.config.maxBytes) {
                    await reader.cancel();
                    throw new DocumentTooLargeError(total, this.config.maxBytes);
                }
                parts.push(Buffer.from(value));
            }
        } finally {
            reader.releaseLock();
        }
        return Buffer.concat(parts);
    }

    private wrapError(error: unknown, url: string, scope: CallScope): AppError {
        if (error instanceof AppError) {
            return error;
        }
        if (scope.signal.aborted) {
            if (scope.timedOut && !scope.cancelled) {
                return new DocumentFetchError(`Download timed out after ${scope.timeoutMs}ms`, true, {
                    details: { url },
                    cause: error,
                });
            }
            return new DocumentFetchError('Download cancelled', false, { details: { url }, cause: error });
        }
        const message = error instanceof Error ? error.message : String(error);
        return new DocumentFetchError(`Download failed: ${message}`, true, { details: { url }, cause: error });
    }
}

export function createDocumentFetcher(config?: Partial<HttpDocumentFetcherConfig>): HttpDocumentFetcher {
    return new HttpDocumentFetcher(config);
}
