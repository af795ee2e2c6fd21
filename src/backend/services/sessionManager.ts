/**
 * Session Manager Service
 *
 * Holds bounded conversation history per session id. Follow-up questions
 * use it to resolve references to earlier turns.
 *
 * Key responsibilities:
 * - Create sessions on first use (or with a caller-supplied id)
 * - Append turns, trimming the oldest beyond the message limit (FIFO)
 * - Return the latest turns, oldest first
 * - Expire sessions that have been idle for too long
 * - Snapshot all sessions to one JSON file and read them back at startup
 *
 * Sessions live in memory; the snapshot is only written when asked to.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { SessionNotFoundError } from '../errors';
import { ChatMessage, MessageRole, Session, StoredMessage, StoredSession } from '../../shared/types';
import { errorCode, isMissingFileError } from '../utils/fsErrors';
import { createLogger } from '../utils/logger';

const log = createLogger('sessions');

/**
 * Configuration options for the SessionManager.
 */
export interface SessionManagerConfig {
    /** Messages kept per session; older ones are dropped first */
    maxMessages: number;
    /** Idle time after which a session may be expired */
    idleTimeoutMs: number;
    /** JSON file for load()/persist(); without it sessions are memory-only */
    snapshotPath?: string;
    /** Clock, replaceable in tests */
    now: () => Date;
}

export const DEFAULT_SESSION_CONFIG: SessionManagerConfig = {
    maxMessages: 20,
    idleTimeoutMs: 60 * 60 * 1000,
    now: () => new Date(),
};

const storedMessageSchema = z.object({
    id: z.string(),
    role: z.enum(['user', 'assistant']),
    text: z.string(),
    timestamp: z.string(),
});

const storedSessionSchema = z.object({
    id: z.string().min(1),
    createdAt: z.string(),
    lastActivityAt: z.string(),
    messages: z.array(storedMessageSchema),
});

const snapshotSchema = z.object({
    sessions: z.array(storedSessionSchema),
});

/**
 * SessionManager: repository for conversation sessions.
 */
export class SessionManager {
    private readonly config: SessionManagerConfig;
    private readonly sessions = new Map<string, Session>();

    constructor(config: Partial<SessionManagerConfig> = {}) {
        this.config = { ...DEFAULT_SESSION_CONFIG, ...config };
        if (!Number.isInteger(this.config.maxMessages) || this.config.maxMessages < 1) {
            throw new Error(`maxMessages must be a positive integer, got ${this.config.maxMessages}`);
        }
    }

    /**
     * Returns the session with the given id, creating it when unknown.
     * Without an id a new session with a fresh UUID is created. Either way
     * the session counts as active now.
     */
    getOrCreate(sessionId?: string): Session {
        if (sessionId !== undefined) {
            const existing = this.sessions.get(sessionId);
            if (existing) {
                existing.lastActivityAt = this.config.now();
                return this.copy(existing);
            }
        }

        const now = this.config.now();
        const session: Session = {
            id: sessionId ?? uuidv4(),
            messages: [],
            createdAt: now,
            lastActivityAt: now,
        };
        this.sessions.set(session.id, session);
        log.debug('Session created', { sessionId: session.id });
        return this.copy(session);
    }

    get(sessionId: string): Session | undefined {
        const session = this.sessions.get(sessionId);
        return session ? this.copy(session) : undefined;
    }

    /**
     * Appends a turn. Beyond maxMessages the oldest messages are dropped.
     *
     * @throws SessionNotFoundError if the session doesn't exist
     */
    append(sessionId: string, role: MessageRole, text: string): ChatMessage {
        const session = this.require(sessionId);
        const now = this.config.now();

        const message: ChatMessage = { id: uuidv4(), role, text, timestamp: now };
        session.messages.push(message);
        if (session.messages.length > this.config.maxMessages) {
            session.messages.splice(0, session.messages.length - this.config.maxMessages);
        }
        session.lastActivityAt = now;

        return { ...message };
    }

    /**
     * The latest `limit` messages, oldest first.
     *
     * @throws SessionNotFoundError if the session doesn't exist
     */
    history(sessionId: string, limit: number = this.config.maxMessages): ChatMessage[] {
        const session = this.require(sessionId);
        if (limit <= 0) {
            return [];
        }
        return session.messages.slice(-limit).map((message) => ({ ...message }));
    }

    /**
     * Removes sessions whose last activity is before `olderThan`.
     * Defaults to now minus the idle timeout.
     *
     * @returns ids of the removed sessions
     */
    expireIdle(olderThan: Date = new Date(this.config.now().getTime() - this.config.idleTimeoutMs)): string[] {
        const expired: string[] = [];
        for (const [id, session] of this.sessions) {
            if (session.lastActivityAt.getTime() < olderThan.getTime()) {
                this.sessions.delete(id);
                expired.push(id);
            }
        }
        if (expired.length > 0) {
            log.info('Expired idle sessions', { count: expired.length });
        }
        return expired;
    }

    delete(sessionId: string): boolean {
        return this.sessions.delete(sessionId);
    }

    /**
     * All sessions, most recently active first.
     */
    list(): Session[] {
        return Array.from(this.sessions.values())
            .map((session) => this.copy(session))
            .sort((a, b) => b.lastActivityAt.getTime() - a.lastActivityAt.getTime());
    }

    get size(): number {
        return this.sessions.size;
    }

    // ========================================================================
    // Snapshot
    // ========================================================================

    /**
     * Reads the snapshot file into memory, replacing current sessions.
     * A missing file yields no sessions; an unreadable one is logged and
     * ignored.
     *
     * @returns number of sessions loaded
     */
    async load(): Promise<number> {
        const snapshotPath = this.config.snapshotPath;
        if (!snapshotPath) {
            return 0;
        }

        let content: string;
        try {
            content = await fs.promises.readFile(snapshotPath, 'utf-8');
        } catch (error) {
            if (isMissingFileError(error)) {
                return 0;
            }
            log.warn('Session snapshot could not be read, starting empty', {
                path: snapshotPath,
                code: errorCode(error),
            });
            return 0;
        }

        const parsed = snapshotSchema.safeParse(safeJsonParse(content));
        if (!parsed.success) {
            log.warn('Session snapshot is unreadable, starting empty', { path: snapshotPath });
            return 0;
        }

        this.sessions.clear();
        for (const stored of parsed.data.sessions) {
            const session = this.deserializeSession(stored);
            if (session.messages.length > this.config.maxMessages) {
                session.messages.splice(0, session.messages.length - this.config.maxMessages);
            }
            this.sessions.set(session.id, session);
        }
        return this.sessions.size;
    }

    /**
     * Writes all sessions to the snapshot file.
     */
    async persist(): Promise<void> {
        const snapshotPath = this.config.snapshotPath;
        if (!snapshotPath) {
            return;
        }

        const sessions = Array.from(this.sessions.values()).map((session) => this.serializeSession(session));
        await fs.promises.mkdir(path.dirname(snapshotPath), { recursive: true });

        // Write to a temp file first, then rename, so a crash can't leave half a file
        const tempPath = `${snapshotPath}.tmp`;
        await fs.promises.writeFile(tempPath, JSON.stringify({ sessions }, null, 2));
        await fs.promises.rename(tempPath, snapshotPath);
    }

    private require(sessionId: string): Session {
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new SessionNotFoundError(sessionId);
        }
        return session;
    }

    private copy(session: Session): Session {
        return { ...session, messages: session.messages.map((message) => ({ ...message })) };
    }

    /**
     * Converts a Session to StoredSession format (dates as ISO strings).
     */
    private serializeSession(session: Session): StoredSession {
        return {
            id: session.id,
            createdAt: session.createdAt.toISOString(),
            lastActivityAt: session.lastActivityAt.toISOString(),
            messages: session.messages.map((msg) => this.serializeMessage(msg)),
        };
    }

    private serializeMessage(message: ChatMessage): StoredMessage {
        return {
            id: message.id,
            role: message.role,
            text: message.text,
            timestamp: message.timestamp.toISOString(),
        };
    }

    private deserializeSession(stored: StoredSession): Session {
        return {
            id: stored.id,
            createdAt: new Date(stored.createdAt),
            lastActivityAt: new Date(stored.lastActivityAt),
            messages: stored.messages.map((msg) => ({
                id: msg.id,
                role: msg.role,
                text: msg.text,
                timestamp: new Date(msg.timestamp),
            })),
        };
    }
}

function safeJsonParse(content: string): unknown {
    try {
        return JSON.parse(content);
    } catch {
        return undefined;
    }
}

/**
 * Factory function to create a SessionManager instance.
 */
export function createSessionManager(config?: Partial<SessionManagerConfig>): SessionManager {
    return new SessionManager(config);
}
