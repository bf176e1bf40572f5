/**
 * Session Store Service
 *
 * Maps opaque session ids to the index built from that session's uploads.
 *
 * Key responsibilities:
 * - Create a session for a freshly built index
 * - Retrieve a session's index by id
 * - Bound memory use with a maximum session count and a time-to-live
 *
 * Sessions live only in process memory and are lost on restart.
 * Writes happen synchronously inside a single event-loop turn, so two
 * concurrent uploads can never overwrite each other's entry.
 */

import { v4 as uuidv4 } from 'uuid';
import { IVectorIndex } from './vectorIndex';

/**
 * Capability interface used by the HTTP layer.
 * Any backing store (in-memory, Redis, ...) only needs these two operations.
 */
export interface ISessionStore {
    create(index: IVectorIndex): Promise<string>;
    get(sessionId: string): Promise<IVectorIndex | null>;
    size(): number;
}

/**
 * Configuration options for the in-memory store.
 */
export interface SessionStoreConfig {
    /** Maximum live sessions; the oldest is evicted to make room */
    maxSessions: number;
    /** Session lifetime in milliseconds; 0 keeps sessions until evicted */
    ttlMs: number;
    /** Clock, injectable for tests */
    now: () => number;
}

export const DEFAULT_SESSION_STORE_CONFIG: SessionStoreConfig = {
    maxSessions: 100,
    ttlMs: 60 * 60 * 1000,
    now: () => Date.now(),
};

interface SessionEntry {
    index: IVectorIndex;
    createdAt: number;
}

export class InMemorySessionStore implements ISessionStore {
    // Map preserves insertion order, which is also creation order
    private readonly sessions = new Map<string, SessionEntry>();
    private readonly config: SessionStoreConfig;

    constructor(config: Partial<SessionStoreConfig> = {}) {
        this.config = { ...DEFAULT_SESSION_STORE_CONFIG, ...config };
        if (!Number.isInteger(this.config.maxSessions) || this.config.maxSessions < 1) {
            throw new RangeError(`maxSessions must be at least 1, got ${this.config.maxSessions}`);
        }
    }

    /**
     * Stores the index under a new random id.
     *
     * @returns The new session id
     */
    async create(index: IVectorIndex): Promise<string> {
        this.purgeExpired();

        while (this.sessions.size >= this.config.maxSessions) {
            const oldest = this.sessions.keys().next();
            if (oldest.done) {
                break;
            }
            this.sessions.delete(oldest.value);
        }

        let sessionId = uuidv4();
        while (this.sessions.has(sessionId)) {
            sessionId = uuidv4();
        }

        this.sessions.set(sessionId, { index, createdAt: this.config.now() });
        return sessionId;
    }

    /**
     * Returns the session's index, or null if the id is unknown or expired.
     */
    async get(sessionId: string): Promise<IVectorIndex | null> {
        const entry = this.sessions.get(sessionId);
        if (!entry) {
            return null;
        }

        if (this.isExpired(entry)) {
            this.sessions.delete(sessionId);
            return null;
        }

        return entry.index;
    }

    size(): number {
        this.purgeExpired();
        return this.sessions.size;
    }

    private isExpired(entry: SessionEntry): boolean {
        return this.config.ttlMs > 0 && this.config.now() - entry.createdAt >= this.config.ttlMs;
    }

    private purgeExpired(): void {
        if (this.config.ttlMs <= 0) {
            return;
        }
        for (const [id, entry] of this.sessions) {
            if (this.isExpired(entry)) {
                this.sessions.delete(id);
            }
        }
    }
}

/**
 * Factory function to create a session store.
 */
export function createSessionStore(config?: Partial<SessionStoreConfig>): InMemorySessionStore {
    return new InMemorySessionStore(config);
}
