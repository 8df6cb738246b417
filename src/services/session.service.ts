import { randomUUID } from 'node:crypto';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { Conversation } from '../graph/conversation';
import { CacheManager, CacheStats } from '../utils/cache-manager';

export interface SessionHandle {
  sessionId: string;
  conversation: Conversation;
  createdAt: number;
}

export interface SessionStoreOptions {
  ttl?: number;
  /** Interval of the expiry sweep; 0 disables it. */
  cleanupInterval?: number;
  now?: () => number;
}

/**
 * Conversation handles keyed by session id, each expiring after `ttl` of
 * inactivity. Every run on a session reads and extends its own handle only.
 */
export class SessionStore {
  private readonly cache: CacheManager<SessionHandle>;
  private readonly now: () => number;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(options: SessionStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.cache = new CacheManager<SessionHandle>(options.ttl ?? config.server.sessionTtl, this.now);

    const interval = options.cleanupInterval ?? 60000;
    if (interval > 0) {
      this.sweeper = setInterval(() => {
        const removed = this.cache.cleanup();
        if (removed > 0) {
          logger.debug('Expired sessions removed', { removed });
        }
      }, interval);
      this.sweeper.unref();
    }
  }

  static newSessionId(): string {
    return randomUUID();
  }

  get(sessionId: string): SessionHandle | null {
    const handle = this.cache.get(sessionId);
    if (handle) {
      this.cache.touch(sessionId);
    }
    return handle;
  }

  getOrCreate(sessionId: string): SessionHandle {
    const existing = this.get(sessionId);
    if (existing) {
      return existing;
    }

    const handle: SessionHandle = {
      sessionId,
      conversation: new Conversation(),
      createdAt: this.now(),
    };
    this.cache.set(sessionId, handle);
    logger.info('Session created', { sessionId });
    return handle;
  }

  delete(sessionId: string): boolean {
    return this.cache.delete(sessionId);
  }

  getStats(): CacheStats {
    return this.cache.getStats();
  }

  close(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
    this.cache.clear();
  }
}
