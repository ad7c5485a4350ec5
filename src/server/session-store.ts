/**
 * Session Store
 *
 * Conversation sessions for the HTTP surface: bounded by count (LRU) and by
 * idle time (TTL). Requests against one session run one at a time so turns
 * land in memory in order.
 */

import { randomUUID } from 'node:crypto';

import { ConversationMemory } from '../agent/memory.js';
import { LRUCache } from '../utils/lru-cache.js';

export interface Session {
  id: string;
  userId: string | null;
  /** ISO 8601 */
  createdAt: string;
  memory: ConversationMemory;
}

export interface SessionStoreOptions {
  maxSessions: number;
  ttlMs: number;
  /** Turns rendered into prompts (memory.window) */
  memoryWindow: number;
  /** Turns kept per session (memory.max_turns) */
  memoryMaxTurns?: number;
  /** Clock override for tests */
  now?: () => number;
}

export class SessionStore {
  private readonly cache: LRUCache<Session>;
  private readonly locks = new Map<string, Promise<void>>();
  private readonly memoryWindow: number;
  private readonly memoryMaxTurns: number | undefined;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.memoryWindow = options.memoryWindow;
    this.memoryMaxTurns = options.memoryMaxTurns;
    this.now = options.now ?? Date.now;
    this.cache = new LRUCache<Session>({
      maxSize: options.maxSessions,
      ttlMs: options.ttlMs,
      now: this.now,
    });
  }

  create(userId: string | null = null): Session {
    const session: Session = {
      id: randomUUID(),
      userId,
      createdAt: new Date(this.now()).toISOString(),
      memory: new ConversationMemory(this.memoryWindow, this.memoryMaxTurns),
    };
    this.cache.set(session.id, session);
    return session;
  }

  /** Returns undefined for unknown, evicted and expired sessions */
  get(id: string): Session | undefined {
    return this.cache.get(id);
  }

  /**
   * Run `fn` once every earlier call for the same session has settled.
   */
  async withLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(sessionId) ?? Promise.resolve();
    const current = previous.then(fn);
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(sessionId, tail);

    try {
      return await current;
    } finally {
      if (this.locks.get(sessionId) === tail) {
        this.locks.delete(sessionId);
      }
    }
  }

  /** Drop expired sessions; returns how many were removed */
  prune(): number {
    return this.cache.prune();
  }

  get size(): number {
    return this.cache.size;
  }
}
