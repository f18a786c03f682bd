import { ConversationContext } from './conversation-context';

interface SessionEntry {
  context: ConversationContext;
  updatedAt: number;
  expiresAt: number;
}

export interface SessionStoreOptions {
  ttlMs: number;
  historyWindow: number;
  refinementDefault: boolean;
  now?: () => number;
}

/** In-memory session contexts with sliding expiry. */
export class SessionStore {
  private readonly map = new Map<string, SessionEntry>();
  private readonly now: () => number;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  private cleanup(now = this.now()): void {
    for (const [key, entry] of this.map.entries()) {
      if (entry.expiresAt <= now) {
        this.map.delete(key);
      }
    }
  }

  get(sessionId: string): ConversationContext | undefined {
    const now = this.now();
    this.cleanup(now);
    const entry = this.map.get(sessionId);
    if (!entry) return undefined;

    entry.updatedAt = now;
    entry.expiresAt = now + this.options.ttlMs;
    return entry.context;
  }

  getOrCreate(sessionId: string): ConversationContext {
    const existing = this.get(sessionId);
    if (existing) return existing;

    const now = this.now();
    const context = new ConversationContext(sessionId, this.options.historyWindow, this.options.refinementDefault);
    this.map.set(sessionId, { context, updatedAt: now, expiresAt: now + this.options.ttlMs });
    return context;
  }

  clear(sessionId: string): void {
    this.map.delete(sessionId);
  }

  size(): number {
    this.cleanup();
    return this.map.size;
  }
}
