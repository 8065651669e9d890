/**
 * Status Reporter — append-only progress log keyed by session id.
 *
 * This is the human-facing channel: planning progress, each step start and
 * completion, every retry and failure, confirmation requests. Pollers read it
 * incrementally with `since(sessionId, timestamp)`.
 *
 * The in-memory log forgets a session once it has been idle (no append)
 * for `sessionTtlMs`; idle sessions are swept on every append.
 */

import { v4 as uuid } from 'uuid';
import { StatusEntry } from '../domain/status';

export interface StatusReporter {
  append(sessionId: string, message: string): Promise<StatusEntry>;
  /** Entries for a session, oldest first. */
  list(sessionId: string): Promise<StatusEntry[]>;
  /** Newest entry for a session, or null. */
  latest(sessionId: string): Promise<StatusEntry | null>;
  /** Entries with a timestamp strictly after the cursor, oldest first. */
  since(sessionId: string, timestamp: string): Promise<StatusEntry[]>;
  clear(sessionId: string): Promise<void>;
}

export interface MemoryStatusReporterOptions {
  /** Clock override for deterministic timestamps. */
  now?: () => Date;
  /** Oldest entries beyond this per-session cap are dropped. */
  maxEntriesPerSession?: number;
  /** A session with no append for this long is forgotten. Defaults to 24h. */
  sessionTtlMs?: number;
}

export const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;

/** In-memory StatusReporter. */
export class MemoryStatusReporter implements StatusReporter {
  private entries = new Map<string, StatusEntry[]>();
  private sequence = 0;
  private readonly now: () => Date;
  private readonly maxEntries: number;
  private readonly sessionTtlMs: number;

  constructor(options: MemoryStatusReporterOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.maxEntries = options.maxEntriesPerSession ?? 1000;
    this.sessionTtlMs = options.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS;
  }

  /** Number of sessions currently held. */
  get sessionCount(): number {
    return this.entries.size;
  }

  async append(sessionId: string, message: string): Promise<StatusEntry> {
    this.sweep();
    const entry: StatusEntry = {
      id: `status_${uuid()}`,
      sessionId,
      message,
      timestamp: this.now().toISOString(),
      sequence: ++this.sequence,
    };
    const list = this.entries.get(sessionId) ?? [];
    list.push(entry);
    if (list.length > this.maxEntries) {
      list.splice(0, list.length - this.maxEntries);
    }
    this.entries.set(sessionId, list);
    return { ...entry };
  }

  async list(sessionId: string): Promise<StatusEntry[]> {
    return this.live(sessionId).map((e) => ({ ...e }));
  }

  async latest(sessionId: string): Promise<StatusEntry | null> {
    const list = this.live(sessionId);
    if (list.length === 0) return null;
    return { ...list[list.length - 1] };
  }

  async since(sessionId: string, timestamp: string): Promise<StatusEntry[]> {
    const cursor = Date.parse(timestamp);
    if (Number.isNaN(cursor)) return this.list(sessionId);
    return this.live(sessionId)
      .filter((e) => Date.parse(e.timestamp) > cursor)
      .map((e) => ({ ...e }));
  }

  async clear(sessionId: string): Promise<void> {
    this.entries.delete(sessionId);
  }

  private isIdle(list: StatusEntry[], now: number): boolean {
    const last = list[list.length - 1];
    return !last || now - Date.parse(last.timestamp) >= this.sessionTtlMs;
  }

  private live(sessionId: string): StatusEntry[] {
    const list = this.entries.get(sessionId);
    if (!list) return [];
    if (this.isIdle(list, this.now().getTime())) {
      this.entries.delete(sessionId);
      return [];
    }
    return list;
  }

  private sweep(): void {
    const now = this.now().getTime();
    for (const [sessionId, list] of this.entries) {
      if (this.isIdle(list, now)) this.entries.delete(sessionId);
    }
  }
}
