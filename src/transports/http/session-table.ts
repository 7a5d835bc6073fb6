import { logger } from '../../core/Logger.js';

export const DEFAULT_SESSION_IDLE_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_SESSION_SWEEP_INTERVAL_MS = 60 * 1000;

export interface SessionEntry {
  close(): Promise<void>;
  /** True while the client holds a stream open; such sessions are never swept. */
  isStreaming?(): boolean;
}

export interface SessionTableOptions {
  idleTimeoutMs?: number;
  sweepIntervalMs?: number;
  now?: () => number;
}

interface Slot<T> {
  entry: T;
  lastSeen: number;
}

/**
 * Live sessions keyed by `mcp-session-id`, with idle expiry. The sweep timer
 * is unref'd and never keeps the process alive.
 */
export class SessionTable<T extends SessionEntry> {
  private readonly sessions = new Map<string, Slot<T>>();
  private readonly idleTimeoutMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private timer?: NodeJS.Timeout;

  constructor(options: SessionTableOptions = {}) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_SESSION_IDLE_TIMEOUT_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SESSION_SWEEP_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  set(sessionId: string, entry: T): void {
    this.sessions.set(sessionId, { entry, lastSeen: this.now() });
  }

  /** Looks up a session and marks it active. */
  touch(sessionId: string): T | undefined {
    const slot = this.sessions.get(sessionId);
    if (!slot) {
      return undefined;
    }
    slot.lastSeen = this.now();
    return slot.entry;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Closes and drops sessions idle longer than the timeout; returns their ids.
   * A streaming session counts as active, so its idle time starts when its
   * last stream closes.
   */
  async sweep(): Promise<string[]> {
    const cutoff = this.now() - this.idleTimeoutMs;
    const expired: Array<[string, T]> = [];
    for (const [id, slot] of this.sessions) {
      if (slot.entry.isStreaming?.()) {
        slot.lastSeen = this.now();
      } else if (slot.lastSeen <= cutoff) {
        expired.push([id, slot.entry]);
      }
    }

    for (const [id, entry] of expired) {
      this.sessions.delete(id);
      logger.info(`Session ${id} expired after ${Math.round(this.idleTimeoutMs / 1000)}s idle`);
      await closeQuietly(id, entry);
    }
    return expired.map(([id]) => id);
  }

  startSweeper(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        logger.error(`Session sweep failed: ${error instanceof Error ? error.message : String(error)}`);
      });
    }, this.sweepIntervalMs);
    this.timer.unref();
  }

  stopSweeper(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  async closeAll(): Promise<void> {
    this.stopSweeper();
    const entries = [...this.sessions];
    this.sessions.clear();
    for (const [id, slot] of entries) {
      await closeQuietly(id, slot.entry);
    }
  }
}

async function closeQuietly(id: string, entry: SessionEntry): Promise<void> {
  try {
    await entry.close();
  } catch (error) {
    logger.error(`Error closing session ${id}: ${error instanceof Error ? error.message : String(error)}`);
  }
}
