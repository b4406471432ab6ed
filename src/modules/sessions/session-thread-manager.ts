import { logDebug } from "../../observability/logger.js";

export type ThreadFactory<TThread> = () => Promise<TThread>;

/**
 * In-memory session id -> conversation thread map.
 *
 * Creation is keyed by session id: concurrent first calls for one id share a
 * single pending creation, while other ids are never blocked. Threads live
 * until reset or process exit.
 */
export class SessionThreadManager<TThread> {
  private readonly threads = new Map<string, Promise<TThread>>();

  constructor(private readonly createThread: ThreadFactory<TThread>) {}

  getOrCreateThread(sessionId: string): Promise<TThread> {
    const existing = this.threads.get(sessionId);
    if (existing) {
      return existing;
    }

    const pending = this.createThread();
    this.threads.set(sessionId, pending);
    logDebug("session.thread.create", { sessionId });

    // A failed creation must not poison the session id.
    pending.catch(() => {
      if (this.threads.get(sessionId) === pending) {
        this.threads.delete(sessionId);
      }
    });

    return pending;
  }

  resetThread(sessionId: string): void {
    if (this.threads.delete(sessionId)) {
      logDebug("session.thread.reset", { sessionId });
    }
  }

  hasThread(sessionId: string): boolean {
    return this.threads.has(sessionId);
  }

  get size(): number {
    return this.threads.size;
  }
}
