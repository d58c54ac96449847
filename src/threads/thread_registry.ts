/** Threads idle for longer than this are closed instead of resumed. */
export const INACTIVITY_THRESHOLD_MS = 30 * 60 * 1000;

export type ThreadRecord = {
  threadId: string;
  accountId: string;
  title: string;
  createdAt: string;
  lastActivityAt: string;
  active: boolean;
};

/**
 * Lifecycle bookkeeping for threads: which ones an account has open and when
 * each was last used. The conversation itself lives in the checkpoint store.
 */
export interface ThreadRegistry {
  /** Creates the thread if new, otherwise marks it active and bumps its activity. */
  touchThread(args: { threadId: string; accountId: string; at: string }): Promise<ThreadRecord>;
  /** Most recently used active thread of the account. */
  latestActiveThread(accountId: string): Promise<ThreadRecord | null>;
  listActiveThreads(accountId: string, limit: number): Promise<ThreadRecord[]>;
  /** Returns false when the account has no such thread. */
  deactivateThread(args: { threadId: string; accountId: string }): Promise<boolean>;
}

export function defaultThreadTitle(at: string): string {
  return `Conversation ${at.slice(0, 16).replace("T", " ")}`;
}

function byRecentActivity(a: ThreadRecord, b: ThreadRecord): number {
  if (a.lastActivityAt !== b.lastActivityAt) return a.lastActivityAt < b.lastActivityAt ? 1 : -1;
  return a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0;
}

export class MemoryThreadRegistry implements ThreadRegistry {
  private threads = new Map<string, ThreadRecord>();

  async touchThread(args: { threadId: string; accountId: string; at: string }): Promise<ThreadRecord> {
    const existing = this.threads.get(args.threadId);
    const next: ThreadRecord = existing
      ? { ...existing, lastActivityAt: args.at, active: true }
      : {
          threadId: args.threadId,
          accountId: args.accountId,
          title: defaultThreadTitle(args.at),
          createdAt: args.at,
          lastActivityAt: args.at,
          active: true,
        };
    this.threads.set(args.threadId, next);
    return { ...next };
  }

  async latestActiveThread(accountId: string): Promise<ThreadRecord | null> {
    const [latest] = await this.listActiveThreads(accountId, 1);
    return latest ?? null;
  }

  async listActiveThreads(accountId: string, limit: number): Promise<ThreadRecord[]> {
    return [...this.threads.values()]
      .filter((thread) => thread.accountId === accountId && thread.active)
      .sort(byRecentActivity)
      .slice(0, limit)
      .map((thread) => ({ ...thread }));
  }

  async deactivateThread(args: { threadId: string; accountId: string }): Promise<boolean> {
    const existing = this.threads.get(args.threadId);
    if (!existing || existing.accountId !== args.accountId) return false;
    this.threads.set(args.threadId, { ...existing, active: false });
    return true;
  }
}
