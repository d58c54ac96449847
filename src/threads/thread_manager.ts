import {
  emptyConversationState,
  type ConversationState,
} from "../contracts/conversation";
import {
  AuthorizationError,
  StorageError,
  describeError,
  isAgentError,
} from "../errors/agent_errors";
import { silentLogger, type AgentLogger } from "../logger";
import type {
  Checkpoint,
  CheckpointMetadata,
  CheckpointStore,
  PendingWrite,
} from "../store/checkpoint_store";
import {
  formatThreadId,
  isBareThreadKey,
  isValidAccountId,
  newThreadId,
  parseThreadId,
} from "./thread_id";
import {
  INACTIVITY_THRESHOLD_MS,
  MemoryThreadRegistry,
  type ThreadRecord,
  type ThreadRegistry,
} from "./thread_registry";

export const DEFAULT_NAMESPACE = "";

export type LoadedThreadState = {
  checkpoint: Checkpoint | null;
  state: ConversationState;
};

export type CommitArgs = {
  parentCheckpointId: string | null;
  state: ConversationState;
  writes: PendingWrite[];
  metadata: Omit<CheckpointMetadata, "step">;
};

/**
 * Access to one thread's checkpoint chain. Only obtainable through
 * ThreadManager.resolve, so ownership has already been checked.
 */
export interface ThreadHandle {
  readonly threadId: string;
  readonly accountId: string;
  readonly namespace: string;
  loadState(): Promise<LoadedThreadState>;
  commit(args: CommitArgs): Promise<Checkpoint>;
  stage(parentCheckpointId: string | null, writes: PendingWrite[]): Promise<void>;
  discard(turnId: string): Promise<number>;
  history(limit?: number): Promise<Checkpoint[]>;
}

export function turnTaskPrefix(turnId: string): string {
  return `${turnId}:`;
}

// Store failures that are not already typed surface as StorageError; conflicts pass through unchanged.
async function storeCall<T>(op: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isAgentError(error)) throw error;
    throw new StorageError(`${op} failed: ${describeError(error)}`, error);
  }
}

class StoreThreadHandle implements ThreadHandle {
  constructor(
    readonly threadId: string,
    readonly accountId: string,
    readonly namespace: string,
    private store: CheckpointStore
  ) {}

  async loadState(): Promise<LoadedThreadState> {
    const checkpoint = await storeCall("load_latest", () => this.store.loadLatest(this.threadId, this.namespace));
    return { checkpoint, state: checkpoint?.state ?? emptyConversationState() };
  }

  async commit(args: CommitArgs): Promise<Checkpoint> {
    return storeCall("append", () =>
      this.store.append({
        threadId: this.threadId,
        namespace: this.namespace,
        parentCheckpointId: args.parentCheckpointId,
        state: args.state,
        pendingWrites: args.writes,
        metadata: args.metadata,
      })
    );
  }

  async stage(parentCheckpointId: string | null, writes: PendingWrite[]): Promise<void> {
    if (writes.length === 0) return;
    await storeCall("stage_writes", () =>
      this.store.stagePendingWrites({
        threadId: this.threadId,
        namespace: this.namespace,
        checkpointId: parentCheckpointId,
        writes,
      })
    );
  }

  async discard(turnId: string): Promise<number> {
    return storeCall("discard_writes", () =>
      this.store.discardPendingWrites({
        threadId: this.threadId,
        namespace: this.namespace,
        taskIdPrefix: turnTaskPrefix(turnId),
      })
    );
  }

  async history(limit?: number): Promise<Checkpoint[]> {
    return storeCall("list_history", () =>
      this.store.listHistory(this.threadId, this.namespace, limit === undefined ? {} : { limit })
    );
  }
}

export type ThreadManagerOptions = {
  log?: AgentLogger;
  namespace?: string;
  registry?: ThreadRegistry;
  now?: () => Date;
  inactivityMs?: number;
};

export class ThreadManager {
  private log: AgentLogger;
  private namespace: string;
  private registry: ThreadRegistry;
  private now: () => Date;
  private inactivityMs: number;

  constructor(
    private store: CheckpointStore,
    opts: ThreadManagerOptions = {}
  ) {
    this.log = opts.log ?? silentLogger;
    this.namespace = opts.namespace ?? DEFAULT_NAMESPACE;
    this.registry = opts.registry ?? new MemoryThreadRegistry();
    this.now = opts.now ?? (() => new Date());
    this.inactivityMs = opts.inactivityMs ?? INACTIVITY_THRESHOLD_MS;
  }

  /**
   * Resolves the thread a new turn runs on and records the activity.
   * Without an id the account's most recent active thread is resumed, unless
   * it has been idle past the inactivity threshold: then it is closed and a
   * new thread is minted. An explicit id reopens a closed thread.
   */
  async open(rawThreadId: string | null | undefined, authenticatedAccountId: string): Promise<ThreadHandle> {
    const explicit = rawThreadId !== null && rawThreadId !== undefined && rawThreadId !== "";
    let handle = explicit ? this.resolve(rawThreadId, authenticatedAccountId) : null;

    if (!handle) {
      if (!isValidAccountId(authenticatedAccountId)) {
        throw new AuthorizationError("authenticated account id is malformed");
      }
      const latest = await storeCall("latest_active_thread", () =>
        this.registry.latestActiveThread(authenticatedAccountId)
      );
      if (latest && !this.isStale(latest)) {
        this.log.debug({ evt: "thread.resumed", threadId: latest.threadId }, "thread.resumed");
        handle = this.handle(latest.threadId, authenticatedAccountId);
      } else {
        if (latest) {
          await storeCall("deactivate_thread", () =>
            this.registry.deactivateThread({ threadId: latest.threadId, accountId: authenticatedAccountId })
          );
          this.log.info(
            { evt: "thread.deactivated", threadId: latest.threadId, lastActivityAt: latest.lastActivityAt },
            "thread.deactivated"
          );
        }
        handle = this.resolve(undefined, authenticatedAccountId);
      }
    }

    const { threadId, accountId } = handle;
    await storeCall("touch_thread", () =>
      this.registry.touchThread({ threadId, accountId, at: this.now().toISOString() })
    );
    return handle;
  }

  async listThreads(authenticatedAccountId: string, limit: number): Promise<ThreadRecord[]> {
    if (!isValidAccountId(authenticatedAccountId)) {
      throw new AuthorizationError("authenticated account id is malformed");
    }
    return storeCall("list_threads", () => this.registry.listActiveThreads(authenticatedAccountId, limit));
  }

  /** Marks the thread inactive. Its checkpoints stay readable. */
  async close(rawThreadId: string, authenticatedAccountId: string): Promise<boolean> {
    const { threadId, accountId } = this.resolve(rawThreadId, authenticatedAccountId);
    const closed = await storeCall("deactivate_thread", () => this.registry.deactivateThread({ threadId, accountId }));
    if (closed) this.log.info({ evt: "thread.closed", threadId }, "thread.closed");
    return closed;
  }

  /**
   * Resolves a raw thread id for the authenticated account. Ownership and
   * format are checked before the store is touched. A missing id mints a
   * new thread; a bare key is qualified with the caller's account.
   */
  resolve(rawThreadId: string | null | undefined, authenticatedAccountId: string): ThreadHandle {
    if (!isValidAccountId(authenticatedAccountId)) {
      throw new AuthorizationError("authenticated account id is malformed");
    }

    if (rawThreadId === null || rawThreadId === undefined || rawThreadId === "") {
      const threadId = newThreadId(authenticatedAccountId);
      this.log.info({ evt: "thread.created", threadId }, "thread.created");
      return this.handle(threadId, authenticatedAccountId);
    }

    if (isBareThreadKey(rawThreadId)) {
      return this.handle(formatThreadId(authenticatedAccountId, rawThreadId), authenticatedAccountId);
    }

    const parsed = parseThreadId(rawThreadId);
    if (parsed.accountId !== authenticatedAccountId) {
      this.log.warn(
        { evt: "thread.access_denied", threadAccountId: parsed.accountId, accountId: authenticatedAccountId },
        "thread.access_denied"
      );
      throw new AuthorizationError();
    }
    return this.handle(rawThreadId, authenticatedAccountId);
  }

  private isStale(thread: ThreadRecord): boolean {
    return this.now().getTime() - Date.parse(thread.lastActivityAt) > this.inactivityMs;
  }

  private handle(threadId: string, accountId: string): ThreadHandle {
    return new StoreThreadHandle(threadId, accountId, this.namespace, this.store);
  }
}
