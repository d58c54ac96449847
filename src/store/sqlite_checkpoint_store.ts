import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import { dirname } from "node:path";

import Database from "better-sqlite3";
import { z } from "zod";

import { CHANNEL_NAMES, isChannelName, type ChannelName } from "../contracts/conversation";
import { CheckpointConflict, StorageError } from "../errors/agent_errors";
import { createLogger, type AgentLogger } from "../logger";
import { defaultThreadTitle, type ThreadRecord, type ThreadRegistry } from "../threads/thread_registry";
import {
  ChannelVersionsSchema,
  CheckpointMetadataSchema,
  applyPendingWrites,
  computeChannelVersions,
  stateFromBlobs,
  type AppendCheckpointArgs,
  type Checkpoint,
  type CheckpointStore,
  type PendingWrite,
  type PendingWritesKey,
} from "./checkpoint_store";

const CHECKPOINT_TYPE = "json";
const ROOT_PARENT = "";

const CheckpointRow = z.object({
  thread_id: z.string(),
  checkpoint_ns: z.string(),
  checkpoint_id: z.string(),
  parent_checkpoint_id: z.string().nullable(),
  checkpoint_state: z.string(),
  metadata: z.string(),
  created_at: z.string(),
});

type CheckpointRow = z.infer<typeof CheckpointRow>;

const CheckpointStateColumn = z.object({
  v: z.literal(1),
  channel_versions: ChannelVersionsSchema,
});

const BlobRow = z.object({ blob: z.instanceof(Buffer) });

const WriteRow = z.object({
  task_id: z.string(),
  idx: z.number().int(),
  channel: z.string(),
  type: z.enum(["append", "replace"]),
  value: z.string(),
  task_path: z.string().nullable(),
});

const ThreadRow = z.object({
  thread_id: z.string(),
  account_id: z.string(),
  title: z.string(),
  created_at: z.string(),
  last_activity_at: z.string(),
  is_active: z.number().int(),
});

function threadRecord(row: z.infer<typeof ThreadRow>): ThreadRecord {
  return {
    threadId: row.thread_id,
    accountId: row.account_id,
    title: row.title,
    createdAt: row.created_at,
    lastActivityAt: row.last_activity_at,
    active: row.is_active === 1,
  };
}

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/** Warns about database locations that will not survive a restart. */
export function checkStoragePath(dbPath: string, log: AgentLogger): void {
  if (dbPath === ":memory:") {
    log.warn({ dbPath }, "checkpoint_store.path: in-memory database (acceptable for tests)");
    return;
  }
  if (dbPath.startsWith("/tmp/")) {
    log.warn({ dbPath }, "checkpoint_store.path: database on ephemeral storage (lost on restart)");
  }
}

export class SqliteCheckpointStore implements CheckpointStore, ThreadRegistry {
  private db: Database.Database;
  private log: AgentLogger;

  constructor(dbPath: string = "./data/agent_checkpoints.db", log: AgentLogger = createLogger()) {
    this.log = log;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    checkStoragePath(dbPath, this.log);
    if (dbPath !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("busy_timeout = 2000");
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS checkpoints (
        thread_id TEXT NOT NULL,
        checkpoint_ns TEXT NOT NULL DEFAULT '',
        checkpoint_id TEXT NOT NULL,
        parent_checkpoint_id TEXT,
        type TEXT,
        checkpoint_state TEXT NOT NULL,
        metadata TEXT NOT NULL DEFAULT '{}',
        step INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (thread_id, checkpoint_ns, checkpoint_id)
      );

      -- One committed child per parent: the store-level guard behind optimistic concurrency.
      CREATE UNIQUE INDEX IF NOT EXISTS idx_checkpoints_parent
        ON checkpoints(thread_id, checkpoint_ns, COALESCE(parent_checkpoint_id, ''));

      CREATE INDEX IF NOT EXISTS idx_checkpoints_step
        ON checkpoints(thread_id, checkpoint_ns, step DESC);

      CREATE TABLE IF NOT EXISTS checkpoint_writes (
        thread_id TEXT NOT NULL,
        checkpoint_ns TEXT NOT NULL DEFAULT '',
        checkpoint_id TEXT NOT NULL,
        task_id TEXT NOT NULL,
        idx INTEGER NOT NULL,
        channel TEXT NOT NULL,
        type TEXT,
        value TEXT,
        task_path TEXT,
        created_at TEXT NOT NULL,
        PRIMARY KEY (thread_id, checkpoint_ns, checkpoint_id, task_id, idx)
      );

      CREATE TABLE IF NOT EXISTS checkpoint_blobs (
        thread_id TEXT NOT NULL,
        checkpoint_ns TEXT NOT NULL DEFAULT '',
        channel TEXT NOT NULL,
        version TEXT NOT NULL,
        type TEXT NOT NULL,
        blob BLOB,
        PRIMARY KEY (thread_id, checkpoint_ns, channel, version)
      );

      CREATE TABLE IF NOT EXISTS conversation_threads (
        thread_id TEXT PRIMARY KEY,
        account_id TEXT NOT NULL,
        title TEXT NOT NULL,
        created_at TEXT NOT NULL,
        last_activity_at TEXT NOT NULL,
        is_active INTEGER NOT NULL DEFAULT 1
      );

      CREATE INDEX IF NOT EXISTS idx_threads_account_activity
        ON conversation_threads(account_id, is_active, last_activity_at DESC);
    `);
  }

  close(): void {
    this.db.close();
  }

  async loadLatest(threadId: string, namespace: string): Promise<Checkpoint | null> {
    return this.guard("load_latest", () => {
      const row = this.latestRow(threadId, namespace);
      return row ? this.hydrate(row) : null;
    });
  }

  async getCheckpoint(threadId: string, namespace: string, checkpointId: string): Promise<Checkpoint | null> {
    return this.guard("get_checkpoint", () => {
      const row = this.rowById(threadId, namespace, checkpointId);
      return row ? this.hydrate(row) : null;
    });
  }

  async listHistory(threadId: string, namespace: string, opts: { limit?: number } = {}): Promise<Checkpoint[]> {
    return this.guard("list_history", () => {
      const limit = opts.limit ?? Number.POSITIVE_INFINITY;
      const history: Checkpoint[] = [];
      let row = this.latestRow(threadId, namespace);
      while (row && history.length < limit) {
        history.push(this.hydrate(row));
        row = row.parent_checkpoint_id ? this.rowById(threadId, namespace, row.parent_checkpoint_id) : null;
      }
      return history;
    });
  }

  async append(args: AppendCheckpointArgs): Promise<Checkpoint> {
    const write = this.db.transaction((input: AppendCheckpointArgs): Checkpoint => {
      const latest = this.latestRow(input.threadId, input.namespace);
      const latestId = latest?.checkpoint_id ?? null;
      if (latestId !== input.parentCheckpointId) {
        throw new CheckpointConflict({
          threadId: input.threadId,
          namespace: input.namespace,
          expectedParentId: input.parentCheckpointId,
          actualLatestId: latestId,
        });
      }

      const parentVersions = latest ? this.parseStateColumn(latest).channel_versions : null;
      const parentStep = latest ? CheckpointMetadataSchema.parse(JSON.parse(latest.metadata)).step : 0;
      const merged = applyPendingWrites(input.state, input.pendingWrites);
      const { versions, changed, serialized } = computeChannelVersions(merged, parentVersions);

      const insertBlob = this.db.prepare(`
        INSERT OR IGNORE INTO checkpoint_blobs (thread_id, checkpoint_ns, channel, version, type, blob)
        VALUES (?, ?, ?, ?, ?, ?)
      `);
      for (const channel of changed) {
        insertBlob.run(
          input.threadId,
          input.namespace,
          channel,
          versions[channel],
          CHECKPOINT_TYPE,
          Buffer.from(serialized[channel], "utf8")
        );
      }

      const checkpoint: Omit<Checkpoint, "state"> = {
        threadId: input.threadId,
        namespace: input.namespace,
        checkpointId: randomUUID(),
        parentCheckpointId: input.parentCheckpointId,
        createdAt: new Date().toISOString(),
        channelVersions: versions,
        metadata: { ...input.metadata, step: parentStep + 1 },
      };

      this.db.prepare(`
        INSERT INTO checkpoints (
          thread_id, checkpoint_ns, checkpoint_id, parent_checkpoint_id, type,
          checkpoint_state, metadata, step, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        checkpoint.threadId,
        checkpoint.namespace,
        checkpoint.checkpointId,
        checkpoint.parentCheckpointId,
        CHECKPOINT_TYPE,
        JSON.stringify({ v: 1, channel_versions: versions }),
        JSON.stringify(checkpoint.metadata),
        checkpoint.metadata.step,
        checkpoint.createdAt
      );

      const clearWrite = this.db.prepare(`
        DELETE FROM checkpoint_writes
        WHERE thread_id = ? AND checkpoint_ns = ? AND checkpoint_id = ? AND task_id = ?
      `);
      for (const taskId of new Set(input.pendingWrites.map((pending) => pending.taskId))) {
        clearWrite.run(input.threadId, input.namespace, input.parentCheckpointId ?? ROOT_PARENT, taskId);
      }

      return { ...checkpoint, state: merged };
    });

    try {
      return write.immediate(args);
    } catch (error) {
      throw this.toAppendError(error, args);
    }
  }

  async stagePendingWrites(args: PendingWritesKey & { writes: PendingWrite[] }): Promise<void> {
    const insert = this.db.prepare(`
      INSERT OR IGNORE INTO checkpoint_writes (
        thread_id, checkpoint_ns, checkpoint_id, task_id, idx, channel, type, value, task_path, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const stage = this.db.transaction((writes: PendingWrite[]) => {
      const now = new Date().toISOString();
      for (const write of writes) {
        insert.run(
          args.threadId,
          args.namespace,
          args.checkpointId ?? ROOT_PARENT,
          write.taskId,
          write.idx,
          write.channel,
          write.op,
          JSON.stringify(write.value ?? null),
          write.taskPath ?? null,
          now
        );
      }
    });

    return this.guard("stage_writes", () => stage(args.writes));
  }

  async listPendingWrites(args: PendingWritesKey): Promise<PendingWrite[]> {
    return this.guard("list_writes", () => {
      const rows = this.db.prepare(`
        SELECT task_id, idx, channel, type, value, task_path FROM checkpoint_writes
        WHERE thread_id = ? AND checkpoint_ns = ? AND checkpoint_id = ?
        ORDER BY created_at ASC, task_id ASC, idx ASC
      `).all(args.threadId, args.namespace, args.checkpointId ?? ROOT_PARENT);

      const writes: PendingWrite[] = [];
      for (const raw of rows) {
        const row = WriteRow.parse(raw);
        if (!isChannelName(row.channel)) {
          this.log.warn({ channel: row.channel, taskId: row.task_id }, "checkpoint_store.unknown_channel");
          continue;
        }
        writes.push({
          taskId: row.task_id,
          idx: row.idx,
          channel: row.channel,
          op: row.type,
          value: JSON.parse(row.value),
          ...(row.task_path ? { taskPath: row.task_path } : {}),
        });
      }
      return writes;
    });
  }

  async discardPendingWrites(args: { threadId: string; namespace: string; taskIdPrefix: string }): Promise<number> {
    return this.guard("discard_writes", () => {
      const result = this.db.prepare(`
        DELETE FROM checkpoint_writes
        WHERE thread_id = ? AND checkpoint_ns = ? AND substr(task_id, 1, ?) = ?
      `).run(args.threadId, args.namespace, args.taskIdPrefix.length, args.taskIdPrefix);
      return result.changes;
    });
  }

  async touchThread(args: { threadId: string; accountId: string; at: string }): Promise<ThreadRecord> {
    return this.guard("touch_thread", () => {
      this.db.prepare(`
        INSERT INTO conversation_threads (thread_id, account_id, title, created_at, last_activity_at, is_active)
        VALUES (?, ?, ?, ?, ?, 1)
        ON CONFLICT(thread_id) DO UPDATE SET last_activity_at = excluded.last_activity_at, is_active = 1
      `).run(args.threadId, args.accountId, defaultThreadTitle(args.at), args.at, args.at);
      const row = this.db.prepare("SELECT * FROM conversation_threads WHERE thread_id = ?").get(args.threadId);
      return threadRecord(ThreadRow.parse(row));
    });
  }

  async latestActiveThread(accountId: string): Promise<ThreadRecord | null> {
    const [latest] = await this.listActiveThreads(accountId, 1);
    return latest ?? null;
  }

  async listActiveThreads(accountId: string, limit: number): Promise<ThreadRecord[]> {
    return this.guard("list_threads", () => {
      const rows = this.db.prepare(`
        SELECT * FROM conversation_threads
        WHERE account_id = ? AND is_active = 1
        ORDER BY last_activity_at DESC, created_at DESC
        LIMIT ?
      `).all(accountId, limit);
      return rows.map((row) => threadRecord(ThreadRow.parse(row)));
    });
  }

  async deactivateThread(args: { threadId: string; accountId: string }): Promise<boolean> {
    return this.guard("deactivate_thread", () => {
      const result = this.db.prepare(`
        UPDATE conversation_threads SET is_active = 0
        WHERE thread_id = ? AND account_id = ?
      `).run(args.threadId, args.accountId);
      return result.changes > 0;
    });
  }

  private guard<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      this.log.error({ evt: "checkpoint_store.failed", op, error: String(error) }, "checkpoint_store.failed");
      throw new StorageError(`checkpoint store ${op} failed`, error);
    }
  }

  private toAppendError(error: unknown, args: AppendCheckpointArgs): Error {
    if (error instanceof CheckpointConflict) return error;

    const code = sqliteCode(error);
    if (code === "SQLITE_CONSTRAINT_UNIQUE" || code === "SQLITE_CONSTRAINT_PRIMARYKEY" || code?.startsWith("SQLITE_BUSY")) {
      // Another writer got there first (or holds the write lock); the caller reloads and retries.
      return new CheckpointConflict({
        threadId: args.threadId,
        namespace: args.namespace,
        expectedParentId: args.parentCheckpointId,
        actualLatestId: null,
      });
    }
    if (code) {
      this.log.error({ evt: "checkpoint_store.append_failed", code, threadId: args.threadId }, "checkpoint_store.append_failed");
      return new StorageError("checkpoint append failed", error);
    }
    return error instanceof Error ? error : new Error(String(error));
  }

  private latestRow(threadId: string, namespace: string): CheckpointRow | null {
    const row = this.db.prepare(`
      SELECT thread_id, checkpoint_ns, checkpoint_id, parent_checkpoint_id, checkpoint_state, metadata, created_at
      FROM checkpoints
      WHERE thread_id = ? AND checkpoint_ns = ?
      ORDER BY step DESC
      LIMIT 1
    `).get(threadId, namespace);
    return row ? CheckpointRow.parse(row) : null;
  }

  private rowById(threadId: string, namespace: string, checkpointId: string): CheckpointRow | null {
    const row = this.db.prepare(`
      SELECT thread_id, checkpoint_ns, checkpoint_id, parent_checkpoint_id, checkpoint_state, metadata, created_at
      FROM checkpoints
      WHERE thread_id = ? AND checkpoint_ns = ? AND checkpoint_id = ?
    `).get(threadId, namespace, checkpointId);
    return row ? CheckpointRow.parse(row) : null;
  }

  private parseStateColumn(row: CheckpointRow) {
    return CheckpointStateColumn.parse(JSON.parse(row.checkpoint_state));
  }

  private readBlob(row: CheckpointRow, channel: ChannelName, version: string): string {
    const raw = this.db.prepare(`
      SELECT blob FROM checkpoint_blobs
      WHERE thread_id = ? AND checkpoint_ns = ? AND channel = ? AND version = ?
    `).get(row.thread_id, row.checkpoint_ns, channel, version);
    if (!raw) {
      throw new Error(`missing blob ${channel}@${version} for checkpoint ${row.checkpoint_id}`);
    }
    return BlobRow.parse(raw).blob.toString("utf8");
  }

  private hydrate(row: CheckpointRow): Checkpoint {
    const versions = this.parseStateColumn(row).channel_versions;
    const blobs: Record<ChannelName, string> = {
      messages: "",
      toolInvocations: "",
      turns: "",
    };
    for (const channel of CHANNEL_NAMES) {
      blobs[channel] = this.readBlob(row, channel, versions[channel]);
    }

    return {
      threadId: row.thread_id,
      namespace: row.checkpoint_ns,
      checkpointId: row.checkpoint_id,
      parentCheckpointId: row.parent_checkpoint_id,
      createdAt: row.created_at,
      channelVersions: versions,
      metadata: CheckpointMetadataSchema.parse(JSON.parse(row.metadata)),
      state: stateFromBlobs(blobs),
    };
  }
}
