import { createHash, randomUUID } from "node:crypto";

import { z } from "zod";

import {
  ConversationStateSchema,
  ToolInvocationRecordSchema,
  TranscriptMessageSchema,
  TurnRecordSchema,
  type ChannelName,
  type ConversationState,
} from "../contracts/conversation";
import { CheckpointConflict } from "../errors/agent_errors";

export type PendingWriteOp = "append" | "replace";

export type PendingWrite = {
  taskId: string;
  idx: number;
  channel: ChannelName;
  op: PendingWriteOp;
  value: unknown;
  taskPath?: string;
};

export type CheckpointSource = "turn" | "compaction";

export type CheckpointMetadata = {
  source: CheckpointSource;
  step: number;
  status: "completed" | "failed";
  turnId?: string;
  errorCode?: string;
};

export type ChannelVersions = Record<ChannelName, string>;

export type Checkpoint = {
  threadId: string;
  namespace: string;
  checkpointId: string;
  parentCheckpointId: string | null;
  createdAt: string;
  channelVersions: ChannelVersions;
  metadata: CheckpointMetadata;
  state: ConversationState;
};

export type AppendCheckpointArgs = {
  threadId: string;
  namespace: string;
  parentCheckpointId: string | null;
  // State of the parent checkpoint; the pending writes are merged on top of it.
  state: ConversationState;
  pendingWrites: PendingWrite[];
  metadata: Omit<CheckpointMetadata, "step">;
};

export type PendingWritesKey = {
  threadId: string;
  namespace: string;
  // Parent the writes were produced against; null before the first checkpoint.
  checkpointId: string | null;
};

export interface CheckpointStore {
  loadLatest(threadId: string, namespace: string): Promise<Checkpoint | null>;

  getCheckpoint(threadId: string, namespace: string, checkpointId: string): Promise<Checkpoint | null>;

  /** Walks parent pointers from the latest checkpoint towards the root. */
  listHistory(threadId: string, namespace: string, opts?: { limit?: number }): Promise<Checkpoint[]>;

  /**
   * Atomically writes a new checkpoint whose parent must be the current latest.
   * Rejects with CheckpointConflict otherwise; nothing is written in that case.
   */
  append(args: AppendCheckpointArgs): Promise<Checkpoint>;

  stagePendingWrites(args: PendingWritesKey & { writes: PendingWrite[] }): Promise<void>;
  listPendingWrites(args: PendingWritesKey): Promise<PendingWrite[]>;
  discardPendingWrites(args: { threadId: string; namespace: string; taskIdPrefix: string }): Promise<number>;
}

function parseValues<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T[] {
  const list: unknown[] = Array.isArray(value) ? value : [value];
  return list.map((item) => schema.parse(item));
}

function mergeChannel<T>(current: T[], incoming: T[], op: PendingWriteOp): T[] {
  return op === "replace" ? [...incoming] : [...current, ...incoming];
}

/**
 * Applies pending writes in the order given. (taskId, idx) must be unique;
 * a duplicate means the same task output was staged twice.
 */
export function applyPendingWrites(base: ConversationState, writes: PendingWrite[]): ConversationState {
  const seen = new Set<string>();
  const next: ConversationState = {
    messages: [...base.messages],
    toolInvocations: [...base.toolInvocations],
    turns: [...base.turns],
  };

  for (const write of writes) {
    const key = `${write.taskId}#${write.idx}`;
    if (seen.has(key)) {
      throw new Error(`duplicate pending write ${key}`);
    }
    seen.add(key);

    switch (write.channel) {
      case "messages":
        next.messages = mergeChannel(next.messages, parseValues(TranscriptMessageSchema, write.value), write.op);
        break;
      case "toolInvocations":
        next.toolInvocations = mergeChannel(
          next.toolInvocations,
          parseValues(ToolInvocationRecordSchema, write.value),
          write.op
        );
        break;
      case "turns":
        next.turns = mergeChannel(next.turns, parseValues(TurnRecordSchema, write.value), write.op);
        break;
    }
  }

  return next;
}

export function serializeChannel(state: ConversationState, channel: ChannelName): string {
  return JSON.stringify(state[channel]);
}

function contentHash(serialized: string): string {
  return createHash("sha256").update(serialized).digest("hex").slice(0, 16);
}

function versionCounter(version: string | undefined): number {
  if (!version) return 0;
  const counter = Number(version.split(".")[0]);
  return Number.isFinite(counter) ? counter : 0;
}

/**
 * Version per channel: "<counter>.<content hash>". A channel whose content is
 * unchanged keeps the parent's version, so its blob is shared.
 */
export function computeChannelVersions(
  state: ConversationState,
  parentVersions: ChannelVersions | null
): { versions: ChannelVersions; changed: ChannelName[]; serialized: Record<ChannelName, string> } {
  const changed: ChannelName[] = [];
  const serialized: Record<ChannelName, string> = {
    messages: serializeChannel(state, "messages"),
    toolInvocations: serializeChannel(state, "toolInvocations"),
    turns: serializeChannel(state, "turns"),
  };

  const nextVersion = (channel: ChannelName): string => {
    const hash = contentHash(serialized[channel]);
    const parentVersion = parentVersions?.[channel];
    if (parentVersion && parentVersion.endsWith(`.${hash}`)) return parentVersion;
    changed.push(channel);
    return `${String(versionCounter(parentVersion) + 1).padStart(8, "0")}.${hash}`;
  };

  const versions: ChannelVersions = {
    messages: nextVersion("messages"),
    toolInvocations: nextVersion("toolInvocations"),
    turns: nextVersion("turns"),
  };

  return { versions, changed, serialized };
}

export function stateFromBlobs(blobs: Record<ChannelName, string>): ConversationState {
  return ConversationStateSchema.parse({
    messages: JSON.parse(blobs.messages),
    toolInvocations: JSON.parse(blobs.toolInvocations),
    turns: JSON.parse(blobs.turns),
  });
}

export const ChannelVersionsSchema = z.object({
  messages: z.string(),
  toolInvocations: z.string(),
  turns: z.string(),
});

export const CheckpointMetadataSchema = z.object({
  source: z.enum(["turn", "compaction"]),
  step: z.number().int().positive(),
  status: z.enum(["completed", "failed"]),
  turnId: z.string().optional(),
  errorCode: z.string().optional(),
});

type CheckpointRecord = Omit<Checkpoint, "state">;

type StagedWrite = PendingWrite & { checkpointId: string | null };

const chainKey = (threadId: string, namespace: string) => `${threadId}\u0000${namespace}`;
const blobKey = (threadId: string, namespace: string, channel: ChannelName, version: string) =>
  `${threadId}\u0000${namespace}\u0000${channel}\u0000${version}`;

export class MemoryCheckpointStore implements CheckpointStore {
  private chains = new Map<string, CheckpointRecord[]>(); // ordered by step
  private blobs = new Map<string, string>();
  private staged = new Map<string, StagedWrite[]>();

  async loadLatest(threadId: string, namespace: string): Promise<Checkpoint | null> {
    const chain = this.chains.get(chainKey(threadId, namespace));
    const record = chain?.at(-1);
    return record ? this.hydrate(record) : null;
  }

  async getCheckpoint(threadId: string, namespace: string, checkpointId: string): Promise<Checkpoint | null> {
    const chain = this.chains.get(chainKey(threadId, namespace)) ?? [];
    const record = chain.find((entry) => entry.checkpointId === checkpointId);
    return record ? this.hydrate(record) : null;
  }

  async listHistory(threadId: string, namespace: string, opts: { limit?: number } = {}): Promise<Checkpoint[]> {
    const chain = this.chains.get(chainKey(threadId, namespace)) ?? [];
    const byId = new Map(chain.map((record) => [record.checkpointId, record]));
    const limit = opts.limit ?? Number.POSITIVE_INFINITY;
    const history: Checkpoint[] = [];

    let cursor = chain.at(-1);
    while (cursor && history.length < limit) {
      history.push(this.hydrate(cursor));
      cursor = cursor.parentCheckpointId ? byId.get(cursor.parentCheckpointId) : undefined;
    }
    return history;
  }

  async append(args: AppendCheckpointArgs): Promise<Checkpoint> {
    const key = chainKey(args.threadId, args.namespace);
    const chain = this.chains.get(key) ?? [];
    const latest = chain.at(-1) ?? null;
    const latestId = latest?.checkpointId ?? null;

    if (latestId !== args.parentCheckpointId) {
      throw new CheckpointConflict({
        threadId: args.threadId,
        namespace: args.namespace,
        expectedParentId: args.parentCheckpointId,
        actualLatestId: latestId,
      });
    }

    const merged = applyPendingWrites(args.state, args.pendingWrites);
    const { versions, changed, serialized } = computeChannelVersions(merged, latest?.channelVersions ?? null);

    const record: CheckpointRecord = {
      threadId: args.threadId,
      namespace: args.namespace,
      checkpointId: randomUUID(),
      parentCheckpointId: args.parentCheckpointId,
      createdAt: new Date().toISOString(),
      channelVersions: versions,
      metadata: { ...args.metadata, step: (latest?.metadata.step ?? 0) + 1 },
    };

    for (const channel of changed) {
      this.blobs.set(blobKey(args.threadId, args.namespace, channel, versions[channel]), serialized[channel]);
    }
    this.chains.set(key, [...chain, record]);
    this.clearCommittedWrites(key, args.parentCheckpointId, args.pendingWrites);

    return this.hydrate(record);
  }

  async stagePendingWrites(args: PendingWritesKey & { writes: PendingWrite[] }): Promise<void> {
    const key = chainKey(args.threadId, args.namespace);
    const bucket = this.staged.get(key) ?? [];
    for (const write of args.writes) {
      const duplicate = bucket.some(
        (entry) =>
          entry.checkpointId === args.checkpointId && entry.taskId === write.taskId && entry.idx === write.idx
      );
      // Same (task, idx) staged again is a replay of the same output.
      if (!duplicate) bucket.push({ ...structuredClone(write), checkpointId: args.checkpointId });
    }
    this.staged.set(key, bucket);
  }

  async listPendingWrites(args: PendingWritesKey): Promise<PendingWrite[]> {
    const bucket = this.staged.get(chainKey(args.threadId, args.namespace)) ?? [];
    return bucket
      .filter((entry) => entry.checkpointId === args.checkpointId)
      .map(({ checkpointId: _checkpointId, ...write }) => structuredClone(write));
  }

  async discardPendingWrites(args: { threadId: string; namespace: string; taskIdPrefix: string }): Promise<number> {
    const key = chainKey(args.threadId, args.namespace);
    const bucket = this.staged.get(key) ?? [];
    const kept = bucket.filter((entry) => !entry.taskId.startsWith(args.taskIdPrefix));
    this.staged.set(key, kept);
    return bucket.length - kept.length;
  }

  private clearCommittedWrites(key: string, parentId: string | null, writes: PendingWrite[]) {
    const bucket = this.staged.get(key);
    if (!bucket) return;
    const committed = new Set(writes.map((write) => write.taskId));
    this.staged.set(
      key,
      bucket.filter((entry) => !(entry.checkpointId === parentId && committed.has(entry.taskId)))
    );
  }

  private hydrate(record: CheckpointRecord): Checkpoint {
    const read = (channel: ChannelName) => {
      const body = this.blobs.get(blobKey(record.threadId, record.namespace, channel, record.channelVersions[channel]));
      if (body === undefined) {
        throw new Error(`missing blob ${channel}@${record.channelVersions[channel]}`);
      }
      return body;
    };

    return {
      ...structuredClone(record),
      state: stateFromBlobs({
        messages: read("messages"),
        toolInvocations: read("toolInvocations"),
        turns: read("turns"),
      }),
    };
  }
}
