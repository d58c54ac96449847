import { randomUUID } from "node:crypto";

import type { TranscriptMessage } from "../contracts/conversation";
import { silentLogger, type AgentLogger } from "../logger";
import type { Checkpoint } from "../store/checkpoint_store";
import type { ThreadHandle } from "../threads/thread_manager";

export const SUMMARY_PREFIX = "Summary of earlier conversation:";

export type CompactionOptions = {
  /** Most recent user turns kept verbatim. */
  keepRecentTurns?: number;
  previewChars?: number;
  log?: AgentLogger;
};

export type CompactionResult =
  | { compacted: false; reason: "empty" | "too_short" }
  | { compacted: true; checkpoint: Checkpoint; removedMessages: number; keptMessages: number };

function clip(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}

function summaryLines(messages: TranscriptMessage[], previewChars: number): string[] {
  const lines: string[] = [];
  for (const message of messages) {
    switch (message.role) {
      case "system":
        // Earlier summaries are folded in line by line.
        if (message.content.startsWith(SUMMARY_PREFIX)) {
          lines.push(...message.content.slice(SUMMARY_PREFIX.length).split("\n").filter((line) => line.trim()));
        }
        break;
      case "user":
        lines.push(`- user: ${clip(message.content, previewChars)}`);
        break;
      case "assistant":
        if (message.content.trim()) lines.push(`- assistant: ${clip(message.content, previewChars)}`);
        break;
      case "tool":
        break;
    }
  }
  return lines;
}

/**
 * Replaces the transcript before the last `keepRecentTurns` user messages with
 * one system summary message. The cut always falls on a user message, so tool
 * calls and their results are never separated. Writes a new checkpoint with a
 * `replace` write; earlier checkpoints keep the full transcript.
 */
export async function compactThread(thread: ThreadHandle, opts: CompactionOptions = {}): Promise<CompactionResult> {
  const keepRecentTurns = Math.max(1, opts.keepRecentTurns ?? 2);
  const previewChars = opts.previewChars ?? 160;
  const log = opts.log ?? silentLogger;

  const { checkpoint, state } = await thread.loadState();
  if (!checkpoint) return { compacted: false, reason: "empty" };

  const userIndexes = state.messages.flatMap((message, index) => (message.role === "user" ? [index] : []));
  if (userIndexes.length <= keepRecentTurns) return { compacted: false, reason: "too_short" };

  const cut = userIndexes[userIndexes.length - keepRecentTurns];
  const older = state.messages.slice(0, cut);
  const recent = state.messages.slice(cut);
  const summary: TranscriptMessage = {
    role: "system",
    content: [SUMMARY_PREFIX, ...summaryLines(older, previewChars)].join("\n"),
  };

  const next = await thread.commit({
    parentCheckpointId: checkpoint.checkpointId,
    state,
    writes: [
      {
        taskId: `compaction-${randomUUID()}:messages`,
        idx: 0,
        channel: "messages",
        op: "replace",
        value: [summary, ...recent],
      },
    ],
    metadata: { source: "compaction", status: "completed" },
  });

  log.info(
    {
      evt: "thread.compacted",
      threadId: thread.threadId,
      checkpointId: next.checkpointId,
      removedMessages: older.length,
      keptMessages: recent.length,
    },
    "thread.compacted"
  );
  return { compacted: true, checkpoint: next, removedMessages: older.length, keptMessages: recent.length };
}
