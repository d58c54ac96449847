import { randomUUID } from "node:crypto";

import { InvalidThreadIdError } from "../errors/agent_errors";

const MAX_THREAD_ID_LENGTH = 200;
const ACCOUNT_SEGMENT = /^[A-Za-z0-9-]+$/;
const THREAD_SEGMENT = /^[A-Za-z0-9_-]+$/;
const QUALIFIED = /^account_([A-Za-z0-9-]+)_thread_([A-Za-z0-9_-]+)$/;

export type ParsedThreadId = {
  accountId: string;
  threadKey: string;
};

export function isValidAccountId(accountId: string): boolean {
  return ACCOUNT_SEGMENT.test(accountId);
}

export function formatThreadId(accountId: string, threadKey: string): string {
  if (!isValidAccountId(accountId) || !THREAD_SEGMENT.test(threadKey)) {
    throw new InvalidThreadIdError(`account_${accountId}_thread_${threadKey}`);
  }
  return `account_${accountId}_thread_${threadKey}`;
}

/**
 * Parses `account_<accountId>_thread_<threadKey>`. The account segment cannot
 * contain underscores, so the first `_thread_` always separates the two.
 */
export function parseThreadId(raw: string): ParsedThreadId {
  if (raw.length === 0 || raw.length > MAX_THREAD_ID_LENGTH) {
    throw new InvalidThreadIdError(raw);
  }
  const match = QUALIFIED.exec(raw);
  if (!match) {
    throw new InvalidThreadIdError(raw);
  }
  return { accountId: match[1], threadKey: match[2] };
}

/** A bare key (no `account_` prefix) is scoped to whichever account presents it. */
export function isBareThreadKey(raw: string): boolean {
  return !raw.startsWith("account_") && raw.length <= 64 && THREAD_SEGMENT.test(raw);
}

export function newThreadId(accountId: string): string {
  return formatThreadId(accountId, randomUUID().replace(/-/g, "").slice(0, 16));
}
