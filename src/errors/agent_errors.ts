export type AgentErrorCode =
  | "configuration_error"
  | "authorization_error"
  | "invalid_thread_id"
  | "tool_execution_error"
  | "tool_loop_exceeded"
  | "checkpoint_conflict"
  | "model_unavailable"
  | "model_timeout"
  | "turn_timeout"
  | "turn_cancelled"
  | "storage_error"
  | "internal_error";

export abstract class AgentError extends Error {
  public abstract readonly code: AgentErrorCode;
  public readonly statusCode: number;
  public readonly retryable: boolean;

  protected constructor(message: string, args: { statusCode: number; retryable: boolean; cause?: unknown }) {
    super(message, args.cause === undefined ? undefined : { cause: args.cause });
    this.statusCode = args.statusCode;
    this.retryable = args.retryable;
  }

  toJSON() {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
    };
  }
}

/** Model backend (or another required collaborator) is not configured. */
export class ConfigurationError extends AgentError {
  public readonly code = "configuration_error" as const;

  constructor(message: string) {
    super(message, { statusCode: 503, retryable: false });
    this.name = "ConfigurationError";
  }
}

export class AuthorizationError extends AgentError {
  public readonly code = "authorization_error" as const;

  constructor(message = "thread does not belong to the authenticated account") {
    super(message, { statusCode: 403, retryable: false });
    this.name = "AuthorizationError";
  }
}

export class InvalidThreadIdError extends AgentError {
  public readonly code = "invalid_thread_id" as const;

  constructor(rawThreadId: string) {
    // Bounded: never echo an arbitrarily long id back.
    super(`invalid thread id: ${rawThreadId.slice(0, 100)}`, { statusCode: 400, retryable: false });
    this.name = "InvalidThreadIdError";
  }
}

export type ToolFailureReason = "validation" | "execution" | "timeout" | "unknown_tool";

export class ToolExecutionError extends AgentError {
  public readonly code = "tool_execution_error" as const;
  public readonly toolName: string;
  public readonly reason: ToolFailureReason;

  constructor(args: { toolName: string; reason: ToolFailureReason; message: string; cause?: unknown }) {
    super(args.message, { statusCode: 422, retryable: args.reason === "timeout", cause: args.cause });
    this.name = "ToolExecutionError";
    this.toolName = args.toolName;
    this.reason = args.reason;
  }
}

export class ToolLoopExceeded extends AgentError {
  public readonly code = "tool_loop_exceeded" as const;
  public readonly maxIterations: number;

  constructor(maxIterations: number) {
    super(`model requested more than ${maxIterations} tool rounds in one turn`, {
      statusCode: 500,
      retryable: false,
    });
    this.name = "ToolLoopExceeded";
    this.maxIterations = maxIterations;
  }
}

export class CheckpointConflict extends AgentError {
  public readonly code = "checkpoint_conflict" as const;
  public readonly threadId: string;
  public readonly namespace: string;
  public readonly expectedParentId: string | null;
  public readonly actualLatestId: string | null;

  constructor(args: {
    threadId: string;
    namespace: string;
    expectedParentId: string | null;
    actualLatestId: string | null;
  }) {
    super(
      `checkpoint conflict on ${args.threadId}: expected parent ${args.expectedParentId ?? "<root>"}, latest is ${args.actualLatestId ?? "<root>"}`,
      { statusCode: 409, retryable: true }
    );
    this.name = "CheckpointConflict";
    this.threadId = args.threadId;
    this.namespace = args.namespace;
    this.expectedParentId = args.expectedParentId;
    this.actualLatestId = args.actualLatestId;
  }
}

export class ModelUnavailableError extends AgentError {
  public readonly code: "model_unavailable" | "model_timeout" = "model_unavailable";
  public readonly providerStatus?: number;
  public readonly retryAfterMs?: number;
  public readonly errorType?: string;

  constructor(
    message: string,
    args: { retryable?: boolean; providerStatus?: number; retryAfterMs?: number; errorType?: string; cause?: unknown } = {}
  ) {
    super(message, { statusCode: 502, retryable: args.retryable ?? true, cause: args.cause });
    this.name = "ModelUnavailableError";
    this.providerStatus = args.providerStatus;
    this.retryAfterMs = args.retryAfterMs;
    this.errorType = args.errorType;
  }
}

export class ModelTimeoutError extends ModelUnavailableError {
  public readonly code = "model_timeout" as const;

  constructor(timeoutMs: number) {
    super(`model call exceeded ${timeoutMs}ms`, { retryable: true });
    this.name = "ModelTimeoutError";
  }
}

export class TurnTimeoutError extends AgentError {
  public readonly code = "turn_timeout" as const;

  constructor(timeoutMs: number) {
    super(`turn exceeded ${timeoutMs}ms`, { statusCode: 504, retryable: true });
    this.name = "TurnTimeoutError";
  }
}

export class TurnCancelledError extends AgentError {
  public readonly code = "turn_cancelled" as const;

  constructor(reason = "cancelled") {
    super(`turn cancelled: ${reason}`, { statusCode: 499, retryable: true });
    this.name = "TurnCancelledError";
  }
}

export class StorageError extends AgentError {
  public readonly code = "storage_error" as const;

  constructor(message: string, cause?: unknown) {
    super(message, { statusCode: 503, retryable: false, cause });
    this.name = "StorageError";
  }
}

/** Anything unexpected inside a turn; the turn fails and is still committed. */
export class InternalAgentError extends AgentError {
  public readonly code = "internal_error" as const;

  constructor(message: string, cause?: unknown) {
    super(message, { statusCode: 500, retryable: false, cause });
    this.name = "InternalAgentError";
  }
}

export function isAgentError(value: unknown): value is AgentError {
  return value instanceof AgentError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
