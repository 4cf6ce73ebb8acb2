/**
 * Conversation record types.
 */

// ── Stored Messages ──────────────────────────────────────────────────────

export const MESSAGE_ROLES = ["system", "user", "assistant"] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export interface IStoredMessage {
  /** Sequence index: assigned at append time, starts at 1, never reused. */
  readonly index: number;
  readonly role: MessageRole;
  readonly content: string;
  /** ISO-8601, non-decreasing within a store. */
  readonly timestamp: string;
  readonly tokenEstimate?: number | undefined;
  readonly model?: string | undefined;
}

export interface IMessageMetadata {
  readonly model?: string | undefined;
  readonly tokenEstimate?: number | undefined;
}

/** On-disk shape of history.json. */
export interface IHistoryRecord {
  readonly version: 1;
  readonly nextIndex: number;
  readonly messages: readonly IStoredMessage[];
}

// ── Backups ──────────────────────────────────────────────────────────────

export type BackupReason = "truncate" | "retention" | "clear";

export interface IBackupSnapshot {
  readonly id: string;
  readonly createdAt: string;
  readonly reason: BackupReason;
  readonly nextIndex: number;
  readonly messages: readonly IStoredMessage[];
}

// ── Completion Requests ──────────────────────────────────────────────────

export type CompletionRole = "user" | "assistant";

export interface ICompletionMessage {
  readonly role: CompletionRole;
  readonly content: string;
}

export interface ICompletionRequest {
  readonly model: string;
  readonly system?: string | undefined;
  readonly messages: readonly ICompletionMessage[];
  readonly temperature?: number | undefined;
  readonly maxTokens?: number | undefined;
  readonly topP?: number | undefined;
  readonly frequencyPenalty?: number | undefined;
  readonly presencePenalty?: number | undefined;
  readonly timeoutMs?: number | undefined;
}

// ── Statistics ───────────────────────────────────────────────────────────

export interface IModelUsage {
  readonly messages: number;
  readonly estimatedTokens: number;
}

export interface IConversationStats {
  readonly totalMessages: number;
  readonly messagesByRole: Readonly<Record<MessageRole, number>>;
  readonly totalEstimatedTokens: number;
  readonly totalCharacters: number;
  readonly averageMessageLength: number;
  readonly firstTimestamp: string | null;
  readonly lastTimestamp: string | null;
  readonly durationMs: number | null;
  readonly byModel: Readonly<Record<string, IModelUsage>>;
}

export function isMessageRole(value: unknown): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}
