/**
 * Message store: the ordered, append-only conversation log of one agent.
 *
 * Every mutation is persisted synchronously with an atomic replace before
 * the call returns. Messages that would be dropped (retention overflow,
 * truncate, clear) are captured in a backup snapshot first.
 */

import { basename } from "node:path";
import { existsSync } from "node:fs";
import type {
  BackupReason,
  IBackupSnapshot,
  IHistoryRecord,
  IMessageMetadata,
  IStoredMessage,
  MessageRole,
} from "../types/index.js";
import { isMessageRole, MESSAGE_ROLES } from "../types/message.js";
import { InvalidConfigError, NotFoundError, ValidationError } from "../types/errors.js";
import { estimateTokenCount, getBackupsDir, getHistoryPath, logger } from "../utils/index.js";
import { BackupStore, type IBackupEntry } from "../storage/backup-store.js";
import { readJsonFile, writeJsonAtomic } from "../storage/atomic-file.js";
import { HistoryRecordSchema, formatIssues } from "../storage/schemas.js";

export interface IMessageStoreOptions {
  readonly maxHistorySize: number;
  readonly maxBackups: number;
  /** Clock override, used by tests. */
  readonly now?: () => Date;
}

export class MessageStore {
  readonly agentDir: string;
  private records: IStoredMessage[];
  private nextIndex: number;
  private readonly historyPath: string;
  private readonly backups: BackupStore;
  private readonly maxHistorySize: number;
  private readonly now: () => Date;

  private constructor(agentDir: string, record: IHistoryRecord, options: IMessageStoreOptions) {
    this.agentDir = agentDir;
    this.records = record.messages.map((message) => Object.freeze({ ...message }));
    this.nextIndex = record.nextIndex;
    this.historyPath = getHistoryPath(agentDir);
    this.backups = new BackupStore(getBackupsDir(agentDir), options.maxBackups);
    this.maxHistorySize = options.maxHistorySize;
    this.now = options.now ?? (() => new Date());
  }

  // ── Construction ───────────────────────────────────────────────────────

  /**
   * Open an existing store. Never creates one: a missing history record is
   * a NotFoundError.
   */
  static load(agentDir: string, options: IMessageStoreOptions): MessageStore {
    const historyPath = getHistoryPath(agentDir);
    if (!existsSync(historyPath)) {
      throw new NotFoundError("history", basename(agentDir));
    }

    let raw: unknown;
    try {
      raw = readJsonFile(historyPath);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigError(historyPath, reason);
    }

    const parsed = HistoryRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidConfigError(historyPath, formatIssues(parsed.error));
    }

    return new MessageStore(agentDir, parsed.data, options);
  }

  /**
   * Explicitly create a store, empty or seeded with previously exported
   * messages. Seed messages keep their indices and timestamps.
   */
  static initialize(
    agentDir: string,
    options: IMessageStoreOptions,
    seed: readonly IStoredMessage[] = [],
  ): MessageStore {
    validateSeed(seed);
    const last = seed[seed.length - 1];
    const record: IHistoryRecord = {
      version: 1,
      nextIndex: last ? last.index + 1 : 1,
      messages: seed,
    };

    const store = new MessageStore(agentDir, record, options);
    store.persist();
    logger.info({ agentDir, seeded: seed.length }, "Message store initialized");
    return store;
  }

  static exists(agentDir: string): boolean {
    return existsSync(getHistoryPath(agentDir));
  }

  // ── Reads ──────────────────────────────────────────────────────────────

  get size(): number {
    return this.records.length;
  }

  get nextSequenceIndex(): number {
    return this.nextIndex;
  }

  messages(): readonly IStoredMessage[] {
    return [...this.records];
  }

  recent(count: number): readonly IStoredMessage[] {
    if (count <= 0) {
      return [];
    }
    return this.records.slice(-count);
  }

  get(index: number): IStoredMessage | undefined {
    return this.records.find((message) => message.index === index);
  }

  listBackups(): IBackupEntry[] {
    return this.backups.list();
  }

  loadBackup(id: string): IBackupSnapshot {
    return this.backups.load(id);
  }

  // ── Mutations ──────────────────────────────────────────────────────────

  append(role: string, body: string, metadata?: IMessageMetadata): IStoredMessage {
    const message = this.createMessage(role, body, this.nextIndex, this.lastMessage(), metadata);

    const retained = this.applyRetentionLimit([...this.records, message], message.index + 1);
    this.commit(retained, message.index + 1);

    logger.debug({ index: message.index, role: message.role }, "Message appended");
    return message;
  }

  /**
   * Commit a completed exchange with a single write, so a turn is never
   * half-stored.
   */
  appendTurn(
    userBody: string,
    assistantBody: string,
    metadata?: IMessageMetadata,
  ): [IStoredMessage, IStoredMessage] {
    validateBody(userBody);
    validateBody(assistantBody);

    const user = this.createMessage("user", userBody, this.nextIndex, this.lastMessage(), metadata);
    const assistant = this.createMessage("assistant", assistantBody, user.index + 1, user, metadata);

    const nextIndex = assistant.index + 1;
    const retained = this.applyRetentionLimit([...this.records, user, assistant], nextIndex);
    this.commit(retained, nextIndex);

    logger.debug({ user: user.index, assistant: assistant.index }, "Turn committed");
    return [user, assistant];
  }

  /**
   * Snapshot the full contents, then keep only the newest `keepLastN`
   * messages. The snapshot is taken even when nothing is dropped.
   */
  truncate(keepLastN: number): IBackupSnapshot {
    return this.trimTo(keepLastN, "truncate");
  }

  clear(): IBackupSnapshot {
    return this.trimTo(0, "clear");
  }

  /**
   * Snapshot-then-trim when the store holds more than maxHistorySize
   * messages. Returns the snapshot, or null when within the limit.
   */
  enforceRetentionLimit(): IBackupSnapshot | null {
    if (this.records.length <= this.maxHistorySize) {
      return null;
    }

    const snapshot = this.backups.create("retention", this.toRecord(), this.now());
    this.commit(this.records.slice(-this.maxHistorySize), this.nextIndex);
    return snapshot;
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private createMessage(
    role: string,
    body: string,
    index: number,
    previous: IStoredMessage | undefined,
    metadata?: IMessageMetadata,
  ): IStoredMessage {
    validateRole(role);
    validateBody(body);

    return Object.freeze({
      index,
      role,
      content: body,
      timestamp: this.nextTimestamp(previous),
      tokenEstimate: metadata?.tokenEstimate ?? estimateTokenCount(body),
      ...(metadata?.model !== undefined ? { model: metadata.model } : {}),
    });
  }

  private lastMessage(): IStoredMessage | undefined {
    return this.records[this.records.length - 1];
  }

  /** Current time, clamped so timestamps never go backwards. */
  private nextTimestamp(previous: IStoredMessage | undefined): string {
    const now = this.now();
    if (previous && Date.parse(previous.timestamp) > now.getTime()) {
      return previous.timestamp;
    }
    return now.toISOString();
  }

  private trimTo(keepLastN: number, reason: BackupReason): IBackupSnapshot {
    if (!Number.isInteger(keepLastN) || keepLastN < 0) {
      throw new ValidationError("keep count", `expected a non-negative integer, got ${keepLastN}`);
    }

    const snapshot = this.backups.create(reason, this.toRecord(), this.now());
    const before = this.records.length;
    const kept =
      before <= keepLastN ? [...this.records] : keepLastN === 0 ? [] : this.records.slice(-keepLastN);
    this.commit(kept, this.nextIndex);

    logger.info({ reason, removed: before - kept.length, kept: kept.length }, "History truncated");
    return snapshot;
  }

  /**
   * Trim a candidate message list to maxHistorySize, snapshotting the
   * untrimmed list first.
   */
  private applyRetentionLimit(candidate: IStoredMessage[], nextIndex: number): IStoredMessage[] {
    if (candidate.length <= this.maxHistorySize) {
      return candidate;
    }

    this.backups.create("retention", { version: 1, nextIndex, messages: candidate }, this.now());
    const removed = candidate.length - this.maxHistorySize;
    logger.info({ removed, limit: this.maxHistorySize }, "Retention limit enforced");
    return candidate.slice(-this.maxHistorySize);
  }

  private toRecord(): IHistoryRecord {
    return {
      version: 1,
      nextIndex: this.nextIndex,
      messages: [...this.records],
    };
  }

  /** Write first; in-memory state only changes once the write succeeded. */
  private commit(records: IStoredMessage[], nextIndex: number): void {
    writeJsonAtomic(this.historyPath, { version: 1, nextIndex, messages: records });
    this.records = records;
    this.nextIndex = nextIndex;
  }

  private persist(): void {
    writeJsonAtomic(this.historyPath, this.toRecord());
  }
}

// ── Validation ───────────────────────────────────────────────────────────

function validateRole(role: string): asserts role is MessageRole {
  if (!isMessageRole(role)) {
    throw new ValidationError("role", `"${role}" is not one of ${MESSAGE_ROLES.join(", ")}`);
  }
}

function validateBody(body: string): void {
  if (body.trim().length === 0) {
    throw new ValidationError("message body", "must not be empty");
  }
}

function validateSeed(seed: readonly IStoredMessage[]): void {
  let previous: IStoredMessage | undefined;

  for (const message of seed) {
    validateRole(message.role);
    validateBody(message.content);

    if (previous) {
      if (message.index !== previous.index + 1) {
        throw new ValidationError(
          "message sequence",
          `index ${message.index} does not follow ${previous.index}`,
        );
      }
      if (Date.parse(message.timestamp) < Date.parse(previous.timestamp)) {
        throw new ValidationError("message sequence", `timestamp of #${message.index} goes backwards`);
      }
    }
    previous = message;
  }
}
