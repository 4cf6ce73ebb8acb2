/**
 * Rolling backup snapshots of an agent's history.
 * Stored at <agentDir>/backups/history_<stamp>_<counter>.json, where the
 * counter records creation order so snapshots taken within the same
 * millisecond still sort deterministically.
 */

import { readdirSync, unlinkSync, existsSync } from "node:fs";
import { join } from "node:path";
import type { BackupReason, IBackupSnapshot, IHistoryRecord } from "../types/index.js";
import { NotFoundError, InvalidConfigError } from "../types/errors.js";
import { logger, fileStamp, ensureDirectory } from "../utils/index.js";
import { writeJsonAtomic, readJsonFile } from "./atomic-file.js";
import { BackupSnapshotSchema, formatIssues } from "./schemas.js";

const BACKUP_FILE_PATTERN = /^history_(\d{8}T\d{9}Z)_(\d{6})\.json$/;
const COUNTER_WIDTH = 6;

export interface IBackupEntry {
  readonly id: string;
  readonly stamp: string;
  readonly counter: number;
  readonly filePath: string;
}

export class BackupStore {
  private readonly dir: string;
  private readonly maxBackups: number;

  constructor(dir: string, maxBackups: number) {
    this.dir = dir;
    this.maxBackups = maxBackups;
  }

  /**
   * Snapshot the given history, then prune the oldest snapshots beyond
   * maxBackups.
   */
  create(reason: BackupReason, record: IHistoryRecord, at: Date): IBackupSnapshot {
    ensureDirectory(this.dir);

    const entries = this.list();
    const lastCounter = entries.reduce((max, entry) => Math.max(max, entry.counter), 0);
    const counter = String(lastCounter + 1).padStart(COUNTER_WIDTH, "0");
    const id = `history_${fileStamp(at)}_${counter}`;

    const snapshot: IBackupSnapshot = Object.freeze({
      id,
      createdAt: at.toISOString(),
      reason,
      nextIndex: record.nextIndex,
      messages: Object.freeze([...record.messages]),
    });

    writeJsonAtomic(join(this.dir, `${id}.json`), snapshot);
    logger.info({ backupId: id, reason, messages: snapshot.messages.length }, "History snapshot created");

    this.prune();
    return snapshot;
  }

  /** Oldest first: by snapshot stamp, then creation counter. */
  list(): IBackupEntry[] {
    if (!existsSync(this.dir)) {
      return [];
    }

    const entries: IBackupEntry[] = [];
    for (const name of readdirSync(this.dir)) {
      const match = BACKUP_FILE_PATTERN.exec(name);
      if (!match?.[1] || !match[2]) {
        continue;
      }
      entries.push({
        id: name.slice(0, -".json".length),
        stamp: match[1],
        counter: parseInt(match[2], 10),
        filePath: join(this.dir, name),
      });
    }

    return entries.sort((a, b) => {
      if (a.stamp !== b.stamp) {
        return a.stamp < b.stamp ? -1 : 1;
      }
      return a.counter - b.counter;
    });
  }

  load(id: string): IBackupSnapshot {
    const entry = this.list().find((candidate) => candidate.id === id);
    if (!entry) {
      throw new NotFoundError("backup", id);
    }

    const parsed = BackupSnapshotSchema.safeParse(readJsonFile(entry.filePath));
    if (!parsed.success) {
      throw new InvalidConfigError(entry.filePath, formatIssues(parsed.error));
    }
    return parsed.data;
  }

  private prune(): void {
    const entries = this.list();
    let excess = entries.length - this.maxBackups;

    for (const entry of entries) {
      if (excess <= 0) {
        break;
      }
      unlinkSync(entry.filePath);
      logger.debug({ backupId: entry.id }, "Pruned old snapshot");
      excess--;
    }
  }
}
