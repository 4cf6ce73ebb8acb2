/**
 * Atomic file persistence: write to a temp file beside the target, then
 * rename over it. A crash leaves either the old or the new file, never a
 * half-written one.
 */

import {
  readFileSync,
  writeFileSync,
  renameSync,
  unlinkSync,
  existsSync,
} from "node:fs";
import { dirname } from "node:path";
import { logger } from "../utils/logger.js";
import { ensureDirectory } from "../utils/pathResolver.js";

export interface IAtomicWriteOptions {
  readonly mode?: number;
}

export function writeFileAtomic(filePath: string, content: string, options?: IAtomicWriteOptions): void {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  ensureDirectory(dirname(filePath));

  try {
    writeFileSync(tmpPath, content, {
      encoding: "utf-8",
      mode: options?.mode ?? 0o644,
    });
    renameSync(tmpPath, filePath);
  } catch (error: unknown) {
    try {
      unlinkSync(tmpPath);
    } catch {
      /* temp file may not exist */
    }
    const reason = error instanceof Error ? error.message : String(error);
    logger.error({ filePath, error: reason }, "Atomic write failed");
    throw error;
  }
}

export function writeJsonAtomic(filePath: string, data: unknown, options?: IAtomicWriteOptions): void {
  writeFileAtomic(filePath, `${JSON.stringify(data, null, 2)}\n`, options);
}

/**
 * Read and parse a JSON file. Returns undefined when the file is absent;
 * parse errors propagate.
 */
export function readJsonFile(filePath: string): unknown {
  if (!existsSync(filePath)) {
    return undefined;
  }
  const raw = readFileSync(filePath, "utf-8");
  return JSON.parse(raw) as unknown;
}
