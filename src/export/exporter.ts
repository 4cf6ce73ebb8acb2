/**
 * Writes rendered exports to <agentDir>/exports/conversation_<stamp>.<ext>.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import type { IAgentProfile } from "../types/config.js";
import type { IStoredMessage } from "../types/message.js";
import { fileStamp, getExportsDir, logger } from "../utils/index.js";
import { writeFileAtomic } from "../storage/atomic-file.js";
import { renderConversation } from "./renderer.js";
import { EXPORT_FORMATS, type ExportFormat } from "./types.js";

export interface IExportResult {
  readonly filePath: string;
  readonly format: ExportFormat;
  readonly bytes: number;
  readonly messageCount: number;
}

export function exportConversation(
  agentDir: string,
  agent: IAgentProfile,
  messages: readonly IStoredMessage[],
  format: ExportFormat,
  options?: { readonly now?: Date | undefined },
): IExportResult {
  const exportedAt = options?.now ?? new Date();
  const content = renderConversation(agent, messages, format, { exportedAt });
  const filePath = nextExportPath(getExportsDir(agentDir), fileStamp(exportedAt), EXPORT_FORMATS[format].extension);

  writeFileAtomic(filePath, content);
  const bytes = Buffer.byteLength(content, "utf-8");
  logger.info({ agent: agent.id, format, filePath, bytes }, "Conversation exported");

  return { filePath, format, bytes, messageCount: messages.length };
}

/** Never overwrite an earlier export taken in the same millisecond. */
function nextExportPath(dir: string, stamp: string, extension: string): string {
  let candidate = join(dir, `conversation_${stamp}${extension}`);
  for (let n = 2; existsSync(candidate); n++) {
    candidate = join(dir, `conversation_${stamp}_${n}${extension}`);
  }
  return candidate;
}
