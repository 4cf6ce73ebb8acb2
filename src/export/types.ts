/**
 * Export formats and the context every renderer receives.
 */

import type { IAgentProfile } from "../types/config.js";
import type { IConversationStats, IStoredMessage } from "../types/message.js";

export interface IExportFormatInfo {
  readonly extension: string;
  readonly description: string;
}

export const EXPORT_FORMATS = {
  json: { extension: ".json", description: "Structured JSON with full metadata (re-importable)" },
  txt: { extension: ".txt", description: "Plain text" },
  md: { extension: ".md", description: "Markdown" },
  html: { extension: ".html", description: "Self-contained HTML page" },
} as const satisfies Record<string, IExportFormatInfo>;

export type ExportFormat = keyof typeof EXPORT_FORMATS;

export function isExportFormat(value: string): value is ExportFormat {
  return Object.prototype.hasOwnProperty.call(EXPORT_FORMATS, value);
}

export function listExportFormats(): ExportFormat[] {
  return Object.keys(EXPORT_FORMATS).filter(isExportFormat);
}

export interface IExportContext {
  readonly agent: IAgentProfile;
  readonly messages: readonly IStoredMessage[];
  readonly stats: IConversationStats;
  readonly exportedAt: Date;
}
