/**
 * Plain-text export: header, configuration, statistics, then each message
 * as `[#NNN] [timestamp] ROLE:` followed by its body verbatim.
 */

import { getModelDisplayName } from "../types/model.js";
import { formatDuration, formatTimestamp } from "../utils/format.js";
import { configurationRows, padIndex, statisticsRows, type LabeledRow } from "./shared.js";
import type { IExportContext } from "./types.js";

const HEAVY_RULE = "=".repeat(50);
const SECTION_RULE = "-".repeat(20);
const MESSAGE_RULE = "-".repeat(40);

function rows(entries: readonly LabeledRow[]): string[] {
  return entries.map(([label, value]) => `${label}: ${value}`);
}

export function renderText(context: IExportContext): string {
  const { agent, stats } = context;

  const lines: string[] = [
    "chatdeck Conversation Export",
    HEAVY_RULE,
    "",
    `Agent ID: ${agent.id}`,
    `Model: ${agent.model} (${getModelDisplayName(agent.model)})`,
    `Export Date: ${formatTimestamp(context.exportedAt.toISOString())} UTC`,
    `Total Messages: ${stats.totalMessages}`,
    `Conversation Duration: ${formatDuration(stats.durationMs)}`,
    "",
    HEAVY_RULE,
    "",
    "CONFIGURATION:",
    SECTION_RULE,
    ...rows(configurationRows(agent)),
    "",
    "STATISTICS:",
    SECTION_RULE,
    ...rows(statisticsRows(stats)),
    "",
    HEAVY_RULE,
    "",
    "CONVERSATION:",
    SECTION_RULE,
    "",
  ];

  if (context.messages.length === 0) {
    lines.push("(no messages)", "");
  }

  for (const message of context.messages) {
    lines.push(
      `[#${padIndex(message.index)}] [${formatTimestamp(message.timestamp)}] ${message.role.toUpperCase()}:`,
      MESSAGE_RULE,
      message.content,
      "",
    );
  }

  return lines.join("\n");
}
