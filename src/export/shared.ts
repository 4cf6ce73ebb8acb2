/**
 * Label/value rows shared by the human-readable renderers, so txt, md and
 * html report the same configuration and statistics.
 */

import type { IAgentProfile } from "../types/config.js";
import type { IConversationStats, MessageRole } from "../types/message.js";
import { formatCount, formatDuration, formatTimestamp } from "../utils/format.js";

export type LabeledRow = readonly [label: string, value: string];

export const ROLE_LABELS: Readonly<Record<MessageRole, string>> = {
  system: "System",
  user: "User",
  assistant: "Assistant",
};

export function configurationRows(agent: IAgentProfile): LabeledRow[] {
  return [
    ["Model", agent.model],
    ["Temperature", String(agent.temperature)],
    ["Max Tokens", agent.maxTokens === null ? "model default" : String(agent.maxTokens)],
    ["System Prompt", agent.systemPrompt ?? "none"],
    ["Stream", agent.stream ? "yes" : "no"],
    ["Top P", String(agent.topP)],
    ["Frequency Penalty", String(agent.frequencyPenalty)],
    ["Presence Penalty", String(agent.presencePenalty)],
    ["Max History Size", String(agent.maxHistorySize)],
    ["Max Backups", String(agent.maxBackups)],
  ];
}

export function statisticsRows(stats: IConversationStats): LabeledRow[] {
  return [
    ["Total Messages", formatCount(stats.totalMessages)],
    ["User Messages", formatCount(stats.messagesByRole.user)],
    ["Assistant Messages", formatCount(stats.messagesByRole.assistant)],
    ["System Messages", formatCount(stats.messagesByRole.system)],
    ["Estimated Tokens", formatCount(stats.totalEstimatedTokens)],
    ["Total Characters", formatCount(stats.totalCharacters)],
    ["Average Message Length", formatCount(stats.averageMessageLength)],
    ["First Message", stats.firstTimestamp !== null ? formatTimestamp(stats.firstTimestamp) : "N/A"],
    ["Last Message", stats.lastTimestamp !== null ? formatTimestamp(stats.lastTimestamp) : "N/A"],
    ["Duration", formatDuration(stats.durationMs)],
  ];
}

export function padIndex(index: number): string {
  return String(index).padStart(3, "0");
}
