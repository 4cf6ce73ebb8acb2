/**
 * Terminal output helpers shared by subcommands and the interactive session.
 * Command output goes to stdout; errors go to stderr.
 */

import pc from "picocolors";
import type { IAgentProfile } from "../types/config.js";
import type { IConversationStats, IStoredMessage } from "../types/message.js";
import { getModelDisplayName } from "../types/model.js";
import {
  FileInclusionError,
  InvalidConfigError,
  NotFoundError,
  ValidationError,
  isChatdeckError,
} from "../types/errors.js";
import { buildPreview } from "../core/history-query.js";
import { formatClockTime, formatCount, formatDuration, formatTimestamp } from "../utils/format.js";
import { logger } from "../utils/logger.js";
import { formatTokenCount } from "../utils/tokenCounter.js";
import { redactSecrets } from "../utils/sanitizer.js";

export const EXIT_USAGE = 2;
export const EXIT_FAILURE = 3;

export function writeLine(text = ""): void {
  process.stdout.write(`${text}\n`);
}

export function writeLines(lines: readonly string[]): void {
  for (const line of lines) {
    writeLine(line);
  }
}

export function rule(width = 40): string {
  return "-".repeat(width);
}

// ── Errors ───────────────────────────────────────────────────────────────

export function exitCodeFor(error: unknown): number {
  if (
    error instanceof ValidationError ||
    error instanceof NotFoundError ||
    error instanceof FileInclusionError
  ) {
    return EXIT_USAGE;
  }
  if (error instanceof InvalidConfigError) {
    return EXIT_FAILURE;
  }
  return isChatdeckError(error) ? EXIT_FAILURE : 1;
}

/** User-facing text for an error, with any key-shaped strings scrubbed. */
export function describeError(error: unknown): { message: string; hint?: string | undefined } {
  if (isChatdeckError(error)) {
    return {
      message: redactSecrets(error.userMessage),
      hint: error.suggestedRecovery,
    };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { message: redactSecrets(message) };
}

/** Print an error without exiting; sets the process exit code. */
export function reportError(error: unknown, action: string): void {
  const { message, hint } = describeError(error);
  logger.error(
    { action, code: isChatdeckError(error) ? error.code : undefined, error: message },
    "Command failed",
  );
  process.stderr.write(pc.red(`Error: ${message}\n`));
  if (hint !== undefined) {
    process.stderr.write(pc.dim(`${hint}\n`));
  }
  process.exitCode = exitCodeFor(error);
}

// ── Formatting ───────────────────────────────────────────────────────────

export function formatRole(message: IStoredMessage): string {
  const label = message.role.charAt(0).toUpperCase() + message.role.slice(1);
  return message.role === "user" ? pc.cyan(label) : message.role === "assistant" ? pc.green(label) : pc.magenta(label);
}

export function formatMessageLine(message: IStoredMessage, width?: number): string {
  return `${pc.yellow(`[${formatClockTime(message.timestamp)}]`)} ${pc.dim(`#${message.index}`)} ${formatRole(message)}: ${buildPreview(message.content, width)}`;
}

export function statisticsLines(stats: IConversationStats, model: string): string[] {
  const lines = [
    `Model: ${pc.yellow(`${getModelDisplayName(model)} (${model})`)}`,
    `Total Messages: ${pc.cyan(formatCount(stats.totalMessages))}`,
    `User Messages: ${pc.cyan(formatCount(stats.messagesByRole.user))}`,
    `Assistant Messages: ${pc.cyan(formatCount(stats.messagesByRole.assistant))}`,
    `Estimated Tokens: ${pc.cyan(formatCount(stats.totalEstimatedTokens))}`,
    `Total Characters: ${pc.cyan(formatCount(stats.totalCharacters))}`,
    `Average Message Length: ${pc.cyan(formatCount(stats.averageMessageLength))}`,
  ];

  if (stats.firstTimestamp !== null && stats.lastTimestamp !== null) {
    lines.push(
      `First Message: ${pc.yellow(formatTimestamp(stats.firstTimestamp))}`,
      `Last Message: ${pc.yellow(formatTimestamp(stats.lastTimestamp))}`,
      `Duration: ${pc.cyan(formatDuration(stats.durationMs))}`,
    );
  }

  const models = Object.entries(stats.byModel);
  if (models.length > 0) {
    lines.push("By model:");
    for (const [model, usage] of models) {
      lines.push(`  ${model}: ${formatCount(usage.messages)} messages, ~${formatTokenCount(usage.estimatedTokens)} tokens`);
    }
  }
  return lines;
}

export function profileLines(profile: IAgentProfile): string[] {
  const systemPrompt = profile.systemPrompt === null ? pc.dim("none") : buildPreview(profile.systemPrompt, 47);
  return [
    `Model: ${pc.yellow(`${profile.model} (${getModelDisplayName(profile.model)})`)}`,
    `Temperature: ${pc.cyan(String(profile.temperature))}`,
    `Max Tokens: ${pc.cyan(profile.maxTokens === null ? "model default" : String(profile.maxTokens))}`,
    `System Prompt: ${systemPrompt}`,
    `Stream: ${pc.cyan(profile.stream ? "yes" : "no")}`,
    `Top P: ${pc.cyan(String(profile.topP))}`,
    `Frequency Penalty: ${pc.cyan(String(profile.frequencyPenalty))}`,
    `Presence Penalty: ${pc.cyan(String(profile.presencePenalty))}`,
    `Max History Size: ${pc.cyan(String(profile.maxHistorySize))}`,
    `Max Backups: ${pc.cyan(String(profile.maxBackups))}`,
    `Created: ${formatTimestamp(profile.createdAt)}`,
    `Updated: ${formatTimestamp(profile.updatedAt)}`,
  ];
}
