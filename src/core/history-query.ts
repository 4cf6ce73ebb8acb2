/**
 * Read-only queries over a message list: substring search and aggregate
 * statistics. Nothing here touches disk.
 */

import type { IConversationStats, IModelUsage, IStoredMessage, MessageRole } from "../types/index.js";
import { ValidationError } from "../types/errors.js";
import { estimateTokenCount } from "../utils/tokenCounter.js";

const DEFAULT_PREVIEW_WIDTH = 100;
const UNKNOWN_MODEL = "unknown";

export interface ISearchOptions {
  /** Stop after this many matches. */
  readonly limit?: number | undefined;
}

/**
 * Case-insensitive substring match over message bodies, in store order.
 */
export function searchMessages(
  messages: readonly IStoredMessage[],
  term: string,
  options?: ISearchOptions,
): IStoredMessage[] {
  if (term.trim().length === 0) {
    throw new ValidationError("search term", "must not be empty");
  }

  const needle = term.toLowerCase();
  const limit = options?.limit;
  const results: IStoredMessage[] = [];

  for (const message of messages) {
    if (limit !== undefined && results.length >= limit) {
      break;
    }
    if (message.content.toLowerCase().includes(needle)) {
      results.push(message);
    }
  }

  return results;
}

/**
 * Single-line preview of a message body.
 */
export function buildPreview(content: string, width: number = DEFAULT_PREVIEW_WIDTH): string {
  const flattened = content.replace(/\s+/g, " ").trim();
  return flattened.length > width ? `${flattened.slice(0, width)}...` : flattened;
}

export function computeStats(messages: readonly IStoredMessage[]): IConversationStats {
  const messagesByRole: Record<MessageRole, number> = { system: 0, user: 0, assistant: 0 };
  const byModel = new Map<string, IModelUsage>();
  let totalEstimatedTokens = 0;
  let totalCharacters = 0;

  for (const message of messages) {
    const tokens = message.tokenEstimate ?? estimateTokenCount(message.content);
    messagesByRole[message.role] += 1;
    totalEstimatedTokens += tokens;
    totalCharacters += message.content.length;

    const model = message.model ?? UNKNOWN_MODEL;
    const usage = byModel.get(model);
    byModel.set(model, {
      messages: (usage?.messages ?? 0) + 1,
      estimatedTokens: (usage?.estimatedTokens ?? 0) + tokens,
    });
  }

  const first = messages[0];
  const last = messages[messages.length - 1];
  const durationMs =
    first && last ? Math.max(0, Date.parse(last.timestamp) - Date.parse(first.timestamp)) : null;

  return {
    totalMessages: messages.length,
    messagesByRole,
    totalEstimatedTokens,
    totalCharacters,
    averageMessageLength: messages.length > 0 ? Math.floor(totalCharacters / messages.length) : 0,
    firstTimestamp: first?.timestamp ?? null,
    lastTimestamp: last?.timestamp ?? null,
    durationMs,
    byModel: Object.fromEntries(byModel),
  };
}
