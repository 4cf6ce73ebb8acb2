/**
 * Full-fidelity JSON export. The only format that can be imported again.
 */

import { getModelDisplayName } from "../types/model.js";
import type { IExportContext } from "./types.js";

export const EXPORT_DOCUMENT_FORMAT = "chatdeck-conversation";
export const EXPORT_DOCUMENT_VERSION = 1;

export function renderJson(context: IExportContext): string {
  const { agent, stats } = context;

  const document = {
    format: EXPORT_DOCUMENT_FORMAT,
    version: EXPORT_DOCUMENT_VERSION,
    exportedAt: context.exportedAt.toISOString(),
    agent: {
      id: agent.id,
      model: agent.model,
      modelName: getModelDisplayName(agent.model),
      temperature: agent.temperature,
      maxTokens: agent.maxTokens,
      systemPrompt: agent.systemPrompt,
      stream: agent.stream,
      topP: agent.topP,
      frequencyPenalty: agent.frequencyPenalty,
      presencePenalty: agent.presencePenalty,
      maxHistorySize: agent.maxHistorySize,
      maxBackups: agent.maxBackups,
      createdAt: agent.createdAt,
      updatedAt: agent.updatedAt,
    },
    statistics: stats,
    messages: context.messages.map((message) => ({
      index: message.index,
      role: message.role,
      content: message.content,
      timestamp: message.timestamp,
      ...(message.tokenEstimate !== undefined ? { tokenEstimate: message.tokenEstimate } : {}),
      ...(message.model !== undefined ? { model: message.model } : {}),
    })),
  };

  return `${JSON.stringify(document, null, 2)}\n`;
}
