/**
 * Re-import of JSON exports. The imported conversation always becomes a new
 * agent; existing histories are never merged into.
 */

import { z } from "zod";
import type { AgentProfilePatch, IAgentProfile } from "../types/config.js";
import type { IStoredMessage } from "../types/message.js";
import { ValidationError } from "../types/errors.js";
import { AgentSettingsSchema, StoredMessageSchema, formatIssues } from "../storage/schemas.js";
import type { IAgentRepository } from "../storage/agent-repository.js";
import { logger } from "../utils/logger.js";
import { EXPORT_DOCUMENT_FORMAT, EXPORT_DOCUMENT_VERSION } from "./json.js";

const ExportDocumentSchema = z.object({
  format: z.literal(EXPORT_DOCUMENT_FORMAT),
  version: z.literal(EXPORT_DOCUMENT_VERSION),
  exportedAt: z.string(),
  agent: AgentSettingsSchema.extend({ id: z.string() }),
  messages: z.array(StoredMessageSchema),
});

export interface IParsedExport {
  readonly sourceAgentId: string;
  readonly exportedAt: string;
  readonly settings: AgentProfilePatch & { readonly model: string };
  readonly messages: readonly IStoredMessage[];
}

export function parseConversationExport(text: string): IParsedExport {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError("export file", `not valid JSON (${reason})`);
  }

  const parsed = ExportDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("export file", formatIssues(parsed.error));
  }

  const { agent, messages } = parsed.data;
  return {
    sourceAgentId: agent.id,
    exportedAt: parsed.data.exportedAt,
    settings: {
      model: agent.model,
      temperature: agent.temperature,
      maxTokens: agent.maxTokens,
      systemPrompt: agent.systemPrompt,
      stream: agent.stream,
      topP: agent.topP,
      frequencyPenalty: agent.frequencyPenalty,
      presencePenalty: agent.presencePenalty,
      maxHistorySize: Math.max(agent.maxHistorySize, messages.length),
      maxBackups: agent.maxBackups,
    },
    messages,
  };
}

export interface IImportOptions {
  readonly agentId: string;
  /** Bind the new agent to a different model than the exported one. */
  readonly model?: string | undefined;
}

export interface IImportResult {
  readonly profile: IAgentProfile;
  readonly messageCount: number;
}

/**
 * Create a new agent whose history is the exported messages, with their
 * original indices and timestamps.
 */
export function importConversation(
  repository: IAgentRepository,
  text: string,
  options: IImportOptions,
): IImportResult {
  const parsed = parseConversationExport(text);
  const { model, ...settings } = parsed.settings;
  const profile = repository.create(options.agentId, options.model ?? model, settings, parsed.messages);

  logger.info(
    { agent: profile.id, source: parsed.sourceAgentId, messages: parsed.messages.length },
    "Conversation imported",
  );
  return { profile, messageCount: parsed.messages.length };
}
