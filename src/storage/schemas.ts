/**
 * Zod schemas for everything chatdeck reads back from disk.
 */

import { z } from "zod";
import { MESSAGE_ROLES } from "../types/message.js";

export const StoredMessageSchema = z.object({
  index: z.number().int().positive(),
  role: z.enum(MESSAGE_ROLES),
  content: z.string(),
  timestamp: z.string().datetime({ offset: true }),
  tokenEstimate: z.number().int().nonnegative().optional(),
  model: z.string().optional(),
});

export const HistoryRecordSchema = z.object({
  version: z.literal(1),
  nextIndex: z.number().int().positive(),
  messages: z.array(StoredMessageSchema),
});

export const BackupSnapshotSchema = z.object({
  id: z.string(),
  createdAt: z.string(),
  reason: z.enum(["truncate", "retention", "clear"]),
  nextIndex: z.number().int().positive(),
  messages: z.array(StoredMessageSchema),
});

/** Generation parameters; ranges shared by profile files and `config set`. */
export const AgentSettingsSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().positive().nullable(),
  systemPrompt: z.string().nullable(),
  stream: z.boolean(),
  topP: z.number().min(0).max(1),
  frequencyPenalty: z.number().min(-2).max(2),
  presencePenalty: z.number().min(-2).max(2),
  maxHistorySize: z.number().int().min(1),
  maxBackups: z.number().int().min(1),
});

export const AgentProfileSchema = AgentSettingsSchema.extend({
  id: z.string().regex(/^[a-zA-Z0-9_-]+$/).max(64),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const RuntimeConfigFileSchema = z
  .object({
    defaultModel: z.string().min(1),
    maxInclusionBytes: z.number().int().positive(),
    includeFileHeaders: z.boolean(),
    searchPaths: z.array(z.string()),
    retry: z.object({
      maxRetries: z.number().int().nonnegative(),
      baseDelayMs: z.number().int().nonnegative(),
      maxDelayMs: z.number().int().nonnegative(),
    }),
  })
  .partial();

export const SecretsFileSchema = z.object({
  provider: z.string().optional(),
  keys: z.record(z.string(), z.string()),
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
