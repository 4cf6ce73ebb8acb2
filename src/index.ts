/**
 * chatdeck: main barrel export
 * Public API surface for programmatic usage.
 */

// ── Types ───────────────────────────────────────────────────────────────

export type {
  MessageRole,
  IStoredMessage,
  IMessageMetadata,
  IHistoryRecord,
  BackupReason,
  IBackupSnapshot,
  ICompletionMessage,
  ICompletionRequest,
  IConversationStats,
  IModelInfo,
  IAgentProfile,
  AgentProfilePatch,
  IRuntimeConfig,
  ServiceError,
} from "./types/index.js";

export {
  SUPPORTED_MODELS,
  DEFAULT_MODEL_ID,
  DEFAULT_AGENT_SETTINGS,
  DEFAULT_RUNTIME_CONFIG,
  ChatdeckError,
  ValidationError,
  NotFoundError,
  FileInclusionError,
  TransientServiceError,
  FatalServiceError,
  InvalidConfigError,
  isChatdeckError,
} from "./types/index.js";

// ── Core ────────────────────────────────────────────────────────────────

export {
  MessageStore,
  ChatSession,
  searchMessages,
  computeStats,
  expandFileInclusions,
  listIncludableFiles,
} from "./core/index.js";
export type { ISendOptions, ISendResult, IChatSessionOptions } from "./core/index.js";

// ── Providers ───────────────────────────────────────────────────────────

export type { ICompletionProvider, IProviderOptions } from "./providers/types.js";
export { OpenAIAdapter, classifyProviderError } from "./providers/openai-adapter.js";

// ── Storage ─────────────────────────────────────────────────────────────

export { ConfigStore, SecretStore, FileAgentRepository } from "./storage/index.js";
export type { IAgentRepository, IAgentSummary } from "./storage/index.js";

// ── Export ──────────────────────────────────────────────────────────────

export {
  renderConversation,
  exportConversation,
  importConversation,
  parseConversationExport,
  listExportFormats,
} from "./export/index.js";
export type { ExportFormat, IExportResult, IImportResult } from "./export/index.js";
