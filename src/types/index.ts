/**
 * chatdeck shared types: barrel export
 */

export type {
  MessageRole,
  IStoredMessage,
  IMessageMetadata,
  IHistoryRecord,
  BackupReason,
  IBackupSnapshot,
  CompletionRole,
  ICompletionMessage,
  ICompletionRequest,
  IModelUsage,
  IConversationStats,
} from "./message.js";

export { MESSAGE_ROLES, isMessageRole } from "./message.js";

export type { CostTier, IModelInfo } from "./model.js";

export {
  SUPPORTED_MODELS,
  DEFAULT_MODEL_ID,
  isSupportedModel,
  getModelInfo,
  getModelDisplayName,
  getModelTimeoutMs,
  listModelIds,
} from "./model.js";

export type {
  IAgentProfile,
  AgentProfilePatch,
  AgentProfileKey,
  IRetryConfig,
  IRuntimeConfig,
} from "./config.js";

export {
  AGENT_PROFILE_KEYS,
  DEFAULT_AGENT_SETTINGS,
  DEFAULT_MAX_INCLUSION_BYTES,
  DEFAULT_RUNTIME_CONFIG,
} from "./config.js";

export {
  ChatdeckError,
  ValidationError,
  NotFoundError,
  FileInclusionError,
  TransientServiceError,
  FatalServiceError,
  InvalidConfigError,
  isChatdeckError,
} from "./errors.js";

export type {
  IErrorContext,
  NotFoundKind,
  FileInclusionFailure,
  ServiceError,
  AnyChatdeckError,
} from "./errors.js";
