/**
 * Utilities barrel export
 */

export { logger } from "./logger.js";
export { estimateTokenCount, formatTokenCount } from "./tokenCounter.js";
export {
  isValidAgentId,
  redactSecrets,
  maskSecret,
  sanitizePromptInput,
} from "./sanitizer.js";
export {
  getChatdeckHome,
  getConfigPath,
  getLogDir,
  getAgentsDir,
  getAgentDir,
  getAgentConfigPath,
  getHistoryPath,
  getSecretsPath,
  getBackupsDir,
  getExportsDir,
  getUploadsDir,
  AGENT_SUBDIRECTORIES,
  ensureDirectory,
  ensureSecureDirectory,
  initializeDirectories,
} from "./pathResolver.js";
export {
  withRetry,
  sleep,
  computeBackoffDelay,
} from "./retry.js";
export type { IRetryOptions } from "./retry.js";
export {
  formatTimestamp,
  formatClockTime,
  formatDuration,
  formatFileSize,
  fileStamp,
  formatCount,
} from "./format.js";
