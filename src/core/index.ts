/**
 * Core conversation layer barrel export
 */

export { MessageStore } from "./message-store.js";
export type { IMessageStoreOptions } from "./message-store.js";

export { searchMessages, buildPreview, computeStats } from "./history-query.js";
export type { ISearchOptions } from "./history-query.js";

export {
  findInclusionTokens,
  expandFileInclusions,
  buildFileHeader,
  getIncludableExtensions,
  isIncludableFile,
  listIncludableFiles,
} from "./file-inclusion.js";
export type { IFileInclusionOptions, IInclusionToken, IIncludableFile } from "./file-inclusion.js";

export { ChatSession } from "./chat-session.js";
export type { GenerationOverrides, ISendOptions, ISendResult, IChatSessionOptions } from "./chat-session.js";
