/**
 * Storage layer barrel export
 */

export { ConfigStore, type RuntimeConfigFile } from "./config-store.js";
export { SecretStore, type ApiKeySource, type IResolvedApiKey } from "./secret-store.js";
export { BackupStore, type IBackupEntry } from "./backup-store.js";
export {
  FileAgentRepository,
  type IAgentRepository,
  type IAgentRepositoryOptions,
  type IAgentSummary,
} from "./agent-repository.js";
export { writeFileAtomic, writeJsonAtomic, readJsonFile, type IAtomicWriteOptions } from "./atomic-file.js";
