/**
 * Wiring shared by every subcommand: home directory, runtime config,
 * agent repository and completion provider.
 */

import type { IAgentProfile, IRuntimeConfig } from "../types/config.js";
import { FatalServiceError } from "../types/errors.js";
import { FileAgentRepository } from "../storage/agent-repository.js";
import { ConfigStore } from "../storage/config-store.js";
import { SecretStore } from "../storage/secret-store.js";
import { OpenAIAdapter } from "../providers/openai-adapter.js";
import type { ICompletionProvider } from "../providers/types.js";
import { getChatdeckHome, initializeDirectories } from "../utils/pathResolver.js";
import { logger } from "../utils/logger.js";

export interface ICliContext {
  readonly config: IRuntimeConfig;
  readonly configStore: ConfigStore;
  readonly repository: FileAgentRepository;
}

export function loadCliContext(): ICliContext {
  const home = getChatdeckHome();
  initializeDirectories(home);
  const configStore = new ConfigStore(home);
  return {
    config: configStore.load(),
    configStore,
    repository: new FileAgentRepository(home),
  };
}

export function createProvider(context: ICliContext, profile: IAgentProfile): ICompletionProvider {
  const secrets = new SecretStore(context.repository.agentDir(profile.id));
  const resolved = secrets.resolve(profile.model);
  if (!resolved) {
    throw new FatalServiceError(`no API key configured for agent "${profile.id}"`, { statusCode: 401 });
  }

  logger.debug({ agent: profile.id, keySource: resolved.source }, "API key resolved");
  return new OpenAIAdapter({ apiKey: resolved.apiKey });
}
