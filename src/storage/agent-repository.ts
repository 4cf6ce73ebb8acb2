/**
 * Agent repository: the explicit registry of agents under $CHATDECK_HOME/agents.
 * Each agent owns one directory holding config.yaml, history.json,
 * secrets.json and the backups/ logs/ exports/ uploads/ subdirectories.
 */

import { existsSync, readdirSync, readFileSync, rmSync, statSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import type { AgentProfilePatch, IAgentProfile, IStoredMessage } from "../types/index.js";
import { AGENT_PROFILE_KEYS, DEFAULT_AGENT_SETTINGS } from "../types/config.js";
import { getModelDisplayName, isSupportedModel, listModelIds } from "../types/model.js";
import { InvalidConfigError, NotFoundError, ValidationError } from "../types/errors.js";
import {
  AGENT_SUBDIRECTORIES,
  ensureDirectory,
  getAgentConfigPath,
  getAgentDir,
  getAgentsDir,
  getHistoryPath,
  isValidAgentId,
  logger,
} from "../utils/index.js";
import { MessageStore } from "../core/message-store.js";
import { writeFileAtomic } from "./atomic-file.js";
import { AgentProfileSchema, formatIssues } from "./schemas.js";

export interface IAgentSummary {
  readonly id: string;
  readonly model: string;
  readonly modelName: string;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly messageCount: number;
  readonly historyBytes: number;
  readonly backupCount: number;
  readonly directory: string;
}

export interface IAgentRepository {
  listAgents(): Set<string>;
  exists(id: string): boolean;
  create(
    id: string,
    model: string,
    overrides?: AgentProfilePatch,
    seed?: readonly IStoredMessage[],
  ): IAgentProfile;
  loadProfile(id: string): IAgentProfile;
  saveProfile(profile: IAgentProfile): IAgentProfile;
  updateProfile(id: string, patch: Readonly<Record<string, unknown>>): IAgentProfile;
  delete(id: string): void;
  summarize(id: string): IAgentSummary;
  agentDir(id: string): string;
  openStore(profile: IAgentProfile): MessageStore;
}

export interface IAgentRepositoryOptions {
  /** Clock override, used by tests. */
  readonly now?: () => Date;
}

export class FileAgentRepository implements IAgentRepository {
  readonly home: string;
  private readonly now: () => Date;

  constructor(home: string, options?: IAgentRepositoryOptions) {
    this.home = home;
    this.now = options?.now ?? (() => new Date());
  }

  // ── Registry ───────────────────────────────────────────────────────────

  listAgents(): Set<string> {
    const agentsDir = getAgentsDir(this.home);
    if (!existsSync(agentsDir)) {
      return new Set();
    }

    const ids = readdirSync(agentsDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && isValidAgentId(entry.name))
      .filter((entry) => existsSync(getAgentConfigPath(join(agentsDir, entry.name))))
      .map((entry) => entry.name)
      .sort();
    return new Set(ids);
  }

  exists(id: string): boolean {
    return isValidAgentId(id) && existsSync(getAgentConfigPath(this.agentDir(id)));
  }

  agentDir(id: string): string {
    return getAgentDir(this.home, id);
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────

  create(
    id: string,
    model: string,
    overrides?: AgentProfilePatch,
    seed: readonly IStoredMessage[] = [],
  ): IAgentProfile {
    assertAgentId(id);
    if (this.exists(id)) {
      throw new ValidationError("agent id", `"${id}" already exists`);
    }
    assertModel(model);

    const timestamp = this.now().toISOString();
    const profile = validateProfile(
      {
        ...DEFAULT_AGENT_SETTINGS,
        ...overrides,
        id,
        model,
        createdAt: timestamp,
        updatedAt: timestamp,
      },
      "agent profile",
    );

    const dir = this.agentDir(id);
    ensureDirectory(dir, 0o700);
    for (const sub of AGENT_SUBDIRECTORIES) {
      ensureDirectory(join(dir, sub));
    }

    try {
      MessageStore.initialize(dir, storeOptions(profile, this.now), seed);
      this.writeProfile(profile);
    } catch (error: unknown) {
      rmSync(dir, { recursive: true, force: true });
      throw error;
    }

    logger.info({ agent: id, model, seeded: seed.length }, "Agent created");
    return profile;
  }

  delete(id: string): void {
    if (!this.exists(id)) {
      throw new NotFoundError("agent", id);
    }
    rmSync(this.agentDir(id), { recursive: true, force: true });
    logger.info({ agent: id }, "Agent deleted");
  }

  // ── Profiles ───────────────────────────────────────────────────────────

  loadProfile(id: string): IAgentProfile {
    if (!this.exists(id)) {
      throw new NotFoundError("agent", id);
    }

    const configPath = getAgentConfigPath(this.agentDir(id));
    let raw: unknown;
    try {
      raw = parseYaml(readFileSync(configPath, "utf-8"));
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigError(configPath, reason);
    }

    const parsed = AgentProfileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidConfigError(configPath, formatIssues(parsed.error));
    }
    if (parsed.data.id !== id) {
      throw new InvalidConfigError(configPath, `id "${parsed.data.id}" does not match directory "${id}"`);
    }
    return parsed.data;
  }

  saveProfile(profile: IAgentProfile): IAgentProfile {
    if (!this.exists(profile.id)) {
      throw new NotFoundError("agent", profile.id);
    }
    assertModel(profile.model);

    const saved = validateProfile({ ...profile, updatedAt: this.now().toISOString() }, "agent profile");
    this.writeProfile(saved);
    logger.debug({ agent: saved.id }, "Agent profile saved");
    return saved;
  }

  /**
   * Apply a partial update. Unknown keys and out-of-range values are
   * rejected before anything is written.
   */
  updateProfile(id: string, patch: Readonly<Record<string, unknown>>): IAgentProfile {
    const allowed: readonly string[] = AGENT_PROFILE_KEYS;
    for (const key of Object.keys(patch)) {
      if (!allowed.includes(key)) {
        throw new ValidationError("setting", `unknown key "${key}" (expected one of ${allowed.join(", ")})`);
      }
    }

    const current = this.loadProfile(id);
    const updated = validateProfile({ ...current, ...patch }, "setting");
    return this.saveProfile(updated);
  }

  // ── Store Access ───────────────────────────────────────────────────────

  openStore(profile: IAgentProfile): MessageStore {
    return MessageStore.load(this.agentDir(profile.id), storeOptions(profile, this.now));
  }

  summarize(id: string): IAgentSummary {
    const profile = this.loadProfile(id);
    const dir = this.agentDir(id);
    const historyPath = getHistoryPath(dir);
    const store = this.openStore(profile);

    return {
      id,
      model: profile.model,
      modelName: getModelDisplayName(profile.model),
      createdAt: profile.createdAt,
      updatedAt: profile.updatedAt,
      messageCount: store.size,
      historyBytes: existsSync(historyPath) ? statSync(historyPath).size : 0,
      backupCount: store.listBackups().length,
      directory: dir,
    };
  }

  private writeProfile(profile: IAgentProfile): void {
    writeFileAtomic(getAgentConfigPath(this.agentDir(profile.id)), stringifyYaml(profile));
  }
}

// ── Helpers ──────────────────────────────────────────────────────────────

function storeOptions(profile: IAgentProfile, now: () => Date) {
  return { maxHistorySize: profile.maxHistorySize, maxBackups: profile.maxBackups, now };
}

function assertAgentId(id: string): void {
  if (!isValidAgentId(id)) {
    throw new ValidationError(
      "agent id",
      `"${id}" must be 1-64 characters of letters, digits, "_" or "-"`,
    );
  }
}

function assertModel(model: string): void {
  if (!isSupportedModel(model)) {
    throw new ValidationError("model", `"${model}" is not supported (available: ${listModelIds().join(", ")})`);
  }
}

function validateProfile(candidate: unknown, field: string): IAgentProfile {
  const parsed = AgentProfileSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ValidationError(field, formatIssues(parsed.error));
  }
  return parsed.data;
}
