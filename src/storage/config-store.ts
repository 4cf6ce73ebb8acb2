/**
 * Runtime configuration store.
 * Loads $CHATDECK_HOME/config.json with Zod validation, merges it over the
 * defaults, applies environment overrides, and hands out a frozen snapshot.
 * Core operations receive that snapshot; nothing re-reads disk mid-operation.
 */

import { existsSync } from "node:fs";
import type { z } from "zod";
import { logger } from "../utils/logger.js";
import { getChatdeckHome, getConfigPath } from "../utils/pathResolver.js";
import { DEFAULT_RUNTIME_CONFIG } from "../types/config.js";
import type { IRuntimeConfig } from "../types/config.js";
import { InvalidConfigError } from "../types/errors.js";
import { readJsonFile, writeJsonAtomic } from "./atomic-file.js";
import { RuntimeConfigFileSchema, formatIssues } from "./schemas.js";

export type RuntimeConfigFile = z.infer<typeof RuntimeConfigFileSchema>;

type Environment = Readonly<Record<string, string | undefined>>;

export class ConfigStore {
  readonly home: string;
  readonly configPath: string;

  constructor(home: string = getChatdeckHome()) {
    this.home = home;
    this.configPath = getConfigPath(home);
  }

  load(env: Environment = process.env): IRuntimeConfig {
    const file = this.readFile();
    const maxInclusionBytes = parseByteLimit(env["CHATDECK_MAX_INCLUSION_BYTES"]);

    const config: IRuntimeConfig = {
      home: this.home,
      defaultModel: file.defaultModel ?? DEFAULT_RUNTIME_CONFIG.defaultModel,
      maxInclusionBytes:
        maxInclusionBytes ?? file.maxInclusionBytes ?? DEFAULT_RUNTIME_CONFIG.maxInclusionBytes,
      includeFileHeaders: file.includeFileHeaders ?? DEFAULT_RUNTIME_CONFIG.includeFileHeaders,
      searchPaths: Object.freeze([...(file.searchPaths ?? DEFAULT_RUNTIME_CONFIG.searchPaths)]),
      retry: Object.freeze({ ...DEFAULT_RUNTIME_CONFIG.retry, ...file.retry }),
    };

    logger.debug({ path: this.configPath, fromFile: Object.keys(file) }, "Runtime config loaded");
    return Object.freeze(config);
  }

  /** Merge `patch` into config.json and return the stored file contents. */
  save(patch: RuntimeConfigFile): RuntimeConfigFile {
    const merged = { ...this.readFile(), ...patch };
    const validated = RuntimeConfigFileSchema.safeParse(merged);
    if (!validated.success) {
      throw new InvalidConfigError(this.configPath, formatIssues(validated.error));
    }

    writeJsonAtomic(this.configPath, validated.data);
    logger.info({ path: this.configPath, keys: Object.keys(patch) }, "Runtime config saved");
    return validated.data;
  }

  private readFile(): RuntimeConfigFile {
    if (!existsSync(this.configPath)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = readJsonFile(this.configPath);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigError(this.configPath, reason);
    }

    const validated = RuntimeConfigFileSchema.safeParse(raw);
    if (!validated.success) {
      throw new InvalidConfigError(this.configPath, formatIssues(validated.error));
    }
    return validated.data;
  }
}

function parseByteLimit(value: string | undefined): number | undefined {
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidConfigError("CHATDECK_MAX_INCLUSION_BYTES", `expected a positive integer, got "${value}"`);
  }
  return parsed;
}
