/**
 * Per-agent API key storage in an owner-only secrets.json.
 * Keys are never logged; log lines carry the agent directory and key slot only.
 */

import { existsSync, chmodSync } from "node:fs";
import { logger } from "../utils/logger.js";
import { getSecretsPath } from "../utils/pathResolver.js";
import { InvalidConfigError, ValidationError } from "../types/errors.js";
import { readJsonFile, writeJsonAtomic } from "./atomic-file.js";
import { SecretsFileSchema } from "./schemas.js";

const DEFAULT_SLOT = "default";
const PROVIDER = "openai";
const SECRETS_FILE_MODE = 0o600;

type Environment = Readonly<Record<string, string | undefined>>;

export type ApiKeySource = "environment" | "agent";

export interface IResolvedApiKey {
  readonly apiKey: string;
  readonly source: ApiKeySource;
}

interface ISecretsFile {
  readonly provider?: string | undefined;
  readonly keys: Readonly<Record<string, string>>;
}

export class SecretStore {
  private readonly secretsPath: string;

  constructor(agentDir: string) {
    this.secretsPath = getSecretsPath(agentDir);
  }

  /**
   * OPENAI_API_KEY wins; otherwise the model-specific slot, then the
   * agent's default slot.
   */
  resolve(model: string, env: Environment = process.env): IResolvedApiKey | undefined {
    const fromEnv = env["OPENAI_API_KEY"];
    if (fromEnv !== undefined && fromEnv.trim().length > 0) {
      return { apiKey: fromEnv.trim(), source: "environment" };
    }

    const keys = this.read().keys;
    const stored = keys[model] ?? keys[DEFAULT_SLOT];
    return stored !== undefined ? { apiKey: stored, source: "agent" } : undefined;
  }

  hasKey(model?: string): boolean {
    const keys = this.read().keys;
    return (model !== undefined && keys[model] !== undefined) || keys[DEFAULT_SLOT] !== undefined;
  }

  /** Store a key for one model, or for every model when `model` is omitted. */
  save(apiKey: string, model?: string): void {
    const trimmed = apiKey.trim();
    if (trimmed.length === 0) {
      throw new ValidationError("API key", "must not be empty");
    }

    const slot = model ?? DEFAULT_SLOT;
    const current = this.read();
    const next: ISecretsFile = {
      provider: PROVIDER,
      keys: { ...current.keys, [slot]: trimmed },
    };

    writeJsonAtomic(this.secretsPath, next, { mode: SECRETS_FILE_MODE });
    chmodSync(this.secretsPath, SECRETS_FILE_MODE);
    logger.info({ secretsPath: this.secretsPath, slot }, "API key stored");
  }

  private read(): ISecretsFile {
    if (!existsSync(this.secretsPath)) {
      return { keys: {} };
    }

    let raw: unknown;
    try {
      raw = readJsonFile(this.secretsPath);
    } catch {
      throw new InvalidConfigError(this.secretsPath, "secrets file is not valid JSON");
    }

    const parsed = SecretsFileSchema.safeParse(raw);
    if (!parsed.success) {
      // Issue text could echo stored values, so only the location is reported.
      throw new InvalidConfigError(this.secretsPath, "secrets file has an unexpected shape");
    }
    return parsed.data;
  }
}
