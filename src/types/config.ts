/**
 * Configuration types: per-agent profiles and the process-wide runtime config.
 */

// ── Agent Profile (agents/<id>/config.yaml) ─────────────────────────────

export interface IAgentProfile {
  readonly id: string;
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number | null;
  readonly systemPrompt: string | null;
  readonly stream: boolean;
  readonly topP: number;
  readonly frequencyPenalty: number;
  readonly presencePenalty: number;
  readonly maxHistorySize: number;
  readonly maxBackups: number;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** Fields a user may change after creation. */
export type AgentProfilePatch = Partial<
  Pick<
    IAgentProfile,
    | "model"
    | "temperature"
    | "maxTokens"
    | "systemPrompt"
    | "stream"
    | "topP"
    | "frequencyPenalty"
    | "presencePenalty"
    | "maxHistorySize"
    | "maxBackups"
  >
>;

export type AgentProfileKey = keyof AgentProfilePatch;

export const AGENT_PROFILE_KEYS: readonly AgentProfileKey[] = [
  "model",
  "temperature",
  "maxTokens",
  "systemPrompt",
  "stream",
  "topP",
  "frequencyPenalty",
  "presencePenalty",
  "maxHistorySize",
  "maxBackups",
];

export const DEFAULT_AGENT_SETTINGS: Omit<IAgentProfile, "id" | "model" | "createdAt" | "updatedAt"> = {
  temperature: 1.0,
  maxTokens: 32_768,
  systemPrompt: null,
  stream: true,
  topP: 1.0,
  frequencyPenalty: 0,
  presencePenalty: 0,
  maxHistorySize: 1_000,
  maxBackups: 10,
};

// ── Runtime Configuration ($CHATDECK_HOME/config.json) ──────────────────

export interface IRetryConfig {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface IRuntimeConfig {
  readonly home: string;
  readonly defaultModel: string;
  readonly maxInclusionBytes: number;
  readonly includeFileHeaders: boolean;
  /** Extra directories searched for {file} tokens, relative to the working directory. */
  readonly searchPaths: readonly string[];
  readonly retry: IRetryConfig;
}

export const DEFAULT_MAX_INCLUSION_BYTES = 2 * 1024 * 1024;

export const DEFAULT_RUNTIME_CONFIG: Omit<IRuntimeConfig, "home"> = {
  defaultModel: "gpt-4.1",
  maxInclusionBytes: DEFAULT_MAX_INCLUSION_BYTES,
  includeFileHeaders: false,
  searchPaths: ["src", "lib", "scripts", "data", "documents", "files", "config"],
  retry: {
    maxRetries: 3,
    baseDelayMs: 1_000,
    maxDelayMs: 30_000,
  },
};
