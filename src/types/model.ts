/**
 * Supported chat models and their static metadata.
 */

export type CostTier = "premium" | "standard" | "economy";

export interface IModelInfo {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  /** Request timeout in seconds. */
  readonly timeout: number;
  readonly maxOutputTokens: number;
  readonly supportsStreaming: boolean;
  readonly costTier: CostTier;
}

export const SUPPORTED_MODELS: Readonly<Record<string, IModelInfo>> = {
  "gpt-4.1": {
    id: "gpt-4.1",
    name: "GPT-4.1",
    description: "Advanced GPT-4.1 model with comprehensive capabilities",
    timeout: 300,
    maxOutputTokens: 32_768,
    supportsStreaming: true,
    costTier: "premium",
  },
  "gpt-4.1-mini": {
    id: "gpt-4.1-mini",
    name: "GPT-4.1 Mini",
    description: "Compact GPT-4.1 model balancing performance and efficiency",
    timeout: 180,
    maxOutputTokens: 32_768,
    supportsStreaming: true,
    costTier: "standard",
  },
  "gpt-4.1-nano": {
    id: "gpt-4.1-nano",
    name: "GPT-4.1 Nano",
    description: "Lightweight GPT-4.1 model optimized for speed",
    timeout: 120,
    maxOutputTokens: 32_768,
    supportsStreaming: true,
    costTier: "economy",
  },
};

export const DEFAULT_MODEL_ID = "gpt-4.1";

const DEFAULT_TIMEOUT_SECONDS = 120;

export function isSupportedModel(model: string): boolean {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_MODELS, model);
}

export function getModelInfo(model: string): IModelInfo | undefined {
  return isSupportedModel(model) ? SUPPORTED_MODELS[model] : undefined;
}

export function getModelDisplayName(model: string): string {
  return getModelInfo(model)?.name ?? model;
}

export function getModelTimeoutMs(model: string): number {
  return (getModelInfo(model)?.timeout ?? DEFAULT_TIMEOUT_SECONDS) * 1_000;
}

export function listModelIds(): readonly string[] {
  return Object.keys(SUPPORTED_MODELS);
}
