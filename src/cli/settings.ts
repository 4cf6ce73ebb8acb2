/**
 * Parsing of `config set` / wizard input into typed profile values.
 * Range checks stay with the repository's schema; this only converts text.
 */

import type { AgentProfileKey } from "../types/config.js";
import { AGENT_PROFILE_KEYS } from "../types/config.js";
import { ValidationError } from "../types/errors.js";

const NULL_WORDS = new Set(["none", "null", "default", ""]);
const TRUE_WORDS = new Set(["true", "yes", "y", "on", "1"]);
const FALSE_WORDS = new Set(["false", "no", "n", "off", "0"]);

/** Accepts camelCase or snake_case: "max_tokens" → "maxTokens". */
export function normalizeSettingKey(key: string): AgentProfileKey {
  const camel = key.trim().replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
  const found = AGENT_PROFILE_KEYS.find((candidate) => candidate === camel);
  if (!found) {
    throw new ValidationError("setting", `unknown key "${key}" (expected one of ${AGENT_PROFILE_KEYS.join(", ")})`);
  }
  return found;
}

export function parseNumber(key: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim().length === 0 || !Number.isFinite(value)) {
    throw new ValidationError(key, `"${raw}" is not a number`);
  }
  return value;
}

function parseInteger(key: string, raw: string): number {
  const value = parseNumber(key, raw);
  if (!Number.isInteger(value)) {
    throw new ValidationError(key, `"${raw}" is not a whole number`);
  }
  return value;
}

export function parseMaxTokens(raw: string): number | null {
  return NULL_WORDS.has(raw.trim().toLowerCase()) ? null : parseInteger("maxTokens", raw);
}

export function parseBoolean(key: string, raw: string): boolean {
  const word = raw.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) {
    return true;
  }
  if (FALSE_WORDS.has(word)) {
    return false;
  }
  throw new ValidationError(key, `"${raw}" is not yes/no`);
}

export function parseSettingValue(key: AgentProfileKey, raw: string): string | number | boolean | null {
  switch (key) {
    case "model":
      return raw.trim();
    case "temperature":
    case "topP":
    case "frequencyPenalty":
    case "presencePenalty":
      return parseNumber(key, raw);
    case "maxTokens":
      return parseMaxTokens(raw);
    case "maxHistorySize":
    case "maxBackups":
      return parseInteger(key, raw);
    case "systemPrompt":
      return NULL_WORDS.has(raw.trim().toLowerCase()) ? null : raw;
    case "stream":
      return parseBoolean(key, raw);
  }
}

export function parseSetting(key: string, raw: string): Record<string, string | number | boolean | null> {
  const normalized = normalizeSettingKey(key);
  return { [normalized]: parseSettingValue(normalized, raw) };
}
