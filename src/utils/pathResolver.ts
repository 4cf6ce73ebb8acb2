/**
 * Directory layout under $CHATDECK_HOME (default ~/.chatdeck).
 * Always built with path.join; no hardcoded separators.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { existsSync, mkdirSync } from "node:fs";

const CHATDECK_HOME = join(homedir(), ".chatdeck");

export function getChatdeckHome(): string {
  return process.env["CHATDECK_HOME"] ?? CHATDECK_HOME;
}

export function getConfigPath(home: string = getChatdeckHome()): string {
  return join(home, "config.json");
}

export function getLogDir(home: string = getChatdeckHome()): string {
  return join(home, "logs");
}

export function getAgentsDir(home: string = getChatdeckHome()): string {
  return join(home, "agents");
}

// ── Per-agent paths ──────────────────────────────────────────────────────

export function getAgentDir(home: string, agentId: string): string {
  return join(getAgentsDir(home), agentId);
}

export function getAgentConfigPath(agentDir: string): string {
  return join(agentDir, "config.yaml");
}

export function getHistoryPath(agentDir: string): string {
  return join(agentDir, "history.json");
}

export function getSecretsPath(agentDir: string): string {
  return join(agentDir, "secrets.json");
}

export function getBackupsDir(agentDir: string): string {
  return join(agentDir, "backups");
}

export function getExportsDir(agentDir: string): string {
  return join(agentDir, "exports");
}

export function getUploadsDir(agentDir: string): string {
  return join(agentDir, "uploads");
}

export const AGENT_SUBDIRECTORIES = ["backups", "logs", "exports", "uploads"] as const;

// ── Directory Initialization ─────────────────────────────────────────────

export function ensureDirectory(dirPath: string, mode?: number): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true, mode: mode ?? 0o755 });
  }
}

export function ensureSecureDirectory(dirPath: string): void {
  ensureDirectory(dirPath, 0o700);
}

export function initializeDirectories(home: string = getChatdeckHome()): void {
  ensureSecureDirectory(home);
  ensureDirectory(getAgentsDir(home));
  ensureSecureDirectory(getLogDir(home));
}
