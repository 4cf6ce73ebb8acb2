/**
 * Input validation and secret scrubbing.
 */

const AGENT_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;
const MAX_AGENT_ID_LENGTH = 64;

/**
 * Agent ids double as directory names, so only [A-Za-z0-9_-] is allowed.
 */
export function isValidAgentId(agentId: string): boolean {
  return agentId.length > 0 && agentId.length <= MAX_AGENT_ID_LENGTH && AGENT_ID_PATTERN.test(agentId);
}

/**
 * Redact potential secrets from text for logging and error messages.
 */
export function redactSecrets(text: string): string {
  return text
    .replace(/sk-proj-[a-zA-Z0-9_-]{8,}/g, "sk-proj-[REDACTED]")
    .replace(/sk-[a-zA-Z0-9]{20,}/g, "sk-[REDACTED]")
    .replace(/Bearer\s+[a-zA-Z0-9._-]+/gi, "Bearer [REDACTED]");
}

/**
 * Show only the edges of a credential, e.g. "test...et".
 */
export function maskSecret(secret: string): string {
  return secret.length > 6 ? `${secret.slice(0, 4)}...${secret.slice(-2)}` : "***";
}

/**
 * Strip NUL bytes from user input before it is stored or sent.
 */
export function sanitizePromptInput(input: string): string {
  return input.replace(/\0/g, "");
}
