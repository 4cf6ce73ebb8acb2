/**
 * chatdeck typed error hierarchy.
 * Every error carries a stable code, a user-facing message, and optional
 * diagnostic detail and recovery hint.
 */

export interface IErrorContext {
  readonly code: string;
  readonly userMessage: string;
  readonly diagnosticMessage?: string | undefined;
  readonly suggestedRecovery?: string | undefined;
  readonly cause?: unknown;
}

export abstract class ChatdeckError extends Error {
  abstract readonly code: string;
  abstract readonly userMessage: string;
  diagnosticMessage?: string | undefined;
  suggestedRecovery?: string | undefined;

  constructor(message: string, context?: Partial<IErrorContext>) {
    super(message, context?.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = this.constructor.name;
    this.diagnosticMessage = context?.diagnosticMessage;
    this.suggestedRecovery = context?.suggestedRecovery;
  }
}

// ── Input Errors ─────────────────────────────────────────────────────────

export class ValidationError extends ChatdeckError {
  readonly code = "CHATDECK_INPUT_INVALID_001" as const;
  readonly userMessage: string;
  readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid ${field}: ${reason}`);
    this.field = field;
    this.userMessage = `Invalid ${field}: ${reason}`;
  }
}

export type NotFoundKind = "agent" | "history" | "backup" | "file";

export class NotFoundError extends ChatdeckError {
  readonly code = "CHATDECK_NOT_FOUND_001" as const;
  readonly userMessage: string;
  readonly kind: NotFoundKind;
  readonly target: string;

  constructor(kind: NotFoundKind, target: string) {
    super(`${kind} not found: ${target}`);
    this.kind = kind;
    this.target = target;
    this.userMessage =
      kind === "agent"
        ? `Agent "${target}" not found. Use "chatdeck agents list" to see available agents.`
        : `No ${kind} found for "${target}".`;
  }
}

// ── File Inclusion Errors ────────────────────────────────────────────────

export type FileInclusionFailure =
  | "missing"
  | "not_a_file"
  | "unreadable"
  | "too_large"
  | "undecodable";

export class FileInclusionError extends ChatdeckError {
  readonly code = "CHATDECK_INCLUDE_001" as const;
  readonly userMessage: string;
  readonly token: string;
  readonly reason: FileInclusionFailure;

  constructor(token: string, reason: FileInclusionFailure, detail?: string) {
    super(`Cannot include {${token}}: ${describeInclusionFailure(reason)}${detail ? ` (${detail})` : ""}`);
    this.token = token;
    this.reason = reason;
    this.userMessage = `Cannot include {${token}}: ${describeInclusionFailure(reason)}. The message was not sent.`;
    this.suggestedRecovery = "Fix the file reference or remove the braces, then send again.";
  }
}

function describeInclusionFailure(reason: FileInclusionFailure): string {
  switch (reason) {
    case "missing":
      return "file does not exist";
    case "not_a_file":
      return "path is not a regular file";
    case "unreadable":
      return "file could not be read";
    case "too_large":
      return "file exceeds the inclusion size limit";
    case "undecodable":
      return "file is not valid UTF-8 text";
  }
}

// ── Completion Service Errors ────────────────────────────────────────────

export class TransientServiceError extends ChatdeckError {
  readonly code = "CHATDECK_SERVICE_TRANSIENT_001" as const;
  readonly userMessage: string;
  readonly retryAfterMs: number | undefined;

  constructor(message: string, options?: { retryAfterMs?: number | undefined; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.retryAfterMs = options?.retryAfterMs;
    this.userMessage = `The model service is temporarily unavailable: ${message}`;
    this.suggestedRecovery = "Wait a moment and send the message again.";
  }
}

export class FatalServiceError extends ChatdeckError {
  readonly code = "CHATDECK_SERVICE_FATAL_001" as const;
  readonly userMessage: string;
  readonly statusCode: number | undefined;

  constructor(message: string, options?: { statusCode?: number | undefined; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.statusCode = options?.statusCode;
    this.userMessage = `The model request failed: ${message}`;
    if (options?.statusCode === 401 || options?.statusCode === 403) {
      this.suggestedRecovery = "Check the agent's API key with \"chatdeck setup\" or set OPENAI_API_KEY.";
    }
  }
}

// ── Config Errors ────────────────────────────────────────────────────────

export class InvalidConfigError extends ChatdeckError {
  readonly code = "CHATDECK_CONFIG_INVALID_001" as const;
  readonly userMessage: string;

  constructor(source: string, reason: string) {
    super(`Invalid configuration in ${source}: ${reason}`);
    this.userMessage = `Invalid configuration in ${source}: ${reason}`;
  }
}

// ── Discriminated Error Union ────────────────────────────────────────────

export type ServiceError = TransientServiceError | FatalServiceError;

export type AnyChatdeckError =
  | ValidationError
  | NotFoundError
  | FileInclusionError
  | ServiceError
  | InvalidConfigError;

export function isChatdeckError(error: unknown): error is AnyChatdeckError {
  return error instanceof ChatdeckError;
}
