/**
 * One agent's conversation turn loop: expand file references, call the
 * completion provider with bounded retry, and commit the exchange.
 *
 * Nothing is written to the store until a complete, non-empty answer has
 * arrived; a failed or interrupted call leaves history untouched.
 */

import type { IAgentProfile, IRuntimeConfig } from "../types/config.js";
import type { ICompletionMessage, ICompletionRequest, IStoredMessage } from "../types/message.js";
import { FatalServiceError, TransientServiceError, ValidationError } from "../types/errors.js";
import { getModelTimeoutMs } from "../types/model.js";
import type { ICompletionProvider } from "../providers/types.js";
import { classifyProviderError } from "../providers/openai-adapter.js";
import { logger } from "../utils/logger.js";
import { withRetry, type IRetryOptions } from "../utils/retry.js";
import { sanitizePromptInput } from "../utils/sanitizer.js";
import { expandFileInclusions } from "./file-inclusion.js";
import type { MessageStore } from "./message-store.js";

/** Per-call replacements for the profile's generation parameters. */
export type GenerationOverrides = Partial<
  Pick<
    IAgentProfile,
    "temperature" | "maxTokens" | "topP" | "frequencyPenalty" | "presencePenalty" | "systemPrompt" | "stream"
  >
>;

export interface ISendOptions {
  /** Receives streamed text as it arrives. Not called in non-streaming mode. */
  readonly onChunk?: ((chunk: string) => void) | undefined;
  readonly overrides?: GenerationOverrides | undefined;
}

export interface ISendResult {
  readonly user: IStoredMessage;
  readonly assistant: IStoredMessage;
  /** Provider calls made, including the successful one. */
  readonly attempts: number;
}

export interface IChatSessionOptions {
  readonly provider: ICompletionProvider;
  readonly store: MessageStore;
  readonly profile: IAgentProfile;
  readonly config: IRuntimeConfig;
  readonly workingDirectory: string;
  /** Searched after config.searchPaths, e.g. the agent's uploads directory. */
  readonly extraSearchDirs?: readonly string[] | undefined;
  /** Backoff hooks for tests. */
  readonly retryHooks?: Pick<IRetryOptions, "sleep" | "random"> | undefined;
}

export class ChatSession {
  readonly store: MessageStore;
  private profileState: IAgentProfile;
  private readonly provider: ICompletionProvider;
  private readonly config: IRuntimeConfig;
  private readonly workingDirectory: string;
  private readonly searchDirs: readonly string[];
  private readonly retryHooks: Pick<IRetryOptions, "sleep" | "random">;

  constructor(options: IChatSessionOptions) {
    this.provider = options.provider;
    this.store = options.store;
    this.profileState = options.profile;
    this.config = options.config;
    this.workingDirectory = options.workingDirectory;
    this.searchDirs = [...options.config.searchPaths, ...(options.extraSearchDirs ?? [])];
    this.retryHooks = options.retryHooks ?? {};
  }

  get profile(): IAgentProfile {
    return this.profileState;
  }

  /** Swap in an updated profile (after `switch` or `config set`). */
  updateProfile(profile: IAgentProfile): void {
    this.profileState = profile;
  }

  /** Expand `{path}` tokens without sending anything. */
  expand(rawText: string): string {
    return expandFileInclusions(sanitizePromptInput(rawText), this.workingDirectory, {
      maxBytes: this.config.maxInclusionBytes,
      searchDirs: this.searchDirs,
      includeHeaders: this.config.includeFileHeaders,
    });
  }

  async send(rawText: string, options?: ISendOptions): Promise<ISendResult> {
    if (rawText.trim().length === 0) {
      throw new ValidationError("message body", "must not be empty");
    }

    const userBody = this.expand(rawText);
    const request = this.buildRequest(userBody, options?.overrides);
    const streaming = options?.overrides?.stream ?? this.profileState.stream;

    const { text, attempts } = streaming
      ? await this.streamCompletion(request, options?.onChunk)
      : await this.completeWithRetry(request);

    if (text.trim().length === 0) {
      throw new FatalServiceError("the model returned an empty response");
    }

    const [user, assistant] = this.store.appendTurn(userBody, text, { model: request.model });
    logger.info(
      { agent: this.profileState.id, model: request.model, streaming, attempts, index: assistant.index },
      "Turn completed",
    );
    return { user, assistant, attempts };
  }

  // ── Request Assembly ───────────────────────────────────────────────────

  buildRequest(userBody: string, overrides?: GenerationOverrides): ICompletionRequest {
    const profile = { ...this.profileState, ...overrides };

    const history: ICompletionMessage[] = [];
    for (const message of this.store.messages()) {
      if (message.role === "user" || message.role === "assistant") {
        history.push({ role: message.role, content: message.content });
      }
    }
    history.push({ role: "user", content: userBody });

    return {
      model: profile.model,
      messages: history,
      temperature: profile.temperature,
      topP: profile.topP,
      frequencyPenalty: profile.frequencyPenalty,
      presencePenalty: profile.presencePenalty,
      timeoutMs: getModelTimeoutMs(profile.model),
      ...(profile.systemPrompt !== null ? { system: profile.systemPrompt } : {}),
      ...(profile.maxTokens !== null ? { maxTokens: profile.maxTokens } : {}),
    };
  }

  // ── Completion ─────────────────────────────────────────────────────────

  private retryOptions(shouldRetry: (error: unknown) => boolean): IRetryOptions {
    return {
      ...this.config.retry,
      ...this.retryHooks,
      shouldRetry,
      retryAfter: (error) => (error instanceof TransientServiceError ? error.retryAfterMs : undefined),
    };
  }

  private async completeWithRetry(
    request: ICompletionRequest,
  ): Promise<{ text: string; attempts: number }> {
    let attempts = 0;
    try {
      const text = await withRetry(
        async () => {
          attempts++;
          try {
            return await this.provider.complete(request);
          } catch (error: unknown) {
            throw classifyProviderError(error);
          }
        },
        this.retryOptions((error) => error instanceof TransientServiceError),
      );
      return { text, attempts };
    } catch (error: unknown) {
      throw finalizeError(error, attempts);
    }
  }

  /**
   * A transient failure before the first chunk is retried; once text has
   * been delivered the turn fails as a whole.
   */
  private async streamCompletion(
    request: ICompletionRequest,
    onChunk: ((chunk: string) => void) | undefined,
  ): Promise<{ text: string; attempts: number }> {
    let attempts = 0;
    let delivered = false;

    try {
      const text = await withRetry(
        async () => {
          attempts++;
          delivered = false;
          let buffer = "";
          try {
            for await (const chunk of this.provider.stream(request)) {
              if (chunk.length === 0) {
                continue;
              }
              delivered = true;
              buffer += chunk;
              onChunk?.(chunk);
            }
          } catch (error: unknown) {
            throw classifyProviderError(error);
          }
          return buffer;
        },
        this.retryOptions((error) => error instanceof TransientServiceError && !delivered),
      );
      return { text, attempts };
    } catch (error: unknown) {
      if (delivered && error instanceof TransientServiceError) {
        logger.warn({ model: request.model, attempts }, "Stream interrupted after partial output");
        throw new FatalServiceError(`stream interrupted: ${error.message}`, { cause: error });
      }
      throw finalizeError(error, attempts);
    }
  }
}

/** A transient error that outlived its retries becomes fatal for the turn. */
function finalizeError(error: unknown, attempts: number): unknown {
  if (error instanceof TransientServiceError) {
    logger.warn({ attempts }, "Completion retries exhausted");
    return new FatalServiceError(`gave up after ${attempts} attempts: ${error.message}`, { cause: error });
  }
  return error;
}
