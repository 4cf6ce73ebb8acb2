/**
 * OpenAI chat completions via the Vercel AI SDK.
 * Retries are owned by the chat session, so the SDK's own retry loop is
 * disabled and every failure is classified here.
 */

import { APICallError, generateText, streamText, type CoreMessage } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { logger } from "../utils/logger.js";
import { redactSecrets } from "../utils/sanitizer.js";
import { FatalServiceError, TransientServiceError, type ServiceError } from "../types/errors.js";
import { getModelInfo } from "../types/model.js";
import type { ICompletionMessage, ICompletionRequest } from "../types/message.js";
import type { ICompletionProvider, IProviderOptions } from "./types.js";

const PROVIDER_NAME = "openai";

const TRANSIENT_MESSAGE_PATTERNS = [
  "econnreset",
  "econnrefused",
  "etimedout",
  "socket hang up",
  "fetch failed",
  "network",
  "timed out",
  "timeout",
  "rate limit",
  "too many requests",
  "overloaded",
];

const AUTH_MESSAGE_PATTERNS = ["401", "unauthorized", "invalid api key", "incorrect api key"];

function buildMessages(messages: readonly ICompletionMessage[]): CoreMessage[] {
  return messages.map((msg): CoreMessage =>
    msg.role === "user"
      ? { role: "user", content: msg.content }
      : { role: "assistant", content: msg.content },
  );
}

function parseRetryAfter(headers: Record<string, string> | undefined): number | undefined {
  const value = headers?.["retry-after"];
  if (value === undefined) {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Map any failure from the SDK or the network into the transient/fatal split.
 * Messages are scrubbed of key-shaped strings before they are wrapped.
 */
export function classifyProviderError(error: unknown): ServiceError {
  if (error instanceof TransientServiceError || error instanceof FatalServiceError) {
    return error;
  }

  const message = redactSecrets(error instanceof Error ? error.message : String(error));

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (status === 408 || status === 429 || (status !== undefined && status >= 500)) {
      return new TransientServiceError(message, {
        retryAfterMs: parseRetryAfter(error.responseHeaders),
        cause: error,
      });
    }
    if (status === undefined && error.isRetryable) {
      return new TransientServiceError(message, { cause: error });
    }
    return new FatalServiceError(message, { statusCode: status, cause: error });
  }

  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return new TransientServiceError("request timed out", { cause: error });
  }

  const lower = message.toLowerCase();
  if (AUTH_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new FatalServiceError(message, { statusCode: 401, cause: error });
  }
  if (TRANSIENT_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new TransientServiceError(message, { cause: error });
  }

  return new FatalServiceError(message, { cause: error });
}

export class OpenAIAdapter implements ICompletionProvider {
  readonly name = PROVIDER_NAME;

  private readonly openai: ReturnType<typeof createOpenAI>;

  constructor(options?: IProviderOptions) {
    const apiKey = options?.apiKey ?? process.env["OPENAI_API_KEY"];
    this.openai = createOpenAI({
      ...(apiKey !== undefined ? { apiKey } : {}),
      ...(options?.baseUrl !== undefined ? { baseURL: options.baseUrl } : {}),
    });
  }

  async complete(request: ICompletionRequest): Promise<string> {
    try {
      const result = await generateText(this.buildCallSettings(request));
      logger.debug(
        { model: request.model, finishReason: result.finishReason },
        "OpenAI completion finished",
      );
      return result.text;
    } catch (error: unknown) {
      throw classifyProviderError(error);
    }
  }

  async *stream(request: ICompletionRequest): AsyncIterable<string> {
    let result: ReturnType<typeof streamText>;
    try {
      result = streamText({
        ...this.buildCallSettings(request),
        onError: ({ error }) => {
          const message = error instanceof Error ? error.message : String(error);
          logger.debug({ model: request.model, error: redactSecrets(message) }, "OpenAI stream error");
        },
      });
    } catch (error: unknown) {
      throw classifyProviderError(error);
    }

    try {
      for await (const part of result.fullStream) {
        if (part.type === "text-delta") {
          yield part.textDelta;
        } else if (part.type === "error") {
          throw classifyProviderError(part.error);
        }
      }
    } catch (error: unknown) {
      throw classifyProviderError(error);
    }
  }

  private buildCallSettings(request: ICompletionRequest) {
    const maxTokens = request.maxTokens ?? getModelInfo(request.model)?.maxOutputTokens;
    return {
      model: this.openai(request.model),
      messages: buildMessages(request.messages),
      maxRetries: 0,
      ...(maxTokens !== undefined ? { maxTokens } : {}),
      ...(request.system !== undefined ? { system: request.system } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      ...(request.topP !== undefined ? { topP: request.topP } : {}),
      ...(request.frequencyPenalty !== undefined
        ? { frequencyPenalty: request.frequencyPenalty }
        : {}),
      ...(request.presencePenalty !== undefined
        ? { presencePenalty: request.presencePenalty }
        : {}),
      ...(request.timeoutMs !== undefined
        ? { abortSignal: AbortSignal.timeout(request.timeoutMs) }
        : {}),
    };
  }
}
