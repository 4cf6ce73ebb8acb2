/**
 * Completion capability consumed by the chat session.
 * Implementations classify their failures into TransientServiceError and
 * FatalServiceError; nothing else escapes.
 */

import type { ICompletionRequest } from "../types/message.js";

export interface ICompletionProvider {
  readonly name: string;

  /** Send a non-streaming request and resolve with the full completion text. */
  complete(request: ICompletionRequest): Promise<string>;

  /** Send a streaming request, yielding text deltas in order. */
  stream(request: ICompletionRequest): AsyncIterable<string>;
}

/**
 * Options for constructing a provider adapter.
 */
export interface IProviderOptions {
  readonly apiKey?: string | undefined;
  readonly baseUrl?: string | undefined;
}
