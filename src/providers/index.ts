/**
 * Provider layer: barrel export
 */

export type { ICompletionProvider, IProviderOptions } from "./types.js";
export { OpenAIAdapter, classifyProviderError } from "./openai-adapter.js";
