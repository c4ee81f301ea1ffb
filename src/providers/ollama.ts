// =============================================================================
// Ollama provider — local models through Ollama's OpenAI-compatible API
// =============================================================================

import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";

export interface OllamaProviderOptions {
  /** Base URL of the Ollama server. Defaults to `http://localhost:11434/v1`. */
  baseURL?: string;
}

/**
 * Create a chat model served by a local Ollama instance.
 * No API key required.
 *
 * @example
 * ```ts
 * const model = ollama('llama3.2', { baseURL: 'http://gpu-box:11434/v1' })
 * ```
 */
export function ollama(modelId: string, options?: OllamaProviderOptions): LanguageModel {
  const provider = createOpenAI({
    baseURL: options?.baseURL ?? "http://localhost:11434/v1",
    apiKey: "ollama",
    name: "ollama",
  });
  return provider.chat(modelId);
}
