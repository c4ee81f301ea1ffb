// =============================================================================
// AiSdkCompletionGateway — Wraps Vercel AI SDK generateText into CompletionPort
// =============================================================================

import { generateText, type LanguageModel, type ModelMessage } from "ai";
import type { CompletionPort } from "../../ports/completion.port.js";
import { CompletionError, errorMessage } from "../../errors.js";
import { fail, ok, type Result } from "../../result.js";
import type { ChatMessage } from "../../types.js";
import { silentLogger, type Logger } from "../../logging/logger.js";

export interface AiSdkCompletionGatewayOptions {
  model: LanguageModel;
  /** Sampling temperature (default: 0.25) */
  temperature?: number;
  /** Abort a completion that takes longer than this (default: 120s) */
  timeoutMs?: number;
  logger?: Logger;
}

function toModelMessage(message: ChatMessage): ModelMessage {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

export class AiSdkCompletionGateway implements CompletionPort {
  private readonly model: LanguageModel;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: AiSdkCompletionGatewayOptions) {
    this.model = options.model;
    this.temperature = options.temperature ?? 0.25;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.logger = options.logger ?? silentLogger;
  }

  async complete(messages: ChatMessage[]): Promise<Result<string, CompletionError>> {
    const start = Date.now();
    try {
      const result = await generateText({
        model: this.model,
        messages: messages.map(toModelMessage),
        temperature: this.temperature,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(this.timeoutMs),
      });
      this.logger.debug("completion:done", {
        durationMs: Date.now() - start,
        finishReason: result.finishReason,
      });
      return ok(result.text);
    } catch (err) {
      return fail(new CompletionError(`Completion failed: ${errorMessage(err)}`, err));
    }
  }
}
